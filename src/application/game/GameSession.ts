// Application layer: Game session coordinator
// One player, one GameState; commands run strictly one at a time.

import { ZodError } from 'zod';
import type { NarrativeResult } from '@/domain/commands/types.js';
import type { ProviderStatus } from '@/domain/llm/types.js';
import type { GameState } from './GameState.js';
import type { GameStateManager, LoadResult, SaveResult } from './GameStateManager.js';
import { AUTOSAVE_SLOT, DEFAULT_SLOT } from './GameStateManager.js';
import type { ProviderManager } from '@/application/llm/ProviderManager.js';
import type { CommandProcessor, SystemCommands } from '@/application/commands/CommandProcessor.js';
import type { SaveSlotSummary } from '@/infrastructure/database/lowdb/GameStateRepository.js';
import { ConfigError, SaveCorruptedError, SaveNotFoundError } from '@/utils/errors.js';

export interface GameSessionDependencies {
  state: GameState;
  providers: ProviderManager;
  processor: CommandProcessor;
  saves: GameStateManager;
  /** 0 disables autosave */
  autosaveTurns: number;
}

export interface SessionSummary {
  sessionId: string;
  turn: number;
  provider: ProviderStatus;
  metadata: NarrativeResult['metadata'];
}

export class GameSession {
  private current: GameState;
  private deps: GameSessionDependencies;
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: GameSessionDependencies) {
    this.deps = deps;
    this.current = deps.state;
  }

  get id(): string {
    return this.current.sessionId;
  }

  get state(): GameState {
    return this.current;
  }

  get providers(): ProviderManager {
    return this.deps.providers;
  }

  summary(): SessionSummary {
    const active = this.deps.providers.activeId;
    const provider = this.deps.providers.listProviders().find((p) => p.id === active);
    if (!provider) {
      throw new ConfigError(`Active provider ${active} is not listed`, 'LLM_PROVIDER');
    }
    return { sessionId: this.id, turn: this.current.turn, provider, metadata: this.current.metadata() };
  }

  /**
   * Main entry point: process one line of player input.
   */
  handleCommand(text: string): Promise<NarrativeResult> {
    return this.enqueue(() => this.runCommand(text));
  }

  save(slotName: string = DEFAULT_SLOT): Promise<SaveResult> {
    return this.enqueue(() => this.deps.saves.save(this.current, slotName));
  }

  /**
   * Replace the live state with a saved one. On failure the live state stays.
   */
  load(slotName: string = DEFAULT_SLOT): Promise<LoadResult> {
    return this.enqueue(() => this.loadNow(slotName));
  }

  listSaves(): Promise<SaveSlotSummary[]> {
    return this.enqueue(() => this.deps.saves.listSlots(this.id));
  }

  deleteSave(slotName: string): Promise<void> {
    return this.enqueue(() => this.deps.saves.deleteSlot(this.id, slotName));
  }

  switchProvider(id: number): Promise<ProviderStatus> {
    return this.enqueue(async () => this.deps.providers.switchProvider(id));
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // the caller gets the rejection; the chain only has to settle
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runCommand(text: string): Promise<NarrativeResult> {
    const state = this.current;
    const turnBefore = state.turn;
    const result = await this.deps.processor.process(state, text, this.systemCommands());

    // a load command swapped the state
    if (this.current !== state) {
      return { ...result, metadata: this.current.metadata() };
    }

    const { autosaveTurns } = this.deps;
    const turn = state.turn;
    if (autosaveTurns > 0 && turn !== turnBefore && turn % autosaveTurns === 0) {
      try {
        await this.deps.saves.save(this.current, AUTOSAVE_SLOT);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[GameSession] Autosave failed for ${this.id}: ${message}`);
        result.diagnostics = { ...result.diagnostics, errors: [...(result.diagnostics.errors ?? []), `autosave: ${message}`] };
      }
    }
    return result;
  }

  private async loadNow(slotName: string): Promise<LoadResult> {
    const loaded = await this.deps.saves.load(this.id, slotName);
    this.current = loaded.state;
    return loaded;
  }

  // Called from inside the queue, so these must not enqueue again.
  private systemCommands(): SystemCommands {
    return {
      save: (slot) =>
        this.reportFailure(async () => {
          const saved = await this.deps.saves.save(this.current, slot ?? DEFAULT_SLOT);
          return `Game saved to "${saved.slotName}" (turn ${saved.turn}).`;
        }),
      load: (slot) =>
        this.reportFailure(async () => {
          const loaded = await this.loadNow(slot ?? DEFAULT_SLOT);
          return `Loaded "${loaded.slotName}" (turn ${loaded.state.turn}).`;
        }),
      listSaves: () =>
        this.reportFailure(async () => {
          const slots = await this.deps.saves.listSlots(this.id);
          if (slots.length === 0) return 'No saved games.';
          return ['Saved games:', ...slots.map((s) => `- ${s.slotName}: turn ${s.turn}, ${s.playerLocation}`)].join('\n');
        }),
      provider: (id) => {
        if (id === null) return describeProviders(this.deps.providers.listProviders());
        try {
          const status = this.deps.providers.switchProvider(parseInt(id, 10));
          return `Now using ${status.name}.`;
        } catch (error) {
          if (!(error instanceof ConfigError)) throw error;
          return `Could not switch provider: ${error.message}`;
        }
      },
    };
  }

  private async reportFailure(action: () => Promise<string>): Promise<string> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof SaveNotFoundError || error instanceof SaveCorruptedError) {
        return error.message;
      }
      if (error instanceof ZodError) {
        return error.issues[0]?.message ?? 'Invalid slot name';
      }
      throw error;
    }
  }
}

export function describeProviders(providers: readonly ProviderStatus[]): string {
  const lines = providers.map((p) => {
    const marker = p.active ? '*' : ' ';
    const note = p.configured ? '' : ` (needs ${p.missingField})`;
    return `${marker} ${p.id}. ${p.name}${note}`;
  });
  return ['Providers:', ...lines].join('\n');
}
