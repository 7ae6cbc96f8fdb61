// Application layer: Session registry
// Builds sessions on a shared world and knowledge store; sessions share no mutable state.

import { v4 as uuidv4 } from 'uuid';
import type { WorldDefinition } from '@/domain/world/types.js';
import type { KnowledgeStore } from '@/domain/knowledge/types.js';
import type { LLMConfig, GameDefaults } from '@/utils/config.js';
import type { ProviderFactory } from '@/infrastructure/llm/createProvider.js';
import { GameState } from './GameState.js';
import type { GameStateOptions } from './GameState.js';
import type { GameStateManager } from './GameStateManager.js';
import { sessionIdSchema } from './GameStateManager.js';
import { GameSession } from './GameSession.js';
import { ProviderManager } from '@/application/llm/ProviderManager.js';
import { Retriever } from '@/application/retrieval/Retriever.js';
import { GraphRAGEngine } from '@/application/graphrag/GraphRAGEngine.js';
import { CombatSystem } from '@/application/combat/CombatSystem.js';
import type { RollerFactory } from '@/application/combat/CombatSystem.js';
import { CommandProcessor } from '@/application/commands/CommandProcessor.js';
import { SessionExistsError, SessionNotFoundError } from '@/utils/errors.js';

export interface SessionRegistryOptions {
  world: WorldDefinition;
  knowledge: KnowledgeStore;
  saves: GameStateManager;
  llm: LLMConfig;
  game: GameDefaults;
  providerFactory?: ProviderFactory;
  rollerFactory?: RollerFactory;
  stateOptions?: GameStateOptions;
  sleep?: (ms: number) => Promise<void>;
}

export interface CreateSessionOptions {
  sessionId?: string;
  provider?: number;
}

export interface OpenSessionOptions extends CreateSessionOptions {
  /** Resume from this slot of the session's saves */
  slotName?: string;
}

export class SessionRegistry {
  private sessions = new Map<string, GameSession>();
  private readonly retriever: Retriever;

  constructor(private options: SessionRegistryOptions) {
    this.retriever = new Retriever(options.knowledge, { topK: options.game.retrievalTopK });
  }

  /**
   * @throws ConfigError when the requested provider is not configured
   * @throws SessionExistsError when the id belongs to a live session
   * @throws ZodError when the id is not a valid session id
   */
  create(createOptions: CreateSessionOptions = {}): GameSession {
    const { llm, game } = this.options;
    const sessionId =
      createOptions.sessionId === undefined ? uuidv4() : sessionIdSchema.parse(createOptions.sessionId);
    if (this.sessions.has(sessionId)) {
      throw new SessionExistsError(sessionId);
    }

    const providers = new ProviderManager({
      settings: llm.providers,
      generation: {
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
        timeoutMs: llm.timeoutSeconds * 1000,
      },
      initialProvider: createOptions.provider ?? llm.activeProvider,
      factory: this.options.providerFactory,
      sessionId,
    });

    const engine = new GraphRAGEngine({
      retriever: this.retriever,
      providers,
      maxContextChars: game.maxContextChars,
      retryBackoffMs: llm.retryBackoffMs,
      sleep: this.options.sleep,
    });

    const seed = game.combatSeed;
    const combat = new CombatSystem({
      rollerFactory: this.options.rollerFactory,
      seed: seed === undefined ? undefined : () => seed,
    });

    const session = new GameSession({
      state: GameState.fromWorld(sessionId, this.options.world, this.options.stateOptions),
      providers,
      processor: new CommandProcessor({ engine, combat }),
      saves: this.options.saves,
      autosaveTurns: game.autosaveTurns,
    });

    this.sessions.set(sessionId, session);
    console.log(`[SessionRegistry] Session ${sessionId} created with ${providers.activeName}`);
    return session;
  }

  /**
   * Create a session and, when a slot is named, resume it from that save.
   * A failed load leaves no session behind.
   * @throws SaveNotFoundError
   * @throws SaveCorruptedError
   */
  async open(openOptions: OpenSessionOptions = {}): Promise<GameSession> {
    const { slotName, ...createOptions } = openOptions;
    const session = this.create(createOptions);
    if (slotName === undefined) return session;
    try {
      await session.load(slotName);
    } catch (error) {
      this.sessions.delete(session.id);
      throw error;
    }
    return session;
  }

  /**
   * @throws SessionNotFoundError
   */
  get(sessionId: string): GameSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Forget a session. Its saves stay in the database.
   * @throws SessionNotFoundError
   */
  delete(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    console.log(`[SessionRegistry] Session ${sessionId} closed`);
  }

  get size(): number {
    return this.sessions.size;
  }
}
