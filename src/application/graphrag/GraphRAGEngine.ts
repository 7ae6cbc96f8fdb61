// Application layer: GraphRAG engine
// retrieve -> build prompt -> generate (retry, fallback) -> parse -> apply

import type {
  DirectiveReport,
  ParsedCommand,
  NarrativeResult,
  TurnDiagnostics,
  NarrativeBlock,
} from '@/domain/commands/types.js';
import type { Directive, DirectiveKind } from '@/domain/narrative/directives.js';
import { formatDirective } from '@/domain/narrative/directives.js';
import type { RetrievalContext } from '@/domain/knowledge/types.js';
import { emptyRetrievalContext } from '@/domain/knowledge/types.js';
import type { BuiltPrompt } from '@/domain/llm/context.js';
import type { GameState } from '@/application/game/GameState.js';
import type { Retriever } from '@/application/retrieval/Retriever.js';
import type { ProviderManager } from '@/application/llm/ProviderManager.js';
import { ContextBuilder } from '@/application/context/ContextBuilder.js';
import { SystemPromptProvider } from '@/application/context/providers/SystemPromptProvider.js';
import { DirectiveInstructionsProvider } from '@/application/context/providers/DirectiveInstructionsProvider.js';
import { RetrievalProvider } from '@/application/context/providers/RetrievalProvider.js';
import { GameStateProvider } from '@/application/context/providers/GameStateProvider.js';
import { PlayerCommandProvider } from '@/application/context/providers/PlayerCommandProvider.js';
import { CombatRoundProvider } from '@/application/context/providers/CombatRoundProvider.js';
import { block, buildResult, describeArea } from '@/application/messages/NarrativeFormatter.js';
import { parseNarrative } from './DirectiveParser.js';
import { applyDirectives } from './DirectiveApplier.js';
import { GenerationError } from '@/utils/errors.js';

export const EMPTY_NARRATIVE = 'Nothing happens.';

export interface GraphRAGEngineOptions {
  retriever: Retriever;
  providers: ProviderManager;
  maxContextChars: number;
  retryBackoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface TurnOptions {
  /** applied with the model's directives, e.g. the implicit "met" flag on talk */
  extraDirectives?: Directive[];
  /** model directives of these kinds are rejected for the turn */
  ignoredKinds?: DirectiveKind[];
}

export interface Generation {
  text: string;
  diagnostics: TurnDiagnostics;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class GraphRAGEngine {
  private readonly turnPrompt = new ContextBuilder()
    .add(new SystemPromptProvider())
    .add(new DirectiveInstructionsProvider())
    .add(new RetrievalProvider())
    .add(new GameStateProvider())
    .add(new PlayerCommandProvider());

  private readonly combatPrompt = new ContextBuilder()
    .add(new SystemPromptProvider())
    .add(new GameStateProvider())
    .add(new CombatRoundProvider());

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private options: GraphRAGEngineOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get providers(): ProviderManager {
    return this.options.providers;
  }

  async processTurn(state: GameState, command: ParsedCommand, turnOptions: TurnOptions = {}): Promise<NarrativeResult> {
    const retrieval = this.options.retriever.retrieve(state, command.raw);
    const prompt = this.turnPrompt.build({
      state: state.toSnapshot(),
      retrieval,
      command,
      maxContextChars: this.options.maxContextChars,
    });

    const generation = await this.generateWithFallback(prompt);
    const parsed = parseNarrative(generation.text);

    // template output never carries directives
    const modelDirectives = generation.diagnostics.fallbackUsed ? [] : parsed.directives;
    const ignored = new Set(turnOptions.ignoredKinds ?? []);
    const report: DirectiveReport = {
      applied: [],
      rejected: [],
      malformed: generation.diagnostics.fallbackUsed ? [] : parsed.malformed,
    };
    const allowed = modelDirectives.filter((directive) => {
      if (!ignored.has(directive.kind)) return true;
      report.rejected.push({
        directive: formatDirective(directive),
        reason: `"${directive.kind}" is not applied on ${command.verb} turns`,
      });
      return false;
    });

    const locationBefore = state.playerLocation;
    applyDirectives(state, [...allowed, ...(turnOptions.extraDirectives ?? [])], report);

    if (report.rejected.length > 0 || report.malformed.length > 0) {
      console.log(
        `[GraphRAGEngine] ${report.applied.length} applied, ${report.rejected.length} rejected, ${report.malformed.length} malformed`
      );
    }

    const blocks: NarrativeBlock[] = [block('normal', parsed.narrative || EMPTY_NARRATIVE)];
    if (state.playerLocation !== locationBefore) {
      blocks.push(block('location', describeArea(state)));
    }

    return buildResult(state, blocks, {
      ...generation.diagnostics,
      ...retrievalSizes(retrieval),
      directives: report,
    });
  }

  /**
   * Flavor text for a resolved combat round. Directives are ignored and the
   * state is not touched.
   */
  async narrateCombat(state: GameState, command: ParsedCommand, summary: string): Promise<Generation> {
    const prompt = this.combatPrompt.build({
      state: state.toSnapshot(),
      retrieval: emptyRetrievalContext(),
      command,
      maxContextChars: this.options.maxContextChars,
      combatSummary: summary,
    });

    const generation = await this.generateWithFallback(prompt);
    return {
      text: parseNarrative(generation.text).narrative,
      diagnostics: generation.diagnostics,
    };
  }

  /**
   * One retry for transient faults, then the template provider for this turn.
   */
  private async generateWithFallback(prompt: BuiltPrompt): Promise<Generation> {
    const { providers } = this.options;
    const request = { prompt: prompt.prompt, systemPrompt: prompt.systemPrompt };
    const promptTokens = prompt.estimatedTokens;
    const errors = prompt.skipped.map((entry) => `context ${entry.provider}: ${entry.error}`);
    const provider = providers.activeId;
    console.log(`[GraphRAGEngine] prompt ~${promptTokens} tokens for ${providers.activeName}`);
    let attempts = 0;

    for (let attempt = 1; attempt <= 2; attempt++) {
      attempts = attempt;
      try {
        const response = await providers.generate({ ...request, attempt });
        return {
          text: response.text,
          diagnostics: {
            provider,
            attempts: attempt,
            fallbackUsed: false,
            errors,
            latencyMs: response.latencyMs,
            promptTokens,
          },
        };
      } catch (error) {
        if (!(error instanceof GenerationError)) throw error;
        errors.push(`${error.code}: ${error.message}`);
        if (!error.retryable || attempt === 2) break;
        await this.sleep(this.options.retryBackoffMs);
      }
    }

    console.warn(`[GraphRAGEngine] Falling back to ${providers.fallback.name} after: ${errors.join('; ')}`);
    let text = '';
    let latencyMs: number | undefined;
    try {
      const response = await providers.generate({ ...request, attempt: attempts + 1 }, providers.fallback);
      text = response.text;
      latencyMs = response.latencyMs;
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      errors.push(`${error.code}: ${error.message}`);
    }

    return {
      text: text || EMPTY_NARRATIVE,
      diagnostics: {
        provider: providers.fallback.id,
        attempts,
        fallbackUsed: true,
        errors,
        latencyMs,
        promptTokens,
      },
    };
  }
}

function retrievalSizes(retrieval: RetrievalContext): TurnDiagnostics {
  return { retrievedChunks: retrieval.chunks.length, relatedNodes: retrieval.relatedNodes.length };
}
