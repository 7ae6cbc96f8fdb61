// Application layer: ContextBuilder implementation
// Orchestrates context providers and builds the provider-agnostic prompt

import type {
  BuiltPrompt,
  ContextBlock,
  ContextBuilder as IContextBuilder,
  ContextProvider,
  BuildErrorEntry,
  PromptContext,
} from '@/domain/llm/context.js';
import { estimateTokens } from '@/utils/tokens.js';

/** blocks below this priority form the system framing */
export const SYSTEM_PRIORITY_LIMIT = 200;

const CRITICAL_PROVIDERS = ['player-command'];

/**
 * Chains providers and builds the final prompt. A failing provider is
 * skipped and reported, unless the turn cannot be prompted without it.
 */
export class ContextBuilder implements IContextBuilder {
  private providers: ContextProvider[] = [];

  add(provider: ContextProvider): this {
    this.providers.push(provider);
    return this;
  }

  build(context: PromptContext): BuiltPrompt {
    const sorted = [...this.providers].sort((a, b) => a.priority - b.priority);
    const blocks: ContextBlock[] = [];
    const skipped: BuildErrorEntry[] = [];

    for (const provider of sorted) {
      try {
        const result = provider.provide(context);
        if (result) {
          blocks.push(...(Array.isArray(result) ? result : [result]));
        }
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        console.error(`[ContextBuilder] Provider ${provider.name} failed:`, error);
        if (CRITICAL_PROVIDERS.includes(provider.name)) {
          throw new Error(`Critical context provider failed: ${provider.name}`, { cause: error });
        }
        skipped.push({ provider: provider.name, error: errorMessage });
      }
    }

    return this.combineBlocks(blocks, skipped);
  }

  private combineBlocks(blocks: ContextBlock[], skipped: BuildErrorEntry[]): BuiltPrompt {
    const system = blocks.filter((b) => b.priority < SYSTEM_PRIORITY_LIMIT);
    const turn = blocks.filter((b) => b.priority >= SYSTEM_PRIORITY_LIMIT);
    const systemPrompt = system.map((b) => b.content).join('\n\n');
    const prompt = turn.map((b) => b.content).join('\n\n');

    return {
      systemPrompt,
      prompt,
      estimatedTokens: estimateTokens(systemPrompt) + estimateTokens(prompt),
      skipped,
    };
  }
}
