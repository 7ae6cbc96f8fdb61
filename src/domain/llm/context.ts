// Domain layer: Context management types and interfaces
// NO external dependencies - pure TypeScript

import type { GameStateSnapshot } from '@/domain/game/GameState.js';
import type { RetrievalContext } from '@/domain/knowledge/types.js';
import type { ParsedCommand } from '@/domain/commands/types.js';

/**
 * Everything a provider may read while a turn prompt is assembled.
 */
export interface PromptContext {
  state: Readonly<GameStateSnapshot>;
  retrieval: RetrievalContext;
  command: ParsedCommand;
  maxContextChars: number;
  /** resolved combat round, for flavor narration */
  combatSummary?: string;
}

/**
 * A single block of context content to be added to the LLM prompt
 */
export interface ContextBlock {
  name: string;
  content: string;
  priority: number;
  metadata?: Record<string, unknown>;
}

/**
 * Provider that can generate context blocks for the current turn
 */
export interface ContextProvider {
  name: string;
  priority: number;
  provide(context: PromptContext): ContextBlock | ContextBlock[] | null;
}

/**
 * Result of a build: the system framing and the turn prompt are kept apart so
 * chat-style backends can send them as separate messages.
 */
export interface BuiltPrompt {
  systemPrompt: string;
  prompt: string;
  estimatedTokens: number;
  /** providers that failed and were left out */
  skipped: BuildErrorEntry[];
}

/**
 * Builder that chains providers and generates the final prompt
 */
export interface ContextBuilder {
  add(provider: ContextProvider): this;
  build(context: PromptContext): BuiltPrompt;
}

export interface BuildErrorEntry {
  provider: string;
  error: string;
}
