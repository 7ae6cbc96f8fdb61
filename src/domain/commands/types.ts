// Domain layer: Command and turn result types
// NO external dependencies - pure TypeScript

import type { TurnMetadata } from '@/domain/game/GameState.js';
import type { ProviderId } from '@/domain/llm/types.js';

export type CommandCategory =
  | 'movement'
  | 'interaction'
  | 'inventory'
  | 'combat'
  | 'system'
  | 'narrative';

export type CommandVerb =
  // movement
  | 'go'
  // interaction
  | 'look'
  | 'examine'
  | 'talk'
  | 'use'
  // inventory
  | 'take'
  | 'drop'
  | 'inventory'
  | 'equip'
  // combat
  | 'attack'
  | 'defend'
  | 'flee'
  // system
  | 'help'
  | 'save'
  | 'load'
  | 'saves'
  | 'provider'
  // anything else
  | 'freeform';

export interface ParsedCommand {
  raw: string;
  category: CommandCategory;
  verb: CommandVerb;
  target: string | null;
}

export type BlockStyle = 'location' | 'combat' | 'normal' | 'system' | 'error';

export interface NarrativeBlock {
  style: BlockStyle;
  text: string;
}

export interface DirectiveReport {
  applied: string[];
  rejected: Array<{ directive: string; reason: string }>;
  malformed: Array<{ raw: string; reason: string }>;
}

export interface TurnDiagnostics {
  provider?: ProviderId;
  attempts?: number;
  fallbackUsed?: boolean;
  errors?: string[];
  latencyMs?: number;
  /** rough size of the prompt sent */
  promptTokens?: number;
  retrievedChunks?: number;
  relatedNodes?: number;
  directives?: DirectiveReport;
}

/**
 * Command-response contract returned for every player command.
 */
export interface NarrativeResult {
  blocks: NarrativeBlock[];
  text: string;
  metadata: TurnMetadata;
  diagnostics: TurnDiagnostics;
}
