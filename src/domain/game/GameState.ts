// Domain layer: Game state types
// NO external dependencies - pure TypeScript

import type { Area, ItemProfile, NpcProfile, PlayerStats } from '@/domain/world/types.js';
import type { CombatSession } from '@/domain/combat/types.js';

export type ItemMetadataValue = string | number | boolean;

export interface InventoryEntry {
  itemId: string;
  quantity: number;
  metadata: Record<string, ItemMetadataValue>;
}

export interface NpcState {
  /** 0 (hostile) .. 100 (devoted) */
  disposition: number;
  flags: Record<string, boolean>;
}

export interface WorldEvent {
  sequence: number;
  turn: number;
  actor: string;
  description: string;
  timestamp: string;
}

export interface NewWorldEvent {
  actor: string;
  description: string;
}

/**
 * Complete serializable state of one game session.
 * This is the save-file shape; the live object wraps it with operations.
 */
export interface GameStateSnapshot {
  version: 1;
  sessionId: string;
  turn: number;
  playerLocation: string;
  areas: Record<string, Area>;
  inventory: InventoryEntry[];
  player: PlayerStats;
  npcStates: Record<string, NpcState>;
  factionStandings: Record<string, number>;
  worldEvents: WorldEvent[];
  combatActive: boolean;
  combat: CombatSession | null;
  itemCatalog: Record<string, ItemProfile>;
  npcProfiles: Record<string, NpcProfile>;
}

/**
 * Previous/next pair returned by every mutation, for audit logging.
 */
export interface StateChange<T> {
  previous: T;
  next: T;
}

export interface TurnMetadata {
  playerLocation: string;
  inventoryCount: number;
  combatActive: boolean;
}

export const DISPOSITION_MIN = 0;
export const DISPOSITION_MAX = 100;
export const DISPOSITION_DEFAULT = 50;
export const FACTION_MIN = -100;
export const FACTION_MAX = 100;

export function describeDisposition(disposition: number): string {
  if (disposition < 20) return 'hostile';
  if (disposition < 40) return 'suspicious';
  if (disposition < 60) return 'neutral';
  if (disposition < 80) return 'friendly';
  return 'very friendly';
}

export function describeStanding(standing: number): string {
  if (standing < -50) return 'hated by';
  if (standing < -20) return 'disliked by';
  if (standing < 20) return 'neutral with';
  if (standing < 50) return 'liked by';
  return 'revered by';
}
