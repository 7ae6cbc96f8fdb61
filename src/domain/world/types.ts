// Domain layer: World map types
// NO external dependencies - pure TypeScript

import type { StatusEffectName } from '@/domain/combat/types.js';

export type Coordinates = [x: number, y: number, z: number];

/**
 * A discrete location node in the game world graph.
 * Exits are not guaranteed to be bidirectional.
 */
export interface Area {
  id: string;
  name: string;
  region: string;
  subRegion: string | null;
  parentAreaId: string | null;
  isRegionEntrance: boolean;
  coordinates: Coordinates;
  description: string;
  attributes: string[];
  /** direction -> neighbour area id, null for a known but blocked direction */
  exits: Record<string, string | null>;
  items: string[];
  npcs: string[];
  visited: boolean;
  dangerLevel: number;
  requiresItem: string | null;
}

export type ItemKind = 'weapon' | 'armor' | 'consumable' | 'key' | 'misc';

export interface ItemEffect {
  /** protected lands on the user, the others on the opponent */
  effect: StatusEffectName;
  duration: number;
  potency: number;
}

export interface ItemProfile {
  kind: ItemKind;
  description?: string;
  attackBonus?: number;
  defenseBonus?: number;
  heal?: number;
  effect?: ItemEffect;
}

export interface NpcProfile {
  hostile: boolean;
  health?: number;
  attack?: number;
  defense?: number;
  speed?: number;
  faction?: string;
  loot: string[];
  experience?: number;
  disposition?: number;
}

export interface PlayerStats {
  health: number;
  maxHealth: number;
  attack: number;
  defense: number;
  speed: number;
  experience: number;
  equippedWeapon: string | null;
  equippedArmor: string | null;
}

export interface WorldDefinition {
  startAreaId: string;
  areas: Record<string, Area>;
  itemCatalog: Record<string, ItemProfile>;
  npcProfiles: Record<string, NpcProfile>;
  player: PlayerStats;
}

export const DIRECTION_ALIASES: Record<string, string> = {
  n: 'north',
  s: 'south',
  e: 'east',
  w: 'west',
  u: 'up',
  d: 'down',
  ne: 'northeast',
  nw: 'northwest',
  se: 'southeast',
  sw: 'southwest',
};

export const DIRECTIONS = [
  'north',
  'south',
  'east',
  'west',
  'up',
  'down',
  'northeast',
  'northwest',
  'southeast',
  'southwest',
  'in',
  'out',
] as const;

export function normalizeDirection(term: string): string {
  const lower = term.trim().toLowerCase();
  return DIRECTION_ALIASES[lower] ?? lower;
}
