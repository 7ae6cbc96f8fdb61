// Domain layer: Combat types
// NO external dependencies - pure TypeScript

export type CombatSide = 'player' | 'enemy';

export type StatusEffectName = 'poisoned' | 'stunned' | 'weakened' | 'protected';

export interface StatusEffect {
  effect: StatusEffectName;
  remaining: number;
  potency: number;
}

export interface CombatStats {
  health: number;
  maxHealth: number;
  attack: number;
  defense: number;
  speed: number;
}

export interface Combatant {
  id: string;
  name: string;
  side: CombatSide;
  stats: CombatStats;
  weaponId: string | null;
  armorId: string | null;
  statusEffects: StatusEffect[];
  defending: boolean;
}

export type CombatPhase =
  | 'not_started'
  | 'player_turn'
  | 'enemy_turn'
  | 'victory'
  | 'defeat'
  | 'fled';

export type CombatAction = 'attack' | 'defend' | 'flee' | 'use' | 'wait';

export interface CombatLogEntry {
  turnIndex: number;
  round: number;
  actorId: string;
  action: CombatAction | 'status' | 'start' | 'end';
  roll?: number;
  damage?: number;
  message: string;
}

export interface CombatSession {
  id: string;
  participants: Combatant[];
  turnIndex: number;
  round: number;
  phase: CombatPhase;
  seed: number;
  rngState: number;
  log: CombatLogEntry[];
}

export type CombatOutcome = 'victory' | 'defeat' | 'fled';

export function isCombatOver(phase: CombatPhase): phase is CombatOutcome {
  return phase === 'victory' || phase === 'defeat' || phase === 'fled';
}
