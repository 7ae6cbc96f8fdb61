// Application layer: Combatant construction

import type { Combatant } from '@/domain/combat/types.js';
import type { GameState } from '@/application/game/GameState.js';

export const PLAYER_ID = 'player';

export function playerCombatant(state: GameState): Combatant {
  const player = state.player;
  return {
    id: PLAYER_ID,
    name: 'You',
    side: 'player',
    stats: {
      health: player.health,
      maxHealth: player.maxHealth,
      attack: player.attack,
      defense: player.defense,
      speed: player.speed,
    },
    weaponId: player.equippedWeapon,
    armorId: player.equippedArmor,
    statusEffects: [],
    defending: false,
  };
}

/**
 * Stats come from the NPC profile, otherwise scale with the area's danger level.
 */
export function enemyCombatant(state: GameState, npc: string): Combatant {
  const profile = state.npcProfile(npc);
  const danger = state.currentArea().dangerLevel;
  const health = profile?.health ?? 20 + 8 * danger;

  return {
    id: npc,
    name: npc,
    side: 'enemy',
    stats: {
      health,
      maxHealth: health,
      attack: profile?.attack ?? 4 + 2 * danger,
      defense: profile?.defense ?? 1 + danger,
      speed: profile?.speed ?? 4 + danger,
    },
    weaponId: null,
    armorId: null,
    statusEffects: [],
    defending: false,
  };
}

export function experienceFor(state: GameState, npc: string): number {
  return state.npcProfile(npc)?.experience ?? 10 * (state.currentArea().dangerLevel + 1);
}
