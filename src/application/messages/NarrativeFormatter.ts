// Application layer: Narrative formatting
// Builds styled text blocks and the command-response envelope

import type {
  BlockStyle,
  NarrativeBlock,
  NarrativeResult,
  TurnDiagnostics,
} from '@/domain/commands/types.js';
import type { GameState } from '@/application/game/GameState.js';
import { describeDisposition } from '@/domain/game/GameState.js';

export function block(style: BlockStyle, text: string): NarrativeBlock {
  return { style, text: text.trim() };
}

export function describeArea(state: GameState): string {
  const area = state.currentArea();
  const lines = [area.name];
  if (area.description) lines.push(area.description);

  const exits = Object.entries(area.exits)
    .filter(([, target]) => target !== null)
    .map(([direction]) => direction);
  lines.push(`Exits: ${exits.length > 0 ? exits.join(', ') : 'none'}`);

  if (area.items.length > 0) lines.push(`You see: ${area.items.join(', ')}`);
  if (area.npcs.length > 0) {
    const npcs = area.npcs.map((npc) => `${npc} (${describeDisposition(state.npcState(npc).disposition)})`);
    lines.push(`Here: ${npcs.join(', ')}`);
  }
  return lines.join('\n');
}

export function describeInventory(state: GameState): string {
  if (state.inventory.length === 0) return "You aren't carrying anything.";

  const { equippedWeapon, equippedArmor } = state.player;
  const lines = state.inventory.map((entry) => {
    const tags: string[] = [];
    if (entry.quantity > 1) tags.push(`x${entry.quantity}`);
    if (entry.itemId === equippedWeapon || entry.itemId === equippedArmor) tags.push('equipped');
    return tags.length > 0 ? `- ${entry.itemId} (${tags.join(', ')})` : `- ${entry.itemId}`;
  });
  return ['You are carrying:', ...lines].join('\n');
}

export function buildResult(
  state: GameState,
  blocks: NarrativeBlock[],
  diagnostics: TurnDiagnostics = {}
): NarrativeResult {
  const visible = blocks.filter((b) => b.text.length > 0);
  return {
    blocks: visible,
    text: visible.map((b) => b.text).join('\n\n'),
    metadata: state.metadata(),
    diagnostics,
  };
}
