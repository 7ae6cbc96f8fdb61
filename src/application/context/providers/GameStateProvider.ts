// Application layer: Game state slice provider
// The lines here are also what the template provider reads back

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';
import type { GameStateSnapshot } from '@/domain/game/GameState.js';
import { DISPOSITION_DEFAULT, describeDisposition, describeStanding } from '@/domain/game/GameState.js';
import { buildSection } from '@/utils/prompts.js';

const RECENT_EVENTS = 5;

export function dispositionOf(state: Readonly<GameStateSnapshot>, npc: string): number {
  return state.npcStates[npc]?.disposition ?? state.npcProfiles[npc]?.disposition ?? DISPOSITION_DEFAULT;
}

export function formatGameState(state: Readonly<GameStateSnapshot>): string {
  const area = state.areas[state.playerLocation];
  const lines: string[] = [`You are in ${area.name}.`];

  lines.push(`Region: ${area.subRegion ? `${area.region} / ${area.subRegion}` : area.region}`);
  if (area.description) lines.push(area.description);

  const exits = Object.entries(area.exits).map(([direction, target]) =>
    target === null ? `${direction} (blocked)` : direction
  );
  lines.push(`Exits: ${exits.length > 0 ? exits.join(', ') : 'none'}`);
  lines.push(`Items here: ${area.items.length > 0 ? area.items.join(', ') : 'nothing'}`);

  const npcs = area.npcs.map((npc) => `${npc} (${describeDisposition(dispositionOf(state, npc))})`);
  lines.push(`Characters present: ${npcs.length > 0 ? npcs.join(', ') : 'none'}`);

  const inventory = state.inventory.map((entry) =>
    entry.quantity > 1 ? `${entry.itemId} (x${entry.quantity})` : entry.itemId
  );
  lines.push(`Inventory: ${inventory.length > 0 ? inventory.join(', ') : 'nothing'}`);
  lines.push(`Health: ${state.player.health}/${state.player.maxHealth}`);

  const standings = Object.entries(state.factionStandings).map(
    ([faction, standing]) => `${describeStanding(standing)} ${faction}`
  );
  if (standings.length > 0) lines.push(`Standing: ${standings.join('; ')}`);

  const recent = state.worldEvents.slice(-RECENT_EVENTS);
  if (recent.length > 0) {
    lines.push('Recent events:');
    recent.forEach((event) => lines.push(`- ${event.description}`));
  }

  return lines.join('\n');
}

export class GameStateProvider implements ContextProvider {
  name = 'game-state';
  priority = 210;

  provide(context: PromptContext): ContextBlock {
    return {
      name: this.name,
      content: buildSection('Current Game State', formatGameState(context.state)),
      priority: this.priority,
    };
  }
}
