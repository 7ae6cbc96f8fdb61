// Application layer: Directive application
// Applies parsed directives through GameState operations, once per turn

import type { Directive } from '@/domain/narrative/directives.js';
import { formatDirective } from '@/domain/narrative/directives.js';
import type { DirectiveReport } from '@/domain/commands/types.js';
import type { GameState } from '@/application/game/GameState.js';
import { GameEngineError } from '@/utils/errors.js';

export const NARRATOR = 'narrator';

function applyOne(state: GameState, directive: Directive): void {
  switch (directive.kind) {
    case 'move': {
      const exits = state.currentArea().exits;
      const target = state.resolveExit(directive.target);
      if (target !== null) {
        state.moveTo(target);
      } else if (directive.target.trim().toLowerCase() in exits) {
        state.moveInDirection(directive.target);
      } else {
        state.moveTo(directive.target.trim());
      }
      return;
    }
    case 'take':
      state.takeItem(directive.item);
      return;
    case 'drop':
      state.dropItem(directive.item);
      return;
    case 'give': {
      const known = state.findInventoryItem(directive.item) ?? state.findCatalogItem(directive.item);
      state.addItem(known ?? directive.item);
      return;
    }
    case 'disposition':
      state.updateNpcDisposition(directive.npc, directive.delta);
      return;
    case 'faction':
      state.updateFactionStanding(directive.faction, directive.delta);
      return;
    case 'flag':
      state.setNpcFlag(directive.npc, directive.flag, directive.value);
      return;
    case 'event':
      state.recordEvent({ actor: NARRATOR, description: directive.description });
      return;
  }
}

/**
 * Apply in order. A refused directive is recorded and the rest still apply.
 */
export function applyDirectives(
  state: GameState,
  directives: readonly Directive[],
  report: DirectiveReport = { applied: [], rejected: [], malformed: [] }
): DirectiveReport {
  for (const directive of directives) {
    const label = formatDirective(directive);
    try {
      applyOne(state, directive);
      report.applied.push(label);
    } catch (error) {
      if (!(error instanceof GameEngineError)) throw error;
      report.rejected.push({ directive: label, reason: error.message });
    }
  }
  return report;
}
