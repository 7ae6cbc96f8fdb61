// Application layer: Command processor
// Idle -> parse -> {movement, interaction, inventory, combat, system, narrative} -> Idle

import type { NarrativeBlock, NarrativeResult, ParsedCommand } from '@/domain/commands/types.js';
import type { CombatAction } from '@/domain/combat/types.js';
import type { GameState } from '@/application/game/GameState.js';
import type { GraphRAGEngine } from '@/application/graphrag/GraphRAGEngine.js';
import type { CombatRound, CombatSystem } from '@/application/combat/CombatSystem.js';
import { block, buildResult, describeArea, describeInventory } from '@/application/messages/NarrativeFormatter.js';
import { isStateRefusal, InvalidTransitionError } from '@/utils/errors.js';
import { normalizeDirection } from '@/domain/world/types.js';
import { parseCommand } from './CommandParser.js';

export const HELP_TEXT = [
  'Movement: go <direction or place>, or just north, n, up...',
  'Looking around: look, examine <thing>, talk to <someone>',
  'Items: take <item>, drop <item>, use <item>, equip <item>, inventory',
  'Fighting: attack <someone>, then attack, defend, use <item> or flee',
  'System: save [slot], load [slot], saves, provider [1-6], help',
].join('\n');

export const COMBAT_ONLY = 'You are in the middle of a fight! Attack, defend, use an item or flee.';
export const EMPTY_COMMAND = 'Say something.';

/**
 * Save, load and provider commands need the session around the state.
 */
export interface SystemCommands {
  save(slot: string | null): Promise<string>;
  load(slot: string | null): Promise<string>;
  listSaves(): Promise<string>;
  provider(id: string | null): string;
}

export interface CommandProcessorOptions {
  engine: GraphRAGEngine;
  combat: CombatSystem;
}

export class CommandProcessor {
  constructor(private options: CommandProcessorOptions) {}

  /**
   * Process one command against the state. State refusals become narrative
   * and leave the state (including the turn counter) unchanged.
   */
  async process(state: GameState, input: string, system?: SystemCommands): Promise<NarrativeResult> {
    const command = parseCommand(input, state.combatActive);
    if (!command.raw) {
      return buildResult(state, [block('system', EMPTY_COMMAND)]);
    }

    if (command.category === 'system') {
      return buildResult(state, [await this.system(command, system)]);
    }

    if (state.combatActive && !this.allowedInCombat(command)) {
      return buildResult(state, [block('error', COMBAT_ONLY)]);
    }

    try {
      const result = await this.dispatch(state, command);
      state.incrementTurn();
      return { ...result, metadata: state.metadata() };
    } catch (error) {
      if (!isStateRefusal(error)) throw error;
      console.log(`[CommandProcessor] Refused "${command.raw}": ${error.message}`);
      return buildResult(state, [block('error', error.message)]);
    }
  }

  private allowedInCombat(command: ParsedCommand): boolean {
    return command.category === 'combat' || command.verb === 'look' || command.verb === 'inventory';
  }

  private dispatch(state: GameState, command: ParsedCommand): Promise<NarrativeResult> | NarrativeResult {
    switch (command.category) {
      case 'movement':
        return this.move(state, command);
      case 'interaction':
        return this.interact(state, command);
      case 'inventory':
        return this.inventory(state, command);
      case 'combat':
        return this.fight(state, command);
      // system commands never reach here
      case 'narrative':
      case 'system':
        return this.options.engine.processTurn(state, command);
    }
  }

  private async system(command: ParsedCommand, system: SystemCommands | undefined): Promise<NarrativeBlock> {
    if (command.verb === 'help') {
      return block('system', HELP_TEXT);
    }
    if (!system) {
      return block('error', 'That command is not available here.');
    }
    switch (command.verb) {
      case 'save':
        return block('system', await system.save(command.target));
      case 'load':
        return block('system', await system.load(command.target));
      case 'saves':
        return block('system', await system.listSaves());
      default:
        return block('system', system.provider(command.target));
    }
  }

  // ========== Movement ==========

  private move(state: GameState, command: ParsedCommand): NarrativeResult {
    const target = requireTarget(command.target, 'Go where?');
    const areaId = state.resolveExit(target);
    if (areaId !== null) {
      state.moveTo(areaId);
    } else if (normalizeDirection(target) in state.currentArea().exits) {
      // a known direction whose exit is blocked
      state.moveInDirection(target);
    } else {
      throw new InvalidTransitionError("You can't go that way.", { target });
    }
    return buildResult(state, [block('location', describeArea(state))]);
  }

  // ========== Interaction ==========

  private async interact(state: GameState, command: ParsedCommand): Promise<NarrativeResult> {
    switch (command.verb) {
      case 'look':
        return buildResult(state, [block('location', describeArea(state))]);
      case 'talk': {
        const term = requireTarget(command.target, 'Talk to whom?');
        const npc = state.findAreaNpc(term);
        if (npc === null) {
          throw new InvalidTransitionError(`There is no ${term} here.`, { target: term });
        }
        return this.options.engine.processTurn(state, command, {
          extraDirectives: [{ kind: 'flag', npc, flag: 'met', value: true }],
        });
      }
      case 'use':
        return this.useOutsideCombat(state, command);
      default:
        requireTarget(command.target, 'Examine what?');
        return this.options.engine.processTurn(state, command, { ignoredKinds: ['move'] });
    }
  }

  private async useOutsideCombat(state: GameState, command: ParsedCommand): Promise<NarrativeResult> {
    const term = requireTarget(command.target, 'Use what?');
    const itemId = state.findInventoryItem(term);
    const heal = itemId === null ? undefined : state.itemProfile(itemId)?.heal;
    if (itemId === null || !heal) {
      return this.options.engine.processTurn(state, command);
    }

    const before = state.player.health;
    state.removeItem(itemId);
    state.setPlayerHealth(before + heal);
    const recovered = state.player.health - before;
    return buildResult(state, [
      block('normal', `You use the ${itemId} and recover ${recovered} health (${state.player.health}/${state.player.maxHealth}).`),
    ]);
  }

  // ========== Inventory ==========

  private inventory(state: GameState, command: ParsedCommand): NarrativeResult {
    switch (command.verb) {
      case 'take': {
        const { itemId } = state.takeItem(requireTarget(command.target, 'Take what?'));
        return buildResult(state, [block('normal', `You take the ${itemId}.`)]);
      }
      case 'drop': {
        const { itemId } = state.dropItem(requireTarget(command.target, 'Drop what?'));
        return buildResult(state, [block('normal', `You drop the ${itemId}.`)]);
      }
      case 'equip': {
        const { itemId, slot } = state.equip(requireTarget(command.target, 'Equip what?'));
        const verb = slot === 'weapon' ? 'wield' : 'put on';
        return buildResult(state, [block('normal', `You ${verb} the ${itemId}.`)]);
      }
      default:
        return buildResult(state, [block('normal', describeInventory(state))]);
    }
  }

  // ========== Combat ==========

  private async fight(state: GameState, command: ParsedCommand): Promise<NarrativeResult> {
    const combat = this.options.combat;
    const rounds: CombatRound[] = [];

    if (!state.combatActive) {
      if (command.verb !== 'attack') {
        throw new InvalidTransitionError('You are not in combat.');
      }
      rounds.push(combat.start(state, requireTarget(command.target, 'Attack whom?')));
      rounds.push(combat.act(state, 'attack'));
    } else {
      rounds.push(combat.act(state, toCombatAction(command), command.target ?? undefined));
    }

    const messages = rounds.flatMap((round) => round.messages);
    const last = rounds[rounds.length - 1];
    const summary = messages.join(' ');
    const flavor = await this.options.engine.narrateCombat(state, command, summary);

    const blocks: NarrativeBlock[] = [block('combat', messages.join('\n'))];
    if (last.outcome === null) {
      blocks.push(block('combat', combatStatus(last)));
    }
    blocks.push(block('normal', flavor.text));
    if (last.outcome === 'victory' || last.outcome === 'fled') {
      blocks.push(block('location', describeArea(state)));
    }
    return buildResult(state, blocks, flavor.diagnostics);
  }
}

function toCombatAction(command: ParsedCommand): CombatAction {
  switch (command.verb) {
    case 'defend':
      return 'defend';
    case 'flee':
      return 'flee';
    case 'use':
      return 'use';
    default:
      return 'attack';
  }
}

function combatStatus(round: CombatRound): string {
  return round.session.participants
    .map((p) => `${p.name}: ${p.stats.health}/${p.stats.maxHealth}`)
    .join(' | ');
}

function requireTarget(target: string | null, prompt: string): string {
  if (target === null || !target.trim()) {
    throw new InvalidTransitionError(prompt);
  }
  return target;
}
