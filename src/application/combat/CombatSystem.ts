// Application layer: Turn-based combat
// NotStarted -> PlayerTurn -> (EnemyTurn ->)* -> Victory | Defeat | Fled
// The RNG position lives in the session, so a reloaded fight rolls the same dice.

import { v4 as uuidv4 } from 'uuid';
import type {
  CombatAction,
  CombatLogEntry,
  CombatOutcome,
  CombatSession,
  Combatant,
  StatusEffect,
} from '@/domain/combat/types.js';
import type { GameState } from '@/application/game/GameState.js';
import { SeededDiceRoller, normalizeSeed } from '@/infrastructure/game/DiceRoller.js';
import type { StatefulDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { InvalidTransitionError, ItemNotFoundError } from '@/utils/errors.js';
import { PLAYER_ID, enemyCombatant, experienceFor, playerCombatant } from './combatants.js';

export const BASE_HIT_CHANCE = 70;
export const CRITICAL_CHANCE = 5;
export const DEFEND_BONUS = 4;
export const WEAKENED_PENALTY = 3;
export const DEFAULT_HEAL = 20;
export const FACTION_PENALTY = 10;
export const FLEE_DISPOSITION_PENALTY = 5;

export type RollerFactory = (state: number) => StatefulDiceRoller;

export interface CombatSystemOptions {
  rollerFactory?: RollerFactory;
  /** seed for new fights; defaults to the clock */
  seed?: () => number;
}

export interface CombatRound {
  session: CombatSession;
  /** log lines produced by this call */
  messages: string[];
  outcome: CombatOutcome | null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function hasEffect(combatant: Combatant, effect: StatusEffect['effect']): StatusEffect | undefined {
  return combatant.statusEffects.find((s) => s.effect === effect);
}

export class CombatSystem {
  private readonly rollerFactory: RollerFactory;
  private readonly seed: () => number;

  constructor(options: CombatSystemOptions = {}) {
    this.rollerFactory = options.rollerFactory ?? ((state) => new SeededDiceRoller(state));
    this.seed = options.seed ?? (() => Date.now());
  }

  /**
   * Engage an NPC present in the current area.
   * @throws InvalidTransitionError when already fighting or the NPC is absent
   */
  start(state: GameState, target: string): CombatRound {
    if (state.combatActive) {
      throw new InvalidTransitionError('You are already in combat.');
    }
    const npc = state.findAreaNpc(target);
    if (npc === null) {
      throw new InvalidTransitionError(`There is no ${target.trim()} here to fight.`, { target });
    }

    const seed = normalizeSeed(this.seed());
    const message = `You engage ${npc} in combat!`;
    const session: CombatSession = {
      id: uuidv4(),
      participants: [playerCombatant(state), enemyCombatant(state, npc)],
      turnIndex: 0,
      round: 1,
      phase: 'player_turn',
      seed,
      rngState: seed,
      log: [{ turnIndex: 0, round: 1, actorId: PLAYER_ID, action: 'start', message }],
    };

    state.enterCombat(session);
    console.log(`[CombatSystem] Combat ${session.id} started against ${npc} (seed ${seed})`);
    return { session, messages: [message], outcome: null };
  }

  /**
   * Resolve the player's action and, unless the fight ends, the enemy's reply.
   * @throws InvalidTransitionError outside combat or for an unusable item
   * @throws ItemNotFoundError when the item to use is not carried
   */
  act(state: GameState, action: CombatAction, itemTerm?: string): CombatRound {
    const current = state.combat;
    if (!state.combatActive || current === null) {
      throw new InvalidTransitionError('You are not in combat.');
    }

    // validate before anything mutates
    const itemId = action === 'use' ? this.validateUsable(state, itemTerm) : null;

    const session: CombatSession = structuredClone(current);
    const roller = this.rollerFactory(session.rngState);
    const messages: string[] = [];
    const [player, enemy] = this.sides(session);

    const log: LogFn = (actor, entryAction, message, extra = {}) => {
      session.log.push({
        turnIndex: session.turnIndex,
        round: session.round,
        actorId: actor.id,
        action: entryAction,
        message,
        ...extra,
      });
      messages.push(message);
    };

    const outcome =
      this.takeTurn(session, player, enemy, log, () =>
        this.playerAction(state, player, enemy, action, itemId, roller, log)
      ) ??
      this.takeTurn(session, enemy, player, log, () => {
        this.attack(enemy, player, state, roller, log);
        return null;
      });

    session.rngState = roller.getState();
    if (outcome === null) {
      session.round += 1;
      session.phase = 'player_turn';
      state.updateCombat(session);
      return { session, messages, outcome: null };
    }

    session.phase = outcome;
    log(outcome === 'defeat' ? enemy : player, 'end', this.outcomeMessage(outcome, enemy));
    state.updateCombat(session);
    this.finish(state, session, outcome);
    return { session, messages, outcome };
  }

  // ========== Turn structure ==========

  private takeTurn(
    session: CombatSession,
    actor: Combatant,
    opponent: Combatant,
    log: LogFn,
    resolve: () => CombatOutcome | null
  ): CombatOutcome | null {
    session.phase = actor.side === 'player' ? 'player_turn' : 'enemy_turn';
    actor.defending = false;

    const poison = hasEffect(actor, 'poisoned');
    if (poison) {
      actor.stats.health = Math.max(0, actor.stats.health - poison.potency);
      log(actor, 'status', `${actor.name} ${actor.side === 'player' ? 'suffer' : 'suffers'} ${poison.potency} poison damage.`, {
        damage: poison.potency,
      });
      const outcome = this.checkDeaths(actor, opponent);
      if (outcome) return outcome;
    }

    let outcome: CombatOutcome | null;
    if (hasEffect(actor, 'stunned')) {
      log(actor, 'wait', `${actor.name} ${actor.side === 'player' ? 'are' : 'is'} stunned and cannot act.`);
      outcome = null;
    } else {
      outcome = resolve() ?? this.checkDeaths(actor, opponent);
    }

    this.tickEffects(actor);
    session.turnIndex += 1;
    return outcome;
  }

  private playerAction(
    state: GameState,
    player: Combatant,
    enemy: Combatant,
    action: CombatAction,
    itemId: string | null,
    roller: StatefulDiceRoller,
    log: LogFn
  ): CombatOutcome | null {
    switch (action) {
      case 'attack':
        this.attack(player, enemy, state, roller, log);
        return null;
      case 'defend':
        player.defending = true;
        log(player, 'defend', 'You raise your guard.');
        return null;
      case 'flee': {
        const chance = clamp(50 + 5 * (player.stats.speed - enemy.stats.speed), 10, 90);
        const roll = roller.roll(100);
        if (roll <= chance) {
          log(player, 'flee', `You break away from ${enemy.name}.`, { roll });
          return 'fled';
        }
        log(player, 'flee', `You try to escape, but ${enemy.name} blocks your way.`, { roll });
        return null;
      }
      case 'use':
        if (itemId !== null) this.useItem(state, player, enemy, itemId, log);
        return null;
      case 'wait':
        log(player, 'wait', 'You hold your position.');
        return null;
    }
  }

  private attack(
    attacker: Combatant,
    defender: Combatant,
    state: GameState,
    roller: StatefulDiceRoller,
    log: LogFn
  ): void {
    const chance = clamp(BASE_HIT_CHANCE + 2 * (attacker.stats.speed - defender.stats.speed), 5, 95);
    const roll = roller.roll(100);
    const subject = attacker.side === 'player' ? 'You' : attacker.name;
    const object = defender.side === 'player' ? 'you' : defender.name;

    if (roll > chance) {
      log(attacker, 'attack', `${subject} ${attacker.side === 'player' ? 'miss' : 'misses'} ${object}.`, { roll });
      return;
    }

    const attack =
      attacker.stats.attack +
      this.bonus(state, attacker.weaponId, 'attackBonus') -
      (hasEffect(attacker, 'weakened') ? WEAKENED_PENALTY : 0);
    const defense =
      defender.stats.defense +
      this.bonus(state, defender.armorId, 'defenseBonus') +
      (hasEffect(defender, 'protected')?.potency ?? 0) +
      (defender.defending ? DEFEND_BONUS : 0);

    let damage = Math.max(1, attack - defense);
    const critical = roller.roll(100) <= CRITICAL_CHANCE;
    if (critical) damage *= 2;

    defender.stats.health = Math.max(0, defender.stats.health - damage);
    const verb = attacker.side === 'player' ? 'hit' : 'hits';
    log(
      attacker,
      'attack',
      `${critical ? 'Critical! ' : ''}${subject} ${verb} ${object} for ${damage} damage.`,
      { roll, damage }
    );
  }

  private useItem(
    state: GameState,
    player: Combatant,
    enemy: Combatant,
    itemId: string,
    log: LogFn
  ): void {
    const profile = state.itemProfile(itemId);
    state.removeItem(itemId);

    const heal = profile?.heal ?? (isHealingName(itemId) ? DEFAULT_HEAL : 0);
    if (heal > 0) {
      const before = player.stats.health;
      player.stats.health = Math.min(player.stats.maxHealth, before + heal);
      log(player, 'use', `You use the ${itemId} and recover ${player.stats.health - before} health.`);
    }

    const effect = profile?.effect;
    if (effect) {
      const target = effect.effect === 'protected' ? player : enemy;
      target.statusEffects = target.statusEffects.filter((s) => s.effect !== effect.effect);
      // +1 so the effect survives the end of the turn it was applied in
      target.statusEffects.push({
        effect: effect.effect,
        remaining: effect.duration + (target === player ? 1 : 0),
        potency: effect.potency,
      });
      log(player, 'use', `You use the ${itemId}: ${target === player ? 'you are' : `${target.name} is`} ${effect.effect}.`);
    }
  }

  private tickEffects(combatant: Combatant): void {
    combatant.statusEffects = combatant.statusEffects
      .map((s) => ({ ...s, remaining: s.remaining - 1 }))
      .filter((s) => s.remaining > 0);
  }

  private checkDeaths(actor: Combatant, opponent: Combatant): CombatOutcome | null {
    const player = actor.side === 'player' ? actor : opponent;
    const enemy = actor.side === 'player' ? opponent : actor;
    if (player.stats.health <= 0) return 'defeat';
    if (enemy.stats.health <= 0) return 'victory';
    return null;
  }

  // ========== Helpers ==========

  private validateUsable(state: GameState, itemTerm: string | undefined): string {
    const term = itemTerm?.trim() ?? '';
    if (!term) {
      throw new InvalidTransitionError('Use what?');
    }
    const itemId = state.findInventoryItem(term);
    if (itemId === null) {
      throw new ItemNotFoundError(`You don't have ${term}.`, term);
    }
    const profile = state.itemProfile(itemId);
    if (!profile?.heal && !profile?.effect && !isHealingName(itemId)) {
      throw new InvalidTransitionError(`The ${itemId} is no use in a fight.`, { itemId });
    }
    return itemId;
  }

  private bonus(state: GameState, itemId: string | null, field: 'attackBonus' | 'defenseBonus'): number {
    if (itemId === null) return 0;
    return state.itemProfile(itemId)?.[field] ?? 0;
  }

  private sides(session: CombatSession): [Combatant, Combatant] {
    const player = session.participants.find((p) => p.side === 'player');
    const enemy = session.participants.find((p) => p.side === 'enemy');
    if (!player || !enemy) {
      throw new InvalidTransitionError('Combat session is missing a participant.', { combatId: session.id });
    }
    return [player, enemy];
  }

  private outcomeMessage(outcome: CombatOutcome, enemy: Combatant): string {
    switch (outcome) {
      case 'victory':
        return `${enemy.name} is defeated!`;
      case 'defeat':
        return `You collapse before ${enemy.name}...`;
      case 'fled':
        return `You escaped from ${enemy.name}.`;
    }
  }

  /**
   * Fold the finished fight back into the game state.
   */
  private finish(state: GameState, session: CombatSession, outcome: CombatOutcome): void {
    const [player, enemy] = this.sides(session);
    state.exitCombat();
    state.setPlayerHealth(player.stats.health);
    const npc = enemy.id;

    switch (outcome) {
      case 'victory': {
        const profile = state.npcProfile(npc);
        for (const item of profile?.loot ?? []) {
          state.addItem(item, { source: npc });
        }
        state.addExperience(experienceFor(state, npc));
        state.removeNpcFromArea(npc);
        state.setNpcDisposition(npc, 0);
        state.setNpcFlag(npc, 'defeated', true);
        if (profile?.faction) {
          state.updateFactionStanding(profile.faction, -FACTION_PENALTY);
        }
        state.recordEvent({ actor: 'player', description: `Defeated ${npc} in combat` });
        break;
      }
      case 'defeat':
        state.setPlayerHealth(Math.max(1, Math.floor(state.player.maxHealth / 4)));
        state.recordEvent({ actor: 'player', description: `Was beaten by ${npc} and barely escaped` });
        break;
      case 'fled':
        state.updateNpcDisposition(npc, -FLEE_DISPOSITION_PENALTY);
        state.recordEvent({ actor: 'player', description: `Fled from a fight with ${npc}` });
        break;
    }

    console.log(`[CombatSystem] Combat ${session.id} ended: ${outcome}`);
  }
}

type LogFn = (
  actor: Combatant,
  action: CombatLogEntry['action'],
  message: string,
  extra?: Partial<CombatLogEntry>
) => void;

function isHealingName(itemId: string): boolean {
  return /potion|salve/i.test(itemId);
}
