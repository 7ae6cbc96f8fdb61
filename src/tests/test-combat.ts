import { describe, expect, it } from 'vitest';
import { CombatSystem } from '@/application/combat/CombatSystem.js';
import { GameState } from '@/application/game/GameState.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { InvalidTransitionError } from '@/utils/errors.js';
import { clock, newState } from './helpers.js';

/** one list of rolls per `act` call */
function scripted(...rounds: number[][]): CombatSystem {
  return new CombatSystem({
    rollerFactory: () => new FixedDiceRoller(rounds.shift() ?? []),
    seed: () => 7,
  });
}

function inLibrary(): GameState {
  const state = newState();
  state.moveTo('library');
  return state;
}

describe('CombatSystem.start', () => {
  it('engages an NPC in the current area', () => {
    const state = inLibrary();
    const round = new CombatSystem({ seed: () => 7 }).start(state, 'Goblin');

    expect(round.messages).toEqual(['You engage goblin in combat!']);
    expect(state.combatActive).toBe(true);
    expect(state.combat?.participants.map((p) => [p.id, p.stats.health, p.stats.maxHealth])).toEqual([
      ['player', 50, 50],
      ['goblin', 12, 12],
    ]);
    expect(state.combat).toMatchObject({ round: 1, phase: 'player_turn', seed: 7, rngState: 7 });
  });

  it('refuses an NPC that is not here', () => {
    const state = newState();
    expect(() => new CombatSystem().start(state, 'goblin')).toThrow(
      new InvalidTransitionError('There is no goblin here to fight.')
    );
    expect(state.combatActive).toBe(false);
  });

  it('refuses to start a second fight', () => {
    const state = inLibrary();
    const combat = new CombatSystem({ seed: () => 7 });
    combat.start(state, 'goblin');
    expect(() => combat.start(state, 'goblin')).toThrow('You are already in combat.');
  });
});

describe('CombatSystem.act', () => {
  it('resolves a round of attacks with exact damage', () => {
    const state = inLibrary();
    const combat = scripted([10, 50, 80]);
    combat.start(state, 'goblin');

    // player: hit (10 <= 74), no crit, 7 - 1 = 6; goblin: miss (80 > 66)
    const round = combat.act(state, 'attack');

    expect(round.messages).toEqual(['You hit goblin for 6 damage.', 'goblin misses you.']);
    expect(round.outcome).toBeNull();
    expect(state.combat?.participants[1].stats.health).toBe(6);
    expect(state.combat?.round).toBe(2);
    expect(state.combat?.rngState).toBe(3);
  });

  it('ends in victory and folds the result into the state', () => {
    const state = inLibrary();
    const combat = scripted([10, 50, 30, 99], [1, 5]);
    combat.start(state, 'goblin');

    expect(combat.act(state, 'attack').messages).toEqual(['You hit goblin for 6 damage.', 'goblin hits you for 2 damage.']);
    const round = combat.act(state, 'attack');

    expect(round.messages).toEqual(['Critical! You hit goblin for 12 damage.', 'goblin is defeated!']);
    expect(round.outcome).toBe('victory');
    expect(state.combatActive).toBe(false);
    expect(state.combat).toBeNull();
    expect(state.player.health).toBe(48);
    expect(state.player.experience).toBe(15);
    expect(state.inventory).toEqual([{ itemId: 'goblin ear', quantity: 1, metadata: { source: 'goblin' } }]);
    expect(state.currentArea().npcs).toEqual([]);
    expect(state.npcState('goblin')).toEqual({ disposition: 0, flags: { defeated: true } });
    expect(state.factionStandings).toEqual({ goblins: -10 });
    expect(state.worldEvents.map((e) => e.description)).toEqual(['Defeated goblin in combat']);
  });

  it('halves incoming damage when defending', () => {
    const state = inLibrary();
    const combat = scripted([10, 99]);
    combat.start(state, 'goblin');

    // 5 attack against 3 defense + 4 guard
    expect(combat.act(state, 'defend').messages).toEqual(['You raise your guard.', 'goblin hits you for 1 damage.']);
    expect(state.combat?.participants[0].stats.health).toBe(49);
  });

  it('flees on a low enough roll', () => {
    const state = inLibrary();
    const combat = scripted([60]);
    combat.start(state, 'goblin');

    const round = combat.act(state, 'flee');
    expect(round.messages).toEqual(['You break away from goblin.', 'You escaped from goblin.']);
    expect(round.outcome).toBe('fled');
    expect(state.combatActive).toBe(false);
    expect(state.npcState('goblin').disposition).toBe(45);
    expect(state.currentArea().npcs).toEqual(['goblin']);
  });

  it('stuns the enemy with a thrown item', () => {
    const state = inLibrary();
    state.addItem('smoke bomb');
    const combat = scripted([]);
    combat.start(state, 'goblin');

    const round = combat.act(state, 'use', 'smoke');
    expect(round.messages).toEqual(['You use the smoke bomb: goblin is stunned.', 'goblin is stunned and cannot act.']);
    expect(state.hasItem('smoke bomb')).toBe(false);
    expect(state.combat?.participants[1].statusEffects).toEqual([]);
  });

  it('refuses items that do nothing in a fight without spending the turn', () => {
    const state = inLibrary();
    state.addItem('brass key');
    const combat = scripted();
    combat.start(state, 'goblin');
    const before = state.toSnapshot();

    expect(() => combat.act(state, 'use', 'key')).toThrow('The brass key is no use in a fight.');
    expect(() => combat.act(state, 'use', 'rope')).toThrow("You don't have rope.");
    expect(state.toSnapshot()).toEqual(before);
  });

  it('leaves the player on their feet after a defeat', () => {
    const state = inLibrary();
    state.setPlayerHealth(2);
    const combat = scripted([99, 10, 50]);
    combat.start(state, 'goblin');

    const round = combat.act(state, 'attack');
    expect(round.messages).toEqual(['You miss goblin.', 'goblin hits you for 2 damage.', 'You collapse before goblin...']);
    expect(round.outcome).toBe('defeat');
    expect(state.player.health).toBe(12);
    expect(state.playerLocation).toBe('library');
  });

  it('refuses actions outside combat', () => {
    expect(() => new CombatSystem().act(newState(), 'attack')).toThrow('You are not in combat.');
  });
});

describe('combat determinism', () => {
  function fight(state: GameState, combat: CombatSystem, actions: Array<'attack' | 'defend'>): string[] {
    return actions.flatMap((action) => (state.combatActive ? combat.act(state, action).messages : []));
  }

  it('replays the same fight from the same seed', () => {
    const first = inLibrary();
    const second = inLibrary();
    const combat = new CombatSystem({ seed: () => 42 });
    combat.start(first, 'goblin');
    combat.start(second, 'goblin');

    const actions: Array<'attack' | 'defend'> = ['attack', 'defend', 'attack', 'attack', 'attack', 'attack'];
    expect(fight(first, combat, actions)).toEqual(fight(second, combat, actions));
    expect(first.player.health).toBe(second.player.health);
  });

  it('continues a saved fight with the same rolls', () => {
    const combat = new CombatSystem({ seed: () => 42 });
    const original = inLibrary();
    combat.start(original, 'goblin');
    combat.act(original, 'attack');

    const restored = GameState.fromSnapshot(JSON.parse(JSON.stringify(original.toSnapshot())), { clock });
    expect(restored.combat).toEqual(original.combat);

    const actions: Array<'attack' | 'defend'> = ['attack', 'attack', 'defend', 'attack'];
    expect(fight(restored, combat, actions)).toEqual(fight(original, combat, actions));
    expect(restored.toSnapshot()).toEqual(original.toSnapshot());
  });
});
