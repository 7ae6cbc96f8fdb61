import { describe, expect, it } from 'vitest';
import { parseDirectiveBody, parseNarrative } from '@/application/graphrag/DirectiveParser.js';
import { applyDirectives } from '@/application/graphrag/DirectiveApplier.js';
import { formatDirective } from '@/domain/narrative/directives.js';
import { newState } from './helpers.js';

describe('parseNarrative', () => {
  it('strips directives, keeps the narrative and reports bad entries', () => {
    const text = [
      'Ana smiles at you.',
      '[[disposition: Ana | +5]]',
      '[[flag: Ana | met | TRUE]]',
      '',
      '',
      'She points north.',
      '[[teleport: moon]]',
      '[[event: Ana | shared a secret]]',
    ].join('\n');

    const parsed = parseNarrative(text);
    expect(parsed.narrative).toBe('Ana smiles at you.\n\nShe points north.');
    expect(parsed.directives).toEqual([
      { kind: 'disposition', npc: 'Ana', delta: 5 },
      { kind: 'flag', npc: 'Ana', flag: 'met', value: true },
      { kind: 'event', description: 'Ana | shared a secret' },
    ]);
    expect(parsed.malformed).toEqual([{ raw: '[[teleport: moon]]', reason: 'unknown directive "teleport"' }]);
  });

  it('returns plain text untouched apart from trimming', () => {
    expect(parseNarrative('  The wind howls.  ')).toEqual({
      narrative: 'The wind howls.',
      directives: [],
      malformed: [],
    });
  });
});

describe('parseDirectiveBody', () => {
  it.each([
    ['move north', 'missing ":"'],
    ['disposition: Ana', 'wrong number of arguments'],
    ['disposition: Ana | lots', 'argument 1: delta must be a whole number'],
    ['disposition: Ana | +150', 'argument 1: Number must be less than or equal to 100'],
    ['take:   ', 'argument 0: argument is empty'],
    ['flag: Ana | met | maybe', "argument 2: Invalid enum value. Expected 'true' | 'false', received 'maybe'"],
  ])('rejects "%s"', (body, reason) => {
    expect(parseDirectiveBody(body)).toEqual({ ok: false, reason });
  });

  it('accepts negative deltas and trims arguments', () => {
    expect(parseDirectiveBody(' Faction :  goblins |  -20 ')).toEqual({
      ok: true,
      directive: { kind: 'faction', faction: 'goblins', delta: -20 },
    });
  });

  it('formats directives back into their written form', () => {
    expect(formatDirective({ kind: 'disposition', npc: 'Ana', delta: -3 })).toBe('[[disposition: Ana | -3]]');
    expect(formatDirective({ kind: 'flag', npc: 'Ana', flag: 'met', value: false })).toBe('[[flag: Ana | met | false]]');
  });
});

describe('applyDirectives', () => {
  it('applies in order and records refusals without stopping', () => {
    const state = newState();
    const report = applyDirectives(state, [
      { kind: 'disposition', npc: 'Ana', delta: 5 },
      { kind: 'move', target: 'north' },
      { kind: 'take', item: 'brass key' },
      { kind: 'give', item: 'goblin ear' },
      { kind: 'event', description: 'Followed the goblin' },
    ]);

    expect(report).toEqual({
      applied: [
        '[[disposition: Ana | +5]]',
        '[[move: north]]',
        '[[give: goblin ear]]',
        '[[event: Followed the goblin]]',
      ],
      rejected: [{ directive: '[[take: brass key]]', reason: 'There is no brass key here.' }],
      malformed: [],
    });
    expect(state.playerLocation).toBe('library');
    expect(state.npcState('Ana').disposition).toBe(65);
    expect(state.inventory.map((e) => e.itemId)).toEqual(['goblin ear']);
    expect(state.worldEvents.map((e) => [e.actor, e.description])).toEqual([['narrator', 'Followed the goblin']]);
  });

  it('refuses a move through a blocked exit', () => {
    const state = newState();
    const report = applyDirectives(state, [{ kind: 'move', target: 'west' }]);
    expect(report.rejected).toEqual([{ directive: '[[move: west]]', reason: 'The way west is blocked.' }]);
    expect(state.playerLocation).toBe('hall');
  });

  it('moves by area name', () => {
    const state = newState();
    applyDirectives(state, [{ kind: 'move', target: 'Library' }]);
    expect(state.playerLocation).toBe('library');
  });
});
