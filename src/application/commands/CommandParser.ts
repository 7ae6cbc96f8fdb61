// Application layer: Command classification
// Best-effort keyword matching; anything unrecognised is free-form narrative.

import type { CommandCategory, CommandVerb, ParsedCommand } from '@/domain/commands/types.js';
import { DIRECTION_ALIASES, DIRECTIONS } from '@/domain/world/types.js';

const VERBS: Record<string, [CommandCategory, CommandVerb]> = {
  go: ['movement', 'go'],
  move: ['movement', 'go'],
  walk: ['movement', 'go'],
  run: ['movement', 'go'],
  travel: ['movement', 'go'],
  head: ['movement', 'go'],
  enter: ['movement', 'go'],

  look: ['interaction', 'look'],
  l: ['interaction', 'look'],
  examine: ['interaction', 'examine'],
  x: ['interaction', 'examine'],
  inspect: ['interaction', 'examine'],
  read: ['interaction', 'examine'],
  talk: ['interaction', 'talk'],
  speak: ['interaction', 'talk'],
  ask: ['interaction', 'talk'],
  greet: ['interaction', 'talk'],
  use: ['interaction', 'use'],

  take: ['inventory', 'take'],
  get: ['inventory', 'take'],
  grab: ['inventory', 'take'],
  pick: ['inventory', 'take'],
  drop: ['inventory', 'drop'],
  inventory: ['inventory', 'inventory'],
  inv: ['inventory', 'inventory'],
  i: ['inventory', 'inventory'],
  equip: ['inventory', 'equip'],
  wield: ['inventory', 'equip'],
  wear: ['inventory', 'equip'],

  attack: ['combat', 'attack'],
  fight: ['combat', 'attack'],
  hit: ['combat', 'attack'],
  kill: ['combat', 'attack'],
  strike: ['combat', 'attack'],
  defend: ['combat', 'defend'],
  block: ['combat', 'defend'],
  flee: ['combat', 'flee'],
  escape: ['combat', 'flee'],

  help: ['system', 'help'],
  save: ['system', 'save'],
  load: ['system', 'load'],
  saves: ['system', 'saves'],
  provider: ['system', 'provider'],
};

// leading words dropped from a target: "talk to the smith" -> "smith"
const FILLERS = new Set(['to', 'with', 'at', 'up', 'the', 'a', 'an', 'on', 'into']);

// "look around", "look about here": still a plain look
const SURROUNDINGS = new Set(['around', 'about', 'here', 'room', 'surroundings', 'you', 'me']);

const DIRECTION_WORDS = new Set<string>([...DIRECTIONS, ...Object.keys(DIRECTION_ALIASES)]);

function stripFillers(words: string[]): string | null {
  let start = 0;
  while (start < words.length && FILLERS.has(words[start].toLowerCase())) start++;
  const target = words.slice(start).join(' ');
  return target || null;
}

export function isDirection(word: string): boolean {
  return DIRECTION_WORDS.has(word.toLowerCase());
}

/**
 * Classify a raw command. `inCombat` turns "run"/"run away" into flee and
 * "use" into a combat action.
 */
export function parseCommand(input: string, inCombat = false): ParsedCommand {
  const raw = input.trim().replace(/\s+/g, ' ');
  const words = raw.split(' ').filter(Boolean);
  const head = words[0]?.toLowerCase() ?? '';
  const rest = words.slice(1);

  const command = (category: CommandCategory, verb: CommandVerb, target: string | null): ParsedCommand => ({
    raw,
    category,
    verb,
    target,
  });

  if (!head) return command('narrative', 'freeform', null);

  if (rest.length === 0 && isDirection(head)) {
    return command('movement', 'go', head);
  }

  const entry = VERBS[head];
  if (!entry) return command('narrative', 'freeform', null);
  const [category, verb] = entry;
  const target = stripFillers(rest);

  if (head === 'run' && inCombat && (target === null || target.toLowerCase() === 'away')) {
    return command('combat', 'flee', null);
  }
  if (head === 'enter' && target === null) {
    return command('movement', 'go', 'in');
  }
  if (verb === 'look' && target !== null) {
    const aroundOnly = target.split(' ').every((word) => SURROUNDINGS.has(word.toLowerCase()));
    return aroundOnly ? command('interaction', 'look', null) : command('interaction', 'examine', target);
  }
  if (verb === 'use' && inCombat) {
    return command('combat', 'use', target);
  }
  // "pick" alone is not a command
  if (head === 'pick' && rest[0]?.toLowerCase() !== 'up') {
    return command('narrative', 'freeform', null);
  }

  return command(category, verb, target);
}
