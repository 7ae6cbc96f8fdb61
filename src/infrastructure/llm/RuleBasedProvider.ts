// Infrastructure layer: Deterministic template provider
// Reads the game-state lines of the prompt and answers from templates.
// Never fails and never emits directives.

import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider } from '@/domain/llm/types.js';
import { joinList } from '@/utils/string.js';

export interface PromptFacts {
  location: string;
  exits: string[];
  items: string[];
  npcs: string[];
  inventory: string[];
}

const COMBAT_LINES = [
  'Steel rings out as the fight wears on.',
  'Both of you circle, looking for an opening.',
  'Dust kicks up around your feet as the struggle continues.',
  'Breath ragged, you hold your ground.',
];

const IDLE_LINES = [
  'Nothing particularly interesting happens.',
  'The moment passes quietly.',
  'The world carries on around you.',
];

function readLine(prompt: string, label: string): string | null {
  const match = new RegExp(`^${label}:[ \\t]*(.*)$`, 'm').exec(prompt);
  return match ? match[1].trim() : null;
}

function readList(prompt: string, label: string): string[] {
  const line = readLine(prompt, label);
  if (!line || line.toLowerCase() === 'nothing' || line.toLowerCase() === 'none') return [];
  // "Old Tom (friendly)" -> "Old Tom"
  return line
    .split(', ')
    .map((entry) => entry.replace(/\s*\(.*\)$/, '').trim())
    .filter(Boolean);
}

function readSection(prompt: string, heading: string): string | null {
  const match = new RegExp(`^# ${heading}\\n([^\\n]*)`, 'm').exec(prompt);
  return match ? match[1].trim() : null;
}

/**
 * Stable index for picking a template line.
 */
function pick(lines: readonly string[], seed: string): string {
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (hash * 31 + seed.charCodeAt(i)) >>> 0;
  }
  return lines[hash % lines.length];
}

export function extractFacts(prompt: string): PromptFacts {
  const location = /^You are in ([^.\n]+)\./m.exec(prompt)?.[1]?.trim() ?? 'an unfamiliar place';
  return {
    location,
    exits: readList(prompt, 'Exits'),
    items: readList(prompt, 'Items here'),
    npcs: readList(prompt, 'Characters present'),
    inventory: readList(prompt, 'Inventory'),
  };
}

export function respond(command: string, facts: PromptFacts): string {
  const words = command.trim().toLowerCase().split(/\s+/).filter(Boolean);
  const action = words[0] ?? '';
  const target = words.slice(1).join(' ');
  const lowerNpcs = facts.npcs.map((npc) => npc.toLowerCase());

  switch (action) {
    case 'look':
    case 'l':
    case 'examine':
    case 'inspect': {
      const parts = [`You take a moment to study your surroundings in ${facts.location}.`];
      if (facts.npcs.length > 0) parts.push(`You see ${joinList(facts.npcs)}.`);
      parts.push(
        facts.items.length > 0
          ? `Within reach: ${joinList(facts.items)}.`
          : "You don't see any notable items."
      );
      if (facts.exits.length > 0) parts.push(`Paths lead ${joinList(facts.exits)}.`);
      return parts.join(' ');
    }
    case 'go':
    case 'move':
    case 'walk':
    case 'travel':
      return target ? `You make your way toward ${target}.` : 'Where do you want to go?';
    case 'talk':
    case 'speak':
    case 'ask':
    case 'greet': {
      const subject = target.replace(/^(to|with)\s+/, '');
      if (!subject) return 'Who do you want to talk to?';
      const index = lowerNpcs.findIndex((npc) => npc.includes(subject) || subject.includes(npc));
      if (index >= 0) {
        return `You approach ${facts.npcs[index]} and begin a conversation. They respond cautiously but seem willing to talk.`;
      }
      return `There doesn't seem to be anyone named ${subject} here.`;
    }
    case 'take':
    case 'get':
    case 'pick':
      if (!target) return 'What do you want to take?';
      return facts.items.some((item) => item.toLowerCase() === target)
        ? `You pick up the ${target}.`
        : `You don't see a ${target} here that you can take.`;
    case 'inventory':
    case 'inv':
    case 'i':
      return facts.inventory.length > 0
        ? `You are carrying: ${facts.inventory.join(', ')}.`
        : "You aren't carrying anything.";
    case 'help':
      return 'Try looking around, moving in a direction, talking to someone or taking an item.';
    case '':
      return "I'm not sure what you want to do. Try 'look' to examine your surroundings, or 'help'.";
    default:
      return `You ${command.trim()} in ${facts.location}. ${pick(IDLE_LINES, command)}`;
  }
}

export class RuleBasedProvider implements LLMProvider {
  readonly id = ProviderId.RuleBased;
  readonly name = 'Rule-Based Fallback';

  async generate(prompt: string, _options: GenerateOptions): Promise<string> {
    const combat = readSection(prompt, 'Combat Round');
    if (combat !== null) {
      return pick(COMBAT_LINES, combat);
    }

    const command = readSection(prompt, 'Player Command') ?? '';
    return respond(command, extractFacts(prompt));
  }
}
