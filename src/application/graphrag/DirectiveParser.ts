// Application layer: Tolerant directive parser
// Each malformed directive is dropped on its own; the narrative is kept.

import { z } from 'zod';
import type { Directive, MalformedDirective, ParsedNarrative } from '@/domain/narrative/directives.js';
import { DELTA_LIMIT } from '@/domain/narrative/directives.js';

const DIRECTIVE_PATTERN = /\[\[([^[\]]*)\]\]/g;

const name = z.string().trim().min(1, 'argument is empty');

const delta = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'delta must be a whole number')
  .transform(Number)
  .pipe(z.number().int().min(-DELTA_LIMIT).max(DELTA_LIMIT));

const flagValue = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((value) => value === 'true');

const singleArg = z.tuple([name]);
const npcDelta = z.tuple([name, delta]);
const flagArgs = z.tuple([name, name, flagValue]);

function describe(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid arguments';
  if (issue.code === z.ZodIssueCode.too_big || issue.code === z.ZodIssueCode.too_small) {
    return issue.path.length > 0 ? `argument ${issue.path.join('.')}: ${issue.message}` : 'wrong number of arguments';
  }
  return issue.path.length > 0 ? `argument ${issue.path.join('.')}: ${issue.message}` : issue.message;
}

type ParseOutcome = { ok: true; directive: Directive } | { ok: false; reason: string };

export function parseDirectiveBody(body: string): ParseOutcome {
  const colon = body.indexOf(':');
  if (colon < 0) return { ok: false, reason: 'missing ":"' };

  const kind = body.slice(0, colon).trim().toLowerCase();
  const rest = body.slice(colon + 1);
  const args = rest.split('|');

  switch (kind) {
    case 'move':
    case 'take':
    case 'drop':
    case 'give':
    case 'event': {
      // event text may itself contain "|"
      const parsed = singleArg.safeParse(kind === 'event' ? [rest] : args);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const [value] = parsed.data;
      if (kind === 'move') return { ok: true, directive: { kind, target: value } };
      if (kind === 'event') return { ok: true, directive: { kind, description: value } };
      return { ok: true, directive: { kind, item: value } };
    }
    case 'disposition': {
      const parsed = npcDelta.safeParse(args);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const [npc, amount] = parsed.data;
      return { ok: true, directive: { kind, npc, delta: amount } };
    }
    case 'faction': {
      const parsed = npcDelta.safeParse(args);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const [faction, amount] = parsed.data;
      return { ok: true, directive: { kind, faction, delta: amount } };
    }
    case 'flag': {
      const parsed = flagArgs.safeParse(args);
      if (!parsed.success) return { ok: false, reason: describe(parsed.error) };
      const [npc, flag, value] = parsed.data;
      return { ok: true, directive: { kind, npc, flag, value } };
    }
    default:
      return { ok: false, reason: `unknown directive "${kind}"` };
  }
}

export function parseNarrative(text: string): ParsedNarrative {
  const directives: Directive[] = [];
  const malformed: MalformedDirective[] = [];

  const stripped = text.replace(DIRECTIVE_PATTERN, (raw: string, body: string) => {
    const outcome = parseDirectiveBody(body);
    if (outcome.ok) {
      directives.push(outcome.directive);
    } else {
      malformed.push({ raw, reason: outcome.reason });
    }
    return '';
  });

  const narrative = stripped
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  return { narrative, directives, malformed };
}
