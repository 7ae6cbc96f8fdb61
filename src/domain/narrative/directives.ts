// Domain layer: Narrative directives
// NO external dependencies - pure TypeScript

/**
 * Structured state change the model may append to its narrative,
 * written as `[[kind: arg | arg]]` lines.
 */
export type Directive =
  | { kind: 'move'; target: string }
  | { kind: 'take'; item: string }
  | { kind: 'drop'; item: string }
  | { kind: 'give'; item: string }
  | { kind: 'disposition'; npc: string; delta: number }
  | { kind: 'faction'; faction: string; delta: number }
  | { kind: 'flag'; npc: string; flag: string; value: boolean }
  | { kind: 'event'; description: string };

export type DirectiveKind = Directive['kind'];

export const DIRECTIVE_KINDS: readonly DirectiveKind[] = [
  'move',
  'take',
  'drop',
  'give',
  'disposition',
  'faction',
  'flag',
  'event',
];

export const DELTA_LIMIT = 100;

export interface MalformedDirective {
  raw: string;
  reason: string;
}

export interface ParsedNarrative {
  /** narrative with directive lines removed */
  narrative: string;
  directives: Directive[];
  malformed: MalformedDirective[];
}

export function formatDirective(directive: Directive): string {
  switch (directive.kind) {
    case 'move':
      return `[[move: ${directive.target}]]`;
    case 'take':
    case 'drop':
    case 'give':
      return `[[${directive.kind}: ${directive.item}]]`;
    case 'disposition':
      return `[[disposition: ${directive.npc} | ${signed(directive.delta)}]]`;
    case 'faction':
      return `[[faction: ${directive.faction} | ${signed(directive.delta)}]]`;
    case 'flag':
      return `[[flag: ${directive.npc} | ${directive.flag} | ${directive.value}]]`;
    case 'event':
      return `[[event: ${directive.description}]]`;
  }
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}
