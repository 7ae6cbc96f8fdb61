// Application layer: Directive instructions provider
// Tells the model how to report state changes

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';

const INSTRUCTIONS = `When the narrative changes the game state, append one directive per line after the narrative:
[[move: <direction or area id>]]
[[take: <item>]]
[[drop: <item>]]
[[give: <item>]]
[[disposition: <character> | <signed integer>]]
[[faction: <faction> | <signed integer>]]
[[flag: <character> | <flag> | true/false]]
[[event: <short description>]]
Deltas are whole numbers between -100 and 100. Only use directives for changes that actually happen.`;

export class DirectiveInstructionsProvider implements ContextProvider {
  name = 'directive-instructions';
  priority = 10;

  provide(_context: PromptContext): ContextBlock {
    return { name: this.name, content: INSTRUCTIONS, priority: this.priority };
  }
}
