// Application layer: Player command and task provider

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';
import { buildSection } from '@/utils/prompts.js';

const TASK =
  "Narrate what happens when the player does this, in two to four sentences of second person. " +
  'Then list any directives for the state changes that occurred.';

export class PlayerCommandProvider implements ContextProvider {
  name = 'player-command';
  priority = 300;

  provide(context: PromptContext): ContextBlock[] {
    return [
      {
        name: this.name,
        // single line so the command survives the template provider's parsing
        content: buildSection('Player Command', context.command.raw.replace(/\s+/g, ' ')),
        priority: this.priority,
      },
      { name: 'task', content: buildSection('Task', TASK), priority: this.priority + 10 },
    ];
  }
}
