// Application layer: Combat round provider
// Flavor-only prompt for a resolved combat round

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';
import { buildSection } from '@/utils/prompts.js';

const TASK =
  'Describe this round of combat in one or two vivid sentences of second person. ' +
  'Do not change the outcome and do not add directives.';

export class CombatRoundProvider implements ContextProvider {
  name = 'player-command';
  priority = 300;

  provide(context: PromptContext): ContextBlock[] | null {
    if (!context.combatSummary) return null;
    return [
      {
        name: this.name,
        content: buildSection('Combat Round', context.combatSummary.replace(/\s*\n\s*/g, ' ')),
        priority: this.priority,
      },
      { name: 'task', content: buildSection('Task', TASK), priority: this.priority + 10 },
    ];
  }
}
