// Application layer: System prompt provider
// Provides the base narrator framing

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';
import { loadPrompt } from '@/utils/prompts.js';

export class SystemPromptProvider implements ContextProvider {
  name = 'system-prompt';
  priority = 0;

  provide(_context: PromptContext): ContextBlock | null {
    let content: string;
    try {
      content = loadPrompt('system_prompt');
    } catch (error) {
      console.error('[SystemPromptProvider] Failed to load prompt:', error);
      content = this.getFallbackPrompt();
    }
    return { name: this.name, content, priority: this.priority };
  }

  private getFallbackPrompt(): string {
    return `You are the narrator of a text adventure. Your duties are:
1. Describe the outcome of the player's command in second person.
2. Stay consistent with the game state and world context you are given.
3. Never invent exits, items or characters that contradict the game state.
4. Keep each reply to a short paragraph.`;
  }
}
