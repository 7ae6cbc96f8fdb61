// Infrastructure layer: LangChain message helpers

import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';

export function toChatMessages(prompt: string, systemPrompt?: string): BaseMessage[] {
  const messages: BaseMessage[] = [];
  if (systemPrompt) {
    messages.push(new SystemMessage(systemPrompt));
  }
  messages.push(new HumanMessage(prompt));
  return messages;
}

/**
 * Flatten string or multi-part message content to plain text.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content.trim();
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('')
    .trim();
}
