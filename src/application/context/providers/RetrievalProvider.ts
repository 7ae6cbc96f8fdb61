// Application layer: Retrieved knowledge provider

import type { ContextBlock, ContextProvider, PromptContext } from '@/domain/llm/context.js';
import { buildSection } from '@/utils/prompts.js';
import { truncate } from '@/utils/string.js';

export class RetrievalProvider implements ContextProvider {
  name = 'world-knowledge';
  priority = 200;

  provide(context: PromptContext): ContextBlock | null {
    const { chunks, relatedNodes } = context.retrieval;
    if (chunks.length === 0 && relatedNodes.length === 0) return null;

    const lines: string[] = [];
    if (relatedNodes.length > 0) {
      const related = relatedNodes.map((node) => `${node.label} (${node.relation.replace(/_/g, ' ')})`);
      lines.push(`Related: ${related.join(', ')}`);
    }
    for (const chunk of chunks) {
      lines.push(`- ${chunk.text.replace(/\s+/g, ' ').trim()}`);
    }

    return {
      name: this.name,
      content: buildSection('Game World Context', truncate(lines.join('\n'), context.maxContextChars)),
      priority: this.priority,
      metadata: { chunks: chunks.length, relatedNodes: relatedNodes.length },
    };
  }
}
