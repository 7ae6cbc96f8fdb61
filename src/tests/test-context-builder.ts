import { describe, expect, it } from 'vitest';
import { ContextBuilder } from '@/application/context/ContextBuilder.js';
import type { ContextProvider, PromptContext } from '@/domain/llm/context.js';
import { emptyRetrievalContext } from '@/domain/knowledge/types.js';
import { newState } from './helpers.js';

const context: PromptContext = {
  state: newState().toSnapshot(),
  retrieval: emptyRetrievalContext(),
  command: { raw: 'wait', category: 'narrative', verb: 'freeform', target: null },
  maxContextChars: 500,
};

function fixed(name: string, priority: number, content: string): ContextProvider {
  return { name, priority, provide: () => ({ name, content, priority }) };
}

function failing(name: string): ContextProvider {
  return {
    name,
    priority: 300,
    provide: () => {
      throw new Error('boom');
    },
  };
}

describe('ContextBuilder', () => {
  it('splits the system framing from the turn prompt and sizes both', () => {
    const built = new ContextBuilder()
      .add(fixed('turn', 300, 'wait here'))
      .add(fixed('framing', 100, 'You narrate.'))
      .build(context);

    expect(built).toEqual({ systemPrompt: 'You narrate.', prompt: 'wait here', estimatedTokens: 6, skipped: [] });
  });

  it('leaves out a failing provider and reports it', () => {
    const built = new ContextBuilder().add(fixed('turn', 300, 'wait here')).add(failing('lore')).build(context);

    expect(built.prompt).toBe('wait here');
    expect(built.skipped).toEqual([{ provider: 'lore', error: 'boom' }]);
  });

  it('fails the build without the player command', () => {
    const builder = new ContextBuilder().add(failing('player-command'));
    expect(() => builder.build(context)).toThrow('Critical context provider failed: player-command');
  });
});
