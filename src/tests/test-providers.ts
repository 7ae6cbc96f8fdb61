import { describe, expect, it, vi } from 'vitest';
import { LocalApiProvider } from '@/infrastructure/llm/LocalApiProvider.js';
import type { FetchLike } from '@/infrastructure/llm/LocalApiProvider.js';
import { RuleBasedProvider, extractFacts } from '@/infrastructure/llm/RuleBasedProvider.js';
import { normalizeProviderError } from '@/infrastructure/llm/normalizeProviderError.js';
import { LocalDirectProvider } from '@/infrastructure/llm/LocalDirectProvider.js';
import { RuntimeUnavailableError, createLlamaRuntimeLoader } from '@/infrastructure/llm/llamaRuntime.js';
import type { LocalModelRuntime, LocalRuntimeLoader } from '@/infrastructure/llm/llamaRuntime.js';
import { contentToText, toChatMessages } from '@/infrastructure/llm/messageContent.js';
import {
  AuthError,
  ConfigError,
  MalformedOutputError,
  RateLimitedError,
  TimeoutError,
  UnavailableError,
} from '@/utils/errors.js';

const OPTIONS = { temperature: 0.5, maxTokens: 120, timeoutMs: 1000 };
const SETTINGS = { host: 'localhost', port: 8000, apiPath: 'api/generate' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('LocalApiProvider', () => {
  it('posts the prompt and returns the trimmed response', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ response: '  The door creaks.  ' }));
    const provider = new LocalApiProvider({ ...SETTINGS, model: 'tiny' }, fetchImpl);

    const text = await provider.generate('open the door', { ...OPTIONS, systemPrompt: 'You narrate.' });

    expect(text).toBe('The door creaks.');
    expect(provider.url).toBe('http://localhost:8000/api/generate');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://localhost:8000/api/generate');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      prompt: 'You narrate.\n\nopen the door',
      max_tokens: 120,
      temperature: 0.5,
      model: 'tiny',
    });
  });

  it('maps HTTP failures onto generation errors', async () => {
    const provider = new LocalApiProvider(SETTINGS, vi.fn<FetchLike>().mockResolvedValue(jsonResponse({}, 503)));
    await expect(provider.generate('wait', OPTIONS)).rejects.toBeInstanceOf(UnavailableError);
  });

  it('treats a refused connection as unavailable', async () => {
    const refused = new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });
    const provider = new LocalApiProvider(SETTINGS, vi.fn<FetchLike>().mockRejectedValue(refused));

    await expect(provider.generate('wait', OPTIONS)).rejects.toMatchObject({
      code: 'UNAVAILABLE',
      details: { provider: 'Local LLM API', code: 'ECONNREFUSED' },
    });
  });

  it('rejects bodies without a response field', async () => {
    const provider = new LocalApiProvider(SETTINGS, vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ text: 'hi' })));
    await expect(provider.generate('wait', OPTIONS)).rejects.toThrow(
      new MalformedOutputError('Local server response has no "response" field', 'Local LLM API')
    );
  });

  it('refuses an invalid port', () => {
    expect(() => new LocalApiProvider({ ...SETTINGS, port: 0 })).toThrow(ConfigError);
  });
});

describe('LocalDirectProvider', () => {
  const settings = { modelPath: 'models/test.gguf', contextSize: 2048 };

  it('loads the model once and reuses it', async () => {
    const runtime: LocalModelRuntime = { generate: vi.fn().mockResolvedValue(' Embers glow. ') };
    const loader = vi.fn<LocalRuntimeLoader>().mockResolvedValue(runtime);
    const provider = new LocalDirectProvider(settings, loader);

    expect(await provider.generate('rest', OPTIONS)).toBe('Embers glow.');
    expect(await provider.generate('rest', OPTIONS)).toBe('Embers glow.');
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('reports a missing runtime as unavailable and retries the load later', async () => {
    const loader = vi.fn<LocalRuntimeLoader>().mockRejectedValue(new RuntimeUnavailableError('node-llama-cpp is not installed'));
    const provider = new LocalDirectProvider(settings, loader);

    await expect(provider.generate('rest', OPTIONS)).rejects.toThrow(
      new UnavailableError('node-llama-cpp is not installed', 'Local Direct Model')
    );
    await expect(provider.generate('rest', OPTIONS)).rejects.toBeInstanceOf(UnavailableError);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('only accepts a prebuilt llama.cpp binary', async () => {
    const getLlama = vi.fn().mockRejectedValue(new Error('no binary'));
    const load = createLlamaRuntimeLoader(async () => ({ getLlama, LlamaChatSession: class {} }));

    await expect(load(settings)).rejects.toThrow(
      new RuntimeUnavailableError('No prebuilt llama.cpp binary for this platform: no binary')
    );
    expect(getLlama).toHaveBeenCalledWith({ build: 'never' });
    await expect(new LocalDirectProvider(settings, load).generate('rest', OPTIONS)).rejects.toBeInstanceOf(
      UnavailableError
    );
  });

  it('reports a missing node-llama-cpp package', async () => {
    const load = createLlamaRuntimeLoader(async () => {
      throw new Error('Cannot find package');
    });
    await expect(load(settings)).rejects.toThrow(new RuntimeUnavailableError('node-llama-cpp is not installed'));
  });

  it('needs a model path', () => {
    expect(() => new LocalDirectProvider({ modelPath: '', contextSize: 2048 })).toThrow(ConfigError);
  });
});

describe('chat message helpers', () => {
  it('puts the system prompt first', () => {
    expect(toChatMessages('look', 'You narrate.').map((m) => m.content)).toEqual(['You narrate.', 'look']);
    expect(toChatMessages('look')).toHaveLength(1);
  });

  it('flattens multi-part content', () => {
    expect(contentToText([{ type: 'text', text: 'Rain ' }, { type: 'text', text: 'falls. ' }])).toBe('Rain falls.');
    expect(contentToText('  plain  ')).toBe('plain');
  });
});

describe('normalizeProviderError', () => {
  it.each([
    [Object.assign(new Error('denied'), { status: 401 }), AuthError],
    [Object.assign(new Error('slow down'), { status: 429 }), RateLimitedError],
    [Object.assign(new Error('bad gateway'), { response: { status: 502 } }), UnavailableError],
    [Object.assign(new Error('bad request'), { status: 400 }), MalformedOutputError],
    [Object.assign(new Error('aborted'), { name: 'AbortError' }), TimeoutError],
    [new Error('Invalid API key provided'), AuthError],
    [new Error('You exceeded your current quota'), RateLimitedError],
    [new Error('something odd'), UnavailableError],
  ])('classifies %s', (error, expected) => {
    expect(normalizeProviderError(error, 'Test')).toBeInstanceOf(expected);
  });

  it('passes generation errors through unchanged', () => {
    const original = new TimeoutError('late', 'Test');
    expect(normalizeProviderError(original, 'Other')).toBe(original);
  });
});

describe('RuleBasedProvider', () => {
  const provider = new RuleBasedProvider();
  const state = [
    '# Current Game State',
    'You are in the Mill.',
    'Exits: north, east (blocked)',
    'Items here: rope, sack',
    'Characters present: Miller Jo (friendly)',
    'Inventory: nothing',
  ].join('\n');

  const ask = (command: string): Promise<string> => provider.generate(`${state}\n\n# Player Command\n${command}`, OPTIONS);

  it('reads facts back out of the prompt', () => {
    expect(extractFacts(state)).toEqual({
      location: 'the Mill',
      exits: ['north', 'east'],
      items: ['rope', 'sack'],
      npcs: ['Miller Jo'],
      inventory: [],
    });
  });

  it('answers common commands from templates', async () => {
    expect(await ask('look')).toBe(
      'You take a moment to study your surroundings in the Mill. You see Miller Jo. ' +
        'Within reach: rope and sack. Paths lead north and east.'
    );
    expect(await ask('talk to jo')).toBe(
      'You approach Miller Jo and begin a conversation. They respond cautiously but seem willing to talk.'
    );
    expect(await ask('talk to the king')).toBe("There doesn't seem to be anyone named the king here.");
    expect(await ask('take rope')).toBe('You pick up the rope.');
    expect(await ask('inventory')).toBe("You aren't carrying anything.");
  });

  it('is deterministic for free-form actions', async () => {
    const first = await ask('whistle');
    expect(first.startsWith('You whistle in the Mill. ')).toBe(true);
    expect(await ask('whistle')).toBe(first);
  });

  it('describes combat rounds without directives', async () => {
    const text = await provider.generate('# Combat Round\nYou hit the rat for 3 damage.', OPTIONS);
    expect([
      'Steel rings out as the fight wears on.',
      'Both of you circle, looking for an opening.',
      'Dust kicks up around your feet as the struggle continues.',
      'Breath ragged, you hold your ground.',
    ]).toContain(text);
  });
});
