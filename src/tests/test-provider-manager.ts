import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider } from '@/domain/llm/types.js';
import { ProviderManager } from '@/application/llm/ProviderManager.js';
import { ConfigError, MalformedOutputError, TimeoutError } from '@/utils/errors.js';
import { buildAppConfig, buildGameDefaults, buildLLMConfig, validateConfig } from '@/utils/config.js';
import { isLLMDebugEnabled } from '@/utils/logger.js';
import { ScriptedProvider, scriptedFactory, testProviders, testSettings } from './helpers.js';

class HangingProvider implements LLMProvider {
  readonly id = ProviderId.OpenAI;
  readonly name = 'Hanging';
  signal?: AbortSignal;

  generate(_prompt: string, options: GenerateOptions): Promise<string> {
    this.signal = options.signal;
    return new Promise<string>(() => undefined);
  }
}

describe('ProviderManager', () => {
  it('starts on the requested provider', () => {
    const providers = testProviders(new ScriptedProvider([]));
    expect(providers.activeId).toBe(ProviderId.OpenAI);
    expect(providers.activeName).toBe('Scripted');
    expect(providers.fallback.id).toBe(ProviderId.RuleBased);
  });

  it('refuses to start on a provider that is not configured', () => {
    expect(
      () =>
        new ProviderManager({
          settings: testSettings(),
          generation: { temperature: 0.7, maxTokens: 200, timeoutMs: 1000 },
          initialProvider: ProviderId.Google,
        })
    ).toThrow(new ConfigError('Google Gemini: Google API key is not set', 'GOOGLE_API_KEY'));
  });

  it('keeps the previous provider when a switch fails', () => {
    const providers = testProviders(new ScriptedProvider([]));

    let caught: unknown;
    try {
      providers.switchProvider(ProviderId.Anthropic);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ field: 'ANTHROPIC_API_KEY' });
    expect(providers.activeId).toBe(ProviderId.OpenAI);
  });

  it('rejects ids outside the menu', () => {
    const providers = testProviders(new ScriptedProvider([]));
    expect(() => providers.switchProvider(9)).toThrow('Unknown provider id: 9. Choose 1-6');
    expect(providers.activeId).toBe(ProviderId.OpenAI);
  });

  it('switches to a configured provider', () => {
    const providers = testProviders(new ScriptedProvider([]));
    expect(providers.switchProvider(ProviderId.RuleBased)).toEqual({
      id: ProviderId.RuleBased,
      name: 'Rule-Based Fallback',
      configured: true,
      active: true,
    });
    expect(providers.activeId).toBe(ProviderId.RuleBased);
  });

  it('lists every provider with its configuration state', () => {
    const providers = testProviders(new ScriptedProvider([]));
    expect(providers.listProviders().map((p) => [p.id, p.configured, p.active, p.missingField])).toEqual([
      [ProviderId.LocalApi, true, false, undefined],
      [ProviderId.LocalDirect, false, false, 'LOCAL_MODEL_PATH'],
      [ProviderId.OpenAI, true, true, undefined],
      [ProviderId.Anthropic, false, false, 'ANTHROPIC_API_KEY'],
      [ProviderId.Google, false, false, 'GOOGLE_API_KEY'],
      [ProviderId.RuleBased, true, false, undefined],
    ]);
  });

  it('trims completions and reports the provider', async () => {
    const providers = testProviders(new ScriptedProvider(['  A crow caws.  \n']));
    const response = await providers.generate({ prompt: 'wait' });
    expect(response).toMatchObject({ text: 'A crow caws.', providerId: ProviderId.OpenAI, empty: false });
  });

  it('treats a blank completion as malformed output', async () => {
    const providers = testProviders(new ScriptedProvider(['   ']));
    await expect(providers.generate({ prompt: 'wait' })).rejects.toBeInstanceOf(MalformedOutputError);
  });

  it('normalises unknown failures', async () => {
    const providers = testProviders(new ScriptedProvider([new Error('429 rate limit exceeded')]));
    await expect(providers.generate({ prompt: 'wait' })).rejects.toMatchObject({
      code: 'RATE_LIMITED',
      retryable: true,
      provider: 'Scripted',
    });
  });

  it('times out a provider that never answers and aborts its request', async () => {
    const hanging = new HangingProvider();
    const providers = new ProviderManager({
      settings: testSettings(),
      generation: { temperature: 0.7, maxTokens: 200, timeoutMs: 20 },
      initialProvider: ProviderId.OpenAI,
      factory: scriptedFactory(hanging),
    });

    const failure = providers.generate({ prompt: 'wait' });
    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('No response within 20ms');
    expect(hanging.signal?.aborted).toBe(true);
  });
});

describe('configuration', () => {
  it('defaults to the template provider', () => {
    expect(buildLLMConfig({}).activeProvider).toBe(ProviderId.RuleBased);
    expect(buildLLMConfig({ LLM_PROVIDER: '12' }).activeProvider).toBe(ProviderId.RuleBased);
    expect(buildLLMConfig({ LLM_PROVIDER: '4' }).activeProvider).toBe(ProviderId.Anthropic);
  });

  it('clamps the retrieval size and reads the combat seed', () => {
    expect(buildGameDefaults({ RETRIEVAL_TOP_K: '50', COMBAT_SEED: '7' })).toMatchObject({
      retrievalTopK: 10,
      combatSeed: 7,
    });
    expect(buildGameDefaults({ RETRIEVAL_TOP_K: 'lots' }).retrievalTopK).toBe(1);
    expect(buildGameDefaults({}).combatSeed).toBeUndefined();
  });

  it('reports invalid settings', () => {
    const config = buildAppConfig({ PORT: '70000', LLM_TEMPERATURE: '3', AUTOSAVE_TURNS: '-1' });
    expect(validateConfig(config)).toEqual([
      'Invalid port number',
      'Temperature must be between 0 and 2',
      'AUTOSAVE_TURNS must be zero or a positive number',
    ]);
    expect(validateConfig(buildAppConfig({}))).toEqual([]);
  });
});

describe('isLLMDebugEnabled', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads LLM_DEBUG_LOG as 1 or 0', () => {
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('LLM_DEBUG_LOG', '1');
    expect(isLLMDebugEnabled()).toBe(true);
    vi.stubEnv('LLM_DEBUG_LOG', 'true');
    expect(isLLMDebugEnabled()).toBe(false);
  });

  it('is on outside production unless turned off', () => {
    vi.stubEnv('NODE_ENV', 'development');
    vi.stubEnv('LLM_DEBUG_LOG', '');
    expect(isLLMDebugEnabled()).toBe(true);
    vi.stubEnv('LLM_DEBUG_LOG', '0');
    expect(isLLMDebugEnabled()).toBe(false);
  });
});
