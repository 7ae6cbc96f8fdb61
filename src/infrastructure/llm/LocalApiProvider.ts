// Infrastructure layer: Locally hosted inference server over HTTP

import { z } from 'zod';
import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider, LocalApiSettings } from '@/domain/llm/types.js';
import { ConfigError, MalformedOutputError } from '@/utils/errors.js';
import { errorForStatus, normalizeProviderError } from './normalizeProviderError.js';

const generateResponseSchema = z.object({
  response: z.string(),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class LocalApiProvider implements LLMProvider {
  readonly id = ProviderId.LocalApi;
  readonly name = 'Local LLM API';
  readonly url: string;

  constructor(
    private settings: LocalApiSettings,
    private fetchImpl: FetchLike = fetch
  ) {
    if (!settings.host) {
      throw new ConfigError('Missing local server host. Set LOCAL_LLM_HOST', 'LOCAL_LLM_HOST');
    }
    if (!Number.isInteger(settings.port) || settings.port < 1 || settings.port > 65535) {
      throw new ConfigError('Invalid local server port. Set LOCAL_LLM_PORT', 'LOCAL_LLM_PORT');
    }
    const path = settings.apiPath.startsWith('/') ? settings.apiPath : `/${settings.apiPath}`;
    this.url = `http://${settings.host}:${settings.port}${path}`;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const fullPrompt = options.systemPrompt ? `${options.systemPrompt}\n\n${prompt}` : prompt;
    const model = options.model ?? this.settings.model;

    let body: unknown;
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          prompt: fullPrompt,
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          ...(model ? { model } : {}),
        }),
        signal: options.signal,
      });

      if (!response.ok) {
        throw errorForStatus(response.status, this.name, `Local server returned ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw normalizeProviderError(error, this.name);
    }

    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedOutputError('Local server response has no "response" field', this.name);
    }
    const text = parsed.data.response.trim();
    if (!text) {
      throw new MalformedOutputError('Empty completion', this.name);
    }
    return text;
  }
}
