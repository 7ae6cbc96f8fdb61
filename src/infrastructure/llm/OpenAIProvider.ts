// Infrastructure layer: OpenAI SDK implementation
// Implements LLMProvider port from domain

import OpenAI from 'openai';
import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider, OpenAISettings } from '@/domain/llm/types.js';
import { ConfigError, MalformedOutputError } from '@/utils/errors.js';
import { normalizeProviderError } from './normalizeProviderError.js';

export class OpenAIProvider implements LLMProvider {
  readonly id = ProviderId.OpenAI;
  readonly name = 'OpenAI';
  private client: OpenAI;
  private settings: OpenAISettings;

  constructor(settings: OpenAISettings, client?: OpenAI) {
    if (!settings.apiKey) {
      throw new ConfigError('Missing API key. Set OPENAI_API_KEY', 'OPENAI_API_KEY');
    }

    this.settings = settings;
    this.client =
      client ??
      new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseUrl,
        maxRetries: 0,
      });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: options.model ?? this.settings.model,
          messages,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        throw new MalformedOutputError('Empty completion', this.name, { model: response.model });
      }
      return content;
    } catch (error) {
      throw normalizeProviderError(error, this.name);
    }
  }
}
