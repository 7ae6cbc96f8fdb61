// Infrastructure layer: Anthropic implementation via LangChain

import { ChatAnthropic } from '@langchain/anthropic';
import { ProviderId } from '@/domain/llm/types.js';
import type { AnthropicSettings, GenerateOptions, LLMProvider } from '@/domain/llm/types.js';
import { ConfigError, MalformedOutputError } from '@/utils/errors.js';
import { normalizeProviderError } from './normalizeProviderError.js';
import { contentToText, toChatMessages } from './messageContent.js';

export class AnthropicProvider implements LLMProvider {
  readonly id = ProviderId.Anthropic;
  readonly name = 'Anthropic Claude';

  constructor(private settings: AnthropicSettings) {
    if (!settings.apiKey) {
      throw new ConfigError('Missing API key. Set ANTHROPIC_API_KEY', 'ANTHROPIC_API_KEY');
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const model = new ChatAnthropic({
      model: options.model ?? this.settings.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      anthropicApiKey: this.settings.apiKey,
      maxRetries: 0,
    });

    try {
      const response = await model.invoke(toChatMessages(prompt, options.systemPrompt), {
        signal: options.signal,
      });
      const text = contentToText(response.content);
      if (!text) {
        throw new MalformedOutputError('Empty completion', this.name);
      }
      return text;
    } catch (error) {
      throw normalizeProviderError(error, this.name);
    }
  }
}
