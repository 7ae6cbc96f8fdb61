// Infrastructure layer: Google Gemini implementation via LangChain

import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, GoogleSettings, LLMProvider } from '@/domain/llm/types.js';
import { ConfigError, MalformedOutputError } from '@/utils/errors.js';
import { normalizeProviderError } from './normalizeProviderError.js';
import { contentToText, toChatMessages } from './messageContent.js';

export class GoogleProvider implements LLMProvider {
  readonly id = ProviderId.Google;
  readonly name = 'Google Gemini';

  constructor(private settings: GoogleSettings) {
    if (!settings.apiKey) {
      throw new ConfigError('Missing API key. Set GOOGLE_API_KEY', 'GOOGLE_API_KEY');
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const model = new ChatGoogleGenerativeAI({
      model: options.model ?? this.settings.model,
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      apiKey: this.settings.apiKey,
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
