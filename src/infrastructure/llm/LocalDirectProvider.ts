// Infrastructure layer: In-process GGUF model

import { ProviderId } from '@/domain/llm/types.js';
import type { GenerateOptions, LLMProvider, LocalDirectSettings } from '@/domain/llm/types.js';
import { ConfigError, MalformedOutputError, UnavailableError } from '@/utils/errors.js';
import { normalizeProviderError } from './normalizeProviderError.js';
import { loadLlamaRuntime, RuntimeUnavailableError } from './llamaRuntime.js';
import type { LocalModelRuntime, LocalRuntimeLoader } from './llamaRuntime.js';

export class LocalDirectProvider implements LLMProvider {
  readonly id = ProviderId.LocalDirect;
  readonly name = 'Local Direct Model';
  private runtime: Promise<LocalModelRuntime> | null = null;

  constructor(
    private settings: LocalDirectSettings,
    private loadRuntime: LocalRuntimeLoader = loadLlamaRuntime
  ) {
    if (!settings.modelPath) {
      throw new ConfigError('Missing model path. Set LOCAL_MODEL_PATH', 'LOCAL_MODEL_PATH');
    }
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    try {
      const runtime = await this.getRuntime();
      const text = (
        await runtime.generate(prompt, {
          systemPrompt: options.systemPrompt,
          maxTokens: options.maxTokens,
          temperature: options.temperature,
          signal: options.signal,
        })
      ).trim();
      if (!text) {
        throw new MalformedOutputError('Empty completion', this.name);
      }
      return text;
    } catch (error) {
      if (error instanceof RuntimeUnavailableError) {
        throw new UnavailableError(error.message, this.name);
      }
      throw normalizeProviderError(error, this.name);
    }
  }

  private getRuntime(): Promise<LocalModelRuntime> {
    if (!this.runtime) {
      this.runtime = this.loadRuntime(this.settings).catch((error: unknown) => {
        // allow a later call to retry the load
        this.runtime = null;
        throw error;
      });
    }
    return this.runtime;
  }
}
