// Infrastructure layer: Provider construction by numeric id

import { existsSync } from 'fs';
import { ProviderId } from '@/domain/llm/types.js';
import type { LLMProvider, ProviderSettings } from '@/domain/llm/types.js';
import { OpenAIProvider } from './OpenAIProvider.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import { GoogleProvider } from './GoogleProvider.js';
import { LocalApiProvider } from './LocalApiProvider.js';
import { LocalDirectProvider } from './LocalDirectProvider.js';
import { RuleBasedProvider } from './RuleBasedProvider.js';

export type ProviderFactory = (id: ProviderId, settings: ProviderSettings) => LLMProvider;

export interface MissingSetting {
  field: string;
  message: string;
}

/**
 * First required setting a provider lacks, or null when it can be built.
 */
export function missingSetting(id: ProviderId, settings: ProviderSettings): MissingSetting | null {
  switch (id) {
    case ProviderId.LocalApi:
      if (!settings.localApi.host) return { field: 'LOCAL_LLM_HOST', message: 'Local server host is not set' };
      if (!Number.isInteger(settings.localApi.port) || settings.localApi.port < 1 || settings.localApi.port > 65535) {
        return { field: 'LOCAL_LLM_PORT', message: 'Local server port is invalid' };
      }
      return null;
    case ProviderId.LocalDirect:
      if (!settings.localDirect.modelPath) return { field: 'LOCAL_MODEL_PATH', message: 'Model path is not set' };
      if (!existsSync(settings.localDirect.modelPath)) {
        return { field: 'LOCAL_MODEL_PATH', message: `Model file not found: ${settings.localDirect.modelPath}` };
      }
      return null;
    case ProviderId.OpenAI:
      return settings.openai.apiKey ? null : { field: 'OPENAI_API_KEY', message: 'OpenAI API key is not set' };
    case ProviderId.Anthropic:
      return settings.anthropic.apiKey
        ? null
        : { field: 'ANTHROPIC_API_KEY', message: 'Anthropic API key is not set' };
    case ProviderId.Google:
      return settings.google.apiKey ? null : { field: 'GOOGLE_API_KEY', message: 'Google API key is not set' };
    case ProviderId.RuleBased:
      return null;
  }
}

export function modelName(id: ProviderId, settings: ProviderSettings): string {
  switch (id) {
    case ProviderId.LocalApi:
      return settings.localApi.model ?? 'local';
    case ProviderId.LocalDirect:
      return settings.localDirect.modelPath || 'gguf';
    case ProviderId.OpenAI:
      return settings.openai.model;
    case ProviderId.Anthropic:
      return settings.anthropic.model;
    case ProviderId.Google:
      return settings.google.model;
    case ProviderId.RuleBased:
      return 'templates';
  }
}

export const createProvider: ProviderFactory = (id, settings) => {
  switch (id) {
    case ProviderId.LocalApi:
      return new LocalApiProvider(settings.localApi);
    case ProviderId.LocalDirect:
      return new LocalDirectProvider(settings.localDirect);
    case ProviderId.OpenAI:
      return new OpenAIProvider(settings.openai);
    case ProviderId.Anthropic:
      return new AnthropicProvider(settings.anthropic);
    case ProviderId.Google:
      return new GoogleProvider(settings.google);
    case ProviderId.RuleBased:
      return new RuleBasedProvider();
  }
};
