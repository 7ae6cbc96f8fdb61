// Domain layer: LLM types and interfaces
// NO external dependencies - pure TypeScript

/**
 * Numeric provider ids, in the order players pick them from the menu.
 */
export enum ProviderId {
  LocalApi = 1,
  LocalDirect = 2,
  OpenAI = 3,
  Anthropic = 4,
  Google = 5,
  RuleBased = 6,
}

export const PROVIDER_NAMES: Record<ProviderId, string> = {
  [ProviderId.LocalApi]: 'Local LLM API',
  [ProviderId.LocalDirect]: 'Local Direct Model',
  [ProviderId.OpenAI]: 'OpenAI',
  [ProviderId.Anthropic]: 'Anthropic Claude',
  [ProviderId.Google]: 'Google Gemini',
  [ProviderId.RuleBased]: 'Rule-Based Fallback',
};

export function isProviderId(value: number): value is ProviderId {
  return Number.isInteger(value) && value >= ProviderId.LocalApi && value <= ProviderId.RuleBased;
}

export interface GenerateOptions {
  model?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  systemPrompt?: string;
  signal?: AbortSignal;
}

/**
 * Capability shared by every backend. Rejects with a GenerationError on
 * provider fault; never substitutes another provider.
 */
export interface LLMProvider {
  readonly id: ProviderId;
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface LLMRequest {
  prompt: string;
  providerId: ProviderId;
  options: GenerateOptions;
}

export interface LLMResponse {
  text: string;
  providerId: ProviderId;
  latencyMs: number;
  empty: boolean;
  error?: string;
}

// Per-provider configuration schemas

export interface LocalApiSettings {
  host: string;
  port: number;
  apiPath: string;
  model?: string;
}

export interface LocalDirectSettings {
  modelPath: string;
  contextSize: number;
}

export interface OpenAISettings {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export interface AnthropicSettings {
  apiKey: string;
  model: string;
}

export interface GoogleSettings {
  apiKey: string;
  model: string;
}

export interface ProviderSettings {
  localApi: LocalApiSettings;
  localDirect: LocalDirectSettings;
  openai: OpenAISettings;
  anthropic: AnthropicSettings;
  google: GoogleSettings;
}

export interface ProviderStatus {
  id: ProviderId;
  name: string;
  configured: boolean;
  active: boolean;
  missingField?: string;
}
