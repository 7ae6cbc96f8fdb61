// Application layer: LLM provider selection and dispatch
// One active provider at a time; every call is bounded by a timeout and logged.

import { v4 as uuidv4 } from 'uuid';
import { PROVIDER_NAMES, ProviderId, isProviderId } from '@/domain/llm/types.js';
import type { LLMProvider, LLMResponse, ProviderSettings, ProviderStatus } from '@/domain/llm/types.js';
import { createProvider, missingSetting, modelName } from '@/infrastructure/llm/createProvider.js';
import type { ProviderFactory } from '@/infrastructure/llm/createProvider.js';
import { normalizeProviderError } from '@/infrastructure/llm/normalizeProviderError.js';
import { RuleBasedProvider } from '@/infrastructure/llm/RuleBasedProvider.js';
import { ConfigError, MalformedOutputError, TimeoutError } from '@/utils/errors.js';
import { logLLMCall, logLLMDebug } from '@/utils/logger.js';

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface ProviderManagerOptions {
  settings: ProviderSettings;
  generation: GenerationSettings;
  initialProvider: ProviderId;
  factory?: ProviderFactory;
  sessionId?: string;
}

export interface GenerateRequest {
  prompt: string;
  systemPrompt?: string;
  attempt?: number;
}

export class ProviderManager {
  private active: LLMProvider;
  private readonly fallbackProvider = new RuleBasedProvider();
  private readonly factory: ProviderFactory;
  private readonly settings: ProviderSettings;
  private readonly generation: GenerationSettings;
  private readonly sessionId?: string;

  /**
   * @throws ConfigError when the initial provider is not configured
   */
  constructor(options: ProviderManagerOptions) {
    this.settings = options.settings;
    this.generation = options.generation;
    this.factory = options.factory ?? createProvider;
    this.sessionId = options.sessionId;
    this.active = this.build(options.initialProvider);
  }

  get activeId(): ProviderId {
    return this.active.id;
  }

  get activeName(): string {
    return this.active.name;
  }

  get fallback(): LLMProvider {
    return this.fallbackProvider;
  }

  /**
   * Replace the active provider. On failure the previous one stays active.
   * @throws ConfigError naming the missing or invalid field
   */
  switchProvider(id: number): ProviderStatus {
    const provider = this.build(id);
    const previous = this.active;
    this.active = provider;
    console.log(`[ProviderManager] Switched provider ${previous.name} -> ${provider.name}`);
    return this.status(provider.id);
  }

  listProviders(): ProviderStatus[] {
    return Object.values(ProviderId)
      .filter((value): value is ProviderId => typeof value === 'number')
      .map((id) => this.status(id));
  }

  /**
   * Call the active provider (or the given one) once.
   * @throws GenerationError
   */
  async generate(request: GenerateRequest, provider: LLMProvider = this.active): Promise<LLMResponse> {
    const callId = uuidv4();
    const model = modelName(provider.id, this.settings);
    const attempt = request.attempt ?? 1;
    const startTime = Date.now();

    logLLMDebug({
      timestamp: new Date().toISOString(),
      callId,
      phase: 'request',
      provider: provider.name,
      model,
      temperature: this.generation.temperature,
      maxTokens: this.generation.maxTokens,
      timeoutMs: this.generation.timeoutMs,
      systemPrompt: request.systemPrompt,
      prompt: request.prompt,
    });

    try {
      const text = (await this.withTimeout(provider, request)).trim();
      const responseTimeMs = Date.now() - startTime;
      if (!text) {
        throw new MalformedOutputError('Empty completion', provider.name);
      }

      logLLMDebug({
        timestamp: new Date().toISOString(),
        callId,
        phase: 'response',
        provider: provider.name,
        model,
        response: text,
        responseTimeMs,
      });
      logLLMCall({
        timestamp: new Date().toISOString(),
        provider: provider.name,
        model,
        prompt: request.prompt,
        response: text,
        responseTimeMs,
        attempt,
        sessionId: this.sessionId,
      });

      return { text, providerId: provider.id, latencyMs: responseTimeMs, empty: false };
    } catch (caught) {
      const error = normalizeProviderError(caught, provider.name);
      const responseTimeMs = Date.now() - startTime;

      logLLMDebug({
        timestamp: new Date().toISOString(),
        callId,
        phase: 'error',
        provider: provider.name,
        model,
        responseTimeMs,
        error: error.message,
        stack: error.stack,
      });
      logLLMCall({
        timestamp: new Date().toISOString(),
        provider: provider.name,
        model,
        prompt: request.prompt,
        response: '',
        responseTimeMs,
        attempt,
        sessionId: this.sessionId,
        error: error.message,
        errorCode: error.code,
      });
      console.warn(`[ProviderManager] ${provider.name} failed (${error.code}): ${error.message}`);

      throw error;
    }
  }

  private async withTimeout(provider: LLMProvider, request: GenerateRequest): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(`No response within ${this.generation.timeoutMs}ms`, provider.name));
        controller.abort();
      }, this.generation.timeoutMs);
    });

    try {
      return await Promise.race([
        provider.generate(request.prompt, {
          temperature: this.generation.temperature,
          maxTokens: this.generation.maxTokens,
          timeoutMs: this.generation.timeoutMs,
          systemPrompt: request.systemPrompt,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private build(id: number): LLMProvider {
    if (!isProviderId(id)) {
      throw new ConfigError(`Unknown provider id: ${id}. Choose 1-6`, 'LLM_PROVIDER', { providerId: id });
    }
    const missing = missingSetting(id, this.settings);
    if (missing) {
      throw new ConfigError(`${PROVIDER_NAMES[id]}: ${missing.message}`, missing.field, { providerId: id });
    }
    return this.factory(id, this.settings);
  }

  private status(id: ProviderId): ProviderStatus {
    const missing = missingSetting(id, this.settings);
    return {
      id,
      name: PROVIDER_NAMES[id],
      configured: missing === null,
      active: this.active.id === id,
      ...(missing ? { missingField: missing.field } : {}),
    };
  }
}
