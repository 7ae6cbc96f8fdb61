// Utilities: Configuration management
// Pure functions, no external dependencies

import { ProviderId, isProviderId } from '@/domain/llm/types.js';
import type { ProviderSettings } from '@/domain/llm/types.js';

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export interface LLMConfig {
  activeProvider: ProviderId;
  temperature: number;
  maxTokens: number;
  timeoutSeconds: number;
  retryBackoffMs: number;
  providers: ProviderSettings;
}

export interface GameDefaults {
  worldPath: string;
  knowledgePath: string;
  retrievalTopK: number;
  maxContextChars: number;
  autosaveTurns: number;
  combatSeed?: number;
}

export interface AppConfig {
  server: ServerConfig;
  llm: LLMConfig;
  game: GameDefaults;
  dbPath: string;
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv,
  };
}

export function buildProviderSettings(env: NodeJS.ProcessEnv = process.env): ProviderSettings {
  return {
    localApi: {
      host: env.LOCAL_LLM_HOST || 'localhost',
      port: parseInt(env.LOCAL_LLM_PORT || '8000', 10),
      apiPath: env.LOCAL_LLM_PATH || '/api/generate',
      model: env.LOCAL_LLM_MODEL,
    },
    localDirect: {
      modelPath: env.LOCAL_MODEL_PATH || '',
      contextSize: parseInt(env.LOCAL_MODEL_CONTEXT_SIZE || '4096', 10),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || '',
      model: env.OPENAI_MODEL || 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || '',
      model: env.ANTHROPIC_MODEL || 'claude-3-haiku-20240307',
    },
    google: {
      apiKey: env.GOOGLE_API_KEY || '',
      model: env.GOOGLE_MODEL || 'gemini-1.5-flash',
    },
  };
}

export function buildLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const requested = parseInt(env.LLM_PROVIDER || String(ProviderId.RuleBased), 10);

  return {
    activeProvider: isProviderId(requested) ? requested : ProviderId.RuleBased,
    temperature: parseFloat(env.LLM_TEMPERATURE || '0.7'),
    maxTokens: parseInt(env.LLM_MAX_TOKENS || '500', 10),
    timeoutSeconds: parseInt(env.LLM_TIMEOUT_SECONDS || '30', 10),
    retryBackoffMs: parseInt(env.LLM_RETRY_BACKOFF_MS || '500', 10),
    providers: buildProviderSettings(env),
  };
}

export function buildGameDefaults(env: NodeJS.ProcessEnv = process.env): GameDefaults {
  const seed = env.COMBAT_SEED ? parseInt(env.COMBAT_SEED, 10) : undefined;

  return {
    worldPath: env.WORLD_PATH || './data/worlds/hollowmere.json',
    knowledgePath: env.KNOWLEDGE_PATH || './data/knowledge/hollowmere.json',
    retrievalTopK: clamp(parseInt(env.RETRIEVAL_TOP_K || '6', 10), 1, 10),
    maxContextChars: parseInt(env.MAX_CONTEXT_CHARS || '2000', 10),
    autosaveTurns: parseInt(env.AUTOSAVE_TURNS || '10', 10),
    combatSeed: seed !== undefined && Number.isFinite(seed) ? seed : undefined,
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    llm: buildLLMConfig(env),
    game: buildGameDefaults(env),
    dbPath: env.DB_PATH || './data/db/loremaze.json',
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (config.llm.temperature < 0 || config.llm.temperature > 2) {
    errors.push('Temperature must be between 0 and 2');
  }

  if (!Number.isFinite(config.llm.timeoutSeconds) || config.llm.timeoutSeconds <= 0) {
    errors.push('LLM_TIMEOUT_SECONDS must be a positive number');
  }

  if (!Number.isFinite(config.llm.maxTokens) || config.llm.maxTokens <= 0) {
    errors.push('LLM_MAX_TOKENS must be a positive number');
  }

  if (!Number.isFinite(config.game.autosaveTurns) || config.game.autosaveTurns < 0) {
    errors.push('AUTOSAVE_TURNS must be zero or a positive number');
  }

  return errors;
}

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, value));
}
