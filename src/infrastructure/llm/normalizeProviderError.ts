// Infrastructure layer: Provider error normalization
// Maps SDK, HTTP and network failures onto the GenerationError taxonomy

import {
  AuthError,
  GenerationError,
  MalformedOutputError,
  RateLimitedError,
  TimeoutError,
  UnavailableError,
} from '@/utils/errors.js';

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH']);

function readNumber(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * HTTP status carried by SDK errors (`status`) or wrapped responses
 * (`response.status`).
 */
export function statusOf(error: unknown): number | undefined {
  const direct = readNumber(error, 'status');
  if (direct !== undefined) return direct;
  if (typeof error === 'object' && error !== null && 'response' in error) {
    return readNumber(Reflect.get(error, 'response'), 'status');
  }
  return undefined;
}

export function errorForStatus(status: number, provider: string, message: string): GenerationError {
  const details = { status };
  if (status === 401 || status === 403) return new AuthError(message, provider, details);
  if (status === 429) return new RateLimitedError(message, provider, details);
  if (status === 408 || status === 504) return new TimeoutError(message, provider, details);
  if (status >= 500) return new UnavailableError(message, provider, details);
  return new MalformedOutputError(message, provider, details);
}

export function normalizeProviderError(error: unknown, provider: string): GenerationError {
  if (error instanceof GenerationError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const name = readString(error, 'name') ?? '';
  const code = readString(error, 'code') ?? readString(readCause(error), 'code');

  if (name === 'AbortError' || name === 'TimeoutError' || name === 'APIConnectionTimeoutError') {
    return new TimeoutError(message || 'Request timed out', provider);
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return errorForStatus(status, provider, message);
  }

  if (code !== undefined && NETWORK_CODES.has(code)) {
    return new UnavailableError(message, provider, { code });
  }
  if (code === 'ETIMEDOUT') {
    return new TimeoutError(message, provider, { code });
  }

  const lower = message.toLowerCase();
  if (lower.includes('api key') || lower.includes('unauthorized') || lower.includes('permission denied')) {
    return new AuthError(message, provider);
  }
  if (lower.includes('rate limit') || lower.includes('quota')) {
    return new RateLimitedError(message, provider);
  }
  if (lower.includes('timed out') || lower.includes('timeout')) {
    return new TimeoutError(message, provider);
  }

  // connection failures, missing runtimes and anything unrecognised
  return new UnavailableError(message || 'Provider unavailable', provider);
}

function readCause(error: unknown): unknown {
  if (typeof error !== 'object' || error === null || !('cause' in error)) return undefined;
  return Reflect.get(error, 'cause');
}
