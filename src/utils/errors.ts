// Utilities: Custom error types

export class GameEngineError extends Error {
  statusCode = 400;
  code = 'GAME_ENGINE_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

// ========== State refusals ==========

export class InvalidTransitionError extends GameEngineError {
  statusCode = 409;
  code = 'INVALID_TRANSITION';
}

export class ItemNotFoundError extends GameEngineError {
  statusCode = 404;
  code = 'ITEM_NOT_FOUND';

  constructor(
    message: string,
    public readonly itemId: string,
    details?: Record<string, unknown>
  ) {
    super(message, { itemId, ...details });
  }
}

// ========== Generation ==========

export type GenerationErrorCode =
  | 'AUTH_ERROR'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'UNAVAILABLE'
  | 'MALFORMED_OUTPUT';

export abstract class GenerationError extends Error {
  statusCode = 502;
  abstract readonly code: GenerationErrorCode;
  /** Whether the engine may retry the same provider once. */
  abstract readonly retryable: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly provider: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.details = { provider, ...details };
  }
}

export class AuthError extends GenerationError {
  readonly code = 'AUTH_ERROR';
  readonly retryable = false;
}

export class RateLimitedError extends GenerationError {
  readonly code = 'RATE_LIMITED';
  readonly retryable = true;
}

export class TimeoutError extends GenerationError {
  readonly code = 'TIMEOUT';
  readonly retryable = true;
}

export class UnavailableError extends GenerationError {
  readonly code = 'UNAVAILABLE';
  readonly retryable = true;
}

export class MalformedOutputError extends GenerationError {
  readonly code = 'MALFORMED_OUTPUT';
  readonly retryable = false;
}

// ========== Persistence ==========

export class SaveNotFoundError extends Error {
  statusCode = 404;
  code = 'SAVE_NOT_FOUND';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SaveNotFoundError';
    this.details = details;
  }
}

export class SaveCorruptedError extends Error {
  statusCode = 422;
  code = 'SAVE_CORRUPTED';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SaveCorruptedError';
    this.details = details;
  }
}

// ========== Configuration & loading ==========

export class ConfigError extends Error {
  statusCode = 400;
  code = 'CONFIG_ERROR';
  details?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly field: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
    this.details = { field, ...details };
  }
}

export class WorldLoadError extends Error {
  statusCode = 500;
  code = 'WORLD_LOAD_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'WorldLoadError';
    this.details = details;
  }
}

export class SessionNotFoundError extends Error {
  statusCode = 404;
  code = 'SESSION_NOT_FOUND';
  details?: Record<string, unknown>;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
    this.details = { sessionId };
  }
}

export class SessionExistsError extends Error {
  statusCode = 409;
  code = 'SESSION_EXISTS';
  details?: Record<string, unknown>;

  constructor(sessionId: string) {
    super(`Session already open: ${sessionId}`);
    this.name = 'SessionExistsError';
    this.details = { sessionId };
  }
}

export function isStateRefusal(error: unknown): error is InvalidTransitionError | ItemNotFoundError {
  return error instanceof InvalidTransitionError || error instanceof ItemNotFoundError;
}
