import fs from 'fs';
import path from 'path';

function logDir(): string {
  return path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));
}

function fileLoggingEnabled(): boolean {
  return process.env.NODE_ENV !== 'test';
}

/** LLM_DEBUG_LOG=1 forces the debug log on, 0 turns it off; otherwise it is on outside production. */
export function isLLMDebugEnabled(): boolean {
  return (
    process.env.LLM_DEBUG_LOG === '1' ||
    (process.env.NODE_ENV !== 'production' && process.env.LLM_DEBUG_LOG !== '0')
  );
}

const MAX_DEBUG_FIELD_CHARS = parseInt(process.env.LLM_DEBUG_MAX_CHARS || '2000000', 10);

let ensuredDir: string | null = null;

function appendLine(fileName: string, line: string): void {
  const dir = logDir();
  if (ensuredDir !== dir) {
    fs.mkdirSync(dir, { recursive: true });
    ensuredDir = dir;
  }
  fs.appendFileSync(path.join(dir, fileName), line + '\n', 'utf8');
}

export interface LLMCallLog {
  timestamp: string;
  provider: string;
  model: string;
  prompt: string;
  response: string;
  responseTimeMs: number;
  attempt: number;
  sessionId?: string;
  error?: string;
  errorCode?: string;
}

export type LLMDebugPhase = 'request' | 'response' | 'error';

export interface LLMDebugLog {
  timestamp: string;
  callId: string;
  phase: LLMDebugPhase;
  provider: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;

  systemPrompt?: string;
  prompt?: string;
  response?: string;

  responseTimeMs?: number;

  error?: string;
  stack?: string;

  truncated?: {
    prompt?: boolean;
    response?: boolean;
  };
}

export function logLLMCall(log: LLMCallLog): void {
  if (!fileLoggingEnabled()) return;
  appendLine('llm-api.log', JSON.stringify(log));
}

function truncateString(value: string): { value: string; truncated: boolean } {
  if (value.length <= MAX_DEBUG_FIELD_CHARS) {
    return { value, truncated: false };
  }
  return {
    value: value.slice(0, MAX_DEBUG_FIELD_CHARS) + `\n... [TRUNCATED ${value.length - MAX_DEBUG_FIELD_CHARS} chars]`,
    truncated: true,
  };
}

export function logLLMDebug(entry: LLMDebugLog): void {
  if (!fileLoggingEnabled() || !isLLMDebugEnabled()) return;

  const out: LLMDebugLog = { ...entry, truncated: { ...(entry.truncated || {}) } };

  if (typeof out.response === 'string') {
    const { value, truncated } = truncateString(out.response);
    out.response = value;
    if (truncated) out.truncated = { ...(out.truncated || {}), response: true };
  }

  if (typeof out.prompt === 'string') {
    const { value, truncated } = truncateString(out.prompt);
    out.prompt = value;
    if (truncated) out.truncated = { ...(out.truncated || {}), prompt: true };
  }

  appendLine('llm-debug.jsonl', JSON.stringify(out));
}
