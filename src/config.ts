import path from 'path';

const PROJECT_ROOT = process.cwd();

/** Parse a positive integer setting, keeping the default for anything else. */
export function positiveInt(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

export const STORE_DIR = path.resolve(
  PROJECT_ROOT,
  process.env.STORE_DIR || 'store',
);
export const DB_PATH = path.join(STORE_DIR, 'zenith.db');

// Web server port for the JSON API
export const WEB_PORT = parseInt(process.env.WEB_PORT || '5000', 10);
export const CORS_ORIGIN = process.env.CORS_ORIGIN || '*';

// Remote assistants API
export const AI_BASE_URL =
  process.env.AI_BASE_URL || 'https://app.backboard.io/api';
export const AI_API_KEY = process.env.AI_API_KEY || '';
export const AI_MODEL = process.env.AI_MODEL || 'gpt-4o-mini';
export const AI_TIMEOUT_MS = positiveInt(process.env.AI_TIMEOUT_MS, 60000);
export const AI_CONCURRENCY = positiveInt(process.env.AI_CONCURRENCY, 4);
// Each HTTP request is aborted after this long, never later than the pool timeout
export const AI_REQUEST_TIMEOUT_MS = Math.min(
  positiveInt(process.env.AI_REQUEST_TIMEOUT_MS, 30000),
  AI_TIMEOUT_MS,
);

// 'user' clears only the caller's threads, 'global' drops every binding
export const AI_RESET_SCOPE: 'user' | 'global' =
  process.env.AI_RESET_SCOPE === 'global' ? 'global' : 'user';

export const REDACT_PII = process.env.REDACT_PII !== 'false';

export const PERSONAS_PATH = path.resolve(
  PROJECT_ROOT,
  process.env.PERSONAS_PATH || path.join('config', 'personas.yaml'),
);

export const HISTORY_DEFAULT_LIMIT = 50;
export const HISTORY_MAX_LIMIT = 500;
