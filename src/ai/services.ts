import {
  AI_API_KEY,
  AI_BASE_URL,
  AI_CONCURRENCY,
  AI_MODEL,
  AI_REQUEST_TIMEOUT_MS,
  AI_TIMEOUT_MS,
} from '../config.js';
import { SqliteBindingStore, type BindingStore } from './binding-store.js';
import { BriefService } from './brief.js';
import { HttpAssistantsClient, type AssistantsApi } from './client.js';
import { InsightService } from './insight.js';
import type { Personas } from './personas.js';
import { SessionCache } from './session-cache.js';
import { WorkerPool } from './worker-pool.js';

export interface AiServices {
  sessions: SessionCache;
  briefs: BriefService;
  insights: InsightService;
}

export interface AiServiceOptions {
  personas: Personas;
  api?: AssistantsApi;
  store?: BindingStore;
  concurrency?: number;
  timeoutMs?: number;
}

/** Wire the AI components together; anything not given comes from config. */
export function createAiServices(options: AiServiceOptions): AiServices {
  const api =
    options.api ??
    new HttpAssistantsClient({
      baseUrl: AI_BASE_URL,
      apiKey: AI_API_KEY,
      model: AI_MODEL,
      requestTimeoutMs: AI_REQUEST_TIMEOUT_MS,
    });
  const store = options.store ?? new SqliteBindingStore();
  const pool = new WorkerPool({
    concurrency: options.concurrency ?? AI_CONCURRENCY,
    timeoutMs: options.timeoutMs ?? AI_TIMEOUT_MS,
  });

  const sessions = new SessionCache({ api, store, personas: options.personas, pool });
  return {
    sessions,
    briefs: new BriefService(sessions, store),
    insights: new InsightService(api, store, pool),
  };
}
