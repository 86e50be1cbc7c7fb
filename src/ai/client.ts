/**
 * HTTP client for the hosted assistants API.
 *
 * Three calls: create an assistant, open a thread under it, post a message to
 * a thread. Nothing is retried; every non-2xx answer or transport failure
 * comes back as a failed RemoteResult instead of an exception.
 */

import { logger } from '../logger.js';
import { fail, ok, type RemoteResult } from './result.js';

export interface AssistantSpec {
  name: string;
  systemPrompt: string;
}

/** The surface the session cache needs from the remote service. */
export interface AssistantsApi {
  createAssistant(spec: AssistantSpec): Promise<RemoteResult<string>>;
  createThread(assistantId: string): Promise<RemoteResult<string>>;
  sendMessage(threadId: string, content: string): Promise<RemoteResult<string>>;
}

export interface HttpClientOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  /** Abort each HTTP request after this many milliseconds. */
  requestTimeoutMs: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First non-empty string (or numeric id) among the candidate fields. */
export function pickField(body: unknown, fields: string[]): string | undefined {
  if (!isRecord(body)) return undefined;
  for (const field of fields) {
    const value = body[field];
    if (typeof value === 'string' && value.trim() !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

// AbortSignal.timeout rejects with a TimeoutError; a plain abort gives AbortError.
function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

const ASSISTANT_ID_FIELDS = ['assistant_id', 'id'];
const THREAD_ID_FIELDS = ['thread_id', 'id'];
const REPLY_FIELDS = ['content', 'message', 'response', 'text'];

export class HttpAssistantsClient implements AssistantsApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createAssistant(spec: AssistantSpec): Promise<RemoteResult<string>> {
    const res = await this.post('/assistants', {
      name: spec.name,
      system_prompt: spec.systemPrompt,
      model: this.options.model,
    });
    if (!res.ok) return res;

    const id = pickField(res.value, ASSISTANT_ID_FIELDS);
    return id ? ok(id) : fail('invalid_response', 'Assistant id missing from response');
  }

  async createThread(assistantId: string): Promise<RemoteResult<string>> {
    const res = await this.post(
      `/assistants/${encodeURIComponent(assistantId)}/threads`,
      {},
    );
    if (!res.ok) return res;

    const id = pickField(res.value, THREAD_ID_FIELDS);
    return id ? ok(id) : fail('invalid_response', 'Thread id missing from response');
  }

  async sendMessage(
    threadId: string,
    content: string,
  ): Promise<RemoteResult<string>> {
    const res = await this.post(
      `/threads/${encodeURIComponent(threadId)}/messages`,
      { content, stream: false },
    );
    if (!res.ok) return res;

    const reply = pickField(res.value, REPLY_FIELDS);
    return reply ? ok(reply) : fail('empty_reply', 'Reply text missing from response');
  }

  private async post(
    route: string,
    body: Record<string, unknown>,
  ): Promise<RemoteResult<unknown>> {
    if (!this.options.apiKey) {
      return fail('not_configured', 'AI_API_KEY is not set');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${route}`, {
        method: 'POST',
        headers: {
          'X-API-Key': this.options.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (err) {
      if (isAbort(err)) {
        logger.warn({ route, timeoutMs: this.options.requestTimeoutMs }, 'Assistants API request timed out');
        return fail('timeout', `Request timed out after ${this.options.requestTimeoutMs}ms`);
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ route, err: message }, 'Assistants API unreachable');
      return fail('network', message);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      logger.warn(
        { route, status: response.status, body: text.slice(0, 200) },
        'Assistants API error',
      );
      return fail('http', `HTTP ${response.status}`, response.status);
    }

    try {
      return ok<unknown>(await response.json());
    } catch (err) {
      if (isAbort(err)) {
        return fail('timeout', `Request timed out after ${this.options.requestTimeoutMs}ms`);
      }
      return fail('invalid_response', 'Response body is not JSON');
    }
  }
}
