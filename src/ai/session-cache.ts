/**
 * Session cache for the assistants API.
 *
 * Keeps one remote assistant per topic and one remote thread per
 * (user, topic). Both are created lazily on first use and reused until a
 * reset. A new thread is primed once with the user's survey context before
 * their first message goes through.
 *
 * Nothing here throws at the caller: every remote failure becomes a
 * RemoteResult, and chat() turns failures into fallback text.
 */

import { logger } from '../logger.js';
import type { SurveyProfile, ThreadBinding, Topic } from '../types.js';
import type { BindingStore, ResetScope, ResetSummary } from './binding-store.js';
import type { AssistantsApi } from './client.js';
import { primingMessage } from './context.js';
import type { Personas } from './personas.js';
import { fail, fallbackText, ok, type RemoteResult } from './result.js';
import { stripMarkdown } from './sanitize.js';
import type { WorkerPool } from './worker-pool.js';

export interface SessionCacheDeps {
  api: AssistantsApi;
  store: BindingStore;
  personas: Personas;
  pool: WorkerPool;
}

function hasProfile(profile: SurveyProfile | undefined): profile is SurveyProfile {
  return profile !== undefined && Object.keys(profile).length > 0;
}

/**
 * Share one in-flight creation between concurrent callers asking for the
 * same key, so a burst of first requests makes a single remote object.
 */
function coalesce<K, V>(
  inFlight: Map<K, Promise<V>>,
  key: K,
  create: () => Promise<V>,
): Promise<V> {
  const pending = inFlight.get(key);
  if (pending) return pending;

  const promise = create().finally(() => inFlight.delete(key));
  inFlight.set(key, promise);
  return promise;
}

export class SessionCache {
  private readonly api: AssistantsApi;
  private readonly store: BindingStore;
  private readonly personas: Personas;
  private readonly pool: WorkerPool;

  private readonly assistantsInFlight = new Map<Topic, Promise<RemoteResult<string>>>();
  private readonly threadsInFlight = new Map<string, Promise<RemoteResult<ThreadBinding>>>();
  private readonly primingInFlight = new Map<string, Promise<RemoteResult<void>>>();

  constructor(deps: SessionCacheDeps) {
    this.api = deps.api;
    this.store = deps.store;
    this.personas = deps.personas;
    this.pool = deps.pool;
  }

  /**
   * Send a message on the user's thread for a topic and return the
   * plain-text reply, or a fallback sentence if the service could not answer.
   */
  async chat(
    userId: number,
    topic: Topic,
    message: string,
    profile?: SurveyProfile,
  ): Promise<string> {
    const result = await this.converse(userId, topic, message, profile);
    return result.ok ? result.value : fallbackText(result.error.kind);
  }

  /** Like chat(), but exposes the failure kind to callers that need it. */
  converse(
    userId: number,
    topic: Topic,
    message: string,
    profile?: SurveyProfile,
  ): Promise<RemoteResult<string>> {
    return this.pool.run<string>(async () => {
      const thread = await this.resolveThread(userId, topic);
      if (!thread.ok) {
        logger.warn(
          { userId, topic, error: thread.error },
          'No AI session available',
        );
        return fail('no_session', thread.error.message);
      }

      const { threadId } = thread.value;

      if (!thread.value.initialized && hasProfile(profile)) {
        const primed = await this.prime(userId, topic, threadId, profile);
        if (!primed.ok) return primed;
      }

      const reply = await this.api.sendMessage(threadId, message);
      if (!reply.ok) {
        logger.warn({ userId, topic, error: reply.error }, 'AI message failed');
        return reply;
      }

      const text = stripMarkdown(reply.value);
      return text ? ok(text) : fail('empty_reply', 'Reply was empty after cleanup');
    });
  }

  /**
   * Drop cached bindings so the next chat creates fresh remote objects.
   */
  reset(scope: ResetScope): ResetSummary {
    const summary = this.store.reset(scope);
    logger.info({ scope, ...summary }, 'AI session cache reset');
    return summary;
  }

  private resolveAssistant(topic: Topic): Promise<RemoteResult<string>> {
    const existing = this.store.getAssistant(topic);
    if (existing) return Promise.resolve(ok(existing));

    return coalesce(this.assistantsInFlight, topic, async (): Promise<RemoteResult<string>> => {
      const created = await this.api.createAssistant(this.personas[topic]);
      if (!created.ok) return created;

      this.store.saveAssistant(topic, created.value);
      logger.info({ topic, assistantId: created.value }, 'Assistant created');
      return created;
    });
  }

  private resolveThread(
    userId: number,
    topic: Topic,
  ): Promise<RemoteResult<ThreadBinding>> {
    const existing = this.store.getThread(userId, topic);
    if (existing) return Promise.resolve(ok(existing));

    return coalesce(
      this.threadsInFlight,
      `${userId}:${topic}`,
      async (): Promise<RemoteResult<ThreadBinding>> => {
        const assistant = await this.resolveAssistant(topic);
        if (!assistant.ok) return assistant;

        const created = await this.api.createThread(assistant.value);
        if (!created.ok) return created;

        this.store.saveThread(userId, topic, created.value);
        logger.info({ userId, topic, threadId: created.value }, 'Thread created');
        return ok<ThreadBinding>({ threadId: created.value, initialized: false });
      },
    );
  }

  private prime(
    userId: number,
    topic: Topic,
    threadId: string,
    profile: SurveyProfile,
  ): Promise<RemoteResult<void>> {
    const key = `${userId}:${topic}:${threadId}`;
    return coalesce(this.primingInFlight, key, async (): Promise<RemoteResult<void>> => {
      // Another request may have finished priming while this one waited.
      if (this.store.getThread(userId, topic)?.initialized) return ok(undefined);

      const sent = await this.api.sendMessage(threadId, primingMessage(topic, profile));
      if (!sent.ok) {
        logger.warn({ userId, topic, error: sent.error }, 'Thread priming failed');
        return sent;
      }

      this.store.markInitialized(userId, topic, threadId);
      logger.debug({ userId, topic, threadId }, 'Thread primed with profile');
      return ok(undefined);
    });
  }
}
