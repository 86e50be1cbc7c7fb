import { logger } from '../logger.js';
import type { User } from '../types.js';
import type { BindingStore } from './binding-store.js';
import type { AssistantsApi } from './client.js';
import type { RemoteResult } from './result.js';
import { stripMarkdown } from './sanitize.js';
import type { WorkerPool } from './worker-pool.js';

export function localInsight(stressLevel: number): string {
  return `Zenith AI: With stress at ${stressLevel}/10, consider a mindful pause before financial decisions today.`;
}

export function insightPrompt(user: User): string {
  const profile = user.survey.spending_profile || 'unknown';
  return (
    `You are Zenith, an AI wellness guardian. ` +
    `The user has a '${profile}' spending profile, $${user.balance} balance, ` +
    `and stress level ${user.stress_level}/10. ` +
    `Provide one short sentence of actionable advice protecting their financial and mental well-being.`
  );
}

/**
 * One-line dashboard advice. Uses a throwaway thread on the guardian
 * assistant when one already exists, and a local sentence otherwise.
 */
export class InsightService {
  constructor(
    private readonly api: AssistantsApi,
    private readonly store: BindingStore,
    private readonly pool: WorkerPool,
  ) {}

  async forUser(user: User): Promise<string> {
    const local = localInsight(user.stress_level);
    const assistantId = this.store.getAssistant('guardian');
    if (!assistantId) return local;

    const result = await this.pool.run<string>(async (): Promise<RemoteResult<string>> => {
      const thread = await this.api.createThread(assistantId);
      if (!thread.ok) return thread;
      return this.api.sendMessage(thread.value, insightPrompt(user));
    });

    if (!result.ok) {
      logger.debug({ userId: user.id, error: result.error }, 'Insight fell back to local text');
      return local;
    }
    return stripMarkdown(result.value) || local;
  }
}
