import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  closeDatabase,
  completeOnboarding,
  createUser,
  getThread,
  getUserById,
  initDatabase,
  upsertAssistant,
} from '../db.js';
import { FakeAssistantsApi } from '../testing/fake-assistants.js';
import type { User } from '../types.js';
import { SqliteBindingStore } from './binding-store.js';
import { InsightService, localInsight } from './insight.js';
import { WorkerPool } from './worker-pool.js';

let api: FakeAssistantsApi;
let insights: InsightService;
let user: User;

beforeEach(() => {
  initDatabase(':memory:');
  const { id } = createUser('ana', 'salt:hash');
  completeOnboarding(id, { spending_profile: 'Impulsive' }, 300, 8);
  const loaded = getUserById(id);
  if (!loaded) throw new Error('user missing');
  user = loaded;

  api = new FakeAssistantsApi();
  insights = new InsightService(
    api,
    new SqliteBindingStore(),
    new WorkerPool({ concurrency: 1, timeoutMs: 5_000 }),
  );
});

afterEach(() => closeDatabase());

describe('InsightService.forUser', () => {
  it('uses the local sentence while no guardian assistant exists', async () => {
    expect(await insights.forUser(user)).toBe(
      'Zenith AI: With stress at 8/10, consider a mindful pause before financial decisions today.',
    );
    expect(api.threads).toHaveLength(0);
  });

  it('asks the guardian on a throwaway thread', async () => {
    upsertAssistant('guardian', 'asst-g');
    api.reply = () => '**Wait a day** before buying.';

    expect(await insights.forUser(user)).toBe('Wait a day before buying.');
    expect(api.threads).toEqual(['asst-g']);
    expect(api.messages[0]?.content).toBe(
      "You are Zenith, an AI wellness guardian. The user has a 'Impulsive' spending profile, " +
        '$300 balance, and stress level 8/10. Provide one short sentence of actionable advice ' +
        'protecting their financial and mental well-being.',
    );
    expect(getThread(user.id, 'guardian')).toBeUndefined();
  });

  it('falls back to the local sentence on failure or an empty reply', async () => {
    upsertAssistant('guardian', 'asst-g');

    api.failThread = true;
    expect(await insights.forUser(user)).toBe(localInsight(8));

    api.failThread = false;
    api.reply = () => '# ';
    expect(await insights.forUser(user)).toBe(localInsight(8));
  });
});
