import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  closeDatabase,
  completeOnboarding,
  createUser,
  getTransactions,
  getUserById,
  initDatabase,
} from '../db.js';
import { RemoteUnavailableError } from '../errors.js';
import { REASON_STRESS } from '../rule-engine.js';
import { FakeAssistantsApi } from '../testing/fake-assistants.js';
import type { User } from '../types.js';
import { SqliteBindingStore } from './binding-store.js';
import { defaultPersonas } from './personas.js';
import { reviewPurchase } from './purchase-review.js';
import { FALLBACK_UNAVAILABLE } from './result.js';
import { SessionCache } from './session-cache.js';
import { WorkerPool } from './worker-pool.js';

let api: FakeAssistantsApi;
let sessions: SessionCache;
let user: User;

beforeEach(() => {
  initDatabase(':memory:');
  const { id } = createUser('ana', 'salt:hash');
  completeOnboarding(id, {}, 100, 9);
  const loaded = getUserById(id);
  if (!loaded) throw new Error('user missing');
  user = loaded;

  api = new FakeAssistantsApi();
  api.reply = () => 'Sleep on it first.';
  sessions = new SessionCache({
    api,
    store: new SqliteBindingStore(),
    personas: defaultPersonas(),
    pool: new WorkerPool({ concurrency: 1, timeoutMs: 5_000 }),
  });
});

afterEach(() => closeDatabase());

describe('reviewPurchase', () => {
  it('returns the rule verdict with the guardian advice and spends nothing', async () => {
    const review = await reviewPurchase(sessions, user, '  Sneakers ', 80);

    expect(review).toEqual({
      status: 'BLOCKED',
      reason: REASON_STRESS,
      advice: 'Sleep on it first.',
    });
    expect(api.messages.map((m) => m.content)).toEqual([
      'I am thinking about buying "Sneakers" for $80. My balance is $100 and my stress level is 9/10. ' +
        "The app's spending rules say: BLOCKED (High stress impulse buy detected.). " +
        'In two or three sentences, tell me whether this is a wise purchase right now and why.',
    ]);
    expect(getUserById(user.id)?.balance).toBe(100);
    expect(getTransactions(user.id, 10)).toHaveLength(0);
  });

  it('throws when no guardian session can be opened', async () => {
    api.failAssistant = true;

    await expect(reviewPurchase(sessions, user, 'Lunch', 10)).rejects.toBeInstanceOf(
      RemoteUnavailableError,
    );
  });

  it('uses fallback advice when the message itself fails', async () => {
    api.failMessage = () => true;

    expect(await reviewPurchase(sessions, user, 'Lunch', 10)).toEqual({
      status: 'ALLOWED',
      reason: 'Purchase approved.',
      advice: FALLBACK_UNAVAILABLE,
    });
  });
});
