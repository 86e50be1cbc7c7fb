import type http from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { defaultPersonas } from './ai/personas.js';
import { createAiServices } from './ai/services.js';
import { closeDatabase, initDatabase } from './db.js';
import { FakeAssistantsApi } from './testing/fake-assistants.js';
import { createApp } from './web-server.js';

interface CallOptions {
  token?: string;
  body?: unknown;
  rawBody?: string;
}

interface CallResult {
  status: number;
  headers: Headers;
  body: unknown;
}

const sessionSchema = z.object({ token: z.string() });

let api: FakeAssistantsApi;
let server: http.Server;
let baseUrl: string;

async function call(method: string, route: string, options: CallOptions = {}): Promise<CallResult> {
  const headers: Record<string, string> = {};
  if (options.token) headers.Authorization = `Bearer ${options.token}`;

  let body: string | undefined;
  if (options.rawBody !== undefined) body = options.rawBody;
  else if (options.body !== undefined) body = JSON.stringify(options.body);
  if (body !== undefined) headers['Content-Type'] = 'application/json';

  const res = await fetch(`${baseUrl}${route}`, { method, headers, body });
  const text = await res.text();
  return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : undefined };
}

async function signUp(username = 'ana'): Promise<string> {
  const res = await call('POST', '/api/register', { body: { username, password: 'test-secret' } });
  return sessionSchema.parse(res.body).token;
}

beforeEach(async () => {
  initDatabase(':memory:');
  api = new FakeAssistantsApi();
  const app = createApp({
    ai: createAiServices({ personas: defaultPersonas(), api, concurrency: 2, timeoutMs: 5_000 }),
    resetScope: 'user',
    redactPii: true,
    corsOrigin: '*',
  });

  server = await new Promise<http.Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  closeDatabase();
});

describe('web server', () => {
  it('answers health checks with CORS headers', async () => {
    const res = await call('GET', '/api/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('answers preflight requests without auth', async () => {
    expect((await call('OPTIONS', '/api/purchase')).status).toBe(204);
  });

  it('returns 404 JSON for unknown API routes', async () => {
    expect(await call('GET', '/api/nope')).toMatchObject({ status: 404, body: { error: 'Not found' } });
  });

  describe('accounts', () => {
    it('registers a user and rejects a duplicate username', async () => {
      const created = await call('POST', '/api/register', {
        body: { username: 'ana', password: 'test-secret' },
      });
      const duplicate = await call('POST', '/api/register', {
        body: { username: 'ana', password: 'test-secret' },
      });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ user: { username: 'ana', balance: 0, onboarded: false } });
      expect(duplicate).toMatchObject({ status: 409, body: { error: 'Username already taken' } });
    });

    it('validates credentials', async () => {
      const res = await call('POST', '/api/register', { body: { username: 'ana', password: 'short' } });

      expect(res).toMatchObject({
        status: 400,
        body: { error: 'password: String must contain at least 6 character(s)' },
      });
    });

    it('logs in with the right password only', async () => {
      await signUp();

      const wrong = await call('POST', '/api/login', { body: { username: 'ana', password: 'wrong-secret' } });
      const right = await call('POST', '/api/login', { body: { username: 'ana', password: 'test-secret' } });

      expect(wrong).toMatchObject({ status: 401, body: { error: 'Invalid username or password' } });
      expect(right.status).toBe(200);
      expect(sessionSchema.safeParse(right.body).success).toBe(true);
    });

    it('requires a live token', async () => {
      const token = await signUp();

      expect(await call('GET', '/api/me')).toMatchObject({ status: 401, body: { error: 'Unauthorized' } });
      expect((await call('GET', '/api/me', { token })).status).toBe(200);

      await call('POST', '/api/logout', { token });
      expect((await call('GET', '/api/me', { token })).status).toBe(401);
    });

    it('rejects malformed JSON', async () => {
      const res = await call('POST', '/api/login', { rawBody: '{"username":' });
      expect(res).toMatchObject({ status: 400, body: { error: 'Malformed JSON body' } });
    });
  });

  describe('money', () => {
    it('runs onboarding, purchases, income and history', async () => {
      const token = await signUp();

      const onboarded = await call('POST', '/api/onboarding', {
        token,
        body: { survey: { name: 'Ana' }, balance: 100, stress_level: 2 },
      });
      expect(onboarded.body).toMatchObject({ user: { onboarded: true, balance: 100, survey: { name: 'Ana' } } });

      expect((await call('POST', '/api/purchase', { token, body: { item_name: 'Books', amount: 30 } })).body).toEqual({
        status: 'ALLOWED',
        reason: 'Purchase approved.',
        newBalance: 70,
        transactionId: 1,
      });
      expect(
        (await call('POST', '/api/purchase/execute', { token, body: { item_name: 'Jacket', amount: 500 } })).body,
      ).toEqual({ status: 'BLOCKED', reason: 'Insufficient funds.', transactionId: 2 });

      expect((await call('POST', '/api/income', { token, body: { amount: 30, source: 'Gift' } })).body).toEqual({
        balance: 100,
      });
      expect((await call('GET', '/api/balance', { token })).body).toEqual({ balance: 100 });

      const history = await call('GET', '/api/history?limit=2', { token });
      expect(history.body).toMatchObject({
        transactions: [
          { item_name: 'Gift', status: 'INCOME' },
          { item_name: 'Jacket', status: 'BLOCKED' },
        ],
      });
    });

    it('rejects invalid amounts with 400', async () => {
      const token = await signUp();

      expect(await call('POST', '/api/purchase', { token, body: { item_name: 'Books', amount: -5 } })).toMatchObject({
        status: 400,
        body: { error: 'Amount must be a positive number' },
      });
      expect(await call('POST', '/api/purchase', { token, body: { item_name: 'Books', amount: 'ten' } })).toMatchObject({
        status: 400,
        body: { error: 'amount: Expected number, received string' },
      });
      expect((await call('GET', '/api/history?limit=abc', { token })).status).toBe(400);
    });

    it('records stress levels', async () => {
      const token = await signUp();

      const updated = await call('PUT', '/api/stress', { token, body: { stress_level: 8 } });
      expect(updated.body).toMatchObject({ stress_level: 8, log: { level: 8 } });
      expect((await call('GET', '/api/me', { token })).body).toMatchObject({ user: { stress_level: 8 } });
      expect((await call('GET', '/api/stress/history', { token })).body).toMatchObject({ logs: [{ level: 8 }] });
      expect((await call('PUT', '/api/stress', { token, body: { stress_level: 11 } })).status).toBe(400);
    });

    it('merges survey updates', async () => {
      const token = await signUp();

      await call('PUT', '/api/survey', { token, body: { name: 'Ana' } });
      const res = await call('PUT', '/api/survey', { token, body: { occupation: 'Nurse' } });

      expect(res.body).toEqual({ survey: { name: 'Ana', occupation: 'Nurse' } });
      expect((await call('GET', '/api/survey', { token })).body).toEqual({
        survey: { name: 'Ana', occupation: 'Nurse' },
      });
    });
  });

  describe('AI routes', () => {
    it('redacts names and emails before chatting', async () => {
      const token = await signUp();

      const res = await call('POST', '/api/ai/guardian/chat', {
        token,
        body: { message: 'I met John Smith at john@example.com' },
      });

      expect(res.body).toEqual({ reply: 'Happy to help.' });
      expect(api.messages.at(-1)?.content).toBe('I met [NAME] at [EMAIL]');
    });

    it('returns 404 for an unknown topic', async () => {
      const token = await signUp();

      expect(await call('POST', '/api/ai/finance/chat', { token, body: { message: 'hi' } })).toMatchObject({
        status: 404,
        body: { error: 'Unknown topic "finance"' },
      });
    });

    it('caches briefs until forced', async () => {
      const token = await signUp();

      const first = await call('GET', '/api/ai/scholar/brief', { token });
      const second = await call('GET', '/api/ai/scholar/brief', { token });
      const forced = await call('GET', '/api/ai/scholar/brief?force=1', { token });

      expect(first.body).toMatchObject({ cached: false });
      expect(second.body).toMatchObject({ cached: true });
      expect(forced.body).toMatchObject({ cached: false });
    });

    it("resets the caller's AI threads", async () => {
      const token = await signUp();
      await call('POST', '/api/ai/vitals/chat', { token, body: { message: 'hi' } });

      expect((await call('POST', '/api/ai/reset', { token, body: {} })).body).toEqual({
        success: true,
        scope: 'user',
        cleared: { assistants: 0, threads: 1, briefs: 0 },
      });
    });

    it('answers 503 when a purchase review has no guardian session', async () => {
      const token = await signUp();
      api.failAssistant = true;

      expect(
        await call('POST', '/api/purchase/evaluate', { token, body: { item_name: 'Lunch', amount: 10 } }),
      ).toMatchObject({ status: 503, body: { error: 'Guardian assistant is unavailable' } });
    });

    it('serves a local insight before any guardian assistant exists', async () => {
      const token = await signUp();

      expect((await call('GET', '/api/ai/insight', { token })).body).toEqual({
        insight: 'Zenith AI: With stress at 5/10, consider a mindful pause before financial decisions today.',
      });
    });
  });
});
