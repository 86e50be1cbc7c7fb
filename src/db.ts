import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { DB_PATH } from './config.js';
import { fromCents, toCents } from './money.js';
import { surveySchema } from './schemas.js';
import type {
  CachedBrief,
  StressLog,
  SurveyProfile,
  ThreadBinding,
  Topic,
  Transaction,
  TransactionStatus,
  User,
} from './types.js';

let db: Database.Database;

export function initDatabase(dbPath: string = DB_PATH): void {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id            INTEGER PRIMARY KEY AUTOINCREMENT,
      username      TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      token         TEXT UNIQUE,
      balance       INTEGER NOT NULL DEFAULT 0, -- cents
      stress_level  INTEGER NOT NULL DEFAULT 5 CHECK(stress_level BETWEEN 1 AND 10),
      survey        TEXT NOT NULL DEFAULT '{}',
      onboarded     INTEGER NOT NULL DEFAULT 0,
      created_at    TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS transactions (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id    INTEGER NOT NULL REFERENCES users(id),
      item_name  TEXT NOT NULL,
      amount     INTEGER NOT NULL, -- cents
      status     TEXT NOT NULL CHECK(status IN ('ALLOWED','BLOCKED','INCOME')),
      reason     TEXT,
      timestamp  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_transactions_user ON transactions(user_id, timestamp);

    CREATE TABLE IF NOT EXISTS ai_assistants (
      topic         TEXT PRIMARY KEY,
      assistant_id  TEXT NOT NULL,
      created_at    TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS user_threads (
      user_id      INTEGER NOT NULL REFERENCES users(id),
      topic        TEXT NOT NULL,
      thread_id    TEXT NOT NULL,
      initialized  INTEGER NOT NULL DEFAULT 0,
      created_at   TEXT NOT NULL,
      PRIMARY KEY (user_id, topic)
    );

    CREATE TABLE IF NOT EXISTS ai_briefs (
      user_id     INTEGER NOT NULL REFERENCES users(id),
      topic       TEXT NOT NULL,
      content     TEXT NOT NULL,
      created_at  TEXT NOT NULL,
      PRIMARY KEY (user_id, topic)
    );

    CREATE TABLE IF NOT EXISTS stress_logs (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id     INTEGER NOT NULL REFERENCES users(id),
      level       INTEGER NOT NULL CHECK(level BETWEEN 1 AND 10),
      logged_on   TEXT NOT NULL,
      created_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_stress_logs_user ON stress_logs(user_id, created_at);
  `);
}

export function closeDatabase(): void {
  if (db?.open) db.close();
}

/**
 * Run several statements as one SQLite transaction. Anything thrown inside
 * rolls the whole unit back.
 */
export function transaction<T>(fn: () => T): T {
  return db.transaction(fn)();
}

// --- Users ---

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  token: string | null;
  balance: number;
  stress_level: number;
  survey: string;
  onboarded: number;
  created_at: string;
}

export interface UserCredentials {
  user: User;
  passwordHash: string;
}

function parseSurvey(raw: string): SurveyProfile {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return {};
  }
  const parsed = surveySchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    balance: fromCents(row.balance),
    stress_level: row.stress_level,
    survey: parseSurvey(row.survey),
    onboarded: row.onboarded !== 0,
    created_at: row.created_at,
  };
}

export function createUser(username: string, passwordHash: string): User {
  const now = new Date().toISOString();
  const result = db
    .prepare<[string, string, string]>(
      `INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)`,
    )
    .run(username, passwordHash, now);

  const user = getUserById(Number(result.lastInsertRowid));
  if (!user) throw new Error(`User ${username} vanished after insert`);
  return user;
}

export function getUserById(id: number): User | undefined {
  const row = db
    .prepare<[number], UserRow>(`SELECT * FROM users WHERE id = ?`)
    .get(id);
  return row ? toUser(row) : undefined;
}

export function getUserByToken(token: string): User | undefined {
  const row = db
    .prepare<[string], UserRow>(`SELECT * FROM users WHERE token = ?`)
    .get(token);
  return row ? toUser(row) : undefined;
}

export function getCredentials(username: string): UserCredentials | undefined {
  const row = db
    .prepare<[string], UserRow>(`SELECT * FROM users WHERE username = ?`)
    .get(username);
  return row ? { user: toUser(row), passwordHash: row.password_hash } : undefined;
}

export function setUserToken(userId: number, token: string | null): void {
  db.prepare<[string | null, number]>(
    `UPDATE users SET token = ? WHERE id = ?`,
  ).run(token, userId);
}

export function saveSurvey(userId: number, survey: SurveyProfile): void {
  db.prepare<[string, number]>(`UPDATE users SET survey = ? WHERE id = ?`).run(
    JSON.stringify(survey),
    userId,
  );
}

export function completeOnboarding(
  userId: number,
  survey: SurveyProfile,
  balance: number,
  stressLevel: number,
): void {
  db.prepare<[string, number, number, number]>(
    `UPDATE users SET survey = ?, balance = ?, stress_level = ?, onboarded = 1 WHERE id = ?`,
  ).run(JSON.stringify(survey), toCents(balance), stressLevel, userId);
}

// --- Balance & ledger ---

/**
 * Conditional decrement: only succeeds if the balance covers the amount at
 * the moment the row is written. Returns false when it does not.
 */
export function debitBalance(userId: number, amount: number): boolean {
  const result = db
    .prepare<[number, number, number]>(
      `UPDATE users SET balance = balance - ? WHERE id = ? AND balance >= ?`,
    )
    .run(toCents(amount), userId, toCents(amount));
  return result.changes > 0;
}

export function creditBalance(userId: number, amount: number): boolean {
  const result = db
    .prepare<[number, number]>(
      `UPDATE users SET balance = balance + ? WHERE id = ?`,
    )
    .run(toCents(amount), userId);
  return result.changes > 0;
}

export function insertTransaction(entry: {
  userId: number;
  itemName: string;
  amount: number;
  status: TransactionStatus;
  reason: string | null;
}): Transaction {
  const timestamp = new Date().toISOString();
  const result = db
    .prepare<[number, string, number, TransactionStatus, string | null, string]>(
      `INSERT INTO transactions (user_id, item_name, amount, status, reason, timestamp)
       VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      entry.userId,
      entry.itemName,
      toCents(entry.amount),
      entry.status,
      entry.reason,
      timestamp,
    );

  return {
    id: Number(result.lastInsertRowid),
    user_id: entry.userId,
    item_name: entry.itemName,
    amount: fromCents(toCents(entry.amount)),
    status: entry.status,
    reason: entry.reason,
    timestamp,
  };
}

export function getTransactions(userId: number, limit: number): Transaction[] {
  const rows = db
    .prepare<[number, number], Transaction>(
      `SELECT id, user_id, item_name, amount, status, reason, timestamp
       FROM transactions
       WHERE user_id = ?
       ORDER BY timestamp DESC, id DESC
       LIMIT ?`,
    )
    .all(userId, limit);
  return rows.map((row) => ({ ...row, amount: fromCents(row.amount) }));
}

// --- Stress ---

export function recordStressLevel(userId: number, level: number): StressLog {
  return transaction(() => {
    const now = new Date();
    const createdAt = now.toISOString();
    const loggedOn = createdAt.slice(0, 10);

    db.prepare<[number, number]>(
      `UPDATE users SET stress_level = ? WHERE id = ?`,
    ).run(level, userId);
    const result = db
      .prepare<[number, number, string, string]>(
        `INSERT INTO stress_logs (user_id, level, logged_on, created_at) VALUES (?, ?, ?, ?)`,
      )
      .run(userId, level, loggedOn, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      user_id: userId,
      level,
      logged_on: loggedOn,
      created_at: createdAt,
    };
  });
}

export function getStressLogs(userId: number, limit: number): StressLog[] {
  return db
    .prepare<[number, number], StressLog>(
      `SELECT id, user_id, level, logged_on, created_at
       FROM stress_logs
       WHERE user_id = ?
       ORDER BY created_at DESC, id DESC
       LIMIT ?`,
    )
    .all(userId, limit);
}

// --- Assistant & thread bindings ---

export function getAssistantId(topic: Topic): string | undefined {
  const row = db
    .prepare<[string], { assistant_id: string }>(
      `SELECT assistant_id FROM ai_assistants WHERE topic = ?`,
    )
    .get(topic);
  return row?.assistant_id;
}

export function upsertAssistant(topic: Topic, assistantId: string): void {
  db.prepare<[string, string, string]>(
    `INSERT INTO ai_assistants (topic, assistant_id, created_at) VALUES (?, ?, ?)
     ON CONFLICT(topic) DO UPDATE SET assistant_id = excluded.assistant_id, created_at = excluded.created_at`,
  ).run(topic, assistantId, new Date().toISOString());
}

export function deleteAssistants(topic?: Topic): number {
  if (topic) {
    return db
      .prepare<[string]>(`DELETE FROM ai_assistants WHERE topic = ?`)
      .run(topic).changes;
  }
  return db.prepare(`DELETE FROM ai_assistants`).run().changes;
}

export function getThread(
  userId: number,
  topic: Topic,
): ThreadBinding | undefined {
  const row = db
    .prepare<[number, string], { thread_id: string; initialized: number }>(
      `SELECT thread_id, initialized FROM user_threads WHERE user_id = ? AND topic = ?`,
    )
    .get(userId, topic);
  return row
    ? { threadId: row.thread_id, initialized: row.initialized !== 0 }
    : undefined;
}

/** Last write wins: a racing creation simply replaces the earlier binding. */
export function upsertThread(
  userId: number,
  topic: Topic,
  threadId: string,
): void {
  db.prepare<[number, string, string, string]>(
    `INSERT INTO user_threads (user_id, topic, thread_id, initialized, created_at) VALUES (?, ?, ?, 0, ?)
     ON CONFLICT(user_id, topic) DO UPDATE SET thread_id = excluded.thread_id, initialized = 0, created_at = excluded.created_at`,
  ).run(userId, topic, threadId, new Date().toISOString());
}

export function markThreadInitialized(
  userId: number,
  topic: Topic,
  threadId: string,
): boolean {
  const result = db
    .prepare<[number, string, string]>(
      `UPDATE user_threads SET initialized = 1
       WHERE user_id = ? AND topic = ? AND thread_id = ? AND initialized = 0`,
    )
    .run(userId, topic, threadId);
  return result.changes > 0;
}

export function deleteThreads(filter: { userId?: number; topic?: Topic }): number {
  const { clause, params } = scopeClause(filter);
  return db
    .prepare<(string | number)[]>(`DELETE FROM user_threads${clause}`)
    .run(...params).changes;
}

// --- Briefs ---

export function getBrief(userId: number, topic: Topic): CachedBrief | undefined {
  return db
    .prepare<[number, string], CachedBrief>(
      `SELECT content, created_at FROM ai_briefs WHERE user_id = ? AND topic = ?`,
    )
    .get(userId, topic);
}

export function saveBrief(userId: number, topic: Topic, content: string): void {
  db.prepare<[number, string, string, string]>(
    `INSERT INTO ai_briefs (user_id, topic, content, created_at) VALUES (?, ?, ?, ?)
     ON CONFLICT(user_id, topic) DO UPDATE SET content = excluded.content, created_at = excluded.created_at`,
  ).run(userId, topic, content, new Date().toISOString());
}

export function deleteBriefs(filter: { userId?: number; topic?: Topic }): number {
  const { clause, params } = scopeClause(filter);
  return db
    .prepare<(string | number)[]>(`DELETE FROM ai_briefs${clause}`)
    .run(...params).changes;
}

function scopeClause(filter: { userId?: number; topic?: Topic }): {
  clause: string;
  params: (string | number)[];
} {
  const fields: string[] = [];
  const params: (string | number)[] = [];

  if (filter.userId !== undefined) {
    fields.push('user_id = ?');
    params.push(filter.userId);
  }
  if (filter.topic !== undefined) {
    fields.push('topic = ?');
    params.push(filter.topic);
  }

  return {
    clause: fields.length > 0 ? ` WHERE ${fields.join(' AND ')}` : '',
    params,
  };
}
