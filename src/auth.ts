import Database from 'better-sqlite3';
import crypto from 'crypto';

import {
  createUser,
  getCredentials,
  getUserByToken,
  setUserToken,
} from './db.js';
import { ConflictError, UnauthorizedError } from './errors.js';
import { logger } from './logger.js';
import type { User } from './types.js';

const SCRYPT_KEYLEN = 64;

function generateToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16).toString('hex');
  const hash = crypto.scryptSync(password, salt, SCRYPT_KEYLEN).toString('hex');
  return `${salt}:${hash}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [salt, hash] = stored.split(':');
  if (!salt || !hash) return false;

  const expected = Buffer.from(hash, 'hex');
  const actual = crypto.scryptSync(password, salt, expected.length);
  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}

export interface Session {
  token: string;
  user: User;
}

/**
 * Create an account and sign it in.
 */
export function register(username: string, password: string): Session {
  if (getCredentials(username)) {
    throw new ConflictError('Username already taken');
  }

  let user: User;
  try {
    user = createUser(username, hashPassword(password));
  } catch (err) {
    // Lost a race with a concurrent registration of the same name
    if (
      err instanceof Database.SqliteError &&
      err.code === 'SQLITE_CONSTRAINT_UNIQUE'
    ) {
      throw new ConflictError('Username already taken');
    }
    throw err;
  }

  const token = generateToken();
  setUserToken(user.id, token);
  logger.info({ userId: user.id }, 'User registered');
  return { token, user };
}

export function login(username: string, password: string): Session {
  const credentials = getCredentials(username);
  if (!credentials || !verifyPassword(password, credentials.passwordHash)) {
    logger.warn({ username }, 'Failed login attempt');
    throw new UnauthorizedError('Invalid username or password');
  }

  const token = generateToken();
  setUserToken(credentials.user.id, token);
  logger.info({ userId: credentials.user.id }, 'User logged in');
  return { token, user: credentials.user };
}

export function logout(userId: number): void {
  setUserToken(userId, null);
  logger.info({ userId }, 'User logged out');
}

/**
 * Resolve a bearer token to its user, or undefined if it is not a live session.
 */
export function verifyToken(token: string): User | undefined {
  if (!token) return undefined;
  return getUserByToken(token);
}
