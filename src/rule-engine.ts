/**
 * Purchase approval rules.
 *
 * Rules run in a fixed order and the first match decides:
 *   1. stress impulse: stress above 7 and an amount above 50 is blocked
 *   2. affordability: an amount above the balance is blocked
 *   3. otherwise the purchase is approved and the balance debited
 *
 * Every evaluation writes exactly one ledger row, in the same SQLite
 * transaction as the debit.
 */

import {
  creditBalance,
  debitBalance,
  getUserById,
  insertTransaction,
  transaction,
} from './db.js';
import { NotFoundError, ValidationError } from './errors.js';
import { logger } from './logger.js';
import { toCents } from './money.js';
import type { User } from './types.js';

export const STRESS_THRESHOLD = 7;
export const IMPULSE_AMOUNT = 50;

export const REASON_STRESS = 'High stress impulse buy detected.';
export const REASON_FUNDS = 'Insufficient funds.';
export const REASON_APPROVED = 'Purchase approved.';

export type DecisionStatus = 'ALLOWED' | 'BLOCKED';

export interface Decision {
  status: DecisionStatus;
  reason: string;
  /** Present only when the purchase went through. */
  newBalance?: number;
  transactionId: number;
}

export type Verdict =
  | { status: 'ALLOWED'; reason: string }
  | { status: 'BLOCKED'; reason: string };

function assertAmount(amount: unknown): asserts amount is number {
  if (typeof amount !== 'number' || !Number.isFinite(amount) || toCents(amount) <= 0) {
    throw new ValidationError('Amount must be a positive number');
  }
  if (!Number.isSafeInteger(toCents(amount))) {
    throw new ValidationError('Amount is too large');
  }
}

function assertLabel(value: unknown, field: string): asserts value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`);
  }
}

function requireUser(userId: number): User {
  const user = getUserById(userId);
  if (!user) throw new NotFoundError(`User ${userId} not found`);
  return user;
}

/**
 * Pure rule evaluation against a snapshot of the user.
 */
export function applyRules(
  user: Pick<User, 'balance' | 'stress_level'>,
  amount: number,
): Verdict {
  if (user.stress_level > STRESS_THRESHOLD && toCents(amount) > toCents(IMPULSE_AMOUNT)) {
    return { status: 'BLOCKED', reason: REASON_STRESS };
  }
  if (toCents(user.balance) < toCents(amount)) {
    return { status: 'BLOCKED', reason: REASON_FUNDS };
  }
  return { status: 'ALLOWED', reason: REASON_APPROVED };
}

export function evaluatePurchase(
  userId: number,
  amount: number,
  itemName: string,
): Decision {
  assertAmount(amount);
  assertLabel(itemName, 'Item name');
  const item = itemName.trim();

  const decision = transaction((): Decision => {
    const user = requireUser(userId);
    let verdict = applyRules(user, amount);

    // The conditional debit is the final word on affordability: if another
    // purchase spent the money since the read above, it changes no row.
    if (verdict.status === 'ALLOWED' && !debitBalance(userId, amount)) {
      verdict = { status: 'BLOCKED', reason: REASON_FUNDS };
    }

    const entry = insertTransaction({
      userId,
      itemName: item,
      amount,
      status: verdict.status,
      reason: verdict.reason,
    });

    if (verdict.status === 'BLOCKED') {
      return { ...verdict, transactionId: entry.id };
    }
    return {
      ...verdict,
      newBalance: requireUser(userId).balance,
      transactionId: entry.id,
    };
  });

  logger.info(
    { userId, item, amount, status: decision.status, reason: decision.reason },
    'Purchase evaluated',
  );
  return decision;
}

/**
 * Same rules as evaluatePurchase, without touching the balance or ledger.
 */
export function previewPurchase(
  userId: number,
  amount: number,
  itemName: string,
): Verdict {
  assertAmount(amount);
  assertLabel(itemName, 'Item name');
  return applyRules(requireUser(userId), amount);
}

export function addIncome(
  userId: number,
  amount: number,
  source: string,
): number {
  assertAmount(amount);
  assertLabel(source, 'Income source');

  const newBalance = transaction(() => {
    if (!creditBalance(userId, amount)) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    insertTransaction({
      userId,
      itemName: source.trim(),
      amount,
      status: 'INCOME',
      reason: null,
    });
    return requireUser(userId).balance;
  });

  logger.info({ userId, amount, newBalance }, 'Income recorded');
  return newBalance;
}
