import { RemoteUnavailableError } from '../errors.js';
import { previewPurchase, type Verdict } from '../rule-engine.js';
import type { User } from '../types.js';
import { fallbackText } from './result.js';
import type { SessionCache } from './session-cache.js';

export type PurchaseReview = Verdict & { advice: string };

export function reviewPrompt(
  user: User,
  itemName: string,
  amount: number,
  verdict: Verdict,
): string {
  return (
    `I am thinking about buying "${itemName}" for $${amount}. ` +
    `My balance is $${user.balance} and my stress level is ${user.stress_level}/10. ` +
    `The app's spending rules say: ${verdict.status} (${verdict.reason}). ` +
    `In two or three sentences, tell me whether this is a wise purchase right now and why.`
  );
}

/**
 * Rule-engine preview plus the guardian's opinion, without spending anything.
 * Fails loudly when no guardian thread can be opened, since the caller asked
 * specifically for a reviewed decision.
 */
export async function reviewPurchase(
  sessions: SessionCache,
  user: User,
  itemName: string,
  amount: number,
): Promise<PurchaseReview> {
  const verdict = previewPurchase(user.id, amount, itemName);
  const result = await sessions.converse(
    user.id,
    'guardian',
    reviewPrompt(user, itemName.trim(), amount, verdict),
    user.survey,
  );

  if (!result.ok) {
    if (result.error.kind === 'no_session') {
      throw new RemoteUnavailableError('Guardian assistant is unavailable');
    }
    return { ...verdict, advice: fallbackText(result.error.kind) };
  }
  return { ...verdict, advice: result.value };
}
