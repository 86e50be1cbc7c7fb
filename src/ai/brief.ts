import { logger } from '../logger.js';
import type { SurveyProfile, Topic } from '../types.js';
import type { BindingStore } from './binding-store.js';
import { fallbackText } from './result.js';
import type { SessionCache } from './session-cache.js';

export const RECOMMENDATION_COUNT = 3;
export const QUESTION_COUNT = 3;
export const QUESTION_MARKER = 'Ask:';

const FOCUS: Record<Topic, { subject: string; details: (p: SurveyProfile) => string[] }> = {
  guardian: {
    subject: 'financial wellness',
    details: (p) => [
      p.spending_profile ? `spending profile "${p.spending_profile}"` : '',
      p.income_range ? `income ${p.income_range}` : '',
      p.balance !== undefined ? `balance $${p.balance}` : '',
      p.financial_goals?.length ? `goals: ${p.financial_goals.join(', ')}` : '',
    ],
  },
  scholar: {
    subject: 'study',
    details: (p) => [
      p.education_level ? `education level ${p.education_level}` : '',
      p.subjects?.length ? `subjects: ${p.subjects.join(', ')}` : '',
      p.learning_style ? `learning style ${p.learning_style}` : '',
      p.study_goals?.length ? `goals: ${p.study_goals.join(', ')}` : '',
    ],
  },
  vitals: {
    subject: 'physical health',
    details: (p) => [
      p.exercise_frequency ? `exercise ${p.exercise_frequency}` : '',
      p.sleep_quality ? `sleep ${p.sleep_quality}` : '',
      p.diet_quality ? `diet ${p.diet_quality}` : '',
      p.stress_level !== undefined ? `stress ${p.stress_level}/10` : '',
      p.health_goals?.length ? `goals: ${p.health_goals.join(', ')}` : '',
    ],
  },
};

export function buildBriefPrompt(topic: Topic, profile: SurveyProfile): string {
  const { subject, details } = FOCUS[topic];
  const name = profile.name?.trim() || 'there';
  const known = details(profile).filter(Boolean);

  return [
    `Write a short ${subject} brief for ${name}.`,
    known.length > 0 ? `What you know: ${known.join('; ')}.` : '',
    'Use exactly this format, in plain text with no markdown:',
    `- One greeting line that uses the name ${name}.`,
    `- Exactly ${RECOMMENDATION_COUNT} numbered recommendations ("1." to "${RECOMMENDATION_COUNT}."), one sentence each.`,
    `- Exactly ${QUESTION_COUNT} example questions they could ask you, each on its own line starting with "${QUESTION_MARKER}".`,
    '- One short encouraging closing line.',
  ]
    .filter(Boolean)
    .join('\n');
}

export interface Brief {
  content: string;
  created_at: string;
  cached: boolean;
}

/**
 * Proactive per-topic summaries. A stored brief is served as-is until a
 * forced regeneration replaces it; failed generations are never stored.
 */
export class BriefService {
  constructor(
    private readonly sessions: SessionCache,
    private readonly store: BindingStore,
  ) {}

  async generate(
    userId: number,
    topic: Topic,
    profile: SurveyProfile,
    force: boolean,
  ): Promise<Brief> {
    if (!force) {
      const stored = this.store.getBrief(userId, topic);
      if (stored) return { ...stored, cached: true };
    }

    const result = await this.sessions.converse(
      userId,
      topic,
      buildBriefPrompt(topic, profile),
      profile,
    );

    if (!result.ok) {
      logger.warn({ userId, topic, error: result.error }, 'Brief generation failed');
      return {
        content: fallbackText(result.error.kind),
        created_at: new Date().toISOString(),
        cached: false,
      };
    }

    this.store.saveBrief(userId, topic, result.value);
    logger.info({ userId, topic, force }, 'Brief generated');

    const saved = this.store.getBrief(userId, topic);
    return {
      content: result.value,
      created_at: saved?.created_at ?? new Date().toISOString(),
      cached: false,
    };
  }
}
