export const TOPICS = ['guardian', 'scholar', 'vitals'] as const;

export type Topic = (typeof TOPICS)[number];

export function isTopic(value: string): value is Topic {
  return (TOPICS as readonly string[]).includes(value);
}

export type TransactionStatus = 'ALLOWED' | 'BLOCKED' | 'INCOME';

export interface CommonProfile {
  name?: string;
  age_range?: string;
  occupation?: string;
}

export interface GuardianProfile {
  spending_profile?: string;
  income_range?: string;
  savings?: string;
  financial_goals?: string[];
  balance?: number;
}

export interface ScholarProfile {
  education_level?: string;
  subjects?: string[];
  learning_style?: string;
  study_goals?: string[];
}

export interface VitalsProfile {
  exercise_frequency?: string;
  sleep_quality?: string;
  diet_quality?: string;
  health_goals?: string[];
  stress_level?: number;
}

/** Everything the onboarding survey can collect. Every field is optional. */
export type SurveyProfile = CommonProfile &
  GuardianProfile &
  ScholarProfile &
  VitalsProfile;

export interface User {
  id: number;
  username: string;
  balance: number;
  stress_level: number;
  survey: SurveyProfile;
  onboarded: boolean;
  created_at: string;
}

export interface Transaction {
  id: number;
  user_id: number;
  item_name: string;
  amount: number;
  status: TransactionStatus;
  reason: string | null;
  timestamp: string;
}

export interface StressLog {
  id: number;
  user_id: number;
  level: number;
  logged_on: string; // YYYY-MM-DD
  created_at: string;
}

export interface ThreadBinding {
  threadId: string;
  initialized: boolean;
}

export interface CachedBrief {
  content: string;
  created_at: string;
}
