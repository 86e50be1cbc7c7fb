import type {
  CommonProfile,
  GuardianProfile,
  ScholarProfile,
  SurveyProfile,
  Topic,
  VitalsProfile,
} from '../types.js';

export const CONTEXT_DELIMITER = ' | ';

type Part = string | undefined;

function text(label: string, value: string | undefined): Part {
  return value && value.trim() !== '' ? `${label}: ${value.trim()}` : undefined;
}

function list(label: string, values: string[] | undefined): Part {
  return values && values.length > 0 ? `${label}: ${values.join(', ')}` : undefined;
}

function common(profile: CommonProfile): Part[] {
  return [
    `User: ${profile.name?.trim() || 'User'}`,
    text('Age', profile.age_range),
    text('Occupation', profile.occupation),
  ];
}

function guardian(profile: GuardianProfile): Part[] {
  return [
    text('Spending profile', profile.spending_profile),
    text('Income', profile.income_range),
    text('Savings', profile.savings),
    list('Financial goals', profile.financial_goals),
    profile.balance !== undefined ? `Balance: $${profile.balance}` : undefined,
  ];
}

function scholar(profile: ScholarProfile): Part[] {
  return [
    text('Education', profile.education_level),
    list('Interests', profile.subjects),
    text('Learning style', profile.learning_style),
    list('Study goals', profile.study_goals),
  ];
}

function vitals(profile: VitalsProfile): Part[] {
  return [
    text('Exercise', profile.exercise_frequency),
    text('Sleep', profile.sleep_quality),
    text('Diet', profile.diet_quality),
    list('Health goals', profile.health_goals),
    profile.stress_level !== undefined
      ? `Stress: ${profile.stress_level}/10`
      : undefined,
  ];
}

const TOPIC_FIELDS: Record<Topic, (profile: SurveyProfile) => Part[]> = {
  guardian,
  scholar,
  vitals,
};

/**
 * One-line summary of the survey fields relevant to a topic. Absent fields
 * are left out; the name falls back to "User".
 */
export function buildContext(topic: Topic, profile: SurveyProfile): string {
  return [...common(profile), ...TOPIC_FIELDS[topic](profile)]
    .filter((part): part is string => part !== undefined)
    .join(CONTEXT_DELIMITER);
}

export function primingMessage(topic: Topic, profile: SurveyProfile): string {
  return `[User Profile] ${buildContext(topic, profile)}. Remember this about me for all our conversations.`;
}
