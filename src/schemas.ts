import { z } from 'zod';

import { TOPICS } from './types.js';

const shortText = z.string().trim().min(1).max(200);
const textList = z.array(shortText).max(20);

export const surveySchema = z
  .object({
    name: shortText,
    age_range: shortText,
    occupation: shortText,
    spending_profile: shortText,
    income_range: shortText,
    savings: shortText,
    financial_goals: textList,
    balance: z.number().finite().nonnegative(),
    education_level: shortText,
    subjects: textList,
    learning_style: shortText,
    study_goals: textList,
    exercise_frequency: shortText,
    sleep_quality: shortText,
    diet_quality: shortText,
    health_goals: textList,
    stress_level: z.number().int().min(1).max(10),
  })
  .partial()
  .strip();

export const stressLevelSchema = z.number().int().min(1).max(10);

// Money amounts are validated by the rule engine itself, so the HTTP layer
// only checks the shape.
const amountField = z.number();

export const credentialsSchema = z.object({
  username: z.string().trim().min(3).max(64),
  password: z.string().min(6).max(256),
});

export const onboardingSchema = z.object({
  survey: surveySchema,
  balance: z.number().finite().nonnegative().default(0),
  stress_level: stressLevelSchema.default(5),
});

export const incomeSchema = z.object({
  amount: amountField,
  source: z.string().trim().min(1).max(200),
});

export const purchaseSchema = z.object({
  item_name: z.string().trim().min(1).max(200),
  amount: amountField,
});

export const stressSchema = z.object({
  stress_level: stressLevelSchema,
});

export const chatSchema = z.object({
  message: z.string().trim().min(1).max(4000),
});

export const resetSchema = z.object({
  topic: z.enum(TOPICS).optional(),
});

/** Turns the first zod issue into a one-line message for API clients. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}
