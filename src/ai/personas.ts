import fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';

import { logger } from '../logger.js';
import { TOPICS, type Topic } from '../types.js';
import type { AssistantSpec } from './client.js';

export type Personas = Record<Topic, AssistantSpec>;

export class PersonaConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersonaConfigError';
  }
}

const personaSchema = z.object({
  name: z.string().trim().min(1),
  system_prompt: z.string().trim().min(1),
});

const personasFileSchema = z.object({
  guardian: personaSchema.optional(),
  scholar: personaSchema.optional(),
  vitals: personaSchema.optional(),
});

const DEFAULT_PROMPT = 'You are a helpful AI assistant.';

function defaultPersona(topic: Topic): AssistantSpec {
  return {
    name: `Zenith ${topic.charAt(0).toUpperCase()}${topic.slice(1)}`,
    systemPrompt: DEFAULT_PROMPT,
  };
}

export function defaultPersonas(): Personas {
  return {
    guardian: defaultPersona('guardian'),
    scholar: defaultPersona('scholar'),
    vitals: defaultPersona('vitals'),
  };
}

/**
 * Read persona definitions from YAML. Topics missing from the file fall back
 * to a generic persona; a missing file falls back entirely.
 */
export function loadPersonas(filePath: string): Personas {
  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Personas file not found, using defaults');
    return defaultPersonas();
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new PersonaConfigError(
      `Failed to read personas at "${filePath}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = personasFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PersonaConfigError(
      `Invalid personas file "${filePath}": ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
    );
  }

  const personas = defaultPersonas();
  for (const topic of TOPICS) {
    const entry = parsed.data[topic];
    if (entry) {
      personas[topic] = { name: entry.name, systemPrompt: entry.system_prompt };
    }
  }

  logger.info({ filePath }, 'Personas loaded');
  return personas;
}
