import type http from 'http';

import { loadPersonas } from './ai/personas.js';
import { createAiServices } from './ai/services.js';
import {
  AI_API_KEY,
  AI_RESET_SCOPE,
  CORS_ORIGIN,
  PERSONAS_PATH,
  REDACT_PII,
  WEB_PORT,
} from './config.js';
import { closeDatabase, initDatabase } from './db.js';
import { logger } from './logger.js';
import { startWebServer } from './web-server.js';

let server: http.Server | null = null;

async function main(): Promise<void> {
  initDatabase();
  logger.info('Database initialized');

  const personas = loadPersonas(PERSONAS_PATH);
  if (!AI_API_KEY) {
    logger.warn('AI_API_KEY not set, AI endpoints will answer with fallback text');
  }

  server = startWebServer(WEB_PORT, {
    ai: createAiServices({ personas }),
    resetScope: AI_RESET_SCOPE,
    redactPii: REDACT_PII,
    corsOrigin: CORS_ORIGIN,
  });
}

// Graceful shutdown
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, stopping...');
  try {
    await new Promise<void>((resolve, reject) => {
      if (!server) return resolve();
      server.close((err) => (err ? reject(err) : resolve()));
    });
    closeDatabase();
    logger.info('All services stopped');
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
  }
  process.exit(0);
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

main().catch((err) => {
  logger.error({ err }, 'Failed to start Zenith backend');
  process.exit(1);
});
