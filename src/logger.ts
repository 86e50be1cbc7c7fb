import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  ...(process.stdout.isTTY && level !== 'silent'
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
});
