import pino from 'pino';
import { env } from './env';

// stdout carries command output; diagnostics go to stderr.
export const logger = pino(
  {
    level: env.LOG_LEVEL,
    base: null,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);
