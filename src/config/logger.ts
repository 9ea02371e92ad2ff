import { pino, type Logger } from 'pino';
import { env } from './env.js';

export const logger: Logger = pino({
  name: 'thread-export',
  level: env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
});

export type { Logger };
