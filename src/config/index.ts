export { env, type Env } from './env.js';
export { logger, type Logger } from './logger.js';
