/**
 * Root logger
 *
 * Structured JSON logging via pino. Pretty-printed when NODE_ENV=development.
 * Services accept an injected Logger and fall back to a child of this one.
 *
 * @module utils/logger
 */

import pino, { type Logger } from 'pino';

const env = process.env;

export const logger: Logger = pino({
  name: 'confession-ranking',
  level: env['LOG_LEVEL'] || 'info',
  transport:
    env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

/**
 * Child logger tagged with a component name.
 */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
