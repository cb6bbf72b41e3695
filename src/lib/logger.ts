import { pino, type Logger } from 'pino';
import { ulid } from 'ulid';

import { env } from '../config/index.js';

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  base: {
    app: 'imgdedup',
    env: env.NODE_ENV
  },
  transport
});

export type { Logger };

/**
 * Child logger tagged with a fresh run id, so every line of one dedup run
 * can be correlated.
 */
export function createRunLogger(parent: Logger = logger): { runId: string; log: Logger } {
  const runId = ulid();
  return { runId, log: parent.child({ runId }) };
}
