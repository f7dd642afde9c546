import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Root logger. Fastify receives this same instance, so trigger requests and
 * reconciliation steps share one stream.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'ptu-reconciler',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger for tests and callers that want no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
