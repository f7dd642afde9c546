import { setTimeout as delay } from 'node:timers/promises';
import { NON_RETRYABLE_KINDS, isReconcileError } from './errors.js';
import type { ErrorKind } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  nonRetryable: ReadonlySet<ErrorKind>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 2_000,
  backoffFactor: 2,
  maxDelayMs: 30_000,
  nonRetryable: NON_RETRYABLE_KINDS,
});

export type Sleep = (ms: number) => Promise<void>;

export interface RetryDeps {
  logger: Logger;
  /** Defaults to a timer-based wait; tests pass a recorder. */
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

function shouldStop(err: unknown, policy: RetryPolicy): boolean {
  if (!isReconcileError(err)) return false;
  return err.kind === 'Validation' || err.kind === 'Config' || policy.nonRetryable.has(err.kind);
}

/**
 * Run `action` until it succeeds, a non-retryable error is raised, or
 * `policy.maxAttempts` attempts have been made. The last error is rethrown
 * as-is.
 */
export async function executeWithRetry<T>(
  operationName: string,
  action: () => Promise<T>,
  policy: RetryPolicy,
  deps: RetryDeps,
): Promise<T> {
  const sleep = deps.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let waitMs = Math.min(policy.initialDelayMs, policy.maxDelayMs);

  for (let attempt = 1; ; attempt++) {
    if (attempt > 1) {
      deps.logger.info({ operation: operationName, attempt, maxAttempts }, `Retrying ${operationName} (attempt ${attempt}/${maxAttempts})`);
    }

    try {
      return await action();
    } catch (err) {
      if (shouldStop(err, policy)) {
        deps.logger.warn({ operation: operationName, attempt, err }, `${operationName} failed with a non-retryable error`);
        throw err;
      }
      if (attempt >= maxAttempts) {
        deps.logger.error({ operation: operationName, attempt, err }, `${operationName} failed after ${attempt} attempts`);
        throw err;
      }

      deps.logger.warn({ operation: operationName, attempt, delayMs: waitMs, err }, `${operationName} failed; backing off`);
      await sleep(waitMs);
      waitMs = Math.min(waitMs * policy.backoffFactor, policy.maxDelayMs);
    }
  }
}

/**
 * Build a policy from the defaults. Overrides come from configuration.
 */
export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}
