import type { Logger } from './logger.js';
import type { RetryPolicy, Sleep } from './retry.js';

/**
 * Per-invocation values threaded through every component call.
 *
 * A context is never mutated: after a token refresh the reconciler derives a
 * new one with `withToken`.
 */
export interface CallContext {
  readonly token: string;
  readonly logger: Logger;
  readonly retryPolicy: RetryPolicy;
  readonly sleep?: Sleep;
}

export function withToken(ctx: CallContext, token: string): CallContext {
  return { ...ctx, token };
}

/**
 * Identity of the run as seen by alert recipients.
 */
export interface RunContext {
  /** Runbook or operation name used as the alert source. */
  readonly source: string;
  /** Empty when no webhook is configured. */
  readonly webhookUrl: string;
}
