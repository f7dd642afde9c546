/**
 * Typed errors for the reconciliation loop.
 *
 * Every error carries an explicit `kind` assigned where the error is produced
 * (from the HTTP status and ARM error code of a failed call, or by the check
 * that rejected an input). Retry and alert decisions read `kind` only.
 */

export type ProviderErrorKind =
  | 'BadRequest'
  | 'Authentication'
  | 'Authorization'
  | 'NotFound'
  | 'ResourceNotFound'
  | 'QuotaExceeded'
  | 'Conflict'
  | 'Throttled'
  | 'Transient'
  | 'Unknown';

export type ErrorKind = ProviderErrorKind | 'Validation' | 'Config';

export type ValidationCode =
  | 'DEPLOYMENT_NAME_MISMATCH'
  | 'DEPLOYMENT_NOT_FOUND'
  | 'MODEL_MISMATCH'
  | 'SKU_MISMATCH'
  | 'INSUFFICIENT_CAPACITY'
  | 'NO_WORKLOADS'
  | 'NO_CAPACITY_SOURCE'
  | 'CAPACITY_VARIABLE_INVALID'
  | 'INVALID_CAPACITY'
  | 'INVALID_WINDOW';

/** Kinds for which another attempt cannot succeed. */
export const NON_RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'BadRequest',
  'Authentication',
  'Authorization',
  'NotFound',
  'ResourceNotFound',
  'QuotaExceeded',
]);

export abstract class ReconcileError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Failure reported by an Azure Resource Manager call (or the transport under it).
 */
export class ProviderError extends ReconcileError {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly statusCode?: number,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * An input or state the reconciler refuses to act on. Never retried.
 */
export class ValidationError extends ReconcileError {
  readonly kind = 'Validation' as const;

  constructor(
    public readonly code: ValidationCode,
    message: string,
  ) {
    super(message);
  }
}

export class ConfigError extends ReconcileError {
  readonly kind = 'Config' as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export function isReconcileError(err: unknown): err is ReconcileError {
  return err instanceof ReconcileError;
}

export function isProviderError(err: unknown, ...kinds: ProviderErrorKind[]): err is ProviderError {
  if (!(err instanceof ProviderError)) return false;
  return kinds.length === 0 || kinds.includes(err.kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const QUOTA_CODES = new Set([
  'InsufficientQuota',
  'QuotaExceeded',
  'SpecialFeatureOrQuotaIdRequired',
]);

/**
 * Map a failed ARM response to an error kind.
 *
 * 404 responses are split by ARM error code: a missing parent resource
 * (resource group, account) is `ResourceNotFound`, anything else `NotFound`.
 */
export function classifyHttpFailure(statusCode: number, code?: string): ProviderErrorKind {
  if (code && (QUOTA_CODES.has(code) || /quota/i.test(code))) return 'QuotaExceeded';
  if (statusCode === 400) return 'BadRequest';
  if (statusCode === 401) return 'Authentication';
  if (statusCode === 403) return 'Authorization';
  if (statusCode === 404) {
    return code === 'ResourceNotFound' || code === 'ResourceGroupNotFound' ? 'ResourceNotFound' : 'NotFound';
  }
  if (statusCode === 409) return 'Conflict';
  if (statusCode === 429) return 'Throttled';
  if (statusCode >= 500) return 'Transient';
  return 'Unknown';
}
