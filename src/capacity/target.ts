import { executeWithRetry } from '../retry.js';
import { ValidationError } from '../errors.js';
import { parseCapacity } from '../variables.js';
import type { CallContext } from '../context.js';
import type { VariableStore } from '../types/api.js';
import type { TargetCapacity, TriggerParams } from '../types/deployment.js';

export interface TargetCapacityDeps {
  variables: VariableStore;
  baselineVariable: string;
  /**
   * Live estimate, absent when estimation is off. Resolves `undefined` when the
   * window holds no metrics at all, and 0 when the estimate is unusable.
   */
  estimate?: () => Promise<number | undefined>;
}

/**
 * Resolve the capacity to create or update to. First match wins:
 *
 * 1. explicit `capacity` parameter
 * 2. variable named by `capacityVariable` (must hold a positive integer)
 * 3. live estimate from usage metrics
 * 4. baseline fallback variable, only when estimation is off or found no metrics
 *
 * Resolves `null` when the estimate came back 0: the caller must not act.
 */
export async function resolveTargetCapacity(
  params: Pick<TriggerParams, 'capacity' | 'capacityVariable'>,
  deps: TargetCapacityDeps,
  ctx: CallContext,
): Promise<TargetCapacity | null> {
  const logger = ctx.logger.child({ component: 'target-capacity' });
  const readVariable = (name: string) =>
    executeWithRetry(`GetVariable ${name}`, () => deps.variables.get(ctx.token, name), ctx.retryPolicy, { logger, sleep: ctx.sleep });

  if (params.capacity !== undefined) {
    if (!Number.isSafeInteger(params.capacity) || params.capacity <= 0) {
      throw new ValidationError('INVALID_CAPACITY', `Explicit capacity must be a positive integer, got ${params.capacity}`);
    }
    return { capacity: params.capacity, source: 'explicit' };
  }

  if (params.capacityVariable) {
    const raw = await readVariable(params.capacityVariable);
    const capacity = parseCapacity(raw);
    if (capacity === undefined) {
      throw new ValidationError(
        'CAPACITY_VARIABLE_INVALID',
        raw === undefined
          ? `Capacity variable '${params.capacityVariable}' is not set`
          : `Capacity variable '${params.capacityVariable}' does not hold a positive integer: '${raw}'`,
      );
    }
    return { capacity, source: 'variable' };
  }

  if (deps.estimate) {
    const estimated = await deps.estimate();
    if (estimated === undefined) {
      logger.warn('No usage metrics to estimate from; falling back to baseline');
    } else if (estimated > 0) {
      return { capacity: estimated, source: 'estimate' };
    } else {
      logger.warn('Capacity estimate is 0; no target');
      return null;
    }
  }

  const baseline = parseCapacity(await readVariable(deps.baselineVariable));
  if (baseline !== undefined) {
    return { capacity: baseline, source: 'baseline' };
  }

  throw new ValidationError(
    'NO_CAPACITY_SOURCE',
    `No capacity given, no estimate available and baseline variable '${deps.baselineVariable}' is not set`,
  );
}
