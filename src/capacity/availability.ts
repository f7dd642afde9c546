import { executeWithRetry } from '../retry.js';
import { ValidationError, errorMessage } from '../errors.js';
import type { CallContext } from '../context.js';
import type { CapacityApi } from '../types/api.js';
import type { ModelInfo } from '../types/deployment.js';

/**
 * Check `requested` against the capacity the provider reports as available in
 * `location` for this model and SKU.
 *
 * Fail-open: a blank location, a failed query or a missing figure only logs a
 * warning, leaving the mutating call as the final authority. Only a known
 * shortfall throws.
 */
export async function validateAvailability(
  api: CapacityApi,
  location: string,
  model: ModelInfo,
  skuName: string,
  requested: number,
  ctx: CallContext,
): Promise<void> {
  const logger = ctx.logger.child({ component: 'availability' });

  if (location.trim() === '') {
    logger.info('Location unknown; skipping availability check');
    return;
  }

  let available = 0;
  try {
    const capacities = await executeWithRetry(
      'GetModelCapacities',
      () => api.getModelCapacities(ctx.token, location, model),
      ctx.retryPolicy,
      { logger, sleep: ctx.sleep },
    );
    const match = capacities.find((c) => c.skuName.toLowerCase() === skuName.toLowerCase());
    available = match?.availableCapacity ?? 0;
  } catch (err) {
    logger.warn({ location, model: model.name, skuName, err: errorMessage(err) }, 'Availability query failed; proceeding without it');
    return;
  }

  if (available <= 0) {
    logger.warn({ location, model: model.name, skuName }, 'No available capacity figure reported; proceeding');
    return;
  }

  if (requested > available) {
    throw new ValidationError(
      'INSUFFICIENT_CAPACITY',
      `Insufficient capacity for ${model.name} ${model.version} (${skuName}) in ${location}: requested ${requested}, available ${available}`,
    );
  }

  logger.info({ location, requested, available }, 'Capacity available');
}
