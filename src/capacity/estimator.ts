import { executeWithRetry } from '../retry.js';
import { ValidationError } from '../errors.js';
import type { CallContext } from '../context.js';
import type { CapacityApi } from '../types/api.js';
import type {
  BucketedMetrics,
  CapacityRequest,
  MetricPoint,
  ModelInfo,
  WorkloadProfile,
} from '../types/deployment.js';

export interface MetricNames {
  promptTokens: string;
  generatedTokens: string;
}

/**
 * Derive a demand profile from one workload's hourly buckets.
 *
 * Every figure is rounded up so the estimate errs toward more capacity.
 * Returns undefined when there are no requests to average over.
 */
export function buildWorkloadProfile(
  promptPoints: MetricPoint[],
  generatedPoints: MetricPoint[],
): WorkloadProfile | undefined {
  const bucketCount = promptPoints.length;
  const totalRequests = promptPoints.reduce((sum, p) => sum + p.count, 0);
  const totalPromptTokens = promptPoints.reduce((sum, p) => sum + p.total, 0);
  const totalGeneratedTokens = generatedPoints.reduce((sum, p) => sum + p.total, 0);

  if (totalRequests <= 0 || bucketCount === 0) return undefined;

  return {
    requestsPerMinute: Math.ceil(totalRequests / (bucketCount * 60)),
    avgPromptTokens: Math.ceil(totalPromptTokens / totalRequests),
    avgGeneratedTokens: Math.ceil(totalGeneratedTokens / totalRequests),
  };
}

/**
 * Profiles for every workload with usable prompt-token data, keyed by
 * dimension value. Workloads without it are skipped with a warning.
 */
export function buildWorkloadProfiles(
  bucketed: BucketedMetrics,
  names: MetricNames,
  ctx: Pick<CallContext, 'logger'>,
): Map<string, WorkloadProfile> {
  const profiles = new Map<string, WorkloadProfile>();

  for (const [workload, series] of bucketed) {
    const promptPoints = series.get(names.promptTokens) ?? [];
    if (promptPoints.length === 0) {
      ctx.logger.warn({ workload }, 'No prompt-token data for workload; skipping');
      continue;
    }

    const profile = buildWorkloadProfile(promptPoints, series.get(names.generatedTokens) ?? []);
    if (!profile) {
      ctx.logger.warn({ workload }, 'Workload has no requests in the window; skipping');
      continue;
    }
    profiles.set(workload, profile);
  }

  return profiles;
}

/**
 * Ask the provider for the deployable capacity that serves the observed demand.
 *
 * Returns 0 when the provider gave no recommendation; callers must not act on 0.
 * Throws `ValidationError(NO_WORKLOADS)` when no workload yields a profile.
 */
export async function estimateCapacity(
  api: CapacityApi,
  model: ModelInfo,
  skuName: string,
  bucketed: BucketedMetrics,
  names: MetricNames,
  ctx: CallContext,
): Promise<number> {
  const logger = ctx.logger.child({ component: 'estimator' });
  const profiles = buildWorkloadProfiles(bucketed, names, { logger });

  if (profiles.size === 0) {
    throw new ValidationError('NO_WORKLOADS', `No workload with prompt-token usage to estimate ${model.name} capacity from`);
  }

  const request: CapacityRequest = { model, skuName, workloads: [...profiles.values()] };
  logger.info({ model: model.name, skuName, workloads: Object.fromEntries(profiles) }, 'Requesting capacity estimate');

  const capacity = await executeWithRetry(
    'EstimateModelCapacity',
    () => api.estimateModelCapacity(ctx.token, request),
    ctx.retryPolicy,
    { logger, sleep: ctx.sleep },
  );

  if (!Number.isFinite(capacity) || capacity <= 0) {
    logger.warn({ model: model.name, skuName }, 'Provider returned no deployable capacity');
    return 0;
  }
  logger.info({ capacity }, 'Estimated deployable capacity');
  return Math.floor(capacity);
}
