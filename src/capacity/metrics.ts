import { executeWithRetry } from '../retry.js';
import { ValidationError } from '../errors.js';
import type { CallContext } from '../context.js';
import type { MetricsApi, MetricsQuery } from '../types/api.js';
import type { BucketedMetrics, MetricPoint, UsageWindow } from '../types/deployment.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface CollectRequest {
  /** ARM id of the resource emitting the metrics (the Cognitive Services account). */
  resourceId: string;
  window: UsageWindow;
  dimensionName: string;
  dimensionValues: string[];
  metricNames: string[];
}

/**
 * Whether `timestamp` falls inside the daily clock window [startHour, endHour).
 *
 * When `endHour <= startHour` the window runs past midnight, so a point in the
 * early hours belongs to the window that opened the previous evening; both the
 * window opened on the point's own UTC date and the one opened the day before
 * are checked.
 */
export function isInterested(timestamp: Date, startHour: number, endHour: number): boolean {
  const t = timestamp.getTime();
  const day = Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), timestamp.getUTCDate());

  for (const anchor of [day, day - DAY_MS]) {
    const windowStart = anchor + startHour * HOUR_MS;
    const windowEnd = endHour > startHour
      ? anchor + endHour * HOUR_MS
      : anchor + DAY_MS + endHour * HOUR_MS;
    if (windowStart <= t && t < windowEnd) return true;
  }
  return false;
}

/** OData filter selecting any of `values` on `dimension`. */
export function buildDimensionFilter(dimension: string, values: string[]): string {
  return values
    .map((v) => `${dimension} eq '${v.replace(/'/g, "''")}'`)
    .join(' or ');
}

function assertWindow(window: UsageWindow): void {
  const validHour = (h: number) => Number.isInteger(h) && h >= 0 && h <= 23;
  if (!validHour(window.startHour) || !validHour(window.endHour)) {
    throw new ValidationError('INVALID_WINDOW', `Window hours must be integers in 0..23, got ${window.startHour}..${window.endHour}`);
  }
  if (!(window.startUtc.getTime() < window.endUtc.getTime())) {
    throw new ValidationError('INVALID_WINDOW', `Window start ${window.startUtc.toISOString()} is not before end ${window.endUtc.toISOString()}`);
  }
}

/**
 * Fetch hourly Total/Count series for the requested dimension values and keep
 * the positive points that fall inside the daily clock window.
 */
export async function collectMetrics(
  api: MetricsApi,
  req: CollectRequest,
  ctx: CallContext,
): Promise<BucketedMetrics> {
  const logger = ctx.logger.child({ component: 'metrics' });
  const result: BucketedMetrics = new Map();

  assertWindow(req.window);
  if (req.dimensionValues.length === 0) {
    logger.warn('No dimension values requested; skipping metrics query');
    return result;
  }

  const query: MetricsQuery = {
    resourceId: req.resourceId,
    metricNames: req.metricNames,
    startUtc: req.window.startUtc,
    endUtc: req.window.endUtc,
    interval: 'PT1H',
    aggregations: ['Total', 'Count'],
    filter: buildDimensionFilter(req.dimensionName, req.dimensionValues),
  };

  const response = await executeWithRetry(
    'ListMetrics',
    () => api.listMetrics(ctx.token, query),
    ctx.retryPolicy,
    { logger, sleep: ctx.sleep },
  );

  const metrics = response.value ?? [];
  if (metrics.length === 0) {
    logger.warn({ resourceId: req.resourceId }, 'Metrics query returned no data');
    return result;
  }

  // Monitor may return dimension values in a different case than requested.
  const requested = new Map(req.dimensionValues.map((v) => [v.toLowerCase(), v]));
  const dimensionKey = req.dimensionName.toLowerCase();

  for (const metric of metrics) {
    const metricName = metric.name?.value;
    if (!metricName) continue;

    for (const series of metric.timeseries ?? []) {
      const reported = series.metadatavalues?.find((m) => m.name?.value?.toLowerCase() === dimensionKey)?.value;
      const dimensionValue = reported === undefined ? undefined : requested.get(reported.toLowerCase());
      if (dimensionValue === undefined) {
        logger.debug({ metric: metricName, reported }, 'Skipping series without a requested dimension value');
        continue;
      }

      const points: MetricPoint[] = [];
      for (const sample of series.data ?? []) {
        const total = sample.total ?? 0;
        if (total <= 0) continue;
        const timestamp = new Date(sample.timeStamp);
        if (Number.isNaN(timestamp.getTime())) continue;
        if (!isInterested(timestamp, req.window.startHour, req.window.endHour)) continue;
        points.push({ timestamp, total, count: sample.count ?? 0 });
      }
      if (points.length === 0) continue;

      const byMetric = result.get(dimensionValue) ?? new Map<string, MetricPoint[]>();
      byMetric.set(metricName, [...(byMetric.get(metricName) ?? []), ...points]);
      result.set(dimensionValue, byMetric);
    }
  }

  if (result.size === 0) {
    logger.warn({ resourceId: req.resourceId }, 'No metric points fell inside the usage window');
  }
  return result;
}

/**
 * Usage window ending at `now` (truncated to the hour) and reaching back
 * `lookbackDays` whole days.
 */
export function lookbackWindow(now: Date, lookbackDays: number, startHour: number, endHour: number): UsageWindow {
  const endUtc = new Date(Math.floor(now.getTime() / HOUR_MS) * HOUR_MS);
  const startUtc = new Date(endUtc.getTime() - lookbackDays * DAY_MS);
  return { startUtc, endUtc, startHour, endHour };
}
