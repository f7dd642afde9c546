import { ArmClient } from './arm.js';
import { monitorMetricsResponseSchema } from '../types/azure.js';
import type { MonitorMetricsResponse } from '../types/azure.js';
import type { MetricsApi, MetricsQuery } from '../types/api.js';

export const DEFAULT_MONITOR_API_VERSION = '2023-10-01';

/**
 * Azure Monitor metrics for a single resource:
 * GET {resourceId}/providers/Microsoft.Insights/metrics
 */
export class MonitorClient extends ArmClient implements MetricsApi {
  async listMetrics(token: string, query: MetricsQuery): Promise<MonitorMetricsResponse> {
    const params: Record<string, string> = {
      metricnames: query.metricNames.join(','),
      timespan: `${query.startUtc.toISOString()}/${query.endUtc.toISOString()}`,
      interval: query.interval,
      aggregation: query.aggregations.join(','),
    };
    if (query.filter) {
      params['$filter'] = query.filter;
    }

    const resourceId = query.resourceId.startsWith('/') ? query.resourceId : `/${query.resourceId}`;
    return this.call(
      token,
      { method: 'GET', path: `${resourceId}/providers/Microsoft.Insights/metrics`, query: params },
      monitorMetricsResponseSchema,
    );
  }

  /** ARM id of a Cognitive Services account in this client's subscription. */
  accountResourceId(resourceGroup: string, accountName: string): string {
    return this.accountPath(resourceGroup, accountName);
  }
}
