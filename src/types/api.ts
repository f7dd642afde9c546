import type { MonitorMetricsResponse } from './azure.js';
import type {
  CapacityRequest,
  Deployment,
  DeploymentIdentity,
  ModelInfo,
} from './deployment.js';

/**
 * Collaborator seams. Every call takes the current bearer token explicitly.
 */

export interface DeploymentApi {
  /** Returns null when the deployment does not exist. */
  showDeployment(token: string, identity: DeploymentIdentity): Promise<Deployment | null>;
  createDeployment(
    token: string,
    identity: DeploymentIdentity,
    model: ModelInfo,
    skuName: string,
    capacity: number,
  ): Promise<Deployment>;
  updateDeploymentCapacity(
    token: string,
    identity: DeploymentIdentity,
    skuName: string,
    capacity: number,
  ): Promise<Deployment>;
  deleteDeployment(token: string, identity: DeploymentIdentity): Promise<void>;
  /** Region of the Cognitive Services account. */
  getAccountLocation(token: string, resourceGroup: string, accountName: string): Promise<string>;
}

export interface ModelCapacity {
  skuName: string;
  availableCapacity: number;
}

export interface CapacityApi {
  getModelCapacities(token: string, location: string, model: ModelInfo): Promise<ModelCapacity[]>;
  /** Recommended deployable capacity, 0 when the provider returned none. */
  estimateModelCapacity(token: string, request: CapacityRequest): Promise<number>;
}

export interface MetricsQuery {
  resourceId: string;
  metricNames: string[];
  startUtc: Date;
  endUtc: Date;
  /** ISO-8601 duration, e.g. PT1H */
  interval: string;
  aggregations: string[];
  filter?: string;
}

export interface MetricsApi {
  listMetrics(token: string, query: MetricsQuery): Promise<MonitorMetricsResponse>;
}

export interface VariableStore {
  get(token: string, name: string): Promise<string | undefined>;
}

/** Returns a freshly acquired access token on every call. */
export type TokenRefresher = () => Promise<string>;
