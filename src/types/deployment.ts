export type ReconcileAction = 'create' | 'update' | 'delete';

export interface DeploymentIdentity {
  resourceGroup: string;
  accountName: string;
  deploymentName: string;
}

export interface ModelInfo {
  name: string;
  version: string;
  /** e.g. "OpenAI" */
  format: string;
}

export interface Deployment {
  identity: DeploymentIdentity;
  model: ModelInfo;
  skuName: string;
  /** Provisioned throughput units. */
  capacity: number;
  provisioningState?: string;
}

export type DeploymentState =
  | 'Absent'
  | 'PresentMatching'
  | 'PresentMismatchedSku'
  | 'PresentMismatchedCapacity';

/**
 * Half-open calendar range `[startUtc, endUtc)` queried for metrics, plus a
 * daily clock window re-applied on every day inside it.
 */
export interface UsageWindow {
  startUtc: Date;
  endUtc: Date;
  startHour: number;
  endHour: number;
}

export interface MetricPoint {
  timestamp: Date;
  total: number;
  count: number;
}

/** dimension value -> metric name -> retained points */
export type BucketedMetrics = Map<string, Map<string, MetricPoint[]>>;

export interface WorkloadProfile {
  requestsPerMinute: number;
  avgPromptTokens: number;
  avgGeneratedTokens: number;
}

export interface CapacityRequest {
  model: ModelInfo;
  skuName: string;
  workloads: WorkloadProfile[];
}

export interface AlertMessage {
  source: string;
  body: string;
  timestamp: Date;
}

export interface TriggerParams {
  action: ReconcileAction;
  resourceGroup: string;
  accountName: string;
  deploymentName: string;
  model: ModelInfo;
  skuName: string;
  /** Explicit target; wins over every other source. */
  capacity?: number;
  /** Name of a configuration variable holding a computed capacity. */
  capacityVariable?: string;
  /** Azure region of the account; looked up when omitted. */
  location?: string;
  /** Deployments whose traffic drives the estimate; defaults to `deploymentName`. */
  workloadDeployments?: string[];
  /** Overrides the configured estimation switch for this run. */
  estimate?: boolean;
}

export type CapacitySource = 'explicit' | 'variable' | 'estimate' | 'baseline';

export interface TargetCapacity {
  capacity: number;
  source: CapacitySource;
}

export type ReconcileStatus = 'created' | 'updated' | 'deleted' | 'skipped';

export interface ReconcileOutcome {
  action: ReconcileAction;
  status: ReconcileStatus;
  deploymentName: string;
  capacity?: number;
  previousCapacity?: number;
  capacitySource?: CapacitySource;
  reason?: string;
}

export interface EstimateOutcome {
  deploymentName: string;
  workloads: Record<string, WorkloadProfile>;
  capacity: number;
}
