import { executeWithRetry } from './retry.js';
import { ValidationError, errorMessage, isProviderError } from './errors.js';
import { withToken } from './context.js';
import { collectMetrics, lookbackWindow } from './capacity/metrics.js';
import { buildWorkloadProfiles, estimateCapacity } from './capacity/estimator.js';
import { validateAvailability } from './capacity/availability.js';
import { resolveTargetCapacity } from './capacity/target.js';
import type { Alerter } from './alerts/dispatcher.js';
import type { CallContext } from './context.js';
import type { Logger } from './logger.js';
import type { RetryPolicy, Sleep } from './retry.js';
import type {
  CapacityApi,
  DeploymentApi,
  MetricsApi,
  TokenRefresher,
  VariableStore,
} from './types/api.js';
import type {
  BucketedMetrics,
  Deployment,
  DeploymentIdentity,
  DeploymentState,
  EstimateOutcome,
  ReconcileOutcome,
  TargetCapacity,
  TriggerParams,
} from './types/deployment.js';

export interface EstimationSettings {
  enabled: boolean;
  lookbackDays: number;
  startHour: number;
  endHour: number;
  dimension: string;
  promptTokenMetric: string;
  generatedTokenMetric: string;
}

export interface ReconcilerDeps {
  deployments: DeploymentApi;
  capacity: CapacityApi;
  metrics: MetricsApi;
  variables: VariableStore;
  refreshToken: TokenRefresher;
  alert: Alerter;
  logger: Logger;
  retryPolicy: RetryPolicy;
  estimation: EstimationSettings;
  baselineVariable: string;
  /** ARM id of the Cognitive Services account, the scope of its usage metrics. */
  accountResourceId(resourceGroup: string, accountName: string): string;
  sleep?: Sleep;
  now?: () => Date;
}

/**
 * Where `current` stands relative to the target SKU and, when given, capacity.
 */
export function classifyDeploymentState(
  current: Deployment | null,
  skuName: string,
  capacity?: number,
): DeploymentState {
  if (!current) return 'Absent';
  if (current.skuName.toLowerCase() !== skuName.toLowerCase()) return 'PresentMismatchedSku';
  if (capacity !== undefined && current.capacity !== capacity) return 'PresentMismatchedCapacity';
  return 'PresentMatching';
}

function identityOf(params: TriggerParams): DeploymentIdentity {
  return {
    resourceGroup: params.resourceGroup,
    accountName: params.accountName,
    deploymentName: params.deploymentName,
  };
}

/**
 * Drives one deployment toward the state a trigger asks for.
 *
 * Each call reads the deployment fresh, issues at most one mutating request
 * (resubmitted on transient failures), and alerts before re-raising any
 * failure.
 */
export class DeploymentReconciler {
  constructor(private readonly deps: ReconcilerDeps) {}

  async reconcile(params: TriggerParams): Promise<ReconcileOutcome> {
    const logger = this.deps.logger.child({
      action: params.action,
      deployment: params.deploymentName,
      account: params.accountName,
    });
    logger.info({ model: params.model, skuName: params.skuName }, 'Reconciliation started');

    try {
      this.assertDeploymentName(params);
      const ctx = await this.openContext(logger);

      const outcome = await this.apply(params, ctx);
      logger.info({ outcome }, 'Reconciliation finished');
      return outcome;
    } catch (err) {
      logger.error({ err }, 'Reconciliation failed');
      await this.alertFailure(params, err, logger);
      throw err;
    }
  }

  /** Never rejects: the failure being reported is what the caller must see. */
  private async alertFailure(params: TriggerParams, err: unknown, logger: Logger): Promise<void> {
    try {
      await this.deps.alert(
        `Failed to ${params.action} deployment '${params.deploymentName}' on account '${params.accountName}': ${errorMessage(err)}`,
      );
    } catch (alertErr) {
      logger.error({ err: errorMessage(alertErr) }, 'Failure alert could not be sent');
    }
  }

  /**
   * Run the collector and estimator without touching the deployment.
   */
  async estimate(params: Omit<TriggerParams, 'action'>): Promise<EstimateOutcome> {
    const logger = this.deps.logger.child({ operation: 'estimate', deployment: params.deploymentName });
    this.assertDeploymentName(params);
    const ctx = await this.openContext(logger);

    const bucketed = await this.collect(params, ctx);
    const profiles = buildWorkloadProfiles(bucketed, this.metricNames(), ctx);
    const capacity = await estimateCapacity(
      this.deps.capacity,
      params.model,
      params.skuName,
      bucketed,
      this.metricNames(),
      ctx,
    );
    return { deploymentName: params.deploymentName, workloads: Object.fromEntries(profiles), capacity };
  }

  private apply(params: TriggerParams, ctx: CallContext): Promise<ReconcileOutcome> {
    switch (params.action) {
      case 'create':
        return this.create(params, ctx);
      case 'update':
        return this.update(params, ctx);
      case 'delete':
        return this.delete(params, ctx);
    }
  }

  private async create(params: TriggerParams, ctx: CallContext): Promise<ReconcileOutcome> {
    const identity = identityOf(params);
    const current = await this.readCurrent(identity, ctx);

    if (current) {
      const state = classifyDeploymentState(current, params.skuName, params.capacity);
      ctx.logger.info({ state, skuName: current.skuName, capacity: current.capacity }, 'Deployment already exists; create skipped');
      await this.deps.alert(
        `Deployment '${identity.deploymentName}' already exists (${current.skuName}, capacity ${current.capacity}); create skipped.`,
      );
      return {
        action: 'create',
        status: 'skipped',
        deploymentName: identity.deploymentName,
        capacity: current.capacity,
        reason: 'already exists',
      };
    }

    const target = await this.resolveTarget(params, ctx);
    if (!target) return this.skipWithoutTarget('create', params, ctx);
    const location = await this.resolveLocation(params, ctx);
    await validateAvailability(this.deps.capacity, location, params.model, params.skuName, target.capacity, ctx);

    const created = await executeWithRetry(
      'CreateDeployment',
      () => this.deps.deployments.createDeployment(ctx.token, identity, params.model, params.skuName, target.capacity),
      ctx.retryPolicy,
      { logger: ctx.logger, sleep: ctx.sleep },
    );

    await this.deps.alert(
      `Created deployment '${identity.deploymentName}' (${params.model.name} ${params.model.version}, ${params.skuName}) ` +
        `with capacity ${target.capacity} from ${target.source}.`,
    );
    return {
      action: 'create',
      status: 'created',
      deploymentName: identity.deploymentName,
      capacity: created.capacity,
      capacitySource: target.source,
    };
  }

  private async delete(params: TriggerParams, ctx: CallContext): Promise<ReconcileOutcome> {
    const identity = identityOf(params);
    const current = await this.readCurrent(identity, ctx);

    if (!current) {
      ctx.logger.info('Deployment does not exist; delete skipped');
      await this.deps.alert(`Deployment '${identity.deploymentName}' does not exist; delete skipped.`);
      return { action: 'delete', status: 'skipped', deploymentName: identity.deploymentName, reason: 'absent' };
    }

    await executeWithRetry(
      'DeleteDeployment',
      () => this.deps.deployments.deleteDeployment(ctx.token, identity),
      ctx.retryPolicy,
      { logger: ctx.logger, sleep: ctx.sleep },
    );

    await this.deps.alert(`Deleted deployment '${identity.deploymentName}' (was capacity ${current.capacity}).`);
    return {
      action: 'delete',
      status: 'deleted',
      deploymentName: identity.deploymentName,
      previousCapacity: current.capacity,
    };
  }

  private async update(params: TriggerParams, ctx: CallContext): Promise<ReconcileOutcome> {
    const identity = identityOf(params);
    const current = await this.readCurrent(identity, ctx);

    if (!current) {
      throw new ValidationError('DEPLOYMENT_NOT_FOUND', `Deployment '${identity.deploymentName}' does not exist; cannot update it`);
    }
    if (current.model.name && current.model.name !== params.model.name) {
      throw new ValidationError(
        'MODEL_MISMATCH',
        `Deployment '${identity.deploymentName}' serves model '${current.model.name}', not '${params.model.name}'`,
      );
    }
    if (classifyDeploymentState(current, params.skuName) === 'PresentMismatchedSku') {
      throw new ValidationError(
        'SKU_MISMATCH',
        `Deployment '${identity.deploymentName}' has SKU '${current.skuName}' but '${params.skuName}' was requested; SKU cannot change`,
      );
    }

    const target = await this.resolveTarget(params, ctx);
    if (!target) return this.skipWithoutTarget('update', params, ctx);
    if (classifyDeploymentState(current, params.skuName, target.capacity) === 'PresentMatching') {
      ctx.logger.info({ capacity: current.capacity }, 'Capacity already at target; update skipped');
      return {
        action: 'update',
        status: 'skipped',
        deploymentName: identity.deploymentName,
        capacity: current.capacity,
        capacitySource: target.source,
        reason: 'capacity unchanged',
      };
    }

    const location = await this.resolveLocation(params, ctx);
    await validateAvailability(this.deps.capacity, location, params.model, params.skuName, target.capacity, ctx);

    const updated = await this.updateCapacity(identity, params.skuName, target.capacity, ctx);

    await this.deps.alert(
      `Updated deployment '${identity.deploymentName}' capacity from ${current.capacity} to ${target.capacity} (${target.source}).`,
    );
    return {
      action: 'update',
      status: 'updated',
      deploymentName: identity.deploymentName,
      capacity: updated.capacity,
      previousCapacity: current.capacity,
      capacitySource: target.source,
    };
  }

  /**
   * Submit the capacity change; an auth failure earns one token refresh and
   * one more submission.
   */
  private async updateCapacity(
    identity: DeploymentIdentity,
    skuName: string,
    capacity: number,
    ctx: CallContext,
  ): Promise<Deployment> {
    const submit = (c: CallContext, policy: RetryPolicy) =>
      executeWithRetry(
        'UpdateDeploymentCapacity',
        () => this.deps.deployments.updateDeploymentCapacity(c.token, identity, skuName, capacity),
        policy,
        { logger: c.logger, sleep: c.sleep },
      );

    try {
      return await submit(ctx, ctx.retryPolicy);
    } catch (err) {
      if (!isProviderError(err, 'Authentication', 'Authorization')) throw err;
      ctx.logger.warn({ err: errorMessage(err) }, 'Update rejected by auth; refreshing token and retrying once');
      const refreshed = withToken(ctx, await this.deps.refreshToken());
      return submit(refreshed, { ...ctx.retryPolicy, maxAttempts: 1 });
    }
  }

  private assertDeploymentName(params: Pick<TriggerParams, 'deploymentName' | 'model'>): void {
    if (!params.deploymentName.startsWith(params.model.name)) {
      throw new ValidationError(
        'DEPLOYMENT_NAME_MISMATCH',
        `Deployment name '${params.deploymentName}' must start with model name '${params.model.name}'`,
      );
    }
  }

  private async openContext(logger: Logger): Promise<CallContext> {
    const token = await executeWithRetry('AcquireToken', () => this.deps.refreshToken(), this.deps.retryPolicy, {
      logger,
      sleep: this.deps.sleep,
    });
    return { token, logger, retryPolicy: this.deps.retryPolicy, sleep: this.deps.sleep };
  }

  private readCurrent(identity: DeploymentIdentity, ctx: CallContext): Promise<Deployment | null> {
    return executeWithRetry(
      'ShowDeployment',
      () => this.deps.deployments.showDeployment(ctx.token, identity),
      ctx.retryPolicy,
      { logger: ctx.logger, sleep: ctx.sleep },
    );
  }

  private resolveTarget(params: TriggerParams, ctx: CallContext): Promise<TargetCapacity | null> {
    const estimationOn = params.estimate ?? this.deps.estimation.enabled;
    return resolveTargetCapacity(
      params,
      {
        variables: this.deps.variables,
        baselineVariable: this.deps.baselineVariable,
        estimate: estimationOn ? () => this.estimateFromMetrics(params, ctx) : undefined,
      },
      ctx,
    );
  }

  /**
   * `undefined` when the window holds no metrics; a window whose series yield
   * no workload raises NO_WORKLOADS from the estimator.
   */
  private async estimateFromMetrics(params: TriggerParams, ctx: CallContext): Promise<number | undefined> {
    const bucketed = await this.collect(params, ctx);
    if (bucketed.size === 0) {
      ctx.logger.warn('No usage metrics in the window; estimate unavailable');
      return undefined;
    }
    return estimateCapacity(this.deps.capacity, params.model, params.skuName, bucketed, this.metricNames(), ctx);
  }

  private async skipWithoutTarget(
    action: 'create' | 'update',
    params: TriggerParams,
    ctx: CallContext,
  ): Promise<ReconcileOutcome> {
    ctx.logger.warn(`No usable capacity estimate; ${action} skipped`);
    await this.deps.alert(`No usable capacity estimate for deployment '${params.deploymentName}'; ${action} skipped.`);
    return { action, status: 'skipped', deploymentName: params.deploymentName, reason: 'no usable estimate' };
  }

  private collect(params: Omit<TriggerParams, 'action'>, ctx: CallContext): Promise<BucketedMetrics> {
    const settings = this.deps.estimation;
    const now = this.deps.now ?? (() => new Date());
    const workloads = params.workloadDeployments?.length ? params.workloadDeployments : [params.deploymentName];

    return collectMetrics(
      this.deps.metrics,
      {
        resourceId: this.deps.accountResourceId(params.resourceGroup, params.accountName),
        window: lookbackWindow(now(), settings.lookbackDays, settings.startHour, settings.endHour),
        dimensionName: settings.dimension,
        dimensionValues: workloads,
        metricNames: [settings.promptTokenMetric, settings.generatedTokenMetric],
      },
      ctx,
    );
  }

  private metricNames() {
    return {
      promptTokens: this.deps.estimation.promptTokenMetric,
      generatedTokens: this.deps.estimation.generatedTokenMetric,
    };
  }

  private async resolveLocation(params: TriggerParams, ctx: CallContext): Promise<string> {
    if (params.location) return params.location;
    try {
      return await executeWithRetry(
        'GetAccountLocation',
        () => this.deps.deployments.getAccountLocation(ctx.token, params.resourceGroup, params.accountName),
        ctx.retryPolicy,
        { logger: ctx.logger, sleep: ctx.sleep },
      );
    } catch (err) {
      ctx.logger.warn({ err: errorMessage(err) }, 'Could not resolve account location; availability check will be skipped');
      return '';
    }
  }
}
