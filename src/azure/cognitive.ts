import { ArmClient } from './arm.js';
import { isProviderError } from '../errors.js';
import {
  armAccountSchema,
  armCalculateCapacityResponseSchema,
  armDeploymentSchema,
  armModelCapacityListSchema,
} from '../types/azure.js';
import type {
  ArmCalculateCapacityRequest,
  ArmDeployment,
  ArmDeploymentPatch,
  ArmDeploymentPut,
} from '../types/azure.js';
import type { CapacityApi, DeploymentApi, ModelCapacity } from '../types/api.js';
import type {
  CapacityRequest,
  Deployment,
  DeploymentIdentity,
  ModelInfo,
} from '../types/deployment.js';

export const DEFAULT_COGNITIVE_API_VERSION = '2024-10-01';

/**
 * Microsoft.CognitiveServices client for deployments and PTU capacity.
 *
 * Routes:
 * - deployments: {account}/deployments/{name} (GET, PUT, PATCH, DELETE)
 * - account:     {account} (GET, for its location)
 * - capacities:  /subscriptions/{sub}/providers/Microsoft.CognitiveServices/locations/{loc}/modelCapacities
 * - estimate:    /subscriptions/{sub}/providers/Microsoft.CognitiveServices/calculateModelCapacity
 */
export class CognitiveServicesClient extends ArmClient implements DeploymentApi, CapacityApi {
  private deploymentPath(identity: DeploymentIdentity): string {
    return (
      `${this.accountPath(identity.resourceGroup, identity.accountName)}` +
      `/deployments/${encodeURIComponent(identity.deploymentName)}`
    );
  }

  async showDeployment(token: string, identity: DeploymentIdentity): Promise<Deployment | null> {
    try {
      const raw = await this.call(token, { method: 'GET', path: this.deploymentPath(identity) }, armDeploymentSchema);
      return toDeployment(identity, raw);
    } catch (err) {
      // A missing deployment is a state, not a failure.
      if (isProviderError(err, 'NotFound')) return null;
      throw err;
    }
  }

  async createDeployment(
    token: string,
    identity: DeploymentIdentity,
    model: ModelInfo,
    skuName: string,
    capacity: number,
  ): Promise<Deployment> {
    const body: ArmDeploymentPut = {
      sku: { name: skuName, capacity },
      properties: {
        model: { format: model.format, name: model.name, version: model.version },
      },
    };
    const raw = await this.call(token, { method: 'PUT', path: this.deploymentPath(identity), body }, armDeploymentSchema);
    return toDeployment(identity, raw, { model, skuName, capacity });
  }

  async updateDeploymentCapacity(
    token: string,
    identity: DeploymentIdentity,
    skuName: string,
    capacity: number,
  ): Promise<Deployment> {
    const body: ArmDeploymentPatch = { sku: { name: skuName, capacity } };
    const raw = await this.call(token, { method: 'PATCH', path: this.deploymentPath(identity), body }, armDeploymentSchema);
    return toDeployment(identity, raw, { skuName, capacity });
  }

  async deleteDeployment(token: string, identity: DeploymentIdentity): Promise<void> {
    await this.send(token, { method: 'DELETE', path: this.deploymentPath(identity) });
  }

  async getAccountLocation(token: string, resourceGroup: string, accountName: string): Promise<string> {
    const account = await this.call(
      token,
      { method: 'GET', path: this.accountPath(resourceGroup, accountName) },
      armAccountSchema,
    );
    return account.location ?? '';
  }

  async getModelCapacities(token: string, location: string, model: ModelInfo): Promise<ModelCapacity[]> {
    const list = await this.call(
      token,
      {
        method: 'GET',
        path: `${this.subscriptionPath}/providers/Microsoft.CognitiveServices/locations/${encodeURIComponent(location)}/modelCapacities`,
        query: { modelFormat: model.format, modelName: model.name, modelVersion: model.version },
      },
      armModelCapacityListSchema,
    );

    const result: ModelCapacity[] = [];
    for (const entry of list.value ?? []) {
      const skuName = entry.properties?.skuName ?? entry.name;
      if (!skuName) continue;
      result.push({ skuName, availableCapacity: entry.properties?.availableCapacity ?? 0 });
    }
    return result;
  }

  async estimateModelCapacity(token: string, capacityRequest: CapacityRequest): Promise<number> {
    const body: ArmCalculateCapacityRequest = {
      model: {
        format: capacityRequest.model.format,
        name: capacityRequest.model.name,
        version: capacityRequest.model.version,
      },
      skuName: capacityRequest.skuName,
      workloads: capacityRequest.workloads.map((w) => ({
        requestPerMinute: w.requestsPerMinute,
        tokensToGeneratePerCall: w.avgGeneratedTokens,
        promptTokensPerCall: w.avgPromptTokens,
      })),
    };
    const result = await this.call(
      token,
      {
        method: 'POST',
        path: `${this.subscriptionPath}/providers/Microsoft.CognitiveServices/calculateModelCapacity`,
        body,
      },
      armCalculateCapacityResponseSchema,
    );
    return result.estimatedCapacity?.deployableValue ?? 0;
  }
}

/**
 * Fields missing from a PUT/PATCH response (ARM may answer 201/202 with a
 * partial body) are filled from what was sent.
 */
function toDeployment(
  identity: DeploymentIdentity,
  raw: ArmDeployment,
  sent: { model?: ModelInfo; skuName?: string; capacity?: number } = {},
): Deployment {
  const model = raw.properties?.model;
  return {
    identity,
    model: {
      name: model?.name ?? sent.model?.name ?? '',
      version: model?.version ?? sent.model?.version ?? '',
      format: model?.format ?? sent.model?.format ?? '',
    },
    skuName: raw.sku?.name ?? sent.skuName ?? '',
    capacity: raw.sku?.capacity ?? sent.capacity ?? 0,
    provisioningState: raw.properties?.provisioningState,
  };
}
