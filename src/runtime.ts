import { CognitiveServicesClient } from './azure/cognitive.js';
import { MonitorClient } from './azure/monitor.js';
import { AutomationVariableStore } from './azure/automation.js';
import { createTokenRefresher } from './azure/credentials.js';
import { createAlerter } from './alerts/dispatcher.js';
import { DeploymentReconciler } from './reconciler.js';
import { EnvVariableStore } from './variables.js';
import { ConfigError, errorMessage } from './errors.js';
import { retryPolicy } from './retry.js';
import type { AppConfig } from './config.js';
import type { RunContext } from './context.js';
import type { Logger } from './logger.js';
import type { TokenRefresher, VariableStore } from './types/api.js';

export interface Runtime {
  reconciler: DeploymentReconciler;
  run: RunContext;
}

function tokenRefresherFor(config: AppConfig): TokenRefresher {
  if (!config.credential) {
    return async () => {
      throw new ConfigError(
        'No Azure credential configured: set AZURE_ACCESS_TOKEN, IDENTITY_ENDPOINT/IDENTITY_HEADER, or AZURE_TENANT_ID/AZURE_CLIENT_ID/AZURE_CLIENT_SECRET',
      );
    };
  }
  return createTokenRefresher(config.credential);
}

async function resolveWebhookUrl(
  config: AppConfig,
  variables: VariableStore,
  refreshToken: TokenRefresher,
  logger: Logger,
): Promise<string> {
  if (config.alertWebhookUrl) return config.alertWebhookUrl;
  try {
    // Environment variables need no token.
    const token = config.automation ? await refreshToken() : '';
    return (await variables.get(token, config.webhookUrlVariable)) ?? '';
  } catch (err) {
    logger.warn({ variable: config.webhookUrlVariable, err: errorMessage(err) }, 'Could not read webhook URL variable; alerts disabled');
    return '';
  }
}

/**
 * Wire the Azure clients, variable store and alerting for one process.
 */
export async function createRuntime(config: AppConfig, logger: Logger): Promise<Runtime> {
  const refreshToken = tokenRefresherFor(config);
  const arm = { endpoint: config.armEndpoint, subscriptionId: config.subscriptionId };

  const cognitive = new CognitiveServicesClient({ ...arm, apiVersion: config.apiVersions.cognitive });
  const monitor = new MonitorClient({ ...arm, apiVersion: config.apiVersions.monitor });
  const variables: VariableStore = config.automation
    ? new AutomationVariableStore(
        { ...arm, apiVersion: config.apiVersions.automation },
        config.automation.resourceGroup,
        config.automation.accountName,
        logger,
      )
    : new EnvVariableStore();

  const run: RunContext = {
    source: config.runbookName,
    webhookUrl: await resolveWebhookUrl(config, variables, refreshToken, logger),
  };

  const reconciler = new DeploymentReconciler({
    deployments: cognitive,
    capacity: cognitive,
    metrics: monitor,
    variables,
    refreshToken,
    alert: createAlerter(run, { logger }),
    logger,
    retryPolicy: retryPolicy(config.retry),
    estimation: config.estimation,
    baselineVariable: config.baselineCapacityVariable,
    accountResourceId: (resourceGroup, accountName) => monitor.accountResourceId(resourceGroup, accountName),
  });

  return { reconciler, run };
}
