import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { CredentialConfig } from './azure/credentials.js';
import { DEFAULT_COGNITIVE_API_VERSION } from './azure/cognitive.js';
import { DEFAULT_MONITOR_API_VERSION } from './azure/monitor.js';
import { DEFAULT_AUTOMATION_API_VERSION } from './azure/automation.js';

const hour = z.coerce.number().int().min(0).max(23);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const envSchema = z.object({
  AZURE_SUBSCRIPTION_ID: z.string().min(1, 'AZURE_SUBSCRIPTION_ID is required'),
  ARM_ENDPOINT: z.string().url().default('https://management.azure.com'),
  COGNITIVE_API_VERSION: z.string().default(DEFAULT_COGNITIVE_API_VERSION),
  MONITOR_API_VERSION: z.string().default(DEFAULT_MONITOR_API_VERSION),
  AUTOMATION_API_VERSION: z.string().default(DEFAULT_AUTOMATION_API_VERSION),
  AUTOMATION_RESOURCE_GROUP_NAME: optionalString,
  AUTOMATION_ACCOUNT_NAME: optionalString,

  RUNBOOK_NAME: z.string().default('ptu-reconciler'),
  ALERT_WEBHOOK_URL: optionalString,
  WEBHOOK_URL_VARIABLE: z.string().default('WebhookUrl'),
  BASELINE_CAPACITY_VARIABLE: z.string().default('BaselineCapacity'),

  ESTIMATION_ENABLED: booleanFlag.default('true'),
  METRICS_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(93).default(7),
  METRICS_START_HOUR: hour.default(0),
  METRICS_END_HOUR: hour.default(0),
  METRICS_DIMENSION: z.string().default('ModelDeploymentName'),
  PROMPT_TOKEN_METRIC: z.string().default('ProcessedPromptTokens'),
  GENERATED_TOKEN_METRIC: z.string().default('GeneratedTokens'),

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),

  AZURE_ACCESS_TOKEN: optionalString,
  IDENTITY_ENDPOINT: optionalString,
  IDENTITY_HEADER: optionalString,
  AZURE_TENANT_ID: optionalString,
  AZURE_CLIENT_ID: optionalString,
  AZURE_CLIENT_SECRET: optionalString,
  AZURE_AUTHORITY_HOST: z.string().url().default('https://login.microsoftonline.com'),

  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  TRIGGER_SECRET: optionalString,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  subscriptionId: string;
  armEndpoint: string;
  apiVersions: { cognitive: string; monitor: string; automation: string };
  automation?: { resourceGroup: string; accountName: string };
  runbookName: string;
  alertWebhookUrl?: string;
  webhookUrlVariable: string;
  baselineCapacityVariable: string;
  estimation: {
    enabled: boolean;
    lookbackDays: number;
    startHour: number;
    endHour: number;
    dimension: string;
    promptTokenMetric: string;
    generatedTokenMetric: string;
  };
  retry: { maxAttempts: number; initialDelayMs: number; maxDelayMs: number };
  /** Undefined when no credential source is configured; token acquisition then fails. */
  credential?: CredentialConfig;
  server: { port: number; host: string; triggerSecret?: string };
  logLevel: string;
}

type Env = z.infer<typeof envSchema>;

function resolveCredential(env: Env): CredentialConfig | undefined {
  if (env.AZURE_ACCESS_TOKEN) {
    return { type: 'static', token: env.AZURE_ACCESS_TOKEN };
  }
  if (env.IDENTITY_ENDPOINT && env.IDENTITY_HEADER) {
    return {
      type: 'managedIdentity',
      endpoint: env.IDENTITY_ENDPOINT,
      header: env.IDENTITY_HEADER,
      clientId: env.AZURE_CLIENT_ID,
    };
  }
  if (env.AZURE_TENANT_ID && env.AZURE_CLIENT_ID && env.AZURE_CLIENT_SECRET) {
    return {
      type: 'clientSecret',
      tenantId: env.AZURE_TENANT_ID,
      clientId: env.AZURE_CLIENT_ID,
      clientSecret: env.AZURE_CLIENT_SECRET,
      authorityHost: env.AZURE_AUTHORITY_HOST,
    };
  }
  return undefined;
}

/**
 * Validate the environment and build the service configuration.
 * Every failing field is reported in one `ConfigError`.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const env = parsed.data;

  const automation =
    env.AUTOMATION_RESOURCE_GROUP_NAME && env.AUTOMATION_ACCOUNT_NAME
      ? { resourceGroup: env.AUTOMATION_RESOURCE_GROUP_NAME, accountName: env.AUTOMATION_ACCOUNT_NAME }
      : undefined;

  return Object.freeze({
    subscriptionId: env.AZURE_SUBSCRIPTION_ID,
    armEndpoint: env.ARM_ENDPOINT,
    apiVersions: {
      cognitive: env.COGNITIVE_API_VERSION,
      monitor: env.MONITOR_API_VERSION,
      automation: env.AUTOMATION_API_VERSION,
    },
    automation,
    runbookName: env.RUNBOOK_NAME,
    alertWebhookUrl: env.ALERT_WEBHOOK_URL,
    webhookUrlVariable: env.WEBHOOK_URL_VARIABLE,
    baselineCapacityVariable: env.BASELINE_CAPACITY_VARIABLE,
    estimation: {
      enabled: env.ESTIMATION_ENABLED,
      lookbackDays: env.METRICS_LOOKBACK_DAYS,
      startHour: env.METRICS_START_HOUR,
      endHour: env.METRICS_END_HOUR,
      dimension: env.METRICS_DIMENSION,
      promptTokenMetric: env.PROMPT_TOKEN_METRIC,
      generatedTokenMetric: env.GENERATED_TOKEN_METRIC,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
    credential: resolveCredential(env),
    server: { port: env.PORT, host: env.HOST, triggerSecret: env.TRIGGER_SECRET },
    logLevel: env.LOG_LEVEL,
  });
}
