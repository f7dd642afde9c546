/**
 * Resource Manager clients against an in-process mock ARM server.
 *
 * Covers URL and body shapes, error classification from status + ARM code,
 * Automation variable decoding and both token acquisition flows.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { MockArmServer } from './mocks/mock-arm-server.js';
import { CognitiveServicesClient, DEFAULT_COGNITIVE_API_VERSION } from '../src/azure/cognitive.js';
import { MonitorClient } from '../src/azure/monitor.js';
import { AutomationVariableStore, decodeVariableValue } from '../src/azure/automation.js';
import { ARM_RESOURCE, createTokenRefresher } from '../src/azure/credentials.js';
import { buildQueryString } from '../src/azure/arm.js';
import { ProviderError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { GPT4O, IDENTITY } from './fixtures/fakes.js';

const TOKEN = 'test-token';
const ACCOUNT_PATH =
  '/subscriptions/sub-1/resourceGroups/rg-ai/providers/Microsoft.CognitiveServices/accounts/acct-east';

let server: MockArmServer;
let baseURL: string;

beforeAll(async () => {
  server = new MockArmServer({ validToken: TOKEN });
  baseURL = await server.start();
});

afterAll(async () => {
  await server.stop();
});

beforeEach(() => {
  server.requests.length = 0;
  server.deployments.clear();
  server.accounts.clear();
  server.variables.clear();
  server.modelCapacities = [];
});

function cognitive() {
  return new CognitiveServicesClient({ endpoint: `${baseURL}/`, subscriptionId: 'sub-1', apiVersion: DEFAULT_COGNITIVE_API_VERSION });
}

describe('buildQueryString', () => {
  it('encodes values but keeps the OData $ prefix', () => {
    expect(buildQueryString({ 'api-version': '2023-10-01', $filter: "a eq 'b'" })).toBe(
      "api-version=2023-10-01&$filter=a%20eq%20'b'",
    );
  });
});

// ── Deployments ─────────────────────────────────────────────────────────────

describe('CognitiveServicesClient deployments', () => {
  it('returns null for a missing deployment', async () => {
    await expect(cognitive().showDeployment(TOKEN, IDENTITY)).resolves.toBeNull();
    expect(server.lastRequest()).toMatchObject({
      method: 'GET',
      path: `${ACCOUNT_PATH}/deployments/gpt-4o-ptu`,
      query: { 'api-version': '2024-10-01' },
      authorization: 'Bearer test-token',
    });
  });

  it('creates with PUT and reads the deployment back', async () => {
    const client = cognitive();

    const created = await client.createDeployment(TOKEN, IDENTITY, GPT4O, 'ProvisionedManaged', 50);

    expect(created).toEqual({
      identity: IDENTITY,
      model: GPT4O,
      skuName: 'ProvisionedManaged',
      capacity: 50,
      provisioningState: 'Creating',
    });
    expect(server.lastRequest()?.body).toEqual({
      sku: { name: 'ProvisionedManaged', capacity: 50 },
      properties: { model: { format: 'OpenAI', name: 'gpt-4o', version: '2024-08-06' } },
    });
    await expect(client.showDeployment(TOKEN, IDENTITY)).resolves.toMatchObject({
      skuName: 'ProvisionedManaged',
      capacity: 50,
      provisioningState: 'Succeeded',
    });
  });

  it('updates capacity with a PATCH of the SKU only', async () => {
    const client = cognitive();
    await client.createDeployment(TOKEN, IDENTITY, GPT4O, 'ProvisionedManaged', 50);

    const updated = await client.updateDeploymentCapacity(TOKEN, IDENTITY, 'ProvisionedManaged', 80);

    expect(updated.capacity).toBe(80);
    expect(server.lastRequest()).toMatchObject({
      method: 'PATCH',
      body: { sku: { name: 'ProvisionedManaged', capacity: 80 } },
    });
  });

  it('deletes and accepts an empty 204', async () => {
    const client = cognitive();
    await client.createDeployment(TOKEN, IDENTITY, GPT4O, 'ProvisionedManaged', 50);

    await expect(client.deleteDeployment(TOKEN, IDENTITY)).resolves.toBeUndefined();
    await expect(client.showDeployment(TOKEN, IDENTITY)).resolves.toBeNull();
  });

  it('reads the account location', async () => {
    server.accounts.set('rg-ai/acct-east', 'eastus2');
    await expect(cognitive().getAccountLocation(TOKEN, 'rg-ai', 'acct-east')).resolves.toBe('eastus2');
  });
});

// ── Error classification ────────────────────────────────────────────────────

describe('CognitiveServicesClient errors', () => {
  it('classifies a throttled response', async () => {
    server.failNext(429, 'TooManyRequests', 'Rate limit reached');

    const result = cognitive().showDeployment(TOKEN, IDENTITY);
    await expect(result).rejects.toBeInstanceOf(ProviderError);
    await expect(result).rejects.toMatchObject({
      kind: 'Throttled',
      statusCode: 429,
      code: 'TooManyRequests',
      message: `GET ${ACCOUNT_PATH}/deployments/gpt-4o-ptu returned 429 (TooManyRequests): Rate limit reached`,
    });
  });

  it('raises a missing resource group instead of reporting the deployment absent', async () => {
    server.failNext(404, 'ResourceGroupNotFound', "Resource group 'rg-ai' could not be found.");
    await expect(cognitive().showDeployment(TOKEN, IDENTITY)).rejects.toMatchObject({ kind: 'ResourceNotFound' });
  });

  it('classifies quota failures', async () => {
    server.failNext(400, 'InsufficientQuota', 'Quota exceeded');
    await expect(
      cognitive().createDeployment(TOKEN, IDENTITY, GPT4O, 'ProvisionedManaged', 500),
    ).rejects.toMatchObject({ kind: 'QuotaExceeded', statusCode: 400 });
  });

  it('classifies an expired token', async () => {
    await expect(cognitive().showDeployment('stale-token', IDENTITY)).rejects.toMatchObject({
      kind: 'Authentication',
      code: 'ExpiredAuthenticationToken',
    });
  });

  it('classifies a non-JSON 5xx as transient', async () => {
    server.failNext(502);
    await expect(cognitive().showDeployment(TOKEN, IDENTITY)).rejects.toMatchObject({
      kind: 'Transient',
      statusCode: 502,
      code: undefined,
    });
  });
});

// ── Capacity ────────────────────────────────────────────────────────────────

describe('CognitiveServicesClient capacity', () => {
  it('lists available capacity per SKU for the model', async () => {
    server.modelCapacities = [
      { skuName: 'ProvisionedManaged', availableCapacity: 300 },
      { skuName: 'GlobalProvisionedManaged', availableCapacity: 1200 },
    ];

    await expect(cognitive().getModelCapacities(TOKEN, 'eastus', GPT4O)).resolves.toEqual([
      { skuName: 'ProvisionedManaged', availableCapacity: 300 },
      { skuName: 'GlobalProvisionedManaged', availableCapacity: 1200 },
    ]);
    expect(server.lastRequest()).toMatchObject({
      path: '/subscriptions/sub-1/providers/Microsoft.CognitiveServices/locations/eastus/modelCapacities',
      query: { modelFormat: 'OpenAI', modelName: 'gpt-4o', modelVersion: '2024-08-06' },
    });
  });

  it('posts workloads to calculateModelCapacity and returns the deployable value', async () => {
    server.estimatedCapacity = 75;

    const capacity = await cognitive().estimateModelCapacity(TOKEN, {
      model: GPT4O,
      skuName: 'ProvisionedManaged',
      workloads: [{ requestsPerMinute: 12, avgPromptTokens: 900, avgGeneratedTokens: 150 }],
    });

    expect(capacity).toBe(75);
    expect(server.lastRequest()?.body).toEqual({
      model: { format: 'OpenAI', name: 'gpt-4o', version: '2024-08-06' },
      skuName: 'ProvisionedManaged',
      workloads: [{ requestPerMinute: 12, tokensToGeneratePerCall: 150, promptTokensPerCall: 900 }],
    });
  });
});

// ── Monitor ─────────────────────────────────────────────────────────────────

describe('MonitorClient', () => {
  it('queries metrics on the account with timespan, interval and filter', async () => {
    const monitor = new MonitorClient({ endpoint: baseURL, subscriptionId: 'sub-1', apiVersion: '2023-10-01' });
    server.metricsResponse = { value: [{ name: { value: 'ProcessedPromptTokens' }, timeseries: [] }] };

    const response = await monitor.listMetrics(TOKEN, {
      resourceId: monitor.accountResourceId('rg-ai', 'acct-east'),
      metricNames: ['ProcessedPromptTokens', 'GeneratedTokens'],
      startUtc: new Date('2026-03-03T12:00:00Z'),
      endUtc: new Date('2026-03-10T12:00:00Z'),
      interval: 'PT1H',
      aggregations: ['Total', 'Count'],
      filter: "ModelDeploymentName eq 'gpt-4o-ptu'",
    });

    expect(response.value?.[0]?.name?.value).toBe('ProcessedPromptTokens');
    expect(server.lastRequest()).toMatchObject({
      path: `${ACCOUNT_PATH}/providers/Microsoft.Insights/metrics`,
      query: {
        'api-version': '2023-10-01',
        metricnames: 'ProcessedPromptTokens,GeneratedTokens',
        timespan: '2026-03-03T12:00:00.000Z/2026-03-10T12:00:00.000Z',
        interval: 'PT1H',
        aggregation: 'Total,Count',
        $filter: "ModelDeploymentName eq 'gpt-4o-ptu'",
      },
    });
  });
});

// ── Automation variables ────────────────────────────────────────────────────

describe('decodeVariableValue', () => {
  it('unwraps JSON scalars and leaves plain text alone', () => {
    expect(decodeVariableValue('"50"')).toBe('50');
    expect(decodeVariableValue('50')).toBe('50');
    expect(decodeVariableValue('true')).toBe('true');
    expect(decodeVariableValue('"https://open.feishu.cn/open-apis/bot/v2/hook/x"')).toBe(
      'https://open.feishu.cn/open-apis/bot/v2/hook/x',
    );
    expect(decodeVariableValue('plain text')).toBe('plain text');
    expect(decodeVariableValue('{"a":1}')).toBe('{"a":1}');
  });
});

describe('AutomationVariableStore', () => {
  function store() {
    return new AutomationVariableStore(
      { endpoint: baseURL, subscriptionId: 'sub-1', apiVersion: '2023-11-01' },
      'rg-ops',
      'aa-runbooks',
      silentLogger(),
    );
  }

  it('reads and decodes a variable', async () => {
    server.variables.set('BaselineCapacity', { value: '"40"', isEncrypted: false });

    await expect(store().get(TOKEN, 'BaselineCapacity')).resolves.toBe('40');
    expect(server.lastRequest()?.authorization).toBe(`Bearer ${TOKEN}`);
    expect(server.lastRequest()?.path).toBe(
      '/subscriptions/sub-1/resourceGroups/rg-ops/providers/Microsoft.Automation/automationAccounts/aa-runbooks/variables/BaselineCapacity',
    );
  });

  it('treats missing and encrypted variables as absent', async () => {
    server.variables.set('Secret', { isEncrypted: true });

    await expect(store().get(TOKEN, 'Missing')).resolves.toBeUndefined();
    await expect(store().get(TOKEN, 'Secret')).resolves.toBeUndefined();
  });

  it('propagates other failures', async () => {
    server.failNext(503, 'ServiceUnavailable');
    await expect(store().get(TOKEN, 'BaselineCapacity')).rejects.toMatchObject({ kind: 'Transient' });
  });
});

// ── Credentials ─────────────────────────────────────────────────────────────

describe('createTokenRefresher', () => {
  it('returns a static token as-is', async () => {
    await expect(createTokenRefresher({ type: 'static', token: TOKEN })()).resolves.toBe(TOKEN);
  });

  it('calls the managed identity endpoint with the identity header', async () => {
    const refresh = createTokenRefresher({
      type: 'managedIdentity',
      endpoint: `${baseURL}/msi/token`,
      header: 'test-identity-header',
      clientId: 'client-1',
    });

    await expect(refresh()).resolves.toBe('mi-token');
    expect(server.lastRequest()).toMatchObject({
      method: 'GET',
      path: '/msi/token',
      query: { 'resource': ARM_RESOURCE, 'api-version': '2019-08-01', 'client_id': 'client-1' },
      identityHeader: 'test-identity-header',
    });
  });

  it('fails authentication when the identity endpoint refuses', async () => {
    const refresh = createTokenRefresher({ type: 'managedIdentity', endpoint: `${baseURL}/msi/token`, header: 'wrong' });
    await expect(refresh()).rejects.toMatchObject({ kind: 'Authentication', statusCode: 401 });
  });

  it('runs the client credentials flow', async () => {
    const refresh = createTokenRefresher({
      type: 'clientSecret',
      tenantId: 'tenant-1',
      clientId: 'client-1',
      clientSecret: 'test-secret',
      authorityHost: `${baseURL}/`,
    });

    await expect(refresh()).resolves.toBe('sp-token');
    expect(server.lastRequest()).toMatchObject({
      method: 'POST',
      path: '/tenant-1/oauth2/v2.0/token',
      body: {
        grant_type: 'client_credentials',
        client_id: 'client-1',
        client_secret: 'test-secret',
        scope: 'https://management.azure.com/.default',
      },
    });
  });

  it('fails authentication on a rejected client secret', async () => {
    const refresh = createTokenRefresher({
      type: 'clientSecret',
      tenantId: 'tenant-1',
      clientId: 'client-1',
      clientSecret: 'wrong-secret',
      authorityHost: baseURL,
    });
    await expect(refresh()).rejects.toMatchObject({ kind: 'Authentication', statusCode: 400 });
  });

  it('treats identity endpoint 5xx as transient', async () => {
    server.failNext(500);
    const refresh = createTokenRefresher({ type: 'managedIdentity', endpoint: `${baseURL}/msi/token`, header: 'test-identity-header' });
    await expect(refresh()).rejects.toMatchObject({ kind: 'Transient' });
  });
});
