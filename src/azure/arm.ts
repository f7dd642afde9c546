import { request } from 'undici';
import type { Dispatcher } from 'undici';
import type { z } from 'zod';
import { ProviderError, classifyHttpFailure, errorMessage } from '../errors.js';
import { armErrorBodySchema } from '../types/azure.js';

export interface ArmClientConfig {
  /** Resource Manager base URL, e.g. https://management.azure.com */
  endpoint: string;
  subscriptionId: string;
  apiVersion: string;
}

export interface ArmRequest {
  method: Dispatcher.HttpMethod;
  /** Path below the endpoint, starting with `/subscriptions/...` */
  path: string;
  query?: Record<string, string>;
  body?: unknown;
}

export interface ArmResponse {
  statusCode: number;
  body: unknown;
}

export function buildQueryString(query: Record<string, string>): string {
  return Object.entries(query)
    .map(([key, value]) => `${encodeURIComponent(key).replace(/^%24/, '$')}=${encodeURIComponent(value)}`)
    .join('&');
}

async function readBody(body: Dispatcher.ResponseData['body']): Promise<unknown> {
  const text = await body.text();
  if (text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Base for the Resource Manager clients.
 *
 * Configuration is immutable; the bearer token is an argument of every call so
 * a refreshed token never has to be written back into a shared client.
 */
export abstract class ArmClient {
  protected readonly endpoint: string;

  constructor(protected readonly config: ArmClientConfig) {
    this.endpoint = config.endpoint.replace(/\/$/, '');
  }

  protected get subscriptionPath(): string {
    return `/subscriptions/${encodeURIComponent(this.config.subscriptionId)}`;
  }

  protected accountPath(resourceGroup: string, accountName: string): string {
    return (
      `${this.subscriptionPath}/resourceGroups/${encodeURIComponent(resourceGroup)}` +
      `/providers/Microsoft.CognitiveServices/accounts/${encodeURIComponent(accountName)}`
    );
  }

  /**
   * Send one request. Non-2xx responses and transport failures are raised as
   * `ProviderError` with the kind derived from status and ARM error code.
   */
  protected async send(token: string, req: ArmRequest): Promise<ArmResponse> {
    const query = buildQueryString({ 'api-version': this.config.apiVersion, ...req.query });
    const url = `${this.endpoint}${req.path}?${query}`;

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${token}`,
      'Accept': 'application/json',
    };
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: req.method,
        headers,
        body: req.body !== undefined ? JSON.stringify(req.body) : undefined,
      });
    } catch (err) {
      throw new ProviderError(
        `${req.method} ${req.path} failed: ${errorMessage(err)}`,
        'Transient',
        undefined,
        undefined,
        { cause: err },
      );
    }

    const body = await readBody(response.body);
    if (response.statusCode >= 200 && response.statusCode < 300) {
      return { statusCode: response.statusCode, body };
    }

    const parsed = armErrorBodySchema.safeParse(body);
    const code = parsed.success ? parsed.data.error?.code : undefined;
    const detail = parsed.success ? parsed.data.error?.message : undefined;
    throw new ProviderError(
      `${req.method} ${req.path} returned ${response.statusCode}` +
        (code ? ` (${code})` : '') +
        (detail ? `: ${detail}` : ''),
      classifyHttpFailure(response.statusCode, code),
      response.statusCode,
      code,
    );
  }

  /** `send` plus validation of the success body against `schema`. */
  protected async call<T>(
    token: string,
    req: ArmRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const { body } = await this.send(token, req);
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new ProviderError(
        `${req.method} ${req.path} returned an unexpected body: ${parsed.error.message}`,
        'Unknown',
      );
    }
    return parsed.data;
  }
}
