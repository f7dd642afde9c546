import { request } from 'undici';
import type { Dispatcher } from 'undici';
import { ProviderError, errorMessage } from '../errors.js';
import { accessTokenResponseSchema } from '../types/azure.js';
import type { TokenRefresher } from '../types/api.js';

export const ARM_RESOURCE = 'https://management.azure.com/';

export type CredentialConfig =
  | { type: 'static'; token: string }
  | { type: 'managedIdentity'; endpoint: string; header: string; clientId?: string }
  | {
      type: 'clientSecret';
      tenantId: string;
      clientId: string;
      clientSecret: string;
      authorityHost: string;
    };

async function fetchToken(url: string, options: { method: Dispatcher.HttpMethod; headers: Record<string, string>; body?: string }): Promise<string> {
  let response: Dispatcher.ResponseData;
  try {
    response = await request(url, options);
  } catch (err) {
    throw new ProviderError(`Token request failed: ${errorMessage(err)}`, 'Transient', undefined, undefined, { cause: err });
  }

  const text = await response.body.text();
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new ProviderError(
      `Token endpoint returned ${response.statusCode}`,
      response.statusCode >= 500 ? 'Transient' : 'Authentication',
      response.statusCode,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ProviderError('Token endpoint returned a non-JSON body', 'Authentication', response.statusCode, undefined, { cause: err });
  }
  const parsed = accessTokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError('Token endpoint response has no access_token', 'Authentication', response.statusCode);
  }
  return parsed.data.access_token;
}

/**
 * Build the function that acquires a Resource Manager token.
 *
 * The returned function holds no cache: each call hits the identity endpoint
 * and yields a new token string, which the caller passes on explicitly.
 */
export function createTokenRefresher(credential: CredentialConfig, resource: string = ARM_RESOURCE): TokenRefresher {
  switch (credential.type) {
    case 'static':
      return async () => credential.token;

    case 'managedIdentity':
      return async () => {
        const params = new URLSearchParams({ 'resource': resource, 'api-version': '2019-08-01' });
        if (credential.clientId) params.set('client_id', credential.clientId);
        return fetchToken(`${credential.endpoint}?${params.toString()}`, {
          method: 'GET',
          headers: { 'X-IDENTITY-HEADER': credential.header, 'Metadata': 'true' },
        });
      };

    case 'clientSecret':
      return async () => {
        const authority = credential.authorityHost.replace(/\/$/, '');
        const form = new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: credential.clientId,
          client_secret: credential.clientSecret,
          scope: `${resource.replace(/\/$/, '')}/.default`,
        });
        return fetchToken(`${authority}/${encodeURIComponent(credential.tenantId)}/oauth2/v2.0/token`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: form.toString(),
        });
      };
  }
}
