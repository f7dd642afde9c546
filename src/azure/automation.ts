import { ArmClient } from './arm.js';
import type { ArmClientConfig } from './arm.js';
import { isProviderError } from '../errors.js';
import { automationVariableSchema } from '../types/azure.js';
import type { VariableStore } from '../types/api.js';
import type { Logger } from '../logger.js';

export const DEFAULT_AUTOMATION_API_VERSION = '2023-11-01';

/**
 * Automation variables are stored JSON-encoded: the string 50 is `"50"` on
 * the wire and the number 50 is `50`. Plain text that is not valid JSON is
 * returned unchanged.
 */
export function decodeVariableValue(raw: string): string {
  try {
    const decoded: unknown = JSON.parse(raw);
    if (typeof decoded === 'string') return decoded;
    if (typeof decoded === 'number' || typeof decoded === 'boolean') return String(decoded);
    return raw;
  } catch {
    return raw;
  }
}

/**
 * Read-only view of the variables registered on an Azure Automation account.
 */
export class AutomationVariableStore extends ArmClient implements VariableStore {
  constructor(
    config: ArmClientConfig,
    private readonly resourceGroup: string,
    private readonly automationAccount: string,
    private readonly logger: Logger,
  ) {
    super(config);
  }

  async get(token: string, name: string): Promise<string | undefined> {
    const path =
      `${this.subscriptionPath}/resourceGroups/${encodeURIComponent(this.resourceGroup)}` +
      `/providers/Microsoft.Automation/automationAccounts/${encodeURIComponent(this.automationAccount)}` +
      `/variables/${encodeURIComponent(name)}`;

    try {
      const variable = await this.call(token, { method: 'GET', path }, automationVariableSchema);
      if (variable.properties?.isEncrypted) {
        // ARM never returns encrypted values; only the runbook sandbox can read them.
        this.logger.warn({ variable: name }, 'Automation variable is encrypted and cannot be read over ARM');
        return undefined;
      }
      const raw = variable.properties?.value;
      return raw === undefined ? undefined : decodeVariableValue(raw);
    } catch (err) {
      if (isProviderError(err, 'NotFound', 'ResourceNotFound')) return undefined;
      throw err;
    }
  }
}
