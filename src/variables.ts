import type { VariableStore } from './types/api.js';

export const ENV_VARIABLE_PREFIX = 'PTU_VAR_';

/**
 * Variables from the process environment: `BaselineCapacity` is read from
 * `PTU_VAR_BASELINECAPACITY`.
 */
export class EnvVariableStore implements VariableStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async get(_token: string, name: string): Promise<string | undefined> {
    const value = this.env[`${ENV_VARIABLE_PREFIX}${name.toUpperCase()}`];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }
}

/** Parse a capacity value; anything but a positive integer yields undefined. */
export function parseCapacity(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}
