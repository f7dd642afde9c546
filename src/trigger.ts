import { z } from 'zod';
import type { TriggerParams } from './types/deployment.js';

const blankToUndefined = (v: unknown) => (v === undefined || v === null || v === '' ? undefined : v);

const name = z.string().trim().min(1);

/**
 * Schedulers hand every parameter over as a string, so numbers, flags and
 * lists are accepted in string form as well.
 */
export const triggerSchema = z.object({
  action: z.enum(['create', 'update', 'delete']),
  resourceGroup: name,
  accountName: name,
  deploymentName: name,
  modelName: name,
  modelVersion: name,
  modelFormat: name.default('OpenAI'),
  skuName: name,
  capacity: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  capacityVariable: z.preprocess(blankToUndefined, name.optional()),
  location: z.preprocess(blankToUndefined, name.optional()),
  workloadDeployments: z.preprocess(
    (v) => (typeof v === 'string' ? v.split(',').map((s) => s.trim()).filter(Boolean) : blankToUndefined(v)),
    z.array(name).optional(),
  ),
  estimate: z.preprocess(
    (v) => (v === 'true' ? true : v === 'false' ? false : blankToUndefined(v)),
    z.boolean().optional(),
  ),
});

export const estimateSchema = triggerSchema.omit({ action: true, capacity: true, capacityVariable: true, estimate: true });

type ParsedTrigger = z.infer<typeof triggerSchema>;

function toParams(p: Omit<ParsedTrigger, 'action' | 'capacity' | 'capacityVariable' | 'estimate'>) {
  return {
    resourceGroup: p.resourceGroup,
    accountName: p.accountName,
    deploymentName: p.deploymentName,
    model: { name: p.modelName, version: p.modelVersion, format: p.modelFormat },
    skuName: p.skuName,
    location: p.location,
    workloadDeployments: p.workloadDeployments,
  };
}

/** Validate raw trigger input; throws `ZodError` listing every bad field. */
export function parseTrigger(input: unknown): TriggerParams {
  const p = triggerSchema.parse(input);
  return {
    ...toParams(p),
    action: p.action,
    capacity: p.capacity,
    capacityVariable: p.capacityVariable,
    estimate: p.estimate,
  };
}

export function parseEstimateRequest(input: unknown): Omit<TriggerParams, 'action'> {
  return toParams(estimateSchema.parse(input));
}
