import { z } from 'zod';

/**
 * Wire shapes of the Azure Resource Manager endpoints this service calls.
 * Only the fields read or written here are declared; unknown keys are dropped.
 */

export const armErrorBodySchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

const armModelSchema = z.object({
  format: z.string().optional(),
  name: z.string().optional(),
  version: z.string().optional(),
});

export const armDeploymentSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  sku: z
    .object({
      name: z.string().optional(),
      capacity: z.number().optional(),
    })
    .optional(),
  properties: z
    .object({
      model: armModelSchema.optional(),
      provisioningState: z.string().optional(),
    })
    .optional(),
});
export type ArmDeployment = z.infer<typeof armDeploymentSchema>;

export interface ArmDeploymentPut {
  sku: { name: string; capacity: number };
  properties: {
    model: { format: string; name: string; version: string };
  };
}

export interface ArmDeploymentPatch {
  sku: { name: string; capacity: number };
}

export const armAccountSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  location: z.string().optional(),
});

export const armModelCapacityListSchema = z.object({
  value: z
    .array(
      z.object({
        name: z.string().optional(),
        location: z.string().optional(),
        properties: z
          .object({
            model: armModelSchema.optional(),
            skuName: z.string().optional(),
            availableCapacity: z.number().optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export interface ArmCalculateCapacityRequest {
  model: { format: string; name: string; version: string };
  skuName: string;
  workloads: Array<{
    requestPerMinute: number;
    tokensToGeneratePerCall: number;
    promptTokensPerCall: number;
  }>;
}

export const armCalculateCapacityResponseSchema = z.object({
  skuName: z.string().optional(),
  estimatedCapacity: z
    .object({
      value: z.number().optional(),
      deployableValue: z.number().optional(),
    })
    .optional(),
});

const localizableSchema = z.object({
  value: z.string().optional(),
  localizedValue: z.string().optional(),
});

export const monitorMetricsResponseSchema = z.object({
  timespan: z.string().optional(),
  interval: z.string().optional(),
  value: z
    .array(
      z.object({
        name: localizableSchema.optional(),
        unit: z.string().optional(),
        timeseries: z
          .array(
            z.object({
              metadatavalues: z
                .array(
                  z.object({
                    name: localizableSchema.optional(),
                    value: z.string().optional(),
                  }),
                )
                .optional(),
              data: z
                .array(
                  z.object({
                    timeStamp: z.string(),
                    total: z.number().optional(),
                    count: z.number().optional(),
                  }),
                )
                .optional(),
            }),
          )
          .optional(),
      }),
    )
    .optional(),
});
export type MonitorMetricsResponse = z.infer<typeof monitorMetricsResponseSchema>;

export const automationVariableSchema = z.object({
  name: z.string().optional(),
  properties: z
    .object({
      value: z.string().optional(),
      isEncrypted: z.boolean().optional(),
    })
    .optional(),
});

export const accessTokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.union([z.string(), z.number()]).optional(),
  token_type: z.string().optional(),
});
