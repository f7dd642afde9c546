#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRuntime } from './runtime.js';
import { errorMessage } from './errors.js';
import { parseEstimateRequest, parseTrigger } from './trigger.js';

const USAGE = `Usage:
  ptu-reconciler reconcile <create|update|delete> [options]
  ptu-reconciler estimate [options]

Options:
  --resource-group <name>        Resource group of the account (required)
  --account <name>               Cognitive Services account (required)
  --deployment <name>            Deployment name; must start with the model name (required)
  --model <name>                 Model name (required)
  --model-version <version>      Model version (required)
  --model-format <format>        Model format (default: OpenAI)
  --sku <name>                   SKU, e.g. ProvisionedManaged (required)
  --capacity <n>                 Explicit target capacity
  --capacity-variable <name>     Variable holding the target capacity
  --location <region>            Skip the account location lookup
  --workloads <a,b,...>          Deployments whose usage feeds the estimate
  --estimate / --no-estimate     Override ESTIMATION_ENABLED for this run
`;

const cliOptions = {
  'resource-group': { type: 'string' },
  account: { type: 'string' },
  deployment: { type: 'string' },
  model: { type: 'string' },
  'model-version': { type: 'string' },
  'model-format': { type: 'string' },
  sku: { type: 'string' },
  capacity: { type: 'string' },
  'capacity-variable': { type: 'string' },
  location: { type: 'string' },
  workloads: { type: 'string' },
  estimate: { type: 'boolean' },
  'no-estimate': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({ args: argv, options: cliOptions, allowPositionals: true });
  const [command, action] = positionals;

  if (values.help || !command) {
    process.stdout.write(USAGE);
    return command ? 0 : 1;
  }

  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const { reconciler } = await createRuntime(config, logger);
  const input = {
    action,
    resourceGroup: values['resource-group'],
    accountName: values.account,
    deploymentName: values.deployment,
    modelName: values.model,
    modelVersion: values['model-version'],
    modelFormat: values['model-format'],
    skuName: values.sku,
    capacity: values.capacity,
    capacityVariable: values['capacity-variable'],
    location: values.location,
    workloadDeployments: values.workloads,
    estimate: values['no-estimate'] ? false : values.estimate,
  };

  switch (command) {
    case 'reconcile': {
      const outcome = await reconciler.reconcile(parseTrigger(input));
      process.stdout.write(`${JSON.stringify(outcome, null, 2)}\n`);
      return 0;
    }
    case 'estimate': {
      const outcome = await reconciler.estimate(parseEstimateRequest(input));
      process.stdout.write(`${JSON.stringify(outcome, null, 2)}\n`);
      return 0;
    }
    default:
      process.stderr.write(`Unknown command '${command}'\n\n${USAGE}`);
      return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        process.stderr.write(`${issue.path.join('.')}: ${issue.message}\n`);
      }
    } else {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
    }
    process.exitCode = 1;
  },
);
