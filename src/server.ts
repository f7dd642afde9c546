import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { registerReconcileRoutes } from './routes/reconcile.js';
import type { ReconcileRouteOptions } from './routes/reconcile.js';

export interface ServerOptions extends ReconcileRouteOptions {
  logger: FastifyBaseLogger;
}

export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ loggerInstance: opts.logger });

  fastify.get('/health', async () => ({ status: 'ok' }));

  await registerReconcileRoutes(fastify, { reconciler: opts.reconciler, triggerSecret: opts.triggerSecret });
  return fastify;
}
