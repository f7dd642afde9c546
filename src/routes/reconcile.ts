import { ZodError } from 'zod';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ProviderError, ValidationError, errorMessage } from '../errors.js';
import { createTriggerAuth } from '../middleware/triggerAuth.js';
import { parseEstimateRequest, parseTrigger } from '../trigger.js';
import type { DeploymentReconciler } from '../reconciler.js';

export interface ReconcileRouteOptions {
  reconciler: Pick<DeploymentReconciler, 'reconcile' | 'estimate'>;
  triggerSecret?: string;
}

/**
 * HTTP status for a failed trigger. Validation failures are the caller's
 * problem (422); provider failures surface as a bad gateway unless the
 * provider said the target is missing or forbidden.
 */
export function statusForError(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof ValidationError) return err.code === 'DEPLOYMENT_NOT_FOUND' ? 404 : 422;
  if (err instanceof ProviderError) {
    if (err.kind === 'NotFound' || err.kind === 'ResourceNotFound') return 404;
    if (err.kind === 'Authorization') return 403;
    return 502;
  }
  return 500;
}

function errorBody(err: unknown) {
  if (err instanceof ZodError) {
    return {
      error: {
        type: 'invalid_request',
        message: 'Invalid trigger parameters',
        issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      },
    };
  }
  if (err instanceof ValidationError) {
    return { error: { type: 'validation', code: err.code, message: err.message } };
  }
  if (err instanceof ProviderError) {
    return { error: { type: 'provider', kind: err.kind, code: err.code ?? null, message: err.message } };
  }
  return { error: { type: 'internal', message: errorMessage(err) } };
}

/**
 * Trigger endpoints for schedulers and operators.
 *
 * POST /v1/reconcile  body: trigger parameters -> ReconcileOutcome
 * POST /v1/estimate   body: trigger parameters without action -> EstimateOutcome
 */
export async function registerReconcileRoutes(fastify: FastifyInstance, opts: ReconcileRouteOptions): Promise<void> {
  const auth = createTriggerAuth(opts.triggerSecret);

  fastify.post('/v1/reconcile', { preHandler: auth }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const params = parseTrigger(request.body);
      const outcome = await opts.reconciler.reconcile(params);
      return reply.send(outcome);
    } catch (err) {
      request.log.warn({ err: errorMessage(err) }, 'Reconcile trigger failed');
      return reply.code(statusForError(err)).send(errorBody(err));
    }
  });

  fastify.post('/v1/estimate', { preHandler: auth }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const params = parseEstimateRequest(request.body);
      const outcome = await opts.reconciler.estimate(params);
      return reply.send(outcome);
    } catch (err) {
      request.log.warn({ err: errorMessage(err) }, 'Estimate trigger failed');
      return reply.code(statusForError(err)).send(errorBody(err));
    }
  });
}
