import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Bearer check against the shared trigger secret. With no secret configured
 * every request passes.
 */
export function createTriggerAuth(secret: string | undefined) {
  const expected = secret ? digest(secret) : undefined;

  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expected) return undefined;

    const authHeader = request.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      return reply.code(401).send({ error: 'Missing or invalid Authorization header. Expected: Bearer <token>' });
    }

    const presented = digest(authHeader.slice(7).trim());
    if (!timingSafeEqual(presented, expected)) {
      return reply.code(401).send({ error: 'Unauthorized' });
    }
    return undefined;
  };
}
