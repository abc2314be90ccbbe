import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import type { KvStore } from '../store.js';
import type { ConnectionLimits } from '../tcp/connectionLimits.js';

/** Read-only view of admission counters and store size. */
export async function statsRoutes(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions & { store: KvStore; limits: ConnectionLimits }
): Promise<void> {
  const { store, limits } = opts;

  fastify.get('/stats', async (_request, reply) => {
    return reply.send({
      connections: limits.snapshot(),
      keys: store.size,
    });
  });
}
