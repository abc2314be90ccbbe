import type { FastifyInstance, FastifyPluginOptions } from 'fastify';

export async function healthRoutes(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions & { isReady: () => boolean }
): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    return reply.send({
      status: 'ok',
      service: 'kv-gate',
      time: Math.floor(Date.now() / 1000),
    });
  });

  fastify.get('/ready', async (_request, reply) => {
    const ready = opts.isReady();
    return reply.status(ready ? 200 : 503).send({ ready });
  });
}
