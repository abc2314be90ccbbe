import Fastify, { type FastifyBaseLogger } from 'fastify';
import type { Logger } from './logger.js';
import type { KvStore } from './store.js';
import type { ConnectionLimits } from './tcp/connectionLimits.js';
import { healthRoutes } from './routes/health.js';
import { statsRoutes } from './routes/stats.js';

export interface HttpAppOptions {
  logger: Logger;
  store: KvStore;
  limits: ConnectionLimits;
  isReady: () => boolean;
}

export async function buildHttpApp(options: HttpAppOptions) {
  const loggerInstance: FastifyBaseLogger = options.logger;
  const fastify = Fastify({ loggerInstance });
  await fastify.register(healthRoutes, { isReady: options.isReady });
  await fastify.register(statsRoutes, { store: options.store, limits: options.limits });
  return fastify;
}
