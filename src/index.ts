import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { KvStore } from './store.js';
import { buildHttpApp } from './app.js';
import { createConnectionLimits } from './tcp/connectionLimits.js';
import { KvServer } from './tcp/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info({ env: config.appEnv }, 'starting');

  const store = new KvStore();
  const limits = createConnectionLimits({
    maxPerAddress: config.maxConnectionsPerIp,
    maxTotal: config.maxConnectionsTotal,
  });

  const kvServer = new KvServer({
    host: config.kvHost,
    port: config.kvPort,
    store,
    limits,
    logger: logger.child({ component: 'tcp' }),
    maxFrameBytes: config.maxFrameBytes,
  });

  const fastify = await buildHttpApp({
    logger,
    store,
    limits,
    isReady: () => kvServer.isRunning(),
  });

  await kvServer.start();
  await fastify.listen({
    host: config.appHost,
    port: config.port,
  });

  const shutdown = async (): Promise<void> => {
    logger.info('shutting down');
    await kvServer.stop();
    await fastify.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
