import 'dotenv/config';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRuntime } from './runtime.js';
import { buildServer } from './server.js';
import { errorMessage } from './errors.js';

const start = async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  if (!config.credential) {
    logger.warn('No Azure credential configured. Every trigger will fail until one is set in .env.');
  }
  if (!config.server.triggerSecret) {
    logger.warn('TRIGGER_SECRET is not set. Trigger endpoints accept unauthenticated requests.');
  }

  const { reconciler } = await createRuntime(config, logger);
  const fastify = await buildServer({ logger, reconciler, triggerSecret: config.server.triggerSecret });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  await fastify.listen({ port: config.server.port, host: config.server.host });
};

start().catch((err: unknown) => {
  console.error(`Startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
