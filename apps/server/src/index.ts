import * as dotenv from 'dotenv';
dotenv.config();

import { buildAppConfigFromEnv } from './config/app.config';
import { buildServer } from './server';
import { LoggerService } from './services/logger.service';

const logger = new LoggerService();

async function main() {
  const config = buildAppConfigFromEnv();
  const { fastify } = buildServer({ config, logger });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}; closing HTTP server`);
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Failed to close HTTP server', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ port: config.port, host: config.host });
  logger.info(`HTTP server listening on ${config.host}:${config.port}`, {
    templatesDir: config.templatesDir,
    useCache: config.useCache,
  });
}

main().catch((err) => {
  logger.error('Fatal error during startup', err);
  process.exit(1);
});
