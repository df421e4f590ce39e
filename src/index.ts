import { config } from './config';
import { logger } from './infra/logging/logger';
import { createServices } from './container';
import { buildApp } from './api/app';
import { toError } from './shared/errors';

async function bootstrap() {
  logger.info('Starting EchoMind Core API bootstrap...');

  const services = createServices(config, logger);

  const app = await buildApp({
    apiSecretKey: config.apiSecretKey,
    corsOrigins: config.corsOrigins,
    webhookSecret: config.telegramWebhookSecret,
    db: services.db,
    queue: services.queue,
    patients: services.patients,
    telegram: services.telegram,
    dashboard: services.dashboard,
    alerts: services.alerts,
    logger,
  });

  // Graceful shutdown handler
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await services.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ error: toError(err).message }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port, env: config.nodeEnv }, 'Server started');
}

bootstrap().catch((err: unknown) => {
  logger.error({ error: toError(err).message }, 'Failed to start server');
  process.exit(1);
});
