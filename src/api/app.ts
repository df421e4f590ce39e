import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { logger as rootLogger, Logger } from '../infra/logging/logger';
import { isAppError, TooManyRequestsError } from '../shared/errors';
import { correlationMiddleware } from './middleware/correlation';
import { adminRoutes, AdminRouteDeps } from './routes/admin';
import { healthRoutes, HealthDeps } from './routes/health';
import { ingestRoutes, IngestDeps } from './routes/ingest';
import { providerRoutes, ProviderRouteDeps } from './routes/providers';

export interface AppDeps {
  apiSecretKey: string;
  corsOrigins: string[];
  webhookSecret?: string;
  db: HealthDeps['db'];
  queue: HealthDeps['queue'] & IngestDeps['queue'];
  patients: AdminRouteDeps['patients'];
  telegram?: AdminRouteDeps['telegram'];
  dashboard: ProviderRouteDeps['dashboard'];
  alerts: ProviderRouteDeps['alerts'];
  logger?: Logger;
}

/**
 * Build the HTTP app without listening, so tests can drive it with `inject`.
 */
export async function buildApp(deps: AppDeps) {
  const log = deps.logger ?? rootLogger;

  const app = Fastify({
    logger: log,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  // CORS for dashboard access
  await app.register(cors, {
    origin: deps.corsOrigins,
    credentials: true,
  });

  await app.register(correlationMiddleware);

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;

    if (error instanceof ZodError) {
      reply.status(400).send({
        success: false,
        error: 'Invalid request',
        details: error.flatten(),
        correlationId,
      });
      return;
    }

    const statusCode = isAppError(error) ? error.statusCode : error.statusCode ?? 500;

    if (statusCode >= 500) {
      request.log.error({
        correlationId,
        error: error.message,
        stack: error.stack,
        statusCode,
      }, 'Request error');
    } else {
      request.log.warn({ correlationId, error: error.message, statusCode }, 'Request rejected');
    }

    if (error instanceof TooManyRequestsError && error.retryAfterSeconds !== undefined) {
      reply.header('retry-after', String(error.retryAfterSeconds));
    }

    // Don't expose internal errors
    const message = statusCode >= 500 ? 'Internal server error' : error.message;

    reply.status(statusCode).send({
      success: false,
      error: message,
      code: isAppError(error) ? error.code : undefined,
      correlationId,
    });
  });

  // Routes
  await app.register(healthRoutes({ db: deps.db, queue: deps.queue }));
  await app.register(ingestRoutes({ queue: deps.queue, webhookSecret: deps.webhookSecret }));
  await app.register(
    adminRoutes({
      apiSecretKey: deps.apiSecretKey,
      patients: deps.patients,
      telegram: deps.telegram,
      webhookSecret: deps.webhookSecret,
    }),
    { prefix: '/admin' }
  );
  await app.register(
    providerRoutes({
      apiSecretKey: deps.apiSecretKey,
      dashboard: deps.dashboard,
      alerts: deps.alerts,
    }),
    { prefix: '/api/providers' }
  );

  return app;
}
