/**
 * EchoMind Worker Entry Point
 *
 * Workers:
 * 1. Inbound messages (linking, time preference, help button, scored replies)
 * 2. Scheduled check-ins (first question of the day)
 * 3. Scheduler tick (every SCHEDULER_TICK_MS, enqueues due check-ins)
 */

import { Worker, Job } from 'bullmq';
import { config } from '../config';
import { logger } from '../infra/logging/logger';
import { QUEUE_NAMES } from '../infra/queue/client';
import { createServices } from '../container';
import { toError } from '../shared/errors';
import type { CheckinJobData, InboundJobData, JobResult, TickJobData } from '../shared/types';
import type { TickResult } from '../domain/scheduler/scheduler';
import { createCheckinProcessor, createInboundProcessor, createTickProcessor } from './processor';

const services = createServices(config, logger);
const connection = services.queue.connection;

// ============================================================================
// Worker 1: Inbound Messages
// ============================================================================

const inboundWorker = new Worker<InboundJobData, JobResult>(
  QUEUE_NAMES.inbound,
  createInboundProcessor({
    patients: services.patients,
    engine: services.engine,
    alerts: services.alerts,
    channel: services.telegram,
  }),
  {
    connection,
    concurrency: config.workerConcurrency,
    maxStalledCount: 2,
    stalledInterval: 30000,
    lockDuration: 120000,
    settings: {
      backoffStrategy: (attemptsMade: number) => {
        return Math.min(Math.pow(2, attemptsMade) * 1000, 16000);
      },
    },
  }
);

// ============================================================================
// Worker 2: Check-ins
// ============================================================================

const checkinWorker = new Worker<CheckinJobData, JobResult>(
  QUEUE_NAMES.checkin,
  createCheckinProcessor({ engine: services.engine }),
  {
    connection,
    concurrency: config.workerConcurrency,
    maxStalledCount: 2,
    stalledInterval: 60000,
    lockDuration: 60000,
  }
);

// ============================================================================
// Worker 3: Scheduler tick
// ============================================================================

// One tick at a time across the process
const tickWorker = new Worker<TickJobData, TickResult>(
  QUEUE_NAMES.tick,
  createTickProcessor(services.scheduler),
  {
    connection,
    concurrency: 1,
  }
);

services.queue
  .scheduleTicks(config.schedulerTickMs)
  .catch((err: unknown) => {
    logger.error({ error: toError(err).message }, 'Failed to register scheduler tick');
  });

// ============================================================================
// Event Handlers
// ============================================================================

inboundWorker.on('ready', () => {
  logger.info({ queue: QUEUE_NAMES.inbound, concurrency: config.workerConcurrency }, 'Inbound worker ready');
});

inboundWorker.on('completed', (job: Job<InboundJobData, JobResult>) => {
  logger.info({
    jobId: job.id,
    correlationId: job.data.correlationId,
    duration: Date.now() - job.timestamp,
  }, 'Job completed');
});

inboundWorker.on('failed', (job: Job<InboundJobData, JobResult> | undefined, err: Error) => {
  logger.error({
    jobId: job?.id,
    correlationId: job?.data.correlationId,
    error: err.message,
    stack: err.stack,
    attemptsMade: job?.attemptsMade,
  }, 'Job failed');
});

inboundWorker.on('error', (err: Error) => {
  logger.error({ error: err.message }, 'Worker error');
});

inboundWorker.on('stalled', (jobId: string) => {
  logger.warn({ jobId }, 'Job stalled');
});

checkinWorker.on('ready', () => {
  logger.info({ queue: QUEUE_NAMES.checkin }, 'Check-in worker ready');
});

checkinWorker.on('completed', (job: Job<CheckinJobData, JobResult>) => {
  logger.info({ jobId: job.id, patientId: job.data.patientId }, 'Check-in job completed');
});

checkinWorker.on('failed', (job: Job<CheckinJobData, JobResult> | undefined, err: Error) => {
  logger.error({ jobId: job?.id, patientId: job?.data.patientId, error: err.message }, 'Check-in job failed');
});

tickWorker.on('completed', (_job: Job<TickJobData, TickResult>, result: TickResult) => {
  if (result.due > 0) {
    logger.info({ due: result.due, dispatched: result.dispatched, failed: result.failed }, 'Scheduler tick completed');
  }
});

tickWorker.on('failed', (job: Job<TickJobData, TickResult> | undefined, err: Error) => {
  logger.error({ jobId: job?.id, error: err.message }, 'Scheduler tick failed');
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info({ signal }, 'Worker received shutdown signal');

  try {
    await Promise.all([inboundWorker.pause(), checkinWorker.pause(), tickWorker.pause()]);
    logger.info('Workers paused, waiting for active jobs...');

    const timeout = setTimeout(() => {
      logger.warn('Shutdown timeout, forcing close');
      process.exit(1);
    }, 30000);

    await inboundWorker.close();
    await checkinWorker.close();
    await tickWorker.close();
    clearTimeout(timeout);

    await services.close();

    logger.info('Worker shut down gracefully');
    process.exit(0);
  } catch (err) {
    logger.error({ error: toError(err).message }, 'Error during worker shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

logger.info({ queues: Object.values(QUEUE_NAMES) }, 'Worker starting...');
