import type { Job } from 'bullmq';
import { logExecution, logger } from '../infra/logging/logger';
import { isOperationalError, isRetryableError, toError } from '../shared/errors';
import type { CheckinJobData, InboundJobData, JobResult, TickJobData } from '../shared/types';
import type { Scheduler, TickResult } from '../domain/scheduler/scheduler';
import { CheckinDeps, handleCheckinJob } from './handlers/checkin';
import { handleInboundMessage, InboundDeps } from './handlers/inbound';

/** The parts of a BullMQ job the processors read */
export type JobLike<T> = Pick<Job<T>, 'id' | 'data' | 'attemptsMade'>;

/**
 * Wrap a handler with a job-scoped logger and the retry decision: transient
 * failures are rethrown for BullMQ to retry, anything else ends the job as failed.
 */
function withJobContext<T extends { correlationId: string }>(
  kind: string,
  handle: (data: T, jobLogger: typeof logger) => Promise<JobResult>
): (job: JobLike<T>) => Promise<JobResult> {
  return async (job) => {
    const startTime = Date.now();
    const { correlationId } = job.data;

    const jobLogger = logger.child({
      jobId: job.id,
      correlationId,
      kind,
      attemptsMade: job.attemptsMade,
    });

    jobLogger.info('Processing job');

    try {
      const result = await handle(job.data, jobLogger);
      jobLogger.info({ duration: Date.now() - startTime, result: result.status, action: result.action }, 'Job processed');
      return result;
    } catch (error) {
      const err = toError(error);

      jobLogger.error({
        duration: Date.now() - startTime,
        error: err.message,
        stack: err.stack,
        operational: isOperationalError(error),
      }, 'Job processing failed');

      if (isRetryableError(error)) {
        throw error; // BullMQ will retry based on settings
      }

      return {
        status: 'failed',
        error: err.message,
        correlationId,
      };
    }
  };
}

export function createInboundProcessor(deps: InboundDeps): (job: JobLike<InboundJobData>) => Promise<JobResult> {
  return withJobContext<InboundJobData>('inbound_message', (data, jobLogger) =>
    handleInboundMessage(data, deps, jobLogger)
  );
}

export function createCheckinProcessor(deps: CheckinDeps): (job: JobLike<CheckinJobData>) => Promise<JobResult> {
  return withJobContext<CheckinJobData>('scheduled_checkin', (data, jobLogger) =>
    handleCheckinJob(data, deps, jobLogger)
  );
}

export function createTickProcessor(scheduler: Pick<Scheduler, 'runTick'>): (job: JobLike<TickJobData>) => Promise<TickResult> {
  return async (job) => logExecution(`tick-${job.id ?? 'manual'}`, 'scheduler_tick', () => scheduler.runTick(new Date()));
}
