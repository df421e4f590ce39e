import { Queue } from 'bullmq';
import Redis from 'ioredis';
import { logger as rootLogger, Logger } from '../logging/logger';
import type { CheckinJobData, InboundJobData, TickJobData } from '../../shared/types';

export const QUEUE_NAMES = {
  inbound: 'echomind-inbound',
  checkin: 'echomind-checkin',
  tick: 'echomind-scheduler',
} as const;

const TICK_JOB_ID = 'scheduler-tick';

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: boolean;
}

export function createRedisConnection(url: string, log: Logger = rootLogger): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: null, // Required for BullMQ
    enableReadyCheck: false,
    retryStrategy: (times: number) => {
      if (times > 20) {
        log.error('Redis connection failed after 20 retries');
        return null; // Stop retrying
      }
      return Math.min(times * 100, 3000);
    },
    reconnectOnError: (err) => {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
      return targetErrors.some((e) => err.message.includes(e));
    },
  });

  redis.on('connect', () => {
    log.info('Redis connected');
  });

  redis.on('error', (err) => {
    log.error({ error: err.message }, 'Redis error');
  });

  redis.on('close', () => {
    log.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Producers for the three queues, sharing one Redis connection.
 */
export class QueueClient {
  readonly inbound: Queue<InboundJobData>;
  readonly checkin: Queue<CheckinJobData>;
  readonly tick: Queue<TickJobData>;
  private log: Logger;

  constructor(
    readonly connection: Redis,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'queue' });

    this.inbound = new Queue<InboundJobData>(QUEUE_NAMES.inbound, {
      connection,
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 1000 },
        removeOnComplete: { count: 1000, age: 3600 },
        removeOnFail: { count: 5000, age: 86400 },
      },
    });

    this.checkin = new Queue<CheckinJobData>(QUEUE_NAMES.checkin, {
      connection,
      defaultJobOptions: {
        attempts: 2,
        backoff: { type: 'exponential', delay: 5000 },
        // Kept for a day so a duplicate job id within the catch window is ignored
        removeOnComplete: { age: 86400 },
        removeOnFail: { age: 86400 },
      },
    });

    this.tick = new Queue<TickJobData>(QUEUE_NAMES.tick, {
      connection,
      defaultJobOptions: {
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 1000 },
      },
    });
  }

  // ============================================================================
  // Producers
  // ============================================================================

  /** `jobId` makes redelivered webhooks idempotent */
  async addInboundJob(data: InboundJobData, jobId: string): Promise<string> {
    const job = await this.inbound.add(data.type, data, { jobId });

    this.log.info({ jobId: job.id, correlationId: data.correlationId, chatId: data.chatId }, 'Inbound job queued');
    return job.id ?? jobId;
  }

  async addCheckinJob(data: CheckinJobData, jobId: string): Promise<string> {
    const job = await this.checkin.add(data.type, data, { jobId });

    this.log.info({ jobId: job.id, patientId: data.patientId }, 'Check-in job queued');
    return job.id ?? jobId;
  }

  /** Register the repeatable scheduler tick. Safe to call on every start. */
  async scheduleTicks(everyMs: number): Promise<void> {
    await this.tick.add(
      'scheduler_tick',
      { type: 'scheduler_tick' },
      { repeat: { every: everyMs }, jobId: TICK_JOB_ID }
    );
    this.log.info({ everyMs }, 'Scheduler tick registered');
  }

  // ============================================================================
  // Stats & Health
  // ============================================================================

  async getQueueStats(): Promise<QueueStats> {
    const [waiting, active, completed, failed, delayed, paused] = await Promise.all([
      this.inbound.getWaitingCount(),
      this.inbound.getActiveCount(),
      this.inbound.getCompletedCount(),
      this.inbound.getFailedCount(),
      this.inbound.getDelayedCount(),
      this.inbound.isPaused(),
    ]);

    return { waiting, active, completed, failed, delayed, paused };
  }

  async checkHealth(): Promise<{ healthy: boolean; latencyMs: number }> {
    const start = Date.now();

    try {
      await this.connection.ping();
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      this.log.warn({ error }, 'Redis health check failed');
      return { healthy: false, latencyMs: Date.now() - start };
    }
  }

  async close(): Promise<void> {
    await Promise.all([this.inbound.close(), this.checkin.close(), this.tick.close()]);
    await this.connection.quit();
    this.log.info('Redis connections closed');
  }
}
