import type { Logger } from '../../infra/logging/logger';
import type { ConversationEngine } from '../../domain/conversation/engine';
import { ChannelNotBoundError, PatientNotFoundError } from '../../shared/errors';
import type { CheckinJobData, JobResult } from '../../shared/types';

export interface CheckinDeps {
  engine: Pick<ConversationEngine, 'checkin'>;
}

/**
 * Handle a scheduled check-in job: ask the next question of the day.
 * Patients deleted or unlinked since the tick are skipped, not retried.
 */
export async function handleCheckinJob(
  data: CheckinJobData,
  deps: CheckinDeps,
  logger: Logger
): Promise<JobResult> {
  const { patientId, correlationId } = data;

  logger.info({ patientId, localDate: data.localDate, scheduledTime: data.scheduledTime }, 'Processing scheduled check-in');

  try {
    const result = await deps.engine.checkin(patientId);
    logger.info({ patientId, messageId: result.messageId, delivered: result.delivered }, 'Check-in sent');
    return {
      status: result.delivered ? 'completed' : 'failed',
      correlationId,
      action: 'checkin_sent',
    };
  } catch (err) {
    if (err instanceof ChannelNotBoundError || err instanceof PatientNotFoundError) {
      logger.warn({ patientId, code: err.code }, 'Check-in skipped');
      return { status: 'skipped', correlationId, action: 'checkin_skipped', error: err.message };
    }
    throw err;
  }
}
