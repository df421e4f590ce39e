import { randomUUID } from 'crypto';
import type { CheckinJobData } from '../../shared/types';
import type { ConversationEngine } from '../conversation/engine';
import type { CheckinDispatcher, DispatchRequest } from './scheduler';

export interface CheckinJobSink {
  addCheckinJob(data: CheckinJobData, jobId: string): Promise<string>;
}

/**
 * One job id per patient, local day and configured time: the up to three
 * ticks inside the catch window collapse into a single check-in.
 */
export function checkinJobId(request: Pick<DispatchRequest, 'localDate' | 'scheduledTime'> & { patientId: string }): string {
  return `checkin-${request.patientId}-${request.localDate}-${request.scheduledTime.replace(':', '')}`;
}

export class QueueCheckinDispatcher implements CheckinDispatcher {
  constructor(private sink: CheckinJobSink) {}

  async dispatch(request: DispatchRequest): Promise<void> {
    const data: CheckinJobData = {
      type: 'scheduled_checkin',
      correlationId: randomUUID(),
      patientId: request.patient.id,
      localDate: request.localDate,
      scheduledTime: request.scheduledTime,
    };
    await this.sink.addCheckinJob(data, checkinJobId({ ...request, patientId: request.patient.id }));
  }
}

/** Runs the check-in in-process; used when no queue sits between tick and engine. */
export class DirectCheckinDispatcher implements CheckinDispatcher {
  constructor(private engine: Pick<ConversationEngine, 'checkin'>) {}

  async dispatch(request: DispatchRequest): Promise<void> {
    await this.engine.checkin(request.patient.id);
  }
}
