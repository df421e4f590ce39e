import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { LocalDateTime, parseTimeOfDay, toLocalDateTime } from '../../shared/dates';
import { toError } from '../../shared/errors';
import type { PatientRecord } from '../../shared/types';
import type { PatientRepository } from '../patients/repository';

/** Minutes either side of the configured minute that still count as due. */
export const MATCH_WINDOW_MINUTES = 1;

export interface DispatchRequest {
  patient: PatientRecord;
  /** Patient-local date of the tick */
  localDate: string;
  /** Configured HH:MM the tick matched */
  scheduledTime: string;
}

/** Hands a due patient over to the conversation engine (directly or via a queue). */
export interface CheckinDispatcher {
  dispatch(request: DispatchRequest): Promise<void>;
}

export interface TickResult {
  at: Date;
  considered: number;
  due: number;
  dispatched: number;
  failed: number;
}

/**
 * Due when the patient is bound to a chat, has a valid preferred time, and the
 * patient-local hour matches with the minute within the window.
 */
export function isDue(patient: PatientRecord, now: Date): boolean {
  if (!patient.chatId || !patient.preferredTime) return false;

  const configured = parseTimeOfDay(patient.preferredTime);
  if (!configured) return false;

  let local: LocalDateTime;
  try {
    local = toLocalDateTime(patient.timezone, now);
  } catch {
    return false;
  }

  return local.hour === configured.hour && Math.abs(local.minute - configured.minute) <= MATCH_WINDOW_MINUTES;
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Minute-tick scheduler. Ticks never overlap: a tick requested while another
 * is running waits for it to finish first.
 */
export class Scheduler {
  private running: Promise<unknown> = Promise.resolve();
  private log: Logger;

  constructor(
    private patients: PatientRepository,
    private dispatcher: CheckinDispatcher,
    private options: { dispatchTimeoutMs: number },
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'scheduler' });
  }

  runTick(now: Date = new Date()): Promise<TickResult> {
    const tick = this.running.then(() => this.tick(now));
    // Keep the chain alive when a tick fails
    this.running = tick.catch((error: unknown) => {
      this.log.error({ error: toError(error).message }, 'Scheduler tick failed');
    });
    return tick;
  }

  private async tick(now: Date): Promise<TickResult> {
    const candidates = await this.patients.listSchedulablePatients();
    const due = candidates.filter((p) => isDue(p, now));

    const outcomes = await Promise.allSettled(
      due.map((patient) => {
        const request: DispatchRequest = {
          patient,
          localDate: toLocalDateTime(patient.timezone, now).date,
          scheduledTime: patient.preferredTime ?? '',
        };
        return withTimeout(
          this.dispatcher.dispatch(request),
          this.options.dispatchTimeoutMs,
          `Dispatch for patient ${patient.id}`
        );
      })
    );

    let failed = 0;
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        failed++;
        this.log.error(
          { patientId: due[i]?.id, error: toError(outcome.reason).message },
          'Check-in dispatch failed'
        );
      }
    });

    const result: TickResult = {
      at: now,
      considered: candidates.length,
      due: due.length,
      dispatched: due.length - failed,
      failed,
    };

    if (due.length > 0) {
      this.log.info(result, 'Scheduler tick dispatched check-ins');
    } else {
      this.log.debug(result, 'Scheduler tick: nobody due');
    }

    return result;
  }
}
