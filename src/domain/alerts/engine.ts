import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { localDate, shiftDate } from '../../shared/dates';
import {
  AlertAlreadyResolvedError,
  ForbiddenError,
  NotFoundError,
  PatientNotFoundError,
  toError,
} from '../../shared/errors';
import {
  AlertRecord,
  AlertStatus,
  AlertType,
  ChatChannel,
  Clock,
  PatientRecord,
  systemClock,
} from '../../shared/types';
import { toPercent } from '../scoring/aggregates';
import type { ScoreRepository } from '../scoring/repository';
import type { PatientRepository } from '../patients/repository';
import type { AlertRepository } from './repository';

export const LOW_SCORE_THRESHOLD = 0.3;
export const DECLINE_THRESHOLD = -0.1;
export const MISSING_CHECKIN_DAYS = 1;

export const PROFESSIONAL_HELP_MESSAGE = 'Patient has requested professional assistance';

/** A row on the provider's alert list; synthetic entries have no id. */
export interface DashboardAlert {
  id: string | null;
  patientId: string;
  patientName: string;
  type: AlertType;
  message: string;
  status: AlertStatus;
  createdAt: Date;
  synthetic: boolean;
}

export interface HelpRequestResult {
  alert: AlertRecord;
  notified: number;
}

export interface DecliningPatient {
  patient: PatientRecord;
  threeDayDelta: number;
}

export interface MissingCheckinPatient {
  patient: PatientRecord;
  /** Date of the last scored session, null when there never was one */
  lastCheckin: string | null;
}

export interface AtRiskQuery {
  providerId?: string;
}

export function lowScoreMessage(score: number): string {
  return `Low sentiment score detected: ${toPercent(score)}%`;
}

export function providerNotification(patientName: string, at: Date, timezone: string): string {
  const time = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).format(at);

  return [
    '🔴 *URGENT: Professional Help Requested*',
    '',
    `Patient: ${patientName}`,
    `Time: ${time}`,
    '',
    'The patient has requested to speak with a healthcare professional. Please reach out to them as soon as possible.',
  ].join('\n');
}

export class AlertEngine {
  private log: Logger;

  constructor(
    private alerts: AlertRepository,
    private patients: PatientRepository,
    private scores: ScoreRepository,
    private channel: ChatChannel,
    private clock: Clock = systemClock,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'alert-engine' });
  }

  // ============================================================================
  // Help Requests
  // ============================================================================

  /**
   * Persist a pending help alert and notify every assigned provider that has
   * a linked chat. A failed notification never undoes the alert.
   */
  async requestProfessionalHelp(patientId: string): Promise<HelpRequestResult> {
    const patient = await this.patients.findPatientById(patientId);
    if (!patient) {
      throw new PatientNotFoundError(patientId);
    }

    const now = this.clock();
    const alert = await this.alerts.create({
      patientId,
      type: 'professional_help',
      message: PROFESSIONAL_HELP_MESSAGE,
      createdAt: now,
    });

    const providers = await this.patients.listProvidersForPatient(patientId);
    const text = providerNotification(patient.name, now, patient.timezone);

    let notified = 0;
    for (const provider of providers) {
      if (!provider.chatId) continue;
      try {
        await this.channel.send(provider.chatId, text);
        notified++;
      } catch (error) {
        this.log.error(
          { patientId, providerId: provider.id, error: toError(error).message },
          'Failed to notify provider'
        );
      }
    }

    this.log.warn(
      { patientId, alertId: alert.id, providers: providers.length, notified },
      'Professional help requested'
    );

    return { alert, notified };
  }

  // ============================================================================
  // Dashboard Alerts
  // ============================================================================

  /**
   * Persisted pending alerts plus low-score entries computed on read. A
   * low-score entry is left out when the patient already has a help alert
   * from the same local day.
   */
  async listPendingAlerts(providerId: string): Promise<DashboardAlert[]> {
    const persisted = await this.alerts.listPending(providerId);
    const patients = await this.patients.listPatients({ providerId });
    const now = this.clock();

    const result: DashboardAlert[] = persisted.map((a) => ({
      id: a.id,
      patientId: a.patientId,
      patientName: a.patientName,
      type: a.type,
      message: a.message,
      status: a.status,
      createdAt: a.createdAt,
      synthetic: false,
    }));

    for (const patient of patients) {
      const today = localDate(patient.timezone, now);
      const session = await this.scores.findSession(patient.id, today);
      if (!session || session.answeredCount === 0 || session.sessionScore >= LOW_SCORE_THRESHOLD) {
        continue;
      }

      const helpRequestedToday = persisted.some(
        (a) =>
          a.patientId === patient.id &&
          a.type === 'professional_help' &&
          localDate(patient.timezone, a.createdAt) === today
      );
      if (helpRequestedToday) continue;

      result.push({
        id: null,
        patientId: patient.id,
        patientName: patient.name,
        type: 'low_sentiment',
        message: lowScoreMessage(session.sessionScore),
        status: 'pending',
        createdAt: session.createdAt,
        synthetic: true,
      });
    }

    return result.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Mark an alert resolved. With `providerId`, the alert's patient must be
   * assigned to that provider.
   */
  async resolveAlert(alertId: string, providerId?: string): Promise<AlertRecord> {
    const existing = await this.alerts.findById(alertId);
    if (!existing) {
      throw new NotFoundError(`Alert not found: ${alertId}`);
    }
    if (providerId !== undefined && !(await this.patients.isAssigned(providerId, existing.patientId))) {
      throw new ForbiddenError('Alert belongs to a patient not assigned to this provider');
    }
    if (existing.status === 'resolved') {
      throw new AlertAlreadyResolvedError(alertId);
    }

    const resolved = await this.alerts.markResolved(alertId, this.clock());
    if (!resolved) {
      // Resolved concurrently between the read and the update
      throw new AlertAlreadyResolvedError(alertId);
    }

    this.log.info({ alertId, patientId: resolved.patientId, providerId }, 'Alert resolved');
    return resolved;
  }

  // ============================================================================
  // At-risk Queries
  // ============================================================================

  async findDecliningPatients(
    query: AtRiskQuery & { threshold?: number } = {}
  ): Promise<DecliningPatient[]> {
    const threshold = query.threshold ?? DECLINE_THRESHOLD;
    const patients = await this.patients.listPatients({ providerId: query.providerId });

    return patients
      .filter((p) => p.threeDayDelta < threshold)
      .sort((a, b) => a.threeDayDelta - b.threeDayDelta)
      .map((patient) => ({ patient, threeDayDelta: patient.threeDayDelta }));
  }

  /**
   * Patients with no scored session on or after `days` days before their
   * local today.
   */
  async findPatientsMissingCheckins(
    query: AtRiskQuery & { days?: number } = {}
  ): Promise<MissingCheckinPatient[]> {
    const days = query.days ?? MISSING_CHECKIN_DAYS;
    const patients = await this.patients.listPatients({ providerId: query.providerId });
    const now = this.clock();

    const missing: MissingCheckinPatient[] = [];
    for (const patient of patients) {
      const cutoff = shiftDate(localDate(patient.timezone, now), -days);
      const last = await this.scores.findLastScoredSession(patient.id);
      if (!last || last.date < cutoff) {
        missing.push({ patient, lastCheckin: last?.date ?? null });
      }
    }

    return missing;
  }
}
