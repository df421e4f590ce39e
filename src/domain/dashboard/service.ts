import { localDate, shiftDate } from '../../shared/dates';
import {
  ForbiddenError,
  PatientNotFoundError,
  ProviderNotFoundError,
} from '../../shared/errors';
import {
  Clock,
  isScoredSession,
  MessageRecord,
  PatientAggregates,
  PatientRecord,
  ProviderRecord,
  systemClock,
} from '../../shared/types';
import { computePatientMetrics, mean, PatientMetrics, toPercent } from '../scoring/aggregates';
import type { ScoreRepository } from '../scoring/repository';
import type { PatientRepository } from '../patients/repository';

const TREND_POINTS = 7;
const RECENT_EXCHANGES = 10;

export interface PatientSummary {
  id: string;
  name: string;
  condition: string | null;
  preferredTime: string | null;
  linked: boolean;
  /** Latest scored reply, 0–100 */
  latestScore: number | null;
  lastCheckin: Date | null;
  /** Mean session score over the last 7 local days, 0–100 */
  weeklyAverage: number | null;
  /** Last scored sessions, oldest first, 0–100 */
  trend: number[];
  aggregates: PatientAggregates;
}

export interface SessionHistoryEntry {
  date: string;
  score: number;
  answeredCount: number;
}

export interface PatientDetail {
  patient: PatientRecord;
  providers: ProviderRecord[];
  history: SessionHistoryEntry[];
  /** Newest first */
  recentMessages: MessageRecord[];
  metrics: PatientMetrics;
}

/**
 * Provider-facing read models. Nothing here writes.
 */
export class DashboardService {
  constructor(
    private patients: PatientRepository,
    private scores: ScoreRepository,
    private clock: Clock = systemClock
  ) {}

  async listPatientsForProvider(providerId: string): Promise<PatientSummary[]> {
    await this.requireProvider(providerId);
    const patients = await this.patients.listPatients({ providerId });
    return Promise.all(patients.map((p) => this.summarize(p)));
  }

  async getPatientDetail(providerId: string, patientId: string): Promise<PatientDetail> {
    await this.requireProvider(providerId);

    const patient = await this.patients.findPatientById(patientId);
    if (!patient) {
      throw new PatientNotFoundError(patientId);
    }
    if (!(await this.patients.isAssigned(providerId, patientId))) {
      throw new ForbiddenError('Patient is not assigned to this provider');
    }

    const [sessions, recentMessages, providers] = await Promise.all([
      this.scores.listSessions(patientId),
      this.scores.listRecentMessages(patientId, { limit: RECENT_EXCHANGES }),
      this.patients.listProvidersForPatient(patientId),
    ]);

    const history = sessions.filter(isScoredSession).map((s) => ({
      date: s.date,
      score: toPercent(s.sessionScore),
      answeredCount: s.answeredCount,
    }));

    return {
      patient,
      providers,
      history,
      recentMessages,
      metrics: computePatientMetrics(history),
    };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async summarize(patient: PatientRecord): Promise<PatientSummary> {
    const today = localDate(patient.timezone, this.clock());

    const [latest, week, recent] = await Promise.all([
      this.scores.listRecentMessages(patient.id, { limit: 1, scoredOnly: true }),
      this.scores.listSessions(patient.id, { fromDate: shiftDate(today, -(TREND_POINTS - 1)) }),
      this.scores.listSessions(patient.id),
    ]);

    const latestMessage = latest[0];
    const weekly = mean(week.filter(isScoredSession).map((s) => s.sessionScore));
    const trend = recent
      .filter(isScoredSession)
      .slice(-TREND_POINTS)
      .map((s) => toPercent(s.sessionScore));

    return {
      id: patient.id,
      name: patient.name,
      condition: patient.condition,
      preferredTime: patient.preferredTime,
      linked: patient.chatId !== null,
      latestScore: latestMessage && latestMessage.score !== null ? toPercent(latestMessage.score) : null,
      lastCheckin: latestMessage?.answeredAt ?? latestMessage?.createdAt ?? null,
      weeklyAverage: weekly !== null ? toPercent(weekly) : null,
      trend,
      aggregates: {
        cumulativeScore: patient.cumulativeScore,
        dayOverDayDelta: patient.dayOverDayDelta,
        threeDayDelta: patient.threeDayDelta,
      },
    };
  }

  private async requireProvider(providerId: string): Promise<ProviderRecord> {
    const provider = await this.patients.findProviderById(providerId);
    if (!provider) {
      throw new ProviderNotFoundError(providerId);
    }
    return provider;
  }
}
