import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { localDate } from '../../shared/dates';
import {
  isAppError,
  NoPendingMessageError,
  PatientNotFoundError,
  StaleConversationStateError,
  StorageError,
  toError,
} from '../../shared/errors';
import {
  Clock,
  isPending,
  MessageRecord,
  PatientAggregates,
  PatientRecord,
  PLACEHOLDER_SESSION_SCORE,
  QuestionStage,
  SessionRecord,
  systemClock,
} from '../../shared/types';
import { clampScore, computePatientAggregates, mean, roundTo } from './aggregates';
import type { ScoreRepository, ScoreTransaction } from './repository';

export interface RecordQuestionOptions {
  stage: QuestionStage;
  /**
   * Answered count the caller planned against. When set and the session has
   * moved on since, the write is refused with StaleConversationStateError.
   */
  expectedAnsweredCount?: number;
}

export interface ReplyTarget {
  patientId: string;
  /** Answer this message if it is still pending; otherwise the latest pending one */
  messageId?: string;
}

export interface RecordReplyResult {
  message: MessageRecord;
  session: SessionRecord;
  aggregates: PatientAggregates;
}

export interface ConversationSnapshot {
  patient: PatientRecord;
  /** Patient-local date at the time of the read */
  today: string;
  session: SessionRecord | null;
  pending: MessageRecord | null;
}

/**
 * Sessions, messages and the patient trend metrics derived from them.
 *
 * Every write goes through `withPatientLock`, so the pending-message
 * invariant and the aggregates are only ever observed in a consistent state.
 */
export class ScoreStore {
  private log: Logger;

  constructor(
    private repo: ScoreRepository,
    private clock: Clock = systemClock,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'score-store' });
  }

  // ============================================================================
  // Writes
  // ============================================================================

  async getOrCreateSession(patientId: string, date: string): Promise<SessionRecord> {
    return this.mutate(patientId, 'getOrCreateSession', (tx) => this.ensureSession(tx, patientId, date));
  }

  async recordQuestion(
    patientId: string,
    date: string,
    questionText: string,
    options: RecordQuestionOptions
  ): Promise<MessageRecord> {
    return this.mutate(patientId, 'recordQuestion', async (tx) => {
      const session = await this.ensureSession(tx, patientId, date);

      if (
        options.expectedAnsweredCount !== undefined &&
        session.answeredCount !== options.expectedAnsweredCount
      ) {
        throw new StaleConversationStateError(patientId, options.expectedAnsweredCount, session.answeredCount);
      }

      const previous = await tx.findPendingMessage(patientId);
      if (previous) {
        await tx.markAbandoned(previous.id);
        this.log.info({ patientId, messageId: previous.id }, 'Abandoned unanswered question');
      }

      const message = await tx.insertMessage({
        patientId,
        sessionId: session.id,
        question: questionText,
        stage: options.stage,
        createdAt: this.clock(),
      });

      if (session.stage !== options.stage) {
        await tx.updateSession(session.id, { stage: options.stage });
      }

      return message;
    });
  }

  async recordReply(target: ReplyTarget, responseText: string, score: number): Promise<RecordReplyResult> {
    const { patientId } = target;

    return this.mutate(patientId, 'recordReply', async (tx) => {
      let pending: MessageRecord | null = null;

      if (target.messageId) {
        const candidate = await tx.findMessage(target.messageId);
        if (candidate && candidate.patientId === patientId && isPending(candidate)) {
          pending = candidate;
        }
      }

      pending = pending ?? (await tx.findPendingMessage(patientId));
      if (!pending) {
        throw new NoPendingMessageError(patientId);
      }

      const message = await tx.answerMessage(pending.id, responseText, clampScore(score), this.clock());
      const session = await this.refreshSessionScore(tx, pending.sessionId);
      const aggregates = await this.recomputeWithin(tx, patientId);

      return { message, session, aggregates };
    });
  }

  /**
   * Rebuild every session score from its messages, then the patient metrics.
   */
  async recomputeAggregates(patientId: string): Promise<PatientAggregates> {
    return this.mutate(patientId, 'recomputeAggregates', async (tx) => {
      const sessions = await tx.listSessions(patientId);
      for (const session of sessions) {
        await this.refreshSessionScore(tx, session.id, session);
      }
      return this.recomputeWithin(tx, patientId);
    });
  }

  // ============================================================================
  // Reads
  // ============================================================================

  async getConversationSnapshot(patientId: string): Promise<ConversationSnapshot> {
    const patient = await this.repo.getPatient(patientId);
    if (!patient) {
      throw new PatientNotFoundError(patientId);
    }

    const today = this.todayFor(patient);
    const [session, pending] = await Promise.all([
      this.repo.findSession(patientId, today),
      this.repo.findPendingMessage(patientId),
    ]);

    return { patient, today, session, pending };
  }

  findPendingMessage(patientId: string): Promise<MessageRecord | null> {
    return this.repo.findPendingMessage(patientId);
  }

  /** Most recent scored exchanges, oldest first */
  async recentScoredMessages(patientId: string, limit: number): Promise<MessageRecord[]> {
    const newestFirst = await this.repo.listRecentMessages(patientId, { limit, scoredOnly: true });
    return [...newestFirst].reverse();
  }

  todayFor(patient: Pick<PatientRecord, 'timezone'>): string {
    return localDate(patient.timezone, this.clock());
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async ensureSession(tx: ScoreTransaction, patientId: string, date: string): Promise<SessionRecord> {
    const existing = await tx.findSession(patientId, date);
    if (existing) return existing;

    const created = await tx.insertSession(patientId, date, PLACEHOLDER_SESSION_SCORE, this.clock());
    this.log.debug({ patientId, date, sessionId: created.id }, 'Session created');
    return created;
  }

  private async refreshSessionScore(
    tx: ScoreTransaction,
    sessionId: string,
    current?: SessionRecord
  ): Promise<SessionRecord> {
    const scores = await tx.listSessionMessageScores(sessionId);
    const sessionScore = roundTo(mean(scores) ?? PLACEHOLDER_SESSION_SCORE, 4);

    if (current && current.sessionScore === sessionScore && current.answeredCount === scores.length) {
      return current;
    }

    return tx.updateSession(sessionId, { sessionScore, answeredCount: scores.length });
  }

  private async recomputeWithin(tx: ScoreTransaction, patientId: string): Promise<PatientAggregates> {
    const patient = await tx.getPatient(patientId);
    if (!patient) {
      throw new PatientNotFoundError(patientId);
    }

    const sessions = await tx.listSessions(patientId);
    const points = sessions.map((s) => ({ date: s.date, score: s.sessionScore }));

    const aggregates = computePatientAggregates(points, this.todayFor(patient));
    await tx.updatePatientAggregates(patientId, aggregates);

    this.log.debug({ patientId, ...aggregates }, 'Aggregates recomputed');
    return aggregates;
  }

  private async mutate<T>(
    patientId: string,
    action: string,
    fn: (tx: ScoreTransaction) => Promise<T>
  ): Promise<T> {
    try {
      return await this.repo.withPatientLock(patientId, fn);
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      const err = toError(error);
      this.log.error({ patientId, action, error: err.message }, 'Score store write failed');
      throw new StorageError(err.message, err);
    }
  }
}
