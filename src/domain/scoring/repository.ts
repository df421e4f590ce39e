import type {
  ConversationStage,
  MessageRecord,
  PatientAggregates,
  PatientRecord,
  QuestionStage,
  SessionRecord,
} from '../../shared/types';

export interface SessionQuery {
  /** Inclusive lower bound, YYYY-MM-DD */
  fromDate?: string;
  /** Keep only the most recent N sessions (result stays in ascending date order) */
  limit?: number;
}

export interface MessageQuery {
  limit: number;
  scoredOnly?: boolean;
}

export interface NewMessage {
  patientId: string;
  sessionId: string;
  question: string;
  stage: QuestionStage;
  createdAt: Date;
}

export interface SessionPatch {
  sessionScore?: number;
  stage?: ConversationStage;
  answeredCount?: number;
}

/** Reads usable with or without the patient lock. */
export interface ScoreReader {
  getPatient(patientId: string): Promise<PatientRecord | null>;
  findSession(patientId: string, date: string): Promise<SessionRecord | null>;
  /** Sessions in ascending date order */
  listSessions(patientId: string, query?: SessionQuery): Promise<SessionRecord[]>;
  findLastScoredSession(patientId: string): Promise<SessionRecord | null>;
  findPendingMessage(patientId: string): Promise<MessageRecord | null>;
  findMessage(messageId: string): Promise<MessageRecord | null>;
  /** Newest first */
  listRecentMessages(patientId: string, query: MessageQuery): Promise<MessageRecord[]>;
}

/** Writes, only reachable while the patient row is locked. */
export interface ScoreTransaction extends ScoreReader {
  insertSession(patientId: string, date: string, sessionScore: number, createdAt: Date): Promise<SessionRecord>;
  updateSession(sessionId: string, patch: SessionPatch): Promise<SessionRecord>;
  insertMessage(message: NewMessage): Promise<MessageRecord>;
  markAbandoned(messageId: string): Promise<void>;
  answerMessage(messageId: string, response: string, score: number, answeredAt: Date): Promise<MessageRecord>;
  /** Non-null message scores of one session */
  listSessionMessageScores(sessionId: string): Promise<number[]>;
  updatePatientAggregates(patientId: string, aggregates: PatientAggregates): Promise<void>;
}

export interface ScoreRepository extends ScoreReader {
  /**
   * Run `fn` in one transaction holding the patient's row lock. Everything
   * `fn` writes commits together or not at all. Rejects with
   * PatientNotFoundError when the patient does not exist.
   */
  withPatientLock<T>(patientId: string, fn: (tx: ScoreTransaction) => Promise<T>): Promise<T>;
}
