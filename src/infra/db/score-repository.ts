import type {
  MessageQuery,
  NewMessage,
  ScoreReader,
  ScoreRepository,
  ScoreTransaction,
  SessionPatch,
  SessionQuery,
} from '../../domain/scoring/repository';
import { PatientNotFoundError, StorageError } from '../../shared/errors';
import {
  ABANDONED_RESPONSE,
  AWAITING_RESPONSE,
  MessageRecord,
  PatientAggregates,
  PatientRecord,
  SessionRecord,
} from '../../shared/types';
import type { Database, SqlExecutor } from './client';
import { MESSAGE_COLUMNS, MessageRow, PATIENT_COLUMNS, PatientRow, SESSION_COLUMNS, SessionRow, toMessage, toPatient, toSession } from './rows';

/**
 * Score statements bound to one executor: the pool for plain reads, or a
 * transaction client while the patient row is locked.
 */
class PgScoreStatements implements ScoreTransaction {
  constructor(private sql: SqlExecutor) {}

  // ==========================================================================
  // Reads
  // ==========================================================================

  async getPatient(patientId: string): Promise<PatientRecord | null> {
    const row = await this.sql.queryOne<PatientRow>(
      `SELECT ${PATIENT_COLUMNS} FROM patients WHERE id = $1`,
      [patientId]
    );
    return row ? toPatient(row) : null;
  }

  async findSession(patientId: string, date: string): Promise<SessionRecord | null> {
    const row = await this.sql.queryOne<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM sessions WHERE patient_id = $1 AND session_date = $2`,
      [patientId, date]
    );
    return row ? toSession(row) : null;
  }

  async listSessions(patientId: string, query: SessionQuery = {}): Promise<SessionRecord[]> {
    const rows = await this.sql.queryMany<SessionRow>(
      `SELECT * FROM (
         SELECT ${SESSION_COLUMNS} FROM sessions
         WHERE patient_id = $1 AND ($2::date IS NULL OR session_date >= $2::date)
         ORDER BY session_date DESC
         LIMIT $3
       ) recent
       ORDER BY session_day ASC`,
      [patientId, query.fromDate ?? null, query.limit ?? null]
    );
    return rows.map(toSession);
  }

  async findLastScoredSession(patientId: string): Promise<SessionRecord | null> {
    const row = await this.sql.queryOne<SessionRow>(
      `SELECT ${SESSION_COLUMNS} FROM sessions
       WHERE patient_id = $1 AND answered_count > 0
       ORDER BY session_date DESC LIMIT 1`,
      [patientId]
    );
    return row ? toSession(row) : null;
  }

  async findPendingMessage(patientId: string): Promise<MessageRecord | null> {
    const row = await this.sql.queryOne<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE patient_id = $1 AND response = $2
       ORDER BY created_at DESC LIMIT 1`,
      [patientId, AWAITING_RESPONSE]
    );
    return row ? toMessage(row) : null;
  }

  async findMessage(messageId: string): Promise<MessageRecord | null> {
    const row = await this.sql.queryOne<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = $1`,
      [messageId]
    );
    return row ? toMessage(row) : null;
  }

  async listRecentMessages(patientId: string, query: MessageQuery): Promise<MessageRecord[]> {
    const rows = await this.sql.queryMany<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE patient_id = $1 AND ($2::boolean IS NOT TRUE OR score IS NOT NULL)
       ORDER BY created_at DESC
       LIMIT $3`,
      [patientId, query.scoredOnly ?? false, query.limit]
    );
    return rows.map(toMessage);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async insertSession(patientId: string, date: string, sessionScore: number, createdAt: Date): Promise<SessionRecord> {
    const row = await this.sql.queryOne<SessionRow>(
      `INSERT INTO sessions (patient_id, session_date, session_score, created_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${SESSION_COLUMNS}`,
      [patientId, date, sessionScore, createdAt]
    );
    if (!row) throw new StorageError('Session insert returned no row');
    return toSession(row);
  }

  async updateSession(sessionId: string, patch: SessionPatch): Promise<SessionRecord> {
    const row = await this.sql.queryOne<SessionRow>(
      `UPDATE sessions SET
         session_score = COALESCE($2, session_score),
         stage = COALESCE($3, stage),
         answered_count = COALESCE($4, answered_count)
       WHERE id = $1
       RETURNING ${SESSION_COLUMNS}`,
      [sessionId, patch.sessionScore ?? null, patch.stage ?? null, patch.answeredCount ?? null]
    );
    if (!row) throw new StorageError(`Session not found: ${sessionId}`);
    return toSession(row);
  }

  async insertMessage(message: NewMessage): Promise<MessageRecord> {
    const row = await this.sql.queryOne<MessageRow>(
      `INSERT INTO messages (patient_id, session_id, question, response, stage, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${MESSAGE_COLUMNS}`,
      [message.patientId, message.sessionId, message.question, AWAITING_RESPONSE, message.stage, message.createdAt]
    );
    if (!row) throw new StorageError('Message insert returned no row');
    return toMessage(row);
  }

  async markAbandoned(messageId: string): Promise<void> {
    await this.sql.query(
      `UPDATE messages SET response = $2 WHERE id = $1 AND response = $3`,
      [messageId, ABANDONED_RESPONSE, AWAITING_RESPONSE]
    );
  }

  async answerMessage(messageId: string, response: string, score: number, answeredAt: Date): Promise<MessageRecord> {
    const row = await this.sql.queryOne<MessageRow>(
      `UPDATE messages SET response = $2, score = $3, answered_at = $4
       WHERE id = $1
       RETURNING ${MESSAGE_COLUMNS}`,
      [messageId, response, score, answeredAt]
    );
    if (!row) throw new StorageError(`Message not found: ${messageId}`);
    return toMessage(row);
  }

  async listSessionMessageScores(sessionId: string): Promise<number[]> {
    const rows = await this.sql.queryMany<{ score: number }>(
      `SELECT score FROM messages WHERE session_id = $1 AND score IS NOT NULL ORDER BY created_at`,
      [sessionId]
    );
    return rows.map((r) => r.score);
  }

  async updatePatientAggregates(patientId: string, aggregates: PatientAggregates): Promise<void> {
    await this.sql.query(
      `UPDATE patients SET cumulative_score = $2, day_over_day_delta = $3, three_day_delta = $4
       WHERE id = $1`,
      [patientId, aggregates.cumulativeScore, aggregates.dayOverDayDelta, aggregates.threeDayDelta]
    );
  }
}

// ============================================================================
// Repository
// ============================================================================

export class PgScoreRepository implements ScoreRepository {
  private reader: ScoreReader;

  constructor(private db: Database) {
    this.reader = new PgScoreStatements(db);
  }

  async withPatientLock<T>(patientId: string, fn: (tx: ScoreTransaction) => Promise<T>): Promise<T> {
    return this.db.withTransaction(async (sql) => {
      const locked = await sql.queryOne<{ id: string }>(
        'SELECT id FROM patients WHERE id = $1 FOR UPDATE',
        [patientId]
      );
      if (!locked) {
        throw new PatientNotFoundError(patientId);
      }
      return fn(new PgScoreStatements(sql));
    });
  }

  getPatient(patientId: string): Promise<PatientRecord | null> {
    return this.reader.getPatient(patientId);
  }

  findSession(patientId: string, date: string): Promise<SessionRecord | null> {
    return this.reader.findSession(patientId, date);
  }

  listSessions(patientId: string, query?: SessionQuery): Promise<SessionRecord[]> {
    return this.reader.listSessions(patientId, query);
  }

  findLastScoredSession(patientId: string): Promise<SessionRecord | null> {
    return this.reader.findLastScoredSession(patientId);
  }

  findPendingMessage(patientId: string): Promise<MessageRecord | null> {
    return this.reader.findPendingMessage(patientId);
  }

  findMessage(messageId: string): Promise<MessageRecord | null> {
    return this.reader.findMessage(messageId);
  }

  listRecentMessages(patientId: string, query: MessageQuery): Promise<MessageRecord[]> {
    return this.reader.listRecentMessages(patientId, query);
  }
}
