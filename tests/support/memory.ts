import { randomUUID } from 'crypto';
import type { AlertRepository, AlertWithPatient, NewAlert } from '../../src/domain/alerts/repository';
import type {
  NewPatient,
  NewProvider,
  PatientFilter,
  PatientRepository,
} from '../../src/domain/patients/repository';
import type {
  MessageQuery,
  NewMessage,
  ScoreRepository,
  ScoreTransaction,
  SessionPatch,
  SessionQuery,
} from '../../src/domain/scoring/repository';
import { PatientNotFoundError, StorageError } from '../../src/shared/errors';
import {
  ABANDONED_RESPONSE,
  AlertRecord,
  AWAITING_RESPONSE,
  ChannelUser,
  MessageRecord,
  PatientAggregates,
  PatientRecord,
  ProviderRecord,
  SessionRecord,
  UserRole,
} from '../../src/shared/types';

interface Stored<T> {
  record: T;
  seq: number;
}

interface Assignment {
  providerId: string;
  patientId: string;
  startDate: string;
}

interface Tables {
  patients: Map<string, PatientRecord>;
  providers: Map<string, ProviderRecord>;
  codes: Map<string, { role: UserRole; userId: string }>;
  assignments: Assignment[];
  sessions: Map<string, Stored<SessionRecord>>;
  messages: Map<string, Stored<MessageRecord>>;
  alerts: Map<string, AlertRecord>;
}

function emptyTables(): Tables {
  return {
    patients: new Map(),
    providers: new Map(),
    codes: new Map(),
    assignments: [],
    sessions: new Map(),
    messages: new Map(),
    alerts: new Map(),
  };
}

function cloneTables(t: Tables): Tables {
  const copyMap = <K, V>(m: Map<K, V>, copy: (v: V) => V): Map<K, V> =>
    new Map([...m].map(([k, v]) => [k, copy(v)]));
  const copyStored = <T>(s: Stored<T>): Stored<T> => ({ record: { ...s.record }, seq: s.seq });

  return {
    patients: copyMap(t.patients, (p) => ({ ...p })),
    providers: copyMap(t.providers, (p) => ({ ...p })),
    codes: copyMap(t.codes, (c) => ({ ...c })),
    assignments: t.assignments.map((a) => ({ ...a })),
    sessions: copyMap(t.sessions, copyStored),
    messages: copyMap(t.messages, copyStored),
    alerts: copyMap(t.alerts, (a) => ({ ...a })),
  };
}

const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);

/**
 * In-process stand-in for the Postgres schema. The three repositories share
 * one set of tables, like the real ones share a database.
 */
export class MemoryDatabase {
  tables: Tables = emptyTables();
  private seq = 0;
  private locks = new Map<string, Promise<unknown>>();

  /** Set to make the next score write inside a transaction throw. */
  failNextWrite: Error | null = null;

  nextSeq(): number {
    return ++this.seq;
  }

  /**
   * Serialize per patient and roll back every table when `fn` throws.
   */
  async withLock<T>(patientId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(patientId) ?? Promise.resolve();
    const run = previous.then(async () => {
      const snapshot = cloneTables(this.tables);
      try {
        return await fn();
      } catch (error) {
        this.tables = snapshot;
        throw error;
      }
    });
    this.locks.set(
      patientId,
      run.catch(() => undefined)
    );
    return run;
  }

  consumeFailure(): void {
    const failure = this.failNextWrite;
    if (failure) {
      this.failNextWrite = null;
      throw failure;
    }
  }
}

// ============================================================================
// Scores
// ============================================================================

class MemoryScoreStatements implements ScoreTransaction {
  constructor(private db: MemoryDatabase) {}

  private get t(): Tables {
    return this.db.tables;
  }

  async getPatient(patientId: string): Promise<PatientRecord | null> {
    const patient = this.t.patients.get(patientId);
    return patient ? { ...patient } : null;
  }

  async findSession(patientId: string, date: string): Promise<SessionRecord | null> {
    for (const { record } of this.t.sessions.values()) {
      if (record.patientId === patientId && record.date === date) return { ...record };
    }
    return null;
  }

  async listSessions(patientId: string, query: SessionQuery = {}): Promise<SessionRecord[]> {
    const sessions = [...this.t.sessions.values()]
      .map((s) => s.record)
      .filter((s) => s.patientId === patientId && (!query.fromDate || s.date >= query.fromDate))
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((s) => ({ ...s }));
    return query.limit !== undefined ? sessions.slice(-query.limit) : sessions;
  }

  async findLastScoredSession(patientId: string): Promise<SessionRecord | null> {
    const scored = (await this.listSessions(patientId)).filter((s) => s.answeredCount > 0);
    return scored[scored.length - 1] ?? null;
  }

  async findPendingMessage(patientId: string): Promise<MessageRecord | null> {
    const pending = this.newestFirst(patientId).filter((m) => m.response === AWAITING_RESPONSE);
    return pending[0] ?? null;
  }

  async findMessage(messageId: string): Promise<MessageRecord | null> {
    const stored = this.t.messages.get(messageId);
    return stored ? { ...stored.record } : null;
  }

  async listRecentMessages(patientId: string, query: MessageQuery): Promise<MessageRecord[]> {
    return this.newestFirst(patientId)
      .filter((m) => !query.scoredOnly || m.score !== null)
      .slice(0, query.limit);
  }

  async insertSession(patientId: string, date: string, sessionScore: number, createdAt: Date): Promise<SessionRecord> {
    this.db.consumeFailure();
    if (await this.findSession(patientId, date)) {
      throw new Error('duplicate key value violates unique constraint "sessions_patient_id_session_date_key"');
    }
    const record: SessionRecord = {
      id: randomUUID(),
      patientId,
      date,
      sessionScore,
      stage: 'not_started',
      answeredCount: 0,
      createdAt,
    };
    this.t.sessions.set(record.id, { record, seq: this.db.nextSeq() });
    return { ...record };
  }

  async updateSession(sessionId: string, patch: SessionPatch): Promise<SessionRecord> {
    this.db.consumeFailure();
    const stored = this.t.sessions.get(sessionId);
    if (!stored) throw new StorageError(`Session not found: ${sessionId}`);
    stored.record = {
      ...stored.record,
      sessionScore: patch.sessionScore ?? stored.record.sessionScore,
      stage: patch.stage ?? stored.record.stage,
      answeredCount: patch.answeredCount ?? stored.record.answeredCount,
    };
    return { ...stored.record };
  }

  async insertMessage(message: NewMessage): Promise<MessageRecord> {
    this.db.consumeFailure();
    if (await this.findPendingMessage(message.patientId)) {
      throw new Error('duplicate key value violates unique constraint "messages_one_pending_per_patient"');
    }
    const record: MessageRecord = {
      id: randomUUID(),
      patientId: message.patientId,
      sessionId: message.sessionId,
      question: message.question,
      response: AWAITING_RESPONSE,
      score: null,
      stage: message.stage,
      createdAt: message.createdAt,
      answeredAt: null,
    };
    this.t.messages.set(record.id, { record, seq: this.db.nextSeq() });
    return { ...record };
  }

  async markAbandoned(messageId: string): Promise<void> {
    this.db.consumeFailure();
    const stored = this.t.messages.get(messageId);
    if (stored && stored.record.response === AWAITING_RESPONSE) {
      stored.record = { ...stored.record, response: ABANDONED_RESPONSE };
    }
  }

  async answerMessage(messageId: string, response: string, score: number, answeredAt: Date): Promise<MessageRecord> {
    this.db.consumeFailure();
    const stored = this.t.messages.get(messageId);
    if (!stored) throw new StorageError(`Message not found: ${messageId}`);
    stored.record = { ...stored.record, response, score, answeredAt };
    return { ...stored.record };
  }

  async listSessionMessageScores(sessionId: string): Promise<number[]> {
    return [...this.t.messages.values()]
      .sort((a, b) => a.seq - b.seq)
      .map((m) => m.record)
      .filter((m) => m.sessionId === sessionId)
      .flatMap((m) => (m.score === null ? [] : [m.score]));
  }

  async updatePatientAggregates(patientId: string, aggregates: PatientAggregates): Promise<void> {
    this.db.consumeFailure();
    const patient = this.t.patients.get(patientId);
    if (patient) {
      this.t.patients.set(patientId, { ...patient, ...aggregates });
    }
  }

  private newestFirst(patientId: string): MessageRecord[] {
    return [...this.t.messages.values()]
      .filter((m) => m.record.patientId === patientId)
      .sort((a, b) => b.record.createdAt.getTime() - a.record.createdAt.getTime() || b.seq - a.seq)
      .map((m) => ({ ...m.record }));
  }
}

export class MemoryScoreRepository extends MemoryScoreStatements implements ScoreRepository {
  constructor(private memory: MemoryDatabase) {
    super(memory);
  }

  withPatientLock<T>(patientId: string, fn: (tx: ScoreTransaction) => Promise<T>): Promise<T> {
    return this.memory.withLock(patientId, async () => {
      if (!this.memory.tables.patients.has(patientId)) {
        throw new PatientNotFoundError(patientId);
      }
      return fn(new MemoryScoreStatements(this.memory));
    });
  }
}

// ============================================================================
// Patients & Providers
// ============================================================================

export class MemoryPatientRepository implements PatientRepository {
  constructor(private db: MemoryDatabase) {}

  private get t(): Tables {
    return this.db.tables;
  }

  async createPatient(input: NewPatient): Promise<PatientRecord> {
    const record: PatientRecord = {
      id: randomUUID(),
      ...input,
      chatId: null,
      cumulativeScore: 0,
      dayOverDayDelta: 0,
      threeDayDelta: 0,
      createdAt: new Date(0),
    };
    this.t.patients.set(record.id, record);
    return { ...record };
  }

  async createProvider(input: NewProvider): Promise<ProviderRecord> {
    const record: ProviderRecord = { id: randomUUID(), ...input, chatId: null, createdAt: new Date(0) };
    this.t.providers.set(record.id, record);
    return { ...record };
  }

  async assignProvider(providerId: string, patientId: string, startDate: string): Promise<void> {
    if (!this.t.assignments.some((a) => a.providerId === providerId && a.patientId === patientId)) {
      this.t.assignments.push({ providerId, patientId, startDate });
    }
  }

  async findPatientById(patientId: string): Promise<PatientRecord | null> {
    const patient = this.t.patients.get(patientId);
    return patient ? { ...patient } : null;
  }

  async findProviderById(providerId: string): Promise<ProviderRecord | null> {
    const provider = this.t.providers.get(providerId);
    return provider ? { ...provider } : null;
  }

  async findUserByChatId(chatId: string): Promise<ChannelUser | null> {
    const patient = [...this.t.patients.values()].find((p) => p.chatId === chatId);
    if (patient) return { role: 'patient', patient: { ...patient } };
    const provider = [...this.t.providers.values()].find((p) => p.chatId === chatId);
    if (provider) return { role: 'provider', provider: { ...provider } };
    return null;
  }

  async listPatients(filter: PatientFilter = {}): Promise<PatientRecord[]> {
    const { providerId } = filter;
    return [...this.t.patients.values()]
      .filter(
        (p) =>
          !providerId || this.t.assignments.some((a) => a.providerId === providerId && a.patientId === p.id)
      )
      .sort(byName)
      .map((p) => ({ ...p }));
  }

  async listSchedulablePatients(): Promise<PatientRecord[]> {
    return [...this.t.patients.values()]
      .filter((p) => p.chatId !== null && p.preferredTime !== null)
      .map((p) => ({ ...p }));
  }

  async listProvidersForPatient(patientId: string): Promise<ProviderRecord[]> {
    return this.t.assignments
      .filter((a) => a.patientId === patientId)
      .flatMap((a) => {
        const provider = this.t.providers.get(a.providerId);
        return provider ? [{ ...provider }] : [];
      })
      .sort(byName);
  }

  async isAssigned(providerId: string, patientId: string): Promise<boolean> {
    return this.t.assignments.some((a) => a.providerId === providerId && a.patientId === patientId);
  }

  async updatePreferredTime(patientId: string, preferredTime: string): Promise<void> {
    const patient = this.t.patients.get(patientId);
    if (patient) this.t.patients.set(patientId, { ...patient, preferredTime });
  }

  async setVerificationCode(role: UserRole, userId: string, code: string): Promise<void> {
    for (const [existing, holder] of this.t.codes) {
      if (holder.userId === userId) this.t.codes.delete(existing);
    }
    this.t.codes.set(code, { role, userId });
  }

  async redeemVerificationCode(code: string, chatId: string): Promise<ChannelUser | null> {
    const holder = this.t.codes.get(code);
    if (!holder) return null;
    this.t.codes.delete(code);

    for (const [id, p] of this.t.patients) {
      if (p.chatId === chatId) this.t.patients.set(id, { ...p, chatId: null });
    }
    for (const [id, p] of this.t.providers) {
      if (p.chatId === chatId) this.t.providers.set(id, { ...p, chatId: null });
    }

    if (holder.role === 'patient') {
      const patient = this.t.patients.get(holder.userId);
      if (patient) this.t.patients.set(holder.userId, { ...patient, chatId });
    } else {
      const provider = this.t.providers.get(holder.userId);
      if (provider) this.t.providers.set(holder.userId, { ...provider, chatId });
    }

    return this.findUserByChatId(chatId);
  }

  /** Test helper: bind a chat without going through a code. */
  linkChat(patientId: string, chatId: string): void {
    const patient = this.t.patients.get(patientId);
    if (patient) this.t.patients.set(patientId, { ...patient, chatId });
  }

  /** Test helper */
  linkProviderChat(providerId: string, chatId: string): void {
    const provider = this.t.providers.get(providerId);
    if (provider) this.t.providers.set(providerId, { ...provider, chatId });
  }

  /** Test helper */
  codeFor(userId: string): string | null {
    for (const [code, holder] of this.t.codes) {
      if (holder.userId === userId) return code;
    }
    return null;
  }
}

// ============================================================================
// Alerts
// ============================================================================

export class MemoryAlertRepository implements AlertRepository {
  constructor(private db: MemoryDatabase) {}

  private get t(): Tables {
    return this.db.tables;
  }

  async create(alert: NewAlert): Promise<AlertRecord> {
    const record: AlertRecord = { id: randomUUID(), ...alert, status: 'pending', resolvedAt: null };
    this.t.alerts.set(record.id, record);
    return { ...record };
  }

  async findById(alertId: string): Promise<AlertRecord | null> {
    const alert = this.t.alerts.get(alertId);
    return alert ? { ...alert } : null;
  }

  async listPending(providerId: string): Promise<AlertWithPatient[]> {
    return [...this.t.alerts.values()]
      .filter(
        (a) =>
          a.status === 'pending' &&
          this.t.assignments.some((x) => x.providerId === providerId && x.patientId === a.patientId)
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((a) => ({ ...a, patientName: this.t.patients.get(a.patientId)?.name ?? '' }));
  }

  async markResolved(alertId: string, resolvedAt: Date): Promise<AlertRecord | null> {
    const alert = this.t.alerts.get(alertId);
    if (!alert || alert.status !== 'pending') return null;
    const resolved: AlertRecord = { ...alert, status: 'resolved', resolvedAt };
    this.t.alerts.set(alertId, resolved);
    return { ...resolved };
  }
}
