import type {
  NewPatient,
  NewProvider,
  PatientFilter,
  PatientRepository,
} from '../../domain/patients/repository';
import { StorageError } from '../../shared/errors';
import type { ChannelUser, PatientRecord, ProviderRecord, UserRole } from '../../shared/types';
import type { Database, SqlExecutor } from './client';
import { PATIENT_COLUMNS, PatientRow, PROVIDER_COLUMNS, ProviderRow, toPatient, toProvider } from './rows';

const USER_TABLES: Record<UserRole, string> = {
  patient: 'patients',
  provider: 'providers',
};

export class PgPatientRepository implements PatientRepository {
  constructor(private db: Database) {}

  // ============================================================================
  // Registration
  // ============================================================================

  async createPatient(input: NewPatient): Promise<PatientRecord> {
    const row = await this.db.queryOne<PatientRow>(
      `INSERT INTO patients (name, email, condition, timezone, preferred_time)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PATIENT_COLUMNS}`,
      [input.name, input.email, input.condition, input.timezone, input.preferredTime]
    );
    if (!row) throw new StorageError('Patient insert returned no row');
    return toPatient(row);
  }

  async createProvider(input: NewProvider): Promise<ProviderRecord> {
    const row = await this.db.queryOne<ProviderRow>(
      `INSERT INTO providers (name, email, specialty, license_number, institution)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PROVIDER_COLUMNS}`,
      [input.name, input.email, input.specialty, input.licenseNumber, input.institution]
    );
    if (!row) throw new StorageError('Provider insert returned no row');
    return toProvider(row);
  }

  async assignProvider(providerId: string, patientId: string, startDate: string): Promise<void> {
    await this.db.query(
      `INSERT INTO provider_patients (provider_id, patient_id, start_date)
       VALUES ($1, $2, $3)
       ON CONFLICT (provider_id, patient_id) DO NOTHING`,
      [providerId, patientId, startDate]
    );
  }

  // ============================================================================
  // Lookups
  // ============================================================================

  async findPatientById(patientId: string): Promise<PatientRecord | null> {
    const row = await this.db.queryOne<PatientRow>(
      `SELECT ${PATIENT_COLUMNS} FROM patients WHERE id = $1`,
      [patientId]
    );
    return row ? toPatient(row) : null;
  }

  async findProviderById(providerId: string): Promise<ProviderRecord | null> {
    const row = await this.db.queryOne<ProviderRow>(
      `SELECT ${PROVIDER_COLUMNS} FROM providers WHERE id = $1`,
      [providerId]
    );
    return row ? toProvider(row) : null;
  }

  async findUserByChatId(chatId: string): Promise<ChannelUser | null> {
    return findByColumn(this.db, 'chat_id', chatId);
  }

  async listPatients(filter: PatientFilter = {}): Promise<PatientRecord[]> {
    const rows = filter.providerId
      ? await this.db.queryMany<PatientRow>(
          `SELECT ${prefixed('p', PATIENT_COLUMNS)} FROM patients p
           JOIN provider_patients pp ON pp.patient_id = p.id
           WHERE pp.provider_id = $1
           ORDER BY p.name`,
          [filter.providerId]
        )
      : await this.db.queryMany<PatientRow>(
          `SELECT ${PATIENT_COLUMNS} FROM patients ORDER BY name`
        );
    return rows.map(toPatient);
  }

  async listSchedulablePatients(): Promise<PatientRecord[]> {
    const rows = await this.db.queryMany<PatientRow>(
      `SELECT ${PATIENT_COLUMNS} FROM patients
       WHERE chat_id IS NOT NULL AND preferred_time IS NOT NULL`
    );
    return rows.map(toPatient);
  }

  async listProvidersForPatient(patientId: string): Promise<ProviderRecord[]> {
    const rows = await this.db.queryMany<ProviderRow>(
      `SELECT ${prefixed('d', PROVIDER_COLUMNS)} FROM providers d
       JOIN provider_patients pp ON pp.provider_id = d.id
       WHERE pp.patient_id = $1
       ORDER BY d.name`,
      [patientId]
    );
    return rows.map(toProvider);
  }

  async isAssigned(providerId: string, patientId: string): Promise<boolean> {
    const row = await this.db.queryOne<{ assigned: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM provider_patients WHERE provider_id = $1 AND patient_id = $2
       ) AS assigned`,
      [providerId, patientId]
    );
    return row?.assigned ?? false;
  }

  // ============================================================================
  // Updates
  // ============================================================================

  async updatePreferredTime(patientId: string, preferredTime: string): Promise<void> {
    await this.db.query(
      'UPDATE patients SET preferred_time = $2 WHERE id = $1',
      [patientId, preferredTime]
    );
  }

  async setVerificationCode(role: UserRole, userId: string, code: string): Promise<void> {
    await this.db.query(
      `UPDATE ${USER_TABLES[role]} SET verification_code = $2 WHERE id = $1`,
      [userId, code]
    );
  }

  async redeemVerificationCode(code: string, chatId: string): Promise<ChannelUser | null> {
    return this.db.withTransaction(async (tx) => {
      const holder = await findByColumn(tx, 'verification_code', code);
      if (!holder) return null;

      await tx.query('UPDATE patients SET chat_id = NULL WHERE chat_id = $1', [chatId]);
      await tx.query('UPDATE providers SET chat_id = NULL WHERE chat_id = $1', [chatId]);

      const id = holder.role === 'patient' ? holder.patient.id : holder.provider.id;
      await tx.query(
        `UPDATE ${USER_TABLES[holder.role]} SET chat_id = $2, verification_code = NULL WHERE id = $1`,
        [id, chatId]
      );

      return findByColumn(tx, 'chat_id', chatId);
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function prefixed(alias: string, columns: string): string {
  return columns
    .split(',')
    .map((c) => `${alias}.${c.trim()}`)
    .join(', ');
}

async function findByColumn(
  sql: SqlExecutor,
  column: 'chat_id' | 'verification_code',
  value: string
): Promise<ChannelUser | null> {
  const patient = await sql.queryOne<PatientRow>(
    `SELECT ${PATIENT_COLUMNS} FROM patients WHERE ${column} = $1`,
    [value]
  );
  if (patient) return { role: 'patient', patient: toPatient(patient) };

  const provider = await sql.queryOne<ProviderRow>(
    `SELECT ${PROVIDER_COLUMNS} FROM providers WHERE ${column} = $1`,
    [value]
  );
  if (provider) return { role: 'provider', provider: toProvider(provider) };

  return null;
}
