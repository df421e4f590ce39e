import type { AlertRepository, AlertWithPatient, NewAlert } from '../../domain/alerts/repository';
import { StorageError } from '../../shared/errors';
import type { AlertRecord } from '../../shared/types';
import type { Database } from './client';
import { ALERT_COLUMNS, AlertRow, AlertWithPatientRow, toAlert, toAlertWithPatient } from './rows';

export class PgAlertRepository implements AlertRepository {
  constructor(private db: Database) {}

  async create(alert: NewAlert): Promise<AlertRecord> {
    const row = await this.db.queryOne<AlertRow>(
      `INSERT INTO alerts (patient_id, type, message, created_at)
       VALUES ($1, $2, $3, $4)
       RETURNING ${ALERT_COLUMNS}`,
      [alert.patientId, alert.type, alert.message, alert.createdAt]
    );
    if (!row) throw new StorageError('Alert insert returned no row');
    return toAlert(row);
  }

  async findById(alertId: string): Promise<AlertRecord | null> {
    const row = await this.db.queryOne<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM alerts WHERE id = $1`,
      [alertId]
    );
    return row ? toAlert(row) : null;
  }

  async listPending(providerId: string): Promise<AlertWithPatient[]> {
    const rows = await this.db.queryMany<AlertWithPatientRow>(
      `SELECT a.id, a.patient_id, a.type, a.message, a.status, a.created_at, a.resolved_at,
              p.name AS patient_name
       FROM alerts a
       JOIN patients p ON p.id = a.patient_id
       JOIN provider_patients pp ON pp.patient_id = a.patient_id
       WHERE pp.provider_id = $1 AND a.status = 'pending'
       ORDER BY a.created_at DESC`,
      [providerId]
    );
    return rows.map(toAlertWithPatient);
  }

  async markResolved(alertId: string, resolvedAt: Date): Promise<AlertRecord | null> {
    const row = await this.db.queryOne<AlertRow>(
      `UPDATE alerts SET status = 'resolved', resolved_at = $2
       WHERE id = $1 AND status = 'pending'
       RETURNING ${ALERT_COLUMNS}`,
      [alertId, resolvedAt]
    );
    return row ? toAlert(row) : null;
  }
}
