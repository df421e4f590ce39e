import type { AlertRecord, AlertType } from '../../shared/types';

export interface NewAlert {
  patientId: string;
  type: AlertType;
  message: string;
  createdAt: Date;
}

export interface AlertWithPatient extends AlertRecord {
  patientName: string;
}

export interface AlertRepository {
  create(alert: NewAlert): Promise<AlertRecord>;
  findById(alertId: string): Promise<AlertRecord | null>;
  /** Pending alerts of the provider's assigned patients, newest first */
  listPending(providerId: string): Promise<AlertWithPatient[]>;
  /** Flip pending → resolved. Null when the alert was not pending. */
  markResolved(alertId: string, resolvedAt: Date): Promise<AlertRecord | null>;
}
