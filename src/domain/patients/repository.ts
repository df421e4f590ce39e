import type { ChannelUser, PatientRecord, ProviderRecord, UserRole } from '../../shared/types';

export interface NewPatient {
  name: string;
  email: string;
  condition: string | null;
  timezone: string;
  preferredTime: string | null;
}

export interface NewProvider {
  name: string;
  email: string;
  specialty: string | null;
  licenseNumber: string | null;
  institution: string | null;
}

export interface PatientFilter {
  providerId?: string;
}

export interface PatientRepository {
  createPatient(input: NewPatient): Promise<PatientRecord>;
  createProvider(input: NewProvider): Promise<ProviderRecord>;
  /** Idempotent: an existing assignment is left untouched */
  assignProvider(providerId: string, patientId: string, startDate: string): Promise<void>;

  findPatientById(patientId: string): Promise<PatientRecord | null>;
  findProviderById(providerId: string): Promise<ProviderRecord | null>;
  findUserByChatId(chatId: string): Promise<ChannelUser | null>;

  listPatients(filter?: PatientFilter): Promise<PatientRecord[]>;
  /** Patients with both a channel binding and a preferred check-in time */
  listSchedulablePatients(): Promise<PatientRecord[]>;
  listProvidersForPatient(patientId: string): Promise<ProviderRecord[]>;
  isAssigned(providerId: string, patientId: string): Promise<boolean>;

  updatePreferredTime(patientId: string, preferredTime: string): Promise<void>;
  setVerificationCode(role: UserRole, userId: string, code: string): Promise<void>;
  /**
   * Bind `chatId` to the account holding `code` and clear the code.
   * Any other account bound to the same chat is unbound. Null when no account
   * holds the code.
   */
  redeemVerificationCode(code: string, chatId: string): Promise<ChannelUser | null>;
}
