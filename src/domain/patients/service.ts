import { randomInt } from 'crypto';
import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { isValidTimezone, localDate, normalizeTimeOfDay } from '../../shared/dates';
import {
  ConflictError,
  NotFoundError,
  PatientNotFoundError,
  ProviderNotFoundError,
  ValidationError,
} from '../../shared/errors';
import {
  VERIFICATION_CODE_ALPHABET,
  VERIFICATION_CODE_LENGTH,
  isValidVerificationCode,
  normalizeVerificationCode,
} from '../../shared/validation';
import {
  ChannelUser,
  Clock,
  PatientRecord,
  ProviderRecord,
  systemClock,
  UserRole,
} from '../../shared/types';
import type { NewPatient, NewProvider, PatientRepository } from './repository';

export interface RegisterPatientInput {
  name: string;
  email: string;
  condition?: string | null;
  timezone?: string;
  preferredTime?: string | null;
  providerIds?: string[];
}

export type RegisterProviderInput = Partial<Omit<NewProvider, 'name' | 'email'>> &
  Pick<NewProvider, 'name' | 'email'>;

export interface IssuedCode {
  role: UserRole;
  userId: string;
  code: string;
}

export function generateVerificationCode(): string {
  let code = '';
  for (let i = 0; i < VERIFICATION_CODE_LENGTH; i++) {
    code += VERIFICATION_CODE_ALPHABET.charAt(randomInt(VERIFICATION_CODE_ALPHABET.length));
  }
  return code;
}

export class PatientService {
  private log: Logger;

  constructor(
    private repo: PatientRepository,
    private clock: Clock = systemClock,
    private codeGenerator: () => string = generateVerificationCode,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'patient-service' });
  }

  // ============================================================================
  // Registration
  // ============================================================================

  async registerPatient(input: RegisterPatientInput): Promise<PatientRecord> {
    const timezone = input.timezone ?? 'UTC';
    const errors: Record<string, string[]> = {};

    if (!isValidTimezone(timezone)) {
      errors.timezone = [`Unknown timezone: ${timezone}`];
    }

    let preferredTime: string | null = null;
    if (input.preferredTime) {
      preferredTime = normalizeTimeOfDay(input.preferredTime);
      if (!preferredTime) {
        errors.preferredTime = ['Expected HH:MM (24h)'];
      }
    }

    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    const providers: ProviderRecord[] = [];
    for (const providerId of input.providerIds ?? []) {
      const provider = await this.repo.findProviderById(providerId);
      if (!provider) throw new ProviderNotFoundError(providerId);
      providers.push(provider);
    }

    const record: NewPatient = {
      name: input.name.trim(),
      email: input.email.trim().toLowerCase(),
      condition: input.condition ?? null,
      timezone,
      preferredTime,
    };
    const patient = await this.repo.createPatient(record);

    const startDate = localDate(timezone, this.clock());
    for (const provider of providers) {
      await this.repo.assignProvider(provider.id, patient.id, startDate);
    }

    this.log.info({ patientId: patient.id, providers: providers.length }, 'Patient registered');
    return patient;
  }

  async registerProvider(input: RegisterProviderInput): Promise<ProviderRecord> {
    const provider = await this.repo.createProvider({
      name: input.name.trim(),
      email: input.email.trim().toLowerCase(),
      specialty: input.specialty ?? null,
      licenseNumber: input.licenseNumber ?? null,
      institution: input.institution ?? null,
    });

    this.log.info({ providerId: provider.id }, 'Provider registered');
    return provider;
  }

  async assignProvider(providerId: string, patientId: string): Promise<void> {
    const [provider, patient] = await Promise.all([
      this.repo.findProviderById(providerId),
      this.repo.findPatientById(patientId),
    ]);
    if (!provider) throw new ProviderNotFoundError(providerId);
    if (!patient) throw new PatientNotFoundError(patientId);

    await this.repo.assignProvider(providerId, patientId, localDate(patient.timezone, this.clock()));
    this.log.info({ providerId, patientId }, 'Provider assigned');
  }

  // ============================================================================
  // Channel Linking
  // ============================================================================

  /**
   * Issue a fresh single-use code for linking a chat to the account.
   * Refused once the account is already linked.
   */
  async issueVerificationCode(userId: string): Promise<IssuedCode> {
    const patient = await this.repo.findPatientById(userId);
    const provider = patient ? null : await this.repo.findProviderById(userId);

    const account: ChannelUser | null = patient
      ? { role: 'patient', patient }
      : provider
        ? { role: 'provider', provider }
        : null;

    if (!account) {
      throw new NotFoundError(`User not found: ${userId}`);
    }

    const chatId = account.role === 'patient' ? account.patient.chatId : account.provider.chatId;
    if (chatId) {
      throw new ConflictError('Account is already linked to a chat');
    }

    const code = this.codeGenerator();
    await this.repo.setVerificationCode(account.role, userId, code);

    this.log.info({ userId, role: account.role }, 'Verification code issued');
    return { role: account.role, userId, code };
  }

  /** Null when the code is malformed or unknown. */
  async linkChannel(code: string, chatId: string): Promise<ChannelUser | null> {
    if (!isValidVerificationCode(code)) {
      return null;
    }

    const user = await this.repo.redeemVerificationCode(normalizeVerificationCode(code), chatId);
    if (user) {
      const userId = user.role === 'patient' ? user.patient.id : user.provider.id;
      this.log.info({ userId, role: user.role, chatId }, 'Chat linked');
    }
    return user;
  }

  findUserByChatId(chatId: string): Promise<ChannelUser | null> {
    return this.repo.findUserByChatId(chatId);
  }

  /** Returns the stored HH:MM, or null when `raw` is not a time of day. */
  async updatePreferredTime(patientId: string, raw: string): Promise<string | null> {
    const preferredTime = normalizeTimeOfDay(raw);
    if (!preferredTime) return null;

    await this.repo.updatePreferredTime(patientId, preferredTime);
    this.log.info({ patientId, preferredTime }, 'Check-in time updated');
    return preferredTime;
  }
}
