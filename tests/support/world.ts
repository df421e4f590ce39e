import { AlertEngine } from '../../src/domain/alerts/engine';
import { ConversationEngine } from '../../src/domain/conversation/engine';
import { DashboardService } from '../../src/domain/dashboard/service';
import type { NewPatient, NewProvider } from '../../src/domain/patients/repository';
import { PatientService } from '../../src/domain/patients/service';
import { ScoreStore } from '../../src/domain/scoring/store';
import type { PatientRecord, ProviderRecord } from '../../src/shared/types';
import { FakeChannel, FakeClassifier, FakeGenerator, fixedClock, silentLogger } from './fakes';
import {
  MemoryAlertRepository,
  MemoryDatabase,
  MemoryPatientRepository,
  MemoryScoreRepository,
} from './memory';

/**
 * Every service wired against the in-memory tables and fakes, with the clock
 * at `now` (UTC unless the patient says otherwise).
 */
export function createWorld(now = '2024-03-10T19:30:00Z') {
  const db = new MemoryDatabase();
  const scoreRepo = new MemoryScoreRepository(db);
  const patientRepo = new MemoryPatientRepository(db);
  const alertRepo = new MemoryAlertRepository(db);

  const clock = fixedClock(now);
  const channel = new FakeChannel();
  const classifier = new FakeClassifier();
  const generator = new FakeGenerator();

  const store = new ScoreStore(scoreRepo, clock, silentLogger);
  const engine = new ConversationEngine(
    store,
    channel,
    classifier,
    generator,
    { classifierRetries: 2, classifierInitialDelayMs: 0, classifierMaxDelayMs: 0 },
    silentLogger
  );
  const alerts = new AlertEngine(alertRepo, patientRepo, scoreRepo, channel, clock, silentLogger);
  let codes = 0;
  const patients = new PatientService(
    patientRepo,
    clock,
    () => `CODE${String(++codes).padStart(2, '0')}`,
    silentLogger
  );
  const dashboard = new DashboardService(patientRepo, scoreRepo, clock);

  async function addPatient(overrides: Partial<NewPatient> & { chatId?: string } = {}): Promise<PatientRecord> {
    const { chatId, ...input } = overrides;
    const patient = await patientRepo.createPatient({
      name: 'Jane Doe',
      email: 'jane@example.com',
      condition: 'anxiety',
      timezone: 'UTC',
      preferredTime: '19:30',
      ...input,
    });
    if (chatId) patientRepo.linkChat(patient.id, chatId);
    return { ...patient, chatId: chatId ?? null };
  }

  async function addProvider(overrides: Partial<NewProvider> & { chatId?: string } = {}): Promise<ProviderRecord> {
    const { chatId, ...input } = overrides;
    const provider = await patientRepo.createProvider({
      name: 'Alex Morgan',
      email: 'alex@example.com',
      specialty: 'psychiatry',
      licenseNumber: null,
      institution: null,
      ...input,
    });
    if (chatId) patientRepo.linkProviderChat(provider.id, chatId);
    return { ...provider, chatId: chatId ?? null };
  }

  return {
    db,
    scoreRepo,
    patientRepo,
    alertRepo,
    clock,
    channel,
    classifier,
    generator,
    store,
    engine,
    alerts,
    patients,
    dashboard,
    addPatient,
    addProvider,
  };
}

export type World = ReturnType<typeof createWorld>;
