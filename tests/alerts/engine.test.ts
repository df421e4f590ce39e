import { beforeEach, describe, expect, it } from 'vitest';
import { PROFESSIONAL_HELP_MESSAGE } from '../../src/domain/alerts/engine';
import {
  AlertAlreadyResolvedError,
  ForbiddenError,
  NotFoundError,
  PatientNotFoundError,
} from '../../src/shared/errors';
import type { PatientRecord, ProviderRecord } from '../../src/shared/types';
import { createWorld, World } from '../support/world';

describe('AlertEngine', () => {
  let world: World;
  let patient: PatientRecord;
  let linkedProvider: ProviderRecord;
  let unlinkedProvider: ProviderRecord;

  beforeEach(async () => {
    world = createWorld('2024-03-10T19:30:00Z');
    patient = await world.addPatient({ chatId: '1001' });
    linkedProvider = await world.addProvider({ name: 'Alex Morgan', chatId: '9001' });
    unlinkedProvider = await world.addProvider({ name: 'Blair Chen', email: 'blair@example.com' });
    // Linked but not assigned to the patient
    await world.addProvider({ name: 'Casey Wu', email: 'casey@example.com', chatId: '9003' });

    await world.patientRepo.assignProvider(linkedProvider.id, patient.id, '2024-03-01');
    await world.patientRepo.assignProvider(unlinkedProvider.id, patient.id, '2024-03-01');
  });

  async function scoreToday(patientId: string, score: number): Promise<void> {
    await world.store.recordQuestion(patientId, '2024-03-10', 'How are you?', { stage: 'question_bank' });
    await world.store.recordReply({ patientId }, 'reply', score);
  }

  describe('requestProfessionalHelp', () => {
    it('stores one pending alert and notifies only linked providers', async () => {
      const { alert, notified } = await world.alerts.requestProfessionalHelp(patient.id);

      expect(notified).toBe(1);
      expect(alert).toMatchObject({
        patientId: patient.id,
        type: 'professional_help',
        message: PROFESSIONAL_HELP_MESSAGE,
        status: 'pending',
        resolvedAt: null,
      });

      expect(world.channel.sent.map((m) => m.chatId)).toEqual(['9001']);
      const lines = world.channel.sent[0]?.text.split('\n') ?? [];
      expect(lines[0]).toBe('🔴 *URGENT: Professional Help Requested*');
      expect(lines[2]).toBe('Patient: Jane Doe');

      expect(await world.alertRepo.listPending(linkedProvider.id)).toHaveLength(1);
    });

    it('keeps the alert when a notification fails', async () => {
      world.channel.failingChats.add('9001');

      const { alert, notified } = await world.alerts.requestProfessionalHelp(patient.id);

      expect(notified).toBe(0);
      expect(await world.alertRepo.findById(alert.id)).toMatchObject({ status: 'pending' });
    });

    it('rejects an unknown patient', async () => {
      await expect(
        world.alerts.requestProfessionalHelp('00000000-0000-0000-0000-000000000000')
      ).rejects.toBeInstanceOf(PatientNotFoundError);
    });
  });

  describe('listPendingAlerts', () => {
    it('adds a low-score entry for a poor session today', async () => {
      await scoreToday(patient.id, 0.2);

      const alerts = await world.alerts.listPendingAlerts(linkedProvider.id);

      expect(alerts).toEqual([
        {
          id: null,
          patientId: patient.id,
          patientName: 'Jane Doe',
          type: 'low_sentiment',
          message: 'Low sentiment score detected: 20%',
          status: 'pending',
          createdAt: new Date('2024-03-10T19:30:00Z'),
          synthetic: true,
        },
      ]);
    });

    it('leaves the low-score entry out once help was requested that day', async () => {
      await scoreToday(patient.id, 0.2);
      const { alert } = await world.alerts.requestProfessionalHelp(patient.id);

      const alerts = await world.alerts.listPendingAlerts(linkedProvider.id);

      expect(alerts.map((a) => [a.id, a.type, a.synthetic])).toEqual([[alert.id, 'professional_help', false]]);
    });

    it('adds nothing for an acceptable score', async () => {
      await scoreToday(patient.id, 0.3);
      expect(await world.alerts.listPendingAlerts(linkedProvider.id)).toEqual([]);
    });

    it('only lists patients assigned to the provider', async () => {
      const stranger = await world.addProvider({ name: 'Drew Park' });
      await world.alerts.requestProfessionalHelp(patient.id);

      expect(await world.alerts.listPendingAlerts(stranger.id)).toEqual([]);
    });
  });

  describe('resolveAlert', () => {
    it('resolves once and refuses a second time', async () => {
      const { alert } = await world.alerts.requestProfessionalHelp(patient.id);
      world.clock.set('2024-03-10T20:00:00Z');

      const resolved = await world.alerts.resolveAlert(alert.id);
      expect(resolved.status).toBe('resolved');
      expect(resolved.resolvedAt).toEqual(new Date('2024-03-10T20:00:00Z'));

      await expect(world.alerts.resolveAlert(alert.id)).rejects.toBeInstanceOf(AlertAlreadyResolvedError);
      expect(await world.alerts.listPendingAlerts(linkedProvider.id)).toEqual([]);
    });

    it('refuses a provider the patient is not assigned to', async () => {
      const stranger = await world.addProvider({ name: 'Drew Park', email: 'drew@example.com' });
      const { alert } = await world.alerts.requestProfessionalHelp(patient.id);

      await expect(world.alerts.resolveAlert(alert.id, stranger.id)).rejects.toBeInstanceOf(ForbiddenError);
      expect((await world.alertRepo.findById(alert.id))?.status).toBe('pending');

      const resolved = await world.alerts.resolveAlert(alert.id, linkedProvider.id);
      expect(resolved.status).toBe('resolved');
    });

    it('rejects an unknown alert', async () => {
      await expect(
        world.alerts.resolveAlert('00000000-0000-0000-0000-000000000000')
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('at-risk queries', () => {
    it('finds patients whose three-day trend fell past the threshold', async () => {
      const steady = await world.addPatient({ name: 'Sam Lee', email: 'sam@example.com' });
      await world.patientRepo.assignProvider(linkedProvider.id, steady.id, '2024-03-01');
      await world.scoreRepo.updatePatientAggregates(patient.id, {
        cumulativeScore: 0.5,
        dayOverDayDelta: -0.2,
        threeDayDelta: -0.25,
      });
      await world.scoreRepo.updatePatientAggregates(steady.id, {
        cumulativeScore: 0.6,
        dayOverDayDelta: 0,
        threeDayDelta: -0.05,
      });

      const declining = await world.alerts.findDecliningPatients({ providerId: linkedProvider.id });

      expect(declining.map((d) => [d.patient.name, d.threeDayDelta])).toEqual([['Jane Doe', -0.25]]);
      expect(await world.alerts.findDecliningPatients({ threshold: 0 })).toHaveLength(2);
    });

    it('finds patients without a recent scored check-in', async () => {
      const quiet = await world.addPatient({ name: 'Kim Ray', email: 'kim@example.com' });
      const lapsed = await world.addPatient({ name: 'Lee Hart', email: 'lee@example.com' });
      for (const p of [quiet, lapsed]) {
        await world.patientRepo.assignProvider(linkedProvider.id, p.id, '2024-03-01');
      }

      await scoreToday(patient.id, 0.7);
      world.clock.set('2024-03-08T19:30:00Z');
      await world.store.recordQuestion(lapsed.id, '2024-03-08', 'How are you?', { stage: 'question_bank' });
      await world.store.recordReply({ patientId: lapsed.id }, 'ok', 0.6);
      world.clock.set('2024-03-10T19:30:00Z');

      const missing = await world.alerts.findPatientsMissingCheckins({ providerId: linkedProvider.id });

      expect(missing.map((m) => [m.patient.name, m.lastCheckin])).toEqual([
        ['Kim Ray', null],
        ['Lee Hart', '2024-03-08'],
      ]);
    });
  });
});
