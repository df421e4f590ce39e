import { beforeEach, describe, expect, it } from 'vitest';
import { ForbiddenError, ProviderNotFoundError } from '../../src/shared/errors';
import type { PatientRecord, ProviderRecord } from '../../src/shared/types';
import { createWorld, World } from '../support/world';

describe('DashboardService', () => {
  let world: World;
  let patient: PatientRecord;
  let provider: ProviderRecord;

  async function answerAt(instant: string, score: number): Promise<void> {
    world.clock.set(instant);
    const date = instant.slice(0, 10);
    await world.store.recordQuestion(patient.id, date, 'How are you?', { stage: 'question_bank' });
    await world.store.recordReply({ patientId: patient.id }, 'reply', score);
  }

  beforeEach(async () => {
    world = createWorld('2024-03-10T19:30:00Z');
    patient = await world.addPatient({ chatId: '1001' });
    provider = await world.addProvider();
    await world.patientRepo.assignProvider(provider.id, patient.id, '2024-03-01');

    await answerAt('2024-03-01T19:30:00Z', 0.9);
    await answerAt('2024-03-08T19:30:00Z', 0.5);
    await answerAt('2024-03-09T19:30:00Z', 0.6);
    await answerAt('2024-03-10T19:30:00Z', 0.75);
    await answerAt('2024-03-10T19:40:00Z', 0.85);
  });

  describe('listPatientsForProvider', () => {
    it('summarizes each assigned patient', async () => {
      const [summary, ...rest] = await world.dashboard.listPatientsForProvider(provider.id);

      expect(rest).toEqual([]);
      expect(summary).toEqual({
        id: patient.id,
        name: 'Jane Doe',
        condition: 'anxiety',
        preferredTime: '19:30',
        linked: true,
        latestScore: 85,
        lastCheckin: new Date('2024-03-10T19:40:00Z'),
        weeklyAverage: 63,
        trend: [90, 50, 60, 80],
        aggregates: { cumulativeScore: 0.7, dayOverDayDelta: 0.2, threeDayDelta: 0.6333 },
      });
    });

    it('rejects an unknown provider', async () => {
      await expect(
        world.dashboard.listPatientsForProvider('00000000-0000-0000-0000-000000000000')
      ).rejects.toBeInstanceOf(ProviderNotFoundError);
    });
  });

  describe('getPatientDetail', () => {
    it('returns history, recent exchanges and metrics', async () => {
      const detail = await world.dashboard.getPatientDetail(provider.id, patient.id);

      expect(detail.history).toEqual([
        { date: '2024-03-01', score: 90, answeredCount: 1 },
        { date: '2024-03-08', score: 50, answeredCount: 1 },
        { date: '2024-03-09', score: 60, answeredCount: 1 },
        { date: '2024-03-10', score: 80, answeredCount: 2 },
      ]);
      expect(detail.metrics).toEqual({
        currentScore: 80,
        previousScore: 60,
        threeDayChangePct: 60,
        weeklyAverage: 70,
        weeklyChangePct: 0,
        completedSessions: 4,
      });
      expect(detail.recentMessages.map((m) => m.score)).toEqual([0.85, 0.75, 0.6, 0.5, 0.9]);
      expect(detail.providers.map((p) => p.name)).toEqual(['Alex Morgan']);
    });

    it('forbids patients assigned to someone else', async () => {
      const other = await world.addProvider({ name: 'Blair Chen', email: 'blair@example.com' });

      await expect(world.dashboard.getPatientDetail(other.id, patient.id)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });
});
