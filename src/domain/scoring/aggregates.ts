import { shiftDate } from '../../shared/dates';
import type { PatientAggregates } from '../../shared/types';

export interface ScorePoint {
  /** YYYY-MM-DD */
  date: string;
  score: number;
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0.5;
  return Math.min(1, Math.max(0, score));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Patient-level trend metrics from per-day session scores.
 *
 * - cumulative: mean of every session score (0 when there are none)
 * - day-over-day: today minus yesterday, a missing day counting as 0
 * - three-day: mean of [today-2, today] minus mean of [today-5, today-3];
 *   an empty window counts as 0
 *
 * `points` holds every session; one without a scored reply carries the placeholder score.
 */
export function computePatientAggregates(points: ScorePoint[], today: string): PatientAggregates {
  const byDate = new Map(points.map((p) => [p.date, p.score]));
  const scoresBetween = (from: string, to: string): number[] =>
    points.filter((p) => p.date >= from && p.date <= to).map((p) => p.score);

  const cumulative = mean(points.map((p) => p.score)) ?? 0;

  const todayScore = byDate.get(today) ?? 0;
  const yesterdayScore = byDate.get(shiftDate(today, -1)) ?? 0;

  const recent = mean(scoresBetween(shiftDate(today, -2), today)) ?? 0;
  const prior = mean(scoresBetween(shiftDate(today, -5), shiftDate(today, -3))) ?? 0;

  return {
    cumulativeScore: roundTo(cumulative, 4),
    dayOverDayDelta: roundTo(todayScore - yesterdayScore, 4),
    threeDayDelta: roundTo(recent - prior, 4),
  };
}

// ============================================================================
// Dashboard Metrics
// ============================================================================

export interface PatientMetrics {
  currentScore: number | null;
  previousScore: number | null;
  /** Percent change between the third-latest and latest session */
  threeDayChangePct: number;
  weeklyAverage: number | null;
  /** Percent change of the last 7 sessions' mean against the 7 before */
  weeklyChangePct: number;
  completedSessions: number;
}

/**
 * Dashboard figures over scored sessions, oldest first. Scores are on the
 * 0–100 display scale.
 */
export function computePatientMetrics(points: ScorePoint[]): PatientMetrics {
  const scores = points.map((p) => p.score);
  const n = scores.length;
  const at = (index: number): number | null => (index >= 0 && index < n ? scores[index] ?? null : null);

  const metrics: PatientMetrics = {
    currentScore: at(n - 1),
    previousScore: at(n - 2),
    threeDayChangePct: 0,
    weeklyAverage: null,
    weeklyChangePct: 0,
    completedSessions: n,
  };

  const first = at(n - 3);
  const last = at(n - 1);
  if (first !== null && last !== null && first > 0) {
    metrics.threeDayChangePct = Math.round(((last - first) / first) * 100);
  }

  const currentWeek = mean(scores.slice(-7));
  if (currentWeek !== null) {
    metrics.weeklyAverage = Math.round(currentWeek);
  }

  if (n >= 14) {
    const previousWeek = mean(scores.slice(-14, -7));
    if (currentWeek !== null && previousWeek !== null && previousWeek > 0) {
      metrics.weeklyChangePct = Math.round(((currentWeek - previousWeek) / previousWeek) * 100);
    }
  }

  return metrics;
}

export function toPercent(score: number): number {
  return Math.round(score * 100);
}
