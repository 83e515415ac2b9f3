/**
 * Recovery Score Service
 *
 * Maps heart rate variability, sleep, recent training load and resting heart
 * rate onto 0-100 sub-scores and combines them into a weighted recovery score.
 *
 * Every function here is total: missing or non-finite optional signals fall
 * back to a neutral sub-score of 50 instead of throwing.
 */

import type { RecoveryCategory, RecoveryScore, WorkoutTrends } from '../shared.js';

/**
 * Contribution of each sub-score to the overall recovery score.
 * HRV and sleep dominate because they are the strongest recovery predictors.
 */
export const RECOVERY_WEIGHTS = {
  hrv: 0.4,
  sleep: 0.35,
  workoutLoad: 0.2,
  restingHeartRate: 0.05,
} as const;

/** Sub-score used when an optional signal is unavailable. */
export const NEUTRAL_SUB_SCORE = 50;

const MAX_WORKOUT_INTENSITY = 10;

export function clampScore(value: number, min: number = 0, max: number = 100): number {
  return Math.max(min, Math.min(max, value));
}

function isPresent(value: number | null | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

/**
 * Score heart rate variability (ms).
 *
 * Bands: <15 → 0-20, 15-25 → 20-50, 25-35 → 50-75, 35-50 → 75-95,
 * 50+ → 95-100 with a shallow slope capped at 100.
 */
export function calculateHrvScore(hrv: number | null): number {
  if (!isPresent(hrv)) {
    return NEUTRAL_SUB_SCORE;
  }

  let score: number;
  if (hrv < 15) {
    score = (hrv / 15) * 20;
  } else if (hrv < 25) {
    score = 20 + (hrv - 15) * 3;
  } else if (hrv < 35) {
    score = 50 + (hrv - 25) * 2.5;
  } else if (hrv < 50) {
    score = 75 + ((hrv - 35) * 20) / 15;
  } else {
    score = 95 + (hrv - 50) * 0.1;
  }
  return clampScore(score);
}

/**
 * Score last night's sleep (hours).
 *
 * 7-9h is optimal (85-100). Short sleep falls off steeply to 20 at 4h and 0
 * below that. Long sleep decays to 70 at 11h and is flat at 40 beyond,
 * since oversleeping can signal illness or accumulated fatigue.
 */
export function calculateSleepScore(sleepHours: number): number {
  const hours = Number.isFinite(sleepHours) ? sleepHours : 0;

  let score: number;
  if (hours < 4) {
    score = 0;
  } else if (hours < 7) {
    score = 20 + ((hours - 4) * 65) / 3;
  } else if (hours <= 9) {
    score = 85 + (hours - 7) * 7.5;
  } else if (hours <= 11) {
    score = 100 - (hours - 9) * 15;
  } else {
    score = 40;
  }
  return clampScore(score);
}

/**
 * Score recent training load (0-10 intensity scale). Higher load means lower
 * expected recovery.
 *
 * Zones: active recovery 0-2 → 100-90, moderate 2-4 → 90-70,
 * hard 4-6 → 70-50, very hard 6-8 → 50-30, extreme 8+ → 30 down to 0.
 */
export function calculateWorkoutLoadScore(workoutIntensity: number): number {
  const intensity = Number.isFinite(workoutIntensity) ? workoutIntensity : 0;

  let score: number;
  if (intensity <= 0) {
    score = 100;
  } else if (intensity < 2) {
    score = 100 - intensity * 5;
  } else if (intensity < 4) {
    score = 90 - (intensity - 2) * 10;
  } else if (intensity < 6) {
    score = 70 - (intensity - 4) * 10;
  } else if (intensity < 8) {
    score = 50 - (intensity - 6) * 10;
  } else {
    score = 30 - (intensity - 8) * 25;
  }
  return clampScore(score);
}

/**
 * Score resting heart rate (bpm). Lower is better, with 100 for anything
 * under 40 bpm.
 */
export function calculateRestingHeartRateScore(restingHeartRate: number | null): number {
  if (!isPresent(restingHeartRate)) {
    return NEUTRAL_SUB_SCORE;
  }

  const rhr = restingHeartRate;
  let score: number;
  if (rhr < 40) {
    score = 100;
  } else if (rhr < 50) {
    score = 100 - (rhr - 40) * 0.5;
  } else if (rhr < 60) {
    score = 95 - (rhr - 50);
  } else if (rhr < 70) {
    score = 85 - (rhr - 60) * 1.5;
  } else if (rhr < 80) {
    score = 70 - (rhr - 70) * 2;
  } else if (rhr < 90) {
    score = 50 - (rhr - 80) * 2.5;
  } else {
    score = 25 - (rhr - 90) * 2.5;
  }
  return clampScore(score);
}

/**
 * Categorize an overall recovery score.
 *
 * - Excellent: >= 80
 * - Good: 60-80
 * - Moderate: 40-60
 * - Poor: 20-40
 * - Critical: < 20
 */
export function categorizeRecoveryScore(overallScore: number): RecoveryCategory {
  if (overallScore >= 80) return 'excellent';
  if (overallScore >= 60) return 'good';
  if (overallScore >= 40) return 'moderate';
  if (overallScore >= 20) return 'poor';
  return 'critical';
}

export function getRecoveryRecommendation(category: RecoveryCategory): string {
  switch (category) {
    case 'excellent':
      return 'You are fully recovered. A great day for a hard or high-volume session.';
    case 'good':
      return 'Recovery is good. Train as planned and keep an eye on how you feel.';
    case 'moderate':
      return 'Recovery is moderate. Favor technique work or a lighter session today.';
    case 'poor':
      return 'Recovery is poor. Stick to light activity such as walking or mobility work.';
    case 'critical':
      return 'Recovery is critically low. Take a full rest day and prioritize sleep.';
  }
}

/**
 * Calculate the composite recovery score.
 *
 * @param hrv - Heart rate variability in ms, or null when unavailable
 * @param sleepHours - Last night's sleep duration in hours
 * @param workoutIntensityLast7Days - Recent training load on a 0-10 scale
 * @param restingHeartRate - Resting heart rate in bpm, or null when unavailable
 * @param now - Timestamp recorded on the score (defaults to the current time)
 */
export function calculateRecoveryScore(
  hrv: number | null,
  sleepHours: number,
  workoutIntensityLast7Days: number,
  restingHeartRate: number | null,
  now: Date = new Date()
): RecoveryScore {
  const hrvScore = calculateHrvScore(hrv);
  const sleepScore = calculateSleepScore(sleepHours);
  const workoutLoadScore = calculateWorkoutLoadScore(workoutIntensityLast7Days);
  const restingHeartRateScore = calculateRestingHeartRateScore(restingHeartRate);

  const overallScore = clampScore(
    hrvScore * RECOVERY_WEIGHTS.hrv +
      sleepScore * RECOVERY_WEIGHTS.sleep +
      workoutLoadScore * RECOVERY_WEIGHTS.workoutLoad +
      restingHeartRateScore * RECOVERY_WEIGHTS.restingHeartRate
  );

  const category = categorizeRecoveryScore(overallScore);

  return {
    overallScore,
    hrvScore,
    sleepScore,
    workoutLoadScore,
    restingHeartRateScore,
    date: now.toISOString(),
    category,
    recommendation: getRecoveryRecommendation(category),
  };
}

/** Days before the assessment date that still count as recent training. */
const RECENT_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

function toCalendarDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Estimate training load over the most recent week on a 0-10 scale.
 *
 * Averages three components, each capped at 10:
 * - Frequency: 7 workouts in the week → 10
 * - Duration: 90-minute average session → 10
 * - Calories: 800 kcal average per workout → 10
 *
 * Only the latest weekly bucket is read, and only when its week starts within
 * the 7 calendar days up to `now`. An older bucket means no recent training.
 *
 * @param workoutTrends - Trends with weekly buckets sorted ascending
 * @param now - Assessment timestamp (defaults to the current time)
 * @returns 0 when there is no recent bucket or it has no workouts
 */
export function calculateWorkoutIntensityLast7Days(
  workoutTrends: WorkoutTrends,
  now: Date = new Date()
): number {
  const lastWeek = workoutTrends.weeklyWorkouts[workoutTrends.weeklyWorkouts.length - 1];
  if (lastWeek === undefined || lastWeek.workoutCount <= 0) {
    return 0;
  }

  const today = toCalendarDate(now.getTime());
  const windowStart = toCalendarDate(now.getTime() - RECENT_WINDOW_DAYS * DAY_MS);
  if (lastWeek.weekStartDate < windowStart || lastWeek.weekStartDate > today) {
    return 0;
  }

  const count = lastWeek.workoutCount;
  const avgMinutes = lastWeek.totalDuration / count / 60;
  const avgCalories = lastWeek.totalCalories / count;

  const frequencyComponent = Math.min(MAX_WORKOUT_INTENSITY, (count * 10) / 7);
  const durationComponent = Math.min(MAX_WORKOUT_INTENSITY, avgMinutes / 9);
  const calorieComponent = Math.min(MAX_WORKOUT_INTENSITY, avgCalories / 80);

  const intensity = (frequencyComponent + durationComponent + calorieComponent) / 3;
  return clampScore(intensity, 0, MAX_WORKOUT_INTENSITY);
}
