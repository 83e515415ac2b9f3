/**
 * Test data fixtures and factory functions.
 *
 * These functions create properly typed test data with sensible defaults
 * that can be overridden for specific test scenarios.
 */

import type {
  HealthDataPoint,
  RecoveryScore,
  WeeklyWorkoutData,
  WorkoutTrends,
} from '../../shared.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Fixed instant used wherever a test needs a deterministic timestamp. */
export const FIXED_NOW = new Date('2024-03-15T08:00:00.000Z');

function addDays(date: string, days: number): string {
  return new Date(Date.parse(`${date}T00:00:00.000Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

// ============ Time series ============

/**
 * Daily data points starting at `startDate`, one per value.
 */
export function createDataPoints(values: number[], startDate: string = '2024-01-01'): HealthDataPoint[] {
  return values.map((value, i) => ({ date: addDays(startDate, i), value }));
}

// ============ Workouts ============

interface WeeklyWorkoutOptions {
  minutesPerWorkout?: number;
  caloriesPerWorkout?: number;
  startDate?: string; // Monday of the first week
}

/**
 * Consecutive weekly buckets with the given workout counts.
 */
export function createWeeklyWorkouts(
  counts: number[],
  options: WeeklyWorkoutOptions = {}
): WeeklyWorkoutData[] {
  const minutes = options.minutesPerWorkout ?? 45;
  const calories = options.caloriesPerWorkout ?? 400;
  const startDate = options.startDate ?? '2024-01-01';

  return counts.map((workoutCount, i) => ({
    weekStartDate: addDays(startDate, i * 7),
    workoutCount,
    totalDuration: workoutCount * minutes * 60,
    totalCalories: workoutCount * calories,
  }));
}

/**
 * Workout trends for a steady trainee: 3 x 45-minute workouts per week over
 * four weeks. Override any field for a specific scenario.
 */
export function createWorkoutTrends(overrides: Partial<WorkoutTrends> = {}): WorkoutTrends {
  return {
    totalWorkouts: 12,
    weeklyWorkouts: createWeeklyWorkouts([3, 3, 3, 3]),
    monthlyCalories: [{ month: '2024-01', value: 4800 }],
    activityTypeBreakdown: [
      { activityType: 'Strength Training', count: 12, totalDuration: 32400, percentage: 100 },
    ],
    averageDuration: 2700,
    totalDuration: 32400,
    longestWorkout: 3600,
    totalCalories: 4800,
    averageCaloriesPerWorkout: 400,
    workoutsPerWeek: 3,
    trendDirection: 'stable',
    ...overrides,
  };
}

export function createEmptyWorkoutTrends(): WorkoutTrends {
  return createWorkoutTrends({
    totalWorkouts: 0,
    weeklyWorkouts: [],
    monthlyCalories: [],
    activityTypeBreakdown: [],
    averageDuration: 0,
    totalDuration: 0,
    longestWorkout: 0,
    totalCalories: 0,
    averageCaloriesPerWorkout: 0,
    workoutsPerWeek: 0,
  });
}

// ============ Recovery ============

/**
 * A recovery score that triggers no insight rule on its own.
 */
export function createRecoveryScore(overrides: Partial<RecoveryScore> = {}): RecoveryScore {
  return {
    overallScore: 70,
    hrvScore: 70,
    sleepScore: 80,
    workoutLoadScore: 80,
    restingHeartRateScore: 80,
    date: FIXED_NOW.toISOString(),
    category: 'good',
    recommendation: 'Recovery is good. Train as planned and keep an eye on how you feel.',
    ...overrides,
  };
}

// ============ Ids ============

/**
 * Deterministic id generator: insight-1, insight-2, ...
 */
export function createSequentialIds(prefix: string = 'insight'): () => string {
  let counter = 0;
  return (): string => {
    counter++;
    return `${prefix}-${counter}`;
  };
}
