/**
 * Workout Trends Service
 *
 * Aggregates a workout history into weekly buckets, monthly calories and an
 * activity breakdown, and derives weekly frequency and its trend.
 */

import type {
  ActivityTypeData,
  MonthlyData,
  TrendDirection,
  WeeklyWorkoutData,
  WorkoutRecord,
  WorkoutTrends,
} from '../shared.js';
import { classifyWorkoutChange, mean } from './health-trends.service.js';

/** Number of most recent weeks compared against the earlier ones. */
const RECENT_WEEKS = 4;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Get the Monday that starts the week containing a date.
 *
 * Dates are read as UTC calendar days to avoid timezone drift.
 *
 * @param date - Date in YYYY-MM-DD format (a time suffix is ignored)
 * @returns Monday of that week in YYYY-MM-DD format
 */
export function getWeekStart(date: string): string {
  const parts = (date.split('T')[0] ?? date).split('-').map(Number);
  const year = parts[0] ?? 2000;
  const month = parts[1] ?? 1;
  const day = parts[2] ?? 1;

  const dayMs = Date.UTC(year, month - 1, day);
  // getUTCDay() returns 0 for Sunday, 1 for Monday, etc.
  const dayOfWeek = new Date(dayMs).getUTCDay();
  const mondayOffset = dayOfWeek === 0 ? -6 : 1 - dayOfWeek;

  return new Date(dayMs + mondayOffset * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Direction of weekly workout frequency.
 *
 * Compares the average count of the last four weeks with the average of
 * every earlier week. More than 10% up is increasing, more than 10% down is
 * decreasing. Without earlier weeks (or with an idle earlier period) the
 * change is treated as zero.
 *
 * @param weeklyWorkouts - Weekly buckets sorted ascending
 */
export function calculateTrendDirection(weeklyWorkouts: WeeklyWorkoutData[]): TrendDirection {
  if (weeklyWorkouts.length < 2) {
    return 'stable';
  }

  const splitIndex = Math.max(0, weeklyWorkouts.length - RECENT_WEEKS);
  const recentAvg = mean(weeklyWorkouts.slice(splitIndex).map((w) => w.workoutCount));
  const previousAvg = mean(weeklyWorkouts.slice(0, splitIndex).map((w) => w.workoutCount));

  const percentChange = previousAvg > 0 ? ((recentAvg - previousAvg) / previousAvg) * 100 : 0;
  return classifyWorkoutChange(percentChange);
}

function groupByWeek(workouts: WorkoutRecord[]): WeeklyWorkoutData[] {
  const weeks = new Map<string, WeeklyWorkoutData>();

  for (const workout of workouts) {
    const weekStartDate = getWeekStart(workout.date);
    const existing = weeks.get(weekStartDate);
    weeks.set(weekStartDate, {
      weekStartDate,
      workoutCount: (existing?.workoutCount ?? 0) + 1,
      totalDuration: (existing?.totalDuration ?? 0) + workout.durationSeconds,
      totalCalories: (existing?.totalCalories ?? 0) + (workout.caloriesBurned ?? 0),
    });
  }

  return [...weeks.values()].sort((a, b) => a.weekStartDate.localeCompare(b.weekStartDate));
}

function groupCaloriesByMonth(workouts: WorkoutRecord[]): MonthlyData[] {
  const months = new Map<string, number>();
  for (const workout of workouts) {
    const month = workout.date.slice(0, 7);
    months.set(month, (months.get(month) ?? 0) + (workout.caloriesBurned ?? 0));
  }
  return [...months.entries()]
    .map(([month, value]) => ({ month, value }))
    .sort((a, b) => a.month.localeCompare(b.month));
}

function buildActivityBreakdown(workouts: WorkoutRecord[]): ActivityTypeData[] {
  const counts = new Map<string, { count: number; totalDuration: number }>();
  for (const workout of workouts) {
    const existing = counts.get(workout.activityType) ?? { count: 0, totalDuration: 0 };
    counts.set(workout.activityType, {
      count: existing.count + 1,
      totalDuration: existing.totalDuration + workout.durationSeconds,
    });
  }

  const total = workouts.length;
  return [...counts.entries()]
    .map(([activityType, { count, totalDuration }]) => ({
      activityType,
      count,
      totalDuration,
      percentage: total > 0 ? (count / total) * 100 : 0,
    }))
    .sort((a, b) => b.count - a.count);
}

/**
 * Build workout trends from a workout history.
 *
 * @param workouts - Completed workouts in any order
 * @returns Aggregated trends; every average is 0 for an empty history
 */
export function buildWorkoutTrends(workouts: WorkoutRecord[]): WorkoutTrends {
  const weeklyWorkouts = groupByWeek(workouts);

  const totalWorkouts = workouts.length;
  const totalDuration = workouts.reduce((sum, w) => sum + w.durationSeconds, 0);
  const totalCalories = workouts.reduce((sum, w) => sum + (w.caloriesBurned ?? 0), 0);
  const longestWorkout = workouts.reduce((max, w) => Math.max(max, w.durationSeconds), 0);

  return {
    totalWorkouts,
    weeklyWorkouts,
    monthlyCalories: groupCaloriesByMonth(workouts),
    activityTypeBreakdown: buildActivityBreakdown(workouts),
    averageDuration: totalWorkouts > 0 ? totalDuration / totalWorkouts : 0,
    totalDuration,
    longestWorkout,
    totalCalories,
    averageCaloriesPerWorkout: totalWorkouts > 0 ? totalCalories / totalWorkouts : 0,
    workoutsPerWeek: weeklyWorkouts.length > 0 ? totalWorkouts / weeklyWorkouts.length : 0,
    trendDirection: calculateTrendDirection(weeklyWorkouts),
  };
}
