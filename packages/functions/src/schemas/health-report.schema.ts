import { z } from 'zod';

/**
 * Health Report Schemas
 *
 * Zod validation schemas for health scoring API inputs.
 */

// --- Date Pattern ---

const datePattern = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True when the string names a real calendar day (no 2024-02-31, no year 0).
 */
function isCalendarDate(value: string): boolean {
  const [year = 0, month = 0, day = 0] = value.split('-').map(Number);
  if (year < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

const dateSchema = z
  .string()
  .regex(datePattern, 'Date must be in YYYY-MM-DD format')
  .refine(isCalendarDate, 'Date must be a valid calendar date');

// --- Physiological Signals ---

const hrvSchema = z.number().min(0).max(300).nullable().optional(); // ms
const sleepHoursSchema = z.number().min(0).max(24);
const restingHeartRateSchema = z.number().min(25).max(220).nullable().optional(); // bpm
const vo2MaxSchema = z.number().min(0).max(100).nullable().optional(); // mL/kg/min

// --- Time Series ---

/**
 * Schema for a single dated measurement (steps, weight).
 */
export const healthDataPointSchema = z.object({
  date: dateSchema,
  value: z.number().min(0).max(1_000_000),
  unit: z.string().max(20).optional(),
});

export type HealthDataPointInput = z.infer<typeof healthDataPointSchema>;

// --- Workouts ---

/**
 * Schema for a completed workout.
 */
export const workoutRecordSchema = z.object({
  date: dateSchema,
  activityType: z.string().trim().min(1).max(100),
  durationSeconds: z.number().min(0).max(86_400),
  caloriesBurned: z.number().min(0).max(20_000).optional(),
});

export type WorkoutRecordInput = z.infer<typeof workoutRecordSchema>;

const workoutsSchema = z.array(workoutRecordSchema).max(2000);
const seriesSchema = z.array(healthDataPointSchema).max(1000);

// --- Requests ---

/**
 * Schema for POST /health-report/report.
 */
export const healthReportRequestSchema = z.object({
  hrv: hrvSchema,
  sleepHours: sleepHoursSchema,
  restingHeartRate: restingHeartRateSchema,
  vo2Max: vo2MaxSchema,
  workouts: workoutsSchema.default([]),
  steps: seriesSchema.default([]),
  weight: seriesSchema.default([]),
});

export type HealthReportRequest = z.infer<typeof healthReportRequestSchema>;

/**
 * Schema for POST /health-report/recovery-score.
 */
export const recoveryScoreRequestSchema = z.object({
  hrv: hrvSchema,
  sleepHours: sleepHoursSchema,
  workoutIntensity: z.number().min(0).max(10),
  restingHeartRate: restingHeartRateSchema,
});

export type RecoveryScoreRequest = z.infer<typeof recoveryScoreRequestSchema>;

/**
 * Schema for POST /health-report/workout-trends.
 */
export const workoutTrendsRequestSchema = z.object({
  workouts: workoutsSchema,
});

export type WorkoutTrendsRequest = z.infer<typeof workoutTrendsRequestSchema>;
