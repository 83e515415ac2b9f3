/**
 * Health Data Types
 *
 * Raw inputs consumed by the health scoring engine: time series from the
 * health-data collaborator and workout aggregates from the workout-trends
 * collaborator.
 */

// --- Trend Direction ---

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

// --- Time Series ---

/**
 * A single dated measurement (daily steps, body weight, ...).
 */
export interface HealthDataPoint {
  date: string; // YYYY-MM-DD format
  value: number;
  unit?: string;
}

/**
 * Summary of a time series split into an earlier and a later half.
 */
export interface HealthDataTrend {
  dataPoints: HealthDataPoint[]; // sorted by date ascending
  average: number;
  trend: TrendDirection;
  percentChange: number; // later half vs earlier half
}

// --- Workouts ---

/**
 * A completed workout as reported by the workout history.
 */
export interface WorkoutRecord {
  date: string; // YYYY-MM-DD format
  activityType: string;
  durationSeconds: number;
  caloriesBurned?: number;
}

/**
 * Workouts grouped into a Monday-start week.
 */
export interface WeeklyWorkoutData {
  weekStartDate: string; // YYYY-MM-DD (Monday)
  workoutCount: number;
  totalDuration: number; // seconds
  totalCalories: number;
}

export interface MonthlyData {
  month: string; // YYYY-MM format
  value: number;
}

export interface ActivityTypeData {
  activityType: string;
  count: number;
  totalDuration: number; // seconds
  percentage: number; // 0-100 share of all workouts
}

/**
 * Aggregate training statistics over the analysed window.
 */
export interface WorkoutTrends {
  totalWorkouts: number;
  weeklyWorkouts: WeeklyWorkoutData[]; // sorted by weekStartDate ascending
  monthlyCalories: MonthlyData[];
  activityTypeBreakdown: ActivityTypeData[];
  averageDuration: number; // seconds
  totalDuration: number; // seconds
  longestWorkout: number; // seconds
  totalCalories: number;
  averageCaloriesPerWorkout: number;
  workoutsPerWeek: number;
  trendDirection: TrendDirection;
}
