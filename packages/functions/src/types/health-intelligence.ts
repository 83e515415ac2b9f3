/**
 * Health Intelligence Types
 *
 * Records produced by the health scoring engine. Every record is built fresh
 * for a single report and never mutated afterwards.
 */

import type {
  HealthDataPoint,
  TrendDirection,
  WorkoutTrends,
} from './health-data.js';

// --- Recovery ---

export type RecoveryCategory = 'excellent' | 'good' | 'moderate' | 'poor' | 'critical';

export interface RecoveryScore {
  overallScore: number; // 0-100
  hrvScore: number; // 0-100
  sleepScore: number; // 0-100
  workoutLoadScore: number; // 0-100
  restingHeartRateScore: number; // 0-100
  date: string; // ISO 8601 timestamp
  category: RecoveryCategory;
  recommendation: string;
}

/**
 * Sub-scores that can limit recovery, in tie-break order.
 */
export type RecoveryBottleneck = 'hrv' | 'sleep' | 'trainingLoad' | 'restingHeartRate';

// --- Insights ---

export type InsightType =
  | 'workout'
  | 'sleep'
  | 'nutrition'
  | 'recovery'
  | 'heartHealth'
  | 'weight'
  | 'steps';

export type InsightPriority = 'high' | 'medium' | 'low';

export interface HealthInsight {
  id: string;
  type: InsightType;
  title: string;
  message: string;
  priority: InsightPriority;
  date: string; // ISO 8601 timestamp
  actionable: boolean;
  action: string | null;
}

// --- Fitness Level ---

export type FitnessLevel = 'beginner' | 'intermediate' | 'advanced' | 'elite';

export interface FitnessLevelAssessment {
  overallLevel: FitnessLevel;
  cardioLevel: FitnessLevel;
  strengthLevel: FitnessLevel;
  consistencyScore: number; // 0-100
  progressTrend: TrendDirection;
  assessmentDate: string; // ISO 8601 timestamp
}

// --- Report ---

/**
 * Everything the engine needs, already fetched by the caller.
 */
export interface HealthReportInput {
  hrv: number | null; // ms
  sleepHours: number;
  restingHeartRate: number | null; // bpm
  vo2Max: number | null; // mL/kg/min
  workoutTrends: WorkoutTrends;
  stepsHistory: HealthDataPoint[];
  weightHistory: HealthDataPoint[];
}

export interface HealthReport {
  recoveryScore: RecoveryScore;
  insights: HealthInsight[];
  fitnessAssessment: FitnessLevelAssessment;
  generatedDate: string; // ISO 8601 timestamp
}

/**
 * Compact overview of a generated report, for dashboards.
 */
export interface HealthAnalyticsSummary {
  stepsHistoryCount: number;
  weightHistoryCount: number;
  totalWorkouts: number;
  recoveryScore: number;
  recoveryCategory: RecoveryCategory;
  fitnessLevel: FitnessLevel;
  healthInsightsCount: number;
  lastUpdated: string; // ISO 8601 timestamp
}
