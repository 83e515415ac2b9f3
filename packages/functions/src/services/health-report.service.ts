/**
 * Health Report Service
 *
 * Runs the scoring pipeline (training load → recovery → insights →
 * consistency → fitness) and packages the results into one report.
 */

import type {
  HealthAnalyticsSummary,
  HealthReport,
  HealthReportInput,
} from '../shared.js';
import {
  calculateRecoveryScore,
  calculateWorkoutIntensityLast7Days,
} from './recovery-score.service.js';
import { generateHealthInsights, type InsightOptions } from './health-insights.service.js';
import { assessFitnessLevel, calculateConsistencyScore } from './fitness-level.service.js';

export type HealthReportOptions = InsightOptions;

/**
 * Generate a comprehensive health report.
 *
 * Missing HRV, resting heart rate or VO2 max are handled by each component's
 * fallback. Every timestamp in the report is the same instant.
 */
export function generateComprehensiveHealthReport(
  input: HealthReportInput,
  options: HealthReportOptions = {}
): HealthReport {
  const now = options.now ?? new Date();

  const workoutIntensity = calculateWorkoutIntensityLast7Days(input.workoutTrends, now);

  const recoveryScore = calculateRecoveryScore(
    input.hrv,
    input.sleepHours,
    workoutIntensity,
    input.restingHeartRate,
    now
  );

  const insights = generateHealthInsights(
    recoveryScore,
    input.workoutTrends,
    input.stepsHistory,
    input.weightHistory,
    { ...options, now }
  );

  const consistencyScore = calculateConsistencyScore(input.workoutTrends);

  const fitnessAssessment = assessFitnessLevel(
    input.workoutTrends,
    input.vo2Max,
    consistencyScore,
    now
  );

  return {
    recoveryScore,
    insights,
    fitnessAssessment,
    generatedDate: now.toISOString(),
  };
}

/**
 * Summarize a report together with the size of the data behind it.
 */
export function summarizeHealthReport(
  report: HealthReport,
  input: HealthReportInput
): HealthAnalyticsSummary {
  return {
    stepsHistoryCount: input.stepsHistory.length,
    weightHistoryCount: input.weightHistory.length,
    totalWorkouts: input.workoutTrends.totalWorkouts,
    recoveryScore: Math.round(report.recoveryScore.overallScore * 10) / 10,
    recoveryCategory: report.recoveryScore.category,
    fitnessLevel: report.fitnessAssessment.overallLevel,
    healthInsightsCount: report.insights.length,
    lastUpdated: report.generatedDate,
  };
}
