import { describe, it, expect } from 'vitest';
import {
  generateComprehensiveHealthReport,
  summarizeHealthReport,
} from './health-report.service.js';
import {
  calculateRecoveryScore,
  calculateWorkoutIntensityLast7Days,
} from './recovery-score.service.js';
import { generateHealthInsights } from './health-insights.service.js';
import { assessFitnessLevel, calculateConsistencyScore } from './fitness-level.service.js';
import type { HealthReportInput } from '../shared.js';
import {
  FIXED_NOW,
  createDataPoints,
  createEmptyWorkoutTrends,
  createSequentialIds,
  createWeeklyWorkouts,
  createWorkoutTrends,
} from '../__tests__/utils/index.js';

function createInput(overrides: Partial<HealthReportInput> = {}): HealthReportInput {
  return {
    hrv: 42,
    sleepHours: 6.5,
    restingHeartRate: 58,
    vo2Max: 47,
    workoutTrends: createWorkoutTrends({
      weeklyWorkouts: createWeeklyWorkouts([3, 4, 5, 6], { startDate: '2024-02-19' }),
      totalWorkouts: 18,
      workoutsPerWeek: 4.5,
      trendDirection: 'increasing',
    }),
    stepsHistory: createDataPoints([7000, 7500, 6800]),
    weightHistory: createDataPoints([81, 80.5, 80.8, 80.2]),
    ...overrides,
  };
}

describe('Health Report Service', () => {
  describe('generateComprehensiveHealthReport', () => {
    it('should compose the individual calculators', () => {
      const input = createInput();
      const report = generateComprehensiveHealthReport(input, {
        now: FIXED_NOW,
        idFactory: createSequentialIds(),
      });

      const intensity = calculateWorkoutIntensityLast7Days(input.workoutTrends, FIXED_NOW);
      const recoveryScore = calculateRecoveryScore(
        input.hrv,
        input.sleepHours,
        intensity,
        input.restingHeartRate,
        FIXED_NOW
      );
      const insights = generateHealthInsights(
        recoveryScore,
        input.workoutTrends,
        input.stepsHistory,
        input.weightHistory,
        { now: FIXED_NOW, idFactory: createSequentialIds() }
      );
      const consistency = calculateConsistencyScore(input.workoutTrends);

      expect(report).toEqual({
        recoveryScore,
        insights,
        fitnessAssessment: assessFitnessLevel(input.workoutTrends, input.vo2Max, consistency, FIXED_NOW),
        generatedDate: FIXED_NOW.toISOString(),
      });
    });

    it('should score recent training load from the current week', () => {
      const report = generateComprehensiveHealthReport(createInput(), { now: FIXED_NOW });
      expect(report.recoveryScore.workoutLoadScore).toBeLessThan(100);
    });

    it('should treat an old training history as no recent load', () => {
      const input = createInput({
        workoutTrends: createWorkoutTrends({
          weeklyWorkouts: createWeeklyWorkouts([5], {
            minutesPerWorkout: 90,
            caloriesPerWorkout: 900,
            startDate: '2023-06-05',
          }),
        }),
      });
      const report = generateComprehensiveHealthReport(input, { now: FIXED_NOW });

      expect(report.recoveryScore.workoutLoadScore).toBe(100);
    });

    it('should use one timestamp throughout', () => {
      const report = generateComprehensiveHealthReport(createInput(), { now: FIXED_NOW });
      const iso = FIXED_NOW.toISOString();

      expect(report.generatedDate).toBe(iso);
      expect(report.recoveryScore.date).toBe(iso);
      expect(report.fitnessAssessment.assessmentDate).toBe(iso);
      expect(report.insights.every((i) => i.date === iso)).toBe(true);
    });

    it('should pass the insight cap through', () => {
      const report = generateComprehensiveHealthReport(createInput(), { now: FIXED_NOW, maxInsights: 1 });
      expect(report.insights.length).toBeLessThanOrEqual(1);
    });

    it('should fall back gracefully when optional signals are missing', () => {
      const input = createInput({
        hrv: null,
        sleepHours: 8,
        restingHeartRate: null,
        vo2Max: null,
        workoutTrends: createEmptyWorkoutTrends(),
        stepsHistory: [],
        weightHistory: [],
      });
      const report = generateComprehensiveHealthReport(input, {
        now: FIXED_NOW,
        idFactory: createSequentialIds(),
      });

      // 50 × 0.4 + 92.5 × 0.35 + 100 × 0.2 + 50 × 0.05
      expect(report.recoveryScore.overallScore).toBeCloseTo(74.875, 10);
      expect(report.recoveryScore.category).toBe('good');
      expect(report.insights.map((i) => i.title)).toEqual(['Low Workout Frequency', 'Great Sleep']);
      expect(report.fitnessAssessment).toEqual({
        overallLevel: 'beginner',
        cardioLevel: 'beginner',
        strengthLevel: 'beginner',
        consistencyScore: 0,
        progressTrend: 'stable',
        assessmentDate: FIXED_NOW.toISOString(),
      });

      expect(summarizeHealthReport(report, input)).toEqual({
        stepsHistoryCount: 0,
        weightHistoryCount: 0,
        totalWorkouts: 0,
        recoveryScore: 74.9,
        recoveryCategory: 'good',
        fitnessLevel: 'beginner',
        healthInsightsCount: 2,
        lastUpdated: FIXED_NOW.toISOString(),
      });
    });
  });

  describe('summarizeHealthReport', () => {
    it('should count the data behind the report', () => {
      const input = createInput();
      const report = generateComprehensiveHealthReport(input, { now: FIXED_NOW });
      const summary = summarizeHealthReport(report, input);

      expect(summary.stepsHistoryCount).toBe(3);
      expect(summary.weightHistoryCount).toBe(4);
      expect(summary.totalWorkouts).toBe(18);
      expect(summary.healthInsightsCount).toBe(report.insights.length);
      expect(summary.fitnessLevel).toBe(report.fitnessAssessment.overallLevel);
    });
  });
});
