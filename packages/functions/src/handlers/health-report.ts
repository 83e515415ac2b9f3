/**
 * Health Report Handlers
 *
 * Express app exposing the health scoring engine: full reports, standalone
 * recovery scores and workout trend aggregation.
 */

import { type Request, type Response } from 'express';
import { info } from 'firebase-functions/logger';
import { errorHandler } from '../middleware/error-handler.js';
import { createBaseApp } from '../middleware/create-base-app.js';
import { validate } from '../middleware/validate.js';
import { getConfig } from '../config.js';
import { buildWorkoutTrends } from '../services/workout-trends.service.js';
import { calculateRecoveryScore } from '../services/recovery-score.service.js';
import {
  generateComprehensiveHealthReport,
  summarizeHealthReport,
} from '../services/health-report.service.js';
import {
  healthReportRequestSchema,
  recoveryScoreRequestSchema,
  workoutTrendsRequestSchema,
  type ApiSuccess,
  type HealthAnalyticsSummary,
  type HealthReport,
  type HealthReportInput,
  type RecoveryScore,
  type WorkoutTrends,
} from '../shared.js';

const TAG = '[Health Report]';

const app = createBaseApp('health-report');

// POST /health-report/report
// Build workout trends from the raw history and run the full scoring pipeline
app.post(
  '/report',
  validate(healthReportRequestSchema),
  (req: Request, res: Response) => {
    const start = Date.now();
    const body = healthReportRequestSchema.parse(req.body);

    const input: HealthReportInput = {
      hrv: body.hrv ?? null,
      sleepHours: body.sleepHours,
      restingHeartRate: body.restingHeartRate ?? null,
      vo2Max: body.vo2Max ?? null,
      workoutTrends: buildWorkoutTrends(body.workouts),
      stepsHistory: body.steps,
      weightHistory: body.weight,
    };

    const report = generateComprehensiveHealthReport(input, {
      maxInsights: getConfig().maxInsights,
    });
    const summary = summarizeHealthReport(report, input);

    info(`${TAG} POST /report`, {
      workouts: body.workouts.length,
      steps: body.steps.length,
      weights: body.weight.length,
      hasHrv: input.hrv !== null,
      hasRestingHeartRate: input.restingHeartRate !== null,
      hasVo2Max: input.vo2Max !== null,
      recoveryScore: summary.recoveryScore,
      recoveryCategory: summary.recoveryCategory,
      fitnessLevel: summary.fitnessLevel,
      insights: summary.healthInsightsCount,
      elapsedMs: Date.now() - start,
    });

    const response: ApiSuccess<{ report: HealthReport; summary: HealthAnalyticsSummary }> = {
      success: true,
      data: { report, summary },
    };
    res.json(response);
  }
);

// POST /health-report/recovery-score
app.post(
  '/recovery-score',
  validate(recoveryScoreRequestSchema),
  (req: Request, res: Response) => {
    const body = recoveryScoreRequestSchema.parse(req.body);

    const recoveryScore = calculateRecoveryScore(
      body.hrv ?? null,
      body.sleepHours,
      body.workoutIntensity,
      body.restingHeartRate ?? null
    );

    info(`${TAG} POST /recovery-score`, {
      overallScore: recoveryScore.overallScore,
      category: recoveryScore.category,
    });

    const response: ApiSuccess<RecoveryScore> = { success: true, data: recoveryScore };
    res.json(response);
  }
);

// POST /health-report/workout-trends
app.post(
  '/workout-trends',
  validate(workoutTrendsRequestSchema),
  (req: Request, res: Response) => {
    const { workouts } = workoutTrendsRequestSchema.parse(req.body);
    const trends = buildWorkoutTrends(workouts);

    info(`${TAG} POST /workout-trends`, {
      workouts: workouts.length,
      weeks: trends.weeklyWorkouts.length,
      trendDirection: trends.trendDirection,
    });

    const response: ApiSuccess<WorkoutTrends> = { success: true, data: trends };
    res.json(response);
  }
);

// Error handler must be last
app.use(errorHandler);

export const healthReportApp = app;
