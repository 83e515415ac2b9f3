/**
 * Fitness Level Service
 *
 * Classifies cardio and strength fitness and combines them into an overall
 * level, adjusted for training consistency.
 *
 * Levels are ranked beginner (1) < intermediate (2) < advanced (3) < elite (4).
 */

import type { FitnessLevel, FitnessLevelAssessment, WorkoutTrends } from '../shared.js';
import { clampScore } from './recovery-score.service.js';
import { coefficientOfVariation, mean } from './health-trends.service.js';

export const FITNESS_LEVELS: readonly FitnessLevel[] = [
  'beginner',
  'intermediate',
  'advanced',
  'elite',
];

export function fitnessLevelRank(level: FitnessLevel): number {
  switch (level) {
    case 'beginner':
      return 1;
    case 'intermediate':
      return 2;
    case 'advanced':
      return 3;
    case 'elite':
      return 4;
  }
}

/**
 * Classify VO2 max (mL/kg/min) using ACSM-style bands.
 *
 * - Beginner: < 35 (poor to fair)
 * - Intermediate: 35-45
 * - Advanced: 45-55
 * - Elite: 55+
 */
export function classifyVO2Max(vo2Max: number): FitnessLevel {
  if (vo2Max >= 55) return 'elite';
  if (vo2Max >= 45) return 'advanced';
  if (vo2Max >= 35) return 'intermediate';
  return 'beginner';
}

/**
 * Cardio level from VO2 max, or estimated from frequency and session length
 * when VO2 max is unavailable.
 */
export function assessCardioLevel(workoutTrends: WorkoutTrends, vo2Max: number | null): FitnessLevel {
  if (vo2Max !== null && Number.isFinite(vo2Max) && vo2Max > 0) {
    return classifyVO2Max(vo2Max);
  }

  const avgMinutes = workoutTrends.averageDuration / 60;
  const weekly = workoutTrends.workoutsPerWeek;

  if (weekly >= 5 && avgMinutes >= 45) return 'advanced';
  if (weekly >= 3 && avgMinutes >= 30) return 'intermediate';
  return 'beginner';
}

function frequencyPoints(workoutsPerWeek: number): number {
  if (workoutsPerWeek < 1) return 0;
  if (workoutsPerWeek < 2) return 1;
  if (workoutsPerWeek < 3) return 2;
  if (workoutsPerWeek < 4) return 3;
  if (workoutsPerWeek < 5) return 4;
  return 5;
}

// Sessions past 75 minutes lose a point: quality tends to drop off.
function durationPoints(avgMinutes: number): number {
  if (avgMinutes < 20) return 0;
  if (avgMinutes < 30) return 1;
  if (avgMinutes < 45) return 2;
  if (avgMinutes <= 75) return 3;
  return 2;
}

function experiencePoints(totalWorkouts: number): number {
  if (totalWorkouts < 10) return 0;
  if (totalWorkouts < 25) return 1;
  if (totalWorkouts < 50) return 2;
  if (totalWorkouts < 100) return 3;
  return 4;
}

/**
 * Strength points before level mapping: frequency (0-5) + duration (0-3) +
 * experience (0-4), scaled by 0.5 + 0.5 × consistency / 100.
 */
export function calculateStrengthPoints(workoutTrends: WorkoutTrends, consistencyScore: number): number {
  const raw =
    frequencyPoints(workoutTrends.workoutsPerWeek) +
    durationPoints(workoutTrends.averageDuration / 60) +
    experiencePoints(workoutTrends.totalWorkouts);

  const consistencyMultiplier = 0.5 + 0.5 * (clampScore(consistencyScore) / 100);
  return raw * consistencyMultiplier;
}

export function assessStrengthLevel(workoutTrends: WorkoutTrends, consistencyScore: number): FitnessLevel {
  const points = calculateStrengthPoints(workoutTrends, consistencyScore);
  if (points < 3) return 'beginner';
  if (points < 6) return 'intermediate';
  if (points < 9) return 'advanced';
  return 'elite';
}

/**
 * Combine cardio and strength levels.
 *
 * Averages the two ranks, shifts by (consistency - 50) / 100 (±0.5) and
 * rounds to the nearest level.
 */
export function combineFitnessLevels(
  cardioLevel: FitnessLevel,
  strengthLevel: FitnessLevel,
  consistencyScore: number
): FitnessLevel {
  const average = (fitnessLevelRank(cardioLevel) + fitnessLevelRank(strengthLevel)) / 2;
  const adjusted = average + (clampScore(consistencyScore) - 50) / 100;

  if (adjusted < 1.5) return 'beginner';
  if (adjusted < 2.5) return 'intermediate';
  if (adjusted < 3.5) return 'advanced';
  return 'elite';
}

/**
 * Score how regularly the user trains (0-100).
 *
 * Starts from 100 minus the coefficient of variation of weekly workout counts
 * (as a percentage, floored at 0) and adds up to 20 points for average
 * weekly activity (5 points per weekly workout).
 *
 * @returns 0 when there are no weekly buckets or no workouts at all
 */
export function calculateConsistencyScore(workoutTrends: WorkoutTrends): number {
  const counts = workoutTrends.weeklyWorkouts.map((w) => w.workoutCount);
  const average = mean(counts);
  if (counts.length === 0 || average <= 0) {
    return 0;
  }

  const base = Math.max(0, 100 - coefficientOfVariation(counts) * 100);
  const activityBonus = Math.min(20, average * 5);
  return clampScore(base + activityBonus);
}

/**
 * Assess overall fitness.
 *
 * @param workoutTrends - Training statistics
 * @param vo2Max - VO2 max in mL/kg/min, or null when unavailable
 * @param consistencyScore - 0-100, see calculateConsistencyScore
 * @param now - Assessment timestamp (defaults to the current time)
 */
export function assessFitnessLevel(
  workoutTrends: WorkoutTrends,
  vo2Max: number | null,
  consistencyScore: number,
  now: Date = new Date()
): FitnessLevelAssessment {
  const consistency = clampScore(Number.isFinite(consistencyScore) ? consistencyScore : 0);
  const cardioLevel = assessCardioLevel(workoutTrends, vo2Max);
  const strengthLevel = assessStrengthLevel(workoutTrends, consistency);

  return {
    overallLevel: combineFitnessLevels(cardioLevel, strengthLevel, consistency),
    cardioLevel,
    strengthLevel,
    consistencyScore: consistency,
    progressTrend: workoutTrends.trendDirection,
    assessmentDate: now.toISOString(),
  };
}
