/**
 * Health Insights Service
 *
 * Rule table that inspects a recovery score, workout trends and step/weight
 * history and emits prioritized, human-readable insights.
 *
 * Each rule produces at most one insight. The combined list is ordered by
 * priority (high first), then actionable before informational, and capped.
 */

import { randomUUID } from 'node:crypto';
import type {
  HealthDataPoint,
  HealthInsight,
  InsightPriority,
  InsightType,
  RecoveryBottleneck,
  RecoveryScore,
  WorkoutTrends,
} from '../shared.js';
import { analyzeHealthDataTrend, coefficientOfVariation, mean } from './health-trends.service.js';

export const DEFAULT_MAX_INSIGHTS = 6;

/** Weight coefficient of variation (%) above which the series counts as volatile. */
const WEIGHT_VOLATILITY_THRESHOLD_PERCENT = 2;

export interface InsightOptions {
  now?: Date;
  maxInsights?: number;
  idFactory?: () => string;
}

/**
 * Everything a rule can look at, computed once per evaluation.
 */
export interface InsightContext {
  recovery: RecoveryScore;
  trends: WorkoutTrends;
  stepsAverage: number | null; // null when there is no step history
  weightPercentChange: number | null; // null with fewer than 2 weights
  weightVolatilityPercent: number | null; // null with fewer than 3 weights
}

/**
 * Insight content before it is stamped with an id and date.
 */
export interface InsightDraft {
  type: InsightType;
  title: string;
  message: string;
  priority: InsightPriority;
  actionable: boolean;
  action: string | null;
}

type InsightRule = (ctx: InsightContext) => InsightDraft | null;

function round(value: number): string {
  return String(Math.round(value));
}

function oneDecimal(value: number): string {
  return value.toFixed(1);
}

export function priorityRank(priority: InsightPriority): number {
  switch (priority) {
    case 'high':
      return 0;
    case 'medium':
      return 1;
    case 'low':
      return 2;
  }
}

/**
 * Find the lowest recovery sub-score. Ties resolve in the order
 * hrv, sleep, trainingLoad, restingHeartRate.
 */
export function findRecoveryBottleneck(recovery: RecoveryScore): RecoveryBottleneck {
  const candidates: [RecoveryBottleneck, number][] = [
    ['hrv', recovery.hrvScore],
    ['sleep', recovery.sleepScore],
    ['trainingLoad', recovery.workoutLoadScore],
    ['restingHeartRate', recovery.restingHeartRateScore],
  ];

  let lowest: RecoveryBottleneck = 'hrv';
  let lowestScore = recovery.hrvScore;
  for (const [name, score] of candidates) {
    if (score < lowestScore) {
      lowest = name;
      lowestScore = score;
    }
  }
  return lowest;
}

function describeBottleneck(
  bottleneck: RecoveryBottleneck,
  recovery: RecoveryScore
): { factor: string; score: number; action: string } {
  switch (bottleneck) {
    case 'hrv':
      return {
        factor: 'Heart rate variability',
        score: recovery.hrvScore,
        action: 'Take a rest day with light mobility work and breathing exercises.',
      };
    case 'sleep':
      return {
        factor: 'Sleep',
        score: recovery.sleepScore,
        action: 'Go to bed 60 minutes earlier tonight and skip intense training today.',
      };
    case 'trainingLoad':
      return {
        factor: 'Recent training load',
        score: recovery.workoutLoadScore,
        action: 'Replace your next hard session with an easy recovery workout.',
      };
    case 'restingHeartRate':
      return {
        factor: 'Resting heart rate',
        score: recovery.restingHeartRateScore,
        action: 'Keep activity light and hydrate well until your resting heart rate settles.',
      };
  }
}

// --- Recovery rules ---

const recoveryBottleneckRule: InsightRule = ({ recovery }) => {
  if (recovery.overallScore >= 40) {
    return null;
  }
  const { factor, score, action } = describeBottleneck(findRecoveryBottleneck(recovery), recovery);
  return {
    type: 'recovery',
    title: 'Low Recovery',
    message: `Your recovery score is ${round(recovery.overallScore)}. ${factor} (${round(score)}/100) is the main limiting factor.`,
    priority: 'high',
    actionable: true,
    action,
  };
};

const peakPerformanceRule: InsightRule = ({ recovery }) => {
  if (recovery.overallScore <= 85) {
    return null;
  }
  return {
    type: 'recovery',
    title: 'Peak Performance Window',
    message: `Your recovery score is ${round(recovery.overallScore)}. Your body is ready for a demanding session.`,
    priority: 'medium',
    actionable: true,
    action: 'Schedule a high-intensity or personal-record attempt today.',
  };
};

// --- Sleep rules ---

const sleepPatternRule: InsightRule = ({ recovery }) => {
  const { sleepScore } = recovery;
  if (sleepScore < 50) {
    return {
      type: 'sleep',
      title: 'Critical Sleep Deficit',
      message: `Your sleep score is ${round(sleepScore)}. Short sleep is severely limiting your recovery.`,
      priority: 'high',
      actionable: true,
      action: 'Aim for at least 7 hours tonight and avoid screens an hour before bed.',
    };
  }
  if (sleepScore < 70) {
    return {
      type: 'sleep',
      title: 'Improve Sleep Quality',
      message: `Your sleep score is ${round(sleepScore)}. A little more sleep would noticeably improve recovery.`,
      priority: 'medium',
      actionable: true,
      action: 'Keep a consistent bedtime and a cool, dark bedroom.',
    };
  }
  if (sleepScore > 90) {
    return {
      type: 'sleep',
      title: 'Great Sleep',
      message: `Your sleep score is ${round(sleepScore)}. You are well rested.`,
      priority: 'low',
      actionable: true,
      action: 'Make the most of it and train hard today.',
    };
  }
  return null;
};

// --- Workout rules ---

const workoutFrequencyRule: InsightRule = ({ recovery, trends }) => {
  if (trends.workoutsPerWeek < 2) {
    return {
      type: 'workout',
      title: 'Low Workout Frequency',
      message: `You are averaging ${oneDecimal(trends.workoutsPerWeek)} workouts per week.`,
      priority: 'medium',
      actionable: true,
      action: 'Plan at least two sessions on fixed days this week.',
    };
  }
  if (trends.workoutsPerWeek > 6 && recovery.overallScore < 60) {
    return {
      type: 'workout',
      title: 'Overtraining Risk',
      message: `You are averaging ${oneDecimal(trends.workoutsPerWeek)} workouts per week while recovery is ${round(recovery.overallScore)}.`,
      priority: 'high',
      actionable: true,
      action: 'Add at least two rest days this week.',
    };
  }
  return null;
};

const workoutTrendRule: InsightRule = ({ recovery, trends }) => {
  switch (trends.trendDirection) {
    case 'decreasing':
      return {
        type: 'workout',
        title: 'Motivation Dropping',
        message: 'Your workout frequency has dropped compared to previous weeks.',
        priority: 'medium',
        actionable: true,
        action: 'Try a new activity or train with a friend to rebuild momentum.',
      };
    case 'increasing':
      if (recovery.overallScore <= 70) {
        return null;
      }
      return {
        type: 'workout',
        title: 'Great Momentum',
        message: 'Your workout frequency is rising and your recovery is keeping up.',
        priority: 'low',
        actionable: false,
        action: null,
      };
    case 'stable':
      return null;
  }
};

// --- Steps rules ---

const stepsActivityRule: InsightRule = ({ stepsAverage }) => {
  if (stepsAverage === null) {
    return null;
  }
  if (stepsAverage < 5000) {
    return {
      type: 'steps',
      title: 'Very Low Activity',
      message: `You are averaging ${round(stepsAverage)} steps per day.`,
      priority: 'high',
      actionable: true,
      action: 'Add a 20-minute walk to your day.',
    };
  }
  if (stepsAverage < 8000) {
    return {
      type: 'steps',
      title: 'Daily Activity Can Improve',
      message: `You are averaging ${round(stepsAverage)} steps per day. 8000 or more supports recovery and heart health.`,
      priority: 'medium',
      actionable: true,
      action: 'Take the stairs and walk during calls.',
    };
  }
  return null;
};

const sedentaryOutsideGymRule: InsightRule = ({ stepsAverage, trends }) => {
  if (stepsAverage === null || trends.workoutsPerWeek <= 4 || stepsAverage >= 6000) {
    return null;
  }
  return {
    type: 'steps',
    title: 'Active in the Gym, Sedentary Otherwise',
    message: `You train ${oneDecimal(trends.workoutsPerWeek)} times per week but average only ${round(stepsAverage)} steps per day.`,
    priority: 'medium',
    actionable: true,
    action: 'Break up long sitting periods with short walks.',
  };
};

// --- Weight rules ---

const rapidWeightChangeRule: InsightRule = ({ weightPercentChange }) => {
  if (weightPercentChange === null || Math.abs(weightPercentChange) <= 10) {
    return null;
  }
  const direction = weightPercentChange > 0 ? 'increased' : 'decreased';
  return {
    type: 'weight',
    title: 'Rapid Weight Change',
    message: `Your weight has ${direction} by ${oneDecimal(Math.abs(weightPercentChange))}% over this period.`,
    priority: Math.abs(weightPercentChange) > 15 ? 'high' : 'medium',
    actionable: true,
    action: 'Review your nutrition and consider talking to a health professional.',
  };
};

const weightFluctuationRule: InsightRule = ({ weightVolatilityPercent, trends }) => {
  if (
    weightVolatilityPercent === null ||
    weightVolatilityPercent <= WEIGHT_VOLATILITY_THRESHOLD_PERCENT ||
    trends.workoutsPerWeek < 3
  ) {
    return null;
  }
  return {
    type: 'weight',
    title: 'Weight Fluctuation',
    message: `Your weight varies by ${oneDecimal(weightVolatilityPercent)}% around its average.`,
    priority: 'medium',
    actionable: true,
    action: 'Weigh in at the same time each morning and keep hydration consistent.',
  };
};

// --- Cross-metric rules ---

const burnoutSignalRule: InsightRule = ({ recovery, trends }) => {
  if (trends.workoutsPerWeek <= 5 || recovery.overallScore >= 50) {
    return null;
  }
  return {
    type: 'recovery',
    title: 'Training and Recovery Imbalance',
    message: `High training frequency (${oneDecimal(trends.workoutsPerWeek)} per week) with a recovery score of ${round(recovery.overallScore)} is an early burnout signal.`,
    priority: 'high',
    actionable: true,
    action: 'Plan a deload week with reduced volume.',
  };
};

const trainingSynergyRule: InsightRule = ({ recovery, trends }) => {
  if (recovery.sleepScore <= 85 || trends.trendDirection !== 'increasing') {
    return null;
  }
  return {
    type: 'sleep',
    title: 'Sleep and Training Synergy',
    message: 'Great sleep is supporting your rising training volume.',
    priority: 'low',
    actionable: false,
    action: null,
  };
};

const activeButUnstructuredRule: InsightRule = ({ stepsAverage, trends }) => {
  if (stepsAverage === null || stepsAverage <= 12000 || trends.workoutsPerWeek >= 2) {
    return null;
  }
  return {
    type: 'workout',
    title: 'Active but Unstructured',
    message: `You average ${round(stepsAverage)} steps per day but rarely log workouts.`,
    priority: 'medium',
    actionable: true,
    action: 'Add two structured strength sessions per week.',
  };
};

/**
 * Every rule, in evaluation order. Ties after sorting keep this order.
 */
export const INSIGHT_RULES: readonly InsightRule[] = [
  recoveryBottleneckRule,
  peakPerformanceRule,
  sleepPatternRule,
  workoutFrequencyRule,
  workoutTrendRule,
  stepsActivityRule,
  sedentaryOutsideGymRule,
  rapidWeightChangeRule,
  weightFluctuationRule,
  burnoutSignalRule,
  trainingSynergyRule,
  activeButUnstructuredRule,
];

/**
 * Compute the derived metrics the rules share.
 */
export function buildInsightContext(
  recovery: RecoveryScore,
  trends: WorkoutTrends,
  stepsHistory: HealthDataPoint[],
  weightHistory: HealthDataPoint[]
): InsightContext {
  const weightValues = weightHistory.map((p) => p.value);
  return {
    recovery,
    trends,
    stepsAverage: stepsHistory.length > 0 ? mean(stepsHistory.map((p) => p.value)) : null,
    weightPercentChange:
      weightHistory.length >= 2 ? analyzeHealthDataTrend(weightHistory).percentChange : null,
    weightVolatilityPercent:
      weightHistory.length >= 3 ? coefficientOfVariation(weightValues) * 100 : null,
  };
}

/**
 * Order insights by priority, then actionable first. The sort is stable.
 */
export function sortInsights<T extends { priority: InsightPriority; actionable: boolean }>(
  insights: T[]
): T[] {
  return [...insights].sort((a, b) => {
    const byPriority = priorityRank(a.priority) - priorityRank(b.priority);
    if (byPriority !== 0) {
      return byPriority;
    }
    return Number(b.actionable) - Number(a.actionable);
  });
}

/**
 * Generate health insights.
 *
 * @param recoveryScore - Today's recovery score
 * @param workoutTrends - Training statistics
 * @param stepsHistory - Daily step counts (may be empty)
 * @param weightHistory - Body weight readings (may be empty)
 * @param options - Timestamp, id generator and the cap (default 6)
 * @returns At most `maxInsights` insights, priority ordered
 */
export function generateHealthInsights(
  recoveryScore: RecoveryScore,
  workoutTrends: WorkoutTrends,
  stepsHistory: HealthDataPoint[],
  weightHistory: HealthDataPoint[],
  options: InsightOptions = {}
): HealthInsight[] {
  const date = (options.now ?? new Date()).toISOString();
  const idFactory = options.idFactory ?? randomUUID;
  const requested = options.maxInsights ?? DEFAULT_MAX_INSIGHTS;
  const maxInsights = Number.isFinite(requested) ? Math.max(0, requested) : DEFAULT_MAX_INSIGHTS;

  const ctx = buildInsightContext(recoveryScore, workoutTrends, stepsHistory, weightHistory);

  const drafts = INSIGHT_RULES.map((rule) => rule(ctx)).filter(
    (draft): draft is InsightDraft => draft !== null
  );

  return sortInsights(drafts)
    .slice(0, maxInsights)
    .map((draft) => ({ id: idFactory(), ...draft, date }));
}
