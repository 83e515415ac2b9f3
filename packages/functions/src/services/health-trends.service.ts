/**
 * Health Trends Service
 *
 * Summary statistics over health time series (steps, body weight) used by the
 * insight rules.
 */

import type { HealthDataPoint, HealthDataTrend, TrendDirection } from '../shared.js';

/** Percent change between series halves that counts as a trend. */
const SERIES_TREND_THRESHOLD_PERCENT = 5;

/**
 * Arithmetic mean, or 0 for an empty list.
 */
export function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation, or 0 for an empty list.
 */
export function standardDeviation(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Coefficient of variation (standard deviation / mean).
 *
 * @returns 0 when the list is empty or its mean is not positive
 */
export function coefficientOfVariation(values: number[]): number {
  const avg = mean(values);
  if (avg <= 0) {
    return 0;
  }
  return standardDeviation(values) / avg;
}

function classifyChange(percentChange: number, threshold: number): TrendDirection {
  if (percentChange > threshold) return 'increasing';
  if (percentChange < -threshold) return 'decreasing';
  return 'stable';
}

/**
 * Analyze a time series by comparing its later half to its earlier half.
 *
 * The earlier half holds floor(n / 2) points once sorted by date; with an odd
 * count the middle point belongs to the later half.
 *
 * @param dataPoints - Measurements in any order
 * @returns Sorted points with their average, percent change and direction
 */
export function analyzeHealthDataTrend(dataPoints: HealthDataPoint[]): HealthDataTrend {
  const sorted = [...dataPoints].sort((a, b) => a.date.localeCompare(b.date));
  const average = mean(sorted.map((p) => p.value));

  if (sorted.length < 2) {
    return { dataPoints: sorted, average, trend: 'stable', percentChange: 0 };
  }

  const halfIndex = Math.floor(sorted.length / 2);
  const firstAvg = mean(sorted.slice(0, halfIndex).map((p) => p.value));
  const secondAvg = mean(sorted.slice(halfIndex).map((p) => p.value));

  const percentChange = firstAvg > 0 ? ((secondAvg - firstAvg) / firstAvg) * 100 : 0;

  return {
    dataPoints: sorted,
    average,
    trend: classifyChange(percentChange, SERIES_TREND_THRESHOLD_PERCENT),
    percentChange,
  };
}

/**
 * Week-over-week style direction used for workout frequency, where a wider
 * band counts as stable.
 */
export function classifyWorkoutChange(percentChange: number): TrendDirection {
  return classifyChange(percentChange, 10);
}
