import { describe, it, expect } from 'vitest';
import {
  mean,
  standardDeviation,
  coefficientOfVariation,
  analyzeHealthDataTrend,
  classifyWorkoutChange,
} from './health-trends.service.js';
import { createDataPoints } from '../__tests__/utils/index.js';

describe('Health Trends Service', () => {
  describe('mean', () => {
    it('should return 0 for an empty list', () => {
      expect(mean([])).toBe(0);
    });

    it('should average values', () => {
      expect(mean([1, 2, 3])).toBe(2);
    });
  });

  describe('standardDeviation', () => {
    it('should return 0 for an empty list', () => {
      expect(standardDeviation([])).toBe(0);
    });

    it('should compute the population standard deviation', () => {
      expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    });
  });

  describe('coefficientOfVariation', () => {
    it('should divide standard deviation by mean', () => {
      expect(coefficientOfVariation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(0.4);
    });

    it('should return 0 when the mean is zero', () => {
      expect(coefficientOfVariation([0, 0])).toBe(0);
      expect(coefficientOfVariation([])).toBe(0);
    });
  });

  describe('analyzeHealthDataTrend', () => {
    it('should handle an empty series', () => {
      const trend = analyzeHealthDataTrend([]);
      expect(trend).toEqual({ dataPoints: [], average: 0, trend: 'stable', percentChange: 0 });
    });

    it('should report no change for a single point', () => {
      const trend = analyzeHealthDataTrend(createDataPoints([82]));
      expect(trend.average).toBe(82);
      expect(trend.percentChange).toBe(0);
      expect(trend.trend).toBe('stable');
    });

    it('should compare the later half to the earlier half', () => {
      const trend = analyzeHealthDataTrend(createDataPoints([100, 100, 110, 110]));
      expect(trend.average).toBe(105);
      expect(trend.percentChange).toBeCloseTo(10, 10);
      expect(trend.trend).toBe('increasing');
    });

    it('should sort points by date before splitting', () => {
      const points = createDataPoints([100, 100, 110, 110]).reverse();
      const trend = analyzeHealthDataTrend(points);

      expect(trend.dataPoints.map((p) => p.date)).toEqual([
        '2024-01-01',
        '2024-01-02',
        '2024-01-03',
        '2024-01-04',
      ]);
      expect(trend.trend).toBe('increasing');
    });

    it('should put the middle point of an odd series in the later half', () => {
      // first half [100], second half [90, 90]
      const trend = analyzeHealthDataTrend(createDataPoints([100, 90, 90]));
      expect(trend.percentChange).toBeCloseTo(-10, 10);
      expect(trend.trend).toBe('decreasing');
    });

    it('should treat changes within 5% as stable', () => {
      const trend = analyzeHealthDataTrend(createDataPoints([100, 104]));
      expect(trend.percentChange).toBeCloseTo(4, 10);
      expect(trend.trend).toBe('stable');
    });

    it('should report no change when the earlier half averages zero', () => {
      const trend = analyzeHealthDataTrend(createDataPoints([0, 10]));
      expect(trend.percentChange).toBe(0);
      expect(trend.trend).toBe('stable');
    });

    it('should not mutate the input', () => {
      const points = createDataPoints([3, 2, 1]).reverse();
      const snapshot = points.map((p) => p.date);
      analyzeHealthDataTrend(points);
      expect(points.map((p) => p.date)).toEqual(snapshot);
    });
  });

  describe('classifyWorkoutChange', () => {
    it('should use a 10% band', () => {
      expect(classifyWorkoutChange(10)).toBe('stable');
      expect(classifyWorkoutChange(-10)).toBe('stable');
      expect(classifyWorkoutChange(10.5)).toBe('increasing');
      expect(classifyWorkoutChange(-10.5)).toBe('decreasing');
    });
  });
});
