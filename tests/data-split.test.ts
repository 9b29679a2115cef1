import { describe, it, expect } from 'vitest';
import { InsufficientDataError, UnsupportedFilteringError } from '../src/errors.js';
import type { ReturnsSeries } from '../src/data/returns-series.js';
import type { BacktestReport } from '../src/types/index.js';
import { DataSplitValidator, consistencyScore } from '../src/validation/data-split.js';
import { STANDARD_PERIODS, seriesByPeriods } from './helpers.js';

const CONFIG = {
  periods: {
    train: { start: '2018-01-01', end: '2020-12-31' },
    validation: { start: '2021-01-01', end: '2022-12-31' },
    test: { start: '2023-01-01', end: '2024-12-31' },
  },
  minValidationSharpe: 1.0,
  minConsistency: 0.6,
  minDegradationRatio: 0.7,
  epsilon: 0.1,
  minPeriodObservations: 20,
  strict: false,
};

class OpaqueReport implements BacktestReport {
  constructor(private readonly series: ReturnsSeries) {}
  returns(): ReturnsSeries {
    return this.series;
  }
}

describe('consistencyScore', () => {
  it('should score stable Sharpe ratios near 1', () => {
    expect(consistencyScore([2.5, 2.3, 2.4])).toBeCloseTo(0.958333, 6);
    expect(consistencyScore([1, 1, 1])).toBe(1);
    expect(consistencyScore([0.8, 0.9, 0.85])).toBeGreaterThan(0.9);
  });

  it('should score losing or flat strategies as 0', () => {
    expect(consistencyScore([-1, -1, -1])).toBe(0);
    expect(consistencyScore([0.05, 0.05, 0.05])).toBe(0);
    expect(consistencyScore([0.1, 0.1])).toBe(0);
    expect(consistencyScore([-0.5, -0.6, -0.7])).toBe(0);
    expect(consistencyScore([0.05, -0.03, 0.02])).toBe(0);
  });

  it('should clamp to [0, 1]', () => {
    expect(consistencyScore([1.5, -0.2, 1.8])).toBe(0);
  });

  it('should need two periods', () => {
    expect(consistencyScore([2])).toBe(0);
  });
});

describe('DataSplitValidator', () => {
  it('should pass a consistent strategy', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([2.5, 2.3, 2.4]));
    const verdict = new DataSplitValidator(CONFIG).validate(series);

    expect(verdict.passed).toBe(true);
    expect(verdict.statistic).toBeCloseTo(0.958333, 6);
    expect(verdict.threshold).toBe(0.6);
    expect(verdict.comparison).toBe('>=');
    expect(verdict.nPeriods).toBe(1096 + 730 + 731);
    expect(verdict.message).toBe('Consistency 0.958, validation Sharpe 2.300, degradation ratio 0.920');
    expect(verdict.detail.criteria.map((c) => c.name)).toEqual(['consistency', 'validation_sharpe', 'degradation_ratio']);
    expect(verdict.detail.periods.every((p) => p.metrics !== null)).toBe(true);
  });

  it('should stop at the consistency pre-check', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([1.5, -0.2, 1.8]));
    const verdict = new DataSplitValidator(CONFIG).validate(series);

    expect(verdict.passed).toBe(false);
    expect(verdict.statistic).toBe(0);
    expect(verdict.message).toBe('Consistency 0.000 below minimum 0.6 (consistency pre-check)');
    expect(verdict.detail.shortCircuited).toBe(true);
    expect(verdict.detail.criteria).toHaveLength(1);
    expect(verdict.detail.periods.map((p) => p.metrics)).toEqual([null, null, null]);
    expect(verdict.detail.degradationRatio).toBeNull();
  });

  it('should fail on out-of-sample degradation', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([2.5, 1.6, 2.0]));
    const verdict = new DataSplitValidator(CONFIG).validate(series);

    expect(verdict.passed).toBe(false);
    expect(verdict.statistic).toBeCloseTo(0.64, 6);
    expect(verdict.threshold).toBe(0.7);
    expect(verdict.message).toBe('Degradation ratio 0.640 below minimum 0.7');
  });

  it('should skip the degradation check for a losing train period', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([-1, 1.5, 1.2]));
    const result = new DataSplitValidator({ ...CONFIG, minConsistency: 0 }).evaluate(series);

    expect(result.degradationRatio).toBeNull();
    expect(result.criteria.map((c) => c.name)).toEqual(['consistency', 'validation_sharpe']);
    expect(result.passed).toBe(true);
  });

  it('should warn once per period for an unfilterable report', () => {
    const report = new OpaqueReport(seriesByPeriods(STANDARD_PERIODS([2.5, 2.3, 2.4])));
    const verdict = new DataSplitValidator(CONFIG).validate(report);

    expect(verdict.warnings.map((w) => w.type)).toEqual([
      'UnfilteredReportWarning',
      'UnfilteredReportWarning',
      'UnfilteredReportWarning',
    ]);
    expect(verdict.detail.periods.map((p) => p.filtered)).toEqual([false, false, false]);
  });

  it('should reject an unfilterable report in strict mode', () => {
    const report = new OpaqueReport(seriesByPeriods(STANDARD_PERIODS([2.5, 2.3, 2.4])));
    expect(() => new DataSplitValidator({ ...CONFIG, strict: true }).validate(report)).toThrow(UnsupportedFilteringError);
  });

  it('should skip periods without enough data', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([2.5, 2.3, 2.4]).slice(0, 2));
    const result = new DataSplitValidator(CONFIG).evaluate(series);

    expect(result.skipped).toEqual([{ name: 'test', observations: 0 }]);
    expect(result.periods.map((p) => p.name)).toEqual(['train', 'validation']);
    expect(result.consistency).toBeCloseTo(1 - Math.SQRT1_2 * 0.2 / 2.4, 6);
  });

  it('should need at least two usable periods', () => {
    const series = seriesByPeriods(STANDARD_PERIODS([2.5, 2.3, 2.4]).slice(0, 1));
    expect(() => new DataSplitValidator(CONFIG).evaluate(series)).toThrow(InsufficientDataError);
  });
});

describe('DataSplitValidator periods', () => {
  it('should reject overlapping periods', () => {
    const periods = {
      ...CONFIG.periods,
      validation: { start: '2020-12-31', end: '2022-12-31' },
    };
    expect(() => new DataSplitValidator({ ...CONFIG, periods })).toThrow(
      'Data split periods must be ordered and disjoint: validation starts 2020-12-31, before train ends',
    );
  });

  it('should reject periods out of order', () => {
    const periods = { ...CONFIG.periods, test: { start: '2019-01-01', end: '2019-12-31' } };
    expect(() => new DataSplitValidator({ ...CONFIG, periods })).toThrow(
      'Data split periods must be ordered and disjoint: test starts 2019-01-01, before validation ends',
    );
  });

  it('should reject a period that ends before it starts', () => {
    const periods = { ...CONFIG.periods, train: { start: '2020-12-31', end: '2018-01-01' } };
    expect(() => new DataSplitValidator({ ...CONFIG, periods })).toThrow(
      'Data split period train starts after it ends: 2020-12-31..2018-01-01',
    );
  });

  it('should accept adjacent calendar days', () => {
    expect(() => new DataSplitValidator(CONFIG)).not.toThrow();
  });
});
