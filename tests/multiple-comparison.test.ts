import { describe, it, expect } from 'vitest';
import { MultipleComparisonCorrector } from '../src/validation/multiple-comparison.js';
import { gaussianPattern, makeSeries, withSharpe } from './helpers.js';

const PARAMETRIC = { alpha: 0.05, conservativeFloor: 0.5, bootstrapAudit: false };

describe('MultipleComparisonCorrector', () => {
  it('should floor a single-strategy threshold', () => {
    const t = new MultipleComparisonCorrector(1, PARAMETRIC).threshold(252);

    expect(t.adjustedAlpha).toBe(0.05);
    expect(t.zScore).toBeCloseTo(1.959964, 5);
    expect(t.parametricThreshold).toBeCloseTo(0.123467, 5);
    expect(t.conservativeThreshold).toBe(0.5);
    expect(t.enforcedThreshold).toBe(0.5);
    expect(t.bootstrapThreshold).toBeNull();
    expect(t.warnings).toEqual([]);
  });

  it('should scale the threshold with the number of strategies', () => {
    const t = new MultipleComparisonCorrector(500, PARAMETRIC).threshold(10);

    expect(t.adjustedAlpha).toBeCloseTo(1e-4, 12);
    expect(t.zScore).toBeCloseTo(3.890592, 4);
    expect(t.enforcedThreshold).toBeCloseTo(1.2303, 4);
  });

  it('should never lower the threshold as N grows', () => {
    let previous = 0;
    for (const n of [1, 2, 5, 10, 50, 100, 1000, 10000]) {
      const t = new MultipleComparisonCorrector(n, PARAMETRIC).parametricThreshold(252);
      expect(t).toBeGreaterThan(previous);
      previous = t;
    }
  });

  it('should reject invalid arguments', () => {
    expect(() => new MultipleComparisonCorrector(0)).toThrow(RangeError);
    expect(() => new MultipleComparisonCorrector(2.5)).toThrow(RangeError);
    expect(() => new MultipleComparisonCorrector(3, { alpha: 1 })).toThrow(RangeError);
    expect(() => new MultipleComparisonCorrector(3, PARAMETRIC).threshold(0)).toThrow(RangeError);
  });

  it('should bound the family-wise error rate by alpha', () => {
    const c = new MultipleComparisonCorrector(10, PARAMETRIC);
    expect(c.familyWiseErrorRate()).toBeCloseTo(0.04889, 5);
    expect(c.familyWiseErrorRate()).toBeLessThanOrEqual(0.05);
  });

  it('should treat only positive Sharpe ratios as significant', () => {
    const c = new MultipleComparisonCorrector(1, PARAMETRIC);
    expect(c.isSignificant(3, 252)).toBe(true);
    expect(c.isSignificant(-3, 252)).toBe(false);
    expect(c.isSignificant(0.5, 252)).toBe(false);
    expect(c.isSignificant(NaN, 252)).toBe(false);
  });

  it('should evaluate a strategy set', () => {
    const result = new MultipleComparisonCorrector(3, PARAMETRIC).validateStrategySet([
      { strategyId: 'a', sharpeRatio: 1.8 },
      { strategyId: 'b', sharpeRatio: 0.3 },
      { strategyId: 'c', sharpeRatio: 2.1 },
    ], 252);

    expect(result.totalStrategies).toBe(3);
    expect(result.significantCount).toBe(2);
    expect(result.significant.map((s) => s.strategyId)).toEqual(['a', 'c']);
    expect(result.significanceThreshold).toBe(0.5);
    expect(result.expectedFalseDiscoveries).toBeCloseTo(0.05, 12);
    expect(result.estimatedFdr).toBeCloseTo(0.025, 12);
  });

  it('should return an empty result for no strategies', () => {
    const result = new MultipleComparisonCorrector(3, PARAMETRIC).validateStrategySet([], 252);
    expect(result.significantCount).toBe(0);
    expect(result.estimatedFdr).toBe(0);
  });

  it('should measure divergence against the unfloored parametric threshold', () => {
    const t = new MultipleComparisonCorrector(1, {
      ...PARAMETRIC,
      bootstrapAudit: true,
      nullDraws: 1000,
      divergenceRatio: 10,
      seed: 42,
    }).threshold(252);
    const b = t.bootstrapThreshold ?? 0;

    // 부트스트랩 |샤프| 95% 분위수는 약 1.5, z/sqrt(T)는 0.1235
    expect(b).toBeGreaterThan(t.conservativeThreshold);
    expect(t.thresholdRatio).toBeCloseTo(b / t.parametricThreshold, 10);
    expect(t.thresholdRatio ?? 0).toBeGreaterThanOrEqual(10);
    expect(t.enforcedThreshold).toBe(b);
    expect(t.warnings.map((w) => w.type)).toEqual(['AssumptionDivergenceWarning']);
    expect(t.warnings[0]?.context).toMatchObject({ parametric: t.parametricThreshold, bootstrap: b });
  });

  it('should stay quiet when the thresholds agree within the ratio', () => {
    const t = new MultipleComparisonCorrector(1, {
      ...PARAMETRIC,
      bootstrapAudit: true,
      nullDraws: 1000,
      divergenceRatio: 1000,
      seed: 42,
    }).threshold(252);

    expect(t.warnings).toEqual([]);
    expect(t.enforcedThreshold).toBe(t.bootstrapThreshold);
  });

  it('should warn when the two thresholds diverge', () => {
    const t = new MultipleComparisonCorrector(5, {
      ...PARAMETRIC,
      bootstrapAudit: true,
      nullDraws: 200,
      divergenceRatio: 1,
    }).threshold(252);

    expect(t.thresholdRatio ?? 0).toBeGreaterThanOrEqual(1);
    expect(t.warnings.map((w) => w.type)).toEqual(['AssumptionDivergenceWarning']);
    expect(t.enforcedThreshold).toBe(Math.max(t.bootstrapThreshold ?? 0, t.conservativeThreshold));
  });

  it('should validate a report against the threshold', () => {
    const series = makeSeries(withSharpe(gaussianPattern(504, 2), 2));
    const verdict = new MultipleComparisonCorrector(1, PARAMETRIC).validate(series);

    expect(verdict.validatorName).toBe('multiple_comparison');
    expect(verdict.passed).toBe(true);
    expect(verdict.statistic).toBeCloseTo(2, 6);
    expect(verdict.threshold).toBe(0.5);
    expect(verdict.message).toBe('Sharpe 2.000 > Bonferroni threshold 0.5000 (N=1)');
  });
});
