import { describe, it, expect } from 'vitest';
import { InsufficientDataError } from '../src/errors.js';
import { BootstrapValidator, blockBootstrapResample } from '../src/validation/bootstrap.js';
import { gaussianPattern, makeSeries, withSharpe } from './helpers.js';

describe('blockBootstrapResample', () => {
  it('should wrap blocks around the end of the series', () => {
    const values = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    // 시작점 floor(0.85 * 10) = 8 고정
    expect(blockBootstrapResample(values, 3, () => 0.85)).toEqual([9, 10, 1, 9, 10, 1, 9, 10, 1, 9]);
  });

  it('should keep the original length', () => {
    expect(blockBootstrapResample([1, 2, 3, 4, 5], 2, () => 0.1)).toEqual([1, 2, 1, 2, 1]);
    expect(blockBootstrapResample([], 3, () => 0.5)).toEqual([]);
  });
});

describe('BootstrapValidator', () => {
  const base = { iterations: 500, blockSize: 21, confidence: 0.95, minLowerBound: 0.5, seed: 7 };

  it('should pass a strong strategy', () => {
    const series = makeSeries(withSharpe(gaussianPattern(504, 11), 5));
    const verdict = new BootstrapValidator(base).validate(series);

    expect(verdict.passed).toBe(true);
    expect(verdict.threshold).toBe(0.5);
    expect(verdict.statistic).toBe(verdict.detail.ciLower);
    expect(verdict.detail.pointEstimate).toBeCloseTo(5, 6);
    expect(verdict.detail.validIterations).toBe(500);
    expect(verdict.warnings).toEqual([]);
  });

  it('should fail a weak strategy whose interval straddles zero', () => {
    const series = makeSeries(withSharpe(gaussianPattern(504, 11), 0.3));
    const verdict = new BootstrapValidator(base).validate(series);

    expect(verdict.passed).toBe(false);
    expect(verdict.detail.ciLower).toBeLessThan(0.5);
  });

  it('should bracket the point estimate', () => {
    const result = new BootstrapValidator(base).run(makeSeries(withSharpe(gaussianPattern(504, 3), 1.5)));

    expect(result.ciLower).not.toBeNull();
    expect(result.ciLower ?? Infinity).toBeLessThan(result.pointEstimate);
    expect(result.ciUpper ?? -Infinity).toBeGreaterThan(result.pointEstimate);
  });

  it('should be reproducible for the same seed', () => {
    const series = makeSeries(withSharpe(gaussianPattern(300, 5), 1));
    const a = new BootstrapValidator(base).run(series);
    const b = new BootstrapValidator(base).run(series);

    expect(b.ciLower).toBe(a.ciLower);
    expect(b.ciUpper).toBe(a.ciUpper);
  });

  it('should degrade when too many resamples are invalid', () => {
    let calls = 0;
    // 홀수 번째 호출만 유효
    const flaky = () => (calls++ % 2 === 0 ? 1 : NaN);
    const validator = new BootstrapValidator({ ...base, iterations: 1000, blockSize: 5 }, flaky);
    const verdict = validator.validate(makeSeries(gaussianPattern(50, 1)));

    expect(verdict.passed).toBe(false);
    expect(verdict.statistic).toBeNaN();
    expect(verdict.detail.validIterations).toBe(500);
    expect(verdict.detail.reliable).toBe(false);
    expect(verdict.detail.ciLower).toBeNull();
    expect(verdict.message).toBe('Bootstrap unreliable: 500/1000 valid iterations (< 90%)');
    expect(verdict.warnings.map((w) => w.type)).toEqual(['DegradedBootstrapWarning']);
  });

  it('should cover the true Sharpe ratio in repeated simulations', () => {
    const n = 1008;
    let covered = 0;
    for (let run = 0; run < 100; run++) {
      // 자기상관 없는 i.i.d. 수익률, 모집단 샤프 1.0
      const values = gaussianPattern(n, 1000 + run).map((z) => 0.01 * (z + 1 / Math.sqrt(252)));
      const result = new BootstrapValidator({ ...base, iterations: 1000, seed: run + 1 }).run(makeSeries(values));
      if ((result.ciLower ?? Infinity) <= 1 && 1 <= (result.ciUpper ?? -Infinity)) covered++;
    }
    expect(covered).toBeGreaterThanOrEqual(90);
  }, 120_000);

  it('should accept exactly the minimum valid fraction', () => {
    let calls = 0;
    // 30회 중 10번째마다 무효 → 27/30 유효
    const mostlyValid = () => (calls++ % 10 === 9 ? NaN : 1);
    const result = new BootstrapValidator({ ...base, iterations: 30, blockSize: 5, minValidFraction: 0.9 }, mostlyValid)
      .run(makeSeries(gaussianPattern(50, 1)));

    expect(result.validIterations).toBe(27);
    expect(result.reliable).toBe(true);
    expect(result.ciLower).toBe(1);
  });

  it('should require two blocks of data', () => {
    const validator = new BootstrapValidator(base);
    expect(validator.minObservations).toBe(42);
    expect(() => validator.run(makeSeries(gaussianPattern(41, 1)))).toThrow(InsufficientDataError);
  });
});
