import { describe, it, expect } from 'vitest';
import { calcMaxDrawdown, calcSharpe, computeMetrics } from '../src/report/metrics.js';

describe('metrics', () => {
  it('should compute metrics from known returns', () => {
    const m = computeMetrics([0.1, -0.1, 0.05], 252);

    expect(m.nPeriods).toBe(3);
    expect(m.winRate).toBeCloseTo(2 / 3, 10);
    // equity 1.1 → 0.99 → 1.0395, peak 1.1
    expect(m.maxDrawdown).toBeCloseTo(0.1, 10);
    expect(m.sharpeRatio).toBeCloseTo(2.54195, 4);
    expect(m.annualReturn).toBeCloseTo(Math.pow(1.1 * 0.9 * 1.05, 84) - 1, 8);
  });

  it('should handle empty returns', () => {
    expect(computeMetrics([], 252)).toEqual({
      sharpeRatio: 0,
      annualReturn: 0,
      maxDrawdown: 0,
      winRate: 0,
      nPeriods: 0,
    });
  });

  it('should map zero-variance Sharpe to 0', () => {
    expect(calcSharpe([0.01, 0.01, 0.01], 252)).toBe(0);
  });

  it('should compound drawdowns across consecutive losses', () => {
    // 1 → 0.9 → 0.81 → 0.891
    expect(calcMaxDrawdown([-0.1, -0.1, 0.1])).toBeCloseTo(0.19, 10);
  });

  it('should report -100% annual return for a wiped-out curve', () => {
    expect(computeMetrics([0.1, -1], 252).annualReturn).toBe(-1);
  });
});
