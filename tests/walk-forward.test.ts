import { describe, it, expect } from 'vitest';
import { InsufficientDataError } from '../src/errors.js';
import { EquityCurveReport } from '../src/data/equity-report.js';
import { WalkForwardAnalyzer } from '../src/validation/walk-forward.js';
import { alternating, makeSeries, withSharpe } from './helpers.js';

const WF = { trainBars: 252, testBars: 63, minWindows: 3 };

/** 윈도우마다 train(샤프 1.0) + test(지정 샤프) */
function windowedSeries(testSharpes: readonly number[]) {
  const values = testSharpes.flatMap((s) => [
    ...withSharpe(alternating(WF.trainBars), 1.0),
    ...withSharpe(alternating(WF.testBars), s),
  ]);
  return makeSeries(values);
}

describe('WalkForwardAnalyzer', () => {
  it('should pass a strategy that holds up out of sample', () => {
    const verdict = new WalkForwardAnalyzer(WF).validate(windowedSeries([1.2, 0.9, 1.5]));

    expect(verdict.validatorName).toBe('walk_forward');
    expect(verdict.passed).toBe(true);
    expect(verdict.statistic).toBeCloseTo(1.2, 6);
    expect(verdict.threshold).toBe(0.5);
    expect(verdict.comparison).toBe('>');
    expect(verdict.nPeriods).toBe(189);
    expect(verdict.message).toBe('Mean OOS Sharpe 1.200 > 0.5 across 3 windows');
    expect(Object.isFrozen(verdict)).toBe(true);
  });

  it('should aggregate per-window out-of-sample results', () => {
    const result = new WalkForwardAnalyzer(WF).analyze(windowedSeries([1.2, 0.9, 1.5]));

    expect(result.windows.map((w) => w.test.range)).toEqual([
      { start: 252, end: 315 },
      { start: 567, end: 630 },
      { start: 882, end: 945 },
    ]);
    expect(result.windows.map((w) => w.test.metrics.sharpeRatio).map((s) => Number(s.toFixed(6))))
      .toEqual([1.2, 0.9, 1.5]);
    expect(result.medianTestSharpe).toBeCloseTo(1.2, 6);
    expect(result.testSharpeStd).toBeCloseTo(0.3, 6);
    expect(result.worstTestSharpe).toBeCloseTo(0.9, 6);
    expect(result.bestTestSharpe).toBeCloseTo(1.5, 6);
    expect(result.positiveWindowRate).toBe(1);
    expect(result.meanTrainSharpe).toBeCloseTo(1.0, 6);
    expect(result.robustnessRatio).toBeCloseTo(1.2, 6);
    expect(result.failures).toEqual([]);
  });

  it('should fail on a single bad window', () => {
    const verdict = new WalkForwardAnalyzer(WF).validate(windowedSeries([2.0, -1.0, 2.5]));

    expect(verdict.passed).toBe(false);
    expect(verdict.message).toBe('Worst OOS Sharpe -1.000 ≤ -0.5');
    expect(verdict.detail.failures).toEqual([
      'Worst OOS Sharpe -1.000 ≤ -0.5',
      'OOS Sharpe std 1.893 ≥ 1',
    ]);
  });

  it('should read the full series from a report', () => {
    const report = EquityCurveReport.fromReturns(windowedSeries([1.2, 0.9, 1.5]));
    expect(new WalkForwardAnalyzer(WF).validate(report).passed).toBe(true);
  });

  it('should reject a series one period short of the minimum windows', () => {
    const values = windowedSeries([1, 1, 1]).values.slice(0, 944);
    const run = () => new WalkForwardAnalyzer(WF).analyze(makeSeries(values));

    expect(run).toThrow(InsufficientDataError);
    expect(run).toThrow('(945 periods)');
  });

  it('should reject a series too short for any window', () => {
    const run = () => new WalkForwardAnalyzer({ ...WF, minWindows: 1 }).analyze(makeSeries(alternating(100)));

    expect(run).toThrow(InsufficientDataError);
    expect(run).toThrow('got 0 window(s) from 100 periods');
  });
});
