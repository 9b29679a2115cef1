import { describe, it, expect } from 'vitest';
import {
  formatBatchSummary,
  formatThreshold,
  formatValidation,
  formatVerdictLine,
} from '../src/report/formatter.js';
import type { StrategyValidation } from '../src/types/index.js';
import { MultipleComparisonCorrector } from '../src/validation/multiple-comparison.js';
import { createVerdict } from '../src/validation/verdict.js';

const failed = createVerdict({
  validatorName: 'bootstrap',
  passed: false,
  statistic: 0.21,
  threshold: 0.5,
  comparison: '>',
  nPeriods: 504,
  message: '95% CI [0.210, 2.100] lower bound ≤ 0.5',
  warnings: [{ type: 'UnfilteredReportWarning', message: 'full report used' }],
  detail: null,
});

describe('formatter', () => {
  it('should format a verdict line', () => {
    expect(formatVerdictLine(failed)).toBe('FAIL bootstrap: 95% CI [0.210, 2.100] lower bound ≤ 0.5');
  });

  it('should format a strategy result', () => {
    const result: StrategyValidation = {
      strategyId: 'alpha',
      overallPassed: false,
      verdicts: [failed],
      stagesRun: ['bootstrap'],
      stagesSkipped: [{ stage: 'baseline', reason: 'No universe configured' }],
      abortedAt: 'bootstrap',
    };
    const lines = formatValidation(result).split('\n');

    expect(lines).toContain('          Strategy: alpha');
    expect(lines).toContain('  ' + 'bootstrap'.padEnd(22) + ' FAIL  0.210 > 0.500');
    expect(lines).toContain('    ! UnfilteredReportWarning: full report used');
    expect(lines).toContain('  Skipped baseline: No universe configured');
    expect(lines).toContain('  Overall: FAILED (stopped at bootstrap)');
  });

  it('should format a threshold table', () => {
    const t = new MultipleComparisonCorrector(1, { alpha: 0.05, conservativeFloor: 0.5, bootstrapAudit: false })
      .threshold(252);
    const lines = formatThreshold(t).split('\n');

    expect(lines).toContain('          N=1  T=252');
    expect(lines).toContain('  ' + 'Adjusted Alpha'.padEnd(22) + ' 5.000e-2');
    expect(lines).toContain('  ' + 'Bootstrap'.padEnd(22) + ' off');
    expect(lines).toContain('  ' + 'Enforced'.padEnd(22) + ' 0.5000');
  });

  it('should format a batch summary', () => {
    const lines = formatBatchSummary({
      totalStrategies: 4,
      strategiesPassed: 1,
      strategiesFailed: 3,
      strategiesErrored: 0,
      overallPassRate: 0.25,
      validatorBreakdown: { data_split: { total: 4, passed: 2, passRate: 0.5 } },
    }).split('\n');

    expect(lines).toContain('  ' + 'Pass Rate'.padEnd(22) + ' 25.0%');
    expect(lines).toContain('  ' + 'data_split'.padEnd(22) + ' 2/4 (50.0%)');
  });
});
