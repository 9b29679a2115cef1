import type { StrategyValidation, ValidationVerdict } from '../types/index.js';
import type { WalkForwardResult } from '../validation/walk-forward.js';
import type { BootstrapResult } from '../validation/bootstrap.js';
import type { ThresholdResult } from '../validation/multiple-comparison.js';
import type { ReportSummary } from './validation-report.js';

const RULE = '═══════════════════════════════════════════';

function header(title: string, subtitle?: string): string[] {
  const lines = ['', RULE, `          ${title}`];
  if (subtitle) lines.push(`          ${subtitle}`);
  lines.push(RULE, '');
  return lines;
}

/**
 * 콘솔 테이블 출력 (외부 의존성 없음)
 */
export function formatValidation(result: StrategyValidation): string {
  const lines = header('STRATEGY VALIDATION', `Strategy: ${result.strategyId}`);

  lines.push(formatSection('Verdicts', result.verdicts.map((v) => [
    v.validatorName,
    `${v.passed ? 'PASS' : 'FAIL'}  ${formatNum(v.statistic)} ${v.comparison} ${formatNum(v.threshold)}`,
  ])));

  for (const v of result.verdicts) {
    lines.push(`  [${v.validatorName}] ${v.message}`);
    for (const w of v.warnings) {
      lines.push(`    ! ${w.type}: ${w.message}`);
    }
  }

  if (result.stagesSkipped.length > 0) {
    lines.push('');
    for (const s of result.stagesSkipped) {
      lines.push(`  Skipped ${s.stage}: ${s.reason}`);
    }
  }

  if (result.error) {
    lines.push('');
    lines.push(`  ERROR in ${result.error.stage}: ${result.error.name}: ${result.error.message}`);
  }

  lines.push('');
  lines.push(`  Overall: ${result.overallPassed ? 'PASSED' : 'FAILED'}` +
    (result.abortedAt ? ` (stopped at ${result.abortedAt})` : ''));
  lines.push('');
  return lines.join('\n');
}

export function formatWalkForward(result: WalkForwardResult): string {
  const lines = header('WALK-FORWARD ANALYSIS', `Windows: ${result.windows.length}`);

  lines.push('  #   Train Range      Test Range       Train SR   Test SR');
  lines.push('  ─── ──────────────── ──────────────── ──────── ────────');
  for (const w of result.windows) {
    const num = String(w.windowIndex).padStart(3);
    const train = `[${w.train.range.start}, ${w.train.range.end})`.padEnd(16);
    const test = `[${w.test.range.start}, ${w.test.range.end})`.padEnd(16);
    const trainSr = formatNum(w.train.metrics.sharpeRatio).padStart(8);
    const testSr = formatNum(w.test.metrics.sharpeRatio).padStart(8);
    lines.push(`  ${num} ${train} ${test} ${trainSr} ${testSr}`);
  }
  lines.push('');

  lines.push(formatSection('Summary', [
    ['Mean OOS Sharpe', formatNum(result.meanTestSharpe)],
    ['Median OOS Sharpe', formatNum(result.medianTestSharpe)],
    ['OOS Sharpe Std', formatNum(result.testSharpeStd)],
    ['Worst / Best', `${formatNum(result.worstTestSharpe)} / ${formatNum(result.bestTestSharpe)}`],
    ['Positive Windows', `${(result.positiveWindowRate * 100).toFixed(1)}%`],
    ['Robustness Ratio', result.robustnessRatio === null ? 'n/a' : `${formatNum(result.robustnessRatio)} (test/train)`],
    ['Result', result.passed ? 'PASS' : `FAIL (${result.failures.join('; ')})`],
  ]));

  return lines.join('\n');
}

export function formatBootstrap(result: BootstrapResult): string {
  const lines = header('BLOCK BOOTSTRAP', `Block size: ${result.blockSize}`);
  const ci = result.ciLower === null || result.ciUpper === null
    ? 'unreliable'
    : `[${formatNum(result.ciLower)}, ${formatNum(result.ciUpper)}]`;

  lines.push(formatSection('Confidence Interval', [
    ['Point Estimate', formatNum(result.pointEstimate)],
    [`${(result.confidence * 100).toFixed(0)}% CI`, ci],
    ['Valid Iterations', `${result.validIterations} / ${result.iterations}`],
    ['Periods', String(result.nPeriods)],
  ]));

  return lines.join('\n');
}

export function formatThreshold(result: ThresholdResult): string {
  const lines = header('BONFERRONI THRESHOLD', `N=${result.nStrategies}  T=${result.nPeriods}`);

  lines.push(formatSection('Threshold', [
    ['Adjusted Alpha', result.adjustedAlpha.toExponential(3)],
    ['Z Score', formatNum(result.zScore, 4)],
    ['Parametric', formatNum(result.parametricThreshold, 4)],
    ['Conservative', formatNum(result.conservativeThreshold, 4)],
    ['Bootstrap', result.bootstrapThreshold === null ? 'off' : formatNum(result.bootstrapThreshold, 4)],
    ['Enforced', formatNum(result.enforcedThreshold, 4)],
  ]));

  for (const w of result.warnings) {
    lines.push(`  ! ${w.type}: ${w.message}`);
  }

  return lines.join('\n');
}

export function formatBatchSummary(summary: ReportSummary): string {
  const lines = header('BATCH SUMMARY');

  lines.push(formatSection('Strategies', [
    ['Total', String(summary.totalStrategies)],
    ['Passed', String(summary.strategiesPassed)],
    ['Failed', String(summary.strategiesFailed)],
    ['Errored', String(summary.strategiesErrored)],
    ['Pass Rate', `${(summary.overallPassRate * 100).toFixed(1)}%`],
  ]));

  const rows: [string, string][] = [];
  for (const [name, b] of Object.entries(summary.validatorBreakdown)) {
    if (!b) continue;
    rows.push([name, `${b.passed}/${b.total} (${(b.passRate * 100).toFixed(1)}%)`]);
  }
  if (rows.length > 0) {
    lines.push(formatSection('By Validator', rows));
  }

  return lines.join('\n');
}

export function formatVerdictLine(v: ValidationVerdict): string {
  return `${v.passed ? 'PASS' : 'FAIL'} ${v.validatorName}: ${v.message}`;
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

function formatNum(value: number, digits: number = 3): string {
  return Number.isFinite(value) ? value.toFixed(digits) : 'n/a';
}
