import type { PerformanceMetrics, ReportInput, ValidationVerdict } from '../types/index.js';
import { config } from '../config.js';
import { InsufficientDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { fullSeries } from '../data/report-filter.js';
import { walkForwardSplit, type IndexRange } from '../data/splitter.js';
import { computeMetrics } from '../report/metrics.js';
import { mean, median, sampleStd } from '../stats/statistics.js';
import { createVerdict } from './verdict.js';

const log = createChildLogger('walk-forward');

export interface WalkForwardConfig {
  readonly trainBars: number;
  readonly testBars: number;
  readonly minWindows: number;
  readonly annualizationFactor: number;
  readonly minMeanSharpe: number;         // 평균 OOS 샤프 >
  readonly minPositiveWindowRate: number; // 샤프 > 0 윈도우 비율 >
  readonly minWorstSharpe: number;        // 최악 OOS 샤프 >
  readonly maxSharpeStd: number;          // OOS 샤프 표준편차 <
}

const DEFAULT_CONFIG: WalkForwardConfig = {
  ...config.walkForward,
  annualizationFactor: config.calibration.annualizationFactor,
};

export interface WindowSegment {
  readonly range: IndexRange;
  readonly startTime: number | null;
  readonly endTime: number | null;
  readonly metrics: PerformanceMetrics;
}

export interface WindowResult {
  readonly windowIndex: number;
  readonly train: WindowSegment;
  readonly test: WindowSegment;
}

export interface WalkForwardResult {
  readonly windows: WindowResult[];
  readonly meanTestSharpe: number;
  readonly medianTestSharpe: number;
  readonly testSharpeStd: number;
  readonly worstTestSharpe: number;
  readonly bestTestSharpe: number;
  readonly positiveWindowRate: number;
  readonly meanTrainSharpe: number;
  /** 평균 test 샤프 / 평균 train 샤프 (train ≤ 0이면 null) */
  readonly robustnessRatio: number | null;
  readonly nPeriods: number;
  readonly passed: boolean;
  readonly failures: string[];
}

/**
 * 워크포워드 분석
 * 롤링 train/test 윈도우마다 test 구간(표본 외) 성과만으로 판정
 */
export class WalkForwardAnalyzer {
  private readonly config: WalkForwardConfig;

  constructor(config?: Partial<WalkForwardConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  analyze(input: ReportInput): WalkForwardResult {
    const { trainBars, testBars, minWindows, annualizationFactor: af } = this.config;
    const series = fullSeries(input);
    const slices = walkForwardSplit(series, trainBars, testBars);

    if (slices.length === 0 || slices.length < minWindows) {
      throw new InsufficientDataError(
        `Walk-forward needs ${minWindows} windows of ${trainBars}+${testBars} periods ` +
          `(${(trainBars + testBars) * minWindows} periods), ` +
          `got ${slices.length} window(s) from ${series.length} periods`,
        minWindows,
        slices.length,
      );
    }

    const windows: WindowResult[] = slices.map((s) => ({
      windowIndex: s.windowIndex,
      train: {
        range: s.trainRange,
        startTime: s.train.startTime,
        endTime: s.train.endTime,
        metrics: computeMetrics(s.train.values, af),
      },
      test: {
        range: s.testRange,
        startTime: s.test.startTime,
        endTime: s.test.endTime,
        metrics: computeMetrics(s.test.values, af),
      },
    }));

    for (const w of windows) {
      log.debug(
        { window: w.windowIndex, train: w.train.metrics.sharpeRatio, test: w.test.metrics.sharpeRatio },
        'Window evaluated',
      );
    }

    const testSharpes = windows.map((w) => w.test.metrics.sharpeRatio);
    const trainSharpes = windows.map((w) => w.train.metrics.sharpeRatio);

    const meanTestSharpe = mean(testSharpes);
    const meanTrainSharpe = mean(trainSharpes);
    const testSharpeStd = testSharpes.length > 1 ? sampleStd(testSharpes) : 0;
    const worstTestSharpe = Math.min(...testSharpes);
    const positiveWindowRate = testSharpes.filter((s) => s > 0).length / testSharpes.length;

    const failures = this.checkCriteria(meanTestSharpe, positiveWindowRate, worstTestSharpe, testSharpeStd);

    return {
      windows,
      meanTestSharpe,
      medianTestSharpe: median(testSharpes),
      testSharpeStd,
      worstTestSharpe,
      bestTestSharpe: Math.max(...testSharpes),
      positiveWindowRate,
      meanTrainSharpe,
      robustnessRatio: meanTrainSharpe > 0 ? meanTestSharpe / meanTrainSharpe : null,
      nPeriods: windows.length * testBars,
      passed: failures.length === 0,
      failures,
    };
  }

  validate(input: ReportInput): ValidationVerdict<WalkForwardResult> {
    log.info({ trainBars: this.config.trainBars, testBars: this.config.testBars }, 'Walk-forward started');
    const result = this.analyze(input);

    const message = result.passed
      ? `Mean OOS Sharpe ${result.meanTestSharpe.toFixed(3)} > ${this.config.minMeanSharpe} ` +
        `across ${result.windows.length} windows`
      : result.failures[0] ?? 'Walk-forward failed';

    log.info(
      { windows: result.windows.length, meanTestSharpe: result.meanTestSharpe, passed: result.passed },
      'Walk-forward finished',
    );

    return createVerdict({
      validatorName: 'walk_forward',
      passed: result.passed,
      statistic: result.meanTestSharpe,
      threshold: this.config.minMeanSharpe,
      comparison: '>',
      nPeriods: result.nPeriods,
      message,
      detail: result,
    });
  }

  private checkCriteria(
    meanSharpe: number,
    positiveRate: number,
    worstSharpe: number,
    sharpeStd: number,
  ): string[] {
    const c = this.config;
    const failures: string[] = [];

    if (!(meanSharpe > c.minMeanSharpe)) {
      failures.push(`Mean OOS Sharpe ${meanSharpe.toFixed(3)} ≤ ${c.minMeanSharpe}`);
    }
    if (!(positiveRate > c.minPositiveWindowRate)) {
      failures.push(`Positive window rate ${(positiveRate * 100).toFixed(1)}% ≤ ${(c.minPositiveWindowRate * 100).toFixed(1)}%`);
    }
    if (!(worstSharpe > c.minWorstSharpe)) {
      failures.push(`Worst OOS Sharpe ${worstSharpe.toFixed(3)} ≤ ${c.minWorstSharpe}`);
    }
    if (!(sharpeStd < c.maxSharpeStd)) {
      failures.push(`OOS Sharpe std ${sharpeStd.toFixed(3)} ≥ ${c.maxSharpeStd}`);
    }

    for (const f of failures) log.debug({ criterion: f }, 'Walk-forward criterion failed');
    return failures;
  }
}
