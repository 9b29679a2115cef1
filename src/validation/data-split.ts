import type {
  CalendarPeriod,
  Comparison,
  PerformanceMetrics,
  ReportInput,
  ValidationVerdict,
  ValidationWarning,
} from '../types/index.js';
import { config } from '../config.js';
import { InsufficientDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { filterReport } from '../data/report-filter.js';
import { toBoundary, type ReturnsSeries } from '../data/returns-series.js';
import { calcSharpe, computeMetrics } from '../report/metrics.js';
import { mean, sampleStd } from '../stats/statistics.js';
import { compare, createVerdict } from './verdict.js';

const log = createChildLogger('data-split');

export interface SplitPeriods {
  readonly train: CalendarPeriod;
  readonly validation: CalendarPeriod;
  readonly test: CalendarPeriod;
}

export type PeriodName = keyof SplitPeriods;

export interface DataSplitConfig {
  readonly periods: SplitPeriods;
  readonly minValidationSharpe: number;
  readonly minConsistency: number;
  readonly minDegradationRatio: number;
  /** 평균 샤프가 이 값 이하면 일관성 0 */
  readonly epsilon: number;
  readonly minPeriodObservations: number;
  /** true면 필터링 불가 리포트에 에러 */
  readonly strict: boolean;
  readonly annualizationFactor: number;
}

const DEFAULT_CONFIG: DataSplitConfig = {
  ...config.dataSplit,
  strict: config.strictFiltering,
  annualizationFactor: config.calibration.annualizationFactor,
};

const PERIOD_ORDER: readonly PeriodName[] = ['train', 'validation', 'test'];

export interface PeriodResult {
  readonly name: PeriodName;
  readonly start: string;
  readonly end: string;
  readonly nPeriods: number;
  readonly sharpeRatio: number;
  /** 일관성 사전 검사 통과 후에만 계산 */
  readonly metrics: PerformanceMetrics | null;
  readonly filtered: boolean;
}

export interface SkippedPeriod {
  readonly name: PeriodName;
  readonly observations: number;
}

export interface CriterionResult {
  readonly name: 'consistency' | 'validation_sharpe' | 'degradation_ratio';
  readonly value: number | null;
  readonly threshold: number;
  readonly comparison: Comparison;
  readonly passed: boolean;
}

export interface DataSplitResult {
  readonly periods: PeriodResult[];
  readonly skipped: SkippedPeriod[];
  readonly consistency: number;
  readonly trainSharpe: number | null;
  readonly validationSharpe: number | null;
  /** train 샤프 ≤ 0이면 의미 없으므로 null */
  readonly degradationRatio: number | null;
  readonly criteria: CriterionResult[];
  /** 일관성 사전 검사에서 멈췄으면 true */
  readonly shortCircuited: boolean;
  readonly passed: boolean;
  readonly warnings: ValidationWarning[];
}

/**
 * 기간별 샤프 일관성 점수 (0~1)
 * 평균이 epsilon 이하(손실 또는 거의 0)면 분산과 무관하게 0
 */
export function consistencyScore(sharpes: readonly number[], epsilon: number = 0.1): number {
  if (sharpes.length < 2) return 0;
  const m = mean(sharpes);
  if (!(m > epsilon)) return 0;
  const score = 1 - sampleStd(sharpes) / m;
  return Math.max(0, Math.min(1, score));
}

/**
 * 고정 달력 기간(train/validation/test) 교차 검증
 * 순서: 기간별 샤프 → 일관성 사전 검사(실패 시 중단) → 검증 샤프 → 성능 저하 비율
 */
export class DataSplitValidator {
  private readonly config: DataSplitConfig;

  constructor(config?: Partial<DataSplitConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    assertOrderedPeriods(this.config.periods);
  }

  evaluate(input: ReportInput): DataSplitResult {
    const c = this.config;
    const warnings: ValidationWarning[] = [];
    const usable: Array<{ name: PeriodName; period: CalendarPeriod; series: ReturnsSeries; filtered: boolean }> = [];
    const skipped: SkippedPeriod[] = [];

    for (const name of PERIOD_ORDER) {
      const period = c.periods[name];
      const f = filterReport(input, period.start, period.end, { strict: c.strict });
      if (f.warning) warnings.push(f.warning);

      if (f.series.length < c.minPeriodObservations) {
        log.debug({ period: name, observations: f.series.length }, 'Period skipped');
        skipped.push({ name, observations: f.series.length });
        continue;
      }
      usable.push({ name, period, series: f.series, filtered: f.filtered });
    }

    if (usable.length < 2) {
      throw new InsufficientDataError(
        `Data split needs at least 2 periods with ${c.minPeriodObservations}+ observations, got ${usable.length}`,
        2,
        usable.length,
      );
    }

    const sharpes = usable.map((u) => calcSharpe(u.series.values, c.annualizationFactor));
    const consistency = consistencyScore(sharpes, c.epsilon);
    const sharpeOf = (name: PeriodName): number | null => {
      const i = usable.findIndex((u) => u.name === name);
      return i === -1 ? null : sharpes[i]!;
    };
    const trainSharpe = sharpeOf('train');
    const validationSharpe = sharpeOf('validation');

    const criteria: CriterionResult[] = [{
      name: 'consistency',
      value: consistency,
      threshold: c.minConsistency,
      comparison: '>=',
      passed: compare(consistency, '>=', c.minConsistency),
    }];

    if (!criteria[0]!.passed) {
      log.info({ consistency, sharpes }, 'Consistency pre-check failed');
      return {
        periods: usable.map((u, i) => periodResult(u, sharpes[i]!, null)),
        skipped,
        consistency,
        trainSharpe,
        validationSharpe,
        degradationRatio: null,
        criteria,
        shortCircuited: true,
        passed: false,
        warnings,
      };
    }

    const periods = usable.map((u, i) =>
      periodResult(u, sharpes[i]!, computeMetrics(u.series.values, c.annualizationFactor)),
    );

    criteria.push({
      name: 'validation_sharpe',
      value: validationSharpe,
      threshold: c.minValidationSharpe,
      comparison: '>=',
      passed: validationSharpe !== null && compare(validationSharpe, '>=', c.minValidationSharpe),
    });

    let degradationRatio: number | null = null;
    if (trainSharpe !== null && validationSharpe !== null && trainSharpe > 0) {
      degradationRatio = validationSharpe / trainSharpe;
      criteria.push({
        name: 'degradation_ratio',
        value: degradationRatio,
        threshold: c.minDegradationRatio,
        comparison: '>=',
        passed: compare(degradationRatio, '>=', c.minDegradationRatio),
      });
      if (degradationRatio < c.minDegradationRatio) {
        log.warn({ trainSharpe, validationSharpe, degradationRatio }, 'Out-of-sample degradation');
      }
    }

    return {
      periods,
      skipped,
      consistency,
      trainSharpe,
      validationSharpe,
      degradationRatio,
      criteria,
      shortCircuited: false,
      passed: criteria.every((cr) => cr.passed),
      warnings,
    };
  }

  validate(input: ReportInput): ValidationVerdict<DataSplitResult> {
    log.info({ strict: this.config.strict }, 'Data split started');
    const result = this.evaluate(input);
    const failed = result.criteria.find((cr) => !cr.passed);
    const shown = failed ?? result.criteria[0]!;

    const message = failed
      ? `${describeCriterion(failed)} below minimum ${failed.threshold}` +
        (result.shortCircuited ? ' (consistency pre-check)' : '')
      : `Consistency ${result.consistency.toFixed(3)}, validation Sharpe ` +
        `${(result.validationSharpe ?? NaN).toFixed(3)}` +
        (result.degradationRatio !== null ? `, degradation ratio ${result.degradationRatio.toFixed(3)}` : '');

    log.info({ consistency: result.consistency, passed: result.passed }, 'Data split finished');

    return createVerdict({
      validatorName: 'data_split',
      passed: result.passed,
      statistic: shown.value ?? NaN,
      threshold: shown.threshold,
      comparison: shown.comparison,
      nPeriods: result.periods.reduce((s, p) => s + p.nPeriods, 0),
      message,
      warnings: result.warnings,
      detail: result,
    });
  }
}

function periodResult(
  u: { name: PeriodName; period: CalendarPeriod; series: ReturnsSeries; filtered: boolean },
  sharpeRatio: number,
  metrics: PerformanceMetrics | null,
): PeriodResult {
  return {
    name: u.name,
    start: u.period.start,
    end: u.period.end,
    nPeriods: u.series.length,
    sharpeRatio,
    metrics,
    filtered: u.filtered,
  };
}

function describeCriterion(cr: CriterionResult): string {
  const value = cr.value === null ? 'n/a' : cr.value.toFixed(3);
  switch (cr.name) {
    case 'consistency':
      return `Consistency ${value}`;
    case 'validation_sharpe':
      return `Validation Sharpe ${value}`;
    case 'degradation_ratio':
      return `Degradation ratio ${value}`;
  }
}

/** train < validation < test, 각 기간 start ≤ end, 겹침 없음 */
function assertOrderedPeriods(periods: SplitPeriods): void {
  let prevEnd = -Infinity;
  let prevName = '';
  for (const name of PERIOD_ORDER) {
    const { start, end } = periods[name];
    const s = toBoundary(start, 'start');
    const e = toBoundary(end, 'end');
    if (s > e) {
      throw new Error(`Data split period ${name} starts after it ends: ${start}..${end}`);
    }
    if (s <= prevEnd) {
      throw new Error(`Data split periods must be ordered and disjoint: ${name} starts ${start}, before ${prevName} ends`);
    }
    prevEnd = e;
    prevName = name;
  }
}
