import type {
  BaselineKind,
  CalendarPeriod,
  PerformanceMetrics,
  ReportInput,
  UniverseSnapshot,
  ValidationVerdict,
  ValidationWarning,
} from '../types/index.js';
import { config } from '../config.js';
import { InsufficientDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { filterReport, fullSeries } from '../data/report-filter.js';
import { ReturnsSeries } from '../data/returns-series.js';
import { computeMetrics } from '../report/metrics.js';
import { mean, sampleStd } from '../stats/statistics.js';
import { BaselineCache, universeFingerprint, type CacheStats } from './baseline-cache.js';
import { createVerdict } from './verdict.js';

const log = createChildLogger('baseline');

export const BASELINE_KINDS: readonly BaselineKind[] = ['buy-and-hold', 'equal-weight', 'risk-parity'];

export interface BaselineConfig {
  /** 최소 한 베이스라인보다 샤프가 이만큼 넘게 높아야 통과 */
  readonly minImprovement: number;
  /** 어떤 베이스라인 대비든 샤프 차이가 이 값 이하면 실패 */
  readonly maxUnderperformance: number;
  /** 베이스라인 관측 수가 후보 관측 수의 이 비율 미만이면 에러 (리스크 패리티 워밍업 포함) */
  readonly minCoverage: number;
  readonly topN: number;
  readonly volLookback: number;
  readonly annualizationFactor: number;
  readonly strict: boolean;
  readonly kinds: readonly BaselineKind[];
}

const DEFAULT_CONFIG: BaselineConfig = {
  minImprovement: config.baseline.minImprovement,
  maxUnderperformance: config.baseline.maxUnderperformance,
  minCoverage: config.baseline.minCoverage,
  topN: config.baseline.topN,
  volLookback: config.baseline.volLookback,
  annualizationFactor: config.calibration.annualizationFactor,
  strict: config.strictFiltering,
  kinds: BASELINE_KINDS,
};

export interface BaselineComparison {
  readonly kind: BaselineKind;
  readonly metrics: PerformanceMetrics;
  /** 후보 샤프 - 베이스라인 샤프 */
  readonly improvement: number;
  /** 벤치마크 대신 대체 지표 사용 */
  readonly proxy: boolean;
}

export interface BaselineResult {
  readonly period: CalendarPeriod;
  readonly candidate: PerformanceMetrics;
  readonly baselines: BaselineComparison[];
  readonly bestBaseline: BaselineKind;
  readonly bestImprovement: number;
  readonly worstBaseline: BaselineKind;
  readonly worstImprovement: number;
  readonly passed: boolean;
  readonly warnings: ValidationWarning[];
}

function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * 패시브 베이스라인 대비 성과 비교
 * 바이앤홀드 / 동일가중 상위 N / 리스크 패리티
 */
export class BaselineComparator {
  private readonly config: BaselineConfig;
  private readonly universe: UniverseSnapshot;
  private readonly cache: BaselineCache;
  private readonly fingerprint: string;
  private readonly symbolReturns: ReadonlyMap<string, readonly number[]>;
  private readonly returnTimestamps: readonly number[];

  constructor(universe: UniverseSnapshot, config?: Partial<BaselineConfig>, cache?: BaselineCache) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.universe = universe;
    this.cache = cache ?? new BaselineCache();
    this.fingerprint = universeFingerprint(universe);
    this.returnTimestamps = universe.timestamps.slice(1);

    const returns = new Map<string, number[]>();
    for (const [symbol, closes] of Object.entries(universe.closes)) {
      if (closes.length !== universe.timestamps.length) {
        throw new Error(`Universe symbol ${symbol} has ${closes.length} closes for ${universe.timestamps.length} timestamps`);
      }
      returns.set(symbol, simpleReturns(closes));
    }
    this.symbolReturns = returns;
  }

  get hasBenchmark(): boolean {
    return this.symbolReturns.has(this.universe.benchmark);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /** 전체 기간 베이스라인 수익률 */
  baselineReturns(kind: BaselineKind): ReturnsSeries {
    switch (kind) {
      case 'buy-and-hold':
        return this.buyAndHold();
      case 'equal-weight':
        return this.equalWeight();
      case 'risk-parity':
        return this.riskParity();
    }
  }

  /** 기간 [start, end] 베이스라인 지표 (캐시) */
  baselineMetrics(kind: BaselineKind, period: CalendarPeriod): PerformanceMetrics {
    return this.cache.getOrCompute(kind, period, this.fingerprint, () => {
      log.debug({ kind, period }, 'Computing baseline');
      const series = this.baselineReturns(kind).between(period.start, period.end);
      if (series.length < 2) {
        throw new InsufficientDataError(
          `Baseline ${kind} has ${series.length} observation(s) in ${period.start}..${period.end}, need at least 2`,
          2,
          series.length,
        );
      }
      return computeMetrics(series.values, this.config.annualizationFactor);
    });
  }

  compare(input: ReportInput, period?: CalendarPeriod): BaselineResult {
    const c = this.config;
    const warnings: ValidationWarning[] = [];
    const resolved = period ?? this.defaultPeriod(input);

    const filtered = filterReport(input, resolved.start, resolved.end, { strict: c.strict });
    if (filtered.warning) warnings.push(filtered.warning);

    if (filtered.series.length < 2) {
      throw new InsufficientDataError(
        `Baseline comparison needs at least 2 candidate periods in ${resolved.start}..${resolved.end}, got ${filtered.series.length}`,
        2,
        filtered.series.length,
      );
    }

    const candidate = computeMetrics(filtered.series.values, c.annualizationFactor);

    if (!this.hasBenchmark && c.kinds.includes('buy-and-hold')) {
      const message =
        `Benchmark ${this.universe.benchmark} not in universe; buy-and-hold uses the cross-sectional mean return`;
      warnings.push({ type: 'BaselineProxyWarning', message, context: { benchmark: this.universe.benchmark } });
      log.warn({ benchmark: this.universe.benchmark }, 'Benchmark missing, using proxy');
    }

    const requiredCoverage = Math.ceil(c.minCoverage * candidate.nPeriods - 1e-9);
    const baselines: BaselineComparison[] = c.kinds.map((kind) => {
      const metrics = this.baselineMetrics(kind, resolved);
      if (metrics.nPeriods < requiredCoverage) {
        throw new InsufficientDataError(
          `Baseline ${kind} covers ${metrics.nPeriods} of ${candidate.nPeriods} candidate periods ` +
            `in ${resolved.start}..${resolved.end}, need at least ${requiredCoverage}`,
          requiredCoverage,
          metrics.nPeriods,
        );
      }
      return {
        kind,
        metrics,
        improvement: candidate.sharpeRatio - metrics.sharpeRatio,
        proxy: kind === 'buy-and-hold' && !this.hasBenchmark,
      };
    });

    if (baselines.length === 0) {
      throw new Error('No baselines configured');
    }

    let best = baselines[0]!;
    let worst = baselines[0]!;
    for (const b of baselines) {
      if (b.improvement > best.improvement) best = b;
      if (b.improvement < worst.improvement) worst = b;
    }

    return {
      period: resolved,
      candidate,
      baselines,
      bestBaseline: best.kind,
      bestImprovement: best.improvement,
      worstBaseline: worst.kind,
      worstImprovement: worst.improvement,
      passed: worst.improvement > c.maxUnderperformance && best.improvement > c.minImprovement,
      warnings,
    };
  }

  validate(input: ReportInput, period?: CalendarPeriod): ValidationVerdict<BaselineResult> {
    log.info({ kinds: this.config.kinds }, 'Baseline comparison started');
    const result = this.compare(input, period);
    const best = `${result.bestImprovement >= 0 ? '+' : ''}${result.bestImprovement.toFixed(3)}`;
    const worst = `${result.worstImprovement >= 0 ? '+' : ''}${result.worstImprovement.toFixed(3)}`;

    const { minImprovement, maxUnderperformance } = this.config;
    // 하한 미달이 먼저
    const underperformed = result.worstImprovement <= maxUnderperformance;

    let message: string;
    if (underperformed) {
      message = `Underperforms ${result.worstBaseline} by ${worst} Sharpe ≤ ${maxUnderperformance}`;
    } else if (result.passed) {
      message = `Beats ${result.bestBaseline} by ${best} Sharpe (worst: ${worst} vs ${result.worstBaseline})`;
    } else {
      message = `Best improvement ${best} Sharpe vs ${result.bestBaseline} ≤ ${minImprovement}`;
    }

    log.info(
      { best: result.bestImprovement, worst: result.worstImprovement, passed: result.passed, cache: this.cache.stats() },
      'Baseline comparison finished',
    );

    return createVerdict({
      validatorName: 'baseline',
      passed: result.passed,
      statistic: underperformed ? result.worstImprovement : result.bestImprovement,
      threshold: underperformed ? maxUnderperformance : minImprovement,
      comparison: '>',
      nPeriods: result.candidate.nPeriods,
      message,
      warnings: result.warnings,
      detail: result,
    });
  }

  private defaultPeriod(input: ReportInput): CalendarPeriod {
    const series = fullSeries(input);
    if (series.startTime === null || series.endTime === null) {
      throw new InsufficientDataError('Baseline comparison needs a non-empty candidate series', 2, 0);
    }
    return { start: isoDate(series.startTime), end: isoDate(series.endTime) };
  }

  private constituents(): string[] {
    return [...this.symbolReturns.keys()].filter((s) => s !== this.universe.benchmark).sort();
  }

  private buyAndHold(): ReturnsSeries {
    const bench = this.symbolReturns.get(this.universe.benchmark);
    if (bench) {
      return ReturnsSeries.fromArrays(this.returnTimestamps, bench.map((r) => (Number.isFinite(r) ? r : 0)));
    }
    const symbols = this.constituents();
    return this.build(0, (j) => averageOf(symbols.map((s) => this.symbolReturns.get(s)?.[j] ?? NaN)));
  }

  /** 직전 시점 시가총액 상위 N개 동일가중 (시총 없으면 정렬 순 앞 N개) */
  private equalWeight(): ReturnsSeries {
    const { topN } = this.config;
    const caps = this.universe.marketCaps;
    const symbols = this.constituents();

    return this.build(0, (j) => {
      let selected: string[];
      if (caps) {
        // 수익률 j는 가격 j→j+1, 순위는 가격 시점 j (직전) 시총
        selected = symbols
          .filter((s) => Number.isFinite(caps[s]?.[j] ?? NaN))
          .sort((a, b) => (caps[b]?.[j] ?? 0) - (caps[a]?.[j] ?? 0) || a.localeCompare(b))
          .slice(0, topN);
      } else {
        selected = symbols.slice(0, topN);
      }
      return averageOf(selected.map((s) => this.symbolReturns.get(s)?.[j] ?? NaN));
    });
  }

  /** 직전 volLookback 기간 변동성 역수 가중, 워밍업 구간은 제외 */
  private riskParity(): ReturnsSeries {
    const { volLookback } = this.config;
    const symbols = this.constituents();

    return this.build(volLookback, (j) => {
      let weightSum = 0;
      let weighted = 0;
      for (const s of symbols) {
        const r = this.symbolReturns.get(s);
        if (!r) continue;
        const current = r[j] ?? NaN;
        const window = r.slice(j - volLookback, j);
        if (!Number.isFinite(current) || window.some((v) => !Number.isFinite(v))) continue;
        const sigma = sampleStd(window);
        if (!(sigma > 0)) continue;
        weightSum += 1 / sigma;
        weighted += current / sigma;
      }
      return weightSum > 0 ? weighted / weightSum : 0;
    });
  }

  private build(from: number, returnAt: (j: number) => number): ReturnsSeries {
    const timestamps: number[] = [];
    const values: number[] = [];
    for (let j = from; j < this.returnTimestamps.length; j++) {
      timestamps.push(this.returnTimestamps[j]!);
      values.push(returnAt(j));
    }
    return ReturnsSeries.fromArrays(timestamps, values);
  }
}

function simpleReturns(closes: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1]!;
    const cur = closes[i]!;
    out.push(Number.isFinite(prev) && Number.isFinite(cur) && prev > 0 ? cur / prev - 1 : NaN);
  }
  return out;
}

/** 유한값 평균, 없으면 0 */
function averageOf(values: readonly number[]): number {
  const finite = values.filter((v) => Number.isFinite(v));
  return finite.length > 0 ? mean(finite) : 0;
}
