import type { ReportInput, ValidationVerdict, ValidationWarning } from '../types/index.js';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { fullSeries } from '../data/report-filter.js';
import { calcSharpe } from '../report/metrics.js';
import { upperTailZ } from '../stats/normal.js';
import { createRng, gaussian } from '../stats/random.js';
import { mean, percentile, sharpeRatio } from '../stats/statistics.js';
import { blockBootstrapResample } from './bootstrap.js';
import { createVerdict } from './verdict.js';

const log = createChildLogger('multiple-comparison');

export interface MultipleComparisonConfig {
  readonly alpha: number;
  /** 파라메트릭 임계값 하한 */
  readonly conservativeFloor: number;
  readonly nullDraws: number;
  /** 두 임계값 비율이 이 이상이면 가정 괴리 경고 */
  readonly divergenceRatio: number;
  readonly bootstrapAudit: boolean;
  readonly blockSize: number;
  readonly marketVolatility: number;
  readonly annualizationFactor: number;
  readonly seed: number;
}

const DEFAULT_CONFIG: MultipleComparisonConfig = {
  ...config.multipleComparison,
  blockSize: config.calibration.blockSize,
  marketVolatility: config.calibration.marketVolatility,
  annualizationFactor: config.calibration.annualizationFactor,
  seed: config.calibration.seed,
};

export interface ThresholdResult {
  readonly nStrategies: number;
  readonly nPeriods: number;
  readonly adjustedAlpha: number;
  readonly zScore: number;
  readonly parametricThreshold: number;
  /** max(floor, parametric) */
  readonly conservativeThreshold: number;
  /** 감사 비활성 시 null */
  readonly bootstrapThreshold: number | null;
  /** 부트스트랩 대 (하한 적용 전) 파라메트릭 임계값 비율, 큰 쪽 / 작은 쪽 */
  readonly thresholdRatio: number | null;
  readonly enforcedThreshold: number;
  readonly warnings: ValidationWarning[];
}

export interface StrategySharpe {
  readonly strategyId: string;
  readonly sharpeRatio: number;
}

export interface StrategySetResult {
  readonly totalStrategies: number;
  readonly significantCount: number;
  readonly significanceThreshold: number;
  readonly adjustedAlpha: number;
  readonly expectedFalseDiscoveries: number;
  readonly estimatedFdr: number;
  readonly significant: StrategySharpe[];
}

export interface MultipleComparisonDetail {
  readonly sharpeRatio: number;
  readonly threshold: ThresholdResult;
}

/**
 * 본페로니 다중비교 보정
 * N개 전략을 시험했을 때 유의하다고 볼 샤프 임계값
 */
export class MultipleComparisonCorrector {
  private readonly config: MultipleComparisonConfig;
  readonly nStrategies: number;

  constructor(nStrategies: number, config?: Partial<MultipleComparisonConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(nStrategies) || nStrategies <= 0) {
      throw new RangeError(`nStrategies must be a positive integer, got ${nStrategies}`);
    }
    if (!(this.config.alpha > 0 && this.config.alpha < 1)) {
      throw new RangeError(`alpha must be in (0, 1), got ${this.config.alpha}`);
    }
    this.nStrategies = nStrategies;
  }

  get adjustedAlpha(): number {
    return this.config.alpha / this.nStrategies;
  }

  /** z / sqrt(T), z = Φ⁻¹(1 - α_adj/2) */
  parametricThreshold(nPeriods: number): number {
    assertPeriods(nPeriods);
    return upperTailZ(this.adjustedAlpha / 2) / Math.sqrt(nPeriods);
  }

  /**
   * 귀무가설 부트스트랩 임계값
   * N(0, σ_daily) 시계열(평균 정확히 0으로 보정)을 블록 재표본해 |연환산 샤프|의 (1 - α_adj) 분위수
   */
  bootstrapThreshold(nPeriods: number): number {
    assertPeriods(nPeriods);
    const { marketVolatility, annualizationFactor: af, blockSize, nullDraws, seed } = this.config;
    const rng = createRng(seed);
    const dailyVol = marketVolatility / Math.sqrt(af);

    const raw = Array.from({ length: nPeriods }, () => gaussian(rng) * dailyVol);
    const m = mean(raw);
    const nullReturns = raw.map((r) => r - m);

    const stats: number[] = [];
    for (let i = 0; i < nullDraws; i++) {
      const s = sharpeRatio(blockBootstrapResample(nullReturns, blockSize, rng), af);
      if (Number.isFinite(s)) stats.push(Math.abs(s));
    }
    if (stats.length === 0) return NaN;

    stats.sort((a, b) => a - b);
    return percentile(stats, (1 - this.adjustedAlpha) * 100);
  }

  threshold(nPeriods: number): ThresholdResult {
    const c = this.config;
    const adjustedAlpha = this.adjustedAlpha;
    const zScore = upperTailZ(adjustedAlpha / 2);
    const parametricThreshold = this.parametricThreshold(nPeriods);
    const conservativeThreshold = Math.max(c.conservativeFloor, parametricThreshold);
    const warnings: ValidationWarning[] = [];

    let bootstrapThreshold: number | null = null;
    let thresholdRatio: number | null = null;
    let enforcedThreshold = conservativeThreshold;

    if (c.bootstrapAudit) {
      const b = this.bootstrapThreshold(nPeriods);
      if (Number.isFinite(b)) {
        bootstrapThreshold = b;
        const lo = Math.min(b, parametricThreshold);
        const hi = Math.max(b, parametricThreshold);
        thresholdRatio = lo > 0 ? hi / lo : Infinity;
        enforcedThreshold = Math.max(b, conservativeThreshold);

        if (thresholdRatio >= c.divergenceRatio) {
          const message =
            `Parametric threshold ${parametricThreshold.toFixed(4)} and bootstrap threshold ${b.toFixed(4)} ` +
            `differ by ${thresholdRatio.toFixed(1)}x; enforcing the stricter ${enforcedThreshold.toFixed(4)}`;
          warnings.push({
            type: 'AssumptionDivergenceWarning',
            message,
            context: { parametric: parametricThreshold, bootstrap: b, ratio: thresholdRatio },
          });
          log.warn({ parametric: parametricThreshold, bootstrap: b, ratio: thresholdRatio }, 'Threshold assumptions diverge');
        }
      }
    }

    return {
      nStrategies: this.nStrategies,
      nPeriods,
      adjustedAlpha,
      zScore,
      parametricThreshold,
      conservativeThreshold,
      bootstrapThreshold,
      thresholdRatio,
      enforcedThreshold,
      warnings,
    };
  }

  /** 양의 방향만 유의로 봄 (음의 샤프는 통과 대상이 아님) */
  isSignificant(sharpe: number, nPeriods: number): boolean {
    if (!Number.isFinite(sharpe)) {
      log.warn({ sharpe }, 'Invalid Sharpe ratio');
      return false;
    }
    return sharpe > this.threshold(nPeriods).enforcedThreshold;
  }

  validateStrategySet(strategies: readonly StrategySharpe[], nPeriods: number): StrategySetResult {
    const adjustedAlpha = this.adjustedAlpha;
    if (strategies.length === 0) {
      return {
        totalStrategies: 0,
        significantCount: 0,
        significanceThreshold: 0,
        adjustedAlpha,
        expectedFalseDiscoveries: 0,
        estimatedFdr: 0,
        significant: [],
      };
    }

    const threshold = this.threshold(nPeriods).enforcedThreshold;
    const significant = strategies.filter((s) => Number.isFinite(s.sharpeRatio) && s.sharpeRatio > threshold);
    const expectedFalseDiscoveries = adjustedAlpha * strategies.length;

    log.info(
      { total: strategies.length, significant: significant.length, threshold },
      'Strategy set evaluated',
    );

    return {
      totalStrategies: strategies.length,
      significantCount: significant.length,
      significanceThreshold: threshold,
      adjustedAlpha,
      expectedFalseDiscoveries,
      estimatedFdr: significant.length > 0 ? expectedFalseDiscoveries / significant.length : 0,
      significant,
    };
  }

  /** 1 - (1 - α_adj)^N  (≤ α) */
  familyWiseErrorRate(): number {
    return 1 - Math.pow(1 - this.adjustedAlpha, this.nStrategies);
  }

  validate(input: ReportInput): ValidationVerdict<MultipleComparisonDetail> {
    const series = fullSeries(input);
    const sharpe = calcSharpe(series.values, this.config.annualizationFactor);
    const t = this.threshold(series.length);
    const passed = sharpe > t.enforcedThreshold;

    const message = passed
      ? `Sharpe ${sharpe.toFixed(3)} > Bonferroni threshold ${t.enforcedThreshold.toFixed(4)} (N=${this.nStrategies})`
      : `Sharpe ${sharpe.toFixed(3)} ≤ Bonferroni threshold ${t.enforcedThreshold.toFixed(4)} (N=${this.nStrategies})`;

    log.info({ sharpe, threshold: t.enforcedThreshold, nStrategies: this.nStrategies, passed }, 'Multiple comparison finished');

    return createVerdict({
      validatorName: 'multiple_comparison',
      passed,
      statistic: sharpe,
      threshold: t.enforcedThreshold,
      comparison: '>',
      nPeriods: series.length,
      message,
      warnings: t.warnings,
      detail: { sharpeRatio: sharpe, threshold: t },
    });
  }
}

function assertPeriods(nPeriods: number): void {
  if (!Number.isInteger(nPeriods) || nPeriods <= 0) {
    throw new RangeError(`nPeriods must be a positive integer, got ${nPeriods}`);
  }
}
