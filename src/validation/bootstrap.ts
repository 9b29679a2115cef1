import type { ReportInput, ValidationVerdict, ValidationWarning } from '../types/index.js';
import { config } from '../config.js';
import { InsufficientDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { fullSeries } from '../data/report-filter.js';
import { createRng, randomInt, type Rng } from '../stats/random.js';
import { percentile, sharpeRatio } from '../stats/statistics.js';
import { createVerdict } from './verdict.js';

const log = createChildLogger('bootstrap');

export interface BootstrapConfig {
  readonly iterations: number;
  readonly confidence: number;          // 0.95 → 95% CI
  readonly blockSize: number;
  readonly minLowerBound: number;       // CI 하한 >
  readonly minValidFraction: number;    // 유효 반복 비율 하한 (미만이면 신뢰 불가)
  readonly annualizationFactor: number;
  readonly seed: number;
  /** 미지정 시 2 × blockSize */
  readonly minObservations?: number;
}

const DEFAULT_CONFIG: BootstrapConfig = {
  ...config.bootstrap,
  blockSize: config.calibration.blockSize,
  annualizationFactor: config.calibration.annualizationFactor,
  seed: config.calibration.seed,
};

/** 재표본 시계열 → 통계량 (유한값이 아니면 버림) */
export type BootstrapStatistic = (values: readonly number[]) => number;

export interface BootstrapResult {
  readonly pointEstimate: number;
  /** 신뢰 불가(유효 반복 부족)면 null */
  readonly ciLower: number | null;
  readonly ciUpper: number | null;
  readonly confidence: number;
  readonly iterations: number;
  readonly validIterations: number;
  readonly reliable: boolean;
  readonly blockSize: number;
  readonly nPeriods: number;
}

/**
 * 원형 블록 부트스트랩 재표본
 * 임의 시작점에서 blockSize 길이 블록을 끝에서 처음으로 감아가며 이어 붙이고 n개로 자름
 */
export function blockBootstrapResample(values: readonly number[], blockSize: number, rng: Rng): number[] {
  const n = values.length;
  const out: number[] = [];
  if (n === 0) return out;

  while (out.length < n) {
    const start = randomInt(rng, n);
    for (let j = 0; j < blockSize && out.length < n; j++) {
      out.push(values[(start + j) % n]!);
    }
  }
  return out;
}

/**
 * 블록 부트스트랩 신뢰구간 검증
 * 자기상관을 보존한 재표본으로 샤프 비율의 신뢰구간을 구해 하한으로 판정
 */
export class BootstrapValidator {
  private readonly config: BootstrapConfig;
  private readonly statistic: BootstrapStatistic;

  constructor(config?: Partial<BootstrapConfig>, statistic?: BootstrapStatistic) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const af = this.config.annualizationFactor;
    this.statistic = statistic ?? ((values) => sharpeRatio(values, af));
  }

  get minObservations(): number {
    return this.config.minObservations ?? 2 * this.config.blockSize;
  }

  run(input: ReportInput): BootstrapResult {
    const { iterations, confidence, blockSize, minValidFraction, seed } = this.config;
    const values = fullSeries(input).values;

    if (values.length < this.minObservations) {
      throw new InsufficientDataError(
        `Bootstrap needs at least ${this.minObservations} periods (block size ${blockSize}), got ${values.length}`,
        this.minObservations,
        values.length,
      );
    }

    const rng = createRng(seed);
    const samples: number[] = [];

    for (let i = 0; i < iterations; i++) {
      const stat = this.statistic(blockBootstrapResample(values, blockSize, rng));
      if (Number.isFinite(stat)) samples.push(stat);
    }

    // 곱셈 반올림 오차로 최소 개수가 한 칸 올라가지 않도록
    const minValid = Math.ceil(minValidFraction * iterations - 1e-9);
    const reliable = samples.length > 0 && samples.length >= minValid;
    samples.sort((a, b) => a - b);
    const alpha = 1 - confidence;

    return {
      pointEstimate: this.statistic(values),
      ciLower: reliable ? percentile(samples, (alpha / 2) * 100) : null,
      ciUpper: reliable ? percentile(samples, (1 - alpha / 2) * 100) : null,
      confidence,
      iterations,
      validIterations: samples.length,
      reliable,
      blockSize,
      nPeriods: values.length,
    };
  }

  validate(input: ReportInput): ValidationVerdict<BootstrapResult> {
    log.info({ iterations: this.config.iterations, blockSize: this.config.blockSize }, 'Bootstrap started');
    const result = this.run(input);
    const threshold = Math.max(0, this.config.minLowerBound);
    const warnings: ValidationWarning[] = [];

    let passed: boolean;
    let message: string;

    if (result.ciLower === null) {
      passed = false;
      message =
        `Bootstrap unreliable: ${result.validIterations}/${result.iterations} valid iterations ` +
        `(< ${(this.config.minValidFraction * 100).toFixed(0)}%)`;
      warnings.push({
        type: 'DegradedBootstrapWarning',
        message,
        context: { validIterations: result.validIterations, iterations: result.iterations },
      });
      log.warn({ valid: result.validIterations, iterations: result.iterations }, 'Bootstrap degraded');
    } else {
      passed = result.ciLower > 0 && result.ciLower > this.config.minLowerBound;
      const ci = `[${result.ciLower.toFixed(3)}, ${(result.ciUpper ?? NaN).toFixed(3)}]`;
      const pct = (result.confidence * 100).toFixed(0);
      message = passed
        ? `${pct}% CI ${ci} lower bound > ${threshold}`
        : `${pct}% CI ${ci} lower bound ≤ ${threshold}`;
    }

    log.info({ ciLower: result.ciLower, ciUpper: result.ciUpper, passed }, 'Bootstrap finished');

    return createVerdict({
      validatorName: 'bootstrap',
      passed,
      statistic: result.ciLower ?? NaN,
      threshold,
      comparison: '>',
      nPeriods: result.nPeriods,
      message,
      warnings,
      detail: result,
    });
  }
}
