import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 프로젝트 루트 .env (cwd가 달라도 읽히도록 명시 로드)
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config(); // cwd .env, 있으면 이걸로 덮어씀

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  if (Number.isNaN(n)) {
    throw new Error(`Environment variable ${key} must be numeric, got "${v}"`);
  }
  return n;
}

function envBool(key: string, fallback: boolean): boolean {
  const v = process.env[key];
  return v !== undefined ? v === 'true' : fallback;
}

export const config = {
  /** 시장 보정 상수 (프로세스 시작 시 1회 로드, 실행 중 읽기 전용) */
  calibration: {
    annualizationFactor: envNum('ANNUALIZATION_FACTOR', 252),
    /** 부트스트랩 귀무가설 생성용 연 변동성 */
    marketVolatility: envNum('MARKET_VOLATILITY', 0.22),
    /** 블록 부트스트랩 블록 길이 (약 1개월 거래일) */
    blockSize: envNum('BOOTSTRAP_BLOCK_SIZE', 21),
    seed: envNum('RANDOM_SEED', 42),
  },

  walkForward: {
    trainBars: envNum('WF_TRAIN_BARS', 252),
    testBars: envNum('WF_TEST_BARS', 63),
    minWindows: envNum('WF_MIN_WINDOWS', 3),
    minMeanSharpe: envNum('WF_MIN_MEAN_SHARPE', 0.5),
    minPositiveWindowRate: envNum('WF_MIN_POSITIVE_RATE', 0.6),
    minWorstSharpe: envNum('WF_MIN_WORST_SHARPE', -0.5),
    maxSharpeStd: envNum('WF_MAX_SHARPE_STD', 1.0),
  },

  bootstrap: {
    iterations: envNum('BOOTSTRAP_ITERATIONS', 1000),
    confidence: envNum('BOOTSTRAP_CONFIDENCE', 0.95),
    minLowerBound: envNum('BOOTSTRAP_MIN_LOWER', 0.5),
    minValidFraction: envNum('BOOTSTRAP_MIN_VALID_FRACTION', 0.9),
  },

  multipleComparison: {
    alpha: envNum('MC_ALPHA', 0.05),
    conservativeFloor: envNum('MC_CONSERVATIVE_FLOOR', 0.5),
    nullDraws: envNum('MC_NULL_DRAWS', 1000),
    divergenceRatio: envNum('MC_DIVERGENCE_RATIO', 10),
    /** true면 부트스트랩 임계값도 계산해 파라메트릭과 비교 */
    bootstrapAudit: envBool('MC_BOOTSTRAP_AUDIT', false),
  },

  dataSplit: {
    periods: {
      train: { start: env('SPLIT_TRAIN_START', '2018-01-01'), end: env('SPLIT_TRAIN_END', '2020-12-31') },
      validation: { start: env('SPLIT_VALIDATION_START', '2021-01-01'), end: env('SPLIT_VALIDATION_END', '2022-12-31') },
      test: { start: env('SPLIT_TEST_START', '2023-01-01'), end: env('SPLIT_TEST_END', '2024-12-31') },
    },
    minValidationSharpe: envNum('SPLIT_MIN_VALIDATION_SHARPE', 1.0),
    minConsistency: envNum('SPLIT_MIN_CONSISTENCY', 0.6),
    minDegradationRatio: envNum('SPLIT_MIN_DEGRADATION', 0.7),
    epsilon: envNum('SPLIT_CONSISTENCY_EPSILON', 0.1),
    minPeriodObservations: envNum('SPLIT_MIN_PERIOD_OBS', 20),
  },

  baseline: {
    minImprovement: envNum('BASELINE_MIN_IMPROVEMENT', 0.5),
    maxUnderperformance: envNum('BASELINE_MAX_UNDERPERFORMANCE', -1.0),
    minCoverage: envNum('BASELINE_MIN_COVERAGE', 0.5),
    topN: envNum('BASELINE_TOP_N', 50),
    volLookback: envNum('BASELINE_VOL_LOOKBACK', 60),
    benchmark: env('BASELINE_BENCHMARK', 'INDEX'),
    /** 비어 있으면 메모리 캐시만 사용 */
    cachePath: env('BASELINE_CACHE_PATH', ''),
  },

  /** true면 기간 필터링 불가 리포트에 에러 (false: 경고 후 전체 기간 사용) */
  strictFiltering: envBool('STRICT_FILTERING', false),

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
