import type {
  CalendarPeriod,
  ReportInput,
  StageError,
  StageSkip,
  StrategyValidation,
  UniverseSnapshot,
  ValidationVerdict,
  ValidatorName,
} from '../types/index.js';
import { isValidationError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { BaselineComparator, type BaselineConfig } from './baseline.js';
import { BaselineCache } from './baseline-cache.js';
import { BootstrapValidator, type BootstrapConfig } from './bootstrap.js';
import { DataSplitValidator, type DataSplitConfig } from './data-split.js';
import { MultipleComparisonCorrector, type MultipleComparisonConfig } from './multiple-comparison.js';
import { WalkForwardAnalyzer, type WalkForwardConfig } from './walk-forward.js';

const log = createChildLogger('orchestrator');

export interface StrategyCandidate {
  readonly strategyId: string;
  readonly report: ReportInput;
  readonly params?: Readonly<Record<string, unknown>>;
}

export interface OrchestratorOptions {
  readonly dataSplit?: Partial<DataSplitConfig>;
  readonly walkForward?: Partial<WalkForwardConfig>;
  readonly bootstrap?: Partial<BootstrapConfig>;
  readonly baseline?: Partial<BaselineConfig>;
  readonly multipleComparison?: Partial<MultipleComparisonConfig>;
  /** 없으면 baseline 단계 건너뜀 */
  readonly universe?: UniverseSnapshot;
  readonly baselineCache?: BaselineCache;
  /** 미지정 시 후보 시계열 전체 기간 */
  readonly baselinePeriod?: CalendarPeriod;
}

interface Stage {
  readonly name: ValidatorName;
  readonly run: (report: ReportInput, familySize: number) => ValidationVerdict | StageSkip;
}

/**
 * 검증 파이프라인
 * 비용 오름차순으로 실행하고 첫 실패에서 해당 전략 평가 중단
 */
export class ValidationOrchestrator {
  private readonly stages: readonly Stage[];
  private readonly baseline: BaselineComparator | null;

  constructor(options: OrchestratorOptions = {}) {
    const dataSplit = new DataSplitValidator(options.dataSplit);
    const walkForward = new WalkForwardAnalyzer(options.walkForward);
    const bootstrap = new BootstrapValidator(options.bootstrap);

    this.baseline = options.universe
      ? new BaselineComparator(options.universe, options.baseline, options.baselineCache ?? new BaselineCache())
      : null;

    this.stages = [
      { name: 'data_split', run: (report) => dataSplit.validate(report) },
      { name: 'walk_forward', run: (report) => walkForward.validate(report) },
      { name: 'bootstrap', run: (report) => bootstrap.validate(report) },
      {
        name: 'baseline',
        run: (report) =>
          this.baseline
            ? this.baseline.validate(report, options.baselinePeriod)
            : { stage: 'baseline', reason: 'No universe configured' },
      },
      {
        name: 'multiple_comparison',
        run: (report, familySize) =>
          new MultipleComparisonCorrector(familySize, options.multipleComparison).validate(report),
      },
    ];
  }

  get baselineComparator(): BaselineComparator | null {
    return this.baseline;
  }

  validateStrategy(candidate: StrategyCandidate, familySize: number = 1): StrategyValidation {
    const { strategyId } = candidate;
    const verdicts: ValidationVerdict[] = [];
    const stagesRun: ValidatorName[] = [];
    const stagesSkipped: StageSkip[] = [];
    let abortedAt: ValidatorName | undefined;
    let error: StageError | undefined;

    log.info({ strategyId, familySize }, 'Strategy validation started');

    for (const stage of this.stages) {
      let outcome: ValidationVerdict | StageSkip;
      try {
        outcome = stage.run(candidate.report, familySize);
      } catch (err) {
        error = toStageError(stage.name, err);
        abortedAt = stage.name;
        log.error({ strategyId, stage: stage.name, err }, 'Validation stage failed');
        break;
      }

      if ('reason' in outcome) {
        stagesSkipped.push(outcome);
        log.info({ strategyId, stage: stage.name, reason: outcome.reason }, 'Stage skipped');
        continue;
      }

      stagesRun.push(stage.name);
      verdicts.push(outcome);

      if (!outcome.passed) {
        abortedAt = stage.name;
        log.info({ strategyId, stage: stage.name, message: outcome.message }, 'Strategy rejected');
        break;
      }
    }

    const overallPassed = abortedAt === undefined && verdicts.every((v) => v.passed);
    log.info({ strategyId, overallPassed, stagesRun }, 'Strategy validation finished');

    return {
      strategyId,
      ...(candidate.params ? { params: candidate.params } : {}),
      overallPassed,
      verdicts,
      stagesRun,
      stagesSkipped,
      ...(abortedAt ? { abortedAt } : {}),
      ...(error ? { error } : {}),
    };
  }

  /** 후보 수(또는 지정값)를 본페로니 N으로 사용 */
  validateBatch(candidates: readonly StrategyCandidate[], familySize?: number): StrategyValidation[] {
    const n = familySize ?? candidates.length;
    log.info({ candidates: candidates.length, familySize: n }, 'Batch validation started');
    const results = candidates.map((c) => this.validateStrategy(c, n));
    log.info({ passed: results.filter((r) => r.overallPassed).length, total: results.length }, 'Batch validation finished');
    return results;
  }
}

function toStageError(stage: ValidatorName, err: unknown): StageError {
  if (isValidationError(err)) {
    return { stage, name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { stage, name: err.name, message: err.message };
  }
  return { stage, name: 'Error', message: String(err) };
}
