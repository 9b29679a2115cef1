import { writeFileSync } from 'node:fs';
import type { StrategyValidation, ValidatorName, VerdictRecord } from '../types/index.js';
import { toVerdictRecords } from '../validation/verdict.js';

export interface ValidatorBreakdown {
  readonly total: number;
  readonly passed: number;
  readonly passRate: number;
}

export interface ReportSummary {
  readonly totalStrategies: number;
  readonly strategiesPassed: number;
  readonly strategiesFailed: number;
  readonly strategiesErrored: number;
  readonly overallPassRate: number;
  readonly validatorBreakdown: Partial<Record<ValidatorName, ValidatorBreakdown>>;
}

export interface ReportJson {
  readonly title: string;
  readonly generatedAt: string;
  readonly summary: ReportSummary;
  readonly strategies: Array<{
    readonly strategy_id: string;
    readonly overall_passed: boolean;
    readonly stages_run: readonly ValidatorName[];
    readonly stages_skipped: ReadonlyArray<{ stage: ValidatorName; reason: string }>;
    readonly aborted_at: ValidatorName | null;
    readonly error: string | null;
  }>;
  readonly records: VerdictRecord[];
}

/**
 * 배치 검증 결과 누적 + 요약 통계 + JSON 출력
 */
export class ValidationReport {
  private readonly results: StrategyValidation[] = [];

  constructor(private readonly title: string = 'Strategy Validation') {}

  add(result: StrategyValidation): void {
    this.results.push(result);
  }

  addAll(results: readonly StrategyValidation[]): void {
    for (const r of results) this.add(r);
  }

  get size(): number {
    return this.results.length;
  }

  byStatus(passed: boolean): StrategyValidation[] {
    return this.results.filter((r) => r.overallPassed === passed);
  }

  summary(): ReportSummary {
    const total = this.results.length;
    const passed = this.results.filter((r) => r.overallPassed).length;
    const errored = this.results.filter((r) => r.error !== undefined).length;

    const counts = new Map<ValidatorName, { total: number; passed: number }>();
    for (const r of this.results) {
      for (const v of r.verdicts) {
        const c = counts.get(v.validatorName) ?? { total: 0, passed: 0 };
        c.total++;
        if (v.passed) c.passed++;
        counts.set(v.validatorName, c);
      }
    }

    const validatorBreakdown: Partial<Record<ValidatorName, ValidatorBreakdown>> = {};
    for (const [name, c] of counts) {
      validatorBreakdown[name] = { total: c.total, passed: c.passed, passRate: c.passed / c.total };
    }

    return {
      totalStrategies: total,
      strategiesPassed: passed,
      strategiesFailed: total - passed,
      strategiesErrored: errored,
      overallPassRate: total > 0 ? passed / total : 0,
      validatorBreakdown,
    };
  }

  toJSON(generatedAt: Date = new Date()): ReportJson {
    return {
      title: this.title,
      generatedAt: generatedAt.toISOString(),
      summary: this.summary(),
      strategies: this.results.map((r) => ({
        strategy_id: r.strategyId,
        overall_passed: r.overallPassed,
        stages_run: r.stagesRun,
        stages_skipped: r.stagesSkipped.map((s) => ({ stage: s.stage, reason: s.reason })),
        aborted_at: r.abortedAt ?? null,
        error: r.error ? `${r.error.name}: ${r.error.message}` : null,
      })),
      records: this.results.flatMap((r) => toVerdictRecords(r)),
    };
  }

  saveJson(path: string): void {
    writeFileSync(path, JSON.stringify(this.toJSON(), null, 2), 'utf-8');
  }
}
