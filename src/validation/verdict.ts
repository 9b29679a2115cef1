import type {
  Comparison,
  StrategyValidation,
  ValidationVerdict,
  ValidationWarning,
  ValidatorName,
  VerdictRecord,
} from '../types/index.js';

export interface VerdictInput<TDetail> {
  readonly validatorName: ValidatorName;
  readonly passed: boolean;
  readonly statistic: number;
  readonly threshold: number;
  readonly comparison: Comparison;
  readonly nPeriods: number;
  readonly message: string;
  readonly warnings?: readonly ValidationWarning[];
  readonly detail: TDetail;
}

/** 불변 verdict 생성 */
export function createVerdict<TDetail>(input: VerdictInput<TDetail>): ValidationVerdict<TDetail> {
  return Object.freeze({
    validatorName: input.validatorName,
    passed: input.passed,
    statistic: input.statistic,
    threshold: input.threshold,
    comparison: input.comparison,
    nPeriods: input.nPeriods,
    message: input.message,
    warnings: Object.freeze([...(input.warnings ?? [])]),
    detail: input.detail,
  });
}

export function compare(statistic: number, comparison: Comparison, threshold: number): boolean {
  return comparison === '>' ? statistic > threshold : statistic >= threshold;
}

export function toVerdictRecord(strategyId: string, v: ValidationVerdict): VerdictRecord {
  return {
    strategy_id: strategyId,
    validator_name: v.validatorName,
    passed: v.passed,
    statistic_value: v.statistic,
    threshold_value: v.threshold,
    comparison: v.comparison,
    n_periods: v.nPeriods,
    diagnostic_message: v.message,
    warnings: v.warnings.map((w) => `${w.type}: ${w.message}`),
  };
}

/** 직렬화용 평면 레코드 */
export function toVerdictRecords(result: StrategyValidation): VerdictRecord[] {
  return result.verdicts.map((v) => toVerdictRecord(result.strategyId, v));
}
