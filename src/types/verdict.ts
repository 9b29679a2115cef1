export type ValidatorName =
  | 'data_split'
  | 'walk_forward'
  | 'bootstrap'
  | 'baseline'
  | 'multiple_comparison';

/** 임계값 비교 방식. p-value가 아니라 statistic 대 threshold 비교임을 명시 */
export type Comparison = '>' | '>=';

export type WarningType =
  | 'UnfilteredReportWarning'
  | 'DegradedBootstrapWarning'
  | 'AssumptionDivergenceWarning'
  | 'BaselineProxyWarning';

/** 비치명 경고. 예외로 던지지 않고 verdict에 첨부 */
export interface ValidationWarning {
  readonly type: WarningType;
  readonly message: string;
  readonly context?: Readonly<Record<string, string | number>>;
}

export interface ValidationVerdict<TDetail = unknown> {
  readonly validatorName: ValidatorName;
  readonly passed: boolean;
  readonly statistic: number;
  readonly threshold: number;
  readonly comparison: Comparison;
  readonly nPeriods: number;
  readonly message: string;
  readonly warnings: readonly ValidationWarning[];
  readonly detail: TDetail;
}

export interface StageSkip {
  readonly stage: ValidatorName;
  readonly reason: string;
}

export interface StageError {
  readonly stage: ValidatorName;
  readonly name: string;
  readonly code?: string;
  readonly message: string;
}

/** 전략 1개의 전체 검증 결과 */
export interface StrategyValidation {
  readonly strategyId: string;
  readonly params?: Readonly<Record<string, unknown>>;
  readonly overallPassed: boolean;
  readonly verdicts: readonly ValidationVerdict[];
  readonly stagesRun: readonly ValidatorName[];
  readonly stagesSkipped: readonly StageSkip[];
  readonly abortedAt?: ValidatorName;
  readonly error?: StageError;
}

/** 직렬화용 평면 레코드 (JSON) */
export interface VerdictRecord {
  readonly strategy_id: string;
  readonly validator_name: ValidatorName;
  readonly passed: boolean;
  readonly statistic_value: number;
  readonly threshold_value: number;
  readonly comparison: string;
  readonly n_periods: number;
  readonly diagnostic_message: string;
  readonly warnings: readonly string[];
}
