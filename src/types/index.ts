export type {
  DateInput,
  EquityPoint,
  ReturnPoint,
  BacktestReport,
  ReportInput,
  CalendarPeriod,
} from './report.js';
export type { PerformanceMetrics } from './metrics.js';
export type { BaselineKind, UniverseSnapshot } from './universe.js';
export type {
  ValidatorName,
  Comparison,
  WarningType,
  ValidationWarning,
  ValidationVerdict,
  StageSkip,
  StageError,
  StrategyValidation,
  VerdictRecord,
} from './verdict.js';
