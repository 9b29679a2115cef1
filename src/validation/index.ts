export { createVerdict, toVerdictRecord, toVerdictRecords } from './verdict.js';
export { WalkForwardAnalyzer } from './walk-forward.js';
export type { WalkForwardConfig, WalkForwardResult, WindowResult } from './walk-forward.js';
export { BootstrapValidator, blockBootstrapResample } from './bootstrap.js';
export type { BootstrapConfig, BootstrapResult, BootstrapStatistic } from './bootstrap.js';
export { MultipleComparisonCorrector } from './multiple-comparison.js';
export type { MultipleComparisonConfig, ThresholdResult, StrategySetResult } from './multiple-comparison.js';
export { DataSplitValidator, consistencyScore } from './data-split.js';
export type { DataSplitConfig, DataSplitResult } from './data-split.js';
export { BaselineComparator, BASELINE_KINDS } from './baseline.js';
export type { BaselineConfig, BaselineResult } from './baseline.js';
export { BaselineCache, MemoryBaselineCache, SqliteBaselineCache, cacheKey, universeFingerprint } from './baseline-cache.js';
export { ValidationOrchestrator } from './orchestrator.js';
export type { OrchestratorOptions, StrategyCandidate } from './orchestrator.js';
