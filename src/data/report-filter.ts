import type { BacktestReport, DateInput, ReportInput, ValidationWarning } from '../types/index.js';
import { UnsupportedFilteringError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { ReturnsSeries } from './returns-series.js';

const log = createChildLogger('report-filter');

/**
 * 리포트의 기간 필터링 능력
 * - self-filtering: filterDates() 제공
 * - date-indexed:   ReturnsSeries 자체 (between으로 자름)
 * - unsupported:    전체 기간 시계열만 꺼낼 수 있음
 */
export type FilterCapability = 'self-filtering' | 'date-indexed' | 'unsupported';

export interface FilterResult {
  readonly series: ReturnsSeries;
  readonly capability: FilterCapability;
  /** false면 요청 기간이 아니라 전체 기간 데이터 */
  readonly filtered: boolean;
  readonly warning?: ValidationWarning;
}

export interface FilterOptions {
  readonly strict: boolean;
}

export function detectCapability(input: ReportInput): FilterCapability {
  if (input instanceof ReturnsSeries) return 'date-indexed';
  if (typeof input.filterDates === 'function') return 'self-filtering';
  return 'unsupported';
}

/** 기간 구분 없이 전체 시계열 */
export function fullSeries(input: ReportInput): ReturnsSeries {
  return input instanceof ReturnsSeries ? input : input.returns();
}

function reportTypeName(input: BacktestReport): string {
  return input.constructor.name || 'Object';
}

/**
 * 리포트를 [start, end] 기간으로 제한
 * 필터링 불가 리포트: strict면 에러, 아니면 경고와 함께 전체 기간 반환
 */
export function filterReport(
  input: ReportInput,
  start: DateInput,
  end: DateInput,
  options: FilterOptions,
): FilterResult {
  if (input instanceof ReturnsSeries) {
    return { series: input.between(start, end), capability: 'date-indexed', filtered: true };
  }

  if (typeof input.filterDates === 'function') {
    return {
      series: input.filterDates(start, end).returns(),
      capability: 'self-filtering',
      filtered: true,
    };
  }

  const reportType = reportTypeName(input);
  const period = `${String(start)}..${String(end)}`;

  if (options.strict) {
    throw new UnsupportedFilteringError(
      `Report type ${reportType} cannot be filtered to ${period}`,
      reportType,
    );
  }

  const message =
    `Report type ${reportType} cannot be filtered to ${period}; using the full, unfiltered report. ` +
    'Results for this period may include data from other periods. This fallback is deprecated.';
  log.warn({ reportType, period, strategyId: input.strategyId }, 'Unfiltered report used for period');

  return {
    series: input.returns(),
    capability: 'unsupported',
    filtered: false,
    warning: {
      type: 'UnfilteredReportWarning',
      message,
      context: { reportType, period },
    },
  };
}
