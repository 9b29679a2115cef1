import type { ReturnsSeries } from '../data/returns-series.js';

/** 달력 경계 입력: Date, ISO 문자열(YYYY-MM-DD), Unix ms */
export type DateInput = Date | string | number;

export interface EquityPoint {
  readonly timestamp: number;   // Unix ms
  readonly equity: number;
}

export interface ReturnPoint {
  readonly timestamp: number;   // Unix ms
  readonly value: number;       // 기간 수익률 (0.01 = 1%)
}

/**
 * 백테스트 엔진이 만든 결과물
 * filterDates가 있으면 스스로 하위 기간으로 제한 가능 ("self-filtering")
 */
export interface BacktestReport {
  readonly strategyId?: string;
  returns(): ReturnsSeries;
  filterDates?(start: DateInput, end: DateInput): BacktestReport;
}

/** 검증기가 받는 리포트 입력: 리포트 객체 또는 시계열 그 자체 */
export type ReportInput = BacktestReport | ReturnsSeries;

export interface CalendarPeriod {
  readonly start: string;       // YYYY-MM-DD (포함)
  readonly end: string;         // YYYY-MM-DD (포함)
}
