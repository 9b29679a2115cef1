import type { BacktestReport, DateInput, EquityPoint } from '../types/index.js';
import { ReturnsSeries } from './returns-series.js';

/**
 * 에쿼티 커브 기반 백테스트 리포트
 * filterDates로 스스로 하위 기간 리포트를 만든다
 */
export class EquityCurveReport implements BacktestReport {
  readonly strategyId?: string;
  private readonly series: ReturnsSeries;

  private constructor(series: ReturnsSeries, strategyId?: string) {
    this.series = series;
    if (strategyId !== undefined) this.strategyId = strategyId;
  }

  static fromEquityCurve(curve: readonly EquityPoint[], strategyId?: string): EquityCurveReport {
    return new EquityCurveReport(ReturnsSeries.fromEquityCurve(curve), strategyId);
  }

  static fromReturns(series: ReturnsSeries, strategyId?: string): EquityCurveReport {
    return new EquityCurveReport(series, strategyId);
  }

  returns(): ReturnsSeries {
    return this.series;
  }

  filterDates(start: DateInput, end: DateInput): EquityCurveReport {
    return new EquityCurveReport(this.series.between(start, end), this.strategyId);
  }
}
