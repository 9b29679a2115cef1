export interface PerformanceMetrics {
  readonly sharpeRatio: number;     // 연환산
  readonly annualReturn: number;    // 0.1 = 10% (기하 연환산)
  readonly maxDrawdown: number;     // 0~1 (양수)
  readonly winRate: number;         // 0~1, 수익 기간 비율
  readonly nPeriods: number;
}
