import type { PerformanceMetrics } from '../types/index.js';
import { sharpeRatio } from '../stats/statistics.js';

/**
 * 기간 수익률 → 성과 지표
 * 호출할 때마다 새로 계산 (기간이 다르면 결과도 다름)
 */
export function computeMetrics(
  returns: readonly number[],
  annualizationFactor: number,
): PerformanceMetrics {
  return {
    sharpeRatio: calcSharpe(returns, annualizationFactor),
    annualReturn: calcAnnualReturn(returns, annualizationFactor),
    maxDrawdown: calcMaxDrawdown(returns),
    winRate: returns.length > 0 ? returns.filter((r) => r > 0).length / returns.length : 0,
    nPeriods: returns.length,
  };
}

/** 관측치 부족·분산 0이면 0 */
export function calcSharpe(returns: readonly number[], annualizationFactor: number): number {
  const s = sharpeRatio(returns, annualizationFactor);
  return Number.isFinite(s) ? s : 0;
}

/** 기하 연환산 수익률 */
function calcAnnualReturn(returns: readonly number[], annualizationFactor: number): number {
  if (returns.length === 0) return 0;
  let growth = 1;
  for (const r of returns) growth *= 1 + r;
  if (growth <= 0) return -1;
  return Math.pow(growth, annualizationFactor / returns.length) - 1;
}

/** 복리 에쿼티 커브 최대 낙폭 (0~1) */
export function calcMaxDrawdown(returns: readonly number[]): number {
  let equity = 1;
  let peak = 1;
  let maxDd = 0;

  for (const r of returns) {
    equity *= 1 + r;
    if (equity > peak) peak = equity;
    const dd = (peak - equity) / peak;
    if (dd > maxDd) maxDd = dd;
  }

  return maxDd;
}
