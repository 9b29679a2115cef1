/** 표준편차가 이 값 이하면 0으로 간주 (부동소수점 잔차) */
const ZERO_VARIANCE_EPS = 1e-12;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** 표본 표준편차 (ddof=1) */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) ** 2;
  return Math.sqrt(ss / (values.length - 1));
}

/**
 * 선형 보간 백분위수
 * @param sorted 오름차순 정렬된 값
 * @param p 0~100
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN;
  const idx = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo]!;
  const frac = idx - lo;
  return sorted[lo]! * (1 - frac) + sorted[hi]! * frac;
}

export function median(values: readonly number[]): number {
  return percentile([...values].sort((a, b) => a - b), 50);
}

/**
 * 연환산 샤프 비율 (무위험수익률 0)
 * 관측치 2개 미만이거나 분산 0이면 NaN (호출부에서 처리)
 */
export function sharpeRatio(values: readonly number[], annualizationFactor: number): number {
  if (values.length < 2) return NaN;
  const std = sampleStd(values);
  if (!(std > ZERO_VARIANCE_EPS)) return NaN;
  return (mean(values) / std) * Math.sqrt(annualizationFactor);
}
