import { ReturnsSeries } from '../src/data/returns-series.js';
import { createRng, gaussian } from '../src/stats/random.js';

export const DAY = 86_400_000;
export const AF = 252;

export function utc(date: string): number {
  return Date.parse(date);
}

export function dailyTimestamps(n: number, start: string = '2018-01-01'): number[] {
  const t0 = utc(start);
  return Array.from({ length: n }, (_, i) => t0 + i * DAY);
}

/** +1, -1, +1, ... */
export function alternating(n: number): number[] {
  return Array.from({ length: n }, (_, i) => (i % 2 === 0 ? 1 : -1));
}

export function gaussianPattern(n: number, seed: number): number[] {
  const rng = createRng(seed);
  return Array.from({ length: n }, () => gaussian(rng));
}

/**
 * 패턴을 표본평균 0, 표본표준편차 1로 맞춘 뒤
 * 연환산 샤프가 정확히 sharpe가 되도록 변환
 */
export function withSharpe(pattern: readonly number[], sharpe: number, vol: number = 0.01): number[] {
  const n = pattern.length;
  const m = pattern.reduce((s, v) => s + v, 0) / n;
  const sd = Math.sqrt(pattern.reduce((s, v) => s + (v - m) ** 2, 0) / (n - 1));
  return pattern.map((v) => vol * ((v - m) / sd + sharpe / Math.sqrt(AF)));
}

export function makeSeries(values: readonly number[], start: string = '2018-01-01'): ReturnsSeries {
  return ReturnsSeries.fromArrays(dailyTimestamps(values.length, start), values);
}

/** 일별 시계열, 각 달력 구간이 지정 샤프를 가짐 */
export function seriesByPeriods(
  segments: ReadonlyArray<{ start: string; end: string; sharpe: number }>,
  pattern: (n: number) => number[] = alternating,
): ReturnsSeries {
  const timestamps: number[] = [];
  const values: number[] = [];
  for (const seg of segments) {
    const n = Math.round((utc(seg.end) - utc(seg.start)) / DAY) + 1;
    timestamps.push(...dailyTimestamps(n, seg.start));
    values.push(...withSharpe(pattern(n), seg.sharpe));
  }
  return ReturnsSeries.fromArrays(timestamps, values);
}

export const STANDARD_PERIODS = (sharpes: readonly [number, number, number]) => [
  { start: '2018-01-01', end: '2020-12-31', sharpe: sharpes[0] },
  { start: '2021-01-01', end: '2022-12-31', sharpe: sharpes[1] },
  { start: '2023-01-01', end: '2024-12-31', sharpe: sharpes[2] },
];

/** 수익률 → 종가 (시작 100) */
export function closesFromReturns(returns: readonly number[], start: number = 100): number[] {
  const closes = [start];
  for (const r of returns) closes.push(closes[closes.length - 1]! * (1 + r));
  return closes;
}
