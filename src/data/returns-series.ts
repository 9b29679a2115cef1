import type { DateInput, EquityPoint, ReturnPoint } from '../types/index.js';

const DAY_MS = 86_400_000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * 달력 경계 → Unix ms
 * 'YYYY-MM-DD' 종료 경계는 그날 UTC 23:59:59.999까지 포함
 */
export function toBoundary(input: DateInput, bound: 'start' | 'end'): number {
  if (typeof input === 'number') return input;
  if (input instanceof Date) return input.getTime();
  const ms = Date.parse(input);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid date: ${input}`);
  }
  return bound === 'end' && DATE_ONLY.test(input) ? ms + DAY_MS - 1 : ms;
}

/**
 * 시간 인덱스 기간 수익률 시계열 (불변)
 * 타임스탬프는 엄격히 증가, 중복 없음
 */
export class ReturnsSeries {
  private readonly _timestamps: readonly number[];
  private readonly _values: readonly number[];

  private constructor(timestamps: number[], values: number[]) {
    this._timestamps = Object.freeze(timestamps);
    this._values = Object.freeze(values);
  }

  static fromPoints(points: readonly ReturnPoint[]): ReturnsSeries {
    const timestamps: number[] = [];
    const values: number[] = [];

    for (let i = 0; i < points.length; i++) {
      const p = points[i]!;
      if (!Number.isFinite(p.timestamp)) {
        throw new Error(`Non-finite timestamp at index ${i}: ${p.timestamp}`);
      }
      if (!Number.isFinite(p.value)) {
        throw new Error(`Non-finite return at ${p.timestamp}: ${p.value}`);
      }
      if (i > 0) {
        const prev = points[i - 1]!.timestamp;
        if (p.timestamp === prev) {
          throw new Error(`Duplicate timestamp: ${p.timestamp}`);
        }
        if (p.timestamp < prev) {
          throw new Error(`Timestamps must be strictly increasing: ${prev} → ${p.timestamp}`);
        }
      }
      timestamps.push(p.timestamp);
      values.push(p.value);
    }

    return new ReturnsSeries(timestamps, values);
  }

  static fromArrays(timestamps: readonly number[], values: readonly number[]): ReturnsSeries {
    if (timestamps.length !== values.length) {
      throw new Error(`Length mismatch: ${timestamps.length} timestamps, ${values.length} values`);
    }
    return ReturnsSeries.fromPoints(timestamps.map((timestamp, i) => ({ timestamp, value: values[i]! })));
  }

  /** 에쿼티 커브 → 단순 수익률 (첫 포인트는 기준점이라 수익률 없음) */
  static fromEquityCurve(curve: readonly EquityPoint[]): ReturnsSeries {
    const points: ReturnPoint[] = [];
    for (let i = 1; i < curve.length; i++) {
      const prev = curve[i - 1]!.equity;
      if (prev <= 0) {
        throw new Error(`Non-positive equity at ${curve[i - 1]!.timestamp}: ${prev}`);
      }
      points.push({ timestamp: curve[i]!.timestamp, value: curve[i]!.equity / prev - 1 });
    }
    return ReturnsSeries.fromPoints(points);
  }

  get length(): number {
    return this._values.length;
  }

  get values(): readonly number[] {
    return this._values;
  }

  get timestamps(): readonly number[] {
    return this._timestamps;
  }

  get startTime(): number | null {
    return this._timestamps[0] ?? null;
  }

  get endTime(): number | null {
    return this._timestamps[this._timestamps.length - 1] ?? null;
  }

  at(index: number): ReturnPoint | undefined {
    const value = this._values[index];
    const timestamp = this._timestamps[index];
    if (value === undefined || timestamp === undefined) return undefined;
    return { timestamp, value };
  }

  /** 인덱스 기준 [startIndex, endIndex) */
  slice(startIndex: number, endIndex: number): ReturnsSeries {
    return new ReturnsSeries(
      this._timestamps.slice(startIndex, endIndex),
      this._values.slice(startIndex, endIndex),
    );
  }

  /** 달력 기준 [start, end] (양끝 포함) */
  between(start: DateInput, end: DateInput): ReturnsSeries {
    const from = toBoundary(start, 'start');
    const to = toBoundary(end, 'end');
    let lo = 0;
    while (lo < this._timestamps.length && this._timestamps[lo]! < from) lo++;
    let hi = lo;
    while (hi < this._timestamps.length && this._timestamps[hi]! <= to) hi++;
    return this.slice(lo, hi);
  }
}
