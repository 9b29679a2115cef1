import type { ReturnsSeries } from './returns-series.js';

export interface IndexRange {
  readonly start: number;   // 포함
  readonly end: number;     // 미포함
}

export interface WalkForwardSlice {
  readonly windowIndex: number;
  readonly trainRange: IndexRange;
  readonly testRange: IndexRange;
  readonly train: ReturnsSeries;
  readonly test: ReturnsSeries;
}

/**
 * 워크포워드 윈도우 인덱스 계산
 * 다음 윈도우는 직전 test 구간이 끝난 지점에서 시작 (윈도우 간 겹침 없음)
 * test 구간이 시계열을 넘는 윈도우는 만들지 않음
 */
export function walkForwardRanges(
  length: number,
  trainBars: number,
  testBars: number,
): Array<{ trainRange: IndexRange; testRange: IndexRange }> {
  if (!Number.isInteger(trainBars) || trainBars <= 0) {
    throw new RangeError(`trainBars must be a positive integer, got ${trainBars}`);
  }
  if (!Number.isInteger(testBars) || testBars <= 0) {
    throw new RangeError(`testBars must be a positive integer, got ${testBars}`);
  }

  const ranges: Array<{ trainRange: IndexRange; testRange: IndexRange }> = [];
  let position = 0;

  while (position + trainBars + testBars <= length) {
    const trainEnd = position + trainBars;
    const testEnd = trainEnd + testBars;
    ranges.push({
      trainRange: { start: position, end: trainEnd },
      testRange: { start: trainEnd, end: testEnd },
    });
    position = testEnd;
  }

  return ranges;
}

/**
 * 워크포워드 분할
 * @param trainBars - 학습 기간 봉 수
 * @param testBars  - 테스트 기간 봉 수
 */
export function walkForwardSplit(
  series: ReturnsSeries,
  trainBars: number,
  testBars: number,
): WalkForwardSlice[] {
  return walkForwardRanges(series.length, trainBars, testBars).map((r, windowIndex) => ({
    windowIndex,
    trainRange: r.trainRange,
    testRange: r.testRange,
    train: series.slice(r.trainRange.start, r.trainRange.end),
    test: series.slice(r.testRange.start, r.testRange.end),
  }));
}
