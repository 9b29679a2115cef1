export type Rng = () => number;

/**
 * 재현 가능한 시드 난수 생성기 (mulberry32)
 * [0, 1) 균등분포
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** [0, n) 정수 */
export function randomInt(rng: Rng, n: number): number {
  return Math.floor(rng() * n);
}

/** Box-Muller 변환 표준정규 난수 */
export function gaussian(rng: Rng): number {
  const u1 = 1 - rng(); // (0, 1], log(0) 방지
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}
