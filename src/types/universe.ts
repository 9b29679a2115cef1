export type BaselineKind = 'buy-and-hold' | 'equal-weight' | 'risk-parity';

/**
 * 베이스라인 계산용 유니버스 스냅샷
 * closes/marketCaps의 각 배열은 timestamps와 같은 길이 (결측은 NaN)
 */
export interface UniverseSnapshot {
  readonly benchmark: string;
  readonly timestamps: readonly number[];
  readonly closes: Readonly<Record<string, readonly number[]>>;
  readonly marketCaps?: Readonly<Record<string, readonly number[]>>;
}
