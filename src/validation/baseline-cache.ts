import { createHash } from 'node:crypto';
import type Database from 'better-sqlite3';
import type { BaselineKind, CalendarPeriod, PerformanceMetrics, UniverseSnapshot } from '../types/index.js';
import { createChildLogger } from '../logger.js';
import { performanceMetricsSchema } from '../data/schemas.js';

const log = createChildLogger('baseline-cache');

export interface BaselineCacheStore {
  get(key: string): PerformanceMetrics | undefined;
  set(key: string, fingerprint: string, metrics: PerformanceMetrics): void;
  /** fingerprint가 다른 항목 삭제, 삭제 수 반환 */
  invalidateExcept(fingerprint: string): number;
  size(): number;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly computations: number;
  readonly invalidations: number;
}

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/** 유니버스 내용 해시 (심볼 정렬 후 직렬화) */
export function universeFingerprint(universe: UniverseSnapshot): string {
  const symbols = Object.keys(universe.closes).sort();
  const caps = universe.marketCaps;
  return sha256(JSON.stringify({
    benchmark: universe.benchmark,
    timestamps: universe.timestamps,
    closes: symbols.map((s) => [s, universe.closes[s]]),
    marketCaps: caps ? Object.keys(caps).sort().map((s) => [s, caps[s]]) : null,
  }));
}

export function cacheKey(baseline: BaselineKind, period: CalendarPeriod, fingerprint: string): string {
  return sha256(JSON.stringify({
    baseline,
    period: { start: period.start, end: period.end },
    universe: fingerprint,
  }));
}

export class MemoryBaselineCache implements BaselineCacheStore {
  private readonly entries = new Map<string, { fingerprint: string; metrics: PerformanceMetrics }>();

  get(key: string): PerformanceMetrics | undefined {
    return this.entries.get(key)?.metrics;
  }

  set(key: string, fingerprint: string, metrics: PerformanceMetrics): void {
    this.entries.set(key, { fingerprint, metrics });
  }

  invalidateExcept(fingerprint: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.fingerprint !== fingerprint) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }
}

/** better-sqlite3 기반 영속 캐시 (프로세스 간 공유 가능) */
export class SqliteBaselineCache implements BaselineCacheStore {
  private readonly selectStmt: Database.Statement<[string], { metrics: string }>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly countStmt: Database.Statement<[], { n: number }>;

  constructor(db: Database.Database) {
    this.selectStmt = db.prepare<[string], { metrics: string }>('SELECT metrics FROM baseline_cache WHERE cache_key = ?');
    this.upsertStmt = db.prepare<[string, string, string]>(
      'INSERT OR REPLACE INTO baseline_cache (cache_key, fingerprint, metrics) VALUES (?, ?, ?)',
    );
    this.deleteStmt = db.prepare<[string]>('DELETE FROM baseline_cache WHERE fingerprint != ?');
    this.countStmt = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM baseline_cache');
  }

  get(key: string): PerformanceMetrics | undefined {
    const row = this.selectStmt.get(key);
    if (!row) return undefined;
    const parsed = performanceMetricsSchema.safeParse(JSON.parse(row.metrics));
    if (parsed.success) return parsed.data;
    log.warn({ key, error: parsed.error.message }, 'Corrupt cache entry ignored');
    return undefined;
  }

  set(key: string, fingerprint: string, metrics: PerformanceMetrics): void {
    this.upsertStmt.run(key, fingerprint, JSON.stringify(metrics));
  }

  invalidateExcept(fingerprint: string): number {
    return this.deleteStmt.run(fingerprint).changes;
  }

  size(): number {
    return this.countStmt.get()?.n ?? 0;
  }
}

/**
 * 베이스라인 지표 캐시
 * 키 = sha256(baseline, period, universe fingerprint). 새 fingerprint를 보면 이전 항목 무효화
 */
export class BaselineCache {
  private readonly store: BaselineCacheStore;
  private currentFingerprint: string | null = null;
  private hits = 0;
  private misses = 0;
  private computations = 0;
  private invalidations = 0;

  constructor(store: BaselineCacheStore = new MemoryBaselineCache()) {
    this.store = store;
  }

  getOrCompute(
    baseline: BaselineKind,
    period: CalendarPeriod,
    fingerprint: string,
    compute: () => PerformanceMetrics,
  ): PerformanceMetrics {
    if (this.currentFingerprint !== fingerprint) {
      if (this.currentFingerprint !== null) {
        const removed = this.store.invalidateExcept(fingerprint);
        this.invalidations += removed;
        log.info({ removed }, 'Universe changed, baseline cache invalidated');
      }
      this.currentFingerprint = fingerprint;
    }

    const key = cacheKey(baseline, period, fingerprint);
    const cached = this.store.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const metrics = compute();
    this.computations++;
    this.store.set(key, fingerprint, metrics);
    return metrics;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      computations: this.computations,
      invalidations: this.invalidations,
    };
  }

  size(): number {
    return this.store.size();
  }
}
