import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { UniverseSnapshot } from '../types/index.js';
import type { StrategyCandidate } from '../validation/orchestrator.js';
import { loadReturnsCsv, loadUniverseCsv } from './csv-loader.js';
import { batchManifestSchema } from './schemas.js';

export interface LoadedBatch {
  readonly candidates: StrategyCandidate[];
  readonly universe?: UniverseSnapshot;
  readonly familySize: number;
  readonly strict?: boolean;
}

/**
 * 배치 매니페스트(JSON) 로드
 * 경로는 매니페스트 파일 위치 기준
 */
export function loadBatchManifest(manifestPath: string): LoadedBatch {
  const raw: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
  const result = batchManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid batch manifest ${manifestPath}: ${result.error.message}`);
  }
  const manifest = result.data;
  const baseDir = path.dirname(manifestPath);
  const resolve = (p: string): string => path.resolve(baseDir, p);

  const ids = new Set<string>();
  for (const c of manifest.candidates) {
    if (ids.has(c.id)) throw new Error(`Duplicate candidate id: ${c.id}`);
    ids.add(c.id);
  }

  const candidates: StrategyCandidate[] = manifest.candidates.map((c) => ({
    strategyId: c.id,
    report: loadReturnsCsv(resolve(c.path), { kind: c.kind }),
    ...(c.params ? { params: c.params } : {}),
  }));

  const u = manifest.universe;
  const universe = u
    ? loadUniverseCsv(resolve(u.closes), {
        ...(u.benchmark ? { benchmark: u.benchmark } : {}),
        ...(u.marketCaps ? { marketCapsPath: resolve(u.marketCaps) } : {}),
      })
    : undefined;

  return {
    candidates,
    ...(universe ? { universe } : {}),
    familySize: manifest.familySize ?? candidates.length,
    ...(manifest.strict !== undefined ? { strict: manifest.strict } : {}),
  };
}
