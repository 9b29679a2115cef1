import { z } from 'zod';

// ─── 캐시 레코드 ───────────────────────────────────────────────────────────

export const performanceMetricsSchema = z.object({
  sharpeRatio: z.number(),
  annualReturn: z.number(),
  maxDrawdown: z.number(),
  winRate: z.number(),
  nPeriods: z.number().int().nonnegative(),
});

// ─── 배치 매니페스트 ───────────────────────────────────────────────────────

export const candidateEntrySchema = z.object({
  id: z.string().min(1),
  /** 매니페스트 파일 기준 상대 경로 */
  path: z.string().min(1),
  kind: z.enum(['returns', 'equity']).default('returns'),
  params: z.record(z.unknown()).optional(),
});

export const universeEntrySchema = z.object({
  closes: z.string().min(1),
  marketCaps: z.string().min(1).optional(),
  benchmark: z.string().min(1).optional(),
});

export const batchManifestSchema = z.object({
  candidates: z.array(candidateEntrySchema).min(1),
  universe: universeEntrySchema.optional(),
  /** 미지정 시 후보 수 */
  familySize: z.number().int().positive().optional(),
  strict: z.boolean().optional(),
});

export type BatchManifest = z.infer<typeof batchManifestSchema>;

// ─── CLI 숫자 옵션 ─────────────────────────────────────────────────────────

export const positiveIntArg = z.coerce.number().int().positive();
export const probabilityArg = z.coerce.number().gt(0).lt(1);
