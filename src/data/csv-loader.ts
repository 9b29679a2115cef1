import { readFileSync } from 'node:fs';
import type { ReturnPoint, UniverseSnapshot } from '../types/index.js';
import { ReturnsSeries } from './returns-series.js';

export type SeriesKind = 'returns' | 'equity';

export interface CsvLoaderOptions {
  readonly kind?: SeriesKind;
  readonly timestampCol?: string;
  /** 미지정 시 kind에 따라 'return' 또는 'equity' */
  readonly valueCol?: string;
}

export interface UniverseLoaderOptions {
  readonly timestampCol?: string;
  readonly benchmark?: string;
  /** 같은 형식(timestamp,SYM...)의 시가총액 CSV */
  readonly marketCapsPath?: string;
}

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]!;
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

function parseTimestamp(value: string): number {
  const num = Number(value);
  if (value !== '' && !Number.isNaN(num)) {
    // seconds → ms 변환 (10자리 이하면 초 단위로 간주)
    return value.length <= 10 ? num * 1000 : num;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return ms;
}

function parseNumber(value: string | undefined, lineNum: number, col: string): number {
  if (value === undefined || value === '') {
    throw new Error(`Line ${lineNum}: missing value for "${col}"`);
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`Line ${lineNum}: non-numeric ${col} "${value}"`);
  }
  return n;
}

interface CsvTable {
  readonly header: string[];
  readonly rows: Array<{ lineNum: number; fields: string[] }>;
}

function readTable(filePath: string): CsvTable {
  const raw = readFileSync(filePath, 'utf-8');
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);

  if (lines.length < 2) {
    throw new Error('CSV must have header + at least 1 data row');
  }

  return {
    header: parseCsvLine(lines[0]!),
    rows: lines.slice(1).map((line, i) => ({ lineNum: i + 2, fields: parseCsvLine(line) })),
  };
}

function columnIndex(header: string[], name: string): number {
  const idx = header.indexOf(name);
  if (idx === -1) {
    throw new Error(`Column "${name}" not found. Available: ${header.join(', ')}`);
  }
  return idx;
}

function assertNoDuplicates(sortedTimestamps: readonly number[]): void {
  for (let i = 1; i < sortedTimestamps.length; i++) {
    if (sortedTimestamps[i] === sortedTimestamps[i - 1]) {
      throw new Error(`Duplicate timestamp: ${sortedTimestamps[i]}`);
    }
  }
}

/**
 * 수익률 또는 에쿼티 CSV → ReturnsSeries
 * 에쿼티면 단순 수익률로 변환 (첫 행은 기준점)
 */
export function loadReturnsCsv(filePath: string, options?: CsvLoaderOptions): ReturnsSeries {
  const kind = options?.kind ?? 'returns';
  const timestampCol = options?.timestampCol ?? 'timestamp';
  const valueCol = options?.valueCol ?? (kind === 'equity' ? 'equity' : 'return');

  const { header, rows } = readTable(filePath);
  const ti = columnIndex(header, timestampCol);
  const vi = columnIndex(header, valueCol);

  const points: ReturnPoint[] = rows.map(({ lineNum, fields }) => ({
    timestamp: parseTimestamp(fields[ti] ?? ''),
    value: parseNumber(fields[vi], lineNum, valueCol),
  }));

  // 시간순 정렬
  points.sort((a, b) => a.timestamp - b.timestamp);
  assertNoDuplicates(points.map((p) => p.timestamp));

  if (kind === 'equity') {
    return ReturnsSeries.fromEquityCurve(points.map((p) => ({ timestamp: p.timestamp, equity: p.value })));
  }
  return ReturnsSeries.fromPoints(points);
}

interface WideTable {
  readonly timestamps: number[];
  readonly columns: Record<string, number[]>;
}

/** timestamp,SYM1,SYM2,... 형식. 빈 칸은 NaN (결측) */
function loadWideCsv(filePath: string, timestampCol: string): WideTable {
  const { header, rows } = readTable(filePath);
  const ti = columnIndex(header, timestampCol);
  const symbols = header.filter((_, i) => i !== ti);

  const parsed = rows.map(({ lineNum, fields }) => ({
    timestamp: parseTimestamp(fields[ti] ?? ''),
    values: header.map((col, i) => {
      const v = fields[i];
      return v === undefined || v === '' ? NaN : parseNumber(v, lineNum, col);
    }),
  }));

  parsed.sort((a, b) => a.timestamp - b.timestamp);
  const timestamps = parsed.map((r) => r.timestamp);
  assertNoDuplicates(timestamps);

  const columns: Record<string, number[]> = {};
  for (const symbol of symbols) {
    const ci = header.indexOf(symbol);
    columns[symbol] = parsed.map((r) => r.values[ci] ?? NaN);
  }

  return { timestamps, columns };
}

/**
 * 와이드 종가 CSV → 유니버스 스냅샷
 */
export function loadUniverseCsv(filePath: string, options?: UniverseLoaderOptions): UniverseSnapshot {
  const timestampCol = options?.timestampCol ?? 'timestamp';
  const closes = loadWideCsv(filePath, timestampCol);

  let marketCaps: Record<string, number[]> | undefined;
  if (options?.marketCapsPath) {
    const caps = loadWideCsv(options.marketCapsPath, timestampCol);
    if (caps.timestamps.length !== closes.timestamps.length ||
        caps.timestamps.some((t, i) => t !== closes.timestamps[i])) {
      throw new Error('Market cap timestamps do not match close timestamps');
    }
    marketCaps = caps.columns;
  }

  return {
    benchmark: options?.benchmark ?? 'INDEX',
    timestamps: closes.timestamps,
    closes: closes.columns,
    ...(marketCaps ? { marketCaps } : {}),
  };
}
