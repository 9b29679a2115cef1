import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

/** 설정된 캐시 경로의 공유 커넥션 (BASELINE_CACHE_PATH) */
export function getDb(): Database.Database {
  if (!_db) {
    if (!config.baseline.cachePath) {
      throw new Error('BASELINE_CACHE_PATH is not set');
    }
    _db = openDb(config.baseline.cachePath);
  }
  return _db;
}

export function openDb(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  log.info({ path }, 'Database initialized');
  return db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS baseline_cache (
      cache_key    TEXT PRIMARY KEY,
      fingerprint  TEXT NOT NULL,
      metrics      TEXT NOT NULL,
      created_at   INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000)
    );

    CREATE INDEX IF NOT EXISTS idx_baseline_fingerprint ON baseline_cache(fingerprint);
  `);
}
