import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '../logger.js';

export type Db = Database.Database;

/**
 * SQLite 열기 + 스키마 보장
 * ':memory:'는 테스트용 (디렉터리 생성 생략)
 */
export function openDatabase(file: string, log?: Logger): Db {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }
  const db = new Database(file);
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  initSchema(db);
  log?.info({ path: file }, 'Database initialized');
  return db;
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      mode       TEXT
    );

    CREATE TABLE IF NOT EXISTS fills (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      order_id    TEXT NOT NULL,
      mode        TEXT NOT NULL,
      side        TEXT NOT NULL,
      type        TEXT NOT NULL,
      qty         REAL NOT NULL,
      fill_price  REAL NOT NULL,
      fee         REAL NOT NULL,
      pnl         REAL,
      created_at  INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_fills_ts ON fills(created_at);
  `);
}
