import { z } from 'zod';
import type { Db } from '../db/database.js';
import type { OrderSide, OrderType } from '../types/index.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';
export type AuditMode = 'PAPER' | 'LIVE';

const auditRowSchema = z.object({
  id: z.number(),
  timestamp: z.number(),
  level: z.string(),
  module: z.string(),
  action: z.string(),
  detail: z.string().nullable(),
  mode: z.string().nullable(),
});
export type AuditRow = z.infer<typeof auditRowSchema>;

const fillRowSchema = z.object({
  id: z.number(),
  order_id: z.string(),
  mode: z.string(),
  side: z.string(),
  type: z.string(),
  qty: z.number(),
  fill_price: z.number(),
  fee: z.number(),
  pnl: z.number().nullable(),
  created_at: z.number(),
});
export type FillRow = z.infer<typeof fillRowSchema>;

export interface FillRecord {
  readonly orderId: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly qty: number;
  readonly fillPrice: number;
  readonly fee: number;
  readonly pnl: number | null;
  readonly ts: number;
}

/**
 * SQLite audit log: 기동/체결/차단/오류 등 중요 이벤트 기록
 * mode는 생성 시 고정 (PAPER/LIVE)
 */
export class AuditLog {
  private readonly db: Db;
  private readonly mode: AuditMode;
  private readonly now: () => number;

  constructor(db: Db, mode: AuditMode, now: () => number = Date.now) {
    this.db = db;
    this.mode = mode;
    this.now = now;
  }

  log(level: AuditLevel, module: string, action: string, detail?: unknown): void {
    const text = detail === undefined ? null : typeof detail === 'string' ? detail : JSON.stringify(detail);
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, mode)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(this.now(), level, module, action, text, this.mode);
  }

  info(module: string, action: string, detail?: unknown): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: string, detail?: unknown): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: string, detail?: unknown): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: string, detail?: unknown): void {
    this.log('CRITICAL', module, action, detail);
  }

  recordFill(fill: FillRecord): void {
    this.db.prepare(`
      INSERT INTO fills (order_id, mode, side, type, qty, fill_price, fee, pnl, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(fill.orderId, this.mode, fill.side, fill.type, fill.qty, fill.fillPrice, fill.fee, fill.pnl, fill.ts);
  }

  getRecent(limit: number = 50): AuditRow[] {
    const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(auditRowSchema).parse(rows);
  }

  getFills(limit: number = 50): FillRow[] {
    const rows = this.db.prepare('SELECT * FROM fills ORDER BY id DESC LIMIT ?').all(limit);
    return z.array(fillRowSchema).parse(rows);
  }
}
