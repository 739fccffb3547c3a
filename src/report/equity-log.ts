import { appendFileSync, mkdirSync, statSync } from 'node:fs';
import path from 'node:path';

export const EQUITY_HEADER = 'ts_ms,realized_pnl,cum_fees,position_qty';

export interface EquityPoint {
  readonly ts: number;            // Unix ms
  readonly realizedPnl: number;
  readonly cumFees: number;
  readonly positionQty: number;
}

/**
 * 에쿼티 커브 CSV (append-only)
 * 헤더는 파일이 없거나 비어 있을 때 한 번만
 */
export class EquityLog {
  readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  append(point: EquityPoint): void {
    const isNew = (statSync(this.file, { throwIfNoEntry: false })?.size ?? 0) === 0;
    if (isNew) mkdirSync(path.dirname(this.file), { recursive: true });
    const row = `${point.ts},${point.realizedPnl},${point.cumFees},${point.positionQty}\n`;
    appendFileSync(this.file, isNew ? `${EQUITY_HEADER}\n${row}` : row, 'utf8');
  }
}
