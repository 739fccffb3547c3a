import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { StateFileError } from '../errors.js';
import { writeFileAtomic, nodeFileIo, type FileIo } from '../db/atomic-file.js';
import type { BotState } from '../types/index.js';

/** UTC 기준 YYYY-MM-DD */
export function todayKey(now: number): string {
  return new Date(now).toISOString().slice(0, 10);
}

export function defaultState(now: number): BotState {
  return {
    mode: 'FLAT',
    ref_price: null,
    position_qty: 0,
    realized_pnl: 0,
    cum_fees: 0,
    trades_today: 0,
    last_trade_ts: null,
    equity_start_of_day: 0,
    realized_pnl_today: 0,
    day_key: todayKey(now),
  };
}

// 일부 키만 있는 파일(시드 파일 등)도 허용: 없는 키는 기본값
const stateFileSchema = z.object({
  mode: z.enum(['FLAT', 'LONG']).default('FLAT'),
  ref_price: z.number().nullable().default(null),
  position_qty: z.number().min(0).default(0),
  realized_pnl: z.number().default(0),
  cum_fees: z.number().default(0),
  trades_today: z.number().int().min(0).default(0),
  // 0은 "거래 없음"으로 취급
  last_trade_ts: z
    .number()
    .nullable()
    .default(null)
    .transform((v) => (v === 0 ? null : v)),
  equity_start_of_day: z.number().default(0),
  realized_pnl_today: z.number().default(0),
  day_key: z.string().default(''),
});

/**
 * 날짜가 바뀌었으면 일일 카운터 초기화
 * @returns 롤오버 여부
 */
export function rolloverIfNewDay(state: BotState, now: number): boolean {
  const today = todayKey(now);
  if (state.day_key === today) return false;
  state.trades_today = 0;
  state.realized_pnl_today = 0;
  state.equity_start_of_day = state.realized_pnl;
  state.day_key = today;
  return true;
}

export interface LoadedState {
  readonly state: BotState;
  readonly created: boolean;
  readonly rolledOver: boolean;
}

/**
 * 상태 파일 로드. 없으면 기본값 (에러 아님).
 * 파일이 있는데 깨져 있으면 StateFileError: 원장을 덮어쓰지 않는다.
 */
export function loadState(path: string, now: number): LoadedState {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      return { state: defaultState(now), created: true, rolledOver: false };
    }
    throw new StateFileError(path, 'cannot read state file', { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateFileError(path, 'state file is not valid JSON', { cause: err });
  }

  const parsed = stateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateFileError(path, `state file has invalid fields: ${parsed.error.message}`);
  }

  const state: BotState = { ...parsed.data };
  const rolledOver = rolloverIfNewDay(state, now);
  return { state, created: false, rolledOver };
}

export function saveState(path: string, state: BotState, io: FileIo = nodeFileIo): void {
  writeFileAtomic(path, JSON.stringify(state, null, 2), io);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
