import type { Logger } from '../logger.js';
import type { BotState } from '../types/index.js';
import type { PriceFeed } from '../market/price-feed.js';
import { defaultState, saveState } from '../ledger/state-store.js';
import type { FileIo } from '../db/atomic-file.js';

/**
 * 현재가를 기준가로 하는 새 FLAT 상태를 기록 (기존 상태 파일은 교체)
 * 첫 진입 트리거를 "지금 가격 - k·ATR"로 잡고 싶을 때 사용
 */
export async function seedRefPrice(
  feed: PriceFeed,
  stateFile: string,
  deps: { now: number; log: Logger; io?: FileIo },
): Promise<BotState> {
  const price = await feed.lastPrice();
  const state: BotState = { ...defaultState(deps.now), ref_price: price };
  saveState(stateFile, state, deps.io);
  deps.log.info({ state_file: stateFile, ref_price: price }, 'seed_ref_price');
  return state;
}
