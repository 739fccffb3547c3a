/**
 * 빗썸 REST 호출: URL은 endpoints.ts 상수만 사용
 */

import {
  PUBLIC_MARKET_ALL,
  publicCandlesMinutes,
  PUBLIC_CANDLES_DAYS,
  PUBLIC_TICKER,
  PRIVATE_ORDERS_CHANCE,
  PRIVATE_ORDERS_POST,
  MAX_CANDLE_COUNT,
} from './endpoints.js';
import type { BithumbClient } from './client.js';
import { ensureOk, parseBody, type HttpResponse } from '../../net/http.js';
import { marketAllSchema, candlesSchema, tickerSchema, ordersChanceSchema } from './schemas.js';

/** BTC/KRW → KRW-BTC */
export function toBithumbMarket(pair: string): string {
  const [base, quote] = pair.split('/');
  return `${quote ?? ''}-${base ?? ''}`;
}

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export async function getMarketAll(client: BithumbClient) {
  return client.publicGet(PUBLIC_MARKET_ALL, { isDetails: 'true' }, marketAllSchema);
}

export async function getTicker(client: BithumbClient, market: string) {
  return client.publicGet(PUBLIC_TICKER, { markets: market }, tickerSchema);
}

/** 최신순 배열 (행 검증은 호출부) */
export async function getCandlesDays(client: BithumbClient, market: string, count: number) {
  const n = Math.min(MAX_CANDLE_COUNT, Math.max(1, count));
  return client.publicGet(PUBLIC_CANDLES_DAYS, { market, count: String(n) }, candlesSchema);
}

export async function getCandlesMinutes(client: BithumbClient, unit: number, market: string, count: number) {
  const n = Math.min(MAX_CANDLE_COUNT, Math.max(1, count));
  return client.publicGet(publicCandlesMinutes(unit), { market, count: String(n) }, candlesSchema);
}

// ─── PRIVATE ──────────────────────────────────────────────────────────────

export async function getOrdersChance(client: BithumbClient, market: string) {
  const res = await client.privateRequest(PRIVATE_ORDERS_CHANCE, { method: 'GET', query: { market } });
  ensureOk(PRIVATE_ORDERS_CHANCE, res);
  return parseBody(PRIVATE_ORDERS_CHANCE, res.body, ordersChanceSchema);
}

/**
 * ord_type
 *   price : 시장가 매수, price = 주문 금액(KRW)
 *   market: 시장가 매도, volume = 수량
 *   limit : 지정가, price + volume
 */
export async function placeOrder(
  client: BithumbClient,
  body: { market: string; side: 'bid' | 'ask'; ord_type: 'price' | 'market' | 'limit'; volume?: string; price?: string },
): Promise<HttpResponse> {
  const b: Record<string, string> = {
    market: body.market,
    side: body.side,
    ord_type: body.ord_type,
  };
  if (body.volume != null) b.volume = body.volume;
  if (body.price != null) b.price = body.price;
  return client.privateRequest(PRIVATE_ORDERS_POST, { method: 'POST', body: b });
}
