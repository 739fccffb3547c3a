import type { AmountUnit, MarketLimits, OrderReceipt, OrderRequest } from '../types/index.js';

export type PairValidation =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * 거래소 기능 경계
 * marketBuyUnit: 시장가 매수 주문 수량을 어떤 단위로 받는지
 *   'base' : 기초자산 수량
 *   'quote': 주문 금액 (빗썸 ord_type=price 등)
 */
export interface Exchange {
  readonly id: string;
  readonly marketBuyUnit: AmountUnit;
  validatePair(pair: string): Promise<PairValidation>;
  limits(pair: string): Promise<MarketLimits>;
  roundAmount(pair: string, amount: number): number;
  roundPrice(pair: string, price: number): number;
  /** 실패 시 OrderError */
  placeOrder(req: OrderRequest): Promise<OrderReceipt>;
}

/** 소수점 n자리 내림 (수량이 잔고를 넘지 않도록) */
export function floorToDecimals(value: number, decimals: number): number {
  const f = Math.pow(10, decimals);
  return Math.floor(value * f + 1e-9) / f;
}

/** 호가 단위 배수로 내림 */
export function floorToStep(value: number, step: number): number {
  if (!(step > 0)) return value;
  return Math.floor(value / step + 1e-9) * step;
}
