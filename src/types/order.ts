export type OrderSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT';

/**
 * 주문 수량 단위
 * base  = 기초자산 수량 (BTC)
 * quote = 호가자산 금액 (KRW): 금액 지정 시장가 매수 거래소용
 */
export type AmountUnit = 'base' | 'quote';

export interface OrderRequest {
  readonly pair: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly amount: number;
  readonly amountUnit: AmountUnit;
  readonly price?: number;       // LIMIT만
}

export interface OrderReceipt {
  readonly orderId: string;
  readonly side: OrderSide;
  readonly amount: number;
  readonly amountUnit: AmountUnit;
  readonly price: number | null;
  readonly paper: boolean;
}

export interface MarketLimits {
  readonly minAmount: number;    // 최소 수량 (base)
  readonly minCost: number;      // 최소 주문 금액 (quote), 0이면 제한 없음
}
