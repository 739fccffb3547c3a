import type { AmountUnit, MarketLimits, OrderRequest, OrderSide, OrderType } from '../types/index.js';
import type { SizingMode } from '../config.js';
import type { Exchange } from './exchange.js';

export interface SizingPolicy {
  readonly mode: SizingMode;
  readonly notional: number;
  readonly quantity: number;
  readonly roundToStep: boolean;
  readonly orderType: OrderType;
  readonly limitSlippageBps: number;
  readonly minOrderAmountCheck: boolean;
  readonly minOrderNotionalCheck: boolean;
}

export interface SizingInput {
  readonly pair: string;
  readonly lastPrice: number;
  readonly limits: MarketLimits;
  /** 매도 시 청산할 보유 수량 */
  readonly positionQty: number;
}

export type SizingDecision =
  | {
      readonly kind: 'order';
      readonly request: OrderRequest;
      readonly estCost: number;
      /** 회계용 체결가: 시장가는 현재가, 지정가는 지정가격 */
      readonly fillPrice: number;
    }
  | {
      readonly kind: 'skip';
      readonly reason: 'zero amount' | 'below min amount' | 'below min cost';
      readonly amount: number;
      readonly amountUnit: AmountUnit;
      readonly estCost: number;
    };

export interface SizingAdapter {
  readonly unit: AmountUnit;
  sizeBuy(input: SizingInput): SizingDecision;
  sizeSell(input: SizingInput): SizingDecision;
}

/**
 * 기초자산 수량으로 주문하는 일반 경로
 */
class BaseQuantitySizing implements SizingAdapter {
  readonly unit: AmountUnit = 'base';
  protected readonly policy: SizingPolicy;
  protected readonly exchange: Exchange;

  constructor(policy: SizingPolicy, exchange: Exchange) {
    this.policy = policy;
    this.exchange = exchange;
  }

  sizeBuy(input: SizingInput): SizingDecision {
    return this.decide('BUY', input, this.buyQuantity(input), 'base');
  }

  /** 전량 청산. 보유 수량이 0이면 (복구 상황) 매수 기준 수량 */
  sizeSell(input: SizingInput): SizingDecision {
    const raw = input.positionQty > 0 ? input.positionQty : this.rawBuyQuantity(input.lastPrice);
    const qty = this.policy.roundToStep ? this.exchange.roundAmount(input.pair, raw) : raw;
    return this.decide('SELL', input, qty, 'base');
  }

  protected rawBuyQuantity(lastPrice: number): number {
    if (this.policy.mode === 'quantity') return this.policy.quantity;
    return lastPrice > 0 ? this.policy.notional / lastPrice : 0;
  }

  protected buyQuantity(input: SizingInput): number {
    const raw = this.rawBuyQuantity(input.lastPrice);
    return this.policy.roundToStep ? this.exchange.roundAmount(input.pair, raw) : raw;
  }

  protected decide(side: OrderSide, input: SizingInput, amount: number, unit: AmountUnit): SizingDecision {
    const estCost = unit === 'quote' ? amount : amount * input.lastPrice;
    const skip = (reason: 'zero amount' | 'below min amount' | 'below min cost'): SizingDecision => ({
      kind: 'skip',
      reason,
      amount,
      amountUnit: unit,
      estCost,
    });

    if (!(amount > 0)) return skip('zero amount');
    // 금액 지정 주문은 수량 최소값 검사를 건너뛴다
    if (this.policy.minOrderAmountCheck && unit === 'base' && amount < input.limits.minAmount) {
      return skip('below min amount');
    }
    if (this.policy.minOrderNotionalCheck && input.limits.minCost > 0 && estCost < input.limits.minCost) {
      return skip('below min cost');
    }

    const limitPrice = this.policy.orderType === 'LIMIT' ? this.limitPrice(side, input) : undefined;
    return {
      kind: 'order',
      request: {
        pair: input.pair,
        side,
        type: this.policy.orderType,
        amount,
        amountUnit: unit,
        ...(limitPrice !== undefined ? { price: limitPrice } : {}),
      },
      estCost,
      fillPrice: limitPrice ?? input.lastPrice,
    };
  }

  /** 매수는 현재가 아래, 매도는 위로 bps만큼 */
  private limitPrice(side: OrderSide, input: SizingInput): number {
    const bps = this.policy.limitSlippageBps / 10_000;
    const raw = side === 'BUY' ? input.lastPrice * (1 - bps) : input.lastPrice * (1 + bps);
    return this.exchange.roundPrice(input.pair, raw);
  }
}

/**
 * 시장가 매수를 주문 금액으로 받는 거래소 (빗썸 ord_type=price)
 * notional 모드는 설정 금액 그대로, quantity 모드는 반올림 수량 × 현재가
 */
class QuoteCostSizing extends BaseQuantitySizing {
  override readonly unit: AmountUnit = 'quote';

  override sizeBuy(input: SizingInput): SizingDecision {
    const cost = this.policy.mode === 'notional'
      ? this.policy.notional
      : this.buyQuantity(input) * input.lastPrice;
    return this.decide('BUY', input, cost, 'quote');
  }
}

const SIZING_ADAPTERS: Record<AmountUnit, new (policy: SizingPolicy, exchange: Exchange) => SizingAdapter> = {
  base: BaseQuantitySizing,
  quote: QuoteCostSizing,
};

/**
 * 기동 시 한 번 결정. 지정가 주문은 항상 수량 기준.
 */
export function resolveSizingAdapter(exchange: Exchange, policy: SizingPolicy): SizingAdapter {
  const unit: AmountUnit = policy.orderType === 'LIMIT' ? 'base' : exchange.marketBuyUnit;
  const Adapter = SIZING_ADAPTERS[unit];
  return new Adapter(policy, exchange);
}
