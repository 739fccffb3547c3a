import type { AmountUnit, MarketLimits, OrderReceipt, OrderRequest } from '../types/index.js';
import type { Exchange, PairValidation } from './exchange.js';
import { floorToDecimals } from './exchange.js';
import { OrderError } from '../errors.js';

export interface PaperVenueRules {
  readonly minAmount: number;
  readonly minCost: number;
  readonly amountDecimals: number;
  readonly priceDecimals: number;
}

const PAIR_PATTERN = /^[A-Z0-9]+\/[A-Z0-9]+$/;

/**
 * 페이퍼 거래소: 주문을 보내지 않고 접수증만 만든다
 *
 * venue가 주어지면 마켓 검증/최소 주문/반올림/시장가 매수 단위는 실거래소 규칙을 따르고,
 * 없으면 PAPER_* 설정의 고정 규칙을 쓴다.
 */
export class PaperExchange implements Exchange {
  readonly id: string;
  readonly marketBuyUnit: AmountUnit;

  private readonly rules: PaperVenueRules;
  private readonly venue: Exchange | null;
  private readonly now: () => number;
  private seq = 0;

  constructor(rules: PaperVenueRules, opts: { venue?: Exchange; now?: () => number } = {}) {
    this.rules = rules;
    this.venue = opts.venue ?? null;
    this.now = opts.now ?? Date.now;
    this.id = this.venue ? `paper:${this.venue.id}` : 'paper';
    this.marketBuyUnit = this.venue?.marketBuyUnit ?? 'base';
  }

  async validatePair(pair: string): Promise<PairValidation> {
    if (this.venue) return this.venue.validatePair(pair);
    return PAIR_PATTERN.test(pair)
      ? { ok: true }
      : { ok: false, reason: `Pair ${pair} is not in BASE/QUOTE form` };
  }

  async limits(pair: string): Promise<MarketLimits> {
    if (this.venue) return this.venue.limits(pair);
    return { minAmount: this.rules.minAmount, minCost: this.rules.minCost };
  }

  roundAmount(pair: string, amount: number): number {
    if (this.venue) return this.venue.roundAmount(pair, amount);
    return floorToDecimals(amount, this.rules.amountDecimals);
  }

  roundPrice(pair: string, price: number): number {
    if (this.venue) return this.venue.roundPrice(pair, price);
    return floorToDecimals(price, this.rules.priceDecimals);
  }

  async placeOrder(req: OrderRequest): Promise<OrderReceipt> {
    if (!(req.amount > 0)) throw new OrderError(`paper ${req.side}: amount must be > 0`);
    if (req.type === 'LIMIT' && req.price === undefined) throw new OrderError('Limit order requires price');

    this.seq += 1;
    return {
      orderId: `paper-${req.side.toLowerCase()}-${this.now()}-${this.seq}`,
      side: req.side,
      amount: req.amount,
      amountUnit: req.amountUnit,
      price: req.price ?? null,
      paper: true,
    };
  }
}
