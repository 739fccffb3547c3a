import type { Logger } from '../logger.js';
import type { MarketLimits, OrderReceipt, OrderRequest } from '../types/index.js';
import type { Exchange, PairValidation } from './exchange.js';
import { floorToDecimals, floorToStep } from './exchange.js';
import { OrderError } from '../errors.js';
import { RateLimiter } from './rate-limiter.js';
import { describeErrorBody, type BithumbClient } from '../exchange/bithumb/client.js';
import { orderPlacedSchema } from '../exchange/bithumb/schemas.js';
import * as bithumb from '../exchange/bithumb/rest.js';
import { withRetry, type RetryPolicy, type Sleep } from '../net/retry.js';

/** 키 없이 최소 주문 금액을 못 받을 때 쓰는 값 (KRW) */
export const BITHUMB_DEFAULT_MIN_TOTAL = 5000;
const AMOUNT_DECIMALS = 8;

/**
 * 빗썸 v1 거래소 어댑터
 *
 *   시장가 매수: ord_type=price, 주문 금액(KRW) 지정 → marketBuyUnit = 'quote'
 *   시장가 매도: ord_type=market, 수량 지정
 *   지정가    : ord_type=limit, 가격 + 수량
 *
 * 주문 POST는 재시도하지 않는다 (중복 주문 방지). 메타데이터 조회만 RetryPolicy 적용.
 */
export class BithumbExchange implements Exchange {
  readonly id = 'bithumb';
  readonly marketBuyUnit = 'quote' as const;

  private readonly client: BithumbClient;
  private readonly limiter: RateLimiter;
  private readonly retry: RetryPolicy;
  private readonly log: Logger;
  private readonly sleep: Sleep | undefined;
  /** 마켓별 호가 단위 (orders/chance에서 받음) */
  private readonly priceUnits = new Map<string, number>();

  constructor(
    client: BithumbClient,
    deps: { retry: RetryPolicy; log: Logger; limiter?: RateLimiter; sleep?: Sleep },
  ) {
    this.client = client;
    this.retry = deps.retry;
    this.log = deps.log;
    this.limiter = deps.limiter ?? new RateLimiter(10);
    this.sleep = deps.sleep;
  }

  async validatePair(pair: string): Promise<PairValidation> {
    const market = bithumb.toBithumbMarket(pair);
    const markets = await withRetry(this.retry, 'bithumb.marketAll', () => bithumb.getMarketAll(this.client), {
      log: this.log,
      sleep: this.sleep,
    });
    const found = markets.find((m) => m.market === market);
    if (!found) {
      const sample = markets.slice(0, 5).map((m) => m.market);
      return { ok: false, reason: `Pair ${pair} (${market}) not found on bithumb. Examples: ${sample.join(', ')}` };
    }
    if (found.market_warning && found.market_warning !== 'NONE') {
      this.log.warn({ market, warning: found.market_warning }, 'Market has an investment warning');
    }
    return { ok: true };
  }

  async limits(pair: string): Promise<MarketLimits> {
    const market = bithumb.toBithumbMarket(pair);
    if (!this.client.hasCredentials) {
      return { minAmount: 0, minCost: BITHUMB_DEFAULT_MIN_TOTAL };
    }
    await this.limiter.acquire();
    const chance = await withRetry(this.retry, 'bithumb.ordersChance', () => bithumb.getOrdersChance(this.client, market), {
      log: this.log,
      sleep: this.sleep,
    });
    const bid = chance.market.bid;
    const unit = Number(bid?.price_unit ?? NaN);
    if (Number.isFinite(unit) && unit > 0) this.priceUnits.set(market, unit);
    const minTotal = Number(bid?.min_total ?? BITHUMB_DEFAULT_MIN_TOTAL);
    return { minAmount: 0, minCost: Number.isFinite(minTotal) ? minTotal : BITHUMB_DEFAULT_MIN_TOTAL };
  }

  roundAmount(_pair: string, amount: number): number {
    return floorToDecimals(amount, AMOUNT_DECIMALS);
  }

  roundPrice(pair: string, price: number): number {
    const unit = this.priceUnits.get(bithumb.toBithumbMarket(pair));
    return unit !== undefined ? floorToStep(price, unit) : Math.floor(price);
  }

  async placeOrder(req: OrderRequest): Promise<OrderReceipt> {
    const market = bithumb.toBithumbMarket(req.pair);
    const body = this.toOrderBody(market, req);

    await this.limiter.acquire();
    const res = await bithumb.placeOrder(this.client, body);
    if (res.status < 200 || res.status >= 300) {
      const reason = describeErrorBody(res.body);
      this.log.warn({ status: res.status, reason, market, side: req.side }, 'Order rejected');
      throw new OrderError(`bithumb rejected ${req.side} ${req.type}: ${reason}`);
    }
    const placed = orderPlacedSchema.safeParse(res.body);
    if (!placed.success) {
      throw new OrderError(`bithumb order response without uuid: ${describeErrorBody(res.body)}`);
    }

    this.log.info({ orderId: placed.data.uuid, market, side: req.side, ordType: body.ord_type }, 'Order placed');
    return {
      orderId: placed.data.uuid,
      side: req.side,
      amount: Number(body.price !== undefined && body.ord_type === 'price' ? body.price : req.amount),
      amountUnit: req.amountUnit,
      price: req.price ?? null,
      paper: false,
    };
  }

  private toOrderBody(market: string, req: OrderRequest): Parameters<typeof bithumb.placeOrder>[1] {
    if (req.type === 'LIMIT') {
      if (req.price === undefined) throw new OrderError('Limit order requires price');
      if (req.amountUnit !== 'base') throw new OrderError('Limit order amount must be a base quantity');
      return {
        market,
        side: req.side === 'BUY' ? 'bid' : 'ask',
        ord_type: 'limit',
        price: String(req.price),
        volume: String(req.amount),
      };
    }
    if (req.side === 'BUY') {
      if (req.amountUnit !== 'quote') throw new OrderError('Market buy on bithumb takes a quote cost');
      return { market, side: 'bid', ord_type: 'price', price: String(Math.floor(req.amount)) };
    }
    return { market, side: 'ask', ord_type: 'market', volume: String(req.amount) };
  }
}
