import type { Logger } from '../logger.js';
import type { Bar, PricePoint } from '../types/index.js';
import type { PriceFeed } from './price-feed.js';
import { NetworkError } from '../errors.js';
import type { BithumbClient } from '../exchange/bithumb/client.js';
import { candleSchema } from '../exchange/bithumb/schemas.js';
import * as bithumb from '../exchange/bithumb/rest.js';
import { withRetry, type RetryPolicy, type Sleep } from '../net/retry.js';

const MINUTES_PER_DAY = 1440;

/**
 * 빗썸 Public REST 기반 가격 피드
 * 캔들 응답은 최신순이므로 시간 오름차순으로 뒤집는다.
 * 분봉은 요청당 최대 200개까지만 받는다.
 */
export class BithumbFeed implements PriceFeed {
  readonly name = 'bithumb';
  readonly market: string;
  private readonly client: BithumbClient;
  private readonly retry: RetryPolicy;
  private readonly log: Logger;
  private readonly sleep: Sleep | undefined;

  constructor(client: BithumbClient, pair: string, deps: { retry: RetryPolicy; log: Logger; sleep?: Sleep }) {
    this.client = client;
    this.market = bithumb.toBithumbMarket(pair);
    this.retry = deps.retry;
    this.log = deps.log;
    this.sleep = deps.sleep;
  }

  lastPrice(): Promise<number> {
    return this.retrying('lastPrice', async () => {
      const data = await bithumb.getTicker(this.client, this.market);
      const t = data.find((row) => row.market === this.market) ?? data[0];
      if (!t) throw new NetworkError(`bithumb: empty ticker for ${this.market}`, { retryable: false });
      return t.trade_price;
    });
  }

  dailyBars(days: number): Promise<Bar[]> {
    return this.retrying('dailyBars', async () => {
      const rows = await bithumb.getCandlesDays(this.client, this.market, days);
      return this.toBars(rows);
    });
  }

  minuteSeries(days: number): Promise<PricePoint[]> {
    return this.retrying('minuteSeries', async () => {
      const rows = await bithumb.getCandlesMinutes(this.client, 1, this.market, days * MINUTES_PER_DAY);
      return this.toBars(rows).map((b) => ({ timestamp: b.timestamp, price: b.close }));
    });
  }

  private toBars(rows: readonly unknown[]): Bar[] {
    const bars: Bar[] = [];
    let skipped = 0;
    for (const row of rows) {
      const r = candleSchema.safeParse(row);
      if (!r.success) {
        skipped++;
        continue;
      }
      const c = r.data;
      bars.push({
        timestamp: new Date(c.candle_date_time_utc + 'Z').getTime(),
        open: c.opening_price,
        high: c.high_price,
        low: c.low_price,
        close: c.trade_price,
      });
    }
    if (skipped > 0) this.log.warn({ skipped, market: this.market }, 'Skipped malformed candle rows');
    return bars.sort((a, b) => a.timestamp - b.timestamp);
  }

  private retrying<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(this.retry, `bithumb.${label}`, fn, { log: this.log, sleep: this.sleep });
  }
}
