import type { Logger } from '../logger.js';
import type { Bar, PricePoint } from '../types/index.js';
import type { PriceFeed } from './price-feed.js';
import { NetworkError } from '../errors.js';
import { sendRequest, ensureOk, parseBody, type HttpResponse, type HttpSend } from '../net/http.js';
import { withRetry, type RetryPolicy, type Sleep } from '../net/retry.js';
import {
  simplePriceSchema,
  coinsMarketsSchema,
  coinDetailSchema,
  ohlcSchema,
  ohlcRowSchema,
  marketChartSchema,
  pricePointRowSchema,
} from './coingecko/schemas.js';
import { normalizeVsCurrency } from './coingecko/currency.js';

export const COINGECKO_PUBLIC_BASE = 'https://api.coingecko.com/api/v3';
export const COINGECKO_PRO_BASE = 'https://pro-api.coingecko.com/api/v3';

export interface CoinGeckoFeedOptions {
  readonly coinId: string;
  readonly vsCurrency: string;
  readonly apiKey: string | null;
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
  readonly log: Logger;
  readonly http?: HttpSend;
  readonly sleep?: Sleep;
}

/**
 * CoinGecko 가격 피드
 * - API 키가 있으면 Pro 베이스 + x-cg-pro-api-key 헤더
 * - 현재가: /simple/price → /coins/markets → /coins/{id} 순서로 폴백
 * - 일봉 OHLC, 분 단위 가격 (ATR 대체 경로)
 */
export class CoinGeckoFeed implements PriceFeed {
  readonly name = 'coingecko';
  readonly coinId: string;
  readonly vsCurrency: string;
  private readonly base: string;
  private readonly opts: CoinGeckoFeedOptions;
  private readonly http: HttpSend;

  constructor(opts: CoinGeckoFeedOptions) {
    this.opts = opts;
    this.coinId = opts.coinId.trim();
    this.vsCurrency = normalizeVsCurrency(opts.vsCurrency);
    this.base = opts.apiKey ? COINGECKO_PRO_BASE : COINGECKO_PUBLIC_BASE;
    this.http = opts.http ?? sendRequest;
  }

  lastPrice(): Promise<number> {
    return this.retrying('lastPrice', () => this.fetchLastPrice());
  }

  dailyBars(days: number): Promise<Bar[]> {
    return this.retrying('dailyBars', async () => {
      const endpoint = `/coins/${this.coinId}/ohlc`;
      const res = await this.get(endpoint, { vs_currency: this.vsCurrency, days: String(days) });
      ensureOk(endpoint, res, { unsupportedOn4xx: true });
      const rows = parseBody(endpoint, res.body, ohlcSchema);
      const bars: Bar[] = [];
      for (const row of rows) {
        const r = ohlcRowSchema.safeParse(row);
        if (!r.success) continue;
        const [timestamp, open, high, low, close] = r.data;
        bars.push({ timestamp, open, high, low, close });
      }
      return bars;
    });
  }

  minuteSeries(days: number): Promise<PricePoint[]> {
    return this.retrying('minuteSeries', async () => {
      const endpoint = `/coins/${this.coinId}/market_chart`;
      const res = await this.get(endpoint, { vs_currency: this.vsCurrency, days: String(days), interval: 'minute' });
      if (res.status < 200 || res.status >= 300) {
        this.opts.log.warn({ status: res.status, body: res.body }, 'coingecko_market_chart_status');
      }
      ensureOk(endpoint, res);
      const chart = parseBody(endpoint, res.body, marketChartSchema);
      const out: PricePoint[] = [];
      for (const row of chart.prices ?? []) {
        const r = pricePointRowSchema.safeParse(row);
        if (!r.success) continue;
        out.push({ timestamp: r.data[0], price: r.data[1] });
      }
      if (out.length === 0) {
        this.opts.log.warn({ id: this.coinId, vs: this.vsCurrency }, 'coingecko_market_chart_empty');
      }
      return out;
    });
  }

  private async fetchLastPrice(): Promise<number> {
    const log = this.opts.log;
    const vs = this.vsCurrency;

    // 1) /simple/price
    let res = await this.get('/simple/price', { ids: this.coinId, vs_currencies: vs });
    if (isOk(res)) {
      const parsed = simplePriceSchema.safeParse(res.body);
      const price = parsed.success ? parsed.data[this.coinId]?.[vs] : undefined;
      if (typeof price === 'number') return price;
      log.warn({ id: this.coinId, vs, body: res.body }, 'coingecko_simple_price_missing_data');
    } else {
      log.warn({ status: res.status, body: res.body }, 'coingecko_simple_price_status');
    }

    // 2) /coins/markets
    res = await this.get('/coins/markets', { vs_currency: vs, ids: this.coinId, per_page: '1', page: '1' });
    if (isOk(res)) {
      const parsed = coinsMarketsSchema.safeParse(res.body);
      const price = parsed.success ? parsed.data[0]?.current_price : undefined;
      if (typeof price === 'number') {
        log.info({ used: 'coins/markets' }, 'coingecko_price_fallback');
        return price;
      }
      log.warn({ id: this.coinId, vs, body: res.body }, 'coingecko_markets_empty');
    } else {
      log.warn({ status: res.status, body: res.body }, 'coingecko_markets_status');
    }

    // 3) /coins/{id}
    res = await this.get(`/coins/${this.coinId}`, {
      localization: 'false',
      tickers: 'false',
      market_data: 'true',
      community_data: 'false',
      developer_data: 'false',
      sparkline: 'false',
    });
    if (isOk(res)) {
      const parsed = coinDetailSchema.safeParse(res.body);
      const price = parsed.success ? parsed.data.market_data?.current_price?.[vs] : undefined;
      if (typeof price === 'number') {
        log.info({ used: 'coins/{id}' }, 'coingecko_price_fallback');
        return price;
      }
      log.warn({ id: this.coinId, vs }, 'coingecko_coins_id_missing_price');
      throw new NetworkError(`coingecko: no price for ${this.coinId}/${vs}`, { retryable: false });
    }
    ensureOk(`/coins/${this.coinId}`, res);
    throw new NetworkError('coingecko: unreachable');
  }

  private get(path: string, query: Record<string, string>): Promise<HttpResponse> {
    const url = new URL(this.base + path);
    for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
    const headers: Record<string, string> = {};
    if (this.opts.apiKey) headers['x-cg-pro-api-key'] = this.opts.apiKey;
    return this.http({ method: 'GET', url: url.toString(), headers, timeoutMs: this.opts.timeoutMs });
  }

  private retrying<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(this.opts.retry, `coingecko.${label}`, fn, { log: this.opts.log, sleep: this.opts.sleep });
  }
}

function isOk(res: HttpResponse): boolean {
  return res.status >= 200 && res.status < 300;
}
