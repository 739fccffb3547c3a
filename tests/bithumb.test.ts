import { describe, it, expect } from 'vitest';
import { BithumbClient, BithumbAuthError } from '../src/exchange/bithumb/client.js';
import { toBithumbMarket } from '../src/exchange/bithumb/rest.js';
import { BithumbFeed } from '../src/market/bithumb-feed.js';
import { BithumbExchange, BITHUMB_DEFAULT_MIN_TOTAL } from '../src/execution/bithumb-exchange.js';
import { createRetryPolicy } from '../src/net/retry.js';
import { createSilentLogger } from '../src/logger.js';
import { OrderError } from '../src/errors.js';
import { FakeHttp, noSleep } from './helpers/fakes.js';

const BASE_URL = 'https://api.bithumb.test';
const CREDENTIALS = { accessKey: 'test-access', secretKey: 'test-secret-for-hmac-signing-only' };
const retry = createRetryPolicy({ maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 });

function client(http: FakeHttp, withKeys = true): BithumbClient {
  return new BithumbClient({
    baseUrl: BASE_URL,
    credentials: withKeys ? CREDENTIALS : undefined,
    log: createSilentLogger(),
    http: http.send,
  });
}

function exchange(http: FakeHttp, withKeys = true): BithumbExchange {
  return new BithumbExchange(client(http, withKeys), { retry, log: createSilentLogger(), sleep: noSleep });
}

function candle(utc: string, close: number): Record<string, unknown> {
  return {
    market: 'KRW-BTC',
    candle_date_time_utc: utc,
    opening_price: close,
    high_price: close + 10,
    low_price: close - 10,
    trade_price: close,
  };
}

function payloadOf(authorization: string | undefined): Record<string, unknown> {
  const token = (authorization ?? '').replace('Bearer ', '');
  const part = token.split('.')[1] ?? '';
  const decoded: unknown = JSON.parse(Buffer.from(part, 'base64url').toString());
  return typeof decoded === 'object' && decoded !== null ? { ...decoded } : {};
}

describe('toBithumbMarket', () => {
  it('should turn BASE/QUOTE into QUOTE-BASE', () => {
    expect(toBithumbMarket('BTC/KRW')).toBe('KRW-BTC');
  });
});

describe('BithumbFeed', () => {
  const feedFor = (http: FakeHttp): BithumbFeed =>
    new BithumbFeed(client(http, false), 'BTC/KRW', { retry, log: createSilentLogger(), sleep: noSleep });

  it('should read the last trade price from the ticker', async () => {
    const http = new FakeHttp().on('/v1/ticker', { status: 200, body: [{ market: 'KRW-BTC', trade_price: 90_000_000 }] });
    expect(await feedFor(http).lastPrice()).toBe(90_000_000);
    expect(new URL(http.calls[0]?.url ?? '').searchParams.get('markets')).toBe('KRW-BTC');
  });

  it('should return daily bars oldest first and drop broken rows', async () => {
    const http = new FakeHttp().on('/v1/candles/days', {
      status: 200,
      body: [candle('2024-01-02T00:00:00', 200), { broken: true }, candle('2024-01-01T00:00:00', 100)],
    });
    const bars = await feedFor(http).dailyBars(30);
    expect(bars).toEqual([
      { timestamp: Date.UTC(2024, 0, 1), open: 100, high: 110, low: 90, close: 100 },
      { timestamp: Date.UTC(2024, 0, 2), open: 200, high: 210, low: 190, close: 200 },
    ]);
    expect(new URL(http.calls[0]?.url ?? '').searchParams.get('count')).toBe('30');
  });

  it('should cap minute candles at one page', async () => {
    const http = new FakeHttp().on('/v1/candles/minutes/1', {
      status: 200,
      body: [candle('2024-01-01T00:01:00', 101), candle('2024-01-01T00:00:00', 100)],
    });
    expect(await feedFor(http).minuteSeries(1)).toEqual([
      { timestamp: Date.UTC(2024, 0, 1, 0, 0), price: 100 },
      { timestamp: Date.UTC(2024, 0, 1, 0, 1), price: 101 },
    ]);
    expect(new URL(http.calls[0]?.url ?? '').searchParams.get('count')).toBe('200');
  });
});

describe('BithumbExchange', () => {
  it('should take a quote cost for market buys', () => {
    expect(exchange(new FakeHttp()).marketBuyUnit).toBe('quote');
  });

  it('should validate the pair against listed markets', async () => {
    const http = new FakeHttp().on('/v1/market/all', {
      status: 200,
      body: [{ market: 'KRW-BTC', market_warning: 'NONE' }, { market: 'KRW-ETH' }, { market: 'KRW-XRP', market_warning: 'CAUTION' }],
    });
    const ex = exchange(http);
    expect(await ex.validatePair('BTC/KRW')).toEqual({ ok: true });
    expect(await ex.validatePair('XRP/KRW')).toEqual({ ok: true });
    const missing = await ex.validatePair('DOGE/KRW');
    expect(missing.ok).toBe(false);
    expect(missing.ok ? '' : missing.reason).toContain('KRW-DOGE');
  });

  it('should use the default minimum without keys', async () => {
    const http = new FakeHttp();
    expect(await exchange(http, false).limits('BTC/KRW')).toEqual({ minAmount: 0, minCost: BITHUMB_DEFAULT_MIN_TOTAL });
    expect(http.calls).toHaveLength(0);
  });

  it('should read minimum total and price unit from orders/chance', async () => {
    const http = new FakeHttp().on('/v1/orders/chance', {
      status: 200,
      body: { market: { bid: { currency: 'KRW', price_unit: '1000', min_total: '5000' } } },
    });
    const ex = exchange(http);
    expect(ex.roundPrice('BTC/KRW', 90_001_234.7)).toBe(90_001_234);
    expect(await ex.limits('BTC/KRW')).toEqual({ minAmount: 0, minCost: 5000 });
    expect(ex.roundPrice('BTC/KRW', 90_001_234)).toBe(90_001_000);

    const auth = payloadOf(http.calls[0]?.headers?.Authorization);
    expect(auth.access_key).toBe('test-access');
    expect(auth.query_hash_alg).toBe('SHA512');
  });

  it('should floor base amounts to 8 decimals', () => {
    expect(exchange(new FakeHttp()).roundAmount('BTC/KRW', 0.123456789)).toBe(0.12345678);
  });

  it('should place a market buy as a whole-won quote cost', async () => {
    const http = new FakeHttp().on('/v1/orders', { status: 201, body: { uuid: 'order-1', state: 'wait' } });
    const receipt = await exchange(http).placeOrder({
      pair: 'BTC/KRW',
      side: 'BUY',
      type: 'MARKET',
      amount: 10_000.7,
      amountUnit: 'quote',
    });
    expect(receipt).toEqual({
      orderId: 'order-1',
      side: 'BUY',
      amount: 10_000,
      amountUnit: 'quote',
      price: null,
      paper: false,
    });

    const call = http.calls[0];
    expect(call?.method).toBe('POST');
    expect(JSON.parse(call?.body ?? '{}')).toEqual({ market: 'KRW-BTC', side: 'bid', ord_type: 'price', price: '10000' });
    expect(call?.headers?.Authorization?.startsWith('Bearer ')).toBe(true);
  });

  it('should place a market sell by volume', async () => {
    const http = new FakeHttp().on('/v1/orders', { status: 201, body: { uuid: 'order-2' } });
    await exchange(http).placeOrder({ pair: 'BTC/KRW', side: 'SELL', type: 'MARKET', amount: 0.5, amountUnit: 'base' });
    expect(JSON.parse(http.calls[0]?.body ?? '{}')).toEqual({ market: 'KRW-BTC', side: 'ask', ord_type: 'market', volume: '0.5' });
  });

  it('should place limit orders with price and volume', async () => {
    const http = new FakeHttp().on('/v1/orders', { status: 201, body: { uuid: 'order-3' } });
    const receipt = await exchange(http).placeOrder({
      pair: 'BTC/KRW',
      side: 'BUY',
      type: 'LIMIT',
      amount: 0.001,
      amountUnit: 'base',
      price: 90_000_000,
    });
    expect(receipt.price).toBe(90_000_000);
    expect(JSON.parse(http.calls[0]?.body ?? '{}')).toEqual({
      market: 'KRW-BTC',
      side: 'bid',
      ord_type: 'limit',
      price: '90000000',
      volume: '0.001',
    });
  });

  it('should refuse a market buy sized in base quantity', async () => {
    const http = new FakeHttp();
    await expect(
      exchange(http).placeOrder({ pair: 'BTC/KRW', side: 'BUY', type: 'MARKET', amount: 0.1, amountUnit: 'base' }),
    ).rejects.toBeInstanceOf(OrderError);
    expect(http.calls).toHaveLength(0);
  });

  it('should surface the rejection reason', async () => {
    const http = new FakeHttp().on('/v1/orders', {
      status: 400,
      body: { error: { name: 'under_min_total_bid', message: 'too small' } },
    });
    await expect(
      exchange(http).placeOrder({ pair: 'BTC/KRW', side: 'BUY', type: 'MARKET', amount: 1000, amountUnit: 'quote' }),
    ).rejects.toThrow('under_min_total_bid: too small');
    expect(http.calls).toHaveLength(1);
  });

  it('should treat a success without uuid as a failed order', async () => {
    const http = new FakeHttp().on('/v1/orders', { status: 201, body: {} });
    await expect(
      exchange(http).placeOrder({ pair: 'BTC/KRW', side: 'SELL', type: 'MARKET', amount: 0.5, amountUnit: 'base' }),
    ).rejects.toBeInstanceOf(OrderError);
  });

  it('should raise an auth error on 401', async () => {
    const http = new FakeHttp().on('/v1/orders', {
      status: 401,
      body: { error: { name: 'jwt_verification', message: 'bad signature' } },
    });
    await expect(
      exchange(http).placeOrder({ pair: 'BTC/KRW', side: 'SELL', type: 'MARKET', amount: 0.5, amountUnit: 'base' }),
    ).rejects.toBeInstanceOf(BithumbAuthError);
  });
});
