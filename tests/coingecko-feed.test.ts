import { describe, it, expect } from 'vitest';
import { CoinGeckoFeed, COINGECKO_PRO_BASE, COINGECKO_PUBLIC_BASE } from '../src/market/coingecko-feed.js';
import { normalizeVsCurrency } from '../src/market/coingecko/currency.js';
import { createRetryPolicy } from '../src/net/retry.js';
import { createSilentLogger } from '../src/logger.js';
import { NetworkError, UnsupportedError } from '../src/errors.js';
import { FakeHttp, noSleep } from './helpers/fakes.js';

function makeFeed(http: FakeHttp, opts: { apiKey?: string; vsCurrency?: string } = {}): CoinGeckoFeed {
  return new CoinGeckoFeed({
    coinId: 'bitcoin',
    vsCurrency: opts.vsCurrency ?? 'usd',
    apiKey: opts.apiKey ?? null,
    timeoutMs: 1000,
    retry: createRetryPolicy({ maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 }),
    log: createSilentLogger(),
    http: http.send,
    sleep: noSleep,
  });
}

function query(url: string, key: string): string | null {
  return new URL(url).searchParams.get(key);
}

describe('normalizeVsCurrency', () => {
  it('should map stablecoins to usd', () => {
    expect(normalizeVsCurrency('USDC')).toBe('usd');
    expect(normalizeVsCurrency(' krw ')).toBe('krw');
    expect(normalizeVsCurrency('')).toBe('usd');
  });
});

describe('CoinGeckoFeed.lastPrice', () => {
  it('should read /simple/price from the public API', async () => {
    const http = new FakeHttp().on('/simple/price', { status: 200, body: { bitcoin: { usd: 50_000 } } });
    expect(await makeFeed(http).lastPrice()).toBe(50_000);

    const url = http.calls[0]?.url ?? '';
    expect(url.startsWith(`${COINGECKO_PUBLIC_BASE}/simple/price`)).toBe(true);
    expect(query(url, 'ids')).toBe('bitcoin');
    expect(query(url, 'vs_currencies')).toBe('usd');
  });

  it('should fall back to /coins/markets when the simple price is missing', async () => {
    const http = new FakeHttp()
      .on('/simple/price', { status: 200, body: {} })
      .on('/coins/markets', { status: 200, body: [{ id: 'bitcoin', current_price: 49_000 }] });
    expect(await makeFeed(http).lastPrice()).toBe(49_000);
    expect(http.calls).toHaveLength(2);
  });

  it('should fall back to /coins/{id} last', async () => {
    const http = new FakeHttp()
      .on('/simple/price', { status: 500, body: 'oops' })
      .on('/coins/markets', { status: 200, body: [] })
      .on('/coins/bitcoin', { status: 200, body: { market_data: { current_price: { usd: 48_000 } } } });
    expect(await makeFeed(http).lastPrice()).toBe(48_000);
    expect(http.calls).toHaveLength(3);
  });

  it('should not retry when the coin has no price at all', async () => {
    const http = new FakeHttp()
      .on('/simple/price', { status: 200, body: {} })
      .on('/coins/markets', { status: 200, body: [] })
      .on('/coins/bitcoin', { status: 200, body: { market_data: null } });
    await expect(makeFeed(http).lastPrice()).rejects.toBeInstanceOf(NetworkError);
    expect(http.calls).toHaveLength(3);
  });

  it('should retry the chain when every endpoint is unavailable', async () => {
    const down = { status: 503, body: 'unavailable' };
    const http = new FakeHttp().on('/simple/price', down).on('/coins/markets', down).on('/coins/bitcoin', down);
    await expect(makeFeed(http).lastPrice()).rejects.toBeInstanceOf(NetworkError);
    expect(http.calls).toHaveLength(6);
  });

  it('should switch to the pro API with a key', async () => {
    const http = new FakeHttp().on('/simple/price', { status: 200, body: { bitcoin: { usd: 1 } } });
    await makeFeed(http, { apiKey: 'test-key' }).lastPrice();
    const call = http.calls[0];
    expect(call?.url.startsWith(COINGECKO_PRO_BASE)).toBe(true);
    expect(call?.headers?.['x-cg-pro-api-key']).toBe('test-key');
  });

  it('should ask for usd when configured with a stablecoin', async () => {
    const http = new FakeHttp().on('/simple/price', { status: 200, body: { bitcoin: { usd: 2 } } });
    expect(await makeFeed(http, { vsCurrency: 'usdt' }).lastPrice()).toBe(2);
    expect(query(http.calls[0]?.url ?? '', 'vs_currencies')).toBe('usd');
  });
});

describe('CoinGeckoFeed.dailyBars', () => {
  it('should parse OHLC rows and skip malformed ones', async () => {
    const http = new FakeHttp().on('/ohlc', {
      status: 200,
      body: [[1, 10, 12, 9, 11], [2, 'x'], [3, 11, 13, 10, 12]],
    });
    expect(await makeFeed(http).dailyBars(30)).toEqual([
      { timestamp: 1, open: 10, high: 12, low: 9, close: 11 },
      { timestamp: 3, open: 11, high: 13, low: 10, close: 12 },
    ]);
    expect(query(http.calls[0]?.url ?? '', 'days')).toBe('30');
  });

  it('should report a missing OHLC endpoint as unsupported without retrying', async () => {
    const http = new FakeHttp().on('/ohlc', { status: 404, body: { error: 'not found' } });
    await expect(makeFeed(http).dailyBars(30)).rejects.toBeInstanceOf(UnsupportedError);
    expect(http.calls).toHaveLength(1);
  });

  it('should retry after a rate limit', async () => {
    const http = new FakeHttp().on(
      '/ohlc',
      { status: 429, body: 'slow down' },
      { status: 200, body: [[1, 1, 1, 1, 1]] },
    );
    expect(await makeFeed(http).dailyBars(1)).toHaveLength(1);
    expect(http.calls).toHaveLength(2);
  });
});

describe('CoinGeckoFeed.minuteSeries', () => {
  it('should read minute prices from market_chart', async () => {
    const http = new FakeHttp().on('/market_chart', {
      status: 200,
      body: { prices: [[1, 100], [2, 101], [3, 'bad']] },
    });
    expect(await makeFeed(http).minuteSeries(1)).toEqual([
      { timestamp: 1, price: 100 },
      { timestamp: 2, price: 101 },
    ]);
    expect(query(http.calls[0]?.url ?? '', 'interval')).toBe('minute');
  });
});
