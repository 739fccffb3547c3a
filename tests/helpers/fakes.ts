import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseConfig } from '../../src/config.js';
import { createSilentLogger } from '../../src/logger.js';
import { openDatabase } from '../../src/db/database.js';
import { AuditLog } from '../../src/safety/audit-log.js';
import type { AppContext, Clock } from '../../src/context.js';
import type { PriceFeed } from '../../src/market/price-feed.js';
import type { Bar, PricePoint } from '../../src/types/index.js';
import type { HttpRequest, HttpResponse } from '../../src/net/http.js';

export function tempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'atr-bot-'));
}

export class ManualClock implements Clock {
  t: number;

  constructor(t: number) {
    this.t = t;
  }

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

export function makeContext(env: Record<string, string> = {}, clock: Clock = new ManualClock(Date.UTC(2024, 0, 2, 12))): AppContext {
  const config = parseConfig(env);
  const db = openDatabase(':memory:');
  return {
    config,
    logger: createSilentLogger(),
    audit: new AuditLog(db, config.runtime.paper ? 'PAPER' : 'LIVE', () => clock.now()),
    clock,
  };
}

/** 값 또는 던질 에러를 순서대로 돌려주는 피드. 큐가 비면 마지막 값 반복 */
export class FakeFeed implements PriceFeed {
  readonly name = 'fake';
  prices: Array<number | Error>;
  bars: Bar[] | Error;
  minutes: PricePoint[] | Error;
  barCalls = 0;
  minuteCalls = 0;
  private lastPriceValue: number | Error = new Error('no price');

  constructor(opts: { prices?: Array<number | Error>; bars?: Bar[] | Error; minutes?: PricePoint[] | Error } = {}) {
    this.prices = opts.prices ?? [];
    this.bars = opts.bars ?? [];
    this.minutes = opts.minutes ?? [];
  }

  async lastPrice(): Promise<number> {
    const next = this.prices.shift();
    if (next !== undefined) this.lastPriceValue = next;
    if (this.lastPriceValue instanceof Error) throw this.lastPriceValue;
    return this.lastPriceValue;
  }

  async dailyBars(): Promise<Bar[]> {
    this.barCalls++;
    if (this.bars instanceof Error) throw this.bars;
    return this.bars;
  }

  async minuteSeries(): Promise<PricePoint[]> {
    this.minuteCalls++;
    if (this.minutes instanceof Error) throw this.minutes;
    return this.minutes;
  }
}

export function bar(high: number, low: number, close: number, timestamp = 0): Bar {
  return { timestamp, open: close, high, low, close };
}

/** 경로별 응답을 돌려주는 HTTP 대역. 요청은 calls에 기록 */
export class FakeHttp {
  readonly calls: HttpRequest[] = [];
  private readonly routes: Array<{ match: string; responses: HttpResponse[] }> = [];

  on(match: string, ...responses: HttpResponse[]): this {
    this.routes.push({ match, responses });
    return this;
  }

  readonly send = async (req: HttpRequest): Promise<HttpResponse> => {
    this.calls.push(req);
    const pathname = new URL(req.url).pathname;
    const route = this.routes.find((r) => pathname.endsWith(r.match));
    if (!route) return { status: 404, body: { error: 'no route' } };
    const res = route.responses.length > 1 ? route.responses.shift() : route.responses[0];
    return res ?? { status: 500, body: null };
  };
}

export const noSleep = async (): Promise<void> => {};
