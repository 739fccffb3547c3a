import type { AppContext } from '../context.js';
import type { Logger } from '../logger.js';
import { childLogger } from '../logger.js';
import type { OrderReceipt, OrderSide, RiskBlockReason, SignalAction, AmountUnit } from '../types/index.js';
import type { PriceFeed } from '../market/price-feed.js';
import type { Exchange } from '../execution/exchange.js';
import type { SizingAdapter } from '../execution/sizing.js';
import type { Strategy } from '../strategy/strategy.js';
import type { RiskGate } from '../risk/risk-gate.js';
import type { Ledger, TradeResult } from '../ledger/ledger.js';
import { atrFromBars, atrFromPrices } from '../indicators/atr.js';

/** 오류 후 최대 대기 */
const ERROR_BACKOFF_MS = 30_000;

export type TickOutcome =
  | { readonly kind: 'skipped'; readonly reason: 'atr unavailable'; readonly price: number }
  | { readonly kind: 'no-signal'; readonly price: number; readonly atr: number }
  | { readonly kind: 'blocked'; readonly reason: RiskBlockReason; readonly signal: SignalAction }
  | {
      readonly kind: 'not-placed';
      readonly side: OrderSide;
      readonly reason: string;
      readonly amount: number;
      readonly amountUnit: AmountUnit;
      readonly estCost: number;
    }
  | { readonly kind: 'filled'; readonly trade: TradeResult; readonly receipt: OrderReceipt }
  | { readonly kind: 'error'; readonly error: unknown };

export interface LoopSummary {
  readonly realized_pnl_today: number;
  readonly realized_pnl: number;
  readonly trades_today: number;
  readonly cum_fees: number;
}

export interface TradingLoopDeps {
  readonly feed: PriceFeed;
  readonly exchange: Exchange;
  readonly strategy: Strategy;
  readonly risk: RiskGate;
  readonly ledger: Ledger;
  readonly sizing: SizingAdapter;
  /** 틱 사이 대기 (테스트 주입용). 기본은 stop()으로 깨울 수 있는 타이머 */
  readonly pause?: (ms: number) => Promise<void>;
}

/**
 * 폴링 루프: 한 틱에 최대 한 번 주문
 *
 * 롤오버 → 현재가 → ATR(일봉, 실패 시 분 단위) → 시그널 → 리스크 → 사이징 → 주문
 * → 원장 반영/저장 → 감사 기록
 *
 * 틱 안의 예상 못 한 오류는 tick()에서 잡아 'error'로 돌려주고 루프는 계속된다.
 */
export class TradingLoop {
  private readonly ctx: AppContext;
  private readonly deps: TradingLoopDeps;
  private readonly log: Logger;
  private stopRequested = false;
  private wake: (() => void) | null = null;

  constructor(ctx: AppContext, deps: TradingLoopDeps) {
    this.ctx = ctx;
    this.deps = deps;
    this.log = childLogger(ctx.logger, 'loop');
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  async run(): Promise<LoopSummary> {
    const pollMs = this.ctx.config.feed.pollIntervalSeconds * 1000;

    while (!this.stopRequested) {
      const started = this.ctx.clock.now();
      const outcome = await this.tick();
      if (this.ctx.config.runtime.once || this.stopRequested) break;

      const delay = outcome.kind === 'error'
        ? Math.min(ERROR_BACKOFF_MS, pollMs)
        : Math.max(0, pollMs - (this.ctx.clock.now() - started));
      await this.pause(delay);
    }

    const summary = this.summary();
    this.log.info(summary, 'daily_summary');
    this.ctx.audit.info('loop', 'SHUTDOWN', summary);
    return summary;
  }

  /** 진행 중인 틱은 끝까지 수행하고, 대기 중이면 바로 깨운다 */
  stop(): void {
    this.stopRequested = true;
    this.wake?.();
  }

  summary(): LoopSummary {
    const st = this.deps.ledger.state;
    return {
      realized_pnl_today: st.realized_pnl_today,
      realized_pnl: st.realized_pnl,
      trades_today: st.trades_today,
      cum_fees: st.cum_fees,
    };
  }

  async tick(): Promise<TickOutcome> {
    try {
      return await this.runTick();
    } catch (err) {
      this.log.error({ err }, 'tick_error');
      this.ctx.audit.error('loop', 'TICK_ERROR', err instanceof Error ? err.message : String(err));
      return { kind: 'error', error: err };
    }
  }

  private async runTick(): Promise<TickOutcome> {
    const { feed, strategy, risk, ledger } = this.deps;
    const now = this.ctx.clock.now();

    if (ledger.rollover(now)) {
      this.log.info({ day_key: ledger.state.day_key, equity_start_of_day: ledger.state.equity_start_of_day }, 'daily_rollover');
    }

    const price = await feed.lastPrice();
    const atr = await this.computeAtr();
    if (atr === null) {
      this.log.warn({ price }, 'atr_unavailable');
      return { kind: 'skipped', reason: 'atr unavailable', price };
    }

    const st = ledger.state;
    const signal = strategy.evaluate({ price, atr, mode: st.mode, refPrice: st.ref_price });
    this.log.info({ price, atr, mode: st.mode, ref_price: st.ref_price, sig: signal.action }, 'tick');

    if (signal.action === 'NONE') {
      return { kind: 'no-signal', price, atr };
    }

    const check = risk.canTrade({
      now,
      tradesToday: st.trades_today,
      lastTradeTs: st.last_trade_ts,
      realizedPnlToday: st.realized_pnl_today,
    });
    if (!check.allowed) {
      const { reason } = check;
      this.log.info({ reason, sig: signal.action }, 'risk_block');
      this.ctx.audit.warn('risk', 'RISK_BLOCK', { reason, signal: signal.action });
      return { kind: 'blocked', reason, signal: signal.action };
    }

    if (signal.reason === 'stop-loss') {
      this.log.warn({ price, ref_price: st.ref_price, atr }, 'stop_loss_trigger');
    }

    return this.execute(signal.action, price, now);
  }

  private async execute(side: OrderSide, price: number, now: number): Promise<TickOutcome> {
    const { exchange, sizing, ledger } = this.deps;
    const pair = this.ctx.config.market.pair;
    const paper = this.ctx.config.runtime.paper;

    const limits = await exchange.limits(pair);
    const input = { pair, lastPrice: price, limits, positionQty: ledger.state.position_qty };
    const decision = side === 'BUY' ? sizing.sizeBuy(input) : sizing.sizeSell(input);

    if (decision.kind === 'skip') {
      this.log.info(
        { side, reason: decision.reason, amount: decision.amount, unit: decision.amountUnit, notional: decision.estCost, limits },
        'order_not_placed',
      );
      this.ctx.audit.warn('order', 'ORDER_SKIPPED', { side, reason: decision.reason, amount: decision.amount });
      return {
        kind: 'not-placed',
        side,
        reason: decision.reason,
        amount: decision.amount,
        amountUnit: decision.amountUnit,
        estCost: decision.estCost,
      };
    }

    const receipt = await exchange.placeOrder(decision.request);

    let trade: TradeResult;
    if (side === 'BUY') {
      trade = ledger.applyBuy({
        amount: receipt.amount,
        amountUnit: receipt.amountUnit,
        fillPrice: decision.fillPrice,
        now,
      });
      this.log.info({ price: trade.fillPrice, amount: trade.qty, fees: trade.fee, paper }, 'filled_buy');
      this.ctx.audit.info('order', 'ENTRY', { orderId: receipt.orderId, qty: trade.qty, price: trade.fillPrice });
    } else {
      trade = ledger.applySell({ qty: receipt.amount, fillPrice: decision.fillPrice, now });
      this.log.info(
        { price: trade.fillPrice, pnl: trade.pnl, realized_pnl: ledger.state.realized_pnl, fees: trade.fee, paper },
        'filled_sell',
      );
      this.ctx.audit.info('order', 'EXIT', { orderId: receipt.orderId, qty: trade.qty, price: trade.fillPrice, pnl: trade.pnl });
    }

    this.ctx.audit.recordFill({
      orderId: receipt.orderId,
      side,
      type: decision.request.type,
      qty: trade.qty,
      fillPrice: trade.fillPrice,
      fee: trade.fee,
      pnl: trade.pnl,
      ts: now,
    });
    return { kind: 'filled', trade, receipt };
  }

  /** 일봉 ATR, 일봉 조회가 실패하면 분 단위 가격으로 대체 */
  private async computeAtr(): Promise<number | null> {
    const { feed } = this.deps;
    const { atrWindow, ohlcDays, minuteDays } = this.ctx.config.feed;
    try {
      const bars = await feed.dailyBars(ohlcDays);
      return atrFromBars(bars, atrWindow);
    } catch (err) {
      this.log.warn({ err, feed: feed.name }, 'ohlc_fallback');
    }
    try {
      const prices = await feed.minuteSeries(minuteDays);
      return atrFromPrices(prices, atrWindow);
    } catch (err) {
      this.log.warn({ err, feed: feed.name }, 'minute_series_unavailable');
      return null;
    }
  }

  private pause(ms: number): Promise<void> {
    if (this.deps.pause) return this.deps.pause(ms);
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
