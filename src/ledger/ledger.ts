import type { AmountUnit, BotState, OrderSide } from '../types/index.js';
import { rolloverIfNewDay } from './state-store.js';
import type { EquityPoint } from '../report/equity-log.js';

export interface FeeModel {
  applyFees(notional: number): number;
}

/** 변이 직후 호출되는 부수효과 (저장, 에쿼티 기록) */
export interface LedgerSink {
  persist(state: Readonly<BotState>): void;
  recordEquity(point: EquityPoint): void;
}

export interface BuyFill {
  readonly amount: number;
  readonly amountUnit: AmountUnit;   // quote면 금액 → 수량 환산
  readonly fillPrice: number;
  readonly now: number;
}

export interface SellFill {
  readonly qty: number;
  readonly fillPrice: number;
  readonly now: number;
}

export interface TradeResult {
  readonly side: OrderSide;
  readonly qty: number;
  readonly fillPrice: number;
  readonly fee: number;
  readonly pnl: number | null;       // BUY는 null
}

/**
 * 포지션/손익 원장 (단일 포지션: FLAT ↔ LONG)
 * 체결 1건당 정확히 한 번 변이하고, 변이 후 즉시 sink.persist
 */
export class Ledger {
  private readonly st: BotState;
  private readonly fees: FeeModel;
  private readonly sink: LedgerSink;

  constructor(state: BotState, fees: FeeModel, sink: LedgerSink) {
    this.st = state;
    this.fees = fees;
    this.sink = sink;
  }

  get state(): Readonly<BotState> {
    return this.st;
  }

  applyBuy(fill: BuyFill): TradeResult {
    const qty = fill.amountUnit === 'quote'
      ? (fill.fillPrice > 0 ? fill.amount / fill.fillPrice : 0)
      : fill.amount;
    const fee = this.fees.applyFees(qty * fill.fillPrice);

    this.st.mode = 'LONG';
    this.st.ref_price = fill.fillPrice;
    this.st.position_qty += qty;
    this.st.cum_fees += fee;
    this.st.last_trade_ts = fill.now;
    this.st.trades_today += 1;

    this.sink.persist(this.st);
    return { side: 'BUY', qty, fillPrice: fill.fillPrice, fee, pnl: null };
  }

  /**
   * 전량 청산. 수수료는 매도금액·원가 양쪽에 부과 (왕복 비용 추정)
   */
  applySell(fill: SellFill): TradeResult {
    const proceeds = fill.qty * fill.fillPrice;
    const cost = fill.qty * (this.st.ref_price ?? fill.fillPrice);
    const fee = this.fees.applyFees(proceeds) + this.fees.applyFees(cost);
    const pnl = proceeds - cost - fee;

    this.st.realized_pnl += pnl;
    this.st.realized_pnl_today += pnl;
    this.st.cum_fees += fee;
    this.st.mode = 'FLAT';
    this.st.ref_price = fill.fillPrice;
    this.st.position_qty = 0;
    this.st.last_trade_ts = fill.now;
    this.st.trades_today += 1;

    this.sink.persist(this.st);
    this.sink.recordEquity({
      ts: fill.now,
      realizedPnl: this.st.realized_pnl,
      cumFees: this.st.cum_fees,
      positionQty: this.st.position_qty,
    });
    return { side: 'SELL', qty: fill.qty, fillPrice: fill.fillPrice, fee, pnl };
  }

  /** 장기 실행 중 UTC 날짜가 바뀌면 일일 카운터 초기화 후 저장 */
  rollover(now: number): boolean {
    const rolled = rolloverIfNewDay(this.st, now);
    if (rolled) this.sink.persist(this.st);
    return rolled;
  }

  /** 기동 시 보정: 일 시작 기준값이 비어 있으면 누적 손익으로 채움 */
  repairStartOfDay(): boolean {
    if (this.st.equity_start_of_day !== 0 || this.st.realized_pnl === 0) return false;
    this.st.equity_start_of_day = this.st.realized_pnl;
    this.sink.persist(this.st);
    return true;
  }

  /** 현재 상태를 그대로 저장 (기동 직후 기본값/롤오버 반영용) */
  flush(): void {
    this.sink.persist(this.st);
  }
}
