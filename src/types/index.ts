export type { Bar, PricePoint } from './bar.js';
export type {
  OrderSide,
  OrderType,
  AmountUnit,
  OrderRequest,
  OrderReceipt,
  MarketLimits,
} from './order.js';
export type { SignalAction, SignalReason, StrategySignal } from './signal.js';
export type { RiskCheck, RiskBlockReason, RiskLimits } from './risk.js';
export type { PositionMode, BotState } from './state.js';
