export type SignalAction = 'BUY' | 'SELL' | 'NONE';

export type SignalReason = 'entry' | 'take-profit' | 'stop-loss';

export interface StrategySignal {
  readonly action: SignalAction;
  readonly stopPrice?: number;   // 진입 시 참고용 SL (강제하지 않음)
  readonly reason?: SignalReason;
}
