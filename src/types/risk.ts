export type RiskCheck =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: RiskBlockReason };

export type RiskBlockReason = 'max trades/day' | 'cooldown' | 'kill-switch';

export interface RiskLimits {
  readonly maxTradesPerDay: number;
  readonly cooldownSeconds: number;
  readonly maxDailyLossPct: number;   // 퍼센트 (3 = 3%)
  readonly startEquity: number;
  readonly takerFeePct: number;       // 편도 퍼센트 (0.1 = 0.1%)
}
