export type PositionMode = 'FLAT' | 'LONG';

/**
 * 영속 봇 상태: 파일 키와 동일한 snake_case
 */
export interface BotState {
  mode: PositionMode;
  ref_price: number | null;
  position_qty: number;
  realized_pnl: number;
  cum_fees: number;
  trades_today: number;
  last_trade_ts: number | null;   // Unix ms
  equity_start_of_day: number;
  realized_pnl_today: number;
  day_key: string;                // YYYY-MM-DD (UTC)
}
