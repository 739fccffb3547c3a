import type { RiskCheck, RiskLimits } from '../types/index.js';

export interface RiskInput {
  readonly now: number;                  // Unix ms
  readonly tradesToday: number;
  readonly lastTradeTs: number | null;
  readonly realizedPnlToday: number;
}

/**
 * 리스크 게이트 (상태 없음)
 * 체크 순서 고정, 처음 실패한 사유를 반환
 *  1. 일일 트레이드 수
 *  2. 쿨다운
 *  3. 일일 손실 킬스위치: 매 틱 재평가. realized_pnl_today가 일 단위로만
 *     초기화되므로 실질적으로 그날 동안 유지된다.
 */
export class RiskGate {
  readonly limits: RiskLimits;

  constructor(limits: RiskLimits) {
    this.limits = limits;
  }

  canTrade(input: RiskInput): RiskCheck {
    if (input.tradesToday >= this.limits.maxTradesPerDay) {
      return { allowed: false, reason: 'max trades/day' };
    }

    if (
      input.lastTradeTs !== null &&
      input.now - input.lastTradeTs < this.limits.cooldownSeconds * 1000
    ) {
      return { allowed: false, reason: 'cooldown' };
    }

    if (this.limits.maxDailyLossPct > 0 && input.realizedPnlToday <= -this.dailyLossLimit()) {
      return { allowed: false, reason: 'kill-switch' };
    }

    return { allowed: true };
  }

  /** 편도 수수료 추정 */
  applyFees(notional: number): number {
    return Math.abs(notional) * (this.limits.takerFeePct / 100);
  }

  /** 일일 손실 한도 (양수, 호가자산 기준) */
  dailyLossLimit(): number {
    return Math.abs((this.limits.maxDailyLossPct / 100) * this.limits.startEquity);
  }
}
