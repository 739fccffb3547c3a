import type { StrategySignal } from '../types/index.js';
import type { Strategy, StrategyInput, StrategyParams } from './strategy.js';

export interface AtrBandParams extends StrategyParams {
  readonly k: number;             // 진입/청산 밴드 ATR 배수
  readonly stopEnabled: boolean;
  readonly stopLossAtr: number;   // 손절 밴드 ATR 배수
}

const DEFAULT_PARAMS: AtrBandParams = {
  k: 1.5,
  stopEnabled: true,
  stopLossAtr: 1.0,
};

/**
 * ATR 밴드 전략 (롱전용, FLAT/LONG 2상태)
 *
 * FLAT: 기준가(ref 없으면 현재가) - k·ATR 이하로 내려오면 BUY
 * LONG: 기준가 + k·ATR 이상이면 SELL (익절)
 *       아니면 ref - stopLossAtr·ATR 이하에서 SELL (손절)
 *
 * ATR이 없거나 0 이하면 항상 NONE: ATR 0이면 어떤 움직임도 밴드 돌파가 된다.
 */
export class AtrBandStrategy implements Strategy {
  readonly name = 'AtrBand';
  readonly params: AtrBandParams;

  constructor(params?: Partial<AtrBandParams>) {
    this.params = { ...DEFAULT_PARAMS, ...params };
  }

  evaluate({ price, atr, mode, refPrice }: StrategyInput): StrategySignal {
    if (atr === null || !(atr > 0)) {
      return { action: 'NONE' };
    }

    const baseline = refPrice ?? price;
    const { k, stopEnabled, stopLossAtr } = this.params;

    if (mode === 'FLAT') {
      const trigger = baseline - k * atr;
      if (price <= trigger) {
        return stopEnabled
          ? { action: 'BUY', reason: 'entry', stopPrice: price - stopLossAtr * atr }
          : { action: 'BUY', reason: 'entry' };
      }
      return { action: 'NONE' };
    }

    const takeProfit = baseline + k * atr;
    if (price >= takeProfit) {
      return { action: 'SELL', reason: 'take-profit' };
    }
    if (stopEnabled && refPrice !== null && price <= refPrice - stopLossAtr * atr) {
      return { action: 'SELL', reason: 'stop-loss' };
    }
    return { action: 'NONE' };
  }
}
