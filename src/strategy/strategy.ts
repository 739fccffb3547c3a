import type { PositionMode, StrategySignal } from '../types/index.js';

export interface StrategyParams {
  readonly [key: string]: number | boolean | undefined;
}

/** 한 틱의 판단 입력: 전략은 상태를 읽기만 한다 */
export interface StrategyInput {
  readonly price: number;
  readonly atr: number | null;
  readonly mode: PositionMode;
  readonly refPrice: number | null;
}

export interface Strategy {
  readonly name: string;
  readonly params: StrategyParams;
  evaluate(input: StrategyInput): StrategySignal;
}
