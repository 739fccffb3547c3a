/** 일봉 OHLC */
export interface Bar {
  readonly timestamp: number;   // Unix ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
}

/** 분 단위 가격 샘플 */
export interface PricePoint {
  readonly timestamp: number;   // Unix ms
  readonly price: number;
}
