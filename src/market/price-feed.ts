import type { Bar, PricePoint } from '../types/index.js';

/**
 * 가격 데이터 소스: 생성 시 하나의 자산/페어에 묶인다
 * 실패: NetworkError (재시도 가능), UnsupportedError (일봉 미지원 등)
 */
export interface PriceFeed {
  readonly name: string;
  lastPrice(): Promise<number>;
  dailyBars(days: number): Promise<Bar[]>;
  minuteSeries(days: number): Promise<PricePoint[]>;
}
