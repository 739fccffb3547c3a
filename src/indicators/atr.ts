import type { Bar, PricePoint } from '../types/index.js';

/**
 * ATR (Average True Range): 최근 window개 TR의 단순평균(SMA)
 * Wilder 지수평활이 아니라 SMA 근사를 그대로 쓴다.
 *
 * 입력 중 숫자가 아닌 행은 건너뛰고, 유효 행이 2개 미만이면 null.
 */
export function atrFromBars(bars: readonly Bar[], window: number): number | null {
  const trs = trueRanges(bars);
  return trs.length === 0 ? null : smaTail(trs, window);
}

/**
 * 일봉을 못 받을 때의 대체 경로
 * 분 단위 가격의 |p_t - p_{t-1}|을 TR로 근사
 */
export function atrFromPrices(samples: readonly PricePoint[], window: number): number | null {
  const deltas = priceDeltas(samples);
  return deltas.length === 0 ? null : smaTail(deltas, window);
}

export function trueRange(bar: Bar, prevClose: number): number {
  return Math.max(
    bar.high - bar.low,
    Math.abs(bar.high - prevClose),
    Math.abs(bar.low - prevClose),
  );
}

/** 첫 봉 이후 각 봉의 TR (길이 = 유효 봉 수 - 1) */
export function trueRanges(bars: readonly Bar[]): number[] {
  const out: number[] = [];
  let prevClose: number | null = null;
  for (const bar of bars) {
    if (!isUsableBar(bar)) continue;
    if (prevClose !== null) out.push(trueRange(bar, prevClose));
    prevClose = bar.close;
  }
  return out;
}

export function priceDeltas(samples: readonly PricePoint[]): number[] {
  const out: number[] = [];
  let prev: number | null = null;
  for (const s of samples) {
    if (!s || !Number.isFinite(s.price)) continue;
    if (prev !== null) out.push(Math.abs(s.price - prev));
    prev = s.price;
  }
  return out;
}

/** 마지막 min(window, n)개 평균. window < 1은 1로 취급 */
export function smaTail(values: readonly number[], window: number): number {
  const n = Math.max(1, Math.min(Math.floor(window), values.length));
  let sum = 0;
  for (let i = values.length - n; i < values.length; i++) {
    sum += values[i] ?? 0;
  }
  return sum / n;
}

function isUsableBar(bar: Bar | null | undefined): bar is Bar {
  return (
    bar != null &&
    Number.isFinite(bar.high) &&
    Number.isFinite(bar.low) &&
    Number.isFinite(bar.close)
  );
}
