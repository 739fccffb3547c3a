/**
 * 빗썸 Open API v1 REST 엔드포인트: 여기서만 정의
 */

export const BITHUMB_REST_BASE = 'https://api.bithumb.com';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 마켓 코드 조회 */
export const PUBLIC_MARKET_ALL = '/v1/market/all';

/** GET 분 캔들: unit=1 이면 1분봉 */
export function publicCandlesMinutes(unit: number): string {
  return `/v1/candles/minutes/${unit}`;
}

/** GET 일 캔들 */
export const PUBLIC_CANDLES_DAYS = '/v1/candles/days';

/** GET 현재가 정보 */
export const PUBLIC_TICKER = '/v1/ticker';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** GET 주문 가능 정보 (최소 주문 금액, 호가 단위) */
export const PRIVATE_ORDERS_CHANCE = '/v1/orders/chance';

/** POST 주문하기 */
export const PRIVATE_ORDERS_POST = '/v1/orders';

/** 캔들 API 한 번에 받을 수 있는 최대 개수 */
export const MAX_CANDLE_COUNT = 200;
