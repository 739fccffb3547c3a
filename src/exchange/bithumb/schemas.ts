import { z } from 'zod';

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export const marketAllSchema = z.array(
  z.object({
    market: z.string(),
    korean_name: z.string().optional(),
    english_name: z.string().optional(),
    market_warning: z.string().optional(),
  }),
);

/** 캔들 행. 깨진 행은 호출부에서 행 단위로 건너뛴다 */
export const candleSchema = z.object({
  market: z.string().optional(),
  candle_date_time_utc: z.string(),
  opening_price: z.number(),
  high_price: z.number(),
  low_price: z.number(),
  trade_price: z.number(),
  timestamp: z.number().optional(),
});
export const candlesSchema = z.array(z.unknown());

export const tickerSchema = z.array(
  z.object({
    market: z.string(),
    trade_price: z.number(),
    timestamp: z.number().optional(),
  }),
);

// ─── PRIVATE ──────────────────────────────────────────────────────────────

const orderSideInfoSchema = z.object({
  currency: z.string(),
  price_unit: z.string().nullable().optional(),
  min_total: z.union([z.string(), z.number()]),
});

/** GET /v1/orders/chance */
export const ordersChanceSchema = z.object({
  bid_fee: z.string().optional(),
  ask_fee: z.string().optional(),
  market: z.object({
    id: z.string().optional(),
    state: z.string().optional(),
    bid: orderSideInfoSchema.optional(),
    ask: orderSideInfoSchema.optional(),
    max_total: z.string().optional(),
  }),
});

/** POST /v1/orders 성공 응답 (uuid 필수) */
export const orderPlacedSchema = z
  .object({
    uuid: z.string(),
    side: z.string().optional(),
    ord_type: z.string().optional(),
    state: z.string().optional(),
  })
  .passthrough();

/** 에러 응답: { error: { name, message } } */
export const errorBodySchema = z.object({
  error: z.object({
    name: z.union([z.string(), z.number()]).optional(),
    message: z.string().optional(),
  }),
});
