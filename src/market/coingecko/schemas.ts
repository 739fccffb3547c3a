import { z } from 'zod';

/** GET /simple/price → { [id]: { [vs]: price } } */
export const simplePriceSchema = z.record(z.record(z.number().nullable()));

/** GET /coins/markets */
export const coinsMarketsSchema = z.array(
  z.object({
    id: z.string().optional(),
    current_price: z.number().nullable().optional(),
  }),
);

/** GET /coins/{id} (market_data만 사용) */
export const coinDetailSchema = z.object({
  market_data: z
    .object({
      current_price: z.record(z.number().nullable()).optional(),
    })
    .nullable()
    .optional(),
});

/** GET /coins/{id}/ohlc → [[ms, o, h, l, c], ...]. 행 단위 검증은 ohlcRowSchema */
export const ohlcSchema = z.array(z.unknown());
export const ohlcRowSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number()]);

/** GET /coins/{id}/market_chart → { prices: [[ms, price], ...] } */
export const marketChartSchema = z.object({
  prices: z.array(z.unknown()).nullable().optional(),
});
export const pricePointRowSchema = z.tuple([z.number(), z.number()]).rest(z.unknown());
