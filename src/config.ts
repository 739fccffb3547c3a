import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { normalizeVsCurrency } from './market/coingecko/currency.js';

export type ExchangeId = 'paper' | 'bithumb';
export type FeedId = 'coingecko' | 'bithumb';
export type SizingMode = 'notional' | 'quantity';
export type ConfigOrderType = 'market' | 'limit';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** 'true'/'false'/'1'/'0'/'yes'/'no' → boolean */
const envBool = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const s = v.trim().toLowerCase();
      if (s === 'true' || s === '1' || s === 'yes') return true;
      if (s === 'false' || s === '0' || s === 'no') return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected boolean, got "${v}"` });
      return z.NEVER;
    });

const envNum = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === '') return fallback;
      const n = Number(v);
      if (!Number.isFinite(n)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected number, got "${v}"` });
        return z.NEVER;
      }
      return n;
    });

const envStr = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : v.trim()));

const envSchema = z.object({
  EXCHANGE_ID: envStr('paper').pipe(z.enum(['paper', 'bithumb'])),
  ORDER_TYPE: envStr('market').transform((v) => v.toLowerCase()).pipe(z.enum(['market', 'limit'])),
  LIMIT_SLIPPAGE_BPS: envNum(10).pipe(z.number().min(0)),
  PAIR: envStr('BTC/KRW').pipe(z.string().regex(/^[A-Z0-9]+\/[A-Z0-9]+$/, 'expected BASE/QUOTE, e.g. BTC/KRW')),

  FEED: envStr('coingecko').pipe(z.enum(['coingecko', 'bithumb'])),
  COINGECKO_COIN_ID: envStr('bitcoin'),
  // 비우면 PAIR의 호가 통화
  COINGECKO_VS_CURRENCY: envStr(''),
  COINGECKO_API_KEY: envStr(''),
  FEED_TIMEOUT_SECONDS: envNum(15).pipe(z.number().positive()),

  POLL_INTERVAL_SECONDS: envNum(60).pipe(z.number().positive()),
  ATR_WINDOW: envNum(14).pipe(z.number().int().min(1)),
  OHLC_DAYS: envNum(30).pipe(z.number().int().min(1)),
  MINUTE_DAYS: envNum(1).pipe(z.number().int().min(1)),

  ATR_K: envNum(1.5).pipe(z.number().positive()),
  STOP_LOSS_ATR: envNum(1.0).pipe(z.number().min(0)),
  STOP_ENABLED: envBool(true),
  TAKER_FEE_PCT: envNum(0.1).pipe(z.number().min(0)),

  STATE_FILE: envStr('./data/state.json'),
  EQUITY_FILE: envStr('./reports/equity.csv'),
  AUDIT_DB_PATH: envStr('./data/audit.db'),

  SIZING_MODE: envStr('notional').pipe(z.enum(['notional', 'quantity'])),
  SIZING_NOTIONAL: envNum(10).pipe(z.number().min(0)),
  SIZING_QUANTITY: envNum(0.0001).pipe(z.number().min(0)),
  ROUND_TO_STEP: envBool(true),
  MIN_ORDER_AMOUNT_CHECK: envBool(true),
  MIN_ORDER_NOTIONAL_CHECK: envBool(true),

  MAX_TRADES_PER_DAY: envNum(10).pipe(z.number().int().min(0)),
  COOLDOWN_SECONDS: envNum(60).pipe(z.number().min(0)),
  MAX_DAILY_LOSS_PCT: envNum(3).pipe(z.number().min(0)),
  START_EQUITY: envNum(1000).pipe(z.number().min(0)),

  PAPER: envBool(true),
  ONCE: envBool(false),
  LOG_LEVEL: envStr('info').transform((v) => v.toLowerCase()).pipe(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  ),

  PAPER_MIN_AMOUNT: envNum(0).pipe(z.number().min(0)),
  PAPER_MIN_COST: envNum(0).pipe(z.number().min(0)),
  PAPER_AMOUNT_DECIMALS: envNum(8).pipe(z.number().int().min(0).max(16)),
  PAPER_PRICE_DECIMALS: envNum(2).pipe(z.number().int().min(0).max(16)),

  BITHUMB_ACCESS_KEY: envStr(''),
  BITHUMB_SECRET_KEY: envStr(''),
  BITHUMB_SECRET_RAW: envBool(false),
  BITHUMB_BASE_URL: envStr('https://api.bithumb.com').pipe(z.string().url()),

  MAX_RETRIES: envNum(4).pipe(z.number().int().min(1)),
  RETRY_BASE_MS: envNum(1000).pipe(z.number().min(0)),
  RETRY_MAX_MS: envNum(30_000).pipe(z.number().min(0)),
});

export interface AppConfig {
  readonly exchange: {
    readonly id: ExchangeId;
    readonly orderType: ConfigOrderType;
    readonly limitSlippageBps: number;
  };
  readonly market: {
    /** BASE/QUOTE, 예: BTC/KRW */
    readonly pair: string;
    readonly minOrderAmountCheck: boolean;
    readonly minOrderNotionalCheck: boolean;
  };
  readonly feed: {
    readonly id: FeedId;
    readonly coinId: string;
    readonly vsCurrency: string;
    readonly apiKey: string | null;
    readonly timeoutMs: number;
    readonly pollIntervalSeconds: number;
    readonly atrWindow: number;
    readonly ohlcDays: number;
    readonly minuteDays: number;
  };
  readonly strategy: {
    readonly k: number;
    readonly stopLossAtr: number;
    readonly stopEnabled: boolean;
    readonly takerFeePct: number;
  };
  readonly sizing: {
    readonly mode: SizingMode;
    readonly notional: number;
    readonly quantity: number;
    readonly roundToStep: boolean;
  };
  readonly risk: {
    readonly maxTradesPerDay: number;
    readonly cooldownSeconds: number;
    readonly maxDailyLossPct: number;
    readonly startEquity: number;
  };
  readonly paperVenue: {
    readonly minAmount: number;
    readonly minCost: number;
    readonly amountDecimals: number;
    readonly priceDecimals: number;
  };
  readonly bithumb: {
    readonly accessKey: string;
    readonly secretKey: string;
    /** Secret을 base64 디코딩 없이 그대로 서명에 사용 */
    readonly secretRaw: boolean;
    readonly restBaseUrl: string;
  };
  readonly retry: {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
  };
  readonly files: {
    readonly state: string;
    readonly equity: string;
    readonly auditDb: string;
  };
  readonly runtime: {
    readonly paper: boolean;
    readonly once: boolean;
    readonly logLevel: LogLevel;
  };
}

export interface CliOverrides {
  readonly paper?: boolean;
  readonly once?: boolean;
}

/**
 * 환경변수 → AppConfig
 * 잘못된 필드는 한꺼번에 모아 ConfigError로 던진다.
 */
export function parseConfig(env: Record<string, string | undefined>, overrides: CliOverrides = {}): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  const paper = e.EXCHANGE_ID === 'paper' ? true : (overrides.paper ?? e.PAPER);
  if (!paper && e.EXCHANGE_ID === 'bithumb' && (!e.BITHUMB_ACCESS_KEY || !e.BITHUMB_SECRET_KEY)) {
    throw new ConfigError(['BITHUMB_ACCESS_KEY/BITHUMB_SECRET_KEY: required for live trading']);
  }
  // 피드 가격이 곧 주문/손익 통화이므로 호가 통화와 같아야 한다
  const quote = e.PAIR.split('/')[1] ?? '';
  const vsCurrency = e.COINGECKO_VS_CURRENCY || quote.toLowerCase();
  if (e.FEED === 'coingecko' && normalizeVsCurrency(vsCurrency) !== normalizeVsCurrency(quote)) {
    throw new ConfigError([
      `COINGECKO_VS_CURRENCY: ${vsCurrency} does not match the quote currency of PAIR ${e.PAIR}`,
    ]);
  }
  if (e.SIZING_MODE === 'notional' && e.SIZING_NOTIONAL <= 0) {
    throw new ConfigError(['SIZING_NOTIONAL: must be > 0 in notional mode']);
  }
  if (e.SIZING_MODE === 'quantity' && e.SIZING_QUANTITY <= 0) {
    throw new ConfigError(['SIZING_QUANTITY: must be > 0 in quantity mode']);
  }

  return Object.freeze({
    exchange: {
      id: e.EXCHANGE_ID,
      orderType: e.ORDER_TYPE,
      limitSlippageBps: e.LIMIT_SLIPPAGE_BPS,
    },
    market: {
      pair: e.PAIR,
      minOrderAmountCheck: e.MIN_ORDER_AMOUNT_CHECK,
      minOrderNotionalCheck: e.MIN_ORDER_NOTIONAL_CHECK,
    },
    feed: {
      id: e.FEED,
      coinId: e.COINGECKO_COIN_ID,
      vsCurrency,
      apiKey: e.COINGECKO_API_KEY || null,
      timeoutMs: e.FEED_TIMEOUT_SECONDS * 1000,
      pollIntervalSeconds: e.POLL_INTERVAL_SECONDS,
      atrWindow: e.ATR_WINDOW,
      ohlcDays: e.OHLC_DAYS,
      minuteDays: e.MINUTE_DAYS,
    },
    strategy: {
      k: e.ATR_K,
      stopLossAtr: e.STOP_LOSS_ATR,
      stopEnabled: e.STOP_ENABLED,
      takerFeePct: e.TAKER_FEE_PCT,
    },
    sizing: {
      mode: e.SIZING_MODE,
      notional: e.SIZING_NOTIONAL,
      quantity: e.SIZING_QUANTITY,
      roundToStep: e.ROUND_TO_STEP,
    },
    risk: {
      maxTradesPerDay: e.MAX_TRADES_PER_DAY,
      cooldownSeconds: e.COOLDOWN_SECONDS,
      maxDailyLossPct: e.MAX_DAILY_LOSS_PCT,
      startEquity: e.START_EQUITY,
    },
    paperVenue: {
      minAmount: e.PAPER_MIN_AMOUNT,
      minCost: e.PAPER_MIN_COST,
      amountDecimals: e.PAPER_AMOUNT_DECIMALS,
      priceDecimals: e.PAPER_PRICE_DECIMALS,
    },
    bithumb: {
      accessKey: e.BITHUMB_ACCESS_KEY,
      secretKey: e.BITHUMB_SECRET_KEY,
      secretRaw: e.BITHUMB_SECRET_RAW,
      restBaseUrl: e.BITHUMB_BASE_URL,
    },
    retry: {
      maxAttempts: e.MAX_RETRIES,
      baseDelayMs: e.RETRY_BASE_MS,
      maxDelayMs: e.RETRY_MAX_MS,
    },
    files: {
      state: e.STATE_FILE,
      equity: e.EQUITY_FILE,
      auditDb: e.AUDIT_DB_PATH,
    },
    runtime: {
      paper,
      once: overrides.once === true ? true : e.ONCE,
      logLevel: e.LOG_LEVEL,
    },
  });
}

/**
 * .env 로드 후 process.env 기준으로 파싱
 * envFile 지정 시 그 파일만 읽는다 (cwd .env 무시)
 */
export function loadConfig(opts: { envFile?: string; overrides?: CliOverrides } = {}): AppConfig {
  if (opts.envFile) {
    const res = dotenv.config({ path: opts.envFile });
    if (res.error) {
      throw new ConfigError([`--env-file: cannot read ${opts.envFile} (${res.error.message})`]);
    }
  } else {
    dotenv.config();
  }
  return parseConfig(process.env, opts.overrides);
}
