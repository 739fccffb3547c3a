import type { AppContext } from './context.js';
import { childLogger } from './logger.js';
import type { PriceFeed } from './market/price-feed.js';
import { CoinGeckoFeed } from './market/coingecko-feed.js';
import { BithumbFeed } from './market/bithumb-feed.js';
import type { Exchange } from './execution/exchange.js';
import { PaperExchange } from './execution/paper-exchange.js';
import { BithumbExchange } from './execution/bithumb-exchange.js';
import { BithumbClient } from './exchange/bithumb/client.js';
import type { HttpSend } from './net/http.js';
import type { RetryPolicy, Sleep } from './net/retry.js';
import type { SizingPolicy } from './execution/sizing.js';
import type { RiskGate } from './risk/risk-gate.js';
import { StateFileError } from './errors.js';
import { loadState, type LoadedState } from './ledger/state-store.js';
import { Ledger } from './ledger/ledger.js';
import { FileLedgerSink } from './ledger/file-sink.js';
import { EquityLog } from './report/equity-log.js';

export interface WiringDeps {
  readonly retry: RetryPolicy;
  /** 테스트에서 HTTP 교체 */
  readonly http?: HttpSend;
  readonly sleep?: Sleep;
}

function bithumbClient(ctx: AppContext, deps: WiringDeps): BithumbClient {
  const { bithumb, feed } = ctx.config;
  return new BithumbClient({
    baseUrl: bithumb.restBaseUrl,
    credentials: bithumb.accessKey && bithumb.secretKey
      ? { accessKey: bithumb.accessKey, secretKey: bithumb.secretKey, secretRaw: bithumb.secretRaw }
      : undefined,
    timeoutMs: feed.timeoutMs,
    log: childLogger(ctx.logger, 'bithumb'),
    ...(deps.http ? { http: deps.http } : {}),
  });
}

export function createFeed(ctx: AppContext, deps: WiringDeps): PriceFeed {
  const { feed, market } = ctx.config;
  const log = childLogger(ctx.logger, 'feed');
  const sleep = deps.sleep ? { sleep: deps.sleep } : {};
  if (feed.id === 'bithumb') {
    return new BithumbFeed(bithumbClient(ctx, deps), market.pair, { retry: deps.retry, log, ...sleep });
  }
  return new CoinGeckoFeed({
    coinId: feed.coinId,
    vsCurrency: feed.vsCurrency,
    apiKey: feed.apiKey,
    timeoutMs: feed.timeoutMs,
    retry: deps.retry,
    log,
    ...(deps.http ? { http: deps.http } : {}),
    ...sleep,
  });
}

/**
 * 페이퍼 모드는 항상 PaperExchange: 거래소가 지정돼 있으면 그 규칙만 빌려 쓴다
 */
export function createExchange(ctx: AppContext, deps: WiringDeps): Exchange {
  const { exchange, runtime, paperVenue } = ctx.config;
  const venue = exchange.id === 'bithumb'
    ? new BithumbExchange(bithumbClient(ctx, deps), {
        retry: deps.retry,
        log: childLogger(ctx.logger, 'exchange'),
        ...(deps.sleep ? { sleep: deps.sleep } : {}),
      })
    : undefined;

  if (runtime.paper || !venue) {
    return new PaperExchange(paperVenue, { ...(venue ? { venue } : {}), now: () => ctx.clock.now() });
  }
  return venue;
}

export function sizingPolicy(ctx: AppContext): SizingPolicy {
  const { sizing, exchange, market } = ctx.config;
  return {
    mode: sizing.mode,
    notional: sizing.notional,
    quantity: sizing.quantity,
    roundToStep: sizing.roundToStep,
    orderType: exchange.orderType === 'limit' ? 'LIMIT' : 'MARKET',
    limitSlippageBps: exchange.limitSlippageBps,
    minOrderAmountCheck: market.minOrderAmountCheck,
    minOrderNotionalCheck: market.minOrderNotionalCheck,
  };
}

/**
 * 상태 파일 → 원장
 * 새로 만들었거나 날짜가 바뀌었으면 바로 저장. 깨진 파일은 CRITICAL 감사 기록 후 그대로 던진다.
 */
export function openLedger(ctx: AppContext, risk: RiskGate): Ledger {
  const { files } = ctx.config;
  let loaded: LoadedState;
  try {
    loaded = loadState(files.state, ctx.clock.now());
  } catch (err) {
    if (err instanceof StateFileError) {
      ctx.audit.critical('state', 'STATE_FILE_INVALID', err.message);
    }
    throw err;
  }

  const ledger = new Ledger(loaded.state, risk, new FileLedgerSink(files.state, new EquityLog(files.equity)));
  if (!ledger.repairStartOfDay() && (loaded.created || loaded.rolledOver)) ledger.flush();
  if (loaded.rolledOver) {
    childLogger(ctx.logger, 'ledger').info({ day_key: ledger.state.day_key }, 'daily_rollover');
  }
  return ledger;
}
