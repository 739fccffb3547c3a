#!/usr/bin/env node
import { loadConfig } from './config.js';
import { parseArgs } from './cli.js';
import { createLogger, childLogger } from './logger.js';
import { ConfigError } from './errors.js';
import { openDatabase } from './db/database.js';
import { AuditLog } from './safety/audit-log.js';
import { systemClock, type AppContext } from './context.js';
import { createRetryPolicy } from './net/retry.js';
import { createFeed, createExchange, openLedger, sizingPolicy } from './app.js';
import { AtrBandStrategy } from './strategy/atr-band.js';
import { RiskGate } from './risk/risk-gate.js';
import { resolveSizingAdapter } from './execution/sizing.js';
import { TradingLoop } from './engine/trading-loop.js';
import { seedRefPrice } from './engine/seed-ref-price.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({ ...(args.envFile ? { envFile: args.envFile } : {}), overrides: args.overrides });
  const logger = createLogger(config.runtime.logLevel);
  const log = childLogger(logger, 'main');

  // ── 공용 컨텍스트 ──
  const db = openDatabase(config.files.auditDb, childLogger(logger, 'db'));
  const audit = new AuditLog(db, config.runtime.paper ? 'PAPER' : 'LIVE');
  const ctx: AppContext = { config, logger, audit, clock: systemClock };

  try {
    const retry = createRetryPolicy(config.retry);
    const feed = createFeed(ctx, { retry });

    if (args.seedRefPrice) {
      await seedRefPrice(feed, config.files.state, { now: ctx.clock.now(), log });
      return;
    }

    const exchange = createExchange(ctx, { retry });
    const pair = config.market.pair;
    const valid = await exchange.validatePair(pair);
    if (!valid.ok) throw new ConfigError([`PAIR: ${valid.reason}`]);

    // ── 상태 로드 ──
    const risk = new RiskGate({ ...config.risk, takerFeePct: config.strategy.takerFeePct });
    const ledger = openLedger(ctx, risk);

    const strategy = new AtrBandStrategy({
      k: config.strategy.k,
      stopEnabled: config.strategy.stopEnabled,
      stopLossAtr: config.strategy.stopLossAtr,
    });
    const sizing = resolveSizingAdapter(exchange, sizingPolicy(ctx));

    const loop = new TradingLoop(ctx, { feed, exchange, strategy, risk, ledger, sizing });

    log.info({
      pair,
      exchange: exchange.id,
      feed: feed.name,
      paper: config.runtime.paper,
      once: config.runtime.once,
      order_type: config.exchange.orderType,
      sizing: `${config.sizing.mode}/${sizing.unit}`,
      mode: ledger.state.mode,
      ref_price: ledger.state.ref_price,
    }, 'bot_start');
    audit.info('main', 'BOT_STARTED', { pair, exchange: exchange.id, feed: feed.name });

    // ── Graceful shutdown: 진행 중인 틱은 마치고 종료 ──
    const onSignal = (signal: NodeJS.Signals): void => {
      log.info({ signal }, 'Shutdown requested');
      loop.stop();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    await loop.run();
  } finally {
    db.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
