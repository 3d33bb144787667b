/**
 * Assembles agents from a validated configuration.
 */

import type Database from "better-sqlite3";
import { ChatCompletionsClient } from "./ai-client.ts";
import { AutoTrader } from "./auto-trader.ts";
import { HttpCoinPool, type CoinPoolProvider } from "./coin-pool.ts";
import type { AppConfig, TraderSettings } from "./config.ts";
import { getDb } from "./db.ts";
import { SqliteDecisionLog } from "./decision-log.ts";
import { createTrader } from "./exchange.ts";
import { createLogger, defaultLogFile, type Logger } from "./logger.ts";
import { TraderManager } from "./manager.ts";
import { BinanceMarketData, type MarketSnapshotProvider } from "./market.ts";

export interface RuntimeOptions {
  db?: Database.Database;
  verbose?: boolean;
  /** shared across agents when given */
  market?: MarketSnapshotProvider;
  coinPool?: CoinPoolProvider;
}

export function agentLogger(settings: TraderSettings, verbose = false): Logger {
  return createLogger({ file: defaultLogFile(settings.id), verbose, tag: `[${settings.id}]` });
}

export function createCoinPool(config: AppConfig, logger: Logger): HttpCoinPool {
  return new HttpCoinPool({
    apiUrl: config.coinPoolApiUrl || undefined,
    oiTopApiUrl: config.oiTopApiUrl || undefined,
    useDefaultCoins: config.useDefaultCoins,
    customCoins: config.customCoins,
    logger,
  });
}

export function createAgent(settings: TraderSettings, config: AppConfig, opts: RuntimeOptions = {}): AutoTrader {
  const logger = agentLogger(settings, opts.verbose);
  const db = opts.db ?? getDb();
  return new AutoTrader(
    {
      id: settings.id,
      name: settings.name,
      aiModel: settings.ai.provider,
      exchange: settings.exchange.kind,
      initialBalance: settings.initialBalance,
      scanIntervalMinutes: settings.scanIntervalMinutes,
      btcEthLeverage: config.btcEthLeverage,
      altcoinLeverage: config.altcoinLeverage,
      maxDailyLoss: config.maxDailyLoss,
      maxDrawdown: config.maxDrawdown,
      stopTradingMinutes: config.stopTradingMinutes,
    },
    {
      trader: createTrader(settings.exchange, logger),
      market: opts.market ?? new BinanceMarketData({ logger }),
      coinPool: opts.coinPool ?? createCoinPool(config, logger),
      decisionLog: new SqliteDecisionLog(db, settings.id, settings.initialBalance),
      model: new ChatCompletionsClient(settings.ai, { logger }),
      logger,
    },
  );
}

/** One agent per enabled trader. */
export function createManager(config: AppConfig, logger: Logger, opts: RuntimeOptions = {}): TraderManager {
  const manager = new TraderManager(logger);
  for (const t of config.traders) {
    if (!t.enabled) {
      logger.log(`skipping disabled trader ${t.name} (${t.id})`);
      continue;
    }
    manager.addTrader(createAgent(t, config, opts));
  }
  return manager;
}
