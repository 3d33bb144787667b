#!/usr/bin/env node
/**
 * perp-agent CLI: run the agents with the status API, or inspect one agent.
 */

import "dotenv/config";
import { Command } from "commander";
import { startServer, stopServer } from "../../server/index.ts";
import { registerSecret } from "../../server/secrets.ts";
import type { AutoTrader } from "./auto-trader.ts";
import { loadConfig, type AppConfig } from "./config.ts";
import { ConfigurationError, errorMessage } from "./errors.ts";
import { createLogger } from "./logger.ts";
import { createManager } from "./runtime.ts";

const program = new Command();
const logger = createLogger({ file: null });

program
  .name("perp-agent")
  .description("LLM-driven perpetual futures trading agents")
  .option("-c, --config <path>", "Path to config.json", "config.json")
  .option("-v, --verbose", "Print verbose agent logs");

function readConfig(): AppConfig {
  const opts = program.opts<{ config: string }>();
  const config = loadConfig(opts.config, logger);
  for (const t of config.traders) {
    registerSecret("AI_API_KEY", t.ai.apiKey);
    switch (t.exchange.kind) {
      case "binance":
        registerSecret("BINANCE_API_KEY", t.exchange.apiKey);
        registerSecret("BINANCE_SECRET_KEY", t.exchange.secretKey);
        break;
      case "hyperliquid":
        registerSecret("HL_PRIVATE_KEY", t.exchange.privateKey);
        break;
      case "aster":
        registerSecret("ASTER_PRIVATE_KEY", t.exchange.privateKey);
        break;
    }
  }
  return config;
}

function pickAgent(traderId: string): AutoTrader {
  const config = readConfig();
  const manager = createManager(config, logger, { verbose: program.opts<{ verbose?: boolean }>().verbose });
  const agent = manager.getTrader(traderId);
  if (!agent) {
    throw new Error(`unknown trader '${traderId}' (configured: ${manager.getTraderIds().join(", ") || "none"})`);
  }
  return agent;
}

program
  .command("run")
  .description("Start every enabled agent and the status API")
  .action(async () => {
    const config = readConfig();
    const verbose = program.opts<{ verbose?: boolean }>().verbose;
    const manager = createManager(config, logger, { verbose });
    if (manager.getTraderIds().length === 0) {
      throw new ConfigurationError(["no enabled traders"]);
    }
    const server = startServer(manager, config.apiServerPort, logger);

    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) return;
      stopping = true;
      logger.log(`${signal} received, stopping agents after their current cycle`);
      manager
        .stopAll()
        .then(() => stopServer(server))
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error(`shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    manager.startAll();
  });

program
  .command("check-config")
  .description("Validate config.json and list the traders it defines")
  .action(() => {
    const config = readConfig();
    console.log(`config ok: ${config.traders.length} trader(s)`);
    for (const t of config.traders) {
      console.log(
        `  ${t.id}  ${t.name}  ${t.exchange.kind}/${t.ai.provider}  every ${t.scanIntervalMinutes}min` +
          (t.enabled ? "" : "  (disabled)"),
      );
    }
    console.log(`leverage: BTC/ETH ${config.btcEthLeverage}x, altcoins ${config.altcoinLeverage}x`);
    console.log(`API port: ${config.apiServerPort}`);
  });

program
  .command("balance <traderId>")
  .description("Show one agent's account")
  .action(async (traderId: string) => {
    const acct = await pickAgent(traderId).getAccountInfo();
    console.log("Equity:", acct.totalEquity.toFixed(2));
    console.log("Available:", acct.availableBalance.toFixed(2));
    console.log(`PnL: ${acct.totalPnl.toFixed(2)} (${acct.totalPnlPct.toFixed(2)}%)`);
    console.log(`Margin used: ${acct.marginUsed.toFixed(2)} (${acct.marginUsedPct.toFixed(1)}%)`);
  });

program
  .command("positions <traderId>")
  .description("List one agent's open positions")
  .action(async (traderId: string) => {
    const positions = await pickAgent(traderId).getPositions();
    if (positions.length === 0) {
      console.log("No open positions");
      return;
    }
    for (const p of positions) {
      console.log(
        `${p.symbol} ${p.side.toUpperCase()} ${p.quantity} @ ${p.entryPrice} mark ${p.markPrice} ` +
          `${p.leverage}x PnL ${p.unrealizedPnl.toFixed(2)} (${p.unrealizedPnlPct.toFixed(2)}%) liq ${p.liquidationPrice}`,
      );
    }
  });

program
  .command("prompt <traderId>")
  .description("Print the system and user prompts for the current market without calling the model")
  .action(async (traderId: string) => {
    const { system, user } = await pickAgent(traderId).previewPrompt();
    console.log("===== SYSTEM =====\n" + system);
    console.log("\n===== USER =====\n" + user);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
