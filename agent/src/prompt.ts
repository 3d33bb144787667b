/**
 * Prompt compilation: static rules with interpolated hard limits for the system
 * message, and a deterministic data report for the user message.
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { errorMessage } from "./errors.ts";
import { silentLogger, type Logger } from "./logger.ts";
import { formatSnapshot } from "./market.ts";
import type { TradingContext } from "./types.ts";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../prompts/system.txt", import.meta.url));

const BUILTIN_RULES = `You are a professional crypto derivatives trader running autonomously on a perpetual futures account.

# Objective

Maximize the Sharpe ratio, not the number of trades. Most cycles should end in \`wait\` or \`hold\`;
open only on strong, multi-signal setups with confidence >= 75. Shorts are as valid as longs.
`;

/** Minutes each event keeps the agent in cooldown. */
export const COOLDOWN_MINUTES = { enter: 9, stop: 6, takeProfit: 3 } as const;

export interface SystemPromptOptions {
  accountEquity: number;
  btcEthLeverage: number;
  altcoinLeverage: number;
  templatePath?: string;
  logger?: Logger;
}

export function loadBaseRules(templatePath: string = DEFAULT_TEMPLATE_PATH, logger: Logger = silentLogger): string {
  try {
    return readFileSync(templatePath, "utf-8");
  } catch (err) {
    logger.warn(`prompt template ${templatePath} unavailable, using built-in rules: ${errorMessage(err)}`);
    return BUILTIN_RULES;
  }
}

export function hardConstraints(equity: number, btcEthLeverage: number, altcoinLeverage: number): string {
  const n = (v: number) => v.toFixed(0);
  return `
# Hard constraints (risk control)

1. Reward:risk ratio must be >= 1:3 (risk 1% to make 3% or more)
2. At most 3 symbols held at once (quality over quantity)
3. Position value per symbol: altcoins ${n(equity * 0.8)}-${n(equity * 1.5)} USDT (${altcoinLeverage}x leverage) | BTC/ETH ${n(equity * 5)}-${n(equity * 10)} USDT (${btcEthLeverage}x leverage)
4. Total margin usage <= 90%
`;
}

export function outputFormat(equity: number, btcEthLeverage: number): string {
  return `
# Output format

Step 1: reasoning (plain text)
Briefly walk through your analysis.

Step 2: JSON decision array

\`\`\`json
[
  {"symbol": "BTCUSDT", "action": "open_short", "leverage": ${btcEthLeverage}, "position_size_usd": ${(equity * 5).toFixed(0)}, "stop_loss": 97000, "take_profit": 91000, "confidence": 85, "risk_usd": 300, "reasoning": "down-trend + MACD bearish cross"},
  {"symbol": "ETHUSDT", "action": "close_long", "reasoning": "target reached"}
]
\`\`\`

Fields:
- \`action\`: open_long | open_short | close_long | close_short | hold | wait
- \`confidence\`: 0-100 (>= 75 to open)
- required when opening: leverage, position_size_usd, stop_loss, take_profit, confidence, risk_usd, reasoning
`;
}

export function buildSystemPrompt(opts: SystemPromptOptions): string {
  return (
    loadBaseRules(opts.templatePath, opts.logger) +
    hardConstraints(opts.accountEquity, opts.btcEthLeverage, opts.altcoinLeverage) +
    outputFormat(opts.accountEquity, opts.btcEthLeverage)
  );
}

function minutesSince(iso: string | null, now: Date): number | null {
  if (!iso) return null;
  const t = Date.parse(iso);
  return Number.isNaN(t) ? null : (now.getTime() - t) / 60_000;
}

/** "cooling" while any of the enter/stop/take-profit windows is still open. */
export function cooldownStatus(ctx: Pick<TradingContext, "cooldown">, now: Date): "cooling" | "ok" {
  const windows: Array<[string | null, number]> = [
    [ctx.cooldown.lastEnterTime, COOLDOWN_MINUTES.enter],
    [ctx.cooldown.lastStopTime, COOLDOWN_MINUTES.stop],
    [ctx.cooldown.lastTakeProfitTime, COOLDOWN_MINUTES.takeProfit],
  ];
  for (const [iso, limit] of windows) {
    const elapsed = minutesSince(iso, now);
    if (elapsed !== null && elapsed < limit) return "cooling";
  }
  return "ok";
}

function pctChange(series: number[]): string {
  if (series.length === 0 || !(series[0] > 0)) return "N/A";
  const pct = ((series[series.length - 1] - series[0]) / series[0]) * 100;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(2)}%`;
}

const signed = (v: number, digits: number) => `${v >= 0 ? "+" : ""}${v.toFixed(digits)}`;
const list = (values: number[], digits: number) => `[${values.map((v) => v.toFixed(digits)).join(", ")}]`;

/** Mean absolute bar-to-bar change of the long-timeframe prices, in percent. */
export function averageAbsChangePct(prices: number[]): number | null {
  const changes: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] > 0) changes.push(Math.abs(((prices[i] - prices[i - 1]) / prices[i - 1]) * 100));
  }
  return changes.length > 0 ? changes.reduce((a, b) => a + b, 0) / changes.length : null;
}

export function holdingDuration(firstSeenAt: number, now: Date): string {
  if (!(firstSeenAt > 0)) return "";
  const minutes = Math.floor((now.getTime() - firstSeenAt) / 60_000);
  if (minutes < 60) return ` | holding ${minutes}min`;
  return ` | holding ${Math.floor(minutes / 60)}h${minutes % 60}min`;
}

export function buildUserPrompt(ctx: TradingContext): string {
  const now = ctx.currentTime;
  const out: string[] = [];

  out.push(`**Time**: ${now.toISOString()} | **Cycle**: #${ctx.cycle} | **Runtime**: ${ctx.runtimeMinutes} min\n`);

  const btc = ctx.marketSnapshots.get("BTCUSDT");
  if (btc) {
    out.push(
      `**BTC**: ${btc.currentPrice.toFixed(2)} (${btc.intervals.medium}: ${pctChange(btc.medium.midPrices)}, ` +
        `${btc.intervals.long}: ${pctChange(btc.long.midPrices)}) | MACD: ${btc.currentMacd.toFixed(4)} | ` +
        `RSI: ${btc.currentRsi7.toFixed(2)}\n`,
    );
    out.push("\n**BTC multi-timeframe indicators** (confirm the BTC regime before trading altcoins):\n\n");
    if (btc.short.macd.length > 0) out.push(`btc_macd_short (${btc.intervals.short}): ${list(btc.short.macd, 4)}\n`);
    if (btc.medium.macd.length > 0) out.push(`btc_macd_medium (${btc.intervals.medium}): ${list(btc.medium.macd, 4)}\n`);
    if (btc.long.macd.length > 0) out.push(`btc_macd_long (${btc.intervals.long}): ${list(btc.long.macd, 4)}\n`);
    if (btc.short.midPrices.length > 0) out.push(`btc_price (short): ${list(btc.short.midPrices, 2)}\n`);
    const vol = averageAbsChangePct(btc.long.midPrices);
    if (vol !== null) out.push(`btc_daily_volatility_percent: ${vol.toFixed(2)}%\n`);
    out.push("\n");
  }

  const a = ctx.account;
  const availablePct = a.totalEquity > 0 ? (a.availableBalance / a.totalEquity) * 100 : 0;
  out.push(
    `**Account**: equity ${a.totalEquity.toFixed(2)} | available ${a.availableBalance.toFixed(2)} (${availablePct.toFixed(1)}%) | ` +
      `PnL ${signed(a.totalPnlPct, 2)}% | margin ${a.marginUsedPct.toFixed(1)}% | positions ${a.positionCount}\n`,
  );

  out.push("\n**Trading state** (check before deciding):\n\n");
  if (ctx.positions.length > 0) {
    for (const p of ctx.positions) {
      out.push(
        `current_position_${p.symbol}: {side: ${p.side}, entry_price: ${p.entryPrice.toFixed(4)}, size_coins: ${p.quantity.toFixed(4)}}\n`,
      );
    }
  } else {
    out.push("current_position: {side: null, entry_price: null, size_coins: null}\n");
  }
  const cd = ctx.cooldown;
  out.push(`last_enter_time: ${cd.lastEnterTime ?? "null"}\n`);
  out.push(`last_stop_time: ${cd.lastStopTime ?? "null"}\n`);
  out.push(`last_take_profit_time: ${cd.lastTakeProfitTime ?? "null"}\n`);
  out.push(`consecutive_losses_count: ${cd.consecutiveLosses}\n`);
  const dailyLoss = cd.dailyLossPercent > 0 ? cd.dailyLossPercent : Math.abs(Math.min(0, a.totalPnlPct));
  out.push(`daily_loss_percent: ${dailyLoss.toFixed(2)}%\n`);
  out.push(`cooldown_status: ${cooldownStatus(ctx, now)}\n`);
  out.push("\n");

  if (ctx.positions.length > 0) {
    out.push("## Open positions\n");
    ctx.positions.forEach((p, i) => {
      out.push(
        `${i + 1}. ${p.symbol} ${p.side.toUpperCase()} | entry ${p.entryPrice.toFixed(4)} mark ${p.markPrice.toFixed(4)} | ` +
          `PnL ${signed(p.unrealizedPnlPct, 2)}% | leverage ${p.leverage}x | margin ${p.marginUsed.toFixed(0)} | ` +
          `liquidation ${p.liquidationPrice.toFixed(4)}${holdingDuration(p.firstSeenAt, now)}\n`,
      );
      const snap = ctx.marketSnapshots.get(p.symbol);
      if (snap) out.push(formatSnapshot(snap), "\n");
    });
  } else {
    out.push("**Open positions**: none\n");
  }

  const blocks: string[] = [];
  for (const coin of ctx.candidates) {
    const snap = ctx.marketSnapshots.get(coin.symbol);
    if (!snap) continue;
    let tags = "";
    if (coin.sources.length > 1) tags = " (AI500 + OI_Top dual signal)";
    else if (coin.sources.length === 1 && coin.sources[0] === "oi_top") tags = " (OI_Top open-interest growth)";
    blocks.push(`### ${blocks.length + 1}. ${coin.symbol}${tags}\n\n${formatSnapshot(snap)}\n`);
  }
  out.push(`## Candidates (${blocks.length})\n\n`, ...blocks);
  out.push("\n");

  if (ctx.performance) {
    out.push(`## Sharpe ratio: ${ctx.performance.sharpeRatio.toFixed(2)}\n\n`);
  }

  out.push("---\n\n");
  out.push("Now analyse and output your decision (reasoning + JSON).\n");
  return out.join("");
}

export interface CompiledPrompt {
  system: string;
  user: string;
}

export function buildPrompt(ctx: TradingContext, opts: { templatePath?: string; logger?: Logger } = {}): CompiledPrompt {
  return {
    system: buildSystemPrompt({
      accountEquity: ctx.account.totalEquity,
      btcEthLeverage: ctx.btcEthLeverage,
      altcoinLeverage: ctx.altcoinLeverage,
      templatePath: opts.templatePath,
      logger: opts.logger,
    }),
    user: buildUserPrompt(ctx),
  };
}
