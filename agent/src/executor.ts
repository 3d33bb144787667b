/**
 * Executes a cycle's validated decisions against one Trader. Each decision is
 * isolated: its failure is recorded and the next one still runs.
 */

import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import { unrealizedPnlPct } from "./context.ts";
import { findPosition, type Trader } from "./trader.ts";
import type { ActionRecord, CooldownState, PositionSide, TradingContext, ValidDecision } from "./types.ts";

/** PnL% beyond which a close counts as a stop (below −1) or a take-profit (above +1). */
export const CLOSE_CLASSIFY_PCT = 1;

export interface ExecutorOptions {
  trader: Trader;
  logger: Logger;
  /** pause after each successful decision; default 1000 ms */
  settleMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface ExecutionOutcome {
  actions: ActionRecord[];
  executionLog: string[];
  cooldown: CooldownState;
}

type CloseKind = "stop" | "take_profit" | "neutral";

export function classifyClose(pnlPct: number): CloseKind {
  if (pnlPct < -CLOSE_CLASSIFY_PCT) return "stop";
  if (pnlPct > CLOSE_CLASSIFY_PCT) return "take_profit";
  return "neutral";
}

/** Symbols a new position may be opened in: pool candidates that passed the liquidity filter. */
export function openableSymbols(ctx: Pick<TradingContext, "candidates" | "marketSnapshots">): Set<string> {
  return new Set(ctx.candidates.map((c) => c.symbol).filter((s) => ctx.marketSnapshots.has(s)));
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class DecisionExecutor {
  private readonly trader: Trader;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;

  constructor(private readonly opts: ExecutorOptions) {
    this.trader = opts.trader;
    this.logger = opts.logger;
    this.sleep = opts.sleep ?? defaultSleep;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** `decisions` must already be in execution order. */
  async executeAll(decisions: ValidDecision[], ctx: TradingContext): Promise<ExecutionOutcome> {
    const cooldown: CooldownState = { ...ctx.cooldown };
    const allowed = openableSymbols(ctx);
    const actions: ActionRecord[] = [];
    const executionLog: string[] = [];

    for (const d of decisions) {
      const record: ActionRecord = {
        action: d.action,
        symbol: d.symbol,
        quantity: 0,
        leverage: d.leverage,
        price: 0,
        orderId: "",
        timestamp: this.clock().toISOString(),
        success: false,
        error: "",
      };
      try {
        await this.execute(d, record, allowed, cooldown);
        record.success = true;
        executionLog.push(`✓ ${d.symbol} ${d.action} succeeded`);
        await this.sleep(this.opts.settleMs ?? 1_000);
      } catch (err) {
        record.error = errorMessage(err);
        executionLog.push(`✗ ${d.symbol} ${d.action} failed: ${record.error}`);
        this.logger.error(`${d.symbol} ${d.action} failed: ${record.error}`);
      }
      actions.push(record);
    }
    return { actions, executionLog, cooldown };
  }

  private async execute(
    d: ValidDecision,
    record: ActionRecord,
    allowed: Set<string>,
    cooldown: CooldownState,
  ): Promise<void> {
    switch (d.action) {
      case "open_long":
      case "open_short":
        if (!allowed.has(d.symbol)) {
          throw new Error(`${d.symbol} is not in the candidate pool; refusing to open`);
        }
        await this.open(d, d.action === "open_long" ? "long" : "short", record, cooldown);
        return;
      case "close_long":
      case "close_short":
        await this.close(d, d.action === "close_long" ? "long" : "short", record, cooldown);
        return;
      case "hold":
      case "wait":
        this.logger.verbose(`${d.symbol || "-"} ${d.action}: ${d.reasoning}`);
        return;
    }
  }

  private async open(d: ValidDecision, side: PositionSide, record: ActionRecord, cooldown: CooldownState): Promise<void> {
    // fresh query: never stack onto an existing same-side position
    const existing = findPosition(await this.trader.getPositions(), d.symbol, side);
    if (existing) {
      throw new Error(`${d.symbol} already has a ${side} position; issue close_${side} first`);
    }

    const price = await this.trader.getMarketPrice(d.symbol);
    const quantity = d.positionSizeUsd / price;
    record.price = price;
    record.quantity = quantity;

    this.logger.log(`opening ${side} ${d.symbol}: ${d.positionSizeUsd.toFixed(2)} USDT @ ~${price} (${d.leverage}x)`);
    const order =
      side === "long"
        ? await this.trader.openLong(d.symbol, quantity, d.leverage)
        : await this.trader.openShort(d.symbol, quantity, d.leverage);
    record.orderId = order.orderId;
    record.quantity = order.quantity;
    cooldown.lastEnterTime = this.clock().toISOString();

    // a missing stop or target leaves the position open with less protection
    try {
      await this.trader.setStopLoss(d.symbol, side, order.quantity, d.stopLoss);
    } catch (err) {
      this.logger.warn(`stop-loss for ${d.symbol} not placed: ${errorMessage(err)}`);
    }
    try {
      await this.trader.setTakeProfit(d.symbol, side, order.quantity, d.takeProfit);
    } catch (err) {
      this.logger.warn(`take-profit for ${d.symbol} not placed: ${errorMessage(err)}`);
    }
  }

  private async close(d: ValidDecision, side: PositionSide, record: ActionRecord, cooldown: CooldownState): Promise<void> {
    const pos = findPosition(await this.trader.getPositions(), d.symbol, side);
    const kind = pos ? classifyClose(unrealizedPnlPct(side, pos.entryPrice, pos.markPrice)) : "neutral";
    record.price = pos?.markPrice ?? 0;

    const outcome =
      side === "long" ? await this.trader.closeLong(d.symbol, 0) : await this.trader.closeShort(d.symbol, 0);
    if (outcome.kind === "no_position") {
      throw new Error(`no open ${side} position in ${d.symbol}`);
    }
    record.orderId = outcome.order.orderId;
    record.quantity = outcome.order.quantity;
    this.logger.log(`closed ${side} ${d.symbol} (${kind})`);

    const now = this.clock().toISOString();
    if (kind === "stop") {
      cooldown.lastStopTime = now;
      cooldown.consecutiveLosses += 1;
    } else if (kind === "take_profit") {
      cooldown.lastTakeProfitTime = now;
      cooldown.consecutiveLosses = 0;
    }
  }
}
