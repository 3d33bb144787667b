/**
 * One autonomous agent: a cycle loop of risk check → context → model →
 * parse → validate → order → execute → record, at most one cycle in flight.
 */

import type { AiProvider, ModelClient } from "./ai-client.ts";
import type { CoinPoolProvider } from "./coin-pool.ts";
import { ContextBuilder, normalizePosition, restoreCooldown } from "./context.ts";
import type { DecisionLogStore, NewDecisionRecord } from "./decision-log.ts";
import { MalformedResponse, errorMessage, type ExchangeName } from "./errors.ts";
import { DecisionExecutor } from "./executor.ts";
import { minutesToInterval } from "./intervals.ts";
import type { Logger } from "./logger.ts";
import type { MarketSnapshotProvider } from "./market.ts";
import { parseFullDecision } from "./parser.ts";
import { buildPrompt, type CompiledPrompt } from "./prompt.ts";
import { sortDecisions } from "./scheduler.ts";
import { sideOf, type Trader } from "./trader.ts";
import type {
  CooldownState,
  Decision,
  DecisionRecord,
  PositionInfo,
  TradingContext,
  ValidDecision,
} from "./types.ts";
import { validateDecisions } from "./validator.ts";

export interface AutoTraderConfig {
  id: string;
  name: string;
  aiModel: AiProvider;
  exchange: ExchangeName;
  initialBalance: number;
  scanIntervalMinutes: number;
  btcEthLeverage: number;
  altcoinLeverage: number;
  /** percent of day-start equity; 0 disables */
  maxDailyLoss: number;
  /** percent below peak equity; 0 disables */
  maxDrawdown: number;
  stopTradingMinutes: number;
}

export interface AutoTraderDeps {
  trader: Trader;
  market: MarketSnapshotProvider;
  coinPool: CoinPoolProvider;
  decisionLog: DecisionLogStore;
  model: ModelClient;
  logger: Logger;
  templatePath?: string;
  /** pause after each successful decision */
  settleMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface TraderStatus {
  traderId: string;
  traderName: string;
  aiModel: AiProvider;
  exchange: ExchangeName;
  isRunning: boolean;
  startTime: string;
  runtimeMinutes: number;
  callCount: number;
  initialBalance: number;
  scanIntervalMinutes: number;
  stopUntil: string | null;
  lastResetTime: string;
}

export interface TraderAccount {
  totalEquity: number;
  walletBalance: number;
  unrealizedProfit: number;
  availableBalance: number;
  totalPnl: number;
  totalPnlPct: number;
  marginUsed: number;
  marginUsedPct: number;
  positionCount: number;
  initialBalance: number;
  dailyPnl: number;
}

const DAY_MS = 24 * 3600 * 1000;

export class AutoTrader {
  readonly id: string;
  readonly name: string;
  private readonly builder: ContextBuilder;
  private readonly executor: DecisionExecutor;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private running = false;
  private cycleInFlight = false;
  private callCount = 0;
  private startedAt: Date;
  private stopUntil: Date | null = null;
  private lastResetTime: Date;
  private dayStartEquity: number | null = null;
  private peakEquity = 0;
  private cooldown: CooldownState;
  private wake: (() => void) | null = null;

  constructor(
    readonly config: AutoTraderConfig,
    private readonly deps: AutoTraderDeps,
  ) {
    this.id = config.id;
    this.name = config.name;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
    this.startedAt = this.clock();
    this.lastResetTime = this.startedAt;
    this.cooldown = restoreCooldown(deps.decisionLog);
    this.builder = new ContextBuilder(
      { trader: deps.trader, market: deps.market, coinPool: deps.coinPool, decisionLog: deps.decisionLog, logger: deps.logger },
      {
        initialBalance: config.initialBalance,
        btcEthLeverage: config.btcEthLeverage,
        altcoinLeverage: config.altcoinLeverage,
        shortInterval: minutesToInterval(config.scanIntervalMinutes),
      },
    );
    this.executor = new DecisionExecutor({
      trader: deps.trader,
      logger: deps.logger,
      settleMs: deps.settleMs,
      sleep: deps.sleep,
      clock: this.clock,
    });
  }

  get decisionLog(): DecisionLogStore {
    return this.deps.decisionLog;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Runs cycles until stop(): the first immediately, then every scan interval. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.clock();
    this.logger.log(`${this.name} started (${this.config.exchange}, ${this.config.aiModel}, every ${this.config.scanIntervalMinutes} min)`);

    const intervalMs = this.config.scanIntervalMinutes * 60_000;
    while (this.running) {
      const began = Date.now();
      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error(`cycle failed: ${errorMessage(err)}`);
      }
      if (!this.running) break;
      await this.idle(Math.max(0, intervalMs - (Date.now() - began)));
    }
    this.logger.log(`${this.name} stopped`);
  }

  /** Cooperative: an in-flight cycle finishes, no new cycle starts. */
  stop(): void {
    this.running = false;
    this.wake?.();
  }

  /** Sets a risk pause; cycles before `until` are recorded as failed without trading. */
  pauseUntil(until: Date): void {
    this.stopUntil = until;
  }

  /**
   * One full cycle. Returns the persisted record, or null if another cycle is
   * still running. Context-build failures are recorded and rethrown.
   */
  async runCycle(): Promise<DecisionRecord | null> {
    if (this.cycleInFlight) {
      this.logger.warn("previous cycle still running, skipping");
      return null;
    }
    this.cycleInFlight = true;
    try {
      return await this.cycle();
    } finally {
      this.cycleInFlight = false;
    }
  }

  private async cycle(): Promise<DecisionRecord> {
    this.callCount++;
    const now = this.clock();
    const record = this.emptyRecord(now);
    this.logger.log(`── cycle #${this.callCount} ──`);

    if (this.stopUntil && now < this.stopUntil) {
      const remaining = Math.ceil((this.stopUntil.getTime() - now.getTime()) / 60_000);
      record.errorMessage = `risk control pause active, ${remaining} min remaining`;
      this.logger.warn(record.errorMessage);
      return this.persist(record);
    }

    if (now.getTime() - this.lastResetTime.getTime() > DAY_MS) {
      this.dayStartEquity = null;
      this.lastResetTime = now;
      this.logger.log("daily PnL reset");
    }

    let ctx: TradingContext;
    try {
      ctx = await this.builder.build(
        { cycle: this.callCount, startedAt: this.startedAt, cooldown: this.cooldown, dayStartEquity: this.dayStartEquity },
        now,
      );
    } catch (err) {
      record.errorMessage = `context build failed: ${errorMessage(err)}`;
      this.persist(record);
      throw err;
    }

    this.snapshotContext(record, ctx);
    this.cooldown = { ...this.cooldown, dailyLossPercent: ctx.cooldown.dailyLossPercent };
    record.cooldown = { ...this.cooldown };

    const breach = this.checkRiskLimits(ctx, now);
    if (breach) {
      record.errorMessage = breach;
      return this.persist(record);
    }

    const prompt = buildPrompt(ctx, { templatePath: this.deps.templatePath, logger: this.logger });
    record.userPrompt = prompt.user;

    let raw: string;
    try {
      raw = await this.deps.model.call(prompt.system, prompt.user);
    } catch (err) {
      record.errorMessage = `AI call failed: ${errorMessage(err)}`;
      this.logger.error(record.errorMessage);
      return this.persist(record);
    }

    let decisions: Decision[];
    try {
      const full = parseFullDecision(raw, prompt.user, now);
      record.reasoning = full.reasoning;
      record.decisions = full.decisions;
      decisions = full.decisions;
    } catch (err) {
      if (err instanceof MalformedResponse) record.reasoning = err.reasoning;
      record.errorMessage = `AI response unparseable: ${errorMessage(err)}`;
      this.logger.error(record.errorMessage);
      return this.persist(record);
    }

    const prices = new Map<string, number>();
    for (const [symbol, snap] of ctx.marketSnapshots) prices.set(symbol, snap.currentPrice);

    let valid: ValidDecision[];
    try {
      valid = validateDecisions(
        decisions,
        {
          accountEquity: ctx.account.totalEquity,
          btcEthLeverage: ctx.btcEthLeverage,
          altcoinLeverage: ctx.altcoinLeverage,
        },
        prices,
      );
    } catch (err) {
      record.errorMessage = `decision rejected: ${errorMessage(err)}`;
      this.logger.error(record.errorMessage);
      return this.persist(record);
    }

    const ordered = sortDecisions(valid);
    this.logger.log(`execution order: ${ordered.map((d) => `${d.symbol || "-"} ${d.action}`).join(", ") || "(none)"}`);

    const outcome = await this.executor.executeAll(ordered, ctx);
    this.cooldown = outcome.cooldown;
    record.actions = outcome.actions;
    record.executionLog = outcome.executionLog;
    record.cooldown = { ...outcome.cooldown };
    record.success = true;
    return this.persist(record);
  }

  /** Builds one context and compiles the prompts without calling the model or trading. */
  async previewPrompt(): Promise<CompiledPrompt> {
    const ctx = await this.builder.build(
      { cycle: this.callCount + 1, startedAt: this.startedAt, cooldown: this.cooldown, dayStartEquity: this.dayStartEquity },
      this.clock(),
    );
    return buildPrompt(ctx, { templatePath: this.deps.templatePath, logger: this.logger });
  }

  /** Daily-loss and drawdown guards; sets the pause and returns a reason when breached. */
  private checkRiskLimits(ctx: TradingContext, now: Date): string | null {
    const equity = ctx.account.totalEquity;
    if (this.dayStartEquity === null) this.dayStartEquity = equity;
    if (equity > this.peakEquity) this.peakEquity = equity;

    const { maxDailyLoss, maxDrawdown, stopTradingMinutes } = this.config;
    const drawdown = this.peakEquity > 0 ? ((this.peakEquity - equity) / this.peakEquity) * 100 : 0;
    let reason: string | null = null;
    if (maxDailyLoss > 0 && ctx.cooldown.dailyLossPercent >= maxDailyLoss) {
      reason = `daily loss ${ctx.cooldown.dailyLossPercent.toFixed(2)}% reached limit ${maxDailyLoss}%`;
    } else if (maxDrawdown > 0 && drawdown >= maxDrawdown) {
      reason = `drawdown ${drawdown.toFixed(2)}% reached limit ${maxDrawdown}%`;
    }
    if (reason) {
      this.stopUntil = new Date(now.getTime() + stopTradingMinutes * 60_000);
      this.logger.warn(`${reason}; pausing for ${stopTradingMinutes} min`);
    }
    return reason;
  }

  private emptyRecord(now: Date): NewDecisionRecord {
    return {
      timestamp: now.toISOString(),
      userPrompt: "",
      reasoning: "",
      decisions: [],
      accountState: { totalBalance: 0, availableBalance: 0, totalUnrealizedProfit: 0, positionCount: 0, marginUsedPct: 0 },
      positions: [],
      candidateCoins: [],
      actions: [],
      executionLog: [],
      success: false,
      errorMessage: "",
      cooldown: { ...this.cooldown },
    };
  }

  private snapshotContext(record: NewDecisionRecord, ctx: TradingContext): void {
    record.accountState = {
      totalBalance: ctx.account.totalEquity,
      availableBalance: ctx.account.availableBalance,
      totalUnrealizedProfit: ctx.positions.reduce((s, p) => s + p.unrealizedPnl, 0),
      positionCount: ctx.account.positionCount,
      marginUsedPct: ctx.account.marginUsedPct,
    };
    record.positions = ctx.positions.map((p) => ({
      symbol: p.symbol,
      side: p.side,
      positionAmt: p.quantity,
      entryPrice: p.entryPrice,
      markPrice: p.markPrice,
      unrealizedProfit: p.unrealizedPnl,
      leverage: p.leverage,
      liquidationPrice: p.liquidationPrice,
    }));
    record.candidateCoins = ctx.candidates.map((c) => c.symbol);
  }

  private persist(record: NewDecisionRecord): DecisionRecord {
    try {
      return this.deps.decisionLog.logDecision(record);
    } catch (err) {
      this.logger.error(`saving decision record failed: ${errorMessage(err)}`);
      return { ...record, cycleNumber: this.callCount };
    }
  }

  private idle(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  getStatus(): TraderStatus {
    const now = this.clock();
    return {
      traderId: this.id,
      traderName: this.name,
      aiModel: this.config.aiModel,
      exchange: this.config.exchange,
      isRunning: this.running,
      startTime: this.startedAt.toISOString(),
      runtimeMinutes: Math.floor((now.getTime() - this.startedAt.getTime()) / 60_000),
      callCount: this.callCount,
      initialBalance: this.config.initialBalance,
      scanIntervalMinutes: this.config.scanIntervalMinutes,
      stopUntil: this.stopUntil ? this.stopUntil.toISOString() : null,
      lastResetTime: this.lastResetTime.toISOString(),
    };
  }

  async getAccountInfo(): Promise<TraderAccount> {
    const [balance, positions] = await Promise.all([this.deps.trader.getBalance(), this.getPositions()]);
    const totalEquity = balance.walletBalance + balance.unrealizedProfit;
    const marginUsed = positions.reduce((s, p) => s + p.marginUsed, 0);
    const totalPnl = totalEquity - this.config.initialBalance;
    return {
      totalEquity,
      walletBalance: balance.walletBalance,
      unrealizedProfit: balance.unrealizedProfit,
      availableBalance: balance.availableBalance,
      totalPnl,
      totalPnlPct: this.config.initialBalance > 0 ? (totalPnl / this.config.initialBalance) * 100 : 0,
      marginUsed,
      marginUsedPct: totalEquity > 0 ? (marginUsed / totalEquity) * 100 : 0,
      positionCount: positions.length,
      initialBalance: this.config.initialBalance,
      dailyPnl: this.dayStartEquity === null ? 0 : totalEquity - this.dayStartEquity,
    };
  }

  async getPositions(): Promise<PositionInfo[]> {
    const now = this.clock().getTime();
    return (await this.deps.trader.getPositions())
      .filter((p) => p.positionAmt !== 0)
      .map((p) => normalizePosition(p, this.builder.firstSeenAt(p.symbol, sideOf(p)) ?? now));
  }
}
