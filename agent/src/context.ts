/**
 * Builds the per-cycle TradingContext from the exchange, the coin pool, market
 * snapshots and the decision log.
 */

import type { CoinPoolProvider } from "./coin-pool.ts";
import type { DecisionLog } from "./decision-log.ts";
import { errorMessage } from "./errors.ts";
import type { Logger } from "./logger.ts";
import type { MarketSnapshotProvider } from "./market.ts";
import { sideOf, type ExchangePosition, type Trader } from "./trader.ts";
import type {
  AccountInfo,
  CandidateCoin,
  CooldownState,
  MarketSnapshot,
  OpenInterestTopEntry,
  PerformanceSummary,
  PositionInfo,
  TradingContext,
} from "./types.ts";

/** Candidates with less open interest (in USD) than this are not analysed. */
export const MIN_OI_VALUE_USD = 15_000_000;
const PERFORMANCE_WINDOW = 20;
const DEFAULT_LEVERAGE = 10;

export interface ContextSettings {
  initialBalance: number;
  btcEthLeverage: number;
  altcoinLeverage: number;
  shortInterval: string;
  /** pool size handed to the coin pool */
  candidateLimit?: number;
}

/** Agent state the builder reads each cycle. */
export interface AgentState {
  cycle: number;
  startedAt: Date;
  cooldown: CooldownState;
  /** equity at the start of the current 24h window, null before the first cycle */
  dayStartEquity: number | null;
}

export interface ContextDeps {
  trader: Trader;
  market: MarketSnapshotProvider;
  coinPool: CoinPoolProvider;
  decisionLog: DecisionLog;
  logger: Logger;
}

export function positionKey(symbol: string, side: string): string {
  return `${symbol}_${side}`;
}

/** Cooldown fields of the most recent record, or an empty state. */
export function restoreCooldown(log: DecisionLog): CooldownState {
  const [latest] = log.getLatestRecords(1);
  if (!latest) {
    return { lastEnterTime: null, lastStopTime: null, lastTakeProfitTime: null, consecutiveLosses: 0, dailyLossPercent: 0 };
  }
  return { ...latest.cooldown };
}

export function unrealizedPnlPct(side: "long" | "short", entry: number, mark: number): number {
  if (!(entry > 0)) return 0;
  const pct = ((mark - entry) / entry) * 100;
  return side === "long" ? pct : -pct;
}

/** Exchange position → magnitude quantity, derived side, PnL% and isolated margin. */
export function normalizePosition(p: ExchangePosition, firstSeenAt: number): PositionInfo {
  const side = sideOf(p);
  const quantity = Math.abs(p.positionAmt);
  const leverage = p.leverage > 0 ? p.leverage : DEFAULT_LEVERAGE;
  return {
    symbol: p.symbol,
    side,
    entryPrice: p.entryPrice,
    markPrice: p.markPrice,
    quantity,
    leverage,
    unrealizedPnl: p.unrealizedProfit,
    unrealizedPnlPct: unrealizedPnlPct(side, p.entryPrice, p.markPrice),
    liquidationPrice: p.liquidationPrice,
    marginUsed: (quantity * p.markPrice) / leverage,
    firstSeenAt,
  };
}

export class ContextBuilder {
  private readonly firstSeen = new Map<string, number>();

  constructor(
    private readonly deps: ContextDeps,
    private readonly settings: ContextSettings,
  ) {}

  async build(state: AgentState, now: Date = new Date()): Promise<TradingContext> {
    const { trader, logger } = this.deps;

    // exchange failures here are fatal for the cycle
    const balance = await trader.getBalance();
    const rawPositions = await trader.getPositions();
    const positions = this.trackPositions(rawPositions, now.getTime());

    const pool = await this.deps.coinPool.getMergedPool(this.settings.candidateLimit ?? 20);
    const candidates: CandidateCoin[] = pool.allSymbols.map((symbol) => ({
      symbol,
      sources: pool.symbolSources.get(symbol) ?? [],
    }));
    const oiTop = new Map<string, OpenInterestTopEntry>(pool.oiTop.map((e) => [e.symbol, e]));

    const marketSnapshots = await this.fetchSnapshots(
      positions.map((p) => p.symbol),
      candidates.map((c) => c.symbol),
    );

    const totalEquity = balance.walletBalance + balance.unrealizedProfit;
    const marginUsed = positions.reduce((sum, p) => sum + p.marginUsed, 0);
    const totalPnl = totalEquity - this.settings.initialBalance;
    const account: AccountInfo = {
      totalEquity,
      availableBalance: balance.availableBalance,
      totalPnl,
      totalPnlPct: this.settings.initialBalance > 0 ? (totalPnl / this.settings.initialBalance) * 100 : 0,
      marginUsed,
      marginUsedPct: totalEquity > 0 ? (marginUsed / totalEquity) * 100 : 0,
      positionCount: positions.length,
    };

    let performance: PerformanceSummary | null = null;
    try {
      performance = this.deps.decisionLog.analyzePerformance(PERFORMANCE_WINDOW);
    } catch (err) {
      logger.warn(`performance analysis unavailable: ${errorMessage(err)}`);
    }

    const dayStart = state.dayStartEquity;
    const dailyLossPercent =
      dayStart !== null && dayStart > 0
        ? Math.max(0, ((dayStart - totalEquity) / dayStart) * 100)
        : Math.abs(Math.min(0, account.totalPnlPct));

    return {
      currentTime: now,
      cycle: state.cycle,
      runtimeMinutes: Math.floor((now.getTime() - state.startedAt.getTime()) / 60_000),
      account,
      positions,
      candidates,
      marketSnapshots,
      oiTop,
      performance,
      btcEthLeverage: this.settings.btcEthLeverage,
      altcoinLeverage: this.settings.altcoinLeverage,
      shortInterval: this.settings.shortInterval,
      cooldown: { ...state.cooldown, dailyLossPercent },
    };
  }

  /** When a still-open (symbol, side) position was first observed, in epoch ms. */
  firstSeenAt(symbol: string, side: string): number | undefined {
    return this.firstSeen.get(positionKey(symbol, side));
  }

  /** Normalizes exchange positions and maintains first-seen times per (symbol, side). */
  private trackPositions(raw: ExchangePosition[], nowMs: number): PositionInfo[] {
    const current = new Set<string>();
    const out: PositionInfo[] = [];
    for (const p of raw) {
      if (p.positionAmt === 0) continue;
      const side = sideOf(p);
      const key = positionKey(p.symbol, side);
      current.add(key);
      if (!this.firstSeen.has(key)) this.firstSeen.set(key, nowMs);

      out.push(normalizePosition(p, this.firstSeen.get(key) ?? nowMs));
    }
    for (const key of [...this.firstSeen.keys()]) {
      if (!current.has(key)) this.firstSeen.delete(key);
    }
    return out;
  }

  /**
   * One snapshot per distinct symbol. Held symbols are always kept; candidates
   * below MIN_OI_VALUE_USD of open interest are dropped. Failures skip the symbol.
   */
  private async fetchSnapshots(held: string[], candidates: string[]): Promise<Map<string, MarketSnapshot>> {
    const heldSet = new Set(held);
    const out = new Map<string, MarketSnapshot>();
    for (const symbol of new Set([...held, ...candidates])) {
      let snap: MarketSnapshot;
      try {
        snap = await this.deps.market.getSnapshot(symbol, this.settings.shortInterval);
      } catch (err) {
        this.deps.logger.warn(`market data for ${symbol} failed: ${errorMessage(err)}`);
        continue;
      }
      const oiValue = snap.openInterest.latest * snap.currentPrice;
      if (!heldSet.has(symbol) && oiValue < MIN_OI_VALUE_USD) {
        this.deps.logger.verbose(`${symbol} skipped: OI value ${(oiValue / 1e6).toFixed(2)}M < ${MIN_OI_VALUE_USD / 1e6}M`);
        continue;
      }
      out.set(symbol, snap);
    }
    return out;
  }
}
