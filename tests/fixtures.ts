/**
 * Shared builders and in-process fakes for the agent tests.
 */

import { AutoTrader, type AutoTraderConfig } from "../agent/src/auto-trader.ts";
import type { CoinPoolProvider, MergedPool } from "../agent/src/coin-pool.ts";
import { openDb } from "../agent/src/db.ts";
import { SqliteDecisionLog } from "../agent/src/decision-log.ts";
import { silentLogger } from "../agent/src/logger.ts";
import type { DecisionLog } from "../agent/src/decision-log.ts";
import { EMPTY_PERFORMANCE } from "../agent/src/decision-log.ts";
import type { ModelClient } from "../agent/src/ai-client.ts";
import type { MarketSnapshotProvider } from "../agent/src/market.ts";
import type {
  CloseOutcome,
  ExchangeBalance,
  ExchangePosition,
  OrderResult,
  Trader,
} from "../agent/src/trader.ts";
import { sideOf } from "../agent/src/trader.ts";
import type {
  CoinSource,
  CooldownState,
  Decision,
  DecisionRecord,
  MarketSnapshot,
  PositionSide,
  TimeframeSeries,
  TradingContext,
} from "../agent/src/types.ts";

export function series(prices: number[] = []): TimeframeSeries {
  return { midPrices: prices, ema20: [], macd: [], rsi7: [], rsi14: [], atr3: [], atr14: [], volume: [] };
}

export function snapshot(symbol: string, price: number, oiLatest = 1_000_000): MarketSnapshot {
  return {
    symbol,
    currentPrice: price,
    currentEma20: price,
    currentMacd: 0,
    currentRsi7: 50,
    openInterest: { latest: oiLatest, average: oiLatest },
    fundingRate: 0.0001,
    intervals: { short: "3m", medium: "15m", long: "1h" },
    short: series([price]),
    medium: series([price]),
    long: series([price]),
  };
}

export function emptyCooldown(): CooldownState {
  return { lastEnterTime: null, lastStopTime: null, lastTakeProfitTime: null, consecutiveLosses: 0, dailyLossPercent: 0 };
}

export function decision(overrides: Partial<Decision> = {}): Decision {
  return {
    symbol: "BTCUSDT",
    action: "wait",
    leverage: 0,
    positionSizeUsd: 0,
    stopLoss: 0,
    takeProfit: 0,
    confidence: 0,
    riskUsd: 0,
    reasoning: "",
    ...overrides,
  };
}

export function context(overrides: Partial<TradingContext> = {}): TradingContext {
  return {
    currentTime: new Date("2026-03-01T12:00:00.000Z"),
    cycle: 1,
    runtimeMinutes: 0,
    account: {
      totalEquity: 1000,
      availableBalance: 1000,
      totalPnl: 0,
      totalPnlPct: 0,
      marginUsed: 0,
      marginUsedPct: 0,
      positionCount: 0,
    },
    positions: [],
    candidates: [],
    marketSnapshots: new Map(),
    oiTop: new Map(),
    performance: null,
    btcEthLeverage: 5,
    altcoinLeverage: 5,
    shortInterval: "3m",
    cooldown: emptyCooldown(),
    ...overrides,
  };
}

export function position(symbol: string, amt: number, entry: number, mark: number, leverage = 5): ExchangePosition {
  return {
    symbol,
    positionAmt: amt,
    entryPrice: entry,
    markPrice: mark,
    unrealizedProfit: (mark - entry) * amt,
    leverage,
    liquidationPrice: 0,
  };
}

/** Records every call; positions and prices are plain mutable fields. */
export class FakeTrader implements Trader {
  readonly exchange = "binance" as const;
  balance: ExchangeBalance = { walletBalance: 1000, unrealizedProfit: 0, availableBalance: 1000 };
  positions: ExchangePosition[] = [];
  prices = new Map<string, number>();
  calls: string[] = [];
  failOn = new Set<string>();
  private nextId = 1;

  private check(method: string): void {
    if (this.failOn.has(method)) throw new Error(`${method} failed`);
  }

  async getBalance() {
    this.check("getBalance");
    return this.balance;
  }
  async getPositions() {
    this.check("getPositions");
    return this.positions;
  }
  async setLeverage(symbol: string, leverage: number) {
    this.calls.push(`setLeverage ${symbol} ${leverage}`);
  }
  async setIsolatedMargin(symbol: string) {
    this.calls.push(`setIsolatedMargin ${symbol}`);
  }
  private fill(symbol: string, quantity: number): OrderResult {
    return { orderId: String(this.nextId++), symbol, quantity };
  }
  async openLong(symbol: string, quantity: number, leverage: number) {
    this.check("openLong");
    this.calls.push(`openLong ${symbol} ${quantity} ${leverage}`);
    return this.fill(symbol, quantity);
  }
  async openShort(symbol: string, quantity: number, leverage: number) {
    this.check("openShort");
    this.calls.push(`openShort ${symbol} ${quantity} ${leverage}`);
    return this.fill(symbol, quantity);
  }
  private closeSide(symbol: string, side: PositionSide): CloseOutcome {
    const idx = this.positions.findIndex((p) => p.symbol === symbol && p.positionAmt !== 0 && sideOf(p) === side);
    if (idx < 0) return { kind: "no_position" };
    const [p] = this.positions.splice(idx, 1);
    return { kind: "closed", order: this.fill(symbol, Math.abs(p.positionAmt)) };
  }
  async closeLong(symbol: string, quantity: number) {
    this.calls.push(`closeLong ${symbol} ${quantity}`);
    return this.closeSide(symbol, "long");
  }
  async closeShort(symbol: string, quantity: number) {
    this.calls.push(`closeShort ${symbol} ${quantity}`);
    return this.closeSide(symbol, "short");
  }
  async cancelAllOrders(symbol: string) {
    this.calls.push(`cancelAllOrders ${symbol}`);
  }
  async getMarketPrice(symbol: string) {
    const p = this.prices.get(symbol);
    if (p === undefined) throw new Error(`no price for ${symbol}`);
    return p;
  }
  calculatePositionSize() {
    return 0;
  }
  async setStopLoss(symbol: string, side: PositionSide, quantity: number, price: number) {
    this.check("setStopLoss");
    this.calls.push(`setStopLoss ${symbol} ${side} ${quantity} ${price}`);
  }
  async setTakeProfit(symbol: string, side: PositionSide, quantity: number, price: number) {
    this.calls.push(`setTakeProfit ${symbol} ${side} ${quantity} ${price}`);
  }
}

export class FakeMarket implements MarketSnapshotProvider {
  snapshots = new Map<string, MarketSnapshot>();
  requested: string[] = [];

  async getSnapshot(symbol: string): Promise<MarketSnapshot> {
    this.requested.push(symbol);
    const s = this.snapshots.get(symbol);
    if (!s) throw new Error(`no market data for ${symbol}`);
    return s;
  }
}

export class FakeCoinPool implements CoinPoolProvider {
  constructor(public pool: MergedPool = { allSymbols: [], symbolSources: new Map(), oiTop: [] }) {}

  async getMergedPool(): Promise<MergedPool> {
    return this.pool;
  }
}

export function poolOf(symbols: string[]): MergedPool {
  return {
    allSymbols: symbols,
    symbolSources: new Map(symbols.map((s): [string, CoinSource[]] => [s, ["ai500"]])),
    oiTop: [],
  };
}

export class MemoryDecisionLog implements DecisionLog {
  records: DecisionRecord[] = [];

  logDecision(record: Omit<DecisionRecord, "cycleNumber">): DecisionRecord {
    const full = { ...record, cycleNumber: this.records.length + 1 };
    this.records.push(full);
    return full;
  }
  getLatestRecords(limit: number): DecisionRecord[] {
    return this.records.slice(-limit);
  }
  analyzePerformance() {
    return { ...EMPTY_PERFORMANCE };
  }
}

export class ScriptedModel implements ModelClient {
  calls: Array<{ system: string; user: string }> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async call(system: string, user: string): Promise<string> {
    this.calls.push({ system, user });
    const next = this.replies.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  }
}

export const noSleep = async (): Promise<void> => {};

export function traderConfig(id: string, overrides: Partial<AutoTraderConfig> = {}): AutoTraderConfig {
  return {
    id,
    name: `Trader ${id}`,
    aiModel: "deepseek",
    exchange: "binance",
    initialBalance: 1000,
    scanIntervalMinutes: 3,
    btcEthLeverage: 5,
    altcoinLeverage: 5,
    maxDailyLoss: 0,
    maxDrawdown: 0,
    stopTradingMinutes: 60,
    ...overrides,
  };
}

/** An agent over in-process fakes and its own in-memory decision log. */
export function fakeAgent(id: string, trader = new FakeTrader(), model: ModelClient = new ScriptedModel([])) {
  const log = new SqliteDecisionLog(openDb(":memory:"), id, 1000);
  const agent = new AutoTrader(traderConfig(id), {
    trader,
    market: new FakeMarket(),
    coinPool: new FakeCoinPool(),
    decisionLog: log,
    model,
    logger: silentLogger,
    sleep: noSleep,
    clock: () => new Date("2026-03-01T12:00:00.000Z"),
  });
  return { agent, trader, log };
}
