import { describe, it, expect } from "vitest";
import { openDb } from "../agent/src/db.ts";
import { SqliteDecisionLog, recordFromJson, recordToJson, summarizeEquity } from "../agent/src/decision-log.ts";
import type { NewDecisionRecord } from "../agent/src/decision-log.ts";
import { decision, emptyCooldown } from "./fixtures.ts";

function record(balance: number, overrides: Partial<NewDecisionRecord> = {}): NewDecisionRecord {
  return {
    timestamp: "2026-03-01T12:00:00.000Z",
    userPrompt: "prompt",
    reasoning: "thinking",
    decisions: [],
    accountState: { totalBalance: balance, availableBalance: balance, totalUnrealizedProfit: 0, positionCount: 0, marginUsedPct: 0 },
    positions: [],
    candidateCoins: [],
    actions: [],
    executionLog: [],
    success: true,
    errorMessage: "",
    cooldown: emptyCooldown(),
    ...overrides,
  };
}

function freshLog(traderId = "t1") {
  return new SqliteDecisionLog(openDb(":memory:"), traderId, 1000);
}

describe("SqliteDecisionLog", () => {
  it("numbers cycles per trader", () => {
    const db = openDb(":memory:");
    const a = new SqliteDecisionLog(db, "a", 1000);
    const b = new SqliteDecisionLog(db, "b", 1000);
    expect(a.logDecision(record(1000)).cycleNumber).toBe(1);
    expect(a.logDecision(record(1010)).cycleNumber).toBe(2);
    expect(b.logDecision(record(990)).cycleNumber).toBe(1);
    expect(b.getLatestRecords(10)).toHaveLength(1);
  });

  it("returns the latest records oldest first", () => {
    const log = freshLog();
    for (const b of [1000, 1100, 1050]) log.logDecision(record(b));
    expect(log.getLatestRecords(2).map((r) => r.accountState.totalBalance)).toEqual([1100, 1050]);
  });

  it("stores the full record", () => {
    const log = freshLog();
    const saved = log.logDecision(
      record(1000, {
        decisions: [decision({ symbol: "SOLUSDT", action: "open_long", leverage: 3 })],
        positions: [
          { symbol: "ETHUSDT", side: "short", positionAmt: 2, entryPrice: 3000, markPrice: 2900, unrealizedProfit: 200, leverage: 10, liquidationPrice: 0 },
        ],
        candidateCoins: ["SOLUSDT"],
        actions: [
          { action: "open_long", symbol: "SOLUSDT", quantity: 10, leverage: 3, price: 100, orderId: "42", timestamp: "2026-03-01T12:00:01.000Z", success: true, error: "" },
        ],
        executionLog: ["✓ SOLUSDT open_long succeeded"],
        cooldown: { ...emptyCooldown(), lastEnterTime: "2026-03-01T12:00:01.000Z", consecutiveLosses: 1 },
      }),
    );
    expect(log.getLatestRecords(1)[0]).toEqual(saved);
  });

  it("counts cycles and executions", () => {
    const log = freshLog();
    const ok = { action: "close_long" as const, symbol: "X", quantity: 1, leverage: 1, price: 1, orderId: "1", timestamp: "", success: true, error: "" };
    log.logDecision(record(1000, { actions: [ok, { ...ok, success: false, error: "boom" }], timestamp: "2026-03-01T12:00:00.000Z" }));
    log.logDecision(record(1000, { success: false, errorMessage: "AI call failed: timeout", timestamp: "2026-03-01T12:03:00.000Z" }));
    expect(log.getStatistics()).toEqual({
      totalCycles: 2,
      successfulCycles: 1,
      failedCycles: 1,
      totalExecutions: 2,
      successfulExecutions: 1,
      failedExecutions: 1,
      firstLogTime: "2026-03-01T12:00:00.000Z",
      lastLogTime: "2026-03-01T12:03:00.000Z",
    });
  });

  it("reports zero statistics for an empty log", () => {
    expect(freshLog().getStatistics()).toMatchObject({ totalCycles: 0, successfulCycles: 0, totalExecutions: 0, firstLogTime: null });
  });

  it("derives the equity history against the initial balance", () => {
    const log = freshLog();
    log.logDecision(record(1100));
    expect(log.getEquityHistory(10)).toEqual([
      {
        timestamp: "2026-03-01T12:00:00.000Z",
        cycleNumber: 1,
        totalEquity: 1100,
        availableBalance: 1100,
        totalPnl: 100,
        totalPnlPct: 10,
        positionCount: 0,
        marginUsedPct: 0,
      },
    ]);
  });

  it("analyses performance over the recent window", () => {
    const log = freshLog();
    expect(log.analyzePerformance(20).cycleCount).toBe(0);
    for (const b of [1000, 1100, 1050, 1200]) log.logDecision(record(b));
    const perf = log.analyzePerformance(20);
    expect(perf.cycleCount).toBe(4);
    expect(perf.totalPnl).toBe(200);
  });
});

describe("summarizeEquity", () => {
  it("computes Sharpe, drawdown and win statistics", () => {
    const perf = summarizeEquity([1000, 1100, 1050, 1200], 1000, 4);
    expect(perf.sharpeRatio).toBeCloseTo(8.75 / Math.sqrt(54.6875));
    expect(perf.maxDrawdown).toBeCloseTo((50 / 1100) * 100);
    expect(perf.winRate).toBeCloseTo(66.67, 2);
    expect(perf.avgWin).toBe(125);
    expect(perf.avgLoss).toBe(50);
    expect(perf.profitFactor).toBe(5);
    expect(perf.totalPnl).toBe(200);
  });

  it("skips non-positive balances", () => {
    const perf = summarizeEquity([0, 1000, 0], 1000, 3);
    expect(perf).toMatchObject({ sharpeRatio: 0, maxDrawdown: 0, winRate: 0, cycleCount: 3 });
  });
});

describe("record JSON", () => {
  it("uses snake_case field names", () => {
    const json = recordToJson({ ...record(1000), cycleNumber: 7 });
    expect(Object.keys(json)).toEqual([
      "timestamp",
      "cycle_number",
      "input_prompt",
      "cot_trace",
      "decisions",
      "account_state",
      "positions",
      "candidate_coins",
      "actions",
      "execution_log",
      "success",
      "error_message",
      "last_enter_time",
      "last_stop_time",
      "last_take_profit_time",
      "consecutive_losses_count",
      "daily_loss_percent",
    ]);
  });

  it("drops actions it does not recognise", () => {
    const r = recordFromJson({ actions: [{ action: "teleport" }, { action: "hold", symbol: "BTCUSDT" }] });
    expect(r.actions.map((a) => a.action)).toEqual(["hold"]);
    expect(r.cooldown.lastEnterTime).toBeNull();
  });
});
