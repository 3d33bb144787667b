/**
 * Append-only decision log: one record per cycle, stored as a fixed
 * snake_case JSON document plus a few indexed columns for statistics.
 */

import type Database from "better-sqlite3";
import { decisionToJson, toDecision } from "./parser.ts";
import { asArray, asNumber, asRecord, asString, type JsonRecord } from "./json.ts";
import {
  isDecisionAction,
  type ActionRecord,
  type CooldownState,
  type DecisionRecord,
  type PerformanceSummary,
  type PositionSnapshot,
} from "./types.ts";

export type NewDecisionRecord = Omit<DecisionRecord, "cycleNumber">;

/** What the trading cycle needs from persistence. */
export interface DecisionLog {
  logDecision(record: NewDecisionRecord): DecisionRecord;
  getLatestRecords(limit: number): DecisionRecord[];
  analyzePerformance(cycles: number): PerformanceSummary;
}

/** Read side used by the status API. */
export interface DecisionLogStore extends DecisionLog {
  getStatistics(): DecisionStatistics;
  getEquityHistory(limit: number): EquityPoint[];
}

export interface DecisionStatistics {
  totalCycles: number;
  successfulCycles: number;
  failedCycles: number;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  firstLogTime: string | null;
  lastLogTime: string | null;
}

export interface EquityPoint {
  timestamp: string;
  cycleNumber: number;
  totalEquity: number;
  availableBalance: number;
  totalPnl: number;
  totalPnlPct: number;
  positionCount: number;
  marginUsedPct: number;
}

interface RecordRow {
  record_json: string;
}

interface StatsRow {
  total: number;
  ok: number | null;
  executions: number | null;
  ok_executions: number | null;
  first_ts: string | null;
  last_ts: string | null;
}

export const EMPTY_PERFORMANCE: PerformanceSummary = {
  sharpeRatio: 0,
  totalPnl: 0,
  winRate: 0,
  avgWin: 0,
  avgLoss: 0,
  maxDrawdown: 0,
  profitFactor: 0,
  cycleCount: 0,
};

export class SqliteDecisionLog implements DecisionLogStore {
  constructor(
    private readonly db: Database.Database,
    readonly traderId: string,
    private readonly initialBalance: number,
  ) {}

  logDecision(record: NewDecisionRecord): DecisionRecord {
    const count = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM decision_records WHERE trader_id = ?")
      .get(this.traderId);
    const full: DecisionRecord = { ...record, cycleNumber: (count?.n ?? 0) + 1 };
    this.db
      .prepare(
        `INSERT INTO decision_records
           (trader_id, cycle_number, timestamp, success, total_balance, executions, successful_executions, record_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        this.traderId,
        full.cycleNumber,
        full.timestamp,
        full.success ? 1 : 0,
        full.accountState.totalBalance,
        full.actions.length,
        full.actions.filter((a) => a.success).length,
        JSON.stringify(recordToJson(full)),
      );
    return full;
  }

  /** Up to `limit` most recent records, oldest first. */
  getLatestRecords(limit: number): DecisionRecord[] {
    const rows = this.db
      .prepare<[string, number], RecordRow>(
        "SELECT record_json FROM decision_records WHERE trader_id = ? ORDER BY id DESC LIMIT ?",
      )
      .all(this.traderId, limit);
    return rows.reverse().map((r) => recordFromJson(JSON.parse(r.record_json)));
  }

  getStatistics(): DecisionStatistics {
    const row = this.db
      .prepare<[string], StatsRow>(
        `SELECT COUNT(*) AS total,
                SUM(success) AS ok,
                SUM(executions) AS executions,
                SUM(successful_executions) AS ok_executions,
                MIN(timestamp) AS first_ts,
                MAX(timestamp) AS last_ts
           FROM decision_records WHERE trader_id = ?`,
      )
      .get(this.traderId);
    if (!row) throw new Error("statistics query returned no row");
    const executions = row.executions ?? 0;
    const okExecutions = row.ok_executions ?? 0;
    return {
      totalCycles: row.total,
      successfulCycles: row.ok ?? 0,
      failedCycles: row.total - (row.ok ?? 0),
      totalExecutions: executions,
      successfulExecutions: okExecutions,
      failedExecutions: executions - okExecutions,
      firstLogTime: row.first_ts,
      lastLogTime: row.last_ts,
    };
  }

  getEquityHistory(limit: number): EquityPoint[] {
    return this.getLatestRecords(limit).map((r) => {
      const equity = r.accountState.totalBalance;
      const pnl = equity - this.initialBalance;
      return {
        timestamp: r.timestamp,
        cycleNumber: r.cycleNumber,
        totalEquity: equity,
        availableBalance: r.accountState.availableBalance,
        totalPnl: pnl,
        totalPnlPct: this.initialBalance > 0 ? (pnl / this.initialBalance) * 100 : 0,
        positionCount: r.accountState.positionCount,
        marginUsedPct: r.accountState.marginUsedPct,
      };
    });
  }

  analyzePerformance(cycles: number): PerformanceSummary {
    const records = this.getLatestRecords(cycles);
    if (records.length === 0) return { ...EMPTY_PERFORMANCE };
    return summarizeEquity(
      records.map((r) => r.accountState.totalBalance),
      this.initialBalance,
      records.length,
    );
  }
}

/**
 * Performance over an equity curve: Sharpe of each cycle's cumulative return
 * on the initial balance, peak-to-trough drawdown, and wins/losses from cycle-to-cycle
 * equity changes. Non-positive balances (failed snapshots) are skipped.
 */
export function summarizeEquity(balances: number[], initialBalance: number, cycleCount: number): PerformanceSummary {
  const curve = balances.filter((b) => b > 0);
  const returns = initialBalance > 0 ? curve.map((b) => ((b - initialBalance) / initialBalance) * 100) : [];

  let sharpeRatio = 0;
  if (returns.length > 0) {
    const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
    const std = Math.sqrt(returns.reduce((a, r) => a + (r - mean) ** 2, 0) / returns.length);
    if (std > 0) sharpeRatio = mean / std;
  }

  let peak = 0;
  let maxDrawdown = 0;
  for (const b of curve) {
    if (b > peak) peak = b;
    const dd = peak > 0 ? ((peak - b) / peak) * 100 : 0;
    if (dd > maxDrawdown) maxDrawdown = dd;
  }

  const wins: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < curve.length; i++) {
    const change = curve[i] - curve[i - 1];
    if (change > 0) wins.push(change);
    else if (change < 0) losses.push(-change);
  }
  const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);
  const totalWins = sum(wins);
  const totalLosses = sum(losses);

  return {
    sharpeRatio,
    totalPnl: totalWins - totalLosses,
    winRate: wins.length + losses.length > 0 ? (wins.length / (wins.length + losses.length)) * 100 : 0,
    avgWin: wins.length > 0 ? totalWins / wins.length : 0,
    avgLoss: losses.length > 0 ? totalLosses / losses.length : 0,
    maxDrawdown,
    profitFactor: totalLosses > 0 ? totalWins / totalLosses : 0,
    cycleCount,
  };
}

// ── JSON boundary ────────────────────────────────────────────────────────────

export function recordToJson(r: DecisionRecord): JsonRecord {
  return {
    timestamp: r.timestamp,
    cycle_number: r.cycleNumber,
    input_prompt: r.userPrompt,
    cot_trace: r.reasoning,
    decisions: r.decisions.map(decisionToJson),
    account_state: {
      total_balance: r.accountState.totalBalance,
      available_balance: r.accountState.availableBalance,
      total_unrealized_profit: r.accountState.totalUnrealizedProfit,
      position_count: r.accountState.positionCount,
      margin_used_pct: r.accountState.marginUsedPct,
    },
    positions: r.positions.map((p) => ({
      symbol: p.symbol,
      side: p.side,
      position_amt: p.positionAmt,
      entry_price: p.entryPrice,
      mark_price: p.markPrice,
      unrealized_profit: p.unrealizedProfit,
      leverage: p.leverage,
      liquidation_price: p.liquidationPrice,
    })),
    candidate_coins: r.candidateCoins,
    actions: r.actions.map((a) => ({
      action: a.action,
      symbol: a.symbol,
      quantity: a.quantity,
      leverage: a.leverage,
      price: a.price,
      order_id: a.orderId,
      timestamp: a.timestamp,
      success: a.success,
      error: a.error,
    })),
    execution_log: r.executionLog,
    success: r.success,
    error_message: r.errorMessage,
    last_enter_time: r.cooldown.lastEnterTime,
    last_stop_time: r.cooldown.lastStopTime,
    last_take_profit_time: r.cooldown.lastTakeProfitTime,
    consecutive_losses_count: r.cooldown.consecutiveLosses,
    daily_loss_percent: r.cooldown.dailyLossPercent,
  };
}

const nullableString = (v: unknown): string | null => (typeof v === "string" && v !== "" ? v : null);

function positionFromJson(raw: unknown): PositionSnapshot {
  const p = asRecord(raw);
  return {
    symbol: asString(p.symbol),
    side: p.side === "short" ? "short" : "long",
    positionAmt: asNumber(p.position_amt),
    entryPrice: asNumber(p.entry_price),
    markPrice: asNumber(p.mark_price),
    unrealizedProfit: asNumber(p.unrealized_profit),
    leverage: asNumber(p.leverage),
    liquidationPrice: asNumber(p.liquidation_price),
  };
}

function actionFromJson(raw: unknown): ActionRecord[] {
  const a = asRecord(raw);
  const action = asString(a.action);
  if (!isDecisionAction(action)) return [];
  return [
    {
      action,
      symbol: asString(a.symbol),
      quantity: asNumber(a.quantity),
      leverage: asNumber(a.leverage),
      price: asNumber(a.price),
      orderId: asString(a.order_id),
      timestamp: asString(a.timestamp),
      success: a.success === true,
      error: asString(a.error),
    },
  ];
}

export function recordFromJson(raw: unknown): DecisionRecord {
  const r = asRecord(raw);
  const acct = asRecord(r.account_state);
  const cooldown: CooldownState = {
    lastEnterTime: nullableString(r.last_enter_time),
    lastStopTime: nullableString(r.last_stop_time),
    lastTakeProfitTime: nullableString(r.last_take_profit_time),
    consecutiveLosses: asNumber(r.consecutive_losses_count),
    dailyLossPercent: asNumber(r.daily_loss_percent),
  };
  return {
    timestamp: asString(r.timestamp),
    cycleNumber: asNumber(r.cycle_number),
    userPrompt: asString(r.input_prompt),
    reasoning: asString(r.cot_trace),
    decisions: asArray(r.decisions).map((d) => toDecision(asRecord(d))),
    accountState: {
      totalBalance: asNumber(acct.total_balance),
      availableBalance: asNumber(acct.available_balance),
      totalUnrealizedProfit: asNumber(acct.total_unrealized_profit),
      positionCount: asNumber(acct.position_count),
      marginUsedPct: asNumber(acct.margin_used_pct),
    },
    positions: asArray(r.positions).map(positionFromJson),
    candidateCoins: asArray(r.candidate_coins).map((c) => asString(c)),
    actions: asArray(r.actions).flatMap(actionFromJson),
    executionLog: asArray(r.execution_log).map((l) => asString(l)),
    success: r.success === true,
    errorMessage: asString(r.error_message),
    cooldown,
  };
}
