/**
 * Domain records shared by the decision cycle, the adapters and the status API.
 */

export type PositionSide = "long" | "short";

export type CoinSource = "ai500" | "oi_top";

export const DECISION_ACTIONS = [
  "open_long",
  "open_short",
  "close_long",
  "close_short",
  "hold",
  "wait",
] as const;

export type DecisionAction = (typeof DECISION_ACTIONS)[number];

export function isDecisionAction(action: string): action is DecisionAction {
  return (DECISION_ACTIONS as readonly string[]).includes(action);
}

export interface AccountInfo {
  /** wallet balance + unrealized PnL */
  totalEquity: number;
  availableBalance: number;
  /** equity minus the agent's configured initial balance */
  totalPnl: number;
  totalPnlPct: number;
  marginUsed: number;
  marginUsedPct: number;
  positionCount: number;
}

export interface PositionInfo {
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  markPrice: number;
  /** always a non-negative magnitude; direction lives in `side` */
  quantity: number;
  leverage: number;
  unrealizedPnl: number;
  unrealizedPnlPct: number;
  liquidationPrice: number;
  marginUsed: number;
  /** epoch ms of the first cycle this (symbol, side) was observed */
  firstSeenAt: number;
}

export interface CandidateCoin {
  symbol: string;
  sources: CoinSource[];
}

export interface OpenInterestTopEntry {
  symbol: string;
  rank: number;
  currentOi: number;
  oiDelta: number;
  oiDeltaPercent: number;
  oiDeltaValue: number;
  priceDeltaPercent: number;
  netLong: number;
  netShort: number;
}

export interface PerformanceSummary {
  sharpeRatio: number;
  totalPnl: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  maxDrawdown: number;
  profitFactor: number;
  cycleCount: number;
}

export interface TimeframeSeries {
  midPrices: number[];
  ema20: number[];
  macd: number[];
  rsi7: number[];
  rsi14: number[];
  atr3: number[];
  atr14: number[];
  volume: number[];
}

export interface TimeframeLabels {
  short: string;
  medium: string;
  long: string;
}

export interface MarketSnapshot {
  symbol: string;
  currentPrice: number;
  currentEma20: number;
  currentMacd: number;
  currentRsi7: number;
  openInterest: { latest: number; average: number };
  fundingRate: number;
  intervals: TimeframeLabels;
  short: TimeframeSeries;
  medium: TimeframeSeries;
  long: TimeframeSeries;
}

/** Timestamps are ISO-8601 UTC strings, null when the event never happened. */
export interface CooldownState {
  lastEnterTime: string | null;
  lastStopTime: string | null;
  lastTakeProfitTime: string | null;
  consecutiveLosses: number;
  dailyLossPercent: number;
}

export interface TradingContext {
  currentTime: Date;
  cycle: number;
  runtimeMinutes: number;
  account: AccountInfo;
  positions: PositionInfo[];
  candidates: CandidateCoin[];
  marketSnapshots: Map<string, MarketSnapshot>;
  oiTop: Map<string, OpenInterestTopEntry>;
  performance: PerformanceSummary | null;
  btcEthLeverage: number;
  altcoinLeverage: number;
  shortInterval: string;
  cooldown: CooldownState;
}

export interface Decision {
  symbol: string;
  /** raw model output; unknown values are rejected by the validator */
  action: string;
  leverage: number;
  positionSizeUsd: number;
  stopLoss: number;
  takeProfit: number;
  confidence: number;
  riskUsd: number;
  reasoning: string;
}

export type ValidDecision = Decision & { action: DecisionAction };

export interface FullDecision {
  userPrompt: string;
  reasoning: string;
  decisions: Decision[];
  timestamp: Date;
}

/** Outcome of one executed decision inside a cycle record. */
export interface ActionRecord {
  action: DecisionAction;
  symbol: string;
  quantity: number;
  leverage: number;
  price: number;
  orderId: string;
  timestamp: string;
  success: boolean;
  error: string;
}

export interface AccountSnapshot {
  totalBalance: number;
  availableBalance: number;
  totalUnrealizedProfit: number;
  positionCount: number;
  marginUsedPct: number;
}

export interface PositionSnapshot {
  symbol: string;
  side: PositionSide;
  positionAmt: number;
  entryPrice: number;
  markPrice: number;
  unrealizedProfit: number;
  leverage: number;
  liquidationPrice: number;
}

export interface DecisionRecord {
  timestamp: string;
  cycleNumber: number;
  userPrompt: string;
  reasoning: string;
  decisions: Decision[];
  accountState: AccountSnapshot;
  positions: PositionSnapshot[];
  candidateCoins: string[];
  actions: ActionRecord[];
  executionLog: string[];
  success: boolean;
  errorMessage: string;
  cooldown: CooldownState;
}
