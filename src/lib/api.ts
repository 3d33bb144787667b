/**
 * Status API client for the dashboard. Same origin by default; VITE_API_URL
 * points it elsewhere.
 */

export interface TraderSummary {
  traderId: string;
  traderName: string;
  aiModel: string;
  exchange: string;
  isRunning: boolean;
}

export interface TraderComparison extends TraderSummary {
  totalEquity: number;
  totalPnl: number;
  totalPnlPct: number;
  positionCount: number;
  marginUsedPct: number;
  callCount: number;
  error?: string;
}

export interface TraderStatus extends TraderSummary {
  startTime: string;
  runtimeMinutes: number;
  callCount: number;
  initialBalance: number;
  scanIntervalMinutes: number;
  stopUntil: string | null;
}

export interface TraderAccount {
  totalEquity: number;
  availableBalance: number;
  totalPnl: number;
  totalPnlPct: number;
  marginUsed: number;
  marginUsedPct: number;
  positionCount: number;
  dailyPnl: number;
}

export interface Position {
  symbol: string;
  side: "long" | "short";
  entryPrice: number;
  markPrice: number;
  quantity: number;
  leverage: number;
  unrealizedPnl: number;
  unrealizedPnlPct: number;
  liquidationPrice: number;
}

export interface EquityPoint {
  timestamp: string;
  cycleNumber: number;
  totalEquity: number;
  totalPnl: number;
  totalPnlPct: number;
}

export interface DecisionJson {
  symbol: string;
  action: string;
  leverage: number;
  position_size_usd: number;
  stop_loss: number;
  take_profit: number;
  confidence: number;
  reasoning: string;
}

export interface ActionJson {
  action: string;
  symbol: string;
  quantity: number;
  price: number;
  order_id: string;
  success: boolean;
  error: string;
}

export interface DecisionRecordJson {
  timestamp: string;
  cycle_number: number;
  cot_trace: string;
  decisions: DecisionJson[];
  actions: ActionJson[];
  execution_log: string[];
  success: boolean;
  error_message: string;
  account_state: { total_balance: number; available_balance: number; position_count: number };
}

export interface Statistics {
  totalCycles: number;
  successfulCycles: number;
  failedCycles: number;
  totalExecutions: number;
  successfulExecutions: number;
}

export interface Performance {
  sharpeRatio: number;
  winRate: number;
  maxDrawdown: number;
  profitFactor: number;
}

function base(): string {
  const url = import.meta.env.VITE_API_URL ?? "";
  if (url) return url;
  const origin = window.location.origin;
  if (origin && origin !== "null" && !origin.startsWith("file")) return origin;
  return "http://localhost:8080";
}

async function get<T>(path: string, traderId?: string): Promise<T> {
  const url = new URL(path, base());
  if (traderId) url.searchParams.set("trader_id", traderId);
  const res = await fetch(url);
  if (!res.ok) {
    const body: unknown = await res.json().catch(() => null);
    const msg =
      typeof body === "object" && body !== null && "error" in body && typeof body.error === "string"
        ? body.error
        : res.statusText;
    throw new Error(`${res.status}: ${msg}`);
  }
  // response shapes are the API's own
  return (await res.json()) as T;
}

export const api = {
  competition: () => get<{ traders: TraderComparison[]; count: number }>("/api/competition"),
  traders: () => get<TraderSummary[]>("/api/traders"),
  status: (id: string) => get<TraderStatus>("/api/status", id),
  account: (id: string) => get<TraderAccount>("/api/account", id),
  positions: (id: string) => get<Position[]>("/api/positions", id),
  latestDecisions: (id: string) => get<DecisionRecordJson[]>("/api/decisions/latest", id),
  statistics: (id: string) => get<Statistics>("/api/statistics", id),
  equityHistory: (id: string) => get<EquityPoint[]>("/api/equity-history", id),
  performance: (id: string) => get<Performance>("/api/performance", id),
};
