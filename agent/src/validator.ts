/**
 * Hard risk rules applied to model decisions before anything reaches an exchange.
 * Fail-fast: the first violated rule rejects the whole batch.
 */

import { ValidationRejected } from "./errors.ts";
import { isDecisionAction, type Decision, type ValidDecision } from "./types.ts";

export const MAJOR_SYMBOLS: ReadonlySet<string> = new Set(["BTCUSDT", "ETHUSDT"]);

export interface ValidationLimits {
  accountEquity: number;
  btcEthLeverage: number;
  altcoinLeverage: number;
  /** default 3 */
  minRiskReward?: number;
  /**
   * Where between stop and target the entry is assumed for the reward:risk
   * check, measured from the stop side. Default 0.2.
   */
  assumedEntryFraction?: number;
}

const SIZE_TOLERANCE = 1.01;

export function isMajor(symbol: string): boolean {
  return MAJOR_SYMBOLS.has(symbol);
}

export function maxPositionValue(symbol: string, equity: number): number {
  return isMajor(symbol) ? equity * 10 : equity * 1.5;
}

export function assumedEntryPrice(d: Decision, fraction: number): number {
  if (d.action === "open_long") return d.stopLoss + (d.takeProfit - d.stopLoss) * fraction;
  return d.stopLoss - (d.stopLoss - d.takeProfit) * fraction;
}

export interface RiskReward {
  entry: number;
  riskPct: number;
  rewardPct: number;
  ratio: number;
}

/** Signed: a stop on the wrong side of the entry gives a non-positive risk. */
export function riskReward(d: Decision, entry: number): RiskReward {
  const long = d.action === "open_long";
  const riskPct = ((long ? entry - d.stopLoss : d.stopLoss - entry) / entry) * 100;
  const rewardPct = ((long ? d.takeProfit - entry : entry - d.takeProfit) / entry) * 100;
  return { entry, riskPct, rewardPct, ratio: riskPct > 0 ? rewardPct / riskPct : 0 };
}

export function validateDecision(
  d: Decision,
  limits: ValidationLimits,
  marketPrice?: number,
): asserts d is ValidDecision {
  const reject = (msg: string): never => {
    throw new ValidationRejected(`${d.symbol || "?"}: ${msg}`, d.symbol);
  };

  if (!isDecisionAction(d.action)) reject(`invalid action "${d.action}"`);
  if (d.action !== "open_long" && d.action !== "open_short") return;

  const major = isMajor(d.symbol);
  const cap = major ? limits.btcEthLeverage : limits.altcoinLeverage;
  if (!(d.leverage > 0) || d.leverage > cap) {
    reject(`leverage must be within 1-${cap}x (${major ? "BTC/ETH" : "altcoin"}), got ${d.leverage}`);
  }

  const maxValue = maxPositionValue(d.symbol, limits.accountEquity);
  if (!(d.positionSizeUsd > 0)) reject(`position_size_usd must be positive, got ${d.positionSizeUsd}`);
  if (d.positionSizeUsd > maxValue * SIZE_TOLERANCE) {
    reject(
      `position value ${d.positionSizeUsd.toFixed(0)} USDT exceeds the ${major ? "BTC/ETH" : "altcoin"} ` +
        `limit of ${maxValue.toFixed(0)} USDT (${major ? 10 : 1.5}x equity)`,
    );
  }

  if (!(d.stopLoss > 0) || !(d.takeProfit > 0)) reject("stop_loss and take_profit must be positive");
  if (d.action === "open_long" && d.stopLoss >= d.takeProfit) {
    reject("long stop_loss must be below take_profit");
  }
  if (d.action === "open_short" && d.stopLoss <= d.takeProfit) {
    reject("short stop_loss must be above take_profit");
  }

  if (marketPrice !== undefined && marketPrice > 0) {
    if (d.action === "open_long" && marketPrice <= d.stopLoss) {
      reject(`live price ${marketPrice} is already at or below the long stop_loss ${d.stopLoss}`);
    }
    if (d.action === "open_short" && marketPrice >= d.stopLoss) {
      reject(`live price ${marketPrice} is already at or above the short stop_loss ${d.stopLoss}`);
    }
  }

  const entry = assumedEntryPrice(d, limits.assumedEntryFraction ?? 0.2);
  const rr = riskReward(d, entry);
  const minRatio = limits.minRiskReward ?? 3;
  if (!(rr.riskPct > 0)) reject(`risk must be positive at entry ${entry.toFixed(4)}`);
  if (rr.ratio < minRatio) {
    reject(
      `reward:risk ${rr.ratio.toFixed(2)}:1 is below ${minRatio.toFixed(1)}:1 ` +
        `[risk ${rr.riskPct.toFixed(2)}%, reward ${rr.rewardPct.toFixed(2)}%] ` +
        `[entry ${entry.toFixed(2)}, stop ${d.stopLoss.toFixed(2)}, target ${d.takeProfit.toFixed(2)}]`,
    );
  }
}

/**
 * Validates every decision in order. `marketPrices` (symbol → live price) rejects
 * opens whose stop the market has already crossed.
 */
export function validateDecisions(
  decisions: Decision[],
  limits: ValidationLimits,
  marketPrices: ReadonlyMap<string, number> = new Map(),
): ValidDecision[] {
  const valid: ValidDecision[] = [];
  for (const d of decisions) {
    validateDecision(d, limits, marketPrices.get(d.symbol));
    valid.push(d);
  }
  return valid;
}
