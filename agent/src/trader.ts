/**
 * Capability surface every exchange adapter implements.
 */

import type { ExchangeName } from "./errors.ts";
import type { PositionSide } from "./types.ts";

export interface ExchangeBalance {
  walletBalance: number;
  unrealizedProfit: number;
  availableBalance: number;
}

/** Raw position as the exchange reports it; `positionAmt` is negative for shorts. */
export interface ExchangePosition {
  symbol: string;
  positionAmt: number;
  entryPrice: number;
  markPrice: number;
  unrealizedProfit: number;
  leverage: number;
  liquidationPrice: number;
}

export interface OrderResult {
  orderId: string;
  symbol: string;
  quantity: number;
}

export type CloseOutcome =
  | { kind: "closed"; order: OrderResult }
  | { kind: "no_position" };

export interface Trader {
  readonly exchange: ExchangeName;
  getBalance(): Promise<ExchangeBalance>;
  getPositions(): Promise<ExchangePosition[]>;
  /** No-op when the symbol is already at `leverage`. */
  setLeverage(symbol: string, leverage: number): Promise<void>;
  /** Tolerates "already isolated". */
  setIsolatedMargin(symbol: string): Promise<void>;
  openLong(symbol: string, quantity: number, leverage: number): Promise<OrderResult>;
  openShort(symbol: string, quantity: number, leverage: number): Promise<OrderResult>;
  /** `quantity` 0 closes the whole live position. */
  closeLong(symbol: string, quantity: number): Promise<CloseOutcome>;
  closeShort(symbol: string, quantity: number): Promise<CloseOutcome>;
  cancelAllOrders(symbol: string): Promise<void>;
  getMarketPrice(symbol: string): Promise<number>;
  calculatePositionSize(balance: number, riskPercent: number, price: number, leverage: number): number;
  setStopLoss(symbol: string, side: PositionSide, quantity: number, stopPrice: number): Promise<void>;
  setTakeProfit(symbol: string, side: PositionSide, quantity: number, takeProfitPrice: number): Promise<void>;
}

export function sideOf(p: ExchangePosition): PositionSide {
  return p.positionAmt < 0 ? "short" : "long";
}

export function findPosition(
  positions: ExchangePosition[],
  symbol: string,
  side: PositionSide,
): ExchangePosition | undefined {
  return positions.find((p) => p.symbol === symbol && p.positionAmt !== 0 && sideOf(p) === side);
}

/** Coins sized so that `riskPercent` of the balance, levered, buys at `price`. */
export function positionSizeFromRisk(
  balance: number,
  riskPercent: number,
  price: number,
  leverage: number,
): number {
  if (!(price > 0)) return 0;
  return ((balance * riskPercent) / 100) * leverage / price;
}
