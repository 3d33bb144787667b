/**
 * Placeholder adapter for exchanges without a live integration (Aster).
 * Never touches the network: empty account, fixed price, synthetic order ids.
 */

import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import type { CloseOutcome, ExchangeBalance, ExchangePosition, OrderResult, Trader } from "./trader.ts";
import type { PositionSide } from "./types.ts";

const DUMMY_PRICE = 100;
const DUMMY_ORDER_ID = "dummy_order_id";

export class DummyTrader implements Trader {
  readonly exchange = "aster" as const;

  constructor(private readonly logger: Logger = silentLogger) {}

  async getBalance(): Promise<ExchangeBalance> {
    return { walletBalance: 0, unrealizedProfit: 0, availableBalance: 0 };
  }

  async getPositions(): Promise<ExchangePosition[]> {
    return [];
  }

  async setLeverage(): Promise<void> {}

  async setIsolatedMargin(): Promise<void> {}

  async openLong(symbol: string, quantity: number, _leverage: number): Promise<OrderResult> {
    this.logger.verbose(`[dummy] open long ${symbol} ${quantity}`);
    return { orderId: DUMMY_ORDER_ID, symbol, quantity };
  }

  async openShort(symbol: string, quantity: number, _leverage: number): Promise<OrderResult> {
    this.logger.verbose(`[dummy] open short ${symbol} ${quantity}`);
    return { orderId: DUMMY_ORDER_ID, symbol, quantity };
  }

  async closeLong(symbol: string, quantity: number): Promise<CloseOutcome> {
    return { kind: "closed", order: { orderId: DUMMY_ORDER_ID, symbol, quantity } };
  }

  async closeShort(symbol: string, quantity: number): Promise<CloseOutcome> {
    return { kind: "closed", order: { orderId: DUMMY_ORDER_ID, symbol, quantity } };
  }

  async cancelAllOrders(): Promise<void> {}

  async getMarketPrice(_symbol: string): Promise<number> {
    return DUMMY_PRICE;
  }

  calculatePositionSize(): number {
    return 0;
  }

  async setStopLoss(symbol: string, side: PositionSide, _quantity: number, stopPrice: number): Promise<void> {
    this.logger.verbose(`[dummy] stop-loss ${side} ${symbol} @ ${stopPrice}`);
  }

  async setTakeProfit(symbol: string, side: PositionSide, _quantity: number, takeProfitPrice: number): Promise<void> {
    this.logger.verbose(`[dummy] take-profit ${side} ${symbol} @ ${takeProfitPrice}`);
  }
}
