/**
 * Binance USDT-M futures adapter (hedge mode: LONG/SHORT position sides).
 */

import { BinanceFuturesClient, type BinanceClientOptions } from "./binance-client.ts";
import { ExchangeError, PrecisionLookupFailed, errorMessage } from "./errors.ts";
import { asArray, asNumber, asRecord, asString } from "./json.ts";
import { silentLogger, type Logger } from "./logger.ts";
import { decimalsFromStepSize, formatQuantity } from "./precision.ts";
import {
  findPosition,
  positionSizeFromRisk,
  type CloseOutcome,
  type ExchangeBalance,
  type ExchangePosition,
  type OrderResult,
  type Trader,
} from "./trader.ts";
import type { PositionSide } from "./types.ts";

const FALLBACK_QUANTITY_DECIMALS = 3;
const PRECISION_CACHE_TTL = 3_600_000; // 1h
const LEVERAGE_SETTLE_MS = 5_000;
const MARGIN_SETTLE_MS = 3_000;

export interface BinanceTraderOptions extends BinanceClientOptions {
  apiKey: string;
  apiSecret: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class BinanceTrader implements Trader {
  readonly exchange = "binance" as const;
  private readonly client: BinanceFuturesClient;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private precisionCache: Map<string, number> | null = null;
  private precisionCacheTime = 0;

  constructor(opts: BinanceTraderOptions) {
    this.client = new BinanceFuturesClient(opts);
    this.logger = opts.logger ?? silentLogger;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async getBalance(): Promise<ExchangeBalance> {
    const acct = asRecord(await this.client.account());
    return {
      walletBalance: asNumber(acct.totalWalletBalance),
      unrealizedProfit: asNumber(acct.totalUnrealizedProfit),
      availableBalance: asNumber(acct.availableBalance),
    };
  }

  async getPositions(): Promise<ExchangePosition[]> {
    const rows = asArray(await this.client.positionRisk());
    return rows
      .map((row) => toPosition(asRecord(row)))
      .filter((p) => p.positionAmt !== 0);
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    const rows = asArray(await this.client.positionRisk(symbol)).map(asRecord);
    const current = rows.find((r) => asString(r.symbol) === symbol);
    if (current && asNumber(current.leverage) === leverage) {
      this.logger.verbose(`${symbol} leverage already ${leverage}x`);
      return;
    }
    try {
      await this.client.changeLeverage(symbol, leverage);
    } catch (err) {
      if (errorMessage(err).includes("No need to change")) return;
      throw err;
    }
    this.logger.verbose(`${symbol} leverage set to ${leverage}x`);
    // changes take a moment to apply on the matching engine
    await this.sleep(LEVERAGE_SETTLE_MS);
  }

  async setIsolatedMargin(symbol: string): Promise<void> {
    try {
      await this.client.changeMarginType(symbol, "ISOLATED");
    } catch (err) {
      if (errorMessage(err).includes("No need to change")) return;
      throw err;
    }
    this.logger.verbose(`${symbol} margin mode set to isolated`);
    await this.sleep(MARGIN_SETTLE_MS);
  }

  openLong(symbol: string, quantity: number, leverage: number): Promise<OrderResult> {
    return this.open(symbol, "long", quantity, leverage);
  }

  openShort(symbol: string, quantity: number, leverage: number): Promise<OrderResult> {
    return this.open(symbol, "short", quantity, leverage);
  }

  closeLong(symbol: string, quantity: number): Promise<CloseOutcome> {
    return this.close(symbol, "long", quantity);
  }

  closeShort(symbol: string, quantity: number): Promise<CloseOutcome> {
    return this.close(symbol, "short", quantity);
  }

  async cancelAllOrders(symbol: string): Promise<void> {
    await this.client.cancelAllOpenOrders(symbol);
  }

  async getMarketPrice(symbol: string): Promise<number> {
    const price = asNumber(asRecord(await this.client.tickerPrice(symbol)).price);
    if (!(price > 0)) throw new ExchangeError(`No price for ${symbol}`, "binance");
    return price;
  }

  calculatePositionSize(balance: number, riskPercent: number, price: number, leverage: number): number {
    return positionSizeFromRisk(balance, riskPercent, price, leverage);
  }

  setStopLoss(symbol: string, side: PositionSide, quantity: number, stopPrice: number): Promise<void> {
    return this.placeTrigger(symbol, side, quantity, stopPrice, "STOP_MARKET");
  }

  setTakeProfit(symbol: string, side: PositionSide, quantity: number, takeProfitPrice: number): Promise<void> {
    return this.placeTrigger(symbol, side, quantity, takeProfitPrice, "TAKE_PROFIT_MARKET");
  }

  /** Quantity decimals from the LOT_SIZE filter; falls back to 3 when metadata is unavailable. */
  async quantityDecimals(symbol: string): Promise<number> {
    try {
      const table = await this.loadPrecision();
      const decimals = table.get(symbol);
      if (decimals === undefined) throw new PrecisionLookupFailed(`${symbol} not in exchangeInfo`);
      return decimals;
    } catch (err) {
      this.logger.warn(`precision lookup failed for ${symbol}, using ${FALLBACK_QUANTITY_DECIMALS} decimals: ${errorMessage(err)}`);
      return FALLBACK_QUANTITY_DECIMALS;
    }
  }

  async formatQuantity(symbol: string, quantity: number): Promise<string> {
    return formatQuantity(quantity, await this.quantityDecimals(symbol));
  }

  private async loadPrecision(): Promise<Map<string, number>> {
    const now = Date.now();
    if (this.precisionCache && now - this.precisionCacheTime < PRECISION_CACHE_TTL) {
      return this.precisionCache;
    }
    const info = asRecord(await this.client.exchangeInfo());
    const table = new Map<string, number>();
    for (const s of asArray(info.symbols).map(asRecord)) {
      const lot = asArray(s.filters).map(asRecord).find((f) => f.filterType === "LOT_SIZE");
      if (lot) table.set(asString(s.symbol), decimalsFromStepSize(asString(lot.stepSize, "0.001")));
    }
    this.precisionCache = table;
    this.precisionCacheTime = now;
    return table;
  }

  private async open(symbol: string, side: PositionSide, quantity: number, leverage: number): Promise<OrderResult> {
    try {
      await this.cancelAllOrders(symbol);
    } catch (err) {
      this.logger.warn(`cancel resting orders for ${symbol} failed: ${errorMessage(err)}`);
    }
    await this.setLeverage(symbol, leverage);
    await this.setIsolatedMargin(symbol);

    const qty = await this.formatQuantity(symbol, quantity);
    const res = asRecord(
      await this.client.newOrder({
        symbol,
        side: side === "long" ? "BUY" : "SELL",
        positionSide: side === "long" ? "LONG" : "SHORT",
        type: "MARKET",
        quantity: qty,
      }),
    );
    this.logger.log(`opened ${side} ${symbol} qty ${qty} (order ${asString(res.orderId)})`);
    return { orderId: asString(res.orderId), symbol, quantity: parseFloat(qty) };
  }

  private async close(symbol: string, side: PositionSide, quantity: number): Promise<CloseOutcome> {
    let amount = quantity;
    if (amount === 0) {
      const pos = findPosition(await this.getPositions(), symbol, side);
      if (!pos) return { kind: "no_position" };
      amount = Math.abs(pos.positionAmt);
    }

    const qty = await this.formatQuantity(symbol, amount);
    const res = asRecord(
      await this.client.newOrder({
        symbol,
        side: side === "long" ? "SELL" : "BUY",
        positionSide: side === "long" ? "LONG" : "SHORT",
        type: "MARKET",
        quantity: qty,
      }),
    );
    this.logger.log(`closed ${side} ${symbol} qty ${qty} (order ${asString(res.orderId)})`);

    try {
      await this.cancelAllOrders(symbol);
    } catch (err) {
      this.logger.warn(`cancel leftover orders for ${symbol} failed: ${errorMessage(err)}`);
    }
    return { kind: "closed", order: { orderId: asString(res.orderId), symbol, quantity: parseFloat(qty) } };
  }

  private async placeTrigger(
    symbol: string,
    side: PositionSide,
    quantity: number,
    price: number,
    type: "STOP_MARKET" | "TAKE_PROFIT_MARKET",
  ): Promise<void> {
    // closePosition covers the whole position; Binance rejects an explicit quantity with it
    await this.client.newOrder({
      symbol,
      side: side === "long" ? "SELL" : "BUY",
      positionSide: side === "long" ? "LONG" : "SHORT",
      type,
      stopPrice: price.toFixed(8).replace(/\.?0+$/, ""),
      workingType: "CONTRACT_PRICE",
      closePosition: true,
    });
    this.logger.verbose(`${type} for ${side} ${symbol} (${quantity}) at ${price}`);
  }
}

function toPosition(r: Record<string, unknown>): ExchangePosition {
  return {
    symbol: asString(r.symbol),
    positionAmt: asNumber(r.positionAmt),
    entryPrice: asNumber(r.entryPrice),
    markPrice: asNumber(r.markPrice),
    unrealizedProfit: asNumber(r.unRealizedProfit),
    leverage: asNumber(r.leverage, 1),
    liquidationPrice: asNumber(r.liquidationPrice),
  };
}
