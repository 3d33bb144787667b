/**
 * Hyperliquid perps adapter. Orders are IOC limits priced 1% through the mid,
 * closes and triggers are reduce-only, margin is always isolated.
 */

import { ExchangeClient, HttpTransport, InfoClient } from "@nktkas/hyperliquid";
import { privateKeyToAccount } from "viem/accounts";
import { ExchangeError, errorMessage } from "./errors.ts";
import { asArray, asNumber, asRecord, asString } from "./json.ts";
import { silentLogger, type Logger } from "./logger.ts";
import { formatSignificantPrice, roundToDecimals, toPlainString } from "./precision.ts";
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

export type Address = `0x${string}`;

/** The subset of the SDK's InfoClient this adapter reads. */
export interface HyperliquidInfoApi {
  metaAndAssetCtxs(): Promise<unknown>;
  clearinghouseState(params: { user: Address }): Promise<unknown>;
  allMids(): Promise<unknown>;
  openOrders(params: { user: Address }): Promise<unknown>;
}

export type OrderType =
  | { limit: { tif: "Ioc" } }
  | { trigger: { isMarket: boolean; triggerPx: string; tpsl: "tp" | "sl" } };

export interface OrderWire {
  a: number;
  b: boolean;
  p: string;
  s: string;
  r: boolean;
  t: OrderType;
}

/** The subset of the SDK's ExchangeClient this adapter signs with. */
export interface HyperliquidExchangeApi {
  order(params: { orders: OrderWire[]; grouping: "na" }): Promise<unknown>;
  cancel(params: { cancels: Array<{ a: number; o: number }> }): Promise<unknown>;
  updateLeverage(params: { asset: number; isCross: boolean; leverage: number }): Promise<unknown>;
}

export interface HyperliquidClients {
  info: HyperliquidInfoApi;
  exchange: HyperliquidExchangeApi;
  user: Address;
}

export function createHyperliquidClients(opts: {
  privateKey: Address;
  accountAddress?: Address;
  testnet?: boolean;
}): HyperliquidClients {
  const transport = new HttpTransport({ isTestnet: opts.testnet ?? false });
  const wallet = privateKeyToAccount(opts.privateKey);
  return {
    info: new InfoClient({ transport }),
    exchange: new ExchangeClient({ transport, wallet }),
    user: opts.accountAddress ?? wallet.address,
  };
}

export interface MetaAsset {
  name: string;
  szDecimals: number;
  maxLeverage: number;
}

const FALLBACK_SZ_DECIMALS = 4;
const META_CACHE_TTL = 3_600_000; // 1h
const SLIPPAGE = 0.01;

/** "BTCUSDT" → "BTC"; short symbols pass through. */
export function symbolToCoin(symbol: string): string {
  return symbol.length > 4 && symbol.endsWith("USDT") ? symbol.slice(0, -4) : symbol;
}

export interface HyperliquidTraderOptions {
  clients: HyperliquidClients;
  logger?: Logger;
}

export class HyperliquidTrader implements Trader {
  readonly exchange = "hyperliquid" as const;
  private readonly info: HyperliquidInfoApi;
  private readonly ex: HyperliquidExchangeApi;
  private readonly user: Address;
  private readonly logger: Logger;
  private metaCache: MetaAsset[] | null = null;
  private metaCacheTime = 0;

  constructor(opts: HyperliquidTraderOptions) {
    this.info = opts.clients.info;
    this.ex = opts.clients.exchange;
    this.user = opts.clients.user;
    this.logger = opts.logger ?? silentLogger;
  }

  async getBalance(): Promise<ExchangeBalance> {
    const state = asRecord(await this.info.clearinghouseState({ user: this.user }));
    const summary = asRecord(state.marginSummary);
    const accountValue = asNumber(summary.accountValue);
    const marginUsed = asNumber(summary.totalMarginUsed);
    const unrealized = asArray(state.assetPositions)
      .map((ap) => asNumber(asRecord(asRecord(ap).position).unrealizedPnl))
      .reduce((a, b) => a + b, 0);
    return {
      walletBalance: accountValue - unrealized,
      unrealizedProfit: unrealized,
      availableBalance: accountValue - marginUsed,
    };
  }

  async getPositions(): Promise<ExchangePosition[]> {
    const state = asRecord(await this.info.clearinghouseState({ user: this.user }));
    const out: ExchangePosition[] = [];
    for (const ap of asArray(state.assetPositions)) {
      const pos = asRecord(asRecord(ap).position);
      const szi = asNumber(pos.szi);
      if (szi === 0) continue;
      out.push({
        symbol: `${asString(pos.coin)}USDT`,
        positionAmt: szi,
        entryPrice: asNumber(pos.entryPx),
        markPrice: asNumber(pos.positionValue) / Math.abs(szi),
        unrealizedProfit: asNumber(pos.unrealizedPnl),
        leverage: asNumber(asRecord(pos.leverage).value, 1),
        liquidationPrice: asNumber(pos.liquidationPx),
      });
    }
    return out;
  }

  async setLeverage(symbol: string, leverage: number): Promise<void> {
    const coin = symbolToCoin(symbol);
    const state = asRecord(await this.info.clearinghouseState({ user: this.user }));
    const current = asArray(state.assetPositions)
      .map((ap) => asRecord(asRecord(ap).position))
      .find((p) => p.coin === coin);
    if (current) {
      const lev = asRecord(current.leverage);
      if (lev.type === "isolated" && asNumber(lev.value) === leverage) {
        this.logger.verbose(`${coin} leverage already ${leverage}x isolated`);
        return;
      }
    }
    const { assetId } = await this.asset(coin);
    await this.ex.updateLeverage({ asset: assetId, isCross: false, leverage });
    this.logger.verbose(`${coin} leverage set to ${leverage}x isolated`);
  }

  async setIsolatedMargin(symbol: string): Promise<void> {
    // margin mode travels with updateLeverage (isCross: false)
    this.logger.verbose(`${symbolToCoin(symbol)} uses isolated margin`);
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
    const coin = symbolToCoin(symbol);
    const orders = asArray(await this.info.openOrders({ user: this.user }))
      .map(asRecord)
      .filter((o) => o.coin === coin);
    if (orders.length === 0) return;
    const { assetId } = await this.asset(coin);
    await this.ex.cancel({ cancels: orders.map((o) => ({ a: assetId, o: asNumber(o.oid) })) });
    this.logger.verbose(`cancelled ${orders.length} order(s) on ${coin}`);
  }

  async getMarketPrice(symbol: string): Promise<number> {
    const coin = symbolToCoin(symbol);
    const mid = asNumber(asRecord(await this.info.allMids())[coin]);
    if (!(mid > 0)) throw new ExchangeError(`No mid price for ${coin}`, "hyperliquid");
    return mid;
  }

  calculatePositionSize(balance: number, riskPercent: number, price: number, leverage: number): number {
    return positionSizeFromRisk(balance, riskPercent, price, leverage);
  }

  setStopLoss(symbol: string, side: PositionSide, quantity: number, stopPrice: number): Promise<void> {
    return this.placeTrigger(symbol, side, quantity, stopPrice, "sl");
  }

  setTakeProfit(symbol: string, side: PositionSide, quantity: number, takeProfitPrice: number): Promise<void> {
    return this.placeTrigger(symbol, side, quantity, takeProfitPrice, "tp");
  }

  async getMeta(): Promise<MetaAsset[]> {
    const now = Date.now();
    if (this.metaCache && now - this.metaCacheTime < META_CACHE_TTL) return this.metaCache;
    const [meta] = asArray(await this.info.metaAndAssetCtxs());
    const universe = asArray(asRecord(meta).universe).map((u) => {
      const r = asRecord(u);
      return {
        name: asString(r.name),
        szDecimals: asNumber(r.szDecimals, FALLBACK_SZ_DECIMALS),
        maxLeverage: asNumber(r.maxLeverage, 1),
      };
    });
    this.metaCache = universe;
    this.metaCacheTime = now;
    return universe;
  }

  private async asset(coin: string): Promise<{ assetId: number; szDecimals: number }> {
    const universe = await this.getMeta();
    const assetId = universe.findIndex((a) => a.name === coin);
    if (assetId < 0) throw new ExchangeError(`Unknown coin: ${coin}`, "hyperliquid");
    return { assetId, szDecimals: universe[assetId].szDecimals };
  }

  private async submit(coin: string, order: OrderWire): Promise<string> {
    const res = asRecord(await this.ex.order({ orders: [order], grouping: "na" }));
    const [status] = asArray(asRecord(asRecord(res.response).data).statuses).map(asRecord);
    if (status?.error !== undefined) {
      throw new ExchangeError(`Hyperliquid order on ${coin} rejected: ${asString(status.error)}`, "hyperliquid");
    }
    const filled = asRecord(status?.filled);
    const resting = asRecord(status?.resting);
    return asString(filled.oid ?? resting.oid, "0");
  }

  private async open(symbol: string, side: PositionSide, quantity: number, leverage: number): Promise<OrderResult> {
    const coin = symbolToCoin(symbol);
    try {
      await this.cancelAllOrders(symbol);
    } catch (err) {
      this.logger.warn(`cancel resting orders for ${coin} failed: ${errorMessage(err)}`);
    }
    await this.setLeverage(symbol, leverage);
    await this.setIsolatedMargin(symbol);

    const { assetId, szDecimals } = await this.asset(coin);
    const size = roundToDecimals(quantity, szDecimals);
    const mid = await this.getMarketPrice(symbol);
    const isBuy = side === "long";
    const limitPx = formatSignificantPrice(mid * (isBuy ? 1 + SLIPPAGE : 1 - SLIPPAGE), szDecimals);

    const orderId = await this.submit(coin, {
      a: assetId,
      b: isBuy,
      p: limitPx,
      s: toPlainString(size, szDecimals),
      r: false,
      t: { limit: { tif: "Ioc" } },
    });
    this.logger.log(`opened ${side} ${coin} size ${size} @≤${limitPx} (oid ${orderId})`);
    return { orderId, symbol, quantity: size };
  }

  private async close(symbol: string, side: PositionSide, quantity: number): Promise<CloseOutcome> {
    const coin = symbolToCoin(symbol);
    let amount = quantity;
    if (amount === 0) {
      const pos = findPosition(await this.getPositions(), `${coin}USDT`, side);
      if (!pos) return { kind: "no_position" };
      amount = Math.abs(pos.positionAmt);
    }

    const { assetId, szDecimals } = await this.asset(coin);
    const size = roundToDecimals(amount, szDecimals);
    const mid = await this.getMarketPrice(symbol);
    const isBuy = side === "short";
    const limitPx = formatSignificantPrice(mid * (isBuy ? 1 + SLIPPAGE : 1 - SLIPPAGE), szDecimals);

    const orderId = await this.submit(coin, {
      a: assetId,
      b: isBuy,
      p: limitPx,
      s: toPlainString(size, szDecimals),
      r: true,
      t: { limit: { tif: "Ioc" } },
    });
    this.logger.log(`closed ${side} ${coin} size ${size} (oid ${orderId})`);

    try {
      await this.cancelAllOrders(symbol);
    } catch (err) {
      this.logger.warn(`cancel leftover orders for ${coin} failed: ${errorMessage(err)}`);
    }
    return { kind: "closed", order: { orderId, symbol, quantity: size } };
  }

  private async placeTrigger(
    symbol: string,
    side: PositionSide,
    quantity: number,
    price: number,
    tpsl: "tp" | "sl",
  ): Promise<void> {
    const coin = symbolToCoin(symbol);
    const { assetId, szDecimals } = await this.asset(coin);
    const triggerPx = formatSignificantPrice(price, szDecimals);
    await this.submit(coin, {
      a: assetId,
      b: side === "short",
      p: triggerPx,
      s: toPlainString(roundToDecimals(quantity, szDecimals), szDecimals),
      r: true,
      t: { trigger: { isMarket: true, triggerPx, tpsl } },
    });
    this.logger.verbose(`${tpsl.toUpperCase()} for ${side} ${coin} at ${triggerPx}`);
  }
}
