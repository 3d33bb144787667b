/**
 * Minimal signed REST client for Binance USDT-M futures.
 */

import crypto from "node:crypto";
import { ExchangeError } from "./errors.ts";
import { asNumber, asRecord, asString } from "./json.ts";

export const BINANCE_FUTURES_URL = "https://fapi.binance.com";

export type BinanceHttpMethod = "GET" | "POST" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface BinanceClientOptions {
  baseUrl?: string;
  apiKey?: string;
  apiSecret?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class BinanceFuturesClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly apiSecret?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BinanceClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? BINANCE_FUTURES_URL).replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  account(): Promise<unknown> {
    return this.request("/fapi/v2/account", { signed: true });
  }

  positionRisk(symbol?: string): Promise<unknown> {
    return this.request("/fapi/v2/positionRisk", { signed: true, query: { symbol } });
  }

  changeLeverage(symbol: string, leverage: number): Promise<unknown> {
    return this.request("/fapi/v1/leverage", { method: "POST", signed: true, query: { symbol, leverage } });
  }

  changeMarginType(symbol: string, marginType: "ISOLATED" | "CROSSED"): Promise<unknown> {
    return this.request("/fapi/v1/marginType", { method: "POST", signed: true, query: { symbol, marginType } });
  }

  newOrder(params: {
    symbol: string;
    side: "BUY" | "SELL";
    positionSide: "LONG" | "SHORT";
    type: "MARKET" | "STOP_MARKET" | "TAKE_PROFIT_MARKET";
    quantity?: string;
    stopPrice?: string;
    closePosition?: boolean;
    workingType?: "CONTRACT_PRICE" | "MARK_PRICE";
  }): Promise<unknown> {
    return this.request("/fapi/v1/order", { method: "POST", signed: true, query: params });
  }

  cancelAllOpenOrders(symbol: string): Promise<unknown> {
    return this.request("/fapi/v1/allOpenOrders", { method: "DELETE", signed: true, query: { symbol } });
  }

  tickerPrice(symbol: string): Promise<unknown> {
    return this.request("/fapi/v1/ticker/price", { query: { symbol } });
  }

  exchangeInfo(): Promise<unknown> {
    return this.request("/fapi/v1/exchangeInfo");
  }

  klines(symbol: string, interval: string, limit: number): Promise<unknown> {
    return this.request("/fapi/v1/klines", { query: { symbol, interval, limit } });
  }

  openInterest(symbol: string): Promise<unknown> {
    return this.request("/fapi/v1/openInterest", { query: { symbol } });
  }

  openInterestHist(symbol: string, period: string, limit: number): Promise<unknown> {
    return this.request("/futures/data/openInterestHist", { query: { symbol, period, limit } });
  }

  premiumIndex(symbol: string): Promise<unknown> {
    return this.request("/fapi/v1/premiumIndex", { query: { symbol } });
  }

  private sign(queryString: string): string {
    if (!this.apiSecret) {
      throw new ExchangeError("Missing Binance secret key for signed request", "binance");
    }
    return crypto.createHmac("sha256", this.apiSecret).update(queryString).digest("hex");
  }

  private async request(
    path: string,
    options?: {
      method?: BinanceHttpMethod;
      signed?: boolean;
      query?: Record<string, QueryValue>;
    },
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    const query = new URLSearchParams();

    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value === undefined) continue;
      query.set(key, String(value));
    }

    if (options?.signed) {
      query.set("timestamp", String(Date.now()));
      query.set("recvWindow", "5000");
      query.set("signature", this.sign(query.toString()));
    }

    url.search = query.toString();

    const method: BinanceHttpMethod = options?.method ?? "GET";
    const res = await this.fetchImpl(url, {
      method,
      headers: this.apiKey ? { "X-MBX-APIKEY": this.apiKey } : {},
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await res.text();
    if (!res.ok) {
      let code: number | undefined;
      let msg = text.slice(0, 250);
      try {
        const body = asRecord(JSON.parse(text));
        code = asNumber(body.code, NaN);
        if (Number.isNaN(code)) code = undefined;
        msg = asString(body.msg, msg);
      } catch {
        // non-JSON error page; keep the raw text
      }
      throw new ExchangeError(`Binance HTTP ${res.status}: ${msg}`, "binance", { status: res.status, code });
    }
    return text === "" ? {} : JSON.parse(text);
  }
}
