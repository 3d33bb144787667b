/**
 * Candidate coin discovery: the scored AI500 pool plus the open-interest
 * top list, each with a retrying fetch and a file cache as soft fallback.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from "fs";
import { join } from "path";
import { errorMessage } from "./errors.ts";
import { asArray, asNumber, asRecord, asString, isRecord } from "./json.ts";
import { silentLogger, type Logger } from "./logger.ts";
import type { CoinSource, OpenInterestTopEntry } from "./types.ts";

export const DEFAULT_MAINSTREAM_COINS = [
  "BTCUSDT",
  "ETHUSDT",
  "SOLUSDT",
  "BNBUSDT",
  "XRPUSDT",
  "DOGEUSDT",
  "ADAUSDT",
  "HYPEUSDT",
] as const;

export interface CoinInfo {
  pair: string;
  score: number;
  startTime: number;
  startPrice: number;
  lastScore: number;
  maxScore: number;
  maxPrice: number;
  increasePercent: number;
  isAvailable: boolean;
}

export interface MergedPool {
  allSymbols: string[];
  symbolSources: Map<string, CoinSource[]>;
  oiTop: OpenInterestTopEntry[];
}

export interface CoinPoolProvider {
  getMergedPool(limit?: number): Promise<MergedPool>;
}

export interface CoinPoolOptions {
  apiUrl?: string;
  oiTopApiUrl?: string;
  useDefaultCoins?: boolean;
  customCoins?: string[];
  cacheDir?: string;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const POOL_CACHE = "latest.json";
const OI_CACHE = "oi_top_latest.json";
const STALE_CACHE_MS = 24 * 3600 * 1000;

/** " btc " → "BTCUSDT"; already-suffixed symbols are kept. */
export function normalizeSymbol(symbol: string): string {
  const s = symbol.replace(/\s+/g, "").toUpperCase();
  return s.endsWith("USDT") ? s : `${s}USDT`;
}

function symbolsToCoins(symbols: readonly string[]): CoinInfo[] {
  return symbols.map((s) => ({
    pair: normalizeSymbol(s),
    score: 0,
    startTime: 0,
    startPrice: 0,
    lastScore: 0,
    maxScore: 0,
    maxPrice: 0,
    increasePercent: 0,
    isAvailable: true,
  }));
}

function toCoinInfo(raw: unknown): CoinInfo {
  const r = asRecord(raw);
  return {
    pair: normalizeSymbol(asString(r.pair)),
    score: asNumber(r.score),
    startTime: asNumber(r.start_time),
    startPrice: asNumber(r.start_price),
    lastScore: asNumber(r.last_score),
    maxScore: asNumber(r.max_score),
    maxPrice: asNumber(r.max_price),
    increasePercent: asNumber(r.increase_percent),
    isAvailable: true,
  };
}

function toOITopEntry(raw: unknown): OpenInterestTopEntry {
  const r = asRecord(raw);
  return {
    symbol: normalizeSymbol(asString(r.symbol)),
    rank: asNumber(r.rank),
    currentOi: asNumber(r.current_oi),
    oiDelta: asNumber(r.oi_delta),
    oiDeltaPercent: asNumber(r.oi_delta_percent),
    oiDeltaValue: asNumber(r.oi_delta_value),
    priceDeltaPercent: asNumber(r.price_delta_percent),
    netLong: asNumber(r.net_long),
    netShort: asNumber(r.net_short),
  };
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class HttpCoinPool implements CoinPoolProvider {
  private readonly opts: CoinPoolOptions;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly cacheDir: string;

  constructor(opts: CoinPoolOptions = {}) {
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
    this.cacheDir = opts.cacheDir ?? "coin_pool_cache";
  }

  /** Custom list → defaults (if requested or no API) → API → cache → defaults. */
  async getCoinPool(): Promise<CoinInfo[]> {
    if (this.opts.customCoins && this.opts.customCoins.length > 0) {
      return symbolsToCoins(this.opts.customCoins);
    }
    if (this.opts.useDefaultCoins) return symbolsToCoins(DEFAULT_MAINSTREAM_COINS);
    const url = this.opts.apiUrl?.trim() ?? "";
    if (url === "") {
      this.logger.verbose("no coin pool API configured, using default coins");
      return symbolsToCoins(DEFAULT_MAINSTREAM_COINS);
    }

    try {
      const coins = await this.withRetries("coin pool", async () => {
        const data = asRecord(await this.fetchPayload(url));
        const coins = asArray(data.coins).map(toCoinInfo).filter((c) => c.pair !== "USDT");
        if (coins.length === 0) throw new Error("coin list is empty");
        return coins;
      });
      this.saveCache(POOL_CACHE, { coins: coins.map(coinToJson), fetched_at: Date.now(), source_type: "api" });
      return coins;
    } catch (err) {
      this.logger.warn(`coin pool API failed: ${errorMessage(err)}`);
    }

    const cached = this.loadCache(POOL_CACHE);
    if (cached) {
      const coins = asArray(cached.coins).map(toCoinInfo);
      if (coins.length > 0) {
        this.logger.log(`using cached coin pool (${coins.length} coins)`);
        return coins;
      }
    }
    this.logger.warn("no coin pool cache, using default coins");
    return symbolsToCoins(DEFAULT_MAINSTREAM_COINS);
  }

  /** Highest-scored available pairs, at most `limit`. */
  async getTopRatedCoins(limit: number): Promise<string[]> {
    const coins = await this.getCoinPool();
    return coins
      .filter((c) => c.isAvailable)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((c) => c.pair);
  }

  async getOITopPositions(): Promise<OpenInterestTopEntry[]> {
    const url = this.opts.oiTopApiUrl?.trim() ?? "";
    if (url === "") return [];

    try {
      const positions = await this.withRetries("OI top", async () => {
        const data = asRecord(await this.fetchPayload(url));
        const positions = asArray(data.positions).map(toOITopEntry);
        if (positions.length === 0) throw new Error("OI top list is empty");
        return positions;
      });
      this.saveCache(OI_CACHE, { positions: positions.map(oiToJson), fetched_at: Date.now(), source_type: "api" });
      return positions;
    } catch (err) {
      this.logger.warn(`OI top API failed: ${errorMessage(err)}`);
    }

    const cached = this.loadCache(OI_CACHE);
    return cached ? asArray(cached.positions).map(toOITopEntry) : [];
  }

  async getMergedPool(limit = 20): Promise<MergedPool> {
    const sources = new Map<string, CoinSource[]>();
    const tag = (symbol: string, source: CoinSource) => {
      const list = sources.get(symbol) ?? [];
      if (!list.includes(source)) list.push(source);
      sources.set(symbol, list);
    };

    for (const s of await this.getTopRatedCoins(limit)) tag(s, "ai500");
    let oiTop: OpenInterestTopEntry[] = [];
    try {
      oiTop = await this.getOITopPositions();
    } catch (err) {
      this.logger.warn(`OI top unavailable: ${errorMessage(err)}`);
    }
    for (const p of oiTop) tag(p.symbol, "oi_top");
    return { allSymbols: [...sources.keys()], symbolSources: sources, oiTop };
  }

  private async fetchPayload(url: string): Promise<unknown> {
    const res = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000) });
    if (!res.ok) throw new Error(`HTTP ${res.status}: ${(await res.text()).slice(0, 200)}`);
    const body = asRecord(await res.json());
    if (body.success !== true) throw new Error("API reported failure");
    return body.data;
  }

  private async withRetries<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const retries = this.opts.retries ?? 3;
    let lastErr: unknown = new Error(`${label}: no attempts made`);
    for (let attempt = 1; attempt <= retries; attempt++) {
      if (attempt > 1) {
        this.logger.verbose(`${label}: retry ${attempt}/${retries}`);
        await this.sleep(this.opts.retryDelayMs ?? 2_000);
      }
      try {
        return await fn();
      } catch (err) {
        lastErr = err;
        this.logger.verbose(`${label}: attempt ${attempt} failed: ${errorMessage(err)}`);
      }
    }
    throw lastErr;
  }

  private saveCache(file: string, payload: unknown): void {
    try {
      mkdirSync(this.cacheDir, { recursive: true });
      const target = join(this.cacheDir, file);
      // concurrent agents: whichever rename lands last wins
      const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
      writeFileSync(tmp, JSON.stringify(payload, null, 2));
      renameSync(tmp, target);
    } catch (err) {
      this.logger.warn(`saving ${file} failed: ${errorMessage(err)}`);
    }
  }

  private loadCache(file: string): Record<string, unknown> | null {
    const path = join(this.cacheDir, file);
    if (!existsSync(path)) return null;
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
      if (!isRecord(parsed)) return null;
      if (Date.now() - statSync(path).mtimeMs > STALE_CACHE_MS) {
        this.logger.warn(`${file} is more than 24h old`);
      }
      return parsed;
    } catch (err) {
      this.logger.warn(`reading ${file} failed: ${errorMessage(err)}`);
      return null;
    }
  }
}

function coinToJson(c: CoinInfo) {
  return {
    pair: c.pair,
    score: c.score,
    start_time: c.startTime,
    start_price: c.startPrice,
    last_score: c.lastScore,
    max_score: c.maxScore,
    max_price: c.maxPrice,
    increase_percent: c.increasePercent,
  };
}

function oiToJson(p: OpenInterestTopEntry) {
  return {
    symbol: p.symbol,
    rank: p.rank,
    current_oi: p.currentOi,
    oi_delta: p.oiDelta,
    oi_delta_percent: p.oiDeltaPercent,
    oi_delta_value: p.oiDeltaValue,
    price_delta_percent: p.priceDeltaPercent,
    net_long: p.netLong,
    net_short: p.netShort,
  };
}
