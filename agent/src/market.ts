/**
 * Market snapshots: three timeframes of candles turned into indicator series,
 * plus open interest and funding, and the text block the prompt embeds.
 */

import { BinanceFuturesClient } from "./binance-client.ts";
import { errorMessage } from "./errors.ts";
import {
  atrSeries,
  emaSeries,
  last,
  macdSeries,
  rsiSeries,
  tail,
  type Candle,
} from "./indicators.ts";
import { deriveTimeframes } from "./intervals.ts";
import { asArray, asNumber, asRecord } from "./json.ts";
import { silentLogger, type Logger } from "./logger.ts";
import type { MarketSnapshot, TimeframeSeries } from "./types.ts";

export interface MarketSnapshotProvider {
  getSnapshot(symbol: string, shortInterval: string): Promise<MarketSnapshot>;
}

const KLINE_LIMIT = 100;
const SERIES_POINTS = 10;

export function parseKlines(raw: unknown): Candle[] {
  return asArray(raw).map((row) => {
    const k = asArray(row);
    return {
      openTime: asNumber(k[0]),
      open: asNumber(k[1]),
      high: asNumber(k[2]),
      low: asNumber(k[3]),
      close: asNumber(k[4]),
      volume: asNumber(k[5]),
    };
  });
}

export function buildSeries(candles: Candle[]): TimeframeSeries {
  const closes = candles.map((c) => c.close);
  return {
    midPrices: tail(closes, SERIES_POINTS),
    ema20: tail(emaSeries(closes, 20), SERIES_POINTS),
    macd: tail(macdSeries(closes), SERIES_POINTS),
    rsi7: tail(rsiSeries(closes, 7), SERIES_POINTS),
    rsi14: tail(rsiSeries(closes, 14), SERIES_POINTS),
    atr3: tail(atrSeries(candles, 3), SERIES_POINTS),
    atr14: tail(atrSeries(candles, 14), SERIES_POINTS),
    volume: tail(candles.map((c) => c.volume), SERIES_POINTS),
  };
}

/** Binance public futures data; no API key needed. */
export class BinanceMarketData implements MarketSnapshotProvider {
  private readonly client: BinanceFuturesClient;
  private readonly logger: Logger;

  constructor(opts: { client?: BinanceFuturesClient; logger?: Logger } = {}) {
    this.client = opts.client ?? new BinanceFuturesClient();
    this.logger = opts.logger ?? silentLogger;
  }

  async getSnapshot(symbol: string, shortInterval: string): Promise<MarketSnapshot> {
    const intervals = deriveTimeframes(shortInterval);
    const [shortK, mediumK, longK] = await Promise.all(
      [intervals.short, intervals.medium, intervals.long].map(async (i) =>
        parseKlines(await this.client.klines(symbol, i, KLINE_LIMIT)),
      ),
    );
    if (shortK.length === 0) throw new Error(`no ${intervals.short} klines for ${symbol}`);

    const short = buildSeries(shortK);
    const closes = shortK.map((c) => c.close);
    const latestOi = asNumber(asRecord(await this.client.openInterest(symbol)).openInterest);
    const funding = asNumber(asRecord(await this.client.premiumIndex(symbol)).lastFundingRate);

    return {
      symbol,
      currentPrice: closes[closes.length - 1],
      currentEma20: last(emaSeries(closes, 20)),
      currentMacd: last(macdSeries(closes)),
      currentRsi7: last(rsiSeries(closes, 7)),
      openInterest: { latest: latestOi, average: await this.averageOpenInterest(symbol, latestOi) },
      fundingRate: funding,
      intervals,
      short,
      medium: buildSeries(mediumK),
      long: buildSeries(longK),
    };
  }

  /** Mean of the last hour of 5m samples; the latest value if history is unavailable. */
  private async averageOpenInterest(symbol: string, latest: number): Promise<number> {
    try {
      const hist = asArray(await this.client.openInterestHist(symbol, "5m", 12))
        .map((h) => asNumber(asRecord(h).sumOpenInterest))
        .filter((v) => v > 0);
      if (hist.length === 0) return latest;
      return hist.reduce((a, b) => a + b, 0) / hist.length;
    } catch (err) {
      this.logger.verbose(`openInterestHist ${symbol}: ${errorMessage(err)}`);
      return latest;
    }
  }
}

const fmt = (values: number[], digits: number) => `[${values.map((v) => v.toFixed(digits)).join(", ")}]`;

function formatSeries(label: string, interval: string, s: TimeframeSeries): string {
  return [
    `${label} series (${interval} intervals, oldest → latest):`,
    "",
    `Mid prices: ${fmt(s.midPrices, 3)}`,
    "",
    `EMA indicators (20-period): ${fmt(s.ema20, 3)}`,
    "",
    `MACD indicators: ${fmt(s.macd, 3)}`,
    "",
    `RSI indicators (7-Period): ${fmt(s.rsi7, 3)}`,
    "",
    `RSI indicators (14-Period): ${fmt(s.rsi14, 3)}`,
    "",
    `ATR (3-period): ${fmt(s.atr3, 3)}`,
    "",
    `ATR (14-period): ${fmt(s.atr14, 3)}`,
    "",
    `Volume: ${fmt(s.volume, 3)}`,
  ].join("\n");
}

export function formatSnapshot(m: MarketSnapshot): string {
  return [
    `current_price = ${m.currentPrice.toFixed(2)}, current_ema20 = ${m.currentEma20.toFixed(3)}, ` +
      `current_macd = ${m.currentMacd.toFixed(3)}, current_rsi (7 period) = ${m.currentRsi7.toFixed(3)}`,
    "",
    `In addition, here is the latest ${m.symbol} open interest and funding rate for perps:`,
    "",
    `Open Interest: Latest: ${m.openInterest.latest.toFixed(2)} Average: ${m.openInterest.average.toFixed(2)}`,
    "",
    `Funding Rate: ${m.fundingRate.toExponential(2)}`,
    "",
    formatSeries("Short-term", m.intervals.short, m.short),
    "",
    formatSeries("Medium-term", m.intervals.medium, m.medium),
    "",
    formatSeries("Long-term", m.intervals.long, m.long),
    "",
  ].join("\n");
}
