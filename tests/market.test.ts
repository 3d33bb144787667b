import { describe, it, expect } from "vitest";
import { BinanceFuturesClient } from "../agent/src/binance-client.ts";
import { BinanceMarketData, buildSeries, formatSnapshot, parseKlines } from "../agent/src/market.ts";
import { snapshot } from "./fixtures.ts";

function kline(i: number, close: number): unknown[] {
  return [i * 60_000, String(close), String(close + 1), String(close - 1), String(close), "10", i * 60_000 + 59_999];
}

/** Public market endpoints over flat 100-priced candles. */
function marketApi(opts: { klines?: number; oiHistory?: boolean } = {}) {
  const intervals: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    const url = new URL(String(input));
    const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });
    switch (url.pathname) {
      case "/fapi/v1/klines":
        intervals.push(url.searchParams.get("interval") ?? "");
        return json(Array.from({ length: opts.klines ?? 30 }, (_, i) => kline(i, 100)));
      case "/fapi/v1/openInterest":
        return json({ symbol: "SOLUSDT", openInterest: "2500.5" });
      case "/futures/data/openInterestHist":
        return opts.oiHistory === false
          ? json({ code: -1121, msg: "Invalid symbol." }, 400)
          : json([{ sumOpenInterest: "2000" }, { sumOpenInterest: "3000" }]);
      case "/fapi/v1/premiumIndex":
        return json({ symbol: "SOLUSDT", lastFundingRate: "0.00012" });
      default:
        return json({ code: -1, msg: "unexpected" }, 404);
    }
  };
  return { market: new BinanceMarketData({ client: new BinanceFuturesClient({ fetchImpl }) }), intervals };
}

describe("parseKlines", () => {
  it("reads string fields and tolerates junk rows", () => {
    expect(parseKlines([kline(1, 50), "junk"])).toEqual([
      { openTime: 60_000, open: 50, high: 51, low: 49, close: 50, volume: 10 },
      { openTime: 0, open: 0, high: 0, low: 0, close: 0, volume: 0 },
    ]);
  });
});

describe("buildSeries", () => {
  it("keeps the last ten points of each series", () => {
    const s = buildSeries(parseKlines(Array.from({ length: 30 }, (_, i) => kline(i, 100 + i))));
    expect(s.midPrices).toEqual([120, 121, 122, 123, 124, 125, 126, 127, 128, 129]);
    expect(s.volume).toHaveLength(10);
    expect(s.rsi7[9]).toBe(100);
    expect(s.macd).toHaveLength(5);
  });
});

describe("BinanceMarketData", () => {
  it("builds a three-timeframe snapshot", async () => {
    const { market, intervals } = marketApi();
    const snap = await market.getSnapshot("SOLUSDT", "3m");
    expect(intervals).toEqual(["3m", "15m", "1h"]);
    expect(snap.intervals).toEqual({ short: "3m", medium: "15m", long: "1h" });
    expect(snap.currentPrice).toBe(100);
    expect(snap.currentEma20).toBeCloseTo(100);
    expect(snap.openInterest).toEqual({ latest: 2500.5, average: 2500 });
    expect(snap.fundingRate).toBe(0.00012);
    expect(snap.short.midPrices).toHaveLength(10);
  });

  it("averages open interest from the latest value when history is unavailable", async () => {
    const { market } = marketApi({ oiHistory: false });
    const snap = await market.getSnapshot("SOLUSDT", "3m");
    expect(snap.openInterest.average).toBe(2500.5);
  });

  it("fails without short-interval candles", async () => {
    const { market } = marketApi({ klines: 0 });
    await expect(market.getSnapshot("SOLUSDT", "5m")).rejects.toThrow("no 5m klines for SOLUSDT");
  });
});

describe("formatSnapshot", () => {
  it("renders the indicator block", () => {
    const lines = formatSnapshot(snapshot("SOLUSDT", 100)).split("\n");
    expect(lines[0]).toBe(
      "current_price = 100.00, current_ema20 = 100.000, current_macd = 0.000, current_rsi (7 period) = 50.000",
    );
    expect(lines).toContain("In addition, here is the latest SOLUSDT open interest and funding rate for perps:");
    expect(lines).toContain("Open Interest: Latest: 1000000.00 Average: 1000000.00");
    expect(lines).toContain("Funding Rate: 1.00e-4");
    expect(lines).toContain("Short-term series (3m intervals, oldest → latest):");
    expect(lines).toContain("Long-term series (1h intervals, oldest → latest):");
    expect(lines).toContain("Mid prices: [100.000]");
    expect(lines).toContain("EMA indicators (20-period): []");
  });
});
