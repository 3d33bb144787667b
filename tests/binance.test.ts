import { describe, it, expect } from "vitest";
import { BinanceFuturesClient } from "../agent/src/binance-client.ts";
import { BinanceTrader } from "../agent/src/binance.ts";
import { ExchangeError } from "../agent/src/errors.ts";

interface SeenRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  apiKey: string | null;
}

type Route = (req: SeenRequest) => { status?: number; body: unknown } | undefined;

/** In-process stand-in for the Binance REST API. */
function fakeBinance(route: Route) {
  const seen: SeenRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const req: SeenRequest = {
      method: init?.method ?? "GET",
      path: url.pathname,
      params: url.searchParams,
      apiKey: new Headers(init?.headers).get("X-MBX-APIKEY"),
    };
    seen.push(req);
    const res = route(req) ?? { body: {} };
    return new Response(JSON.stringify(res.body), { status: res.status ?? 200 });
  };
  return { seen, fetchImpl };
}

const exchangeInfo = {
  symbols: [{ symbol: "BTCUSDT", filters: [{ filterType: "PRICE_FILTER" }, { filterType: "LOT_SIZE", stepSize: "0.00100000" }] }],
};

function makeTrader(route: Route) {
  const fake = fakeBinance(route);
  const sleeps: number[] = [];
  const trader = new BinanceTrader({
    apiKey: "test-key",
    apiSecret: "test-secret",
    fetchImpl: fake.fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { trader, seen: fake.seen, sleeps };
}

describe("BinanceFuturesClient", () => {
  it("signs private requests", async () => {
    const { seen, fetchImpl } = fakeBinance(() => ({ body: { totalWalletBalance: "1" } }));
    const client = new BinanceFuturesClient({ apiKey: "test-key", apiSecret: "test-secret", fetchImpl });
    await client.account();
    expect(seen[0].apiKey).toBe("test-key");
    expect(seen[0].params.get("recvWindow")).toBe("5000");
    expect(seen[0].params.get("timestamp")).toMatch(/^\d+$/);
    expect(seen[0].params.get("signature")).toMatch(/^[0-9a-f]{64}$/);
  });

  it("does not sign public requests", async () => {
    const { seen, fetchImpl } = fakeBinance(() => ({ body: { price: "100" } }));
    await new BinanceFuturesClient({ fetchImpl }).tickerPrice("BTCUSDT");
    expect(seen[0].params.get("signature")).toBeNull();
    expect(seen[0].params.get("symbol")).toBe("BTCUSDT");
  });

  it("turns error bodies into ExchangeError", async () => {
    const { fetchImpl } = fakeBinance(() => ({ status: 400, body: { code: -2019, msg: "Margin is insufficient." } }));
    const client = new BinanceFuturesClient({ apiKey: "test-key", apiSecret: "test-secret", fetchImpl });
    try {
      await client.account();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ExchangeError);
      if (err instanceof ExchangeError) {
        expect(err.message).toBe("Binance HTTP 400: Margin is insufficient.");
        expect(err.details).toEqual({ status: 400, code: -2019 });
      }
    }
  });

  it("refuses signed requests without a secret", async () => {
    const { fetchImpl } = fakeBinance(() => ({ body: {} }));
    await expect(new BinanceFuturesClient({ fetchImpl }).account()).rejects.toThrow(/Missing Binance secret key/);
  });
});

describe("BinanceTrader", () => {
  it("reads balance and non-zero positions", async () => {
    const { trader } = makeTrader((req) => {
      if (req.path === "/fapi/v2/account") {
        return { body: { totalWalletBalance: "1000.5", totalUnrealizedProfit: "-10", availableBalance: "800" } };
      }
      if (req.path === "/fapi/v2/positionRisk") {
        return {
          body: [
            { symbol: "BTCUSDT", positionAmt: "-0.010", entryPrice: "60000", markPrice: "59000", unRealizedProfit: "10", leverage: "5", liquidationPrice: "70000" },
            { symbol: "ETHUSDT", positionAmt: "0.000", entryPrice: "0", markPrice: "3000", unRealizedProfit: "0", leverage: "5", liquidationPrice: "0" },
          ],
        };
      }
      return undefined;
    });
    expect(await trader.getBalance()).toEqual({ walletBalance: 1000.5, unrealizedProfit: -10, availableBalance: 800 });
    const positions = await trader.getPositions();
    expect(positions).toHaveLength(1);
    expect(positions[0]).toMatchObject({ symbol: "BTCUSDT", positionAmt: -0.01, leverage: 5, liquidationPrice: 70000 });
  });

  it("opens a long: cancel, leverage, isolated margin, then a market order at step precision", async () => {
    const { trader, seen, sleeps } = makeTrader((req) => {
      if (req.path === "/fapi/v2/positionRisk") return { body: [{ symbol: "BTCUSDT", leverage: "3", positionAmt: "0" }] };
      if (req.path === "/fapi/v1/exchangeInfo") return { body: exchangeInfo };
      if (req.path === "/fapi/v1/order") return { body: { orderId: 42 } };
      return undefined;
    });
    const order = await trader.openLong("BTCUSDT", 0.12345, 5);

    expect(seen.map((r) => `${r.method} ${r.path}`)).toEqual([
      "DELETE /fapi/v1/allOpenOrders",
      "GET /fapi/v2/positionRisk",
      "POST /fapi/v1/leverage",
      "POST /fapi/v1/marginType",
      "GET /fapi/v1/exchangeInfo",
      "POST /fapi/v1/order",
    ]);
    const orderReq = seen[5].params;
    expect(orderReq.get("side")).toBe("BUY");
    expect(orderReq.get("positionSide")).toBe("LONG");
    expect(orderReq.get("type")).toBe("MARKET");
    expect(orderReq.get("quantity")).toBe("0.123");
    expect(order).toEqual({ orderId: "42", symbol: "BTCUSDT", quantity: 0.123 });
    expect(sleeps).toEqual([5000, 3000]);
  });

  it("skips the leverage change when already at target and tolerates an isolated account", async () => {
    const { trader, seen, sleeps } = makeTrader((req) => {
      if (req.path === "/fapi/v2/positionRisk") return { body: [{ symbol: "BTCUSDT", leverage: "5" }] };
      if (req.path === "/fapi/v1/marginType") return { status: 400, body: { code: -4046, msg: "No need to change margin type." } };
      return undefined;
    });
    await trader.setLeverage("BTCUSDT", 5);
    await trader.setIsolatedMargin("BTCUSDT");
    expect(seen.some((r) => r.path === "/fapi/v1/leverage")).toBe(false);
    expect(sleeps).toEqual([]);
  });

  it("closes the whole live position when quantity is 0", async () => {
    const { trader, seen } = makeTrader((req) => {
      if (req.path === "/fapi/v2/positionRisk") {
        return { body: [{ symbol: "BTCUSDT", positionAmt: "-0.5", entryPrice: "60000", markPrice: "60000", leverage: "5" }] };
      }
      if (req.path === "/fapi/v1/exchangeInfo") return { body: exchangeInfo };
      if (req.path === "/fapi/v1/order") return { body: { orderId: 7 } };
      return undefined;
    });
    const outcome = await trader.closeShort("BTCUSDT", 0);
    expect(outcome).toEqual({ kind: "closed", order: { orderId: "7", symbol: "BTCUSDT", quantity: 0.5 } });
    const order = seen.find((r) => r.path === "/fapi/v1/order");
    expect(order?.params.get("side")).toBe("BUY");
    expect(order?.params.get("positionSide")).toBe("SHORT");
    expect(seen[seen.length - 1].path).toBe("/fapi/v1/allOpenOrders");
  });

  it("reports no_position instead of ordering when nothing is open", async () => {
    const { trader, seen } = makeTrader((req) => (req.path === "/fapi/v2/positionRisk" ? { body: [] } : undefined));
    expect(await trader.closeLong("BTCUSDT", 0)).toEqual({ kind: "no_position" });
    expect(seen.some((r) => r.path === "/fapi/v1/order")).toBe(false);
  });

  it("places stop-loss as a closePosition trigger without quantity", async () => {
    const { trader, seen } = makeTrader(() => undefined);
    await trader.setStopLoss("ETHUSDT", "long", 1.5, 2950.5);
    const p = seen[0].params;
    expect(p.get("type")).toBe("STOP_MARKET");
    expect(p.get("side")).toBe("SELL");
    expect(p.get("positionSide")).toBe("LONG");
    expect(p.get("stopPrice")).toBe("2950.5");
    expect(p.get("closePosition")).toBe("true");
    expect(p.get("workingType")).toBe("CONTRACT_PRICE");
    expect(p.get("quantity")).toBeNull();
  });

  it("places take-profit for shorts on the buy side", async () => {
    const { trader, seen } = makeTrader(() => undefined);
    await trader.setTakeProfit("ETHUSDT", "short", 1, 2800);
    expect(seen[0].params.get("type")).toBe("TAKE_PROFIT_MARKET");
    expect(seen[0].params.get("side")).toBe("BUY");
    expect(seen[0].params.get("stopPrice")).toBe("2800");
  });

  it("falls back to 3 quantity decimals for unknown symbols", async () => {
    const { trader } = makeTrader((req) => (req.path === "/fapi/v1/exchangeInfo" ? { body: exchangeInfo } : undefined));
    expect(await trader.formatQuantity("NEWUSDT", 1.23456)).toBe("1.235");
  });

  it("rejects a zero ticker price", async () => {
    const { trader } = makeTrader(() => ({ body: { price: "0" } }));
    await expect(trader.getMarketPrice("BTCUSDT")).rejects.toThrow("No price for BTCUSDT");
  });
});
