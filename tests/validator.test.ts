import { describe, it, expect } from "vitest";
import { ValidationRejected } from "../agent/src/errors.ts";
import {
  assumedEntryPrice,
  maxPositionValue,
  riskReward,
  validateDecision,
  validateDecisions,
} from "../agent/src/validator.ts";
import { decision } from "./fixtures.ts";

const limits = { accountEquity: 1000, btcEthLeverage: 5, altcoinLeverage: 5 };

const ethLong = decision({
  symbol: "ETHUSDT",
  action: "open_long",
  leverage: 5,
  positionSizeUsd: 5000,
  stopLoss: 3000,
  takeProfit: 3300,
  confidence: 80,
});

describe("validateDecision", () => {
  it("computes reward:risk from an entry 20% of the way from the stop", () => {
    expect(assumedEntryPrice(ethLong, 0.2)).toBe(3060);
    const rr = riskReward(ethLong, 3060);
    expect(rr.riskPct).toBeCloseTo(1.96, 2);
    expect(rr.rewardPct).toBeCloseTo(7.84, 2);
    expect(rr.ratio).toBeCloseTo(4, 9);
    expect(() => validateDecision({ ...ethLong }, limits)).not.toThrow();
  });

  it("ignores the live price when computing reward:risk", () => {
    expect(() => validateDecision({ ...ethLong }, limits, 3200)).not.toThrow();
    expect(() => validateDecision({ ...ethLong }, limits, 3060)).not.toThrow();
  });

  it("rejects a ratio just under 3:1", () => {
    // entry 3076.92: risk 2.50%, reward 7.25%
    expect(() => validateDecision({ ...ethLong }, { ...limits, assumedEntryFraction: 1 / 3.9 })).toThrow(
      "reward:risk 2.90:1 is below 3.0:1",
    );
  });

  it("honours a stricter minimum ratio", () => {
    expect(() => validateDecision({ ...ethLong }, { ...limits, minRiskReward: 4.5 })).toThrow(
      "reward:risk 4.00:1 is below 4.5:1",
    );
  });

  it("uses signed risk so an entry past the stop rejects", () => {
    const rr = riskReward(ethLong, 2990);
    expect(rr.riskPct).toBeLessThan(0);
    expect(rr.ratio).toBe(0);
    expect(() => validateDecision({ ...ethLong }, { ...limits, assumedEntryFraction: -0.1 })).toThrow(
      "risk must be positive at entry 2970.0000",
    );
  });

  it("rejects a long whose stop the market has already crossed", () => {
    expect(() => validateDecision({ ...ethLong, takeProfit: 3150 }, limits, 2990)).toThrow(
      "live price 2990 is already at or below the long stop_loss 3000",
    );
    expect(() => validateDecision({ ...ethLong }, limits, 3000)).toThrow("at or below the long stop_loss");
  });

  it("rejects a short whose stop the market has already crossed", () => {
    const short = decision({ symbol: "SOLUSDT", action: "open_short", leverage: 3, positionSizeUsd: 1000, stopLoss: 110, takeProfit: 80 });
    expect(assumedEntryPrice(short, 0.2)).toBe(104);
    expect(() => validateDecision(short, limits, 100)).not.toThrow();
    expect(() => validateDecision(short, limits, 111)).toThrow(
      "live price 111 is already at or above the short stop_loss 110",
    );
  });

  it("assumes short entries from the stop side too", () => {
    const short = decision({ action: "open_short", stopLoss: 110, takeProfit: 60 });
    expect(assumedEntryPrice(short, 0.2)).toBe(100);
  });

  it("rejects unknown actions", () => {
    expect(() => validateDecision(decision({ action: "buy" }), limits)).toThrow('invalid action "buy"');
  });

  it("lets close and hold through without sizing checks", () => {
    expect(() => validateDecision(decision({ action: "close_long" }), limits)).not.toThrow();
    expect(() => validateDecision(decision({ action: "hold" }), limits)).not.toThrow();
  });

  it("caps altcoin leverage", () => {
    const d = decision({ symbol: "SOLUSDT", action: "open_long", leverage: 6, positionSizeUsd: 1000, stopLoss: 90, takeProfit: 140 });
    expect(() => validateDecision(d, limits, 100)).toThrow("leverage must be within 1-5x (altcoin), got 6");
  });

  it("caps position value at 1.5x equity for altcoins with 1% tolerance", () => {
    const base = { symbol: "SOLUSDT", action: "open_long", leverage: 5, stopLoss: 90, takeProfit: 140 };
    expect(maxPositionValue("SOLUSDT", 1000)).toBe(1500);
    expect(() => validateDecision(decision({ ...base, positionSizeUsd: 1510 }), limits, 100)).not.toThrow();
    expect(() => validateDecision(decision({ ...base, positionSizeUsd: 1600 }), limits, 100)).toThrow(
      "exceeds the altcoin limit of 1500 USDT",
    );
  });

  it("caps position value at 10x equity for BTC/ETH", () => {
    expect(() => validateDecision({ ...ethLong, positionSizeUsd: 10_200 }, limits, 3060)).toThrow(
      "exceeds the BTC/ETH limit of 10000 USDT",
    );
  });

  it("requires stop below target for longs", () => {
    expect(() => validateDecision({ ...ethLong, stopLoss: 3400 }, limits, 3060)).toThrow(
      "long stop_loss must be below take_profit",
    );
  });

  it("tags the rejection with the symbol", () => {
    try {
      validateDecision({ ...ethLong, leverage: 0 }, limits, 3060);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationRejected);
      if (err instanceof ValidationRejected) expect(err.symbol).toBe("ETHUSDT");
    }
  });
});

describe("validateDecisions", () => {
  const tenX = { accountEquity: 1000, btcEthLeverage: 10, altcoinLeverage: 10 };
  const ethOpen = decision({
    symbol: "ETHUSDT",
    action: "open_long",
    leverage: 10,
    positionSizeUsd: 1400,
    stopLoss: 3000,
    takeProfit: 3300,
    confidence: 80,
    riskUsd: 50,
    reasoning: "x",
  });

  it("accepts a 10x ETH long at a live price above the assumed entry", () => {
    const valid = validateDecisions([{ ...ethOpen }], tenX, new Map([["ETHUSDT", 3200]]));
    expect(valid).toHaveLength(1);
    expect(valid[0].positionSizeUsd).toBe(1400);
  });

  it("rejects the same long once the market trades below its stop", () => {
    expect(() => validateDecisions([{ ...ethOpen }], tenX, new Map([["ETHUSDT", 2990]]))).toThrow(ValidationRejected);
  });

  it("rejects the whole batch on the first failure", () => {
    const batch = [decision({ action: "wait" }), decision({ action: "sell" }), { ...ethLong }];
    expect(() => validateDecisions(batch, limits)).toThrow('invalid action "sell"');
  });
});
