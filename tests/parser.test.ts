import { describe, it, expect } from "vitest";
import { MalformedResponse } from "../agent/src/errors.ts";
import { decisionToJson, matchingBracket, parseFullDecision, parseResponse } from "../agent/src/parser.ts";

describe("parseResponse", () => {
  it("splits reasoning from the trailing decision array", () => {
    const raw =
      "Trend is up, MACD crossing.\n\n" +
      '[{"symbol":"btcusdt","action":"open_long","leverage":5,"position_size_usd":5000,' +
      '"stop_loss":90000,"take_profit":99000,"confidence":80,"risk_usd":50,"reasoning":"breakout"}]';
    const { reasoning, decisions } = parseResponse(raw);
    expect(reasoning).toBe("Trend is up, MACD crossing.");
    expect(decisions).toEqual([
      {
        symbol: "BTCUSDT",
        action: "open_long",
        leverage: 5,
        positionSizeUsd: 5000,
        stopLoss: 90000,
        takeProfit: 99000,
        confidence: 80,
        riskUsd: 50,
        reasoning: "breakout",
      },
    ]);
  });

  it("skips bracketed fragments in the reasoning", () => {
    const raw = 'Looking at [1h] trend.\n[{"symbol":"ETHUSDT","action":"wait"}]';
    const { reasoning, decisions } = parseResponse(raw);
    expect(reasoning).toBe("Looking at [1h] trend.");
    expect(decisions.map((d) => d.action)).toEqual(["wait"]);
  });

  it("skips arrays that are not arrays of objects", () => {
    const { reasoning, decisions } = parseResponse('[1,2] then [{"action":"hold","symbol":"SOLUSDT"}]');
    expect(reasoning).toBe("[1,2] then");
    expect(decisions[0].symbol).toBe("SOLUSDT");
  });

  it("passes over an empty array in the reasoning when decisions follow", () => {
    const { reasoning, decisions } = parseResponse('No positions yet: [] so I scan.\n[{"symbol":"BTCUSDT","action":"hold"}]');
    expect(reasoning).toBe("No positions yet: [] so I scan.");
    expect(decisions).toHaveLength(1);
    expect(decisions[0].action).toBe("hold");
  });

  it("accepts an empty array when nothing else parses", () => {
    const { reasoning, decisions } = parseResponse("Nothing to do.\n[]");
    expect(reasoning).toBe("Nothing to do.");
    expect(decisions).toEqual([]);
  });

  it("normalizes smart quotes", () => {
    const { decisions } = parseResponse("[{“symbol”: “SOLUSDT”, “action”: “hold”}]");
    expect(decisions[0].symbol).toBe("SOLUSDT");
    expect(decisions[0].action).toBe("hold");
  });

  it("ignores brackets inside strings", () => {
    const { decisions } = parseResponse('[{"symbol":"BTCUSDT","action":"hold","reasoning":"range [60k]"}]');
    expect(decisions[0].reasoning).toBe("range [60k]");
  });

  it("coerces numeric strings and defaults missing fields", () => {
    const { decisions } = parseResponse('[{"symbol":" dogeusdt ","action":"open_short","leverage":"3"}]');
    expect(decisions[0].symbol).toBe("DOGEUSDT");
    expect(decisions[0].leverage).toBe(3);
    expect(decisions[0].stopLoss).toBe(0);
    expect(decisions[0].reasoning).toBe("");
  });

  it("throws with the whole text as reasoning when there is no array", () => {
    try {
      parseResponse("  I would wait this cycle.  ");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedResponse);
      if (err instanceof MalformedResponse) expect(err.reasoning).toBe("I would wait this cycle.");
    }
  });

  it("throws with the text before the first bracket when no array parses", () => {
    try {
      parseResponse('thinking...\n[{"symbol": }]');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedResponse);
      if (err instanceof MalformedResponse) expect(err.reasoning).toBe("thinking...");
    }
  });
});

describe("matchingBracket", () => {
  it("returns the closing index of nested arrays", () => {
    expect(matchingBracket("[[1],[2]]", 0)).toBe(8);
  });

  it("returns -1 when unbalanced", () => {
    expect(matchingBracket("[1, 2", 0)).toBe(-1);
  });
});

describe("parseFullDecision", () => {
  it("keeps the prompt and timestamp", () => {
    const now = new Date("2026-03-01T00:00:00.000Z");
    const full = parseFullDecision('ok [{"symbol":"BTCUSDT","action":"wait"}]', "user prompt", now);
    expect(full.userPrompt).toBe("user prompt");
    expect(full.timestamp).toBe(now);
    expect(full.reasoning).toBe("ok");
  });
});

describe("decisionToJson", () => {
  it("writes snake_case keys", () => {
    const { decisions } = parseResponse('[{"symbol":"BTCUSDT","action":"wait","risk_usd":12}]');
    expect(decisionToJson(decisions[0])).toMatchObject({ symbol: "BTCUSDT", action: "wait", risk_usd: 12, position_size_usd: 0 });
  });
});
