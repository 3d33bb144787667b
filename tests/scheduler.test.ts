import { describe, it, expect } from "vitest";
import { actionPriority, sortDecisions } from "../agent/src/scheduler.ts";
import { decision } from "./fixtures.ts";

describe("sortDecisions", () => {
  it("runs closes before opens before hold/wait, keeping input order within a tier", () => {
    const input = [
      decision({ symbol: "A", action: "open_long" }),
      decision({ symbol: "B", action: "hold" }),
      decision({ symbol: "C", action: "close_short" }),
      decision({ symbol: "D", action: "wait" }),
      decision({ symbol: "E", action: "close_long" }),
      decision({ symbol: "F", action: "open_short" }),
    ];
    expect(sortDecisions(input).map((d) => d.symbol)).toEqual(["C", "E", "A", "F", "B", "D"]);
  });

  it("moves a close ahead of an open and leaves hold last", () => {
    const out = sortDecisions([
      decision({ symbol: "BTCUSDT", action: "open_long" }),
      decision({ symbol: "ETHUSDT", action: "close_short" }),
      decision({ symbol: "SOLUSDT", action: "hold" }),
    ]);
    expect(out.map((d) => `${d.action} ${d.symbol}`)).toEqual(["close_short ETHUSDT", "open_long BTCUSDT", "hold SOLUSDT"]);
  });

  it("returns an already sorted list unchanged", () => {
    const sorted = sortDecisions([
      decision({ symbol: "A", action: "hold" }),
      decision({ symbol: "B", action: "open_long" }),
      decision({ symbol: "C", action: "close_long" }),
      decision({ symbol: "D", action: "open_long" }),
    ]);
    expect(sortDecisions(sorted)).toEqual(sorted);
    expect(sorted.filter((d) => d.action === "open_long").map((d) => d.symbol)).toEqual(["B", "D"]);
  });

  it("puts unknown actions last", () => {
    expect(actionPriority("rebalance")).toBe(999);
    const out = sortDecisions([decision({ symbol: "X", action: "rebalance" }), decision({ symbol: "Y", action: "wait" })]);
    expect(out.map((d) => d.symbol)).toEqual(["Y", "X"]);
  });

  it("does not mutate its input", () => {
    const input = [decision({ action: "wait" }), decision({ action: "close_long" })];
    sortDecisions(input);
    expect(input[0].action).toBe("wait");
  });
});
