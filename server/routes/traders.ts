/**
 * Per-trader read endpoints. Each takes ?trader_id=…, defaulting to the first
 * configured trader.
 */

import { Router, type Request, type Response } from "express";
import type { AutoTrader } from "../../agent/src/auto-trader.ts";
import { recordToJson } from "../../agent/src/decision-log.ts";
import type { TraderManager } from "../../agent/src/manager.ts";
import { redactSecrets } from "../secrets.ts";

const LATEST_DECISIONS = 5;
const DEFAULT_DECISIONS = 100;
const DEFAULT_EQUITY_POINTS = 1000;
const PERFORMANCE_CYCLES = 100;

function resolveTrader(manager: TraderManager, req: Request, res: Response): AutoTrader | null {
  const requested = typeof req.query.trader_id === "string" ? req.query.trader_id : "";
  const id = requested || manager.getTraderIds()[0];
  if (!id) {
    res.status(400).json({ error: "no traders configured" });
    return null;
  }
  const trader = manager.getTrader(id);
  if (!trader) {
    res.status(404).json({ error: `trader '${id}' not found` });
    return null;
  }
  return trader;
}

function limitParam(req: Request, fallback: number): number {
  const n = typeof req.query.limit === "string" ? parseInt(req.query.limit, 10) : NaN;
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function fail(res: Response, e: unknown): void {
  res.status(500).json({ error: redactSecrets(e instanceof Error ? e.message : String(e)) });
}

export function tradersRouter(manager: TraderManager): Router {
  const router = Router();

  router.get("/traders", (_req, res) => {
    res.json(
      manager.getAllTraders().map((t) => {
        const s = t.getStatus();
        return { traderId: t.id, traderName: t.name, aiModel: s.aiModel, exchange: s.exchange, isRunning: s.isRunning };
      }),
    );
  });

  router.get("/status", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    res.json(t.getStatus());
  });

  router.get("/account", async (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(await t.getAccountInfo());
    } catch (e) {
      fail(res, e);
    }
  });

  router.get("/positions", async (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(await t.getPositions());
    } catch (e) {
      fail(res, e);
    }
  });

  router.get("/decisions", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(t.decisionLog.getLatestRecords(limitParam(req, DEFAULT_DECISIONS)).map(recordToJson));
    } catch (e) {
      fail(res, e);
    }
  });

  // newest first
  router.get("/decisions/latest", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(t.decisionLog.getLatestRecords(LATEST_DECISIONS).reverse().map(recordToJson));
    } catch (e) {
      fail(res, e);
    }
  });

  router.get("/statistics", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(t.decisionLog.getStatistics());
    } catch (e) {
      fail(res, e);
    }
  });

  router.get("/equity-history", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(t.decisionLog.getEquityHistory(limitParam(req, DEFAULT_EQUITY_POINTS)));
    } catch (e) {
      fail(res, e);
    }
  });

  router.get("/performance", (req, res) => {
    const t = resolveTrader(manager, req, res);
    if (!t) return;
    try {
      res.json(t.decisionLog.analyzePerformance(limitParam(req, PERFORMANCE_CYCLES)));
    } catch (e) {
      fail(res, e);
    }
  });

  return router;
}
