import { Router } from "express";
import type { TraderManager } from "../../agent/src/manager.ts";
import { fail } from "./traders.ts";

/** GET /api/competition: every trader's equity and PnL side by side. */
export function competitionRouter(manager: TraderManager): Router {
  const router = Router();
  router.get("/competition", async (_req, res) => {
    try {
      res.json(await manager.getComparisonData());
    } catch (e) {
      fail(res, e);
    }
  });
  return router;
}
