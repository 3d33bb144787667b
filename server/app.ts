/**
 * Express app over a TraderManager, exported for testing.
 */

import * as path from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import express, { type Express } from "express";
import cors from "cors";
import type { TraderManager } from "../agent/src/manager.ts";
import { competitionRouter } from "./routes/competition.ts";
import { tradersRouter } from "./routes/traders.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_DASHBOARD = path.join(__dirname, "..", "dist", "dashboard");

export function createApp(manager: TraderManager, dashboardDir: string = DEFAULT_DASHBOARD): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", time: new Date().toISOString() });
  });

  app.use("/api", competitionRouter(manager));
  app.use("/api", tradersRouter(manager));

  app.use(express.static(dashboardDir));
  app.get("/{*path}", (req, res) => {
    if (req.path.startsWith("/api")) {
      res.status(404).json({ error: "Not found" });
    } else if (!existsSync(path.join(dashboardDir, "index.html"))) {
      res.status(503).send(
        "<html><body style='font:16px monospace;background:#020817;color:#e2e8f0;padding:2rem'>" +
        "<h2>dashboard not built</h2>" +
        "<p>Run <code style='background:#1e293b;padding:2px 6px;border-radius:4px'>npm run build</code> then restart.</p>" +
        "</body></html>"
      );
    } else {
      res.sendFile(path.join(dashboardDir, "index.html"));
    }
  });

  return app;
}
