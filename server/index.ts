/**
 * Status API listener, started by `perp-agent run` next to the agents.
 */

import type { Server } from "http";
import type { TraderManager } from "../agent/src/manager.ts";
import { silentLogger, type Logger } from "../agent/src/logger.ts";
import { createApp } from "./app.ts";

export function startServer(manager: TraderManager, port: number, logger: Logger = silentLogger): Server {
  const app = createApp(manager);
  return app.listen(port, "0.0.0.0", () => {
    logger.log(`status API: http://localhost:${port}`);
    logger.log(`  /health, /api/competition, /api/traders, /api/status, /api/decisions/latest …`);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
