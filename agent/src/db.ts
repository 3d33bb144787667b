/**
 * SQLite database for decision records.
 *
 * Environment switching via TRADER_ENV:
 *   testing    → :memory:                 (in-process tests, no side effects)
 *   local      → data/decisions-local.db  (dev/paper trading)
 *   production → data/decisions.db        (default)
 *
 * The directory can be overridden with TRADER_DATA_DIR.
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";

export type DbEnv = "testing" | "local" | "production";

function resolveEnv(): DbEnv {
  const e = process.env.TRADER_ENV ?? "production";
  if (e === "testing" || e === "local" || e === "production") return e;
  return "production";
}

function resolveDbPath(env: DbEnv): string {
  if (env === "testing") return ":memory:";
  const dataDir = process.env.TRADER_DATA_DIR || path.join(process.cwd(), "data");
  if (!fs.existsSync(dataDir)) fs.mkdirSync(dataDir, { recursive: true });
  return path.join(dataDir, env === "local" ? "decisions-local.db" : "decisions.db");
}

let dbInstance: Database.Database | null = null;

export function getDb(env?: DbEnv): Database.Database {
  if (dbInstance) return dbInstance;
  dbInstance = openDb(resolveDbPath(env ?? resolveEnv()));
  return dbInstance;
}

/** A standalone connection with the schema applied. */
export function openDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS decision_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      trader_id TEXT NOT NULL,
      cycle_number INTEGER NOT NULL,
      timestamp TEXT NOT NULL,
      success INTEGER NOT NULL CHECK (success IN (0, 1)),
      total_balance REAL NOT NULL,
      executions INTEGER NOT NULL DEFAULT 0,
      successful_executions INTEGER NOT NULL DEFAULT 0,
      record_json TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_records_trader ON decision_records(trader_id, id);
  `);
}
