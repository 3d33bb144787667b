/**
 * Per-agent logging: console plus an append-only log file.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname, join } from "path";

export interface Logger {
  log(msg: string): void;
  /** Always written to the file; printed only in verbose mode. */
  verbose(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  /** null disables the log file */
  file: string | null;
  verbose?: boolean;
  /** e.g. "[binance_deepseek]" */
  tag?: string;
}

export function defaultLogFile(agentId: string): string {
  return join(process.env.TRADER_LOG_DIR || "logs", `${agentId}.log`);
}

export function createLogger(opts: LoggerOptions): Logger {
  const prefix = opts.tag ? `${opts.tag} ` : "";
  let dirReady = false;

  function writeLog(line: string) {
    if (!opts.file) return;
    if (!dirReady) {
      mkdirSync(dirname(opts.file), { recursive: true });
      dirReady = true;
    }
    appendFileSync(opts.file, `${new Date().toISOString()} ${prefix}${line}\n`);
  }

  const clock = () => new Date().toISOString().slice(11, 19);

  return {
    log(msg) {
      console.log(`[${clock()}] ${prefix}${msg}`);
      writeLog(msg);
    },
    verbose(msg) {
      writeLog(`  [verbose] ${msg}`);
      if (opts.verbose) console.log(`[${clock()}] ${prefix}  ${msg}`);
    },
    warn(msg) {
      console.error(`[WARN] ${prefix}${msg}`);
      writeLog(`[WARN] ${msg}`);
    },
    error(msg) {
      console.error(`[ERROR] ${prefix}${msg}`);
      writeLog(`[ERROR] ${msg}`);
    },
  };
}

export const silentLogger: Logger = {
  log() {},
  verbose() {},
  warn() {},
  error() {},
};
