/**
 * Hyperliquid signing key from a key file or the environment.
 * The key is never logged.
 */

import * as fs from "fs";
import * as path from "path";
import type { Address } from "./hyperliquid.ts";

export const DEFAULT_KEY_ENV = "HL_PRIVATE_KEY";

export interface KeyLoaderOptions {
  keyFile?: string;
  keyEnv?: string;
}

function isPrefixedKey(v: string): v is Address {
  return /^0x[0-9a-fA-F]{64}$/.test(v);
}

function toKey(raw: string, where: string): Address {
  const prefixed = `0x${raw.trim().replace(/^0x/i, "")}`;
  if (!isPrefixedKey(prefixed)) {
    throw new Error(`Invalid key format in ${where}: expected 64 hex chars (with or without 0x)`);
  }
  return prefixed;
}

/**
 * Returns the key, or null when none is configured.
 * Throws for a missing key file or a malformed key.
 */
export function loadPrivateKey(opts: KeyLoaderOptions = {}): Address | null {
  if (opts.keyFile) {
    const resolved = path.resolve(opts.keyFile);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Key file not found: ${resolved}`);
    }
    return toKey(fs.readFileSync(resolved, "utf-8"), "key file");
  }

  const keyEnv = opts.keyEnv ?? DEFAULT_KEY_ENV;
  const fromEnv = process.env[keyEnv];
  if (!fromEnv) return null;
  return toKey(fromEnv, keyEnv);
}

/** Accepts a config value that may or may not carry the 0x prefix. */
export function parsePrivateKey(raw: string): Address {
  return toKey(raw, "config");
}

export function isAddress(v: string): v is Address {
  return /^0x[0-9a-fA-F]{40}$/.test(v);
}
