/**
 * config.json loading: zod schema, cross-field checks, and mapping to the
 * settings each component takes. Secrets may come from .env.
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { z } from "zod";
import { PROVIDER_DEFAULTS, type AiSettings } from "./ai-client.ts";
import { ConfigurationError, errorMessage } from "./errors.ts";
import type { ExchangeSettings } from "./exchange.ts";
import { isAddress, loadPrivateKey, parsePrivateKey } from "./keyloader.ts";
import { silentLogger, type Logger } from "./logger.ts";

const traderSchema = z.object({
  id: z.string(),
  name: z.string(),
  enabled: z.boolean().default(true),
  ai_model: z.enum(["deepseek", "qwen", "custom"]),
  exchange: z.enum(["binance", "hyperliquid", "aster"]),
  binance_api_key: z.string().default(""),
  binance_secret_key: z.string().default(""),
  hyperliquid_private_key: z.string().default(""),
  hyperliquid_wallet_addr: z.string().default(""),
  hyperliquid_testnet: z.boolean().default(false),
  aster_user: z.string().default(""),
  aster_signer: z.string().default(""),
  aster_private_key: z.string().default(""),
  deepseek_key: z.string().default(""),
  qwen_key: z.string().default(""),
  custom_api_url: z.string().default(""),
  custom_api_key: z.string().default(""),
  custom_model_name: z.string().default(""),
  initial_balance: z.number().positive(),
  scan_interval_minutes: z.number().positive().default(3),
});

export const configSchema = z.object({
  traders: z.array(traderSchema),
  use_default_coins: z.boolean().default(false),
  custom_coins: z.array(z.string()).default([]),
  coin_pool_api_url: z.string().default(""),
  oi_top_api_url: z.string().default(""),
  api_server_port: z.number().int().positive().default(8080),
  max_daily_loss: z.number().nonnegative().default(10),
  max_drawdown: z.number().nonnegative().default(20),
  stop_trading_minutes: z.number().nonnegative().default(60),
  leverage: z
    .object({
      btc_eth_leverage: z.number().int().positive().default(5),
      altcoin_leverage: z.number().int().positive().default(5),
    })
    .default({}),
});

export type RawConfig = z.infer<typeof configSchema>;
type RawTrader = z.infer<typeof traderSchema>;

export interface TraderSettings {
  id: string;
  name: string;
  enabled: boolean;
  exchange: ExchangeSettings;
  ai: AiSettings;
  initialBalance: number;
  scanIntervalMinutes: number;
}

export interface AppConfig {
  traders: TraderSettings[];
  useDefaultCoins: boolean;
  customCoins: string[];
  coinPoolApiUrl: string;
  oiTopApiUrl: string;
  apiServerPort: number;
  maxDailyLoss: number;
  maxDrawdown: number;
  stopTradingMinutes: number;
  btcEthLeverage: number;
  altcoinLeverage: number;
}

/** Every cross-field problem, one message each. */
export function crossFieldIssues(raw: RawConfig): string[] {
  const issues: string[] = [];
  if (raw.traders.length === 0) issues.push("at least one trader must be configured");

  const seen = new Set<string>();
  raw.traders.forEach((t, i) => {
    const at = `traders[${i}]`;
    if (!t.id.trim()) issues.push(`${at}: id must not be empty`);
    else if (seen.has(t.id)) issues.push(`${at}: duplicate trader id '${t.id}'`);
    seen.add(t.id);
    if (!t.name.trim()) issues.push(`${at}: name must not be empty`);

    switch (t.exchange) {
      case "binance":
        if (!t.binance_api_key || !t.binance_secret_key) {
          issues.push(`${at}: binance requires binance_api_key and binance_secret_key`);
        }
        break;
      case "hyperliquid":
        if (!t.hyperliquid_private_key && !process.env.HL_PRIVATE_KEY) {
          issues.push(`${at}: hyperliquid requires hyperliquid_private_key (or HL_PRIVATE_KEY)`);
        }
        if (t.hyperliquid_wallet_addr && !isAddress(t.hyperliquid_wallet_addr)) {
          issues.push(`${at}: hyperliquid_wallet_addr is not a 0x address`);
        }
        break;
      case "aster":
        if (!t.aster_user || !t.aster_signer || !t.aster_private_key) {
          issues.push(`${at}: aster requires aster_user, aster_signer and aster_private_key`);
        }
        break;
    }

    switch (t.ai_model) {
      case "deepseek":
        if (!t.deepseek_key) issues.push(`${at}: deepseek requires deepseek_key`);
        break;
      case "qwen":
        if (!t.qwen_key) issues.push(`${at}: qwen requires qwen_key`);
        break;
      case "custom":
        if (!t.custom_api_url || !t.custom_api_key || !t.custom_model_name) {
          issues.push(`${at}: custom model requires custom_api_url, custom_api_key and custom_model_name`);
        }
        break;
    }
  });
  return issues;
}

function exchangeSettings(t: RawTrader): ExchangeSettings {
  switch (t.exchange) {
    case "binance":
      return { kind: "binance", apiKey: t.binance_api_key, secretKey: t.binance_secret_key };
    case "hyperliquid": {
      const privateKey = t.hyperliquid_private_key ? parsePrivateKey(t.hyperliquid_private_key) : loadPrivateKey();
      if (!privateKey) throw new ConfigurationError([`${t.id}: hyperliquid private key missing`]);
      const wallet = t.hyperliquid_wallet_addr;
      return {
        kind: "hyperliquid",
        privateKey,
        walletAddress: isAddress(wallet) ? wallet : undefined,
        testnet: t.hyperliquid_testnet,
      };
    }
    case "aster":
      return { kind: "aster", user: t.aster_user, signer: t.aster_signer, privateKey: t.aster_private_key };
  }
}

function aiSettings(t: RawTrader): AiSettings {
  switch (t.ai_model) {
    case "deepseek":
      return { provider: "deepseek", apiKey: t.deepseek_key, ...PROVIDER_DEFAULTS.deepseek };
    case "qwen":
      return { provider: "qwen", apiKey: t.qwen_key, ...PROVIDER_DEFAULTS.qwen };
    case "custom":
      return { provider: "custom", baseUrl: t.custom_api_url, apiKey: t.custom_api_key, model: t.custom_model_name };
  }
}

/** Validates an already-parsed JSON value. Throws ConfigurationError listing every issue. */
export function parseConfig(input: unknown, logger: Logger = silentLogger): AppConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  const raw = result.data;
  const issues = crossFieldIssues(raw);
  if (issues.length > 0) throw new ConfigurationError(issues);

  const { btc_eth_leverage, altcoin_leverage } = raw.leverage;
  if (btc_eth_leverage > 5 || altcoin_leverage > 5) {
    logger.warn(
      `leverage above 5x (BTC/ETH ${btc_eth_leverage}x, altcoins ${altcoin_leverage}x); sub-accounts may be capped at 5x`,
    );
  }

  let traders: TraderSettings[];
  try {
    traders = raw.traders.map((t) => ({
      id: t.id,
      name: t.name,
      enabled: t.enabled,
      exchange: exchangeSettings(t),
      ai: aiSettings(t),
      initialBalance: t.initial_balance,
      scanIntervalMinutes: t.scan_interval_minutes,
    }));
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError([errorMessage(err)]);
  }

  return {
    traders,
    useDefaultCoins: raw.use_default_coins,
    customCoins: raw.custom_coins,
    coinPoolApiUrl: raw.coin_pool_api_url,
    oiTopApiUrl: raw.oi_top_api_url,
    apiServerPort: raw.api_server_port,
    maxDailyLoss: raw.max_daily_loss,
    maxDrawdown: raw.max_drawdown,
    stopTradingMinutes: raw.stop_trading_minutes,
    btcEthLeverage: btc_eth_leverage,
    altcoinLeverage: altcoin_leverage,
  };
}

export function loadConfig(path: string, logger: Logger = silentLogger): AppConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError([`cannot read ${path}: ${errorMessage(err)}`]);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError([`${path} is not valid JSON: ${errorMessage(err)}`]);
  }
  return parseConfig(json, logger);
}
