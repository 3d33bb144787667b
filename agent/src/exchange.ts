/**
 * Adapter selection from a tagged exchange configuration.
 */

import { BinanceTrader } from "./binance.ts";
import { DummyTrader } from "./dummy.ts";
import { createHyperliquidClients, HyperliquidTrader, type Address } from "./hyperliquid.ts";
import type { Logger } from "./logger.ts";
import type { Trader } from "./trader.ts";

export type ExchangeSettings =
  | { kind: "binance"; apiKey: string; secretKey: string }
  | { kind: "hyperliquid"; privateKey: Address; walletAddress?: Address; testnet: boolean }
  | { kind: "aster"; user: string; signer: string; privateKey: string };

export function createTrader(settings: ExchangeSettings, logger: Logger): Trader {
  switch (settings.kind) {
    case "binance":
      return new BinanceTrader({ apiKey: settings.apiKey, apiSecret: settings.secretKey, logger });
    case "hyperliquid":
      return new HyperliquidTrader({
        clients: createHyperliquidClients({
          privateKey: settings.privateKey,
          accountAddress: settings.walletAddress,
          testnet: settings.testnet,
        }),
        logger,
      });
    case "aster":
      return new DummyTrader(logger);
  }
}
