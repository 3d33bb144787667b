/**
 * Holds every agent of a run (competition mode) and answers the API's
 * cross-agent questions.
 */

import type { AiProvider } from "./ai-client.ts";
import type { AutoTrader } from "./auto-trader.ts";
import { errorMessage, type ExchangeName } from "./errors.ts";
import type { Logger } from "./logger.ts";

export interface TraderComparison {
  traderId: string;
  traderName: string;
  aiModel: AiProvider;
  exchange: ExchangeName;
  totalEquity: number;
  totalPnl: number;
  totalPnlPct: number;
  positionCount: number;
  marginUsedPct: number;
  callCount: number;
  isRunning: boolean;
  /** set when the account could not be read */
  error?: string;
}

export interface ComparisonData {
  traders: TraderComparison[];
  count: number;
}

export class TraderManager {
  private readonly traders = new Map<string, AutoTrader>();
  private readonly runs = new Map<string, Promise<void>>();

  constructor(private readonly logger: Logger) {}

  addTrader(trader: AutoTrader): void {
    if (this.traders.has(trader.id)) {
      throw new Error(`trader ID '${trader.id}' already exists`);
    }
    this.traders.set(trader.id, trader);
    this.logger.log(`added trader ${trader.name} (${trader.id})`);
  }

  getTrader(id: string): AutoTrader | undefined {
    return this.traders.get(id);
  }

  /** Insertion order. */
  getAllTraders(): AutoTrader[] {
    return [...this.traders.values()];
  }

  getTraderIds(): string[] {
    return [...this.traders.keys()];
  }

  /** Starts every agent loop; does not wait for them. */
  startAll(): void {
    for (const t of this.traders.values()) {
      if (this.runs.has(t.id)) continue;
      const run = t.start().catch((err: unknown) => {
        this.logger.error(`${t.name} stopped with error: ${errorMessage(err)}`);
      });
      this.runs.set(t.id, run);
    }
  }

  /** Asks every loop to stop and waits for in-flight cycles to finish. */
  async stopAll(): Promise<void> {
    for (const t of this.traders.values()) t.stop();
    await Promise.all(this.runs.values());
    this.runs.clear();
  }

  async getComparisonData(): Promise<ComparisonData> {
    const traders = await Promise.all(
      this.getAllTraders().map(async (t): Promise<TraderComparison> => {
        const status = t.getStatus();
        const base = {
          traderId: t.id,
          traderName: t.name,
          aiModel: status.aiModel,
          exchange: status.exchange,
          callCount: status.callCount,
          isRunning: status.isRunning,
        };
        try {
          const acct = await t.getAccountInfo();
          return {
            ...base,
            totalEquity: acct.totalEquity,
            totalPnl: acct.totalPnl,
            totalPnlPct: acct.totalPnlPct,
            positionCount: acct.positionCount,
            marginUsedPct: acct.marginUsedPct,
          };
        } catch (err) {
          return {
            ...base,
            totalEquity: 0,
            totalPnl: 0,
            totalPnlPct: 0,
            positionCount: 0,
            marginUsedPct: 0,
            error: errorMessage(err),
          };
        }
      }),
    );
    return { traders, count: traders.length };
  }
}
