/**
 * Everything about one trader: stats, equity curve, positions, latest decisions.
 */

import { api } from "../lib/api.ts";
import { formatRuntime, formatSigned, formatSignedPct, formatUsd, pnlColor } from "../lib/format.ts";
import { usePolling } from "../lib/usePolling.ts";
import { theme } from "../theme.ts";
import { DecisionList } from "./DecisionList.tsx";
import { EquityChart } from "./EquityChart.tsx";
import { PositionsTable } from "./PositionsTable.tsx";
import { Notice } from "./ui/Notice.tsx";
import { Section } from "./ui/Section.tsx";
import { StatCard, StatCards } from "./ui/StatCards.tsx";

export function TraderPanel({ traderId }: { traderId: string }) {
  const status = usePolling(() => api.status(traderId), [traderId]);
  const account = usePolling(() => api.account(traderId), [traderId]);
  const positions = usePolling(() => api.positions(traderId), [traderId]);
  const equity = usePolling(() => api.equityHistory(traderId), [traderId]);
  const decisions = usePolling(() => api.latestDecisions(traderId), [traderId]);
  const performance = usePolling(() => api.performance(traderId), [traderId]);
  const stats = usePolling(() => api.statistics(traderId), [traderId]);

  const error = status.error ?? account.error;
  const acct = account.data;
  const st = status.data;

  return (
    <div style={{ display: "flex", flexDirection: "column", gap: theme.spacing.xl }}>
      {error && <Notice tone="error" message={error} />}

      <StatCards>
        <StatCard label="Equity" value={acct ? `${formatUsd(acct.totalEquity)} USDT` : "—"} />
        <StatCard label="Available" value={acct ? formatUsd(acct.availableBalance) : "—"} />
        <StatCard
          label="Total PnL"
          value={acct ? `${formatSigned(acct.totalPnl)} (${formatSignedPct(acct.totalPnlPct)})` : "—"}
          color={acct ? pnlColor(acct.totalPnl, theme.colors.pnl) : undefined}
        />
        <StatCard
          label="Today"
          value={acct ? formatSigned(acct.dailyPnl) : "—"}
          color={acct ? pnlColor(acct.dailyPnl, theme.colors.pnl) : undefined}
        />
        <StatCard label="Margin used" value={acct ? `${acct.marginUsedPct.toFixed(1)}%` : "—"} />
        <StatCard label="Sharpe" value={performance.data ? performance.data.sharpeRatio.toFixed(2) : "—"} />
        <StatCard
          label="Cycles"
          value={stats.data ? `${stats.data.successfulCycles}/${stats.data.totalCycles}` : "—"}
        />
        <StatCard label="Runtime" value={st ? formatRuntime(st.runtimeMinutes) : "—"} />
      </StatCards>

      {st?.stopUntil && (
        <Notice tone="paused" message={`trading paused until ${new Date(st.stopUntil).toLocaleTimeString()}`} />
      )}

      <Section title="Equity">
        <EquityChart points={equity.data ?? []} initialBalance={st?.initialBalance ?? 0} />
      </Section>

      <Section title="Open positions">
        <PositionsTable positions={positions.data ?? []} />
      </Section>

      <Section title="Latest decisions">
        <DecisionList records={decisions.data ?? []} />
      </Section>
    </div>
  );
}
