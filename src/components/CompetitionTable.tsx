import type { TraderComparison } from "../lib/api.ts";
import { formatSignedPct, formatUsd, pnlColor } from "../lib/format.ts";
import { theme } from "../theme.ts";
import { DataTable, type Column } from "./ui/DataTable.tsx";

const columns: Column<TraderComparison & { rank: number }>[] = [
  { key: "rank", header: "#", render: (r) => r.rank },
  {
    key: "name",
    header: "Trader",
    render: (r) => (
      <span>
        <span style={{ color: r.isRunning ? theme.colors.status.ok : theme.colors.status.idle }}>● </span>
        {r.traderName}
      </span>
    ),
  },
  { key: "model", header: "Model", render: (r) => `${r.aiModel} / ${r.exchange}` },
  { key: "equity", header: "Equity", render: (r) => (r.error ? "—" : formatUsd(r.totalEquity)) },
  {
    key: "pnl",
    header: "PnL",
    render: (r) =>
      r.error ? (
        <span style={{ color: theme.colors.text.muted }} title={r.error}>
          unavailable
        </span>
      ) : (
        <span style={{ color: pnlColor(r.totalPnl, theme.colors.pnl) }}>{formatSignedPct(r.totalPnlPct)}</span>
      ),
  },
  { key: "positions", header: "Positions", render: (r) => r.positionCount },
  { key: "cycles", header: "Cycles", render: (r) => r.callCount },
];

interface Props {
  traders: TraderComparison[];
  selectedId: string | null;
  onSelect: (id: string) => void;
}

/** Traders ranked by PnL%. */
export function CompetitionTable({ traders, selectedId, onSelect }: Props) {
  const ranked = [...traders]
    .sort((a, b) => b.totalPnlPct - a.totalPnlPct)
    .map((t, i) => ({ ...t, rank: i + 1 }));
  return (
    <DataTable
      columns={columns}
      data={ranked}
      getRowKey={(r) => r.traderId}
      selectedKey={selectedId}
      onSelect={(r) => onSelect(r.traderId)}
      emptyMessage="No traders configured."
    />
  );
}
