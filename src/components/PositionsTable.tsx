import type { Position } from "../lib/api.ts";
import { formatPrice, formatSigned, formatSignedPct, pnlColor } from "../lib/format.ts";
import { theme } from "../theme.ts";
import { DataTable, type Column } from "./ui/DataTable.tsx";

const columns: Column<Position>[] = [
  { key: "symbol", header: "Symbol", render: (p) => p.symbol },
  {
    key: "side",
    header: "Side",
    render: (p) => <span style={{ color: theme.colors.side[p.side], fontWeight: 600 }}>{p.side.toUpperCase()}</span>,
  },
  { key: "qty", header: "Size", render: (p) => p.quantity },
  { key: "entry", header: "Entry", render: (p) => formatPrice(p.entryPrice) },
  { key: "mark", header: "Mark", render: (p) => formatPrice(p.markPrice) },
  { key: "lev", header: "Lev", render: (p) => `${p.leverage}x` },
  {
    key: "pnl",
    header: "uPnL",
    render: (p) => (
      <span style={{ color: pnlColor(p.unrealizedPnl, theme.colors.pnl) }}>
        {formatSigned(p.unrealizedPnl)} ({formatSignedPct(p.unrealizedPnlPct)})
      </span>
    ),
  },
  { key: "liq", header: "Liq.", render: (p) => formatPrice(p.liquidationPrice) },
];

export function PositionsTable({ positions }: { positions: Position[] }) {
  return (
    <DataTable
      columns={columns}
      data={positions}
      getRowKey={(p) => `${p.symbol}_${p.side}`}
      emptyMessage="No open positions."
    />
  );
}
