/**
 * Equity per cycle, read from the decision log.
 */

import { useMemo } from "react";
import { AreaChart, Area, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, ReferenceLine } from "recharts";
import type { EquityPoint } from "../lib/api.ts";
import { formatTime, formatUsd } from "../lib/format.ts";
import { theme } from "../theme.ts";

interface Props {
  points: EquityPoint[];
  initialBalance: number;
}

function computeDomain(values: number[], baseline: number): [number, number] {
  const min = Math.min(baseline, ...values);
  const max = Math.max(baseline, ...values);
  const padding = Math.max((max - min) * 0.1, 1);
  return [min - padding, max + padding];
}

export function EquityChart({ points, initialBalance }: Props) {
  const data = useMemo(
    () => points.filter((p) => p.totalEquity > 0).map((p) => ({ ...p, timeStr: formatTime(p.timestamp) })),
    [points],
  );
  const domain = useMemo(() => computeDomain(data.map((d) => d.totalEquity), initialBalance), [data, initialBalance]);

  if (data.length === 0) {
    return (
      <div
        style={{
          height: 220,
          background: theme.colors.bg.cardAlt,
          borderRadius: theme.radius.lg,
          display: "flex",
          alignItems: "center",
          justifyContent: "center",
          color: theme.colors.text.muted,
          fontSize: "0.9rem",
        }}
      >
        No cycles recorded yet
      </div>
    );
  }

  const up = data[data.length - 1].totalEquity >= initialBalance;
  const stroke = up ? theme.colors.pnl.positive : theme.colors.pnl.negative;

  return (
    <div style={{ width: "100%", minWidth: 300, height: 220, background: theme.colors.bg.cardAlt, borderRadius: theme.radius.lg, padding: "0.5rem" }}>
      <ResponsiveContainer width="100%" height="100%">
        <AreaChart data={data} margin={{ top: 10, right: 20, left: 50, bottom: 5 }}>
          <defs>
            <linearGradient id="equityGradient" x1="0" y1="0" x2="0" y2="1">
              <stop offset="5%" stopColor={stroke} stopOpacity={0.3} />
              <stop offset="95%" stopColor={stroke} stopOpacity={0} />
            </linearGradient>
          </defs>
          <CartesianGrid strokeDasharray="3 3" stroke={theme.colors.border} />
          <XAxis dataKey="timeStr" stroke={theme.colors.text.muted} fontSize={10} tickLine={false} />
          <YAxis
            dataKey="totalEquity"
            domain={domain}
            stroke={theme.colors.text.muted}
            fontSize={10}
            tickLine={false}
            tickFormatter={(v) => Number(v).toFixed(0)}
          />
          <ReferenceLine y={initialBalance} stroke={theme.colors.text.muted} strokeDasharray="4 4" />
          <Tooltip
            contentStyle={{
              background: theme.colors.bg.card,
              border: `1px solid ${theme.colors.border}`,
              borderRadius: theme.radius.md,
              color: theme.colors.text.primary,
            }}
            formatter={(v) => [`${formatUsd(Number(v))} USDT`, "Equity"]}
            labelFormatter={(label) => String(label)}
          />
          <Area type="monotone" dataKey="totalEquity" stroke={stroke} fill="url(#equityGradient)" strokeWidth={2} />
        </AreaChart>
      </ResponsiveContainer>
    </div>
  );
}
