import type { ReactNode } from "react";
import { theme } from "../../theme.ts";
import { Panel } from "./Panel.tsx";

interface StatCardProps {
  label: string;
  value: ReactNode;
  color?: string;
  minWidth?: number;
}

export function StatCard({ label, value, color, minWidth = 140 }: StatCardProps) {
  return (
    <Panel minWidth={minWidth}>
      <div style={theme.typography.label}>{label}</div>
      <div style={{ ...theme.typography.pnlValue, color: color ?? theme.colors.text.primary }}>{value}</div>
    </Panel>
  );
}

export function StatCards({ children }: { children: ReactNode }) {
  return (
    <div style={{ display: "flex", gap: theme.spacing.lg, flexWrap: "wrap", alignItems: "flex-start" }}>
      {children}
    </div>
  );
}
