import type { ReactNode } from "react";
import { theme } from "../../theme.ts";

interface PanelProps {
  children: ReactNode;
  /** Left stripe colour, e.g. a cycle's success/failure status. */
  accent?: string;
  minWidth?: number;
  gap?: boolean;
}

export function Panel({ children, accent, minWidth, gap }: PanelProps) {
  return (
    <div
      style={{
        padding: theme.spacing.lg,
        background: theme.colors.bg.card,
        borderRadius: theme.radius.lg,
        border: `1px solid ${theme.colors.border}`,
        borderLeft: accent ? `3px solid ${accent}` : `1px solid ${theme.colors.border}`,
        minWidth,
        marginBottom: gap ? theme.spacing.md : undefined,
      }}
    >
      {children}
    </div>
  );
}
