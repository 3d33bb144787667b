import type { ReactNode } from "react";
import { theme } from "../../theme.ts";

interface SectionProps {
  title: string;
  action?: ReactNode;
  children: ReactNode;
}

export function Section({ title, action, children }: SectionProps) {
  return (
    <section>
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
        <h2 style={theme.typography.sectionTitle}>{title}</h2>
        {action}
      </div>
      {children}
    </section>
  );
}
