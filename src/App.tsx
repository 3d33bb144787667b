/**
 * perp-agent dashboard: competition overview plus a detail panel for the
 * selected trader.
 */

import { useState } from "react";
import { CompetitionTable } from "./components/CompetitionTable.tsx";
import { TraderPanel } from "./components/TraderPanel.tsx";
import { Notice } from "./components/ui/Notice.tsx";
import { Section } from "./components/ui/Section.tsx";
import { api } from "./lib/api.ts";
import { usePolling } from "./lib/usePolling.ts";
import { theme } from "./theme.ts";

function Logo() {
  return (
    <div style={{ display: "flex", alignItems: "center", gap: "8px" }}>
      <svg width="10" height="10" viewBox="0 0 10 10" fill="none">
        <circle cx="5" cy="5" r="5" fill="#22c55e" opacity="0.9" />
        <circle cx="5" cy="5" r="3" fill="#4ade80" />
      </svg>
      <span style={{ fontSize: "1.3rem", fontWeight: 700, letterSpacing: "-0.02em", color: "#f1f5f9" }}>perp-agent</span>
    </div>
  );
}

function App() {
  const competition = usePolling(() => api.competition(), []);
  const [selected, setSelected] = useState<string | null>(null);
  const traders = competition.data?.traders ?? [];
  const activeId = selected ?? traders[0]?.traderId ?? null;

  return (
    <div
      style={{
        minHeight: "100vh",
        background: theme.colors.bg.page,
        color: theme.colors.text.primary,
        fontFamily: "system-ui, sans-serif",
        padding: "1.5rem 2rem",
        display: "flex",
        flexDirection: "column",
        gap: theme.spacing.xl,
      }}
    >
      <header style={{ display: "flex", justifyContent: "space-between", alignItems: "center" }}>
        <Logo />
        <span style={{ color: theme.colors.text.muted, fontSize: "0.85rem" }}>refreshes every 15 s</span>
      </header>

      {competition.error && <Notice tone="error" message={competition.error} />}

      <Section title={`Competition (${traders.length})`}>
        <CompetitionTable traders={traders} selectedId={activeId} onSelect={setSelected} />
      </Section>

      {activeId && <TraderPanel key={activeId} traderId={activeId} />}
    </div>
  );
}

export default App;
