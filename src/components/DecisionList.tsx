import { useState } from "react";
import type { DecisionRecordJson } from "../lib/api.ts";
import { formatTime } from "../lib/format.ts";
import { theme } from "../theme.ts";
import { Panel } from "./ui/Panel.tsx";

function DecisionCard({ record }: { record: DecisionRecordJson }) {
  const [showTrace, setShowTrace] = useState(false);
  const statusColor = record.success ? theme.colors.status.ok : theme.colors.status.failed;

  return (
    <Panel accent={statusColor} gap>
      <div style={{ display: "flex", justifyContent: "space-between", marginBottom: theme.spacing.sm }}>
        <strong>Cycle #{record.cycle_number}</strong>
        <span style={{ color: theme.colors.text.secondary, fontSize: "0.85rem" }}>{formatTime(record.timestamp)}</span>
      </div>

      {record.error_message && (
        <div style={{ color: statusColor, fontSize: "0.85rem", marginBottom: theme.spacing.sm }}>{record.error_message}</div>
      )}

      {record.decisions.map((d, i) => (
        <div key={`${d.symbol}-${i}`} style={{ fontSize: "0.85rem", marginBottom: theme.spacing.xs }}>
          <span style={{ fontWeight: 600 }}>{d.symbol || "—"}</span> {d.action}
          {d.action.startsWith("open_") && (
            <span style={{ color: theme.colors.text.secondary }}>
              {" "}
              {d.position_size_usd.toFixed(0)} USDT @ {d.leverage}x · SL {d.stop_loss} · TP {d.take_profit} · conf {d.confidence}
            </span>
          )}
          {d.reasoning && <div style={{ color: theme.colors.text.muted }}>{d.reasoning}</div>}
        </div>
      ))}

      {record.execution_log.length > 0 && (
        <div style={{ ...theme.typography.mono, color: theme.colors.text.secondary, marginTop: theme.spacing.sm }}>
          {record.execution_log.map((line, i) => (
            <div key={i}>{line}</div>
          ))}
        </div>
      )}

      {record.cot_trace && (
        <div style={{ marginTop: theme.spacing.sm }}>
          <button
            onClick={() => setShowTrace((v) => !v)}
            style={{ background: "none", border: "none", color: theme.colors.text.link, cursor: "pointer", padding: 0 }}
          >
            {showTrace ? "Hide reasoning" : "Show reasoning"}
          </button>
          {showTrace && (
            <pre style={{ ...theme.typography.mono, whiteSpace: "pre-wrap", color: theme.colors.text.secondary }}>
              {record.cot_trace}
            </pre>
          )}
        </div>
      )}
    </Panel>
  );
}

/** Newest first. */
export function DecisionList({ records }: { records: DecisionRecordJson[] }) {
  if (records.length === 0) {
    return <p style={{ color: theme.colors.text.secondary }}>No decisions yet.</p>;
  }
  return (
    <div>
      {records.map((r) => (
        <DecisionCard key={`${r.cycle_number}-${r.timestamp}`} record={r} />
      ))}
    </div>
  );
}
