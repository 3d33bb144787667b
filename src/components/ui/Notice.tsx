import { theme } from "../../theme.ts";

type Tone = "error" | "paused";

const TONES: Record<Tone, { background: string; color: string; label: string }> = {
  error: { background: theme.colors.bg.error, color: "#fecaca", label: "API error" },
  paused: { background: theme.colors.bg.paused, color: "#fde68a", label: "Risk control" },
};

/** One-line banner above a panel: API failures or a paused agent. */
export function Notice({ tone, message }: { tone: Tone; message: string }) {
  const t = TONES[tone];
  return (
    <div
      role={tone === "error" ? "alert" : "status"}
      style={{ padding: theme.spacing.md, background: t.background, borderRadius: theme.radius.md, color: t.color }}
    >
      <strong>{t.label}:</strong> {message}
    </div>
  );
}
