import { useEffect, useState } from "react";

export const POLL_MS = 15_000;

export interface Polled<T> {
  data: T | null;
  error: string | null;
}

/** Fetches immediately and then every `intervalMs`; refetches when `deps` change. */
export function usePolling<T>(load: () => Promise<T>, deps: readonly unknown[], intervalMs = POLL_MS): Polled<T> {
  const [state, setState] = useState<Polled<T>>({ data: null, error: null });

  useEffect(() => {
    let cancelled = false;
    const tick = () => {
      load()
        .then((data) => {
          if (!cancelled) setState({ data, error: null });
        })
        .catch((e: unknown) => {
          if (!cancelled) setState((s) => ({ data: s.data, error: e instanceof Error ? e.message : String(e) }));
        });
    };
    tick();
    const timer = setInterval(tick, intervalMs);
    return () => {
      cancelled = true;
      clearInterval(timer);
    };
  }, [...deps, intervalMs]);

  return state;
}
