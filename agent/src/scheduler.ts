/**
 * Execution order for a cycle's decisions: closes free margin before opens.
 */

import type { Decision } from "./types.ts";

const PRIORITY: Readonly<Record<string, number>> = {
  close_long: 1,
  close_short: 1,
  open_long: 2,
  open_short: 2,
  hold: 3,
  wait: 3,
};

export function actionPriority(action: string): number {
  return PRIORITY[action] ?? 999;
}

/** Stable: equal priorities keep their input order. */
export function sortDecisions<T extends Decision>(decisions: readonly T[]): T[] {
  return decisions
    .map((d, i) => ({ d, i }))
    .sort((a, b) => actionPriority(a.d.action) - actionPriority(b.d.action) || a.i - b.i)
    .map(({ d }) => d);
}
