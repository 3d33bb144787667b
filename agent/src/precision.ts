/**
 * Exchange numeric precision: step-size quantities and significant-figure prices.
 */

/** "0.00100000" → 3, "1" → 0. */
export function decimalsFromStepSize(stepSize: string): number {
  const trimmed = stepSize.includes(".") ? stepSize.replace(/0+$/, "") : stepSize;
  const dot = trimmed.indexOf(".");
  return dot < 0 ? 0 : trimmed.length - dot - 1;
}

export function roundToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Fixed-decimal string, e.g. for Binance `quantity`. */
export function formatQuantity(value: number, decimals: number): string {
  return roundToDecimals(value, decimals).toFixed(decimals);
}

/** Rounds by order of magnitude: 123456.7 → 123460, 0.000123456 → 0.00012346 at 5 figures. */
export function roundToSignificantFigures(value: number, figures = 5): number {
  if (value === 0 || !Number.isFinite(value)) return value;
  return Number(value.toPrecision(figures));
}

/** Plain decimal string without exponent or trailing zeros. */
export function toPlainString(value: number, maxDecimals: number): string {
  const fixed = value.toFixed(Math.max(0, maxDecimals));
  return fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
}

/**
 * Hyperliquid perp price: 5 significant figures, and no more than
 * `6 - szDecimals` decimal places.
 */
export function formatSignificantPrice(price: number, szDecimals: number): string {
  const maxDecimals = Math.max(0, 6 - szDecimals);
  const rounded = roundToDecimals(roundToSignificantFigures(price, 5), maxDecimals);
  return toPlainString(rounded, maxDecimals);
}
