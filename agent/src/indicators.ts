/**
 * Technical indicators: pure math over close/high/low series.
 * Series functions return one value per input bar that has enough history.
 */

export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Compute full EMA series. Seed with SMA of first `period` values. */
export function emaSeries(data: number[], period: number): number[] {
  if (data.length < period) return [];
  const alpha = 2 / (period + 1);
  const result: number[] = [];
  let prev = data.slice(0, period).reduce((a, b) => a + b, 0) / period;
  result.push(prev);
  for (let i = period; i < data.length; i++) {
    prev = data[i] * alpha + prev * (1 - alpha);
    result.push(prev);
  }
  return result;
}

/** MACD line (EMA12 − EMA26), aligned to the bars where EMA26 exists. */
export function macdSeries(data: number[]): number[] {
  const ema12 = emaSeries(data, 12);
  const ema26 = emaSeries(data, 26);
  const offset = 26 - 12;
  return ema26.map((slow, i) => ema12[i + offset] - slow);
}

/** Wilder-smoothed RSI. */
export function rsiSeries(data: number[], period: number): number[] {
  if (data.length < period + 1) return [];
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const diff = data[i] - data[i - 1];
    if (diff > 0) avgGain += diff;
    else avgLoss += -diff;
  }
  avgGain /= period;
  avgLoss /= period;
  const out = [toRsi(avgGain, avgLoss)];
  for (let i = period + 1; i < data.length; i++) {
    const diff = data[i] - data[i - 1];
    const gain = diff > 0 ? diff : 0;
    const loss = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    out.push(toRsi(avgGain, avgLoss));
  }
  return out;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/** Average True Range, Wilder smoothing seeded with the mean of the first `period` TRs. */
export function atrSeries(candles: Candle[], period: number): number[] {
  if (candles.length < period + 1) return [];
  const trs: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const { high, low } = candles[i];
    const prevClose = candles[i - 1].close;
    trs.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }
  let prev = trs.slice(0, period).reduce((a, b) => a + b, 0) / period;
  const out = [prev];
  for (let i = period; i < trs.length; i++) {
    prev = (prev * (period - 1) + trs[i]) / period;
    out.push(prev);
  }
  return out;
}

export function last(series: number[]): number {
  return series.length > 0 ? series[series.length - 1] : NaN;
}

export function tail<T>(series: T[], n: number): T[] {
  return series.slice(Math.max(0, series.length - n));
}
