import { Outcome } from "./types";

export const INDICATOR_SETTINGS = {
  rsiPeriod: 14,
  overbought: 70,
  oversold: 30,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
} as const;

/** Fewest samples worth reading; below this confidence is left alone. */
export const MIN_INDICATOR_SAMPLES = INDICATOR_SETTINGS.rsiPeriod + 1;

export interface Macd {
  line: number;
  signal: number;
  histogram: number;
}

export type MacdTrend = "bullish" | "bearish" | "neutral";

export interface IndicatorReading {
  rsi: number | null;
  macd: Macd | null;
  trend: MacdTrend;
  /** -1 strongly bearish to +1 strongly bullish. */
  alignment: number;
}

// ─── RSI ───

export function rsi(prices: readonly number[], period: number = INDICATOR_SETTINGS.rsiPeriod): number | null {
  if (prices.length < period + 1) return null;
  let gains = 0;
  let losses = 0;
  for (let i = prices.length - period; i < prices.length; i++) {
    const delta = prices[i] - prices[i - 1];
    if (delta > 0) gains += delta;
    else losses -= delta;
  }
  if (gains === 0 && losses === 0) return 50;
  if (losses === 0) return 100;
  return 100 - 100 / (1 + gains / losses);
}

// ─── MACD ───

/** EMA seeded with the SMA of the first `period` values; entry i lines up with values[i + period - 1]. */
export function emaSeries(values: readonly number[], period: number): number[] {
  if (values.length < period) return [];
  const k = 2 / (period + 1);
  let ema = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  const out = [ema];
  for (let i = period; i < values.length; i++) {
    ema = values[i] * k + ema * (1 - k);
    out.push(ema);
  }
  return out;
}

export function macd(prices: readonly number[]): Macd | null {
  const { macdFast, macdSlow, macdSignal } = INDICATOR_SETTINGS;
  if (prices.length < macdSlow + macdSignal) return null;

  const fast = emaSeries(prices, macdFast);
  const slow = emaSeries(prices, macdSlow);
  const offset = macdSlow - macdFast;
  const lines = slow.map((s, i) => fast[i + offset] - s);
  const signals = emaSeries(lines, macdSignal);

  const line = lines[lines.length - 1];
  const signal = signals[signals.length - 1];
  return { line, signal, histogram: line - signal };
}

function macdTrend(m: Macd | null): MacdTrend {
  if (!m) return "neutral";
  if (m.histogram > 0 && m.line > 0) return "bullish";
  if (m.histogram < 0 && m.line < 0) return "bearish";
  return "neutral";
}

// ─── Alignment ───

export function readIndicators(prices: readonly number[]): IndicatorReading {
  const r = rsi(prices);
  const m = macd(prices);
  const trend = macdTrend(m);

  let score = 0;
  let count = 0;
  if (r !== null) {
    count++;
    // Oversold leans up, overbought leans down
    if (r > INDICATOR_SETTINGS.overbought) score -= 0.5;
    else if (r < INDICATOR_SETTINGS.oversold) score += 0.5;
    else score += (r - 50) / 100;
  }
  if (trend !== "neutral") {
    count++;
    score += trend === "bullish" ? 0.5 : -0.5;
  }
  const alignment = count > 0 ? Math.max(-1, Math.min(1, score / count)) : 0;
  return { rsi: r, macd: m, trend, alignment };
}

/**
 * Scales confidence by how well the indicators agree with the trade:
 * up to +30% when aligned, down to -50% when opposed, unchanged in between.
 */
export function adjustConfidence(confidence: number, direction: Outcome, alignment: number): number {
  const agreement = alignment * (direction === "YES" ? 1 : -1);
  let multiplier = 1;
  if (agreement > 0.3) multiplier = 1 + agreement * 0.3;
  else if (agreement < -0.3) multiplier = 1 + agreement * 0.5;
  return Math.max(0, Math.min(1, confidence * multiplier));
}
