import { createLogger } from "../logger";
import { IndicatorReading, MIN_INDICATOR_SAMPLES, adjustConfidence, readIndicators } from "./indicators";
import { EdgeSignal, MarketDescriptor, PriceTick } from "./types";

const log = createLogger("edge-detector");

export interface EdgeDetectorOptions {
  impliedScale: number;           // maps (yes - 0.5) onto a % move
  staleTickMs: number;
  confidenceEdgeScalePct: number; // edge at which confidence saturates
}

/** Read-only view of the risk controller's current gate. */
export interface ThresholdSource {
  readonly edgeThreshold: number;
}

export interface EdgeBreakdown {
  realMovePct: number;
  impliedMovePct: number;
  edgePct: number;
}

// ─── Pure math ───

export function computeEdge(
  price: number,
  baseline: number,
  yesPrice: number,
  impliedScale: number
): EdgeBreakdown {
  const realMovePct = ((price - baseline) / baseline) * 100;
  const impliedMovePct = (yesPrice - 0.5) * impliedScale;
  return { realMovePct, impliedMovePct, edgePct: realMovePct - impliedMovePct };
}

export function computeConfidence(
  edgePct: number,
  latencyMs: number,
  staleTickMs: number,
  confidenceEdgeScalePct: number
): number {
  const magnitude = Math.min(1, Math.abs(edgePct) / confidenceEdgeScalePct);
  const freshness = 1 - 0.5 * Math.min(1, Math.max(0, latencyMs) / staleTickMs);
  return Math.min(1, Math.max(0, magnitude * freshness));
}

// ─── Detector ───

export class EdgeDetector {
  constructor(
    private readonly opts: EdgeDetectorOptions,
    private readonly thresholds: ThresholdSource
  ) {}

  /** `indicators`, when given, scales confidence by momentum agreement. */
  evaluate(
    tick: PriceTick,
    market: MarketDescriptor,
    now: number = Date.now(),
    indicators: IndicatorReading | null = null
  ): EdgeSignal | null {
    if (tick.stale) return null;
    if (!(market.baselinePrice > 0)) return null;
    if (market.expiresAt <= now) return null;

    const { realMovePct, impliedMovePct, edgePct } = computeEdge(
      tick.price,
      market.baselinePrice,
      market.yesPrice,
      this.opts.impliedScale
    );
    if (!Number.isFinite(edgePct)) return null;
    if (Math.abs(edgePct) < this.thresholds.edgeThreshold) return null;

    const direction = edgePct > 0 ? "YES" : "NO";
    let confidence = computeConfidence(
      edgePct,
      tick.latencyMs,
      this.opts.staleTickMs,
      this.opts.confidenceEdgeScalePct
    );
    if (indicators) confidence = adjustConfidence(confidence, direction, indicators.alignment);

    const signal: EdgeSignal = {
      marketId: market.marketId,
      market,
      direction,
      edgePct,
      realMovePct,
      impliedMovePct,
      confidence,
      observedAt: now,
      tickPrice: tick.price,
      tickLatencyMs: tick.latencyMs,
    };
    return Object.freeze(signal);
  }

  /**
   * Evaluate every market against one tick, strongest edge first. `prices`
   * is the recent per-second history; indicators need at least
   * MIN_INDICATOR_SAMPLES of it.
   */
  scan(
    tick: PriceTick,
    markets: readonly MarketDescriptor[],
    now: number = Date.now(),
    prices: readonly number[] = []
  ): EdgeSignal[] {
    const indicators = prices.length >= MIN_INDICATOR_SAMPLES ? readIndicators(prices) : null;
    const signals: EdgeSignal[] = [];
    for (const market of markets) {
      const signal = this.evaluate(tick, market, now, indicators);
      if (signal) signals.push(signal);
    }
    signals.sort((a, b) => Math.abs(b.edgePct) * b.confidence - Math.abs(a.edgePct) * a.confidence);
    if (signals.length > 0) {
      log.debug("Edges found", {
        count: signals.length,
        best: signals[0].marketId,
        edgePct: signals[0].edgePct.toFixed(3),
      });
    }
    return signals;
  }
}
