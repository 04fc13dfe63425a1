import { describe, it, expect } from 'vitest';
import { EdgeDetector, computeConfidence, computeEdge } from '../speed/edge-detector';
import { NOW, makeMarket, makeTick } from './helpers/fixtures';

const OPTS = { impliedScale: 100, staleTickMs: 1_000, confidenceEdgeScalePct: 10 };

function detector(threshold = 2): EdgeDetector {
  return new EdgeDetector(OPTS, { edgeThreshold: threshold });
}

describe('computeEdge', () => {
  it('measures real move against the move implied by the YES price', () => {
    const edge = computeEdge(95_500, 95_000, 0.45, 100);
    expect(edge.realMovePct).toBeCloseTo(0.5263, 4);
    expect(edge.impliedMovePct).toBeCloseTo(-5, 10);
    expect(edge.edgePct).toBeCloseTo(5.5263, 4);
  });

  it('scales the implied move with impliedScale', () => {
    expect(computeEdge(95_000, 95_000, 0.6, 50).impliedMovePct).toBeCloseTo(5, 10);
  });
});

describe('computeConfidence', () => {
  it('grows with edge and saturates at the scale', () => {
    expect(computeConfidence(2, 0, 1_000, 10)).toBeCloseTo(0.2, 10);
    expect(computeConfidence(4, 0, 1_000, 10)).toBeCloseTo(0.4, 10);
    expect(computeConfidence(25, 0, 1_000, 10)).toBe(1);
  });

  it('shrinks as latency approaches the stale limit', () => {
    expect(computeConfidence(10, 500, 1_000, 10)).toBeCloseTo(0.75, 10);
    expect(computeConfidence(10, 1_000, 1_000, 10)).toBeCloseTo(0.5, 10);
    expect(computeConfidence(10, 5_000, 1_000, 10)).toBeCloseTo(0.5, 10);
  });

  it('uses the magnitude of negative edges', () => {
    expect(computeConfidence(-5, 0, 1_000, 10)).toBeCloseTo(0.5, 10);
  });
});

describe('EdgeDetector.evaluate', () => {
  it('signals YES when BTC has moved further up than the market prices in', () => {
    const signal = detector().evaluate(makeTick({ price: 95_500, latencyMs: 20 }), makeMarket(), NOW);

    expect(signal).not.toBeNull();
    expect(signal?.direction).toBe('YES');
    expect(signal?.edgePct).toBeCloseTo(5.5263, 4);
    expect(signal?.realMovePct).toBeCloseTo(0.5263, 4);
    expect(signal?.impliedMovePct).toBeCloseTo(-5, 10);
    // 0.55263 * (1 - 0.5 * 0.02)
    expect(signal?.confidence).toBeCloseTo(0.5471, 4);
    expect(signal?.observedAt).toBe(NOW);
    expect(signal?.tickPrice).toBe(95_500);
    expect(signal?.tickLatencyMs).toBe(20);
    expect(Object.isFrozen(signal)).toBe(true);
  });

  it('signals NO when the market is priced above the real move', () => {
    const signal = detector().evaluate(
      makeTick({ price: 94_500 }),
      makeMarket({ yesPrice: 0.55, noPrice: 0.45 }),
      NOW
    );
    expect(signal?.direction).toBe('NO');
    expect(signal?.edgePct).toBeCloseTo(-5.5263, 4);
  });

  it('ignores stale ticks', () => {
    const tick = makeTick({ latencyMs: 1_500 });
    expect(tick.stale).toBe(true);
    expect(detector().evaluate(tick, makeMarket(), NOW)).toBeNull();
  });

  it('ignores markets without a positive baseline', () => {
    expect(detector().evaluate(makeTick(), makeMarket({ baselinePrice: 0 }), NOW)).toBeNull();
    expect(detector().evaluate(makeTick(), makeMarket({ baselinePrice: -1 }), NOW)).toBeNull();
  });

  it('ignores expired markets', () => {
    expect(detector().evaluate(makeTick(), makeMarket({ expiresAt: NOW }), NOW)).toBeNull();
  });

  it('reads the threshold from the risk controller', () => {
    const gate = { edgeThreshold: 6 };
    const d = new EdgeDetector(OPTS, gate);
    expect(d.evaluate(makeTick(), makeMarket(), NOW)).toBeNull();

    gate.edgeThreshold = 5;
    expect(d.evaluate(makeTick(), makeMarket(), NOW)).not.toBeNull();
  });
});

describe('EdgeDetector.scan', () => {
  it('orders signals by edge times confidence', () => {
    const markets = [
      makeMarket({ marketId: 'small', yesPrice: 0.47, noPrice: 0.53 }),
      makeMarket({ marketId: 'large', yesPrice: 0.42, noPrice: 0.58 }),
      makeMarket({ marketId: 'none', yesPrice: 0.505, noPrice: 0.495 }),
    ];
    const signals = detector().scan(makeTick(), markets, NOW);
    expect(signals.map((s) => s.marketId)).toEqual(['large', 'small']);
  });

  it('scales confidence by indicator agreement once enough history exists', () => {
    // RSI 75: overbought, leans against a YES trade
    const prices = [100, 101, 102, 103, 104, 105, 106, 105, 104, 104, 104, 104, 104, 104, 104];
    const [base] = detector().scan(makeTick(), [makeMarket()], NOW);
    const [adjusted] = detector().scan(makeTick(), [makeMarket()], NOW, prices);
    const [short] = detector().scan(makeTick(), [makeMarket()], NOW, prices.slice(1));

    expect(adjusted.direction).toBe('YES');
    expect(adjusted.confidence).toBeCloseTo(base.confidence * 0.75, 10);
    expect(short.confidence).toBe(base.confidence);
  });
});
