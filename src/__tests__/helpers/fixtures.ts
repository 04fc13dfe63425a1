// Shared factories for speed-trader tests
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SURVIVAL_DEFAULTS, SurvivalSettings } from '../../speed/config';
import { buildTick } from '../../speed/price-feed';
import { SurvivalBrain, SurvivalBrainOptions } from '../../speed/survival-brain';
import { sleep } from '../../retry';
import { TradeLog } from '../../speed/trade-log';
import { TradingPathDeps } from '../../speed/trading-path';
import { Settlement, SettlementOracle } from '../../speed/settlement';
import { MarketVenue, OrderAck, OrderRequest } from '../../speed/venue';
import { EdgeSignal, MarketDescriptor, Outcome, Position, PriceTick } from '../../speed/types';

export const NOW = 1_700_000_000_000;

export function makeTick(overrides: Partial<{ price: number; latencyMs: number; staleTickMs: number }> = {}): PriceTick {
  const latency = overrides.latencyMs ?? 20;
  return buildTick(overrides.price ?? 95_500, NOW - latency, NOW, overrides.staleTickMs ?? 1_000);
}

export function makeMarket(overrides: Partial<MarketDescriptor> = {}): MarketDescriptor {
  return {
    marketId: 'mkt-1',
    question: 'Bitcoin Up or Down - 5 minute window',
    baselinePrice: 95_000,
    yesPrice: 0.45,
    noPrice: 0.55,
    createdAt: NOW - 60_000,
    expiresAt: NOW + 240_000,
    yesTokenId: 'yes-token',
    noTokenId: 'no-token',
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<EdgeSignal> = {}): EdgeSignal {
  const market = overrides.market ?? makeMarket(overrides.marketId ? { marketId: overrides.marketId } : {});
  return {
    marketId: market.marketId,
    market,
    direction: 'YES',
    edgePct: 5,
    realMovePct: 0,
    impliedMovePct: -5,
    confidence: 0.5,
    observedAt: NOW,
    tickPrice: 95_500,
    tickLatencyMs: 20,
    ...overrides,
  };
}

export function survivalSettings(overrides: Partial<SurvivalSettings> = {}): SurvivalSettings {
  return { ...SURVIVAL_DEFAULTS, ...overrides };
}

export function makeBrain(overrides: Partial<SurvivalBrainOptions> = {}): SurvivalBrain {
  return new SurvivalBrain({
    settings: survivalSettings(),
    baseEdgeThresholdPct: 2,
    initialCapital: 100,
    maxBetPct: 20,
    maxConcurrentPositions: 10,
    kellyFraction: 0.5,
    openPositions: () => 0,
    now: () => NOW,
    ...overrides,
  });
}

export function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'speed-trader-'));
}

/** In-memory venue: records orders, answers settlement from a map. `slow` fills after fillDelayMs. */
export class FakeVenue implements MarketVenue {
  readonly orders: OrderRequest[] = [];
  readonly outcomes = new Map<string, Outcome>();
  behavior: 'fill' | 'reject' | 'hang' | 'slow' = 'fill';
  fillDelayMs = 100;
  settlementError: Error | null = null;

  async placeOrder(req: OrderRequest): Promise<OrderAck> {
    this.orders.push(req);
    if (this.behavior === 'reject') throw new Error('not enough liquidity');
    if (this.behavior === 'hang') return new Promise<OrderAck>(() => undefined);
    if (this.behavior === 'slow') await sleep(this.fillDelayMs);
    return { orderId: `order-${this.orders.length}`, fillPrice: req.price };
  }

  async fetchOutcome(marketId: string): Promise<Outcome | null> {
    if (this.settlementError) throw this.settlementError;
    return this.outcomes.get(marketId) ?? null;
  }
}

export class FixedOracle implements SettlementOracle {
  readonly calls: string[] = [];
  constructor(public result: Settlement | null) {}

  async settle(position: Position): Promise<Settlement | null> {
    this.calls.push(position.id);
    return this.result;
  }
}

export function makeDeps(
  dir: string,
  overrides: Partial<TradingPathDeps> = {}
): TradingPathDeps {
  return {
    settings: {
      maxLatencyMs: 100,
      maxConcurrentPositions: 10,
      minOrderUsd: 1,
      initialCapital: 100,
      venueTimeoutMs: 200,
    },
    brain: makeBrain(),
    feedLatencyMs: () => 20,
    oracle: new FixedOracle(null),
    tradeLog: new TradeLog(path.join(dir, 'trades.jsonl')),
    now: () => NOW,
    ...overrides,
  };
}
