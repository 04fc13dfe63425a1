import { describe, it, expect, beforeEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { AlertCategory, AlertSink, RateLimitedAlerter } from '../speed/alerts';
import { EdgeDetector } from '../speed/edge-detector';
import { MarketCatalog } from '../speed/market-catalog';
import { Orchestrator, PriceSource } from '../speed/orchestrator';
import { createPaperTrader } from '../speed/paper-trader';
import { SurvivalBrain } from '../speed/survival-brain';
import { Trader } from '../speed/trading-path';
import { MarketDescriptor, PriceTick } from '../speed/types';
import { NOW, makeBrain, makeDeps, makeMarket, makeTick, tmpDir } from './helpers/fixtures';

class FakeFeed implements PriceSource {
  handler: ((tick: PriceTick) => void) | null = null;
  stopped = false;
  last: PriceTick | null = null;

  start(onTick: (tick: PriceTick) => void): void {
    this.handler = onTick;
  }
  stop(): void {
    this.stopped = true;
  }
  emit(tick: PriceTick): void {
    this.last = tick;
    this.handler?.(tick);
  }
  latest(): PriceTick | null {
    return this.last;
  }
  latencyMs(): number | null {
    return 20;
  }
  isConnected(): boolean {
    return true;
  }
  recentPrices(): number[] {
    return [];
  }
}

class FakeCatalog implements MarketCatalog {
  started = false;
  stopped = false;
  constructor(public list: MarketDescriptor[]) {}

  markets(): MarketDescriptor[] {
    return this.list;
  }
  async refresh(): Promise<void> {
    return undefined;
  }
  start(): void {
    this.started = true;
  }
  stop(): void {
    this.stopped = true;
  }
}

class NullSink implements AlertSink {
  readonly sent: AlertCategory[] = [];
  async send(category: AlertCategory): Promise<void> {
    this.sent.push(category);
  }
}

const TIMING = {
  tickChannelCapacity: 8,
  evaluationBudgetMs: 25,
  resolveIntervalMs: 60_000,
  summaryIntervalMs: 60_000,
  statusLogIntervalMs: 60_000,
  dailySummaryIntervalMs: 60_000,
  watchdogIntervalMs: 60_000,
};

describe('Orchestrator', () => {
  let dir: string;
  let feed: FakeFeed;
  let catalog: FakeCatalog;
  let brain: SurvivalBrain;
  let executor: Trader;
  let sink: NullSink;

  function build(now: () => number = () => NOW): Orchestrator {
    return new Orchestrator({
      feed,
      catalog,
      detector: new EdgeDetector({ impliedScale: 100, staleTickMs: 1_000, confidenceEdgeScalePct: 10 }, brain),
      brain,
      executor,
      alerter: new RateLimitedAlerter(sink, 10_000, () => NOW),
      timing: TIMING,
      survivalFile: path.join(dir, 'survival-state.json'),
      now,
    });
  }

  beforeEach(() => {
    dir = tmpDir();
    feed = new FakeFeed();
    catalog = new FakeCatalog([makeMarket()]);
    brain = makeBrain();
    executor = createPaperTrader(makeDeps(dir, { brain }));
    sink = new NullSink();
  });

  it('dispatches an approved signal to the executor', async () => {
    const orchestrator = build();
    orchestrator.onTick(makeTick());
    await executor.drain();

    const [position] = executor.openPositions();
    expect(position.marketId).toBe('mkt-1');
    expect(position.direction).toBe('YES');
    // edge 5.526%, confidence 0.547, half Kelly: $1.51 of $100
    expect(position.size).toBe(1.51);
    expect(orchestrator.getStats()).toMatchObject({ ticks: 1, signals: 1, approved: 1, opened: 1 });
  });

  it('leaves the executor to reject a second signal on a market in flight', async () => {
    const orchestrator = build();
    orchestrator.onTick(makeTick());
    orchestrator.onTick(makeTick());
    await executor.drain();

    expect(executor.openCount()).toBe(1);
    expect(orchestrator.getStats()).toMatchObject({ approved: 2, opened: 1, rejectedByExecutor: 1 });
  });

  it('skips signals below the brain threshold', async () => {
    catalog.list = [makeMarket({ yesPrice: 0.5, noPrice: 0.5, baselinePrice: 95_400 })];
    const orchestrator = build();
    orchestrator.onTick(makeTick());
    await executor.drain();

    expect(orchestrator.getStats()).toMatchObject({ signals: 0, approved: 0 });
    expect(executor.openCount()).toBe(0);
  });

  it('drops the rest of a tick once the evaluation budget is spent', async () => {
    let clock = NOW;
    const orchestrator = build(() => (clock += 30));
    orchestrator.onTick(makeTick());
    await executor.drain();

    expect(orchestrator.getStats()).toMatchObject({ signals: 1, approved: 0, budgetDropped: 1 });
  });

  it('consumes feed ticks and flushes state on stop', async () => {
    const orchestrator = build();
    orchestrator.start();
    expect(catalog.started).toBe(true);

    feed.emit(makeTick());
    await vi.waitFor(() => expect(orchestrator.getStats().ticks).toBe(1));
    await orchestrator.stop();

    expect(feed.stopped).toBe(true);
    expect(catalog.stopped).toBe(true);
    expect(executor.openCount()).toBe(1);
    expect(fs.existsSync(path.join(dir, 'trades-summary.json'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'survival-state.json'))).toBe(true);
  });

  it('reports health from feed data and the decision loop heartbeat', async () => {
    const orchestrator = build();
    const before = orchestrator.checkHealth();
    expect(before.status).toBe('unhealthy');
    expect(before.components.map((c) => c.message)).toEqual(['no data received', 'no heartbeat']);
    expect(sink.sent.filter((c) => c === 'health')).toHaveLength(1);

    orchestrator.start();
    feed.emit(makeTick());
    await vi.waitFor(() => expect(orchestrator.getStats().ticks).toBe(1));

    expect(orchestrator.checkHealth().status).toBe('healthy');
    await orchestrator.stop();
  });

  it('alerts on capital milestones', async () => {
    const orchestrator = build();
    orchestrator.start();

    brain.reportOutcome('t-1', true, 5, NOW);
    expect(sink.sent).toContain('milestone');
    await orchestrator.stop();
  });
});
