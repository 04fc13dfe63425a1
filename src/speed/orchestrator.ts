import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { RateLimitedAlerter } from "./alerts";
import { EdgeDetector } from "./edge-detector";
import { HealthReport, Watchdog, createWatchdog, describeHealth } from "./health";
import { MarketCatalog } from "./market-catalog";
import { SurvivalBrain } from "./survival-brain";
import { TickChannel } from "./tick-channel";
import { RunSummary } from "./trade-log";
import { Trader } from "./trading-path";
import { EdgeSignal, PriceTick, SubmitResult } from "./types";

const log = createLogger("orchestrator");

export interface PriceSource {
  start(onTick: (tick: PriceTick) => void): void;
  stop(): void;
  latest(): PriceTick | null;
  latencyMs(): number | null;
  isConnected(): boolean;
  recentPrices(): number[];
}

export interface OrchestratorTiming {
  tickChannelCapacity: number;
  evaluationBudgetMs: number;
  resolveIntervalMs: number;
  summaryIntervalMs: number;
  statusLogIntervalMs: number;
  dailySummaryIntervalMs: number;
  watchdogIntervalMs: number;
}

export interface OrchestratorDeps {
  feed: PriceSource;
  catalog: MarketCatalog;
  detector: EdgeDetector;
  brain: SurvivalBrain;
  executor: Trader;
  alerter: RateLimitedAlerter;
  timing: OrchestratorTiming;
  survivalFile: string;
  now?: () => number;
}

export interface LoopStats {
  ticks: number;
  signals: number;
  approved: number;
  rejectedByBrain: number;
  rejectedByExecutor: number;
  budgetDropped: number;
  opened: number;
}

/**
 * Feed → channel → scan → approve → dispatch. The consumer never awaits the
 * venue: submissions run concurrently and only their slot reservation
 * happens on the consumer path.
 */
export class Orchestrator {
  private readonly channel: TickChannel<PriceTick>;
  private readonly now: () => number;
  private readonly timers: Array<ReturnType<typeof setInterval>> = [];
  private readonly watchdog: Watchdog;
  private lastHeartbeatAt: number | null = null;
  private loop: Promise<void> | null = null;
  private running = false;
  private startedAt = 0;
  private readonly stats: LoopStats = {
    ticks: 0,
    signals: 0,
    approved: 0,
    rejectedByBrain: 0,
    rejectedByExecutor: 0,
    budgetDropped: 0,
    opened: 0,
  };

  constructor(private readonly deps: OrchestratorDeps) {
    this.channel = new TickChannel<PriceTick>(deps.timing.tickChannelCapacity);
    this.now = deps.now ?? Date.now;
    this.watchdog = createWatchdog({
      intervalMs: deps.timing.watchdogIntervalMs,
      sample: () => ({
        now: this.now(),
        feedConnected: deps.feed.isConnected(),
        lastTickAt: deps.feed.latest()?.receiptTimestamp ?? null,
        lastHeartbeatAt: this.lastHeartbeatAt,
      }),
      onChange: (report, previous) => {
        deps.alerter.notify("health", `${describeHealth(report)} (was ${previous})`);
      },
    });
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.now();
    const { feed, catalog, brain, alerter, timing } = this.deps;

    brain.onTransition((t) => {
      alerter.notify(
        "tier-change",
        `Tier ${t.from} -> ${t.to} (${t.reason}) | kelly x${t.kellyMultiplier.toFixed(2)} | min edge ${t.edgeThreshold.toFixed(2)}%`
      );
    });

    brain.onMilestone((m) => {
      const label = m.kind === "capital-doubled" ? "Capital doubled" : "New all-time high";
      alerter.notify("milestone", `${label}: $${m.capital.toFixed(2)}`);
    });

    catalog.start();
    feed.start((tick) => {
      this.channel.push(tick);
    });
    this.loop = this.consume();

    this.timers.push(
      setInterval(() => this.runResolution(), timing.resolveIntervalMs),
      setInterval(() => this.flushSummary(), timing.summaryIntervalMs),
      setInterval(() => this.logStatus(), timing.statusLogIntervalMs),
      setInterval(() => this.sendDailySummary(), timing.dailySummaryIntervalMs)
    );
    this.watchdog.start();

    log.info("Decision loop started", { mode: this.deps.executor.mode });
  }

  private async consume(): Promise<void> {
    for (;;) {
      const tick = await this.channel.next();
      if (tick === null) return;
      try {
        this.onTick(tick);
      } catch (e) {
        log.error("Tick evaluation error", { error: errorMessage(e) });
      }
      this.lastHeartbeatAt = this.now();
    }
  }

  /** Evaluates one tick synchronously; submissions are dispatched, not awaited. */
  onTick(tick: PriceTick): void {
    const { feed, catalog, detector, brain, executor, timing } = this.deps;
    this.stats.ticks++;

    const started = this.now();
    const signals = detector.scan(tick, catalog.markets(started), started, feed.recentPrices());
    this.stats.signals += signals.length;

    for (let i = 0; i < signals.length; i++) {
      if (this.now() - started > timing.evaluationBudgetMs) {
        this.stats.budgetDropped += signals.length - i;
        log.debug("Evaluation budget exhausted", { dropped: signals.length - i });
        break;
      }
      const signal = signals[i];
      const approval = brain.approve(signal);
      if (!approval.approved) {
        this.stats.rejectedByBrain++;
        log.debug(`Brain rejected: ${approval.reason}`, { marketId: signal.marketId, edgePct: signal.edgePct.toFixed(3) });
        continue;
      }
      this.stats.approved++;
      this.dispatch(executor.submit(signal, approval.sizeFraction), signal);
    }
  }

  private dispatch(task: Promise<SubmitResult>, signal: EdgeSignal): void {
    void task.then(
      (result) => {
        if (result.ok) this.stats.opened++;
        else this.stats.rejectedByExecutor++;
      },
      (e: unknown) => {
        this.stats.rejectedByExecutor++;
        log.error("Submission failed", { marketId: signal.marketId, error: errorMessage(e) });
      }
    );
  }

  private runResolution(): void {
    this.deps.executor
      .resolveDue(this.now())
      .then((resolved) => {
        if (resolved.length > 0) this.deps.brain.save(this.deps.survivalFile);
      })
      .catch((e: unknown) => {
        log.error("Resolution run failed", { error: errorMessage(e) });
      });
  }

  private flushSummary(): RunSummary | null {
    try {
      const summary = this.deps.executor.writeSummary(this.deps.brain.state().transitions, this.startedAt);
      this.deps.brain.save(this.deps.survivalFile);
      return summary;
    } catch (e) {
      log.error("Failed to write summary", { error: errorMessage(e) });
      return null;
    }
  }

  private sendDailySummary(): void {
    const summary = this.flushSummary();
    if (!summary) return;
    this.deps.alerter.notify(
      "daily-summary",
      `[${summary.mode}] ${summary.resolved} resolved | win rate ${(summary.winRate * 100).toFixed(1)}% | ` +
        `P&L ${summary.totalPnl >= 0 ? "+" : ""}$${summary.totalPnl.toFixed(2)} | capital $${summary.capital.toFixed(2)} | tier ${this.deps.brain.tier}`
    );
  }

  // ─── Status dashboard ───

  logStatus(): void {
    const { executor, brain, feed, catalog } = this.deps;
    const stats = executor.stats();
    const resolved = stats.wins + stats.losses;
    const tick = feed.latest();
    const latency = executor.latencyStats();

    console.log("\n" + "═".repeat(80));
    console.log(`  BTC SPEED TRADER — ${executor.mode.toUpperCase()} — STATUS`);
    console.log("═".repeat(80));
    console.log(`  Capital:       $${stats.capital.toFixed(2)} (started $${stats.initialCapital.toFixed(2)})`);
    console.log(`  Realized P&L:  ${stats.realizedPnl >= 0 ? "+" : ""}$${stats.realizedPnl.toFixed(2)}`);
    console.log(`  Win Rate:      ${resolved > 0 ? ((stats.wins / resolved) * 100).toFixed(1) : "0.0"}% (${stats.wins}W/${stats.losses}L)`);
    console.log(`  Open:          ${executor.openCount()} positions`);
    console.log(`  Tier:          ${brain.tier} | kelly x${brain.kellyMultiplier.toFixed(2)} | min edge ${brain.edgeThreshold.toFixed(2)}%`);
    console.log(`  Markets:       ${catalog.markets().length} tradable`);
    const filtered = brain.patternStats().filter((p) => p.filtered);
    if (filtered.length > 0) {
      console.log(`  Filtered:      ${filtered.map((p) => `${p.key} (${(p.winRate * 100).toFixed(0)}%)`).join(", ")}`);
    }
    console.log(`  Loop:          ${this.stats.ticks} ticks | ${this.stats.signals} signals | ${this.stats.opened} opened | ${this.stats.budgetDropped} over budget | ${this.channel.dropped} ticks dropped`);
    console.log("─".repeat(80));
    console.log(
      `  BTC: ${tick ? `$${tick.price.toLocaleString(undefined, { maximumFractionDigits: 2 })} (${tick.latencyMs}ms${tick.stale ? ", stale" : ""})` : "Waiting for data..."}` +
        ` | feed ${feed.isConnected() ? "up" : "down"} | exec avg ${latency.avgMs.toFixed(0)}ms`
    );

    const open = executor.openPositions();
    if (open.length > 0) {
      console.log("─".repeat(80));
      console.log("  OPEN POSITIONS:");
      for (const pos of open) {
        const timeLeft = Math.max(0, Math.round((pos.expiresAt - this.now()) / 1000));
        console.log(`    ${pos.direction} $${pos.size.toFixed(2)} @ ${pos.entryPrice.toFixed(3)} | ${timeLeft}s remaining | ${pos.question.slice(0, 40)}`);
      }
    }
    console.log("═".repeat(80) + "\n");
  }

  /** Runs one health check now; the watchdog timer runs the same check. */
  checkHealth(): HealthReport {
    return this.watchdog.check();
  }

  getStats(): LoopStats {
    return { ...this.stats };
  }

  /** Stops intake, then waits for in-flight work and flushes state. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    log.info("Shutting down...");

    this.deps.feed.stop();
    this.deps.catalog.stop();
    this.channel.close();
    for (const timer of this.timers) clearInterval(timer);
    this.timers.length = 0;
    this.watchdog.stop();

    if (this.loop) await this.loop;
    await this.deps.executor.drain();
    this.flushSummary();
    await this.deps.alerter.flush();
    log.info("Shutdown complete", { ...this.stats });
  }
}
