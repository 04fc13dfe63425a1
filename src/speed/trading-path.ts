import { createLogger, Logger } from "../logger";
import { VenueError, VenueTimeoutError, errorMessage } from "../errors";
import { withTimeout } from "../retry";
import { RateLimitedAlerter } from "./alerts";
import { floorCents } from "./kelly";
import { PositionBook } from "./position-book";
import { SettlementOracle } from "./settlement";
import { signalPattern } from "./survival-brain";
import { TradeLog, RunSummary, buildSummary, writeSummary } from "./trade-log";
import {
  EdgeSignal,
  Executor,
  Outcome,
  Position,
  Rejection,
  RejectionKind,
  SettlementSource,
  SubmitResult,
  TierTransition,
  TradingPath,
} from "./types";

const LATENCY_WINDOW = 100;
const LATE_FILL_WAIT_MS = 10_000;

export interface OutcomeReporter {
  reportOutcome(tradeId: string, won: boolean, pnl: number, at?: number, pattern?: string): boolean;
  lastSavedAt(): number | null;
}

export interface TradingPathSettings {
  maxLatencyMs: number;
  maxConcurrentPositions: number;
  minOrderUsd: number;
  initialCapital: number;
  venueTimeoutMs: number;
}

export interface TradingPathDeps {
  settings: TradingPathSettings;
  brain: OutcomeReporter;
  /** Current feed latency; null before the first tick. */
  feedLatencyMs: () => number | null;
  oracle: SettlementOracle;
  tradeLog: TradeLog;
  alerter?: RateLimitedAlerter;
  now?: () => number;
}

export interface Fill {
  orderId?: string;
  fillPrice: number;
}

export type FillOrder = (signal: EdgeSignal, sizeUsd: number, entryPrice: number) => Promise<Fill>;

export interface TradingPathDefinition {
  mode: TradingPath;
  logger: string;
  fill: FillOrder;
}

export interface LatencyStats {
  samples: number;
  avgMs: number;
  maxMs: number;
}

export interface RecoveryReport {
  pending: number;
  resolved: number;
  quarantined: number;
  /** Outcomes fed to the brain because its snapshot predates them. */
  replayed: number;
}

/**
 * Precondition checks, slot reservation, bookkeeping and resolution for one
 * trading path. The live and paper paths differ only in how an order fills.
 */
export class Trader implements Executor {
  readonly mode: TradingPath;

  private readonly book: PositionBook;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly fill: FillOrder;
  private readonly executionTimes: number[] = [];
  private readonly inflight = new Set<Promise<SubmitResult>>();
  private readonly lateFills = new Set<Promise<void>>();
  private resolving: Promise<Position[]> | null = null;
  private seq = 0;

  constructor(
    private readonly deps: TradingPathDeps,
    definition: TradingPathDefinition
  ) {
    this.mode = definition.mode;
    this.fill = definition.fill;
    this.book = new PositionBook(deps.settings.initialCapital);
    this.log = createLogger(definition.logger);
    this.now = deps.now ?? Date.now;
  }

  // ─── Submission ───

  submit(signal: EdgeSignal, sizeFraction: number): Promise<SubmitResult> {
    const task = this.doSubmit(signal, sizeFraction);
    this.inflight.add(task);
    const done = () => {
      this.inflight.delete(task);
    };
    task.then(done, done);
    return task;
  }

  private async doSubmit(signal: EdgeSignal, sizeFraction: number): Promise<SubmitResult> {
    const { settings } = this.deps;
    const marketId = signal.marketId;

    // All checks through reserve() run synchronously
    const latency = this.deps.feedLatencyMs();
    if (latency === null || latency >= settings.maxLatencyMs) {
      return this.reject("LatencyBreach", marketId, `feed latency ${latency ?? "unknown"}ms >= ${settings.maxLatencyMs}ms`);
    }
    if (!Number.isFinite(sizeFraction) || sizeFraction <= 0) {
      return this.reject("InvalidSize", marketId, `size fraction ${sizeFraction}`);
    }
    if (this.book.hasMarket(marketId)) {
      return this.reject("DuplicateMarket", marketId, "position already open or in flight");
    }
    if (this.book.openCount() >= settings.maxConcurrentPositions) {
      return this.reject("ConcurrencyLimit", marketId, `${this.book.openCount()} open`);
    }

    const capital = this.book.available();
    if (capital <= 0) {
      return this.reject("InsufficientCapital", marketId, `capital $${capital.toFixed(2)}`);
    }
    const sizeUsd = floorCents(sizeFraction * capital);
    if (sizeUsd > capital) {
      return this.reject("InsufficientCapital", marketId, `size $${sizeUsd.toFixed(2)} > capital $${capital.toFixed(2)}`);
    }
    if (sizeUsd <= 0 || sizeUsd < settings.minOrderUsd) {
      return this.reject("InvalidSize", marketId, `size $${sizeUsd.toFixed(2)} below minimum $${settings.minOrderUsd}`);
    }

    const entryPrice = signal.direction === "YES" ? signal.market.yesPrice : signal.market.noPrice;
    if (!(entryPrice > 0 && entryPrice < 1)) {
      return this.reject("InvalidSize", marketId, `entry price ${entryPrice} outside (0, 1)`);
    }

    if (!this.book.reserve(marketId, sizeUsd)) {
      return this.reject("DuplicateMarket", marketId, "position already open or in flight");
    }

    const order = this.fill(signal, sizeUsd, entryPrice);
    let fill: Fill;
    try {
      fill = await withTimeout(order, settings.venueTimeoutMs, `${this.mode} order`);
    } catch (e) {
      const kind: RejectionKind = e instanceof VenueTimeoutError ? "VenueTimeout" : "VenueRejected";
      // A timed-out order may still fill; the slot stays reserved until it settles
      if (kind === "VenueTimeout") this.awaitLateFill(order, signal, sizeUsd);
      else this.book.release(marketId);
      this.log.error("Order failed", {
        marketId,
        size: sizeUsd,
        direction: signal.direction,
        kind,
        cause: e instanceof VenueError ? e.kind : undefined,
        error: errorMessage(e),
      });
      return { ok: false, rejection: { kind, marketId, detail: errorMessage(e) } };
    }

    return { ok: true, position: this.openPosition(signal, sizeUsd, fill) };
  }

  private openPosition(signal: EdgeSignal, sizeUsd: number, fill: Fill): Position {
    const marketId = signal.marketId;
    const ackAt = this.now();
    this.recordExecutionTime(ackAt - signal.observedAt);

    const position: Position = {
      id: `${this.mode}-${marketId}-${ackAt}-${++this.seq}`,
      mode: this.mode,
      marketId,
      question: signal.market.question,
      direction: signal.direction,
      entryPrice: fill.fillPrice,
      yesPriceAtEntry: signal.market.yesPrice,
      size: sizeUsd,
      shares: sizeUsd / fill.fillPrice,
      edgePct: signal.edgePct,
      confidence: signal.confidence,
      pattern: signalPattern(signal),
      openedAt: ackAt,
      expiresAt: signal.market.expiresAt,
      status: "PENDING",
      orderId: fill.orderId,
    };
    this.book.open(position);
    this.deps.tradeLog.appendOpen(position);

    this.log.info(`Opened ${position.direction} $${sizeUsd.toFixed(2)} @ ${fill.fillPrice.toFixed(3)}`, {
      id: position.id,
      edgePct: signal.edgePct.toFixed(3),
      confidence: signal.confidence.toFixed(2),
      capital: this.book.capital().toFixed(2),
    });
    this.deps.alerter?.notify(
      "trade-open",
      `[${this.mode}] ${position.direction} $${sizeUsd.toFixed(2)} @ ${fill.fillPrice.toFixed(3)} | edge ${signal.edgePct.toFixed(2)}% | ${position.question}`
    );
    return position;
  }

  private awaitLateFill(order: Promise<Fill>, signal: EdgeSignal, sizeUsd: number): void {
    const marketId = signal.marketId;
    const late = order
      .then(
        (fill) => {
          const position = this.openPosition(signal, sizeUsd, fill);
          this.log.warn("Late fill after order timeout", { id: position.id, marketId, orderId: fill.orderId });
        },
        (e: unknown) => {
          this.book.release(marketId);
          this.log.info("Timed-out order did not fill", { marketId, error: errorMessage(e) });
        }
      )
      .catch((e: unknown) => {
        this.log.error("Failed to record late fill", { marketId, error: errorMessage(e) });
      });
    this.lateFills.add(late);
    void late.finally(() => this.lateFills.delete(late));
  }

  private reject(kind: RejectionKind, marketId: string, detail: string): SubmitResult {
    const rejection: Rejection = { kind, marketId, detail };
    this.log.debug(`Rejected: ${kind}`, { marketId, detail });
    return { ok: false, rejection };
  }

  private recordExecutionTime(ms: number): void {
    this.executionTimes.push(ms);
    if (this.executionTimes.length > LATENCY_WINDOW) this.executionTimes.shift();
    if (ms > this.deps.settings.maxLatencyMs) {
      this.log.warn("Slow execution", { ms, limitMs: this.deps.settings.maxLatencyMs });
    }
  }

  latencyStats(): LatencyStats {
    const n = this.executionTimes.length;
    if (n === 0) return { samples: 0, avgMs: 0, maxMs: 0 };
    const total = this.executionTimes.reduce((a, b) => a + b, 0);
    return { samples: n, avgMs: total / n, maxMs: Math.max(...this.executionTimes) };
  }

  // ─── Resolution ───

  /** Settles every expired PENDING position the oracle can answer for. Overlapping calls share one run. */
  resolveDue(now: number = this.now()): Promise<Position[]> {
    if (this.resolving) return this.resolving;
    const run = this.doResolveDue(now).finally(() => {
      this.resolving = null;
    });
    this.resolving = run;
    return run;
  }

  private async doResolveDue(now: number): Promise<Position[]> {
    const resolved: Position[] = [];
    for (const position of this.book.due(now)) {
      try {
        const settlement = await this.deps.oracle.settle(position, now);
        if (!settlement) continue;
        const done = this.resolve(position.id, settlement.outcome, this.now(), settlement.source);
        if (done) resolved.push(done);
      } catch (e) {
        this.log.warn("Settlement failed", { id: position.id, marketId: position.marketId, error: errorMessage(e) });
      }
    }
    return resolved;
  }

  /** Idempotent: a second call for the same id returns null and changes nothing. */
  resolve(id: string, outcome: Outcome, now: number = this.now(), source: SettlementSource = "venue"): Position | null {
    const position = this.book.settle(id, outcome, now, source);
    if (!position) return null;

    const pnl = position.pnl ?? 0;
    const won = position.direction === outcome;
    try {
      this.deps.tradeLog.appendResolve(position);
    } catch (e) {
      // Replays as PENDING on restart and settles again
      this.log.error("Failed to journal resolution", { id, error: errorMessage(e) });
    }
    this.deps.brain.reportOutcome(position.id, won, pnl, now, position.pattern);

    this.log.info(`Resolved ${won ? "WIN" : "LOSS"} ${pnl >= 0 ? "+" : ""}$${pnl.toFixed(2)}`, {
      id,
      outcome,
      source,
      capital: this.book.capital().toFixed(2),
    });
    this.deps.alerter?.notify(
      "trade-resolve",
      `[${this.mode}] ${won ? "WIN" : "LOSS"} ${pnl >= 0 ? "+" : ""}$${pnl.toFixed(2)} | capital $${this.book.capital().toFixed(2)} | ${position.question}`
    );
    return position;
  }

  // ─── Recovery & persistence ───

  /**
   * Reloads the trade log, quarantining corrupt lines. PENDING positions
   * re-enter the book; outcomes newer than the brain's last save are
   * reported to it again.
   */
  recover(): RecoveryReport {
    const replay = this.deps.tradeLog.replay({ quarantine: true });
    const own = replay.positions.filter((p) => p.mode === this.mode);
    this.book.restore(own);
    this.seq += own.length;
    const pending = own.filter((p) => p.status === "PENDING").length;
    const replayed = this.replayOutcomes(own);
    if (own.length > 0) {
      this.log.info("Recovered positions from trade log", {
        pending,
        resolved: own.length - pending,
        replayed,
        capital: this.book.capital().toFixed(2),
      });
    }
    return { pending, resolved: own.length - pending, quarantined: replay.corrupt, replayed };
  }

  private replayOutcomes(positions: Position[]): number {
    const since = this.deps.brain.lastSavedAt();
    const missed = positions
      .filter((p) => p.status === "RESOLVED" && p.resolvedAt !== undefined && (since === null || p.resolvedAt >= since))
      .sort((a, b) => (a.resolvedAt ?? 0) - (b.resolvedAt ?? 0));

    let replayed = 0;
    for (const p of missed) {
      // Ids already in the snapshot are ignored by the brain
      if (this.deps.brain.reportOutcome(p.id, p.outcome === p.direction, p.pnl ?? 0, p.resolvedAt, p.pattern)) {
        replayed++;
      }
    }
    return replayed;
  }

  summary(transitions: TierTransition[], startedAt: number): RunSummary {
    return buildSummary({
      mode: this.mode,
      positions: this.book.all(),
      initialCapital: this.deps.settings.initialCapital,
      capital: this.book.capital(),
      transitions,
      startedAt,
      now: this.now(),
    });
  }

  writeSummary(transitions: TierTransition[], startedAt: number): RunSummary {
    const summary = this.summary(transitions, startedAt);
    writeSummary(this.deps.tradeLog.summaryFile, summary);
    return summary;
  }

  /** Waits for in-flight submissions, late fills and the current resolution run. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inflight]);
    if (this.lateFills.size > 0) {
      try {
        await withTimeout(Promise.allSettled([...this.lateFills]), LATE_FILL_WAIT_MS, "late fills");
      } catch (e) {
        this.log.warn("Orders still unanswered at shutdown", { count: this.lateFills.size, error: errorMessage(e) });
      }
    }
    if (this.resolving) await Promise.allSettled([this.resolving]);
  }

  // ─── Views ───

  openCount(): number {
    return this.book.openCount();
  }

  openPositions(): Position[] {
    return this.book.pending();
  }

  capital(): number {
    return this.book.capital();
  }

  stats(): ReturnType<PositionBook["stats"]> {
    return this.book.stats();
  }
}
