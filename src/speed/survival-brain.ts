import fs from "fs";
import { z } from "zod";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { SurvivalSettings } from "./config";
import { clamp, kellyFraction } from "./kelly";
import { writeJsonAtomic } from "./persist";
import { edgeBucketLabel } from "./trade-log";
import {
  Approval,
  EdgeSignal,
  MarketDescriptor,
  Milestone,
  MilestoneKind,
  OutcomeRecord,
  SurvivalState,
  Tier,
  TierTransition,
} from "./types";

const log = createLogger("survival-brain");

const MAX_TRANSITIONS = 100;
const DOUBLED_CAPITAL = 2;

// ─── Patterns ───
// Key: "<UTC hour>|<market type>|<edge bucket>", e.g. "14|btc-5m|2-5%"

export function marketTypeOf(market: Pick<MarketDescriptor, "createdAt" | "expiresAt">): string {
  return `btc-${Math.round((market.expiresAt - market.createdAt) / 60_000)}m`;
}

export function patternKey(at: number, marketType: string, edgePct: number): string {
  return `${new Date(at).getUTCHours()}|${marketType}|${edgeBucketLabel(edgePct)}`;
}

export function signalPattern(signal: EdgeSignal): string {
  return patternKey(signal.observedAt, marketTypeOf(signal.market), signal.edgePct);
}

interface PatternCounts {
  wins: number;
  losses: number;
  pnl: number;
}

export interface PatternStats extends PatternCounts {
  key: string;
  winRate: number;
  filtered: boolean;
}

// ─── Snapshot schema ───

const TierSchema = z.enum(["HEALTHY", "WOUNDED", "THRIVING"]);

const SnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.number(),
  tier: TierSchema,
  capitalEstimate: z.number().finite(),
  consecutiveLosses: z.number().int().nonnegative(),
  consecutiveWins: z.number().int().nonnegative(),
  edgeThreshold: z.number().finite(),
  kellyMultiplier: z.number().finite(),
  history: z.array(
    z.object({ tradeId: z.string(), won: z.boolean(), pnl: z.number().finite(), at: z.number() })
  ),
  transitions: z.array(
    z.object({
      from: TierSchema,
      to: TierSchema,
      at: z.number(),
      reason: z.string(),
      kellyMultiplier: z.number(),
      edgeThreshold: z.number(),
    })
  ),
  seenIds: z.array(z.string()),
  patterns: z
    .record(z.object({ wins: z.number().int().nonnegative(), losses: z.number().int().nonnegative(), pnl: z.number().finite() }))
    .default({}),
  allTimeHigh: z.number().finite().optional(),
  milestones: z.array(z.enum(["all-time-high", "capital-doubled"])).default([]),
});

export type SurvivalSnapshot = z.infer<typeof SnapshotSchema>;

export interface SurvivalBrainOptions {
  settings: SurvivalSettings;
  baseEdgeThresholdPct: number;
  initialCapital: number;
  maxBetPct: number;
  maxConcurrentPositions: number;
  kellyFraction: number;
  /** Open positions on the active path; injected so the brain never owns them. */
  openPositions: () => number;
  now?: () => number;
}

export type TransitionListener = (transition: TierTransition) => void;
export type MilestoneListener = (milestone: Milestone) => void;

/**
 * Adaptive risk controller. Loss streaks shrink sizing and raise the edge
 * bar; win streaks and a strong rolling win rate relax them again. Outcomes
 * are also counted per pattern, and a pattern with enough samples and a
 * poor win rate is refused outright.
 *
 * All mutation happens synchronously inside `reportOutcome`, so a single
 * owner never interleaves two updates.
 */
export class SurvivalBrain {
  private readonly s: SurvivalSettings;
  private readonly baseThreshold: number;
  private readonly baseMultiplier: number;
  private readonly now: () => number;
  private readonly listeners: TransitionListener[] = [];
  private readonly milestoneListeners: MilestoneListener[] = [];

  private tierValue: Tier = "HEALTHY";
  private capitalEstimate: number;
  private consecutiveLosses = 0;
  private consecutiveWins = 0;
  private threshold: number;
  private multiplier: number;
  private history: OutcomeRecord[] = [];
  private transitions: TierTransition[] = [];
  private seenIds = new Set<string>();
  private seenOrder: string[] = [];
  private patterns = new Map<string, PatternCounts>();
  private allTimeHigh: number;
  private milestonesHit = new Set<MilestoneKind>();
  private savedAt: number | null = null;

  constructor(private readonly opts: SurvivalBrainOptions) {
    this.s = opts.settings;
    this.now = opts.now ?? Date.now;
    this.baseThreshold = clamp(opts.baseEdgeThresholdPct, this.s.edgeFloorPct, this.s.edgeCeilingPct);
    this.baseMultiplier = clamp(this.s.baseKellyMultiplier, 0, this.s.maxKellyMultiplier);
    this.threshold = this.baseThreshold;
    this.multiplier = this.baseMultiplier;
    this.capitalEstimate = opts.initialCapital;
    this.allTimeHigh = opts.initialCapital;
  }

  // ─── Read-only views ───

  get edgeThreshold(): number {
    return this.threshold;
  }

  get kellyMultiplier(): number {
    return this.multiplier;
  }

  get tier(): Tier {
    return this.tierValue;
  }

  state(): SurvivalState {
    return {
      tier: this.tierValue,
      capitalEstimate: this.capitalEstimate,
      consecutiveLosses: this.consecutiveLosses,
      consecutiveWins: this.consecutiveWins,
      edgeThreshold: this.threshold,
      kellyMultiplier: this.multiplier,
      history: this.history.map((h) => ({ ...h })),
      transitions: this.transitions.map((t) => ({ ...t })),
    };
  }

  /** Win rate over the last `winRateWindow` outcomes, null when empty. */
  rollingWinRate(): number | null {
    const window = this.history.slice(-this.s.winRateWindow);
    if (window.length === 0) return null;
    return window.filter((h) => h.won).length / window.length;
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  onMilestone(listener: MilestoneListener): void {
    this.milestoneListeners.push(listener);
  }

  /** When the state on disk was written, null if it never was. */
  lastSavedAt(): number | null {
    return this.savedAt;
  }

  patternStats(): PatternStats[] {
    return [...this.patterns.entries()]
      .map(([key, c]) => {
        const samples = c.wins + c.losses;
        return { key, ...c, winRate: samples > 0 ? c.wins / samples : 0, filtered: this.isFiltered(c) };
      })
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  private isFiltered(counts: PatternCounts | undefined): boolean {
    if (!counts) return false;
    const samples = counts.wins + counts.losses;
    if (samples < this.s.patternMinSamples) return false;
    return counts.wins / samples < this.s.patternMinWinRate;
  }

  // ─── Decisions ───

  approve(signal: EdgeSignal): Approval {
    if (Math.abs(signal.edgePct) < this.threshold) {
      return { approved: false, reason: "below-threshold" };
    }
    const pattern = signalPattern(signal);
    if (this.isFiltered(this.patterns.get(pattern))) {
      log.debug("Pattern filtered", { pattern, marketId: signal.marketId });
      return { approved: false, reason: "pattern-filtered" };
    }
    if (this.opts.openPositions() >= this.opts.maxConcurrentPositions) {
      return { approved: false, reason: "concurrency-limit" };
    }
    const raw = this.multiplier * kellyFraction(signal.confidence, signal.edgePct, this.opts.kellyFraction);
    const sizeFraction = clamp(raw, 0, this.opts.maxBetPct / 100);
    if (!(sizeFraction > 0)) {
      return { approved: false, reason: "zero-size" };
    }
    return { approved: true, sizeFraction };
  }

  /** Returns false when `tradeId` was already reported. */
  reportOutcome(tradeId: string, won: boolean, pnl: number, at: number = this.now(), pattern?: string): boolean {
    if (this.seenIds.has(tradeId)) {
      log.debug("Duplicate outcome ignored", { tradeId });
      return false;
    }
    this.rememberId(tradeId);

    this.history.push({ tradeId, won, pnl, at });
    if (this.history.length > this.s.historyLimit) {
      this.history.splice(0, this.history.length - this.s.historyLimit);
    }
    this.capitalEstimate += pnl;
    if (pattern) this.countPattern(pattern, won, pnl);

    if (won) {
      this.consecutiveWins++;
      this.consecutiveLosses = 0;
    } else {
      this.consecutiveLosses++;
      this.consecutiveWins = 0;
    }

    this.step(at);
    this.checkMilestones(at);
    return true;
  }

  private countPattern(key: string, won: boolean, pnl: number): void {
    const counts = this.patterns.get(key) ?? { wins: 0, losses: 0, pnl: 0 };
    if (won) counts.wins++;
    else counts.losses++;
    counts.pnl += pnl;
    this.patterns.set(key, counts);
  }

  private checkMilestones(at: number): void {
    const capital = this.capitalEstimate;
    if (capital > this.allTimeHigh) {
      this.allTimeHigh = capital;
      this.milestone({ kind: "all-time-high", capital, at });
    }
    if (!this.milestonesHit.has("capital-doubled") && capital >= DOUBLED_CAPITAL * this.opts.initialCapital) {
      this.milestonesHit.add("capital-doubled");
      this.milestone({ kind: "capital-doubled", capital, at });
    }
  }

  private milestone(m: Milestone): void {
    log.info(`Milestone: ${m.kind}`, { capital: m.capital.toFixed(2) });
    for (const listener of this.milestoneListeners) {
      try {
        listener({ ...m });
      } catch (e) {
        log.error("Milestone listener error", { error: errorMessage(e) });
      }
    }
  }

  private step(at: number): void {
    const L1 = this.s.lossStreakToWound;

    // Every L1 consecutive losses is one more wound
    if (this.consecutiveLosses > 0 && this.consecutiveLosses % L1 === 0) {
      this.multiplier = clamp(this.multiplier / 2, Math.min(this.s.minKellyMultiplier, this.multiplier), this.s.maxKellyMultiplier);
      this.threshold = clamp(this.threshold + this.s.woundEdgeIncrementPct, this.s.edgeFloorPct, this.s.edgeCeilingPct);
      this.transition("WOUNDED", at, `${this.consecutiveLosses} consecutive losses`);
      return;
    }

    if (this.tierValue === "WOUNDED") {
      if (this.consecutiveWins >= this.s.winStreakToHeal) {
        this.resetToBaseline();
        this.transition("HEALTHY", at, `${this.consecutiveWins} consecutive wins`);
      }
      return;
    }

    const window = this.history.slice(-this.s.winRateWindow);
    const rate = window.length > 0 ? window.filter((h) => h.won).length / window.length : 0;

    if (this.tierValue === "HEALTHY" && window.length >= this.s.thriveMinTrades && rate > this.s.thriveWinRate) {
      this.multiplier = Math.min(this.s.maxKellyMultiplier, this.baseMultiplier * this.s.thriveKellyBoost);
      this.threshold = Math.max(this.s.edgeFloorPct, this.baseThreshold - this.s.thriveEdgeReductionPct);
      this.transition("THRIVING", at, `win rate ${(rate * 100).toFixed(0)}% over ${window.length}`);
      return;
    }

    if (this.tierValue === "THRIVING" && rate < this.s.thriveExitWinRate) {
      this.resetToBaseline();
      this.transition("HEALTHY", at, `win rate ${(rate * 100).toFixed(0)}% over ${window.length}`);
    }
  }

  private resetToBaseline(): void {
    this.multiplier = this.baseMultiplier;
    this.threshold = this.baseThreshold;
  }

  private transition(to: Tier, at: number, reason: string): void {
    const record: TierTransition = {
      from: this.tierValue,
      to,
      at,
      reason,
      kellyMultiplier: this.multiplier,
      edgeThreshold: this.threshold,
    };
    this.tierValue = to;
    this.transitions.push(record);
    if (this.transitions.length > MAX_TRANSITIONS) this.transitions.shift();

    log.info(`Tier ${record.from} -> ${to}`, {
      reason,
      kellyMultiplier: this.multiplier.toFixed(3),
      edgeThreshold: this.threshold.toFixed(2),
    });
    for (const listener of this.listeners) {
      try {
        listener({ ...record });
      } catch (e) {
        log.error("Transition listener error", { error: errorMessage(e) });
      }
    }
  }

  private rememberId(tradeId: string): void {
    this.seenIds.add(tradeId);
    this.seenOrder.push(tradeId);
    const limit = Math.max(this.s.seenIdLimit, this.s.historyLimit + 1);
    while (this.seenOrder.length > limit) {
      const evicted = this.seenOrder.shift();
      if (evicted !== undefined) this.seenIds.delete(evicted);
    }
  }

  // ─── Persistence ───

  snapshot(): SurvivalSnapshot {
    return {
      version: 1,
      savedAt: this.now(),
      ...this.state(),
      seenIds: [...this.seenOrder],
      patterns: Object.fromEntries([...this.patterns].map(([key, c]) => [key, { ...c }])),
      allTimeHigh: this.allTimeHigh,
      milestones: [...this.milestonesHit],
    };
  }

  /** Returns false, leaving state untouched, when `raw` is not a valid snapshot. */
  restore(raw: unknown): boolean {
    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("Ignoring invalid survival snapshot", {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return false;
    }
    const snap = parsed.data;
    this.tierValue = snap.tier;
    this.capitalEstimate = snap.capitalEstimate;
    this.consecutiveLosses = snap.consecutiveLosses;
    this.consecutiveWins = snap.consecutiveWins;
    this.threshold = clamp(snap.edgeThreshold, this.s.edgeFloorPct, this.s.edgeCeilingPct);
    this.multiplier = clamp(snap.kellyMultiplier, 0, this.s.maxKellyMultiplier);
    this.history = snap.history.slice(-this.s.historyLimit);
    this.transitions = snap.transitions.slice(-MAX_TRANSITIONS);
    this.seenIds = new Set();
    this.seenOrder = [];
    for (const id of snap.seenIds) this.rememberId(id);
    for (const h of this.history) {
      if (!this.seenIds.has(h.tradeId)) this.rememberId(h.tradeId);
    }
    this.patterns = new Map(Object.entries(snap.patterns).map(([key, c]) => [key, { ...c }]));
    this.allTimeHigh = Math.max(snap.allTimeHigh ?? this.opts.initialCapital, this.opts.initialCapital);
    this.milestonesHit = new Set(snap.milestones);
    this.savedAt = snap.savedAt;
    log.info("Survival state restored", {
      tier: this.tierValue,
      kellyMultiplier: this.multiplier,
      edgeThreshold: this.threshold,
      history: this.history.length,
      patterns: this.patterns.size,
    });
    return true;
  }

  save(file: string): void {
    const snap = this.snapshot();
    writeJsonAtomic(file, snap);
    this.savedAt = snap.savedAt;
  }

  /** Restores from `file` if it exists and parses; otherwise starts fresh. */
  load(file: string): boolean {
    if (!fs.existsSync(file)) return false;
    try {
      return this.restore(JSON.parse(fs.readFileSync(file, "utf-8")));
    } catch (e) {
      log.warn("Failed to read survival snapshot, starting fresh", { file, error: errorMessage(e) });
      return false;
    }
  }
}
