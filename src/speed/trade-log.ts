import fs from "fs";
import { z } from "zod";
import { createLogger } from "../logger";
import { appendLine, writeJsonAtomic } from "./persist";
import { Position, TierTransition, TradingPath } from "./types";

const log = createLogger("trade-log");

// ─── Record schema ───

const OutcomeSchema = z.enum(["YES", "NO"]);

const PositionSchema = z.object({
  id: z.string().min(1),
  mode: z.enum(["live", "paper"]),
  marketId: z.string().min(1),
  question: z.string(),
  direction: OutcomeSchema,
  entryPrice: z.number().gt(0).lt(1),
  yesPriceAtEntry: z.number().min(0).max(1),
  size: z.number().positive(),
  shares: z.number().positive(),
  edgePct: z.number(),
  confidence: z.number().min(0).max(1),
  pattern: z.string().optional(),
  openedAt: z.number(),
  expiresAt: z.number(),
  status: z.enum(["PENDING", "RESOLVED"]),
  orderId: z.string().optional(),
  outcome: OutcomeSchema.optional(),
  resolutionPrice: z.number().optional(),
  pnl: z.number().optional(),
  resolvedAt: z.number().optional(),
  settlementSource: z.enum(["venue", "simulated"]).optional(),
});

const RecordSchema = z.object({
  kind: z.enum(["open", "resolve"]),
  trade: PositionSchema,
});

export type TradeRecord = z.infer<typeof RecordSchema>;

export interface ReplayOptions {
  /** Move corrupt lines to the quarantine file and rewrite the log without them. */
  quarantine?: boolean;
}

export interface ReplayResult {
  positions: Position[];
  records: number;
  corrupt: number;
}

/**
 * Append-only JSONL journal: one `open` record when a position is created
 * and one `resolve` record when it settles. Replay folds by id, last wins.
 */
export class TradeLog {
  constructor(readonly file: string) {}

  get quarantineFile(): string {
    return `${this.file}.quarantine`;
  }

  get summaryFile(): string {
    return this.file.replace(/\.jsonl$/, "") + "-summary.json";
  }

  appendOpen(position: Position): void {
    this.append({ kind: "open", trade: position });
  }

  appendResolve(position: Position): void {
    this.append({ kind: "resolve", trade: position });
  }

  private append(record: TradeRecord): void {
    appendLine(this.file, JSON.stringify(record));
  }

  /** Folds the log by id. Read-only unless `quarantine` is set. */
  replay(opts: ReplayOptions = {}): ReplayResult {
    if (!fs.existsSync(this.file)) return { positions: [], records: 0, corrupt: 0 };

    const lines = fs.readFileSync(this.file, "utf-8").split("\n");
    const byId = new Map<string, Position>();
    const good: string[] = [];
    const bad: string[] = [];

    for (const line of lines) {
      if (line.trim() === "") continue;
      const record = parseRecord(line);
      if (!record) {
        bad.push(line);
        continue;
      }
      good.push(line);
      byId.set(record.trade.id, record.trade);
    }

    if (bad.length > 0 && !opts.quarantine) {
      log.warn("Skipped corrupt trade log lines", { file: this.file, count: bad.length });
    } else if (bad.length > 0) {
      for (const line of bad) appendLine(this.quarantineFile, line);
      const tmp = `${this.file}.tmp`;
      fs.writeFileSync(tmp, good.map((l) => `${l}\n`).join(""));
      fs.renameSync(tmp, this.file);
      log.warn("Quarantined corrupt trade log lines", {
        file: this.file,
        count: bad.length,
        quarantine: this.quarantineFile,
      });
    }

    return { positions: [...byId.values()], records: good.length, corrupt: bad.length };
  }
}

function parseRecord(line: string): TradeRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = RecordSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ─── Run summary ───

export const EDGE_BUCKETS = [
  { label: "0-2%", lower: 0, upper: 2 },
  { label: "2-5%", lower: 2, upper: 5 },
  { label: "5-10%", lower: 5, upper: 10 },
  { label: "10%+", lower: 10, upper: Infinity },
] as const;

export interface EdgeBucketStats {
  bucket: string;
  trades: number;
  wins: number;
  winRate: number;
  pnl: number;
}

export interface RunSummary {
  mode: TradingPath;
  generatedAt: string;
  startedAt: string;
  initialCapital: number;
  capital: number;
  totalTrades: number;
  resolved: number;
  pending: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  roiPct: number;
  edgeBuckets: EdgeBucketStats[];
  tierTransitions: TierTransition[];
}

export interface SummaryInput {
  mode: TradingPath;
  positions: Position[];
  initialCapital: number;
  capital: number;
  transitions: TierTransition[];
  startedAt: number;
  now?: number;
}

export function edgeBucketLabel(edgePct: number): string {
  const abs = Math.abs(edgePct);
  for (const b of EDGE_BUCKETS) {
    if (abs >= b.lower && abs < b.upper) return b.label;
  }
  return EDGE_BUCKETS[EDGE_BUCKETS.length - 1].label;
}

function round(n: number, digits = 4): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export function buildSummary(input: SummaryInput): RunSummary {
  const resolved = input.positions.filter((p) => p.status === "RESOLVED");
  const wins = resolved.filter((p) => p.outcome === p.direction).length;
  const totalPnl = resolved.reduce((sum, p) => sum + (p.pnl ?? 0), 0);

  const buckets = new Map<string, EdgeBucketStats>();
  for (const b of EDGE_BUCKETS) {
    buckets.set(b.label, { bucket: b.label, trades: 0, wins: 0, winRate: 0, pnl: 0 });
  }
  for (const p of resolved) {
    const stats = buckets.get(edgeBucketLabel(p.edgePct));
    if (!stats) continue;
    stats.trades++;
    if (p.outcome === p.direction) stats.wins++;
    stats.pnl += p.pnl ?? 0;
  }
  for (const stats of buckets.values()) {
    stats.winRate = stats.trades > 0 ? round(stats.wins / stats.trades) : 0;
    stats.pnl = round(stats.pnl);
  }

  return {
    mode: input.mode,
    generatedAt: new Date(input.now ?? Date.now()).toISOString(),
    startedAt: new Date(input.startedAt).toISOString(),
    initialCapital: input.initialCapital,
    capital: round(input.capital),
    totalTrades: input.positions.length,
    resolved: resolved.length,
    pending: input.positions.length - resolved.length,
    wins,
    losses: resolved.length - wins,
    winRate: resolved.length > 0 ? round(wins / resolved.length) : 0,
    totalPnl: round(totalPnl),
    roiPct: round((totalPnl / input.initialCapital) * 100, 2),
    edgeBuckets: [...buckets.values()],
    tierTransitions: input.transitions,
  };
}

export function writeSummary(file: string, summary: RunSummary): void {
  writeJsonAtomic(file, summary);
}
