import "dotenv/config";
import fs from "fs";
import { loadConfig } from "../src/speed/config";
import { TradeLog, buildSummary, RunSummary } from "../src/speed/trade-log";
import { SurvivalBrain } from "../src/speed/survival-brain";
import { errorMessage } from "../src/errors";
import { createLogger } from "../src/logger";
import { Position, TradingPath } from "../src/speed/types";

const log = createLogger("report");

function printSummary(summary: RunSummary, pending: Position[]): void {
  log.info("╔═══════════════════════════════════════════════════╗");
  log.info(`║           ${summary.mode.toUpperCase().padEnd(5)} TRADE REPORT                       ║`);
  log.info("╚═══════════════════════════════════════════════════╝");

  // ─── Overview ───
  log.info("── Overview ──");
  log.info(`Total trades: ${summary.totalTrades}`);
  log.info(`Resolved: ${summary.resolved} | Pending: ${summary.pending}`);
  log.info(`Capital: $${summary.capital.toFixed(2)} (started $${summary.initialCapital.toFixed(2)})`);

  if (summary.resolved === 0) {
    log.info("No resolved trades yet — check back after markets close.");
  } else {
    // ─── P&L ───
    log.info("── P&L ──");
    log.info(`Total P&L: ${summary.totalPnl >= 0 ? "+" : ""}$${summary.totalPnl.toFixed(2)} (${summary.roiPct.toFixed(2)}%)`);
    log.info(`Win rate: ${(summary.winRate * 100).toFixed(1)}% (${summary.wins}W/${summary.losses}L)`);

    // ─── Edge buckets ───
    log.info("── By edge ──");
    for (const b of summary.edgeBuckets) {
      if (b.trades === 0) continue;
      log.info(
        `  ${b.bucket.padEnd(6)} ${String(b.trades).padStart(4)} trades | ${(b.winRate * 100).toFixed(0)}% WR | P&L: ${b.pnl >= 0 ? "+" : ""}$${b.pnl.toFixed(2)}`
      );
    }
  }

  if (pending.length > 0) {
    log.info("── Pending ──");
    const now = Date.now();
    for (const p of pending) {
      const state = p.expiresAt < now ? "awaiting settlement" : `${Math.round((p.expiresAt - now) / 1000)}s left`;
      log.info(`  ${p.direction} $${p.size.toFixed(2)} @ ${p.entryPrice.toFixed(3)} | ${state} | ${p.question.slice(0, 60)}`);
    }
  }
}

function main(): void {
  const config = loadConfig();
  const arg = process.argv[2];
  const mode: TradingPath = arg === "live" || arg === "paper" ? arg : config.mode;
  const file = mode === "live" ? config.liveLogFile : config.paperLogFile;

  if (!fs.existsSync(file)) {
    log.info(`No trade log at ${file}. Run the trader first:`);
    log.info("  npm start");
    return;
  }

  // Read-only: quarantining belongs to the trader's startup recovery
  const replay = new TradeLog(file).replay();
  if (replay.corrupt > 0) log.warn(`${replay.corrupt} corrupt line(s) skipped in ${file}`);
  const positions = replay.positions.filter((p) => p.mode === mode);

  // Recompute capital from scratch to avoid drift
  let capital = config.initialCapital;
  for (const p of positions) {
    capital -= p.size;
    if (p.status === "RESOLVED") capital += p.size + (p.pnl ?? 0);
  }

  // Tier history lives in the survival snapshot
  const brain = new SurvivalBrain({
    settings: config.survival,
    baseEdgeThresholdPct: config.minEdgePct,
    initialCapital: config.initialCapital,
    maxBetPct: config.maxBetPct,
    maxConcurrentPositions: config.maxConcurrentPositions,
    kellyFraction: config.kellyFraction,
    openPositions: () => 0,
  });
  brain.load(config.survivalFile);

  const summary = buildSummary({
    mode,
    positions,
    initialCapital: config.initialCapital,
    capital,
    transitions: brain.state().transitions,
    startedAt: positions.length > 0 ? Math.min(...positions.map((p) => p.openedAt)) : Date.now(),
  });
  printSummary(summary, positions.filter((p) => p.status === "PENDING"));
  if (summary.tierTransitions.length > 0) {
    log.info(`Tier transitions: ${summary.tierTransitions.length}`);
  }

  const filtered = brain.patternStats().filter((p) => p.filtered);
  if (filtered.length > 0) {
    log.info("── Filtered patterns ──");
    for (const p of filtered) {
      log.info(`  ${p.key.padEnd(18)} ${String(p.wins + p.losses).padStart(4)} trades | ${(p.winRate * 100).toFixed(0)}% WR`);
    }
  }
}

try {
  main();
} catch (err) {
  log.error("Report failed", { error: errorMessage(err) });
  process.exit(1);
}
