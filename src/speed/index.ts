import "dotenv/config";
import { createLogger } from "../logger";
import { ConfigError, FatalError, VenueError, errorMessage } from "../errors";
import { getClobClient } from "../client";
import { getUsdcBalance } from "../wallet";
import { AppConfig, loadConfig } from "./config";
import { RateLimitedAlerter, createAlertSink } from "./alerts";
import { EdgeDetector } from "./edge-detector";
import { createExecutionEngine } from "./execution-engine";
import { GammaMarketCatalog } from "./market-catalog";
import { Orchestrator } from "./orchestrator";
import { createPaperTrader } from "./paper-trader";
import { PriceFeed } from "./price-feed";
import { fallbackSettlement, probabilitySettlement, venueSettlement } from "./settlement";
import { SurvivalBrain } from "./survival-brain";
import { TradeLog } from "./trade-log";
import { Trader } from "./trading-path";
import { polymarketVenue } from "./venue";

export * from "./types";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { EdgeDetector, computeEdge, computeConfidence } from "./edge-detector";
export { SurvivalBrain } from "./survival-brain";
export { createExecutionEngine } from "./execution-engine";
export { createPaperTrader } from "./paper-trader";
export { Trader } from "./trading-path";
export { checkHealth, createWatchdog } from "./health";
export { readIndicators, adjustConfidence } from "./indicators";
export { PriceFeed } from "./price-feed";
export { Orchestrator } from "./orchestrator";
export { GammaMarketCatalog } from "./market-catalog";

const log = createLogger("speed");

// ─── Wiring ───

async function verifyLiveVenue(): Promise<void> {
  try {
    await getClobClient();
    const balance = await getUsdcBalance();
    log.info("Live venue ready", { usdcBalance: balance.toFixed(2) });
  } catch (e) {
    throw new FatalError(`Live venue authentication failed: ${errorMessage(e)}`, { cause: e });
  }
}

export async function createOrchestrator(config: Readonly<AppConfig>): Promise<Orchestrator> {
  const { timing } = config;
  const retry = { attempts: timing.retryAttempts, delayMs: timing.retryDelayMs, label: "gamma" };

  const feed = new PriceFeed({
    wsUrl: config.wsUrl,
    symbol: config.symbol,
    staleTickMs: config.staleTickMs,
    reconnectDelayMs: timing.reconnectDelayMs,
  });

  const catalog = new GammaMarketCatalog({
    ttlMs: timing.catalogTtlMs,
    pollMs: timing.catalogPollMs,
    baselineCaptureWindowMs: timing.baselineCaptureWindowMs,
    retry,
    currentPrice: () => feed.latest()?.price ?? null,
  });

  const alerter = new RateLimitedAlerter(createAlertSink(config.telegram), timing.alertIntervalMs);

  // The brain reads open positions from whichever path is active
  let executor: Trader | null = null;
  const brain = new SurvivalBrain({
    settings: config.survival,
    baseEdgeThresholdPct: config.minEdgePct,
    initialCapital: config.initialCapital,
    maxBetPct: config.maxBetPct,
    maxConcurrentPositions: config.maxConcurrentPositions,
    kellyFraction: config.kellyFraction,
    openPositions: () => executor?.openCount() ?? 0,
  });
  brain.load(config.survivalFile);

  const settings = {
    maxLatencyMs: config.maxLatencyMs,
    maxConcurrentPositions: config.maxConcurrentPositions,
    minOrderUsd: config.minOrderUsd,
    initialCapital: config.initialCapital,
    venueTimeoutMs: timing.venueTimeoutMs,
  };
  const venueOracle = venueSettlement(polymarketVenue, { ...retry, label: "settlement" });

  if (config.mode === "live") {
    await verifyLiveVenue();
    executor = createExecutionEngine(
      {
        settings,
        brain,
        feedLatencyMs: () => feed.latencyMs(),
        oracle: venueOracle,
        tradeLog: new TradeLog(config.liveLogFile),
        alerter,
      },
      polymarketVenue
    );
  } else {
    executor = createPaperTrader({
      settings,
      brain,
      feedLatencyMs: () => feed.latencyMs(),
      oracle: fallbackSettlement(venueOracle, probabilitySettlement(), timing.settlementGraceMs),
      tradeLog: new TradeLog(config.paperLogFile),
      alerter,
    });
  }
  const recovery = executor.recover();
  if (recovery.replayed > 0) brain.save(config.survivalFile);

  const detector = new EdgeDetector(
    {
      impliedScale: config.impliedScale,
      staleTickMs: config.staleTickMs,
      confidenceEdgeScalePct: config.confidenceEdgeScalePct,
    },
    brain
  );

  return new Orchestrator({
    feed,
    catalog,
    detector,
    brain,
    executor,
    alerter,
    timing,
    survivalFile: config.survivalFile,
  });
}

// ─── Entry point ───

async function main(): Promise<void> {
  const config = loadConfig();
  log.info("Starting BTC speed trader", {
    mode: config.mode,
    capital: config.initialCapital,
    maxBetPct: config.maxBetPct,
    minEdgePct: config.minEdgePct,
    maxLatencyMs: config.maxLatencyMs,
  });

  const orchestrator = await createOrchestrator(config);
  orchestrator.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`Received ${signal}`);
    orchestrator
      .stop()
      .then(() => {
        orchestrator.logStatus();
        log.info("Goodbye!");
        process.exit(0);
      })
      .catch((e: unknown) => {
        log.error("Shutdown failed", { error: errorMessage(e) });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((e: unknown) => {
    if (e instanceof ConfigError) {
      log.error(e.message, { issues: e.issues });
    } else if (e instanceof FatalError || e instanceof VenueError) {
      log.error("Fatal error", { error: e.message });
    } else {
      log.error("Fatal error", { error: errorMessage(e) });
    }
    process.exit(1);
  });
}
