import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";
import { STATE_DIR } from "../config";

// ─── Price stream ───

export const BINANCE_WS_URL = "wss://stream.binance.com:9443/ws";

// ─── Risk controller defaults ───

export const SURVIVAL_DEFAULTS = {
  baseKellyMultiplier: 1.0,
  maxKellyMultiplier: 1.2,      // THRIVING cap
  minKellyMultiplier: 0.25,     // repeated wounds stop halving here
  lossStreakToWound: 4,         // L1
  winStreakToHeal: 3,           // W1
  woundEdgeIncrementPct: 1.5,   // threshold bump per wound
  thriveWinRate: 0.65,          // rolling win-rate to enter THRIVING
  thriveExitWinRate: 0.5,       // drop back to HEALTHY below this
  thriveMinTrades: 10,
  thriveKellyBoost: 1.2,
  thriveEdgeReductionPct: 0.5,
  edgeFloorPct: 1.0,
  edgeCeilingPct: 10.0,
  winRateWindow: 20,
  patternMinSamples: 20,        // outcomes before a pattern can be filtered
  patternMinWinRate: 0.4,       // filter patterns winning less than this
  historyLimit: 200,
  seenIdLimit: 5_000,
} as const;

// ─── Loop timing defaults ───

export const TIMING_DEFAULTS = {
  reconnectDelayMs: 1_000,
  tickChannelCapacity: 64,
  evaluationBudgetMs: 25,
  resolveIntervalMs: 30_000,
  summaryIntervalMs: 5 * 60_000,
  statusLogIntervalMs: 60_000,
  dailySummaryIntervalMs: 24 * 60 * 60_000,
  catalogTtlMs: 30_000,
  catalogPollMs: 10_000,
  baselineCaptureWindowMs: 30_000,
  settlementGraceMs: 60_000,
  venueTimeoutMs: 5_000,
  retryAttempts: 3,
  retryDelayMs: 1_000,
  alertIntervalMs: 10_000,
  watchdogIntervalMs: 15_000,
} as const;

export type SurvivalSettings = { -readonly [K in keyof typeof SURVIVAL_DEFAULTS]: number };
export type TimingSettings = { -readonly [K in keyof typeof TIMING_DEFAULTS]: number };

// ─── Environment schema ───

const envNumber = (fallback: number) => z.coerce.number().finite().default(fallback);

const EnvSchema = z
  .object({
    MODE: z.enum(["paper", "live"]).default("paper"),
    MAX_BET_PCT: envNumber(20).pipe(z.number().gt(0).max(100)),
    MAX_CONCURRENT_POSITIONS: envNumber(10).pipe(z.number().int().positive()),
    MIN_EDGE_PCT: envNumber(2).pipe(z.number().positive()),
    MAX_LATENCY_MS: envNumber(100).pipe(z.number().positive()),
    INITIAL_CAPITAL: envNumber(100).pipe(z.number().positive()),
    IMPLIED_SCALE: envNumber(100).pipe(z.number().positive()),
    STALE_TICK_MS: envNumber(1_000).pipe(z.number().positive()),
    KELLY_FRACTION: envNumber(0.5).pipe(z.number().gt(0).max(1)),
    MIN_ORDER_USD: envNumber(1).pipe(z.number().nonnegative()),
    PRICE_SYMBOL: z.string().regex(/^[a-z0-9]+$/).default("btcusdt"),
    BINANCE_WS_URL: z.string().url().default(BINANCE_WS_URL),
    PRIVATE_KEY: z.string().default(""),
    TELEGRAM_BOT_TOKEN: z.string().default(""),
    TELEGRAM_CHAT_ID: z.string().default(""),
    STATE_DIR: z.string().min(1).default(STATE_DIR),
  })
  .superRefine((env, ctx) => {
    if (env.MODE === "live" && !env.PRIVATE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PRIVATE_KEY"],
        message: "required when MODE=live",
      });
    }
  });

export type TradingMode = "paper" | "live";

export interface AppConfig {
  mode: TradingMode;
  maxBetPct: number;
  maxConcurrentPositions: number;
  minEdgePct: number;
  maxLatencyMs: number;
  initialCapital: number;
  impliedScale: number;
  staleTickMs: number;
  kellyFraction: number;
  minOrderUsd: number;
  confidenceEdgeScalePct: number;
  symbol: string;
  wsUrl: string;
  privateKey: string;
  telegram: { botToken: string; chatId: string } | null;
  stateDir: string;
  paperLogFile: string;
  liveLogFile: string;
  survivalFile: string;
  survival: SurvivalSettings;
  timing: TimingSettings;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Validate the environment once and return an immutable configuration.
 * Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  // Empty strings mean "unset" so defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  const survival: SurvivalSettings = { ...SURVIVAL_DEFAULTS };
  if (e.MIN_EDGE_PCT > survival.edgeCeilingPct) {
    throw new ConfigError([`MIN_EDGE_PCT: must not exceed ${survival.edgeCeilingPct}`]);
  }

  return deepFreeze<AppConfig>({
    mode: e.MODE,
    maxBetPct: e.MAX_BET_PCT,
    maxConcurrentPositions: e.MAX_CONCURRENT_POSITIONS,
    minEdgePct: e.MIN_EDGE_PCT,
    maxLatencyMs: e.MAX_LATENCY_MS,
    initialCapital: e.INITIAL_CAPITAL,
    impliedScale: e.IMPLIED_SCALE,
    staleTickMs: e.STALE_TICK_MS,
    kellyFraction: e.KELLY_FRACTION,
    minOrderUsd: e.MIN_ORDER_USD,
    confidenceEdgeScalePct: 10,
    symbol: e.PRICE_SYMBOL,
    wsUrl: e.BINANCE_WS_URL,
    privateKey: e.PRIVATE_KEY,
    telegram:
      e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
        ? { botToken: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID }
        : null,
    stateDir: e.STATE_DIR,
    paperLogFile: path.join(e.STATE_DIR, "paper-trades.jsonl"),
    liveLogFile: path.join(e.STATE_DIR, "live-trades.jsonl"),
    survivalFile: path.join(e.STATE_DIR, "survival-state.json"),
    survival,
    timing: { ...TIMING_DEFAULTS },
  });
}
