import WebSocket from "ws";
import { z } from "zod";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { PriceTick } from "./types";

const log = createLogger("price-feed");

// Binance trade stream payload: https://binance-docs.github.io/apidocs/spot/en/#trade-streams
const TradeMessage = z.object({
  e: z.literal("trade").optional(),
  p: z.string(),
  T: z.number().int().nonnegative(),
});

export interface ParsedTrade {
  price: number;
  tradeTime: number;
}

export interface PriceFeedOptions {
  wsUrl: string;
  symbol: string;
  staleTickMs: number;
  reconnectDelayMs: number;
  now?: () => number;
}

export interface FeedStats {
  ticks: number;
  ignored: number;
  reconnects: number;
}

export type TickHandler = (tick: PriceTick) => void;

/** One sample per second of receipt time, newest last. */
export const PRICE_HISTORY_SECONDS = 60;

export function parseTradeMessage(raw: string): ParsedTrade | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = TradeMessage.safeParse(json);
  if (!parsed.success) return null;
  const price = Number(parsed.data.p);
  if (!Number.isFinite(price) || price <= 0) return null;
  return { price, tradeTime: parsed.data.T };
}

export function buildTick(
  price: number,
  sourceTimestamp: number,
  receiptTimestamp: number,
  staleTickMs: number
): PriceTick {
  // Source clock ahead of ours reads as zero latency, never negative
  const latencyMs = Math.max(0, receiptTimestamp - sourceTimestamp);
  return Object.freeze({
    price,
    sourceTimestamp,
    receiptTimestamp,
    latencyMs,
    stale: latencyMs > staleTickMs,
  });
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

/**
 * Single-symbol trade stream with automatic reconnect. Every trade message
 * becomes one tick; stale ticks are delivered tagged rather than dropped.
 */
export class PriceFeed {
  private ws: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private connected = false;
  private onTick: TickHandler | null = null;
  private last: PriceTick | null = null;
  private lastReceipt = 0;
  private readonly history: number[] = [];
  private historySecond = -1;
  private readonly now: () => number;
  private readonly stats: FeedStats = { ticks: 0, ignored: 0, reconnects: 0 };

  constructor(private readonly opts: PriceFeedOptions) {
    this.now = opts.now ?? Date.now;
  }

  get url(): string {
    return `${this.opts.wsUrl.replace(/\/+$/, "")}/${this.opts.symbol}@trade`;
  }

  start(onTick: TickHandler): void {
    if (this.running) return;
    this.running = true;
    this.onTick = onTick;
    this.connect();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.connected = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      // Swallow the error a close-before-open emits
      this.ws.on("error", () => undefined);
      this.ws.terminate();
      this.ws = null;
    }
    log.info("Price feed stopped", { ...this.stats });
  }

  latest(): PriceTick | null {
    return this.last;
  }

  latencyMs(): number | null {
    return this.last ? this.last.latencyMs : null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Last trade price of each of the most recent seconds, oldest first. */
  recentPrices(): number[] {
    return [...this.history];
  }

  getStats(): FeedStats {
    return { ...this.stats };
  }

  /** Exposed for tests and replay; the socket handler funnels through here. */
  handleMessage(raw: string): PriceTick | null {
    const trade = parseTradeMessage(raw);
    if (!trade) {
      this.stats.ignored++;
      return null;
    }
    const receipt = Math.max(this.now(), this.lastReceipt);
    this.lastReceipt = receipt;

    const tick = buildTick(trade.price, trade.tradeTime, receipt, this.opts.staleTickMs);
    this.last = tick;
    this.stats.ticks++;
    this.record(tick);

    if (this.onTick) {
      try {
        this.onTick(tick);
      } catch (e) {
        log.error("Tick handler error", { error: errorMessage(e) });
      }
    }
    return tick;
  }

  private record(tick: PriceTick): void {
    const second = Math.floor(tick.receiptTimestamp / 1000);
    if (second === this.historySecond) {
      this.history[this.history.length - 1] = tick.price;
      return;
    }
    this.historySecond = second;
    this.history.push(tick.price);
    if (this.history.length > PRICE_HISTORY_SECONDS) this.history.shift();
  }

  private connect(): void {
    log.info("Connecting to trade stream", { url: this.url });
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("open", () => {
      this.connected = true;
      log.info("Trade stream connected", { symbol: this.opts.symbol });
    });

    ws.on("message", (data: WebSocket.RawData) => {
      this.handleMessage(rawToString(data));
    });

    ws.on("close", () => {
      this.connected = false;
      this.scheduleReconnect();
    });

    ws.on("error", (err: Error) => {
      log.debug("Trade stream error", { error: err.message });
      ws.terminate();
    });
  }

  private scheduleReconnect(): void {
    if (!this.running) return;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.running) return;
      this.stats.reconnects++;
      log.debug("Reconnecting to trade stream", { attempt: this.stats.reconnects });
      this.connect();
    }, this.opts.reconnectDelayMs);
  }
}
