import axios from "axios";
import { z } from "zod";
import { GAMMA_API } from "../config";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { limited } from "../rate-limiter";
import { RetryOptions, withRetry } from "../retry";
import { jsonList } from "./venue";
import { MarketDescriptor } from "./types";

const log = createLogger("market-catalog");

/** Source of tradable markets. Reads are synchronous against a cache. */
export interface MarketCatalog {
  markets(now?: number): MarketDescriptor[];
  refresh(): Promise<void>;
  start(): void;
  stop(): void;
}

// ─── Gamma payloads ───

const GammaMarketSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  question: z.string().optional(),
  slug: z.string().optional(),
  description: z.string().optional(),
  endDate: z.string().optional(),
  active: z.boolean().optional(),
  closed: z.boolean().optional(),
  outcomes: jsonList.optional(),
  outcomePrices: jsonList.optional(),
  clobTokenIds: jsonList.optional(),
});

const GammaEventSchema = z.object({
  slug: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  endDate: z.string().optional(),
  markets: z.array(z.unknown()).optional(),
});

/** A market as listed, before a baseline is known. */
export interface ListedMarket {
  marketId: string;
  question: string;
  slug: string;
  strikePrice: number | null;
  yesPrice: number;
  noPrice: number;
  windowStart: number;
  windowEnd: number;
  yesTokenId?: string;
  noTokenId?: string;
}

// ─── Parsing ───
// Slug format: "btc-updown-5m-1771472400", "btc-updown-15m-1771471800"

export function isBtcUpDown(slug: string, question: string): boolean {
  const s = slug.toLowerCase();
  if (s.startsWith("btc-updown") || s.startsWith("btc-up") || s.startsWith("bitcoin-up")) return true;
  // Only match Up/Down style questions to avoid false positives
  const q = question.toLowerCase();
  if (!q.includes("up or down") && !q.includes("up/down")) return false;
  return q.includes("bitcoin") || q.includes("btc");
}

export function windowDurationMs(slug: string): number {
  if (slug.includes("-15m-")) return 15 * 60_000;
  if (slug.includes("-1h-") || slug.includes("-hourly-")) return 60 * 60_000;
  return 5 * 60_000;
}

export function parseStrike(text: string): number | null {
  const match = text.match(/\$([\d,]+(?:\.\d+)?)/);
  if (!match) return null;
  const value = parseFloat(match[1].replace(/,/g, ""));
  return Number.isFinite(value) && value > 0 ? value : null;
}

export function parseEventMarkets(rawEvent: unknown): ListedMarket[] {
  const event = GammaEventSchema.safeParse(rawEvent);
  if (!event.success) return [];
  const results: ListedMarket[] = [];

  for (const rawMarket of event.data.markets ?? []) {
    const parsed = GammaMarketSchema.safeParse(rawMarket);
    if (!parsed.success) continue;
    const raw = parsed.data;

    const question = raw.question || event.data.title || "";
    const slug = raw.slug || event.data.slug || "";
    const description = raw.description || event.data.description || "";
    if (!isBtcUpDown(slug, question)) continue;
    if (raw.active === false || raw.closed) continue;

    const outcomes = raw.outcomes ?? [];
    const prices = raw.outcomePrices ?? [];
    const tokenIds = raw.clobTokenIds ?? [];
    if (outcomes.length < 2 || prices.length < 2) continue;

    // "Up" is the YES side
    const upIdx = outcomes.findIndex((o) => /^(up|yes)$/i.test(o));
    const downIdx = outcomes.findIndex((o) => /^(down|no)$/i.test(o));
    if (upIdx === -1 || downIdx === -1) continue;

    const yesPrice = parseFloat(prices[upIdx]);
    const noPrice = parseFloat(prices[downIdx]);
    if (!Number.isFinite(yesPrice) || !Number.isFinite(noPrice)) continue;

    // API startDate is creation time, not window start
    const windowEnd = new Date(raw.endDate || event.data.endDate || "").getTime();
    if (!Number.isFinite(windowEnd)) continue;

    results.push({
      marketId: raw.id,
      question,
      slug,
      strikePrice: parseStrike(`${question} ${description}`),
      yesPrice,
      noPrice,
      windowStart: windowEnd - windowDurationMs(slug),
      windowEnd,
      yesTokenId: tokenIds[upIdx],
      noTokenId: tokenIds[downIdx],
    });
  }
  return results;
}

// ─── Catalog ───

export interface GammaCatalogOptions {
  ttlMs: number;
  pollMs: number;
  baselineCaptureWindowMs: number;
  retry: RetryOptions;
  /** Latest feed price, used to capture a baseline when the market has no strike. */
  currentPrice: () => number | null;
  fetchJson?: (url: string, params: Record<string, string | number | boolean>) => Promise<unknown>;
  now?: () => number;
}

const EVENT_QUERIES: Array<Record<string, string | number | boolean>> = [
  // newest up-or-down events
  { tag: "up-or-down", active: true, closed: false, limit: 200, order: "startDate", ascending: false },
  // soonest-expiring, the ones still inside a tradable window
  { tag: "up-or-down", active: true, closed: false, limit: 200, order: "endDate", ascending: true },
];

async function axiosFetchJson(url: string, params: Record<string, string | number | boolean>): Promise<unknown> {
  const { data } = await limited("catalog", () => axios.get<unknown>(url, { params, timeout: 10_000 }));
  return data;
}

export class GammaMarketCatalog implements MarketCatalog {
  private listed = new Map<string, ListedMarket>();
  private readonly baselines = new Map<string, number>();
  private fetchedAt = 0;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private refreshing: Promise<void> | null = null;
  private readonly fetchJson: NonNullable<GammaCatalogOptions["fetchJson"]>;
  private readonly now: () => number;

  constructor(private readonly opts: GammaCatalogOptions) {
    this.fetchJson = opts.fetchJson ?? axiosFetchJson;
    this.now = opts.now ?? Date.now;
  }

  start(): void {
    log.info("Starting market catalog", { pollMs: this.opts.pollMs });
    this.kick();
    this.pollTimer = setInterval(() => this.kick(), this.opts.pollMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private kick(): void {
    this.refresh().catch((e: unknown) => {
      log.error("Catalog refresh error", { error: errorMessage(e) });
    });
  }

  /** Fetches unless the cache is younger than the TTL. A failed fetch keeps the old cache. */
  refresh(): Promise<void> {
    if (this.refreshing) return this.refreshing;
    if (this.fetchedAt > 0 && this.now() - this.fetchedAt < this.opts.ttlMs) {
      return Promise.resolve();
    }
    const run = this.doRefresh().finally(() => {
      this.refreshing = null;
    });
    this.refreshing = run;
    return run;
  }

  private async doRefresh(): Promise<void> {
    const fresh = new Map<string, ListedMarket>();
    let failures = 0;

    for (const params of EVENT_QUERIES) {
      try {
        const events = await withRetry(() => this.fetchJson(`${GAMMA_API}/events`, params), this.opts.retry);
        if (!Array.isArray(events)) continue;
        for (const event of events) {
          for (const market of parseEventMarkets(event)) fresh.set(market.marketId, market);
        }
      } catch (e) {
        failures++;
        log.warn("Gamma fetch failed", { order: params.order, error: errorMessage(e) });
      }
    }

    if (failures === EVENT_QUERIES.length) {
      log.warn("All Gamma queries failed, serving cached markets", { cached: this.listed.size });
      return;
    }

    const now = this.now();
    let added = 0;
    for (const id of fresh.keys()) if (!this.listed.has(id)) added++;
    this.listed = fresh;
    this.fetchedAt = now;
    this.prune(now);

    if (added > 0) {
      log.info("Catalog refreshed", { newMarkets: added, totalActive: this.listed.size });
    }
  }

  private prune(now: number): void {
    for (const [id, m] of this.listed) {
      if (m.windowEnd <= now) this.listed.delete(id);
    }
    for (const id of this.baselines.keys()) {
      if (!this.listed.has(id)) this.baselines.delete(id);
    }
  }

  /** Unexpired markets with a known baseline. */
  markets(now: number = this.now()): MarketDescriptor[] {
    const out: MarketDescriptor[] = [];
    for (const m of this.listed.values()) {
      if (m.windowEnd <= now) continue;
      const baseline = this.baselineFor(m, now);
      if (baseline === null) continue;
      out.push({
        marketId: m.marketId,
        question: m.question,
        baselinePrice: baseline,
        yesPrice: m.yesPrice,
        noPrice: m.noPrice,
        createdAt: m.windowStart,
        expiresAt: m.windowEnd,
        yesTokenId: m.yesTokenId,
        noTokenId: m.noTokenId,
      });
    }
    return out;
  }

  private baselineFor(m: ListedMarket, now: number): number | null {
    if (m.strikePrice !== null) return m.strikePrice;
    const captured = this.baselines.get(m.marketId);
    if (captured !== undefined) return captured;

    // Only a price seen close to the window open stands in for the opening price
    if (now < m.windowStart || now - m.windowStart > this.opts.baselineCaptureWindowMs) return null;
    const price = this.opts.currentPrice();
    if (price === null) return null;
    this.baselines.set(m.marketId, price);
    log.debug("Captured baseline", { marketId: m.marketId, baseline: price });
    return price;
  }
}
