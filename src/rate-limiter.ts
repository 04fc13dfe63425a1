import axios from "axios";
import { createLogger } from "./logger";
import { sleep } from "./retry";

const log = createLogger("rate-limiter");

// ─── Limits ───

export type RequestKind = "catalog" | "lookup" | "order";

export const RATE_LIMITS: Record<RequestKind, { perMinute: number; burst: number }> = {
  catalog: { perMinute: 10, burst: 5 },  // Gamma event listings
  lookup: { perMinute: 60, burst: 10 },  // Gamma settlement lookups
  order: { perMinute: 30, burst: 5 },    // CLOB order posts
};

const MIN_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 60_000;

interface Bucket {
  tokens: number;
  updatedAt: number;
}

// Process-wide: every caller to the same API shares one budget
const buckets = new Map<RequestKind, Bucket>();
let backoffMs = MIN_BACKOFF_MS;
let backoffUntil = 0;
let clock: () => number = Date.now;
let wait: (ms: number) => Promise<void> = sleep;

function refill(kind: RequestKind, now: number): Bucket {
  const limit = RATE_LIMITS[kind];
  const bucket = buckets.get(kind);
  if (!bucket) {
    const fresh = { tokens: limit.burst, updatedAt: now };
    buckets.set(kind, fresh);
    return fresh;
  }
  const elapsed = Math.max(0, now - bucket.updatedAt);
  bucket.tokens = Math.min(limit.burst, bucket.tokens + (elapsed * limit.perMinute) / 60_000);
  bucket.updatedAt = now;
  return bucket;
}

// ─── Acquire ───

/** Waits out any 429 backoff, then for a token in the bucket for `kind`. */
export async function acquire(kind: RequestKind): Promise<void> {
  for (;;) {
    const now = clock();
    if (backoffUntil > now) {
      await wait(backoffUntil - now);
      continue;
    }
    const bucket = refill(kind, now);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return;
    }
    const waitMs = Math.ceil(((1 - bucket.tokens) * 60_000) / RATE_LIMITS[kind].perMinute);
    log.debug("Rate limit reached, waiting", { kind, waitMs });
    await wait(waitMs);
  }
}

// ─── 429 backoff ───

export function isRateLimited(e: unknown): boolean {
  return axios.isAxiosError(e) && e.response?.status === 429;
}

/** Pauses every bucket and doubles the next pause, up to a minute. Returns the pause applied. */
export function handle429(): number {
  const applied = backoffMs;
  backoffUntil = Math.max(backoffUntil, clock() + applied);
  backoffMs = Math.min(MAX_BACKOFF_MS, backoffMs * 2);
  log.warn("HTTP 429 received, backing off", { backoffMs: applied });
  return applied;
}

/** Halves the backoff after a successful request. */
export function recordSuccess(): void {
  if (backoffMs > MIN_BACKOFF_MS) backoffMs = Math.max(MIN_BACKOFF_MS, backoffMs / 2);
}

/** Runs `fn` under the bucket for `kind`. A 429 arms the backoff and is rethrown. */
export async function limited<T>(kind: RequestKind, fn: () => Promise<T>): Promise<T> {
  await acquire(kind);
  try {
    const result = await fn();
    recordSuccess();
    return result;
  } catch (e) {
    if (isRateLimited(e)) handle429();
    throw e;
  }
}

export function rateLimiterStatus(): { backoffMs: number; backoffUntil: number; tokens: Partial<Record<RequestKind, number>> } {
  const tokens: Partial<Record<RequestKind, number>> = {};
  for (const [kind, bucket] of buckets) tokens[kind] = bucket.tokens;
  return { backoffMs, backoffUntil, tokens };
}

/** Clears buckets and backoff; tests swap in their own clock and sleep. */
export function resetRateLimiter(opts: { now?: () => number; sleep?: (ms: number) => Promise<void> } = {}): void {
  buckets.clear();
  backoffMs = MIN_BACKOFF_MS;
  backoffUntil = 0;
  clock = opts.now ?? Date.now;
  wait = opts.sleep ?? sleep;
}
