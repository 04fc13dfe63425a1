import { ethers } from "ethers";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";
import { RetryOptions, withRetry } from "../retry";
import { MarketVenue } from "./venue";
import { Outcome, Position, SettlementSource } from "./types";

const log = createLogger("settlement");

export interface Settlement {
  outcome: Outcome;
  source: SettlementSource;
}

export interface SettlementOracle {
  /** Null while the outcome is not yet known. */
  settle(position: Position, now: number): Promise<Settlement | null>;
}

// ─── Venue ───

export function venueSettlement(venue: MarketVenue, retry: RetryOptions): SettlementOracle {
  return {
    async settle(position) {
      const outcome = await withRetry(() => venue.fetchOutcome(position.marketId), retry);
      return outcome ? { outcome, source: "venue" } : null;
    },
  };
}

// ─── Simulated ───

/** Deterministic draw in [0, 1) from the trade id. */
export function uniformFromId(id: string): number {
  const digest = ethers.utils.sha256(ethers.utils.toUtf8Bytes(id));
  // 52 bits fit exactly in a double
  return parseInt(digest.slice(2, 15), 16) / 2 ** 52;
}

/**
 * Resolves YES with probability equal to the YES price at entry, i.e. the
 * market's own estimate. Same id, same outcome.
 */
export function simulateSettlement(position: Position): Settlement {
  const outcome: Outcome = uniformFromId(position.id) < position.yesPriceAtEntry ? "YES" : "NO";
  return { outcome, source: "simulated" };
}

export function probabilitySettlement(): SettlementOracle {
  return { settle: async (position) => simulateSettlement(position) };
}

// ─── Fallback ───

/**
 * Prefers the primary oracle; once `graceMs` has passed since expiry without
 * an answer (or with the primary failing), the fallback decides.
 */
export function fallbackSettlement(primary: SettlementOracle, fallback: SettlementOracle, graceMs: number): SettlementOracle {
  return {
    async settle(position, now) {
      try {
        const result = await primary.settle(position, now);
        if (result) return result;
      } catch (e) {
        log.warn("Primary settlement failed", { id: position.id, marketId: position.marketId, error: errorMessage(e) });
      }
      if (now - position.expiresAt < graceMs) return null;
      return fallback.settle(position, now);
    },
  };
}
