import { Trader, TradingPathDeps } from "./trading-path";

/**
 * Simulated path. Runs the same preconditions as the live engine, latency
 * breaker included, then fills immediately at the quoted price against its
 * own capital ledger.
 */
export function createPaperTrader(deps: TradingPathDeps): Trader {
  return new Trader(deps, {
    mode: "paper",
    logger: "paper-trader",
    fill: async (_signal, _sizeUsd, entryPrice) => ({ fillPrice: entryPrice }),
  });
}
