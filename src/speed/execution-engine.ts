import { Trader, TradingPathDeps } from "./trading-path";
import { MarketVenue } from "./venue";

/**
 * Live path: orders go to the venue as Fill-or-Kill market orders. Order
 * placement is never retried. A timed-out order keeps its market slot until
 * the venue answers, and opens late if it filled.
 */
export function createExecutionEngine(deps: TradingPathDeps, venue: MarketVenue): Trader {
  return new Trader(deps, {
    mode: "live",
    logger: "execution-engine",
    fill: async (signal, sizeUsd, entryPrice) => {
      const market = signal.market;
      const ack = await venue.placeOrder({
        marketId: signal.marketId,
        tokenId: signal.direction === "YES" ? market.yesTokenId : market.noTokenId,
        side: signal.direction,
        amountUsd: sizeUsd,
        price: entryPrice,
      });
      return { orderId: ack.orderId, fillPrice: ack.fillPrice };
    },
  });
}
