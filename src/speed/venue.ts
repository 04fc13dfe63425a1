import axios from "axios";
import { OrderType, Side } from "@polymarket/clob-client";
import { z } from "zod";
import { GAMMA_API } from "../config";
import { getClobClient } from "../client";
import { VenueError } from "../errors";
import { createLogger } from "../logger";
import { handle429, limited } from "../rate-limiter";
import { Outcome } from "./types";

const log = createLogger("venue");

export interface OrderRequest {
  marketId: string;
  tokenId: string | undefined;
  side: Outcome;
  amountUsd: number;
  price: number;
}

export interface OrderAck {
  orderId: string;
  fillPrice: number;
}

/** Order placement and settlement lookup, kept behind one seam so tests can fake it. */
export interface MarketVenue {
  placeOrder(req: OrderRequest): Promise<OrderAck>;
  /** Settled outcome, or null while the market is open or unresolved. */
  fetchOutcome(marketId: string): Promise<Outcome | null>;
}

// ─── Gamma settlement parsing ───

export const jsonList = z.union([
  z.array(z.string()),
  z.string().transform((s, ctx) => {
    try {
      const parsed: unknown = JSON.parse(s);
      const list = z.array(z.union([z.string(), z.number()])).safeParse(parsed);
      if (list.success) return list.data.map(String);
    } catch {
      // fall through to the issue below
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a JSON list" });
    return z.NEVER;
  }),
]);

const GammaResolutionSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  closed: z.boolean().optional(),
  outcomes: jsonList.optional(),
  outcomePrices: jsonList,
});

export type GammaResolution = z.infer<typeof GammaResolutionSchema>;

const RESOLVED_PRICE = 0.95;

/** "Up"/"Yes" is the YES side; a closed market with one side above 0.95 is settled. */
export function outcomeFromResolution(market: GammaResolution): Outcome | null {
  if (!market.closed) return null;
  const prices = market.outcomePrices.map(Number);
  if (prices.length !== 2 || prices.some((p) => !Number.isFinite(p))) return null;

  const outcomes = market.outcomes ?? ["Yes", "No"];
  let yesIdx = outcomes.findIndex((o) => /^(up|yes)$/i.test(o));
  if (yesIdx === -1) yesIdx = 0;
  const noIdx = yesIdx === 0 ? 1 : 0;

  if (prices[yesIdx] > RESOLVED_PRICE) return "YES";
  if (prices[noIdx] > RESOLVED_PRICE) return "NO";
  // Closed but not cleanly resolved (e.g. refunded)
  return null;
}

const OrderResponseSchema = z
  .object({
    success: z.boolean().optional(),
    orderID: z.string().optional(),
    errorMsg: z.string().optional(),
    // set by the client's HTTP helper when the request itself failed
    status: z.number().optional(),
  })
  .passthrough();

// ─── Polymarket ───

export async function placeOrder(req: OrderRequest): Promise<OrderAck> {
  if (!req.tokenId) {
    throw new VenueError(`Market ${req.marketId} has no ${req.side} token id`, "malformed");
  }
  const tokenId = req.tokenId;
  const client = await getClobClient();

  log.info(`Placing ${req.side} market order: $${req.amountUsd.toFixed(2)}`, { marketId: req.marketId });

  // Fill or Kill: amount is USD to spend on the BUY side
  const raw: unknown = await limited("order", () =>
    client.createAndPostMarketOrder(
      { tokenID: tokenId, amount: req.amountUsd, side: Side.BUY },
      undefined, // let SDK resolve tick size and neg risk
      OrderType.FOK
    )
  );

  const parsed = OrderResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new VenueError("Unrecognized order response", "malformed");
  }
  const resp = parsed.data;
  if (resp.status === 429) {
    handle429();
    throw new VenueError("Order rate limited", "rejected");
  }
  if (resp.success === false || !resp.orderID) {
    throw new VenueError(resp.errorMsg || "Order rejected", "rejected");
  }
  return { orderId: resp.orderID, fillPrice: req.price };
}

export async function fetchOutcome(marketId: string): Promise<Outcome | null> {
  const { data } = await limited("lookup", () =>
    axios.get<unknown>(`${GAMMA_API}/markets`, {
      params: { id: marketId, limit: 1 },
      timeout: 10_000,
    })
  );
  const list = z.array(z.unknown()).safeParse(data);
  if (!list.success || list.data.length === 0) return null;

  const market = GammaResolutionSchema.safeParse(list.data[0]);
  if (!market.success) {
    throw new VenueError(`Malformed settlement payload for ${marketId}`, "malformed");
  }
  return outcomeFromResolution(market.data);
}

export const polymarketVenue: MarketVenue = { placeOrder, fetchOutcome };
