// ─── Price stream ───

export interface PriceTick {
  readonly price: number;
  readonly sourceTimestamp: number;  // exchange trade time (ms)
  readonly receiptTimestamp: number; // local receive time (ms), non-decreasing
  readonly latencyMs: number;        // receipt - source, clamped at 0
  readonly stale: boolean;
}

// ─── Markets ───

export type Outcome = "YES" | "NO";

export interface MarketDescriptor {
  readonly marketId: string;
  readonly question: string;
  readonly baselinePrice: number; // BTC price the window resolves against
  readonly yesPrice: number;      // "Up" token, 0-1
  readonly noPrice: number;       // "Down" token, 0-1
  readonly createdAt: number;     // window start
  readonly expiresAt: number;     // window end
  readonly yesTokenId?: string;
  readonly noTokenId?: string;
}

// ─── Signals ───

export interface EdgeSignal {
  readonly marketId: string;
  readonly market: MarketDescriptor;
  readonly direction: Outcome;
  readonly edgePct: number;        // signed, percentage points
  readonly realMovePct: number;
  readonly impliedMovePct: number;
  readonly confidence: number;     // 0-1
  readonly observedAt: number;
  readonly tickPrice: number;
  readonly tickLatencyMs: number;
}

// ─── Risk controller ───

export type Tier = "HEALTHY" | "WOUNDED" | "THRIVING";

export interface OutcomeRecord {
  tradeId: string;
  won: boolean;
  pnl: number;
  at: number;
}

export interface TierTransition {
  from: Tier;
  to: Tier;
  at: number;
  reason: string;
  kellyMultiplier: number;
  edgeThreshold: number;
}

export interface SurvivalState {
  tier: Tier;
  capitalEstimate: number;
  consecutiveLosses: number;
  consecutiveWins: number;
  edgeThreshold: number;
  kellyMultiplier: number;
  history: OutcomeRecord[];
  transitions: TierTransition[];
}

export type RejectReason = "below-threshold" | "pattern-filtered" | "concurrency-limit" | "zero-size";

export type MilestoneKind = "all-time-high" | "capital-doubled";

export interface Milestone {
  kind: MilestoneKind;
  capital: number;
  at: number;
}

export type Approval =
  | { approved: true; sizeFraction: number }
  | { approved: false; reason: RejectReason };

// ─── Positions ───

export type TradingPath = "live" | "paper";
export type PositionStatus = "PENDING" | "RESOLVED";
export type SettlementSource = "venue" | "simulated";

export interface Position {
  id: string;
  mode: TradingPath;
  marketId: string;
  question: string;
  direction: Outcome;
  entryPrice: number;
  yesPriceAtEntry: number;
  size: number;       // USD committed
  shares: number;     // size / entryPrice
  edgePct: number;
  confidence: number;
  pattern?: string;   // hour|market type|edge bucket at entry
  openedAt: number;
  expiresAt: number;
  status: PositionStatus;
  orderId?: string;
  outcome?: Outcome;
  resolutionPrice?: number;
  pnl?: number;
  resolvedAt?: number;
  settlementSource?: SettlementSource;
}

// ─── Execution ───

export type RejectionKind =
  | "LatencyBreach"
  | "DuplicateMarket"
  | "ConcurrencyLimit"
  | "InvalidSize"
  | "InsufficientCapital"
  | "VenueRejected"
  | "VenueTimeout";

export interface Rejection {
  kind: RejectionKind;
  marketId: string;
  detail: string;
}

export type SubmitResult = { ok: true; position: Position } | { ok: false; rejection: Rejection };

/** Shared contract of the live and paper paths. */
export interface Executor {
  readonly mode: TradingPath;
  submit(signal: EdgeSignal, sizeFraction: number): Promise<SubmitResult>;
  resolveDue(now?: number): Promise<Position[]>;
  resolve(id: string, outcome: Outcome, now?: number, source?: SettlementSource): Position | null;
  openCount(): number;
  openPositions(): Position[];
  capital(): number;
}
