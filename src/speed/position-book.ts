import { Outcome, Position, SettlementSource } from "./types";

export function settlementPnl(position: Position, outcome: Outcome): number {
  const won = position.direction === outcome;
  return won ? position.shares * (1 - position.entryPrice) : -position.size;
}

/**
 * Positions and capital for one trading path. Market slots are reserved
 * before the venue is awaited so a second signal for the same market sees
 * the slot taken; the reserved amount is held back from new orders.
 */
export class PositionBook {
  private readonly positions = new Map<string, Position>();
  private readonly openByMarket = new Map<string, string>();
  private readonly inFlight = new Map<string, number>();
  private cash: number;
  private wins = 0;
  private losses = 0;
  private realized = 0;

  constructor(private readonly initialCapital: number) {
    this.cash = initialCapital;
  }

  // ─── Slots ───

  hasMarket(marketId: string): boolean {
    return this.openByMarket.has(marketId) || this.inFlight.has(marketId);
  }

  /** Returns false when the market already has an open or in-flight position. */
  reserve(marketId: string, amountUsd: number): boolean {
    if (this.hasMarket(marketId)) return false;
    this.inFlight.set(marketId, amountUsd);
    return true;
  }

  release(marketId: string): void {
    this.inFlight.delete(marketId);
  }

  /** Open plus in-flight. */
  openCount(): number {
    return this.openByMarket.size + this.inFlight.size;
  }

  // ─── Lifecycle ───

  open(position: Position): void {
    this.inFlight.delete(position.marketId);
    this.positions.set(position.id, position);
    this.openByMarket.set(position.marketId, position.id);
    this.cash -= position.size;
  }

  /** Applies a resolution once; later calls for the same id return null. */
  settle(id: string, outcome: Outcome, at: number, source: SettlementSource): Position | null {
    const position = this.positions.get(id);
    if (!position || position.status !== "PENDING") return null;

    const pnl = settlementPnl(position, outcome);
    position.status = "RESOLVED";
    position.outcome = outcome;
    position.resolutionPrice = outcome === "YES" ? 1 : 0;
    position.pnl = pnl;
    position.resolvedAt = at;
    position.settlementSource = source;

    this.cash += position.size + pnl;
    this.realized += pnl;
    if (position.direction === outcome) this.wins++;
    else this.losses++;
    if (this.openByMarket.get(position.marketId) === id) this.openByMarket.delete(position.marketId);
    return position;
  }

  /** Rebuilds the book from replayed positions; resolved ones only move capital. */
  restore(positions: Position[]): void {
    for (const p of positions) {
      this.positions.set(p.id, p);
      this.cash -= p.size;
      if (p.status === "PENDING") {
        this.openByMarket.set(p.marketId, p.id);
        continue;
      }
      const pnl = p.pnl ?? 0;
      this.cash += p.size + pnl;
      this.realized += pnl;
      if (p.outcome === p.direction) this.wins++;
      else this.losses++;
    }
  }

  // ─── Views ───

  pending(): Position[] {
    return [...this.positions.values()].filter((p) => p.status === "PENDING");
  }

  due(now: number): Position[] {
    return this.pending().filter((p) => p.expiresAt <= now);
  }

  all(): Position[] {
    return [...this.positions.values()];
  }

  capital(): number {
    return this.cash;
  }

  /** Capital not held by in-flight orders. */
  available(): number {
    let reserved = 0;
    for (const amount of this.inFlight.values()) reserved += amount;
    return this.cash - reserved;
  }

  stats(): { initialCapital: number; capital: number; wins: number; losses: number; realizedPnl: number } {
    return {
      initialCapital: this.initialCapital,
      capital: this.cash,
      wins: this.wins,
      losses: this.losses,
      realizedPnl: this.realized,
    };
  }
}
