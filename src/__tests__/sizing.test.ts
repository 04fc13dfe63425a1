import { describe, it, expect } from 'vitest';
import { clamp, floorCents, kellyFraction } from '../speed/kelly';
import { isTransient, withRetry, withTimeout } from '../retry';
import { VenueError, VenueTimeoutError } from '../errors';
import { PositionBook, settlementPnl } from '../speed/position-book';
import { Position } from '../speed/types';
import { NOW } from './helpers/fixtures';

describe('kellyFraction', () => {
  it('scales edge by confidence and the Kelly fraction', () => {
    expect(kellyFraction(0.5, 6, 0.5)).toBeCloseTo(0.015, 12);
    expect(kellyFraction(0.5, -6, 0.5)).toBeCloseTo(0.015, 12);
  });

  it('clamps confidence and rejects non-finite input', () => {
    expect(kellyFraction(3, 10, 1)).toBeCloseTo(0.1, 12);
    expect(kellyFraction(-1, 10, 1)).toBe(0);
    expect(kellyFraction(Number.NaN, 10, 1)).toBe(0);
  });

  it('floors to whole cents', () => {
    expect(floorCents(12.3456)).toBe(12.34);
    expect(floorCents(0.29)).toBe(0.29);
    expect(clamp(5, 0, 2)).toBe(2);
  });
});

describe('retry helpers', () => {
  it('treats venue rejections as final and timeouts as transient', () => {
    expect(isTransient(new VenueError('no', 'rejected'))).toBe(false);
    expect(isTransient(new VenueTimeoutError('fill', 10))).toBe(true);
    expect(isTransient(new Error('ECONNRESET'))).toBe(true);
  });

  it('retries transient failures until one succeeds', async () => {
    let attempts = 0;
    const result = await withRetry(
      async () => {
        attempts++;
        if (attempts < 3) throw new Error('flaky');
        return 'ok';
      },
      { attempts: 3, delayMs: 1, label: 'test' }
    );
    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('stops at the first non-transient failure', async () => {
    let attempts = 0;
    await expect(
      withRetry(
        async () => {
          attempts++;
          throw new VenueError('rejected', 'rejected');
        },
        { attempts: 3, delayMs: 1, label: 'test' }
      )
    ).rejects.toBeInstanceOf(VenueError);
    expect(attempts).toBe(1);
  });

  it('times out a promise that never settles', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, 'fill')).rejects.toThrow('fill timed out after 10ms');
    await expect(withTimeout(Promise.resolve(4), 10, 'fill')).resolves.toBe(4);
  });
});

describe('PositionBook', () => {
  const position = (overrides: Partial<Position> = {}): Position => ({
    id: 'p-1',
    mode: 'paper',
    marketId: 'm-1',
    question: 'q',
    direction: 'YES',
    entryPrice: 0.4,
    yesPriceAtEntry: 0.4,
    size: 10,
    shares: 25,
    edgePct: 4,
    confidence: 0.4,
    openedAt: NOW,
    expiresAt: NOW + 1_000,
    status: 'PENDING',
    ...overrides,
  });

  it('computes payout per share on a win and the stake on a loss', () => {
    expect(settlementPnl(position(), 'YES')).toBeCloseTo(15, 12);
    expect(settlementPnl(position(), 'NO')).toBe(-10);
  });

  it('reserves a market slot and its amount until the position opens', () => {
    const book = new PositionBook(100);
    expect(book.reserve('m-1', 10)).toBe(true);
    expect(book.reserve('m-1', 10)).toBe(false);
    expect(book.openCount()).toBe(1);
    expect(book.available()).toBe(90);
    expect(book.capital()).toBe(100);

    book.open(position());
    expect(book.openCount()).toBe(1);
    expect(book.capital()).toBe(90);
    expect(book.available()).toBe(90);
  });

  it('returns the reserved amount on release', () => {
    const book = new PositionBook(100);
    book.reserve('m-1', 25);
    book.release('m-1');
    expect(book.available()).toBe(100);
    expect(book.hasMarket('m-1')).toBe(false);
  });

  it('settles once and lists due positions by expiry', () => {
    const book = new PositionBook(100);
    book.open(position());
    expect(book.due(NOW)).toHaveLength(0);
    expect(book.due(NOW + 1_000)).toHaveLength(1);

    expect(book.settle('p-1', 'YES', NOW + 1_000, 'venue')?.pnl).toBeCloseTo(15, 12);
    expect(book.settle('p-1', 'NO', NOW + 1_000, 'venue')).toBeNull();
    expect(book.capital()).toBeCloseTo(115, 12);
    expect(book.stats()).toMatchObject({ initialCapital: 100, wins: 1, losses: 0 });
    expect(book.hasMarket('m-1')).toBe(false);
  });

  it('restores capital from replayed positions', () => {
    const book = new PositionBook(100);
    book.restore([
      position({ id: 'a', marketId: 'a', status: 'RESOLVED', outcome: 'NO', pnl: -10 }),
      position({ id: 'b', marketId: 'b' }),
    ]);
    expect(book.capital()).toBe(80);
    expect(book.pending().map((p) => p.id)).toEqual(['b']);
    expect(book.hasMarket('b')).toBe(true);
    expect(book.stats().losses).toBe(1);
  });
});
