import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import { fetchOutcome, outcomeFromResolution, placeOrder } from '../speed/venue';
import { rateLimiterStatus, resetRateLimiter } from '../rate-limiter';
import { VenueError } from '../errors';

function gammaResponse(data: unknown, status = 200) {
  return { data, status, statusText: status === 200 ? 'OK' : 'Too Many Requests', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('outcomeFromResolution', () => {
  it('reads the winning side of a closed market', () => {
    expect(outcomeFromResolution({ id: '1', closed: true, outcomes: ['Up', 'Down'], outcomePrices: ['1', '0'] })).toBe('YES');
    expect(outcomeFromResolution({ id: '1', closed: true, outcomes: ['Up', 'Down'], outcomePrices: ['0', '1'] })).toBe('NO');
  });

  it('follows the Up index when outcomes are reversed', () => {
    expect(outcomeFromResolution({ id: '1', closed: true, outcomes: ['Down', 'Up'], outcomePrices: ['0.01', '0.99'] })).toBe('YES');
  });

  it('waits while the market is open or undecided', () => {
    expect(outcomeFromResolution({ id: '1', closed: false, outcomes: ['Up', 'Down'], outcomePrices: ['1', '0'] })).toBeNull();
    expect(outcomeFromResolution({ id: '1', closed: true, outcomes: ['Up', 'Down'], outcomePrices: ['0.5', '0.5'] })).toBeNull();
    expect(outcomeFromResolution({ id: '1', closed: true, outcomePrices: ['1'] })).toBeNull();
  });
});

describe('fetchOutcome', () => {
  beforeEach(() => {
    resetRateLimiter();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses Gamma string-encoded lists', async () => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(
      gammaResponse([{ id: 77, closed: true, outcomes: '["Up","Down"]', outcomePrices: '["0","1"]' }])
    );

    await expect(fetchOutcome('77')).resolves.toBe('NO');
    expect(get.mock.calls[0][1]).toEqual({ params: { id: '77', limit: 1 }, timeout: 10_000 });
  });

  it('returns null for an unknown market', async () => {
    vi.spyOn(axios, 'get').mockResolvedValue(gammaResponse([]));
    await expect(fetchOutcome('missing')).resolves.toBeNull();
  });

  it('rejects a malformed payload as final', async () => {
    vi.spyOn(axios, 'get').mockResolvedValue(gammaResponse([{ id: 77, closed: true }]));
    await expect(fetchOutcome('77')).rejects.toBeInstanceOf(VenueError);
  });

  it('backs off after a 429', async () => {
    const response = gammaResponse({ error: 'rate limited' }, 429);
    vi.spyOn(axios, 'get').mockRejectedValue(
      new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', response.config, undefined, response)
    );

    await expect(fetchOutcome('77')).rejects.toBeInstanceOf(AxiosError);
    expect(rateLimiterStatus().backoffMs).toBe(2_000);
    expect(rateLimiterStatus().backoffUntil).toBeGreaterThan(0);
  });
});

describe('placeOrder', () => {
  it('refuses a market without a token id before reaching the client', async () => {
    await expect(
      placeOrder({ marketId: 'm', tokenId: undefined, side: 'YES', amountUsd: 5, price: 0.5 })
    ).rejects.toMatchObject({ name: 'VenueError', kind: 'malformed' });
  });
});
