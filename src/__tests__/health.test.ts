import { describe, it, expect, vi } from 'vitest';
import { HealthInput, HealthReport, HealthStatus, checkHealth, createWatchdog, describeHealth } from '../speed/health';
import { NOW } from './helpers/fixtures';

const input = (overrides: Partial<HealthInput> = {}): HealthInput => ({
  now: NOW,
  feedConnected: true,
  lastTickAt: NOW - 1_000,
  lastHeartbeatAt: NOW - 1_000,
  ...overrides,
});

describe('checkHealth', () => {
  it('is healthy with a live feed and a recent heartbeat', () => {
    const report = checkHealth(input());
    expect(report.status).toBe('healthy');
    expect(report.checkedAt).toBe(NOW);
    expect(report.components.map((c) => c.status)).toEqual(['healthy', 'healthy']);
  });

  it('flags a disconnected or silent feed', () => {
    expect(checkHealth(input({ feedConnected: false })).components[0]).toEqual({
      name: 'feed',
      status: 'unhealthy',
      message: 'disconnected',
    });
    expect(checkHealth(input({ lastTickAt: null })).components[0].message).toBe('no data received');
  });

  it('flags feed data older than 30s', () => {
    expect(checkHealth(input({ lastTickAt: NOW - 30_000 })).status).toBe('healthy');
    const stale = checkHealth(input({ lastTickAt: NOW - 45_000 }));
    expect(stale.status).toBe('unhealthy');
    expect(stale.components[0].message).toBe('stale data (45s old)');
  });

  it('degrades on a slow heartbeat and fails on a missing one', () => {
    expect(checkHealth(input({ lastHeartbeatAt: NOW - 40_000 })).status).toBe('degraded');
    expect(checkHealth(input({ lastHeartbeatAt: NOW - 61_000 })).status).toBe('unhealthy');
    expect(checkHealth(input({ lastHeartbeatAt: null })).components[1].message).toBe('no heartbeat');
  });

  it('reports the worst component', () => {
    const report = checkHealth(input({ feedConnected: false, lastHeartbeatAt: NOW - 40_000 }));
    expect(report.status).toBe('unhealthy');
    expect(describeHealth(report)).toBe('Health UNHEALTHY | feed: disconnected | heartbeat: last heartbeat 40s ago');
  });
});

describe('createWatchdog', () => {
  it('calls back only when the overall status changes', () => {
    let sample = input();
    const changes: Array<{ report: HealthReport; previous: HealthStatus }> = [];
    const watchdog = createWatchdog({
      intervalMs: 15_000,
      sample: () => sample,
      onChange: (report, previous) => changes.push({ report, previous }),
    });

    watchdog.check();
    expect(changes).toHaveLength(0);

    sample = input({ feedConnected: false });
    watchdog.check();
    watchdog.check();
    expect(changes.map((c) => [c.previous, c.report.status])).toEqual([['healthy', 'unhealthy']]);

    sample = input();
    watchdog.check();
    expect(changes.map((c) => [c.previous, c.report.status])).toEqual([
      ['healthy', 'unhealthy'],
      ['unhealthy', 'healthy'],
    ]);
  });

  it('keeps checking when the listener throws', () => {
    const onChange = vi.fn(() => {
      throw new Error('listener bug');
    });
    const watchdog = createWatchdog({ intervalMs: 15_000, sample: () => input({ lastTickAt: null }), onChange });

    expect(watchdog.check().status).toBe('unhealthy');
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('runs on its interval until stopped', () => {
    vi.useFakeTimers();
    try {
      const sample = vi.fn(() => input());
      const watchdog = createWatchdog({ intervalMs: 15_000, sample, onChange: () => undefined });
      watchdog.start();
      vi.advanceTimersByTime(45_000);
      expect(sample).toHaveBeenCalledTimes(3);

      watchdog.stop();
      vi.advanceTimersByTime(45_000);
      expect(sample).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });
});
