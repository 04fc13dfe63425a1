import { createLogger } from "../logger";
import { errorMessage } from "../errors";

const log = createLogger("health");

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface ComponentHealth {
  name: "feed" | "heartbeat";
  status: HealthStatus;
  message: string;
}

export interface HealthReport {
  status: HealthStatus;
  components: ComponentHealth[];
  checkedAt: number;
}

export interface HealthInput {
  now: number;
  feedConnected: boolean;
  /** Receipt time of the newest tick. */
  lastTickAt: number | null;
  /** Last time the decision loop finished a tick. */
  lastHeartbeatAt: number | null;
}

export interface HealthThresholds {
  staleFeedMs: number;
  heartbeatDegradedMs: number;
  heartbeatUnhealthyMs: number;
}

export const HEALTH_THRESHOLDS: HealthThresholds = {
  staleFeedMs: 30_000,
  heartbeatDegradedMs: 30_000,
  heartbeatUnhealthyMs: 60_000,
};

const RANK: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

function checkFeed(input: HealthInput, t: HealthThresholds): ComponentHealth {
  if (!input.feedConnected) return { name: "feed", status: "unhealthy", message: "disconnected" };
  if (input.lastTickAt === null) return { name: "feed", status: "unhealthy", message: "no data received" };
  const age = input.now - input.lastTickAt;
  if (age > t.staleFeedMs) return { name: "feed", status: "unhealthy", message: `stale data (${Math.round(age / 1000)}s old)` };
  return { name: "feed", status: "healthy", message: "ok" };
}

function checkHeartbeat(input: HealthInput, t: HealthThresholds): ComponentHealth {
  if (input.lastHeartbeatAt === null) return { name: "heartbeat", status: "unhealthy", message: "no heartbeat" };
  const age = input.now - input.lastHeartbeatAt;
  if (age > t.heartbeatUnhealthyMs) return { name: "heartbeat", status: "unhealthy", message: `last heartbeat ${Math.round(age / 1000)}s ago` };
  if (age > t.heartbeatDegradedMs) return { name: "heartbeat", status: "degraded", message: `last heartbeat ${Math.round(age / 1000)}s ago` };
  return { name: "heartbeat", status: "healthy", message: "ok" };
}

/** Overall status is the worst component's. */
export function checkHealth(input: HealthInput, thresholds: HealthThresholds = HEALTH_THRESHOLDS): HealthReport {
  const components = [checkFeed(input, thresholds), checkHeartbeat(input, thresholds)];
  const status = components.reduce<HealthStatus>((worst, c) => (RANK[c.status] > RANK[worst] ? c.status : worst), "healthy");
  return { status, components, checkedAt: input.now };
}

export function describeHealth(report: HealthReport): string {
  const parts = report.components.map((c) => `${c.name}: ${c.message}`).join(" | ");
  return `Health ${report.status.toUpperCase()} | ${parts}`;
}

// ─── Watchdog ───

export interface WatchdogOptions {
  intervalMs: number;
  sample: () => HealthInput;
  /** Called when the overall status changes, recoveries included. */
  onChange: (report: HealthReport, previous: HealthStatus) => void;
  thresholds?: HealthThresholds;
}

export interface Watchdog {
  check(): HealthReport;
  start(): void;
  stop(): void;
}

export function createWatchdog(opts: WatchdogOptions): Watchdog {
  let last: HealthStatus = "healthy";
  let timer: ReturnType<typeof setInterval> | null = null;

  function check(): HealthReport {
    const report = checkHealth(opts.sample(), opts.thresholds);
    if (report.status !== "healthy") log.warn(describeHealth(report));
    if (report.status !== last) {
      const previous = last;
      last = report.status;
      try {
        opts.onChange(report, previous);
      } catch (e) {
        log.error("Health listener failed", { error: errorMessage(e) });
      }
    }
    return report;
  }

  return {
    check,
    start() {
      if (timer) return;
      timer = setInterval(() => {
        try {
          check();
        } catch (e) {
          log.error("Health check failed", { error: errorMessage(e) });
        }
      }, opts.intervalMs);
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = null;
    },
  };
}
