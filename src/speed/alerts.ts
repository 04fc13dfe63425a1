import axios from "axios";
import { createLogger } from "../logger";
import { errorMessage } from "../errors";

const log = createLogger("alerts");

export type AlertCategory =
  | "trade-open"
  | "trade-resolve"
  | "tier-change"
  | "milestone"
  | "health"
  | "daily-summary";

export interface AlertSink {
  send(category: AlertCategory, text: string): Promise<void>;
}

// ─── Sinks ───

export function telegramSink(botToken: string, chatId: string, timeoutMs = 5_000): AlertSink {
  return {
    async send(_category, text) {
      await axios.post(
        `https://api.telegram.org/bot${botToken}/sendMessage`,
        { chat_id: chatId, text, disable_web_page_preview: true },
        { timeout: timeoutMs }
      );
    },
  };
}

/** Used when Telegram is not configured. */
export function logSink(): AlertSink {
  return {
    async send(category, text) {
      log.info(`[alert:${category}] ${text}`);
    },
  };
}

// ─── Rate limiting ───

export interface AlerterStats {
  sent: number;
  dropped: number;
  failed: number;
}

/**
 * At most one notification per category per interval. Delivery is
 * fire-and-forget: failures are logged and never reach the caller.
 */
export class RateLimitedAlerter {
  private readonly lastSent = new Map<AlertCategory, number>();
  private readonly pending = new Set<Promise<void>>();
  private readonly stats: AlerterStats = { sent: 0, dropped: 0, failed: 0 };

  constructor(
    private readonly sink: AlertSink,
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Returns false when the category is still cooling down. */
  notify(category: AlertCategory, text: string): boolean {
    const at = this.now();
    const last = this.lastSent.get(category);
    if (last !== undefined && at - last < this.intervalMs) {
      this.stats.dropped++;
      log.debug("Alert rate-limited", { category });
      return false;
    }
    this.lastSent.set(category, at);

    const delivery = this.sink.send(category, text).then(
      () => {
        this.stats.sent++;
      },
      (e: unknown) => {
        this.stats.failed++;
        log.warn("Alert delivery failed", { category, error: errorMessage(e) });
      }
    );
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
    return true;
  }

  /** Waits for deliveries already started. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  getStats(): AlerterStats {
    return { ...this.stats };
  }
}

export function createAlertSink(telegram: { botToken: string; chatId: string } | null): AlertSink {
  if (telegram) return telegramSink(telegram.botToken, telegram.chatId);
  log.info("Telegram not configured, alerts go to the log");
  return logSink();
}
