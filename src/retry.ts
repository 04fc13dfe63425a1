import { VenueError, VenueTimeoutError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("retry");

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  label: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Venue rejections and auth failures are final; anything else is worth another try. */
export function isTransient(e: unknown): boolean {
  if (e instanceof VenueTimeoutError) return true;
  if (e instanceof VenueError) return false;
  return true;
}

/**
 * Retry `fn` with a fixed backoff. Non-transient errors and the last
 * failure are rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn();
    } catch (e) {
      lastError = e;
      if (!isTransient(e) || attempt === opts.attempts) break;
      log.debug(`${opts.label} failed, retrying`, {
        attempt,
        error: e instanceof Error ? e.message : String(e),
      });
      await sleep(opts.delayMs);
    }
  }
  throw lastError;
}

/** Rejects with VenueTimeoutError if `promise` has not settled within `timeoutMs`. */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new VenueTimeoutError(operation, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
