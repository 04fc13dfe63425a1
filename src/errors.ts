// ─── Error taxonomy ───
// Transient failures are retried and never escape as fatal. Policy rejections
// are plain values, not errors. Everything below is thrown.

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type VenueErrorKind = "rejected" | "malformed" | "auth";

export class VenueError extends Error {
  constructor(
    message: string,
    public readonly kind: VenueErrorKind
  ) {
    super(message);
    this.name = "VenueError";
  }
}

export class VenueTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "VenueTimeoutError";
  }
}

/** Aborts startup before the decision loop begins. */
export class FatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
