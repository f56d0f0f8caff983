import type { PositionStatus } from "./types.js";

export type ErrorCode =
  | "validation"
  | "capacity_denied"
  | "execution_timeout"
  | "execution_rejected"
  | "feed_disconnected"
  | "invalid_transition";

export class TradingError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad configuration. Only ever raised at startup. */
export class ValidationError extends TradingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("validation", `Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

/** A refused ledger reservation. Expected; the discovery is skipped. */
export class CapacityDenied extends TradingError {
  readonly reason: "at_capacity" | "daily_limit_exceeded";

  constructor(reason: "at_capacity" | "daily_limit_exceeded", chain: string) {
    super("capacity_denied", `Reservation denied on ${chain}: ${reason}`);
    this.reason = reason;
  }
}

export class ExecutionTimeout extends TradingError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("execution_timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ExecutionRejected extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("execution_rejected", message, options);
  }
}

export class FeedDisconnected extends TradingError {
  readonly feed: string;

  constructor(feed: string, options?: { cause?: unknown }) {
    super("feed_disconnected", `${feed} feed disconnected`, options);
    this.feed = feed;
  }
}

export class InvalidTransitionError extends TradingError {
  constructor(assetId: string, from: PositionStatus, to: PositionStatus) {
    super("invalid_transition", `Invalid transition for ${assetId}: ${from} -> ${to}`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
