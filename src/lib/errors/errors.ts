/**
 * Error classes for conditions that are not part of the ErrorRecord contract:
 * misconfiguration, use after shutdown, and caller cancellation.
 */

/**
 * Thrown when configuration or a call's arguments can never succeed
 * (unknown config keys, cost above bucket capacity, missing collaborators).
 */
export class ConfigError extends Error {
  public override readonly name = "ConfigError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

/**
 * Thrown to waiters of a rate limiter that has been closed.
 */
export class LimiterClosedError extends Error {
  public override readonly name = "LimiterClosedError";

  constructor(message = "Rate limiter is closed") {
    super(message);
  }
}

/**
 * Thrown when the caller aborts an operation without supplying its own reason.
 */
export class CancelledError extends Error {
  public override readonly name = "CancelledError";

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

/**
 * Returns the abort reason of a signal as an Error.
 */
export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new CancelledError();
