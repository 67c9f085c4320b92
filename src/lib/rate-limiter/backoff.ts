/**
 * Exponential backoff utilities for retry and reconnect logic.
 */

export interface BackoffConfig {
  /** Initial delay before first retry (ms) */
  initialDelayMs: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs: number;
  /** Multiplier for exponential growth */
  multiplier: number;
  /** Jitter factor (0-1): the delay is spread uniformly over ±jitterFactor */
  jitterFactor: number;
}

/**
 * Default backoff configuration.
 * - Starts at 1 second
 * - Doubles each retry
 * - Caps at 30 seconds
 * - Adds ±20% jitter
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitterFactor: 0.2,
};

/**
 * Returns the delay before jitter for a given attempt.
 */
export const nominalBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => Math.min(config.initialDelayMs * config.multiplier ** attempt, config.maxDelayMs);

/**
 * Calculates backoff delay for a given attempt number.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 * @param config - Backoff configuration
 * @returns Delay in milliseconds (with jitter applied)
 *
 * @example
 * ```typescript
 * // First retry: 800-1200ms
 * calculateBackoffMs(0);
 *
 * // Second retry: 1600-2400ms
 * calculateBackoffMs(1);
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const cappedDelayMs = nominalBackoffMs(attempt, config);

  // Symmetric jitter spreads retries of many clients around the nominal delay
  const jitter = cappedDelayMs * config.jitterFactor * (Math.random() * 2 - 1);

  return Math.max(0, Math.floor(cappedDelayMs + jitter));
};

export interface Backoff {
  /** Delay for the next consecutive failure; advances the attempt counter */
  nextDelayMs: () => number;
  /** Consecutive failures so far */
  getAttempt: () => number;
  /** Back to the initial delay */
  reset: () => void;
}

/**
 * Stateful backoff counting consecutive failures.
 *
 * @example
 * ```typescript
 * const backoff = createBackoff({ ...DEFAULT_BACKOFF_CONFIG, maxDelayMs: 30000 });
 * backoff.nextDelayMs(); // ~1000
 * backoff.nextDelayMs(); // ~2000
 * backoff.reset();
 * backoff.nextDelayMs(); // ~1000
 * ```
 */
export const createBackoff = (config: BackoffConfig = DEFAULT_BACKOFF_CONFIG): Backoff => {
  let attempt = 0;

  return {
    nextDelayMs: () => {
      const delay = calculateBackoffMs(attempt, config);
      attempt++;
      return delay;
    },
    getAttempt: () => attempt,
    reset: () => {
      attempt = 0;
    },
  };
};
