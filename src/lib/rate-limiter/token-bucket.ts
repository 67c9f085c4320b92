/**
 * Token bucket with a Retry-After floor.
 *
 * Refill is computed from the integer rule (`rate` tokens per `periodSeconds`)
 * rather than a pre-divided per-second rate, so whole-token refills land on
 * exact millisecond boundaries (10 per 60s refills one token every 6000ms).
 */

export interface TokenBucketConfig {
  /** Tokens granted per period */
  rate: number;
  /** Length of the period in seconds */
  periodSeconds: number;
  /** Maximum bucket capacity (default: rate) */
  capacity?: number;
  /** Starting tokens (default: capacity) */
  initialTokens?: number;
}

export interface TokenBucketState {
  capacity: number;
  tokens: number;
  refillRatePerSecond: number;
  lastRefillTimestamp: number;
  /** Epoch ms before which no refill happens, or null when not throttled */
  blockedUntil: number | null;
}

export interface TokenBucket {
  readonly capacity: number;
  /** Attempts to consume tokens, returns true if successful */
  tryConsume: (tokens?: number) => boolean;
  /** Returns the number of available tokens */
  getAvailableTokens: () => number;
  /** Returns the wait time in ms needed before `tokens` can be consumed */
  getWaitTimeMs: (tokens?: number) => number;
  /** Drains the bucket and suspends refill until `deadline` (epoch ms) */
  blockUntil: (deadline: number) => void;
  /** Resets the bucket to full capacity */
  reset: () => void;
  /** Returns a snapshot of the bucket */
  getState: () => TokenBucketState;
}

/**
 * Creates a token bucket.
 *
 * Token bucket algorithm:
 * - Bucket holds up to `capacity` tokens
 * - Tokens are consumed when requests are made
 * - Tokens refill continuously at `rate / periodSeconds` per second
 * - While blocked (after a Retry-After), the bucket stays empty
 *
 * @example
 * ```typescript
 * const bucket = createTokenBucket({ rate: 10, periodSeconds: 60 });
 *
 * if (bucket.tryConsume()) {
 *   // Make request
 * } else {
 *   const waitMs = bucket.getWaitTimeMs();
 * }
 * ```
 */
export const createTokenBucket = (config: TokenBucketConfig): TokenBucket => {
  const { rate, periodSeconds, capacity = rate } = config;
  const initialTokens = Math.min(capacity, config.initialTokens ?? capacity);
  const periodMs = periodSeconds * 1000;

  let tokens = initialTokens;
  // May lie in the future while a Retry-After floor is in effect
  let lastRefillTimestamp = Date.now();

  /**
   * Refills tokens based on elapsed time since last refill.
   */
  const refill = (now: number): void => {
    if (now <= lastRefillTimestamp) {
      return;
    }

    const elapsedMs = now - lastRefillTimestamp;
    tokens = Math.min(capacity, tokens + (elapsedMs * rate) / periodMs);
    lastRefillTimestamp = now;
  };

  const tryConsume = (cost = 1): boolean => {
    refill(Date.now());

    if (tokens >= cost) {
      tokens -= cost;
      return true;
    }

    return false;
  };

  const getWaitTimeMs = (cost = 1): number => {
    const now = Date.now();
    refill(now);

    if (tokens >= cost) {
      return 0;
    }

    const blockedMs = Math.max(0, lastRefillTimestamp - now);
    const refillMs = ((cost - tokens) * periodMs) / rate;
    return blockedMs + Math.ceil(refillMs);
  };

  const getAvailableTokens = (): number => {
    refill(Date.now());
    return tokens;
  };

  const blockUntil = (deadline: number): void => {
    const now = Date.now();
    refill(now);
    tokens = 0;
    lastRefillTimestamp = Math.max(lastRefillTimestamp, now, deadline);
  };

  const reset = (): void => {
    tokens = capacity;
    lastRefillTimestamp = Date.now();
  };

  const getState = (): TokenBucketState => {
    const now = Date.now();
    refill(now);
    return {
      capacity,
      tokens,
      refillRatePerSecond: rate / periodSeconds,
      lastRefillTimestamp,
      blockedUntil: lastRefillTimestamp > now ? lastRefillTimestamp : null,
    };
  };

  return {
    capacity,
    tryConsume,
    getAvailableTokens,
    getWaitTimeMs,
    blockUntil,
    reset,
    getState,
  };
};
