/**
 * Rate limiter module exports.
 */

// Token bucket
export {
  createTokenBucket,
  type TokenBucket,
  type TokenBucketConfig,
  type TokenBucketState,
} from "./token-bucket";

// Hierarchical limiter (main entry point)
export {
  createRateLimiter,
  GLOBAL_SCOPE,
  type AcquireGrant,
  type AcquireOptions,
  type BucketSnapshot,
  type RateLimiter,
  type RateLimiterConfig,
  type RateLimitRule,
  type RetryAfterScope,
} from "./rate-limiter";

// Backoff utilities
export {
  calculateBackoffMs,
  createBackoff,
  DEFAULT_BACKOFF_CONFIG,
  nominalBackoffMs,
  type Backoff,
  type BackoffConfig,
} from "./backoff";

// Circuit breaker
export {
  CircuitOpenError,
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";
