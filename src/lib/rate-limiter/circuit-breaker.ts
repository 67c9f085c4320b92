/**
 * Circuit breaker for REST attempts, backed by cockatiel.
 *
 * After `failureThreshold` consecutive transport failures the breaker opens
 * and attempts fail with CircuitOpenError without reaching the network. Once
 * `halfOpenAfterMs` has passed a single trial call is let through; its outcome
 * closes or re-opens the breaker.
 *
 * Only thrown errors are seen by the breaker. The transport runs just the HTTP
 * exchange inside it, so a 5xx response never trips it, and caller
 * cancellation is not counted as a failure.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleWhen,
} from "cockatiel";

import { CancelledError } from "../errors/errors";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the breaker */
  failureThreshold: number;
  /** Time in OPEN before a trial call is let through (ms) */
  halfOpenAfterMs: number;
  /** Which thrown errors count as failures (default: all but cancellation) */
  isFailure?: (error: Error) => boolean;
}

export interface CircuitBreaker {
  execute: <T>(fn: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  /** Consecutive counted failures since the last success */
  getFailureCount: () => number;
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  halfOpenAfterMs: 30_000,
};

export class CircuitOpenError extends Error {
  public override readonly name = "CircuitOpenError";

  constructor(message = "Circuit breaker is open") {
    super(message);
  }
}

/**
 * Caller aborts surface as CancelledError, a DOMException named AbortError,
 * or whatever reason the caller passed; only the first two are recognisable.
 */
export const isCancellation = (error: Error): boolean =>
  error instanceof CancelledError || error.name === "AbortError";

const toState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    case CircuitState.Closed:
      return "CLOSED";
  }
};

/**
 * Creates a consecutive-failure circuit breaker.
 *
 * @example
 * ```typescript
 * const circuitBreaker = createCircuitBreaker({ failureThreshold: 5, halfOpenAfterMs: 30_000 });
 * const transport = createRestTransport({ limiter, httpClient, circuitBreaker, logger });
 *
 * circuitBreaker.onStateChange((state) => logger.info("Exchange circuit", { state }));
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, halfOpenAfterMs, isFailure = (error) => !isCancellation(error) } =
    config;

  const policy = circuitBreaker(handleWhen(isFailure), {
    halfOpenAfter: halfOpenAfterMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const listeners = new Set<(state: CircuitBreakerState) => void>();
  let failureCount = 0;

  policy.onStateChange((state) => {
    const mapped = toState(state);
    for (const listener of listeners) {
      listener(mapped);
    }
  });
  policy.onSuccess(() => {
    failureCount = 0;
  });
  policy.onFailure(({ handled }) => {
    if (handled) {
      failureCount++;
    }
  });

  const execute = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await policy.execute(fn);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(
          `Circuit breaker is open after ${failureCount} consecutive failures`,
        );
      }
      throw error;
    }
  };

  const getState = (): CircuitBreakerState => toState(policy.state);

  return {
    execute,
    getState,
    isOpen: () => getState() === "OPEN",
    getFailureCount: () => failureCount,
    onStateChange: (callback) => {
      listeners.add(callback);
      return () => {
        listeners.delete(callback);
      };
    },
  };
};
