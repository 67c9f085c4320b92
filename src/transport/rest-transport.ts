/**
 * REST transport combining rate limiting, timeouts, circuit breaking and
 * bounded retry.
 *
 * Order of operations per attempt:
 * 1. Acquire `cost` tokens for the request's endpoint scope (global + endpoint)
 * 2. Perform the call with a per-attempt timeout, inside the circuit breaker
 * 3. Classify failures into an ErrorRecord
 * 4. Feed Retry-After back into the limiter
 * 5. Retry NetworkError and RateLimitExceeded with backoff; surface the rest
 */

import * as v from "valibot";

import {
  type ErrorRecord,
  abortReason,
  classifyFailure,
  classifyThrown,
  err,
  extractExchangeError,
  ok,
  parseRetryAfterSeconds,
  withAttempts,
} from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import {
  type BackoffConfig,
  type CircuitBreaker,
  CircuitOpenError,
  DEFAULT_BACKOFF_CONFIG,
  type RateLimiter,
  calculateBackoffMs,
} from "@/lib/rate-limiter";

import type {
  ExecuteOptions,
  ExecuteWithSchemaOptions,
  HttpClient,
  HttpResponse,
  RestRequest,
  RestResponse,
  RestResult,
} from "./types";

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Symmetric jitter, e.g. 0.2 for ±20% */
  jitterFraction: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: DEFAULT_BACKOFF_CONFIG.initialDelayMs,
  maxDelayMs: DEFAULT_BACKOFF_CONFIG.maxDelayMs,
  jitterFraction: DEFAULT_BACKOFF_CONFIG.jitterFactor,
};

export interface RestTransportConfig {
  /** Shared with the client's stream managers; not owned by the transport */
  limiter: RateLimiter;
  httpClient: HttpClient;
  retry?: RetryPolicy;
  /** Per-attempt timeout (ms) */
  timeoutMs?: number;
  /** Request cost when the request names none (e.g. getBinanceEndpointWeight) */
  getEndpointCost?: (path: string) => number;
  /** Fails attempts fast while the exchange is unreachable */
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
}

export interface RestTransportMetrics {
  /** Total execute() calls */
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalRetries: number;
  /** Attempts that had to wait for tokens */
  rateLimitWaits: number;
  /** Total time spent waiting for tokens (ms) */
  rateLimitWaitTimeMs: number;
  circuitBreakerTrips: number;
}

export interface RestTransport {
  /** Executes a request and validates the response body against `schema` */
  execute<T>(request: RestRequest, options: ExecuteWithSchemaOptions<T>): Promise<RestResult<T>>;
  /** Executes a request; the response body is passed through unvalidated */
  execute(request: RestRequest, options?: ExecuteOptions): Promise<RestResult<unknown>>;
  getMetrics: () => RestTransportMetrics;
  resetMetrics: () => void;
}

/**
 * Raised inside an attempt when its timeout fires.
 */
export class RequestTimeoutError extends Error {
  public override readonly name = "RequestTimeoutError";

  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

const emptyMetrics = (): RestTransportMetrics => ({
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  totalRetries: 0,
  rateLimitWaits: 0,
  rateLimitWaitTimeMs: 0,
  circuitBreakerTrips: 0,
});

const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

const toRestResponse = <T>(response: HttpResponse, data: T): RestResponse<T> => ({
  status: response.status,
  headers: response.headers,
  data,
  // Set by execute() once the attempt count is known
  attempts: 0,
});

const symbolOf = (request: RestRequest): string | undefined => {
  const symbol = request.params?.["symbol"] ?? request.params?.["product_id"];
  return symbol === undefined ? undefined : String(symbol);
};

/**
 * Sleeps for `ms`, rejecting with the abort reason if `signal` fires first.
 */
const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Creates a REST transport.
 *
 * Failures are returned as ErrorRecords, never thrown. Only caller
 * cancellation (the signal's reason), limiter shutdown and misconfiguration
 * (ConfigError) reject the returned promise.
 *
 * @example
 * ```typescript
 * const transport = createRestTransport({
 *   limiter,
 *   httpClient: createFetchHttpClient({ baseUrl: "https://api.exchange.test" }),
 *   getEndpointCost: getBinanceEndpointWeight,
 * });
 *
 * const result = await transport.execute(
 *   { endpointId: "depth", method: "GET", path: "/api/v3/depth", params: { symbol: "BTCUSDT" } },
 *   { schema: orderBookSchema },
 * );
 *
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case "InvalidSymbol":
 *       // caller error, do not retry
 *       break;
 *     case "RateLimitExceeded":
 *       // retries exhausted; result.error.retryAfterSeconds says when to come back
 *       break;
 *   }
 * }
 * ```
 */
export const createRestTransport = (config: RestTransportConfig): RestTransport => {
  const {
    limiter,
    httpClient,
    retry = DEFAULT_RETRY_POLICY,
    timeoutMs = 10000,
    getEndpointCost,
    circuitBreaker,
    logger,
  } = config;

  const backoffConfig: BackoffConfig = {
    initialDelayMs: retry.baseDelayMs,
    maxDelayMs: retry.maxDelayMs,
    multiplier: 2,
    jitterFactor: retry.jitterFraction,
  };

  let metrics = emptyMetrics();

  circuitBreaker?.onStateChange((state) => {
    if (state === "OPEN") {
      metrics.circuitBreakerTrips++;
      logger?.warn("Circuit breaker opened", { trips: metrics.circuitBreakerTrips });
    } else if (state === "CLOSED") {
      logger?.info("Circuit breaker closed");
    }
  });

  /**
   * Runs the HTTP call with a per-attempt timeout. Caller aborts propagate
   * into the call and are rethrown as the caller's reason.
   */
  const callWithTimeout = async (
    request: RestRequest,
    signal?: AbortSignal,
  ): Promise<HttpResponse> => {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
    const onCallerAbort = (): void => {
      controller.abort(signal?.reason);
    };
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const call = (): Promise<HttpResponse> =>
      httpClient(
        { method: request.method, path: request.path, params: request.params },
        controller.signal,
      );

    try {
      return circuitBreaker ? await circuitBreaker.execute(call) : await call();
    } catch (error) {
      // Clients may reject with a generic AbortError rather than the reason
      const { reason } = controller.signal;
      throw reason instanceof RequestTimeoutError ? reason : error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  };

  /**
   * Some exchanges report failures in a 2xx body ({ retCode: 10001 }, { error: [...] }).
   */
  const classifyBody = (
    response: HttpResponse,
    symbol: string | undefined,
  ): ErrorRecord | null => {
    const { body } = response;
    if (body === null || typeof body !== "object" || Array.isArray(body)) {
      return null;
    }
    return extractExchangeError(body) === null
      ? null
      : classifyFailure({ exchangePayload: body, httpStatus: response.status, symbol });
  };

  /**
   * One attempt, classified. Throws only for caller cancellation.
   */
  const attempt = async (
    request: RestRequest,
    schema: v.GenericSchema | undefined,
    signal?: AbortSignal,
  ): Promise<RestResult<unknown>> => {
    const symbol = symbolOf(request);
    let response: HttpResponse;

    try {
      response = await callWithTimeout(request, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      if (error instanceof CircuitOpenError) {
        return err(classifyFailure({ message: "Circuit breaker is open", symbol }));
      }
      if (error instanceof RequestTimeoutError) {
        return err(classifyFailure({ timeoutOccurred: true, message: error.message, symbol }));
      }
      return err(classifyThrown(error, { symbol }));
    }

    if (!isSuccessStatus(response.status)) {
      return err(
        classifyFailure({
          httpStatus: response.status,
          exchangePayload: response.body,
          retryAfterSeconds: parseRetryAfterSeconds(response.headers["retry-after"]),
          symbol,
        }),
      );
    }

    const bodyFailure = classifyBody(response, symbol);
    if (bodyFailure) {
      return err(bodyFailure);
    }

    if (schema) {
      const parsed = v.safeParse(schema, response.body);
      if (!parsed.success) {
        const issue = parsed.issues[0];
        const where = v.getDotPath(issue);
        const location = where ? `${request.path} at ${where}` : request.path;
        return err(
          classifyFailure({
            malformed: true,
            message: `Unexpected response shape from ${location}: ${issue.message}`,
            symbol,
          }),
        );
      }
      return ok(toRestResponse(response, parsed.output));
    }

    return ok(toRestResponse(response, response.body));
  };

  const surface = (
    request: RestRequest,
    record: ErrorRecord,
    attempts: number,
  ): RestResult<never> => {
    metrics.failedRequests++;
    const annotated = withAttempts(record, attempts);

    if (annotated.kind === "ProtocolError") {
      logger?.warn("Response did not match the expected wire format", {
        endpointId: request.endpointId,
        path: request.path,
        message: annotated.message,
      });
    } else {
      logger?.warn("Request failed", {
        endpointId: request.endpointId,
        path: request.path,
        kind: annotated.kind,
        message: annotated.message,
        attempts,
      });
    }

    return err(annotated);
  };

  function execute<T>(
    request: RestRequest,
    options: ExecuteWithSchemaOptions<T>,
  ): Promise<RestResult<T>>;
  function execute(request: RestRequest, options?: ExecuteOptions): Promise<RestResult<unknown>>;
  async function execute(
    request: RestRequest,
    options: ExecuteOptions & { schema?: v.GenericSchema } = {},
  ): Promise<RestResult<unknown>> {
    const { signal, schema } = options;
    const cost = request.cost ?? getEndpointCost?.(request.path) ?? 1;

    metrics.totalRequests++;

    for (let attemptNumber = 1; ; attemptNumber++) {
      const grant = await limiter.acquire(request.endpointId, cost, { signal });
      if (grant.waitedMs > 0) {
        metrics.rateLimitWaits++;
        metrics.rateLimitWaitTimeMs += grant.waitedMs;
      }

      const result = await attempt(request, schema, signal);

      if (result.ok) {
        metrics.successfulRequests++;
        if (attemptNumber > 1) {
          logger?.info("Request succeeded after retry", {
            endpointId: request.endpointId,
            attempts: attemptNumber,
          });
        }
        return ok({ ...result.value, attempts: attemptNumber });
      }

      const record = result.error;

      if (record.kind === "RateLimitExceeded" && record.retryAfterSeconds !== undefined) {
        limiter.throttle(request.endpointId, record.retryAfterSeconds);
      }

      if (!record.retriable || attemptNumber >= retry.maxAttempts) {
        return surface(request, record, attemptNumber);
      }

      const delayMs =
        record.kind === "RateLimitExceeded" && record.retryAfterSeconds !== undefined
          ? record.retryAfterSeconds * 1000
          : calculateBackoffMs(attemptNumber - 1, backoffConfig);

      metrics.totalRetries++;
      logger?.debug("Retrying request", {
        endpointId: request.endpointId,
        attempt: attemptNumber,
        kind: record.kind,
        delayMs,
      });

      await sleep(delayMs, signal);
    }
  }

  const getMetrics = (): RestTransportMetrics => ({ ...metrics });

  const resetMetrics = (): void => {
    metrics = emptyMetrics();
  };

  return {
    execute,
    getMetrics,
    resetMetrics,
  };
};
