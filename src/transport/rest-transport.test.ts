import * as v from "valibot";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Logger } from "@/lib/logger";
import { type RateLimiter, createCircuitBreaker, createRateLimiter } from "@/lib/rate-limiter";

import { createRestTransport } from "./rest-transport";
import type { HttpClient, HttpResponse, RestRequest } from "./types";

const createMockLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const response = (status: number, body: unknown, headers: Record<string, string> = {}) =>
  ({ status, headers, body }) satisfies HttpResponse;

const tickerRequest: RestRequest = {
  endpointId: "ticker",
  method: "GET",
  path: "/api/v3/ticker/price",
  params: { symbol: "BTCUSDT" },
};

const tickerSchema = v.object({
  symbol: v.string(),
  price: v.string("price must be a string"),
});

/** Never settles unless the signal aborts, then rejects with its reason */
const hangingClient: HttpClient = (_request, signal) =>
  new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

describe("createRestTransport", () => {
  let limiter: RateLimiter;
  let logger: Logger;

  beforeEach(() => {
    vi.useFakeTimers();
    // No jitter: backoff is exactly 1000, 2000, 4000... ms
    vi.spyOn(Math, "random").mockReturnValue(0.5);
    logger = createMockLogger();
    limiter = createRateLimiter({ global: { rate: 10, periodSeconds: 1 }, logger });
  });

  afterEach(() => {
    limiter.close();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe("success", () => {
    it("should return validated data with the attempt count", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(
        response(200, { symbol: "BTCUSDT", price: "64000.10" }, { "x-mbx-used-weight": "2" }),
      );
      const transport = createRestTransport({ limiter, httpClient, logger });

      const result = await transport.execute(tickerRequest, { schema: tickerSchema });

      expect(result).toEqual({
        ok: true,
        value: {
          status: 200,
          headers: { "x-mbx-used-weight": "2" },
          data: { symbol: "BTCUSDT", price: "64000.10" },
          attempts: 1,
        },
      });
      expect(httpClient).toHaveBeenCalledWith(
        { method: "GET", path: "/api/v3/ticker/price", params: { symbol: "BTCUSDT" } },
        expect.any(AbortSignal),
      );
    });

    it("should pass the body through when no schema is given", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(response(200, [1, 2, 3]));
      const transport = createRestTransport({ limiter, httpClient });

      const result = await transport.execute(tickerRequest);

      expect(result.ok && result.value.data).toEqual([1, 2, 3]);
    });

    it("should accept a 2xx body whose code means success", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValue(response(200, { retCode: 0, retMsg: "OK", result: { list: [] } }));
      const transport = createRestTransport({ limiter, httpClient });

      const result = await transport.execute(tickerRequest);

      expect(result.ok).toBe(true);
    });
  });

  describe("rate limiting", () => {
    it("should charge the endpoint cost function when the request names no cost", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(response(200, {}));
      const getEndpointCost = vi.fn(() => 4);
      const transport = createRestTransport({ limiter, httpClient, getEndpointCost });

      await transport.execute(tickerRequest);

      expect(getEndpointCost).toHaveBeenCalledWith("/api/v3/ticker/price");
      expect(limiter.getBucketState().tokens).toBe(6);
    });

    it("should prefer an explicit request cost", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(response(200, {}));
      const getEndpointCost = vi.fn(() => 4);
      const transport = createRestTransport({ limiter, httpClient, getEndpointCost });

      await transport.execute({ ...tickerRequest, cost: 2 });

      expect(getEndpointCost).not.toHaveBeenCalled();
      expect(limiter.getBucketState().tokens).toBe(8);
    });

    it("should feed Retry-After into the limiter and wait it out", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValueOnce(
          response(429, { code: -1003, msg: "Too many requests." }, { "retry-after": "2" }),
        )
        .mockResolvedValue(response(200, { symbol: "BTCUSDT", price: "1" }));
      const transport = createRestTransport({ limiter, httpClient, logger });

      const promise = transport.execute(tickerRequest, { schema: tickerSchema });
      await vi.advanceTimersByTimeAsync(0);

      expect(limiter.getBucketState().tokens).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith("Rate limit throttled by Retry-After", {
        scope: "ticker",
        retryAfterSeconds: 2,
        buckets: ["global"],
      });

      // Retry-After sleep, then one token refill at 10/s
      await vi.advanceTimersByTimeAsync(2099);
      expect(httpClient).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      const result = await promise;

      expect(httpClient).toHaveBeenCalledTimes(2);
      expect(result.ok && result.value.attempts).toBe(2);
      expect(transport.getMetrics()).toMatchObject({
        totalRetries: 1,
        rateLimitWaits: 1,
        rateLimitWaitTimeMs: 100,
      });
    });

    it("should surface RateLimitExceeded with retryAfterSeconds once retries run out", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValue(response(429, "Too Many Requests", { "retry-after": "1" }));
      const transport = createRestTransport({
        limiter,
        httpClient,
        retry: { maxAttempts: 2, baseDelayMs: 1000, maxDelayMs: 30000, jitterFraction: 0.2 },
      });

      const promise = transport.execute(tickerRequest);
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "RateLimitExceeded",
          message: "Too Many Requests",
          retriable: true,
          retryAfterSeconds: 1,
          httpStatus: 429,
          symbol: "BTCUSDT",
          attempts: 2,
        },
      });
    });
  });

  describe("retries", () => {
    it("should retry a server error with exponential backoff", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValueOnce(response(503, "Service Unavailable"))
        .mockResolvedValueOnce(response(502, null))
        .mockResolvedValue(response(200, { symbol: "BTCUSDT", price: "1" }));
      const transport = createRestTransport({ limiter, httpClient, logger });

      const promise = transport.execute(tickerRequest, { schema: tickerSchema });

      await vi.advanceTimersByTimeAsync(999);
      expect(httpClient).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(httpClient).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1999);
      expect(httpClient).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);

      const result = await promise;
      expect(result.ok && result.value.attempts).toBe(3);
      expect(logger.debug).toHaveBeenCalledWith("Retrying request", {
        endpointId: "ticker",
        attempt: 1,
        kind: "NetworkError",
        delayMs: 1000,
      });
      expect(logger.info).toHaveBeenCalledWith("Request succeeded after retry", {
        endpointId: "ticker",
        attempts: 3,
      });
    });

    it("should retry a failed fetch", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockRejectedValueOnce(new TypeError("fetch failed", { cause: { code: "ECONNRESET" } }))
        .mockResolvedValue(response(200, { symbol: "BTCUSDT", price: "1" }));
      const transport = createRestTransport({ limiter, httpClient });

      const promise = transport.execute(tickerRequest);
      await vi.advanceTimersByTimeAsync(1000);
      const result = await promise;

      expect(httpClient).toHaveBeenCalledTimes(2);
      expect(result.ok && result.value.attempts).toBe(2);
    });

    it("should surface the last NetworkError after maxAttempts", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(response(502, null));
      const transport = createRestTransport({ limiter, httpClient, logger });

      const promise = transport.execute(tickerRequest);
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(httpClient).toHaveBeenCalledTimes(3);
      expect(result).toEqual({
        ok: false,
        error: {
          kind: "NetworkError",
          message: "Server error (HTTP 502)",
          retriable: true,
          httpStatus: 502,
          symbol: "BTCUSDT",
          attempts: 3,
        },
      });
      expect(logger.warn).toHaveBeenCalledWith("Request failed", {
        endpointId: "ticker",
        path: "/api/v3/ticker/price",
        kind: "NetworkError",
        message: "Server error (HTTP 502)",
        attempts: 3,
      });
      expect(transport.getMetrics()).toMatchObject({
        totalRequests: 1,
        successfulRequests: 0,
        failedRequests: 1,
        totalRetries: 2,
      });
    });

    it("should not retry an invalid symbol", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValue(response(400, { code: -1121, msg: "Invalid symbol." }));
      const transport = createRestTransport({ limiter, httpClient });

      const result = await transport.execute({ ...tickerRequest, params: { symbol: "FOOBAR" } });

      expect(httpClient).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: false,
        error: {
          kind: "InvalidSymbol",
          message: "Invalid symbol.",
          retriable: false,
          httpStatus: 400,
          symbol: "FOOBAR",
          exchangeErrorCode: "-1121",
          attempts: 1,
        },
      });
    });

    it("should classify an error carried in a 2xx body", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValue(response(200, { retCode: 10001, retMsg: "params error" }));
      const transport = createRestTransport({ limiter, httpClient });

      const result = await transport.execute(tickerRequest);

      expect(httpClient).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("ExchangeError");
        expect(result.error.exchangeErrorCode).toBe("10001");
        expect(result.error.message).toBe("params error");
      }
    });
  });

  describe("response validation", () => {
    it("should report a schema mismatch as a ProtocolError without retrying", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValue(response(200, { symbol: "BTCUSDT", price: 64000 }));
      const transport = createRestTransport({ limiter, httpClient, logger });

      const result = await transport.execute(tickerRequest, { schema: tickerSchema });

      const message =
        "Unexpected response shape from /api/v3/ticker/price at price: price must be a string";
      expect(httpClient).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: false,
        error: {
          kind: "ProtocolError",
          message,
          retriable: false,
          symbol: "BTCUSDT",
          attempts: 1,
        },
      });
      expect(logger.warn).toHaveBeenCalledWith("Response did not match the expected wire format", {
        endpointId: "ticker",
        path: "/api/v3/ticker/price",
        message,
      });
    });
  });

  describe("timeouts and cancellation", () => {
    it("should abort a slow attempt and classify it as a NetworkError", async () => {
      const httpClient = vi.fn<HttpClient>(hangingClient);
      const transport = createRestTransport({
        limiter,
        httpClient,
        timeoutMs: 5000,
        retry: { maxAttempts: 1, baseDelayMs: 1000, maxDelayMs: 30000, jitterFraction: 0.2 },
      });

      const promise = transport.execute(tickerRequest);
      await vi.advanceTimersByTimeAsync(5000);
      const result = await promise;

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "NetworkError",
          message: "Request timed out after 5000ms",
          retriable: true,
          symbol: "BTCUSDT",
          attempts: 1,
        },
      });
    });

    it("should reject with the caller's reason when aborted mid-request", async () => {
      const httpClient = vi.fn<HttpClient>(hangingClient);
      const transport = createRestTransport({ limiter, httpClient });
      const controller = new AbortController();

      const promise = transport.execute(tickerRequest, { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(0);
      expect(httpClient).toHaveBeenCalledTimes(1);

      controller.abort(new Error("shutting down"));

      await expect(promise).rejects.toThrow("shutting down");
    });

    it("should reject when aborted during a backoff sleep", async () => {
      const httpClient = vi.fn<HttpClient>().mockResolvedValue(response(503, null));
      const transport = createRestTransport({ limiter, httpClient });
      const controller = new AbortController();

      const promise = transport.execute(tickerRequest, { signal: controller.signal });
      await vi.advanceTimersByTimeAsync(500);
      controller.abort(new Error("caller gave up"));

      await expect(promise).rejects.toThrow("caller gave up");
      expect(httpClient).toHaveBeenCalledTimes(1);
    });

    it("should reject before calling when the signal is already aborted", async () => {
      const httpClient = vi.fn<HttpClient>();
      const transport = createRestTransport({ limiter, httpClient });

      await expect(
        transport.execute(tickerRequest, { signal: AbortSignal.abort(new Error("too late")) }),
      ).rejects.toThrow("too late");
      expect(httpClient).not.toHaveBeenCalled();
    });
  });

  describe("circuit breaker", () => {
    it("should fail fast once the breaker opens", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockRejectedValue(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }));
      const circuitBreaker = createCircuitBreaker({ failureThreshold: 2, halfOpenAfterMs: 60_000 });
      const transport = createRestTransport({
        limiter,
        httpClient,
        circuitBreaker,
        logger,
        retry: { maxAttempts: 1, baseDelayMs: 1000, maxDelayMs: 30000, jitterFraction: 0.2 },
      });

      await transport.execute(tickerRequest);
      await transport.execute(tickerRequest);
      const result = await transport.execute(tickerRequest);

      expect(httpClient).toHaveBeenCalledTimes(2);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("NetworkError");
        expect(result.error.message).toBe("Circuit breaker is open");
      }
      expect(transport.getMetrics().circuitBreakerTrips).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith("Circuit breaker opened", { trips: 1 });
    });
  });

  describe("metrics", () => {
    it("should count requests and reset", async () => {
      const httpClient = vi
        .fn<HttpClient>()
        .mockResolvedValueOnce(response(200, {}))
        .mockResolvedValueOnce(response(404, { code: -1100, msg: "Illegal characters found" }));
      const transport = createRestTransport({ limiter, httpClient });

      await transport.execute(tickerRequest);
      await transport.execute(tickerRequest);

      expect(transport.getMetrics()).toEqual({
        totalRequests: 2,
        successfulRequests: 1,
        failedRequests: 1,
        totalRetries: 0,
        rateLimitWaits: 0,
        rateLimitWaitTimeMs: 0,
        circuitBreakerTrips: 0,
      });

      transport.resetMetrics();
      expect(transport.getMetrics().totalRequests).toBe(0);
    });
  });
});
