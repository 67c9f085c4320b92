/**
 * Failure classification.
 *
 * Maps transport signals (HTTP status, WebSocket close codes, timeouts,
 * exchange error bodies, thrown network errors) to exactly one ErrorRecord.
 * Classification is pure: every call builds its record from its own input.
 */

import { type ErrorKind, type ErrorRecord, createErrorRecord } from "./error-record";
import {
  type ExchangeErrorInfo,
  extractExchangeError,
  isInvalidSymbolSignal,
  isRateLimitSignal,
} from "./exchange-payload";

export interface FailureSignal {
  httpStatus?: number;
  wsCloseCode?: number;
  timeoutOccurred?: boolean;
  /** Parsed (or raw text) body of the failed response or error frame */
  exchangePayload?: unknown;
  /** Node/undici error code, e.g. ECONNRESET */
  networkErrorCode?: string;
  retryAfterSeconds?: number;
  symbol?: string;
  /** The wire message did not have the expected shape */
  malformed?: boolean;
  message?: string;
}

/**
 * Network error codes that indicate a transport failure.
 */
export const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const RATE_LIMIT_HTTP_STATUSES = new Set([
  429, // Too Many Requests
  418, // Binance: IP banned after repeated 429s
]);

const RATE_LIMIT_CLOSE_CODES = new Set([1013, 4429]);

const PROTOCOL_CLOSE_CODES = new Set([
  1002, // protocol error
  1003, // unsupported data
  1007, // invalid frame payload
]);

const POLICY_CLOSE_CODES = new Set([1008, 4401, 4403]);

interface Classification {
  kind: ErrorKind;
  message: string;
}

const describe = (signal: FailureSignal, info: ExchangeErrorInfo | null, fallback: string) =>
  info?.message ?? signal.message ?? fallback;

const decide = (signal: FailureSignal, info: ExchangeErrorInfo | null): Classification => {
  const { httpStatus, wsCloseCode } = signal;

  if (signal.malformed) {
    return { kind: "ProtocolError", message: signal.message ?? "Malformed message on the wire" };
  }

  if (signal.timeoutOccurred) {
    return { kind: "NetworkError", message: signal.message ?? "Request timed out" };
  }

  if (signal.networkErrorCode !== undefined && NETWORK_ERROR_CODES.has(signal.networkErrorCode)) {
    return {
      kind: "NetworkError",
      message: signal.message ?? `Network failure (${signal.networkErrorCode})`,
    };
  }

  if (
    (httpStatus !== undefined && RATE_LIMIT_HTTP_STATUSES.has(httpStatus)) ||
    (wsCloseCode !== undefined && RATE_LIMIT_CLOSE_CODES.has(wsCloseCode)) ||
    (info !== null && isRateLimitSignal(info))
  ) {
    return { kind: "RateLimitExceeded", message: describe(signal, info, "Rate limit exceeded") };
  }

  if (info !== null && isInvalidSymbolSignal(info)) {
    const fallback = signal.symbol ? `Invalid symbol: ${signal.symbol}` : "Invalid symbol";
    return { kind: "InvalidSymbol", message: describe(signal, info, fallback) };
  }

  if (httpStatus !== undefined && httpStatus >= 500 && info?.code === undefined) {
    return {
      kind: "NetworkError",
      message: describe(signal, info, `Server error (HTTP ${httpStatus})`),
    };
  }

  if (wsCloseCode !== undefined && info === null) {
    if (PROTOCOL_CLOSE_CODES.has(wsCloseCode)) {
      return {
        kind: "ProtocolError",
        message: signal.message ?? `Connection closed with protocol error (${wsCloseCode})`,
      };
    }
    if (POLICY_CLOSE_CODES.has(wsCloseCode)) {
      return {
        kind: "ExchangeError",
        message: signal.message ?? `Connection rejected by exchange (${wsCloseCode})`,
      };
    }
    return {
      kind: "NetworkError",
      message: signal.message ?? `Connection closed (${wsCloseCode})`,
    };
  }

  if (info !== null) {
    return { kind: "ExchangeError", message: describe(signal, info, "Exchange error") };
  }

  if (httpStatus !== undefined && httpStatus >= 400) {
    return { kind: "ExchangeError", message: signal.message ?? `HTTP ${httpStatus}` };
  }

  return { kind: "NetworkError", message: signal.message ?? "Unknown transport failure" };
};

/**
 * Classifies a failure signal into exactly one ErrorRecord.
 *
 * @example
 * ```typescript
 * classifyFailure({ httpStatus: 429, retryAfterSeconds: 30 });
 * // { kind: "RateLimitExceeded", retriable: true, retryAfterSeconds: 30, ... }
 *
 * classifyFailure({ httpStatus: 400, exchangePayload: { code: -1121, msg: "Invalid symbol." } });
 * // { kind: "InvalidSymbol", retriable: false, exchangeErrorCode: "-1121", ... }
 * ```
 */
export const classifyFailure = (signal: FailureSignal): ErrorRecord => {
  const info =
    signal.exchangePayload === undefined ? null : extractExchangeError(signal.exchangePayload);
  const { kind, message } = decide(signal, info);

  return createErrorRecord({
    kind,
    message,
    retryAfterSeconds: signal.retryAfterSeconds,
    httpStatus: signal.httpStatus,
    wsCloseCode: signal.wsCloseCode,
    symbol: signal.symbol,
    exchangeErrorCode: info?.code,
  });
};

const stringProp = (value: object, key: string): string | undefined => {
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "string" ? prop : undefined;
};

/**
 * Finds a network error code on an error or its `cause` chain (fetch wraps the
 * socket error as `cause`).
 */
const findErrorCode = (error: unknown, depth = 0): string | undefined => {
  if (error === null || typeof error !== "object" || depth > 3) return undefined;
  const code = stringProp(error, "code");
  if (code !== undefined) return code;
  return "cause" in error ? findErrorCode(error.cause, depth + 1) : undefined;
};

const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError", "AbortError"]);

/**
 * Classifies a thrown exception (fetch failure, socket error, timeout abort).
 * Anything that carries no recognizable signal is treated as a network error.
 */
export const classifyThrown = (
  error: unknown,
  context: Pick<FailureSignal, "symbol" | "httpStatus" | "wsCloseCode"> = {},
): ErrorRecord => {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : undefined;
  const networkErrorCode = findErrorCode(error);

  return classifyFailure({
    ...context,
    message,
    networkErrorCode,
    timeoutOccurred: name !== undefined && TIMEOUT_ERROR_NAMES.has(name),
  });
};

/**
 * Parses a Retry-After header value.
 *
 * @param value - Header value (delay in seconds, or HTTP date)
 * @param now - Reference time for HTTP dates
 * @returns Delay in seconds, or undefined if the header is absent or unparseable
 *
 * @example
 * ```typescript
 * parseRetryAfterSeconds("30"); // 30
 * parseRetryAfterSeconds("Wed, 21 Oct 2026 07:28:00 GMT"); // seconds until that date
 * ```
 */
export const parseRetryAfterSeconds = (
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined => {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();

  // Only accept if the entire string is a non-negative number of seconds
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number.parseFloat(trimmed);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, (date - now) / 1000);
  }

  return undefined;
};
