/**
 * Caller-facing error records.
 *
 * Every failure that leaves the REST transport or a stream manager is reported
 * as exactly one ErrorRecord. Records are frozen at the classification boundary
 * and never mutated afterwards; annotations produce a new record.
 */

export type ErrorKind =
  | "NetworkError"
  | "RateLimitExceeded"
  | "InvalidSymbol"
  | "ExchangeError"
  | "ProtocolError";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "NetworkError",
  "RateLimitExceeded",
  "InvalidSymbol",
  "ExchangeError",
  "ProtocolError",
] as const;

export interface ErrorRecord {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly retriable: boolean;
  /** Only set for RateLimitExceeded */
  readonly retryAfterSeconds?: number;
  readonly httpStatus?: number;
  readonly wsCloseCode?: number;
  readonly symbol?: string;
  readonly exchangeErrorCode?: string;
  /** Number of attempts made before the record was surfaced */
  readonly attempts?: number;
}

export interface ErrorRecordInit {
  kind: ErrorKind;
  message: string;
  retryAfterSeconds?: number;
  httpStatus?: number;
  wsCloseCode?: number;
  symbol?: string;
  exchangeErrorCode?: string;
  attempts?: number;
}

const RETRIABLE_KINDS: ReadonlySet<ErrorKind> = new Set(["NetworkError", "RateLimitExceeded"]);

export const isRetriableKind = (kind: ErrorKind): boolean => RETRIABLE_KINDS.has(kind);

/**
 * Builds a frozen ErrorRecord. `retriable` is derived from the kind, and
 * `retryAfterSeconds` is dropped for every kind but RateLimitExceeded.
 */
export const createErrorRecord = (init: ErrorRecordInit): ErrorRecord => {
  const record: ErrorRecord = {
    kind: init.kind,
    message: init.message,
    retriable: isRetriableKind(init.kind),
    ...(init.kind === "RateLimitExceeded" &&
      init.retryAfterSeconds !== undefined && {
        retryAfterSeconds: Math.max(0, init.retryAfterSeconds),
      }),
    ...(init.httpStatus !== undefined && { httpStatus: init.httpStatus }),
    ...(init.wsCloseCode !== undefined && { wsCloseCode: init.wsCloseCode }),
    ...(init.symbol !== undefined && { symbol: init.symbol }),
    ...(init.exchangeErrorCode !== undefined && { exchangeErrorCode: init.exchangeErrorCode }),
    ...(init.attempts !== undefined && { attempts: init.attempts }),
  };

  return Object.freeze(record);
};

/**
 * Returns a copy of the record annotated with the attempt count.
 */
export const withAttempts = (record: ErrorRecord, attempts: number): ErrorRecord =>
  Object.freeze({ ...record, attempts });

export const isErrorRecord = (value: unknown): value is ErrorRecord =>
  value !== null &&
  typeof value === "object" &&
  "kind" in value &&
  typeof value.kind === "string" &&
  ERROR_KINDS.some((kind) => kind === value.kind) &&
  "message" in value &&
  typeof value.message === "string" &&
  "retriable" in value &&
  typeof value.retriable === "boolean";
