export {
  classifyFailure,
  classifyThrown,
  NETWORK_ERROR_CODES,
  parseRetryAfterSeconds,
  type FailureSignal,
} from "./classify";

export {
  createErrorRecord,
  ERROR_KINDS,
  isErrorRecord,
  isRetriableKind,
  withAttempts,
  type ErrorKind,
  type ErrorRecord,
  type ErrorRecordInit,
} from "./error-record";

export { abortReason, CancelledError, ConfigError, LimiterClosedError } from "./errors";

export {
  extractExchangeError,
  isInvalidSymbolSignal,
  isRateLimitSignal,
  type ExchangeErrorInfo,
} from "./exchange-payload";

export { err, isOk, ok, type Result } from "./result";
