/**
 * Market-data access layer for centralized crypto exchanges.
 *
 * One client per exchange owns a hierarchical rate limiter shared by its REST
 * transport and stream managers. Failures surface as ErrorRecords whose `kind`
 * tells the caller which recovery path applies.
 */

export {
  createMarketDataClient,
  toStreamManagerConfig,
  type MarketDataClient,
  type MarketDataClientOptions,
  type SubscribeOptions,
} from "./client";

export {
  BINANCE_ENDPOINT_WEIGHTS,
  BINANCE_RATE_LIMITS,
  BYBIT_RATE_LIMITS,
  COINBASE_RATE_LIMITS,
  getBinanceEndpointWeight,
  getRateLimitPreset,
  RATE_LIMIT_PRESETS,
  type Exchange,
} from "./adapters";

export {
  clientConfigSchema,
  parseClientConfig,
  toRateLimiterConfig,
  type ClientConfig,
  type ClientConfigInput,
  type RateLimitRuleInput,
  type RateLimitsConfig,
  type RateLimitsInput,
  type ReconnectConfig,
  type RetryConfig,
} from "./lib/config";

export {
  CancelledError,
  classifyFailure,
  classifyThrown,
  ConfigError,
  createErrorRecord,
  ERROR_KINDS,
  err,
  isErrorRecord,
  isOk,
  isRetriableKind,
  LimiterClosedError,
  ok,
  type ErrorKind,
  type ErrorRecord,
  type FailureSignal,
  type Result,
} from "./lib/errors";

export { createLogger, type Logger, type LoggerConfig, type LogLevel } from "./lib/logger";

export {
  CircuitOpenError,
  createCircuitBreaker,
  createRateLimiter,
  GLOBAL_SCOPE,
  type AcquireGrant,
  type AcquireOptions,
  type BackoffConfig,
  type BucketSnapshot,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type RateLimiter,
  type RateLimiterConfig,
  type RateLimitRule,
  type RetryAfterScope,
} from "./lib/rate-limiter";

export {
  createEventBuffer,
  createJsonFrameCodec,
  createRestSnapshotFetcher,
  createStreamManager,
  createWsSocketFactory,
  DEFAULT_STREAM_MANAGER_CONFIG,
  STREAM_SUBSCRIBE_SCOPE,
  transitionConnection,
  type BufferOverflowEvent,
  type ChannelOptions,
  type ConnectionState,
  type DataEvent,
  type FrameCodec,
  type InboundFrame,
  type RecoveryMode,
  type ResyncRequiredEvent,
  type Snapshot,
  type SnapshotEvent,
  type SnapshotFetcher,
  type SocketFactory,
  type SocketHandlers,
  type StreamEvent,
  type StreamManager,
  type StreamManagerConfig,
  type StreamManagerMetrics,
  type StreamManagerOptions,
  type StreamPayloadEvent,
  type StreamSignal,
  type StreamSocket,
  type Subscription,
} from "./stream";

export {
  createFetchHttpClient,
  createRestTransport,
  DEFAULT_RETRY_POLICY,
  RequestTimeoutError,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
  type RestRequest,
  type RestResponse,
  type RestResult,
  type RestTransport,
  type RestTransportMetrics,
  type RetryPolicy,
} from "./transport";
