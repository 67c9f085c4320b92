/**
 * Market-data client: the owning object for one exchange connection set.
 *
 * A client owns exactly one rate limiter. Its REST transport and every stream
 * manager opened through subscribe() charge that limiter, so REST polling and
 * stream subscriptions share one budget. There is no process-wide limiter:
 * two clients never throttle each other.
 */

import {
  type ClientConfig,
  type ClientConfigInput,
  type ReconnectConfig,
  type RetryConfig,
  parseClientConfig,
  toRateLimiterConfig,
} from "@/lib/config";
import { ConfigError, LimiterClosedError } from "@/lib/errors";
import { type Logger, createLogger } from "@/lib/logger";
import { type CircuitBreaker, type RateLimiter, createRateLimiter } from "@/lib/rate-limiter";
import {
  type ConnectionState,
  DEFAULT_STREAM_MANAGER_CONFIG,
  type RestSnapshotFetcherConfig,
  type SnapshotFetcher,
  type SocketFactory,
  type StreamManager,
  type StreamManagerConfig,
  type StreamManagerOptions,
  createRestSnapshotFetcher,
  createStreamManager,
  createWsSocketFactory,
} from "@/stream";
import {
  type HttpClient,
  type RestTransport,
  type RetryPolicy,
  createFetchHttpClient,
  createRestTransport,
} from "@/transport";

export interface MarketDataClientOptions {
  /** Durations in seconds; validated, unknown keys rejected */
  config?: ClientConfigInput;
  /** REST base URL for the default fetch client */
  baseUrl?: string;
  /** Replaces the fetch client (signing proxies, tests) */
  httpClient?: HttpClient;
  /** Default socket factory for subscribe() (default: `ws`) */
  socketFactory?: SocketFactory;
  /** Request cost when a request names none (e.g. getBinanceEndpointWeight) */
  getEndpointCost?: (path: string) => number;
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
}

export interface SubscribeOptions
  extends Omit<StreamManagerOptions, "socketFactory" | "limiter" | "logger" | "config"> {
  socketFactory?: SocketFactory;
  /** Overrides the client's stream settings for this manager (ms) */
  config?: Partial<StreamManagerConfig>;
}

export interface MarketDataClient {
  /** REST call through the shared limiter; see RestTransport.execute */
  execute: RestTransport["execute"];
  /**
   * Creates and opens a stream manager on the shared limiter. The manager is
   * released by shutdown() unless cancelled earlier.
   */
  subscribe(options: SubscribeOptions): StreamManager;
  /** Snapshot fetcher for `recovery: "snapshot"` channels, going through execute() */
  createSnapshotFetcher<T>(
    config: Omit<RestSnapshotFetcherConfig<T>, "transport">,
  ): SnapshotFetcher;
  /** Stream managers that are not yet closed */
  getStreams(): readonly StreamManager[];
  getRateLimiter(): RateLimiter;
  getTransport(): RestTransport;
  getConfig(): ClientConfig;
  /**
   * Cancels every stream manager and closes the limiter. Pending and later
   * execute() calls reject with LimiterClosedError.
   */
  shutdown(): void;
  isShutdown(): boolean;
}

const toRetryPolicy = (retry: RetryConfig): RetryPolicy => ({
  maxAttempts: retry.maxAttempts,
  baseDelayMs: retry.baseDelay * 1000,
  maxDelayMs: retry.maxDelay * 1000,
  jitterFraction: retry.jitterFraction,
});

const toReconnectBackoff = (reconnect: ReconnectConfig): StreamManagerConfig["reconnect"] => ({
  initialDelayMs: reconnect.minDelay * 1000,
  maxDelayMs: reconnect.maxDelay * 1000,
  multiplier: 2,
  jitterFactor: reconnect.jitterFraction,
});

/**
 * Stream settings from the client configuration; de-duplication settings
 * have no configuration key and keep their defaults.
 */
export const toStreamManagerConfig = (config: ClientConfig): StreamManagerConfig => ({
  ...DEFAULT_STREAM_MANAGER_CONFIG,
  subscribeTimeoutMs: config.subscribeTimeoutSeconds * 1000,
  heartbeatTimeoutMs: config.heartbeatTimeoutSeconds * 1000,
  bufferCapacity: config.streamBufferCapacity,
  reconnect: toReconnectBackoff(config.reconnect),
  sustainedStreamingMs: config.reconnect.sustainedStreamingSeconds * 1000,
});

/**
 * Creates a market-data client.
 *
 * @throws ConfigError when the configuration is invalid or neither `baseUrl`
 * nor `httpClient` is given
 *
 * @example
 * ```typescript
 * const client = createMarketDataClient({
 *   baseUrl: "https://api.binance.com",
 *   config: { rateLimits: BINANCE_RATE_LIMITS, retry: { maxAttempts: 5 } },
 *   getEndpointCost: getBinanceEndpointWeight,
 *   logger,
 * });
 *
 * const ticker = await client.execute(
 *   { endpointId: "ticker", method: "GET", path: "/api/v3/ticker/price", params: { symbol } },
 *   { schema: tickerSchema },
 * );
 *
 * const trades = client.subscribe({
 *   url: "wss://stream.binance.com/ws",
 *   subscriptions: [{ channel: "trade", symbol: "btcusdt" }],
 *   codec: binanceCodec,
 * });
 *
 * process.on("SIGTERM", () => client.shutdown());
 * ```
 */
export const createMarketDataClient = (options: MarketDataClientOptions): MarketDataClient => {
  const config = parseClientConfig(options.config);
  const logger = options.logger ?? createLogger();

  const httpClient =
    options.httpClient ??
    (options.baseUrl === undefined ? null : createFetchHttpClient({ baseUrl: options.baseUrl }));
  if (!httpClient) {
    throw new ConfigError("Invalid market-data client options", [
      "either baseUrl or httpClient is required",
    ]);
  }

  const limiter = createRateLimiter({ ...toRateLimiterConfig(config.rateLimits), logger });

  const transport = createRestTransport({
    limiter,
    httpClient,
    retry: toRetryPolicy(config.retry),
    timeoutMs: config.requestTimeoutSeconds * 1000,
    getEndpointCost: options.getEndpointCost,
    circuitBreaker: options.circuitBreaker,
    logger,
  });

  const streamConfig = toStreamManagerConfig(config);
  const defaultSocketFactory = options.socketFactory ?? createWsSocketFactory();
  const streams = new Set<StreamManager>();
  let shutDown = false;

  const subscribe = (subscribeOptions: SubscribeOptions): StreamManager => {
    if (shutDown) {
      throw new LimiterClosedError("Market-data client has been shut down");
    }

    const { socketFactory, config: overrides, ...rest } = subscribeOptions;
    const manager = createStreamManager({
      ...rest,
      socketFactory: socketFactory ?? defaultSocketFactory,
      limiter,
      config: { ...streamConfig, ...overrides },
      logger,
    });

    streams.add(manager);
    const unsubscribe = manager.onStateChange((state: ConnectionState) => {
      if (state === "CLOSED") {
        streams.delete(manager);
        unsubscribe();
      }
    });

    manager.open();
    return manager;
  };

  const createSnapshotFetcher = <T>(
    fetcherConfig: Omit<RestSnapshotFetcherConfig<T>, "transport">,
  ): SnapshotFetcher => createRestSnapshotFetcher({ ...fetcherConfig, transport });

  const shutdown = (): void => {
    if (shutDown) return;
    shutDown = true;

    const open = [...streams];
    for (const manager of open) {
      manager.cancel();
    }
    streams.clear();
    limiter.close();

    logger.info("Market-data client shut down", { streamsCancelled: open.length });
  };

  return {
    execute: transport.execute,
    subscribe,
    createSnapshotFetcher,
    getStreams: () => [...streams],
    getRateLimiter: () => limiter,
    getTransport: () => transport,
    getConfig: () => config,
    shutdown,
    isShutdown: () => shutDown,
  };
};
