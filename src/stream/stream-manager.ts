/**
 * Stream manager: one socket, one fixed subscription set, a pull-based event
 * sequence for the caller.
 *
 * Key features:
 * - Connection state machine (see connection-state.ts) driven by socket
 *   events, timers and the caller's cancel()
 * - Exponential backoff reconnects, reset after sustained streaming
 * - Full resubscription on every connect, optionally rate-limited
 * - Per-channel sequence gap detection with resubscribe or snapshot recovery
 * - Generation ID for stale socket event detection
 * - Bounded drop-oldest event buffer between socket and consumer
 */

import { LRUCache } from "lru-cache";
import PQueue from "p-queue";

import {
  ConfigError,
  type ErrorRecord,
  LimiterClosedError,
  classifyFailure,
  classifyThrown,
} from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  type RateLimiter,
  createBackoff,
} from "@/lib/rate-limiter";

import {
  type ConnectionEvent,
  type ConnectionState,
  transitionConnection,
} from "./connection-state";
import { createEventBuffer } from "./event-buffer";
import { type FrameCodec, type InboundFrame, createJsonFrameCodec } from "./frame-codec";
import { createIdleWatchdog } from "./idle-watchdog";
import { channelKey, createSequenceTracker } from "./sequence-tracker";
import type { Snapshot, SnapshotFetcher } from "./snapshot";
import type { SocketFactory, StreamSocket } from "./socket";
import {
  type ChannelOptions,
  type DataEvent,
  STREAM_SUBSCRIBE_SCOPE,
  type StreamEvent,
  type Subscription,
} from "./types";

export { STREAM_SUBSCRIBE_SCOPE };

export interface StreamManagerConfig {
  /** Acks must arrive within this time after the last subscribe frame is sent (ms) */
  subscribeTimeoutMs: number;
  /** Reconnect when nothing arrives for this long while streaming (ms) */
  heartbeatTimeoutMs: number;
  /** Max payload events held for the consumer, and deltas held during a snapshot resync */
  bufferCapacity: number;
  reconnect: BackoffConfig;
  /** Streaming this long resets the reconnect backoff (ms) */
  sustainedStreamingMs: number;
  /** De-duplication window for unsequenced channels */
  dedupeMaxEntries: number;
  dedupeTtlMs: number;
}

export const DEFAULT_STREAM_MANAGER_CONFIG: StreamManagerConfig = {
  subscribeTimeoutMs: 10_000,
  heartbeatTimeoutMs: 30_000,
  bufferCapacity: 1000,
  reconnect: DEFAULT_BACKOFF_CONFIG,
  sustainedStreamingMs: 60_000,
  dedupeMaxEntries: 10_000,
  dedupeTtlMs: 60_000,
};

export interface StreamManagerOptions {
  /** ws:// or wss:// endpoint */
  url: string;
  subscriptions: readonly Subscription[];
  socketFactory: SocketFactory;
  /** Per-channel recovery and de-duplication; channels default to resubscribe */
  channels?: Record<string, ChannelOptions>;
  codec?: FrameCodec;
  /** Shared client limiter; each subscribe message costs 1 token */
  limiter?: RateLimiter;
  /** Limiter scope for subscribe messages (default: STREAM_SUBSCRIBE_SCOPE) */
  subscribeScope?: string;
  /** Required when any channel recovers by snapshot */
  fetchSnapshot?: SnapshotFetcher;
  config?: Partial<StreamManagerConfig>;
  logger?: Logger;
}

export interface StreamManagerMetrics {
  framesReceived: number;
  eventsDelivered: number;
  duplicatesDropped: number;
  gapsDetected: number;
  malformedFrames: number;
  reconnects: number;
  /** Data events dropped by the buffer */
  eventsDropped: number;
}

export interface StreamManager extends AsyncIterable<StreamEvent> {
  /** Starts connecting; a no-op unless DISCONNECTED */
  open(): void;
  /**
   * Pull-based event sequence. Ends after cancel() or an unrecoverable error;
   * leaving a for-await loop early cancels the manager.
   */
  events(): AsyncIterableIterator<StreamEvent>;
  /** Closes the socket, stops reconnecting and discards buffered events */
  cancel(): void;
  getState(): ConnectionState;
  getSubscriptions(): readonly Subscription[];
  /** The error that closed the manager, if it closed on its own */
  getTerminalError(): ErrorRecord | null;
  getMetrics(): StreamManagerMetrics;
  onStateChange(handler: (state: ConnectionState, previous: ConnectionState) => void): () => void;
  /** Every failure the manager observes, including ones it recovers from */
  onError(handler: (error: ErrorRecord) => void): () => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

interface Resync {
  channel: string;
  symbol?: string;
  /** Deltas held back until the snapshot lands, at most `bufferCapacity` */
  buffered: DataEvent[];
}

const validateOptions = (options: StreamManagerOptions, config: StreamManagerConfig): string[] => {
  const issues: string[] = [];

  let protocol: string | null = null;
  try {
    protocol = new URL(options.url).protocol;
  } catch {
    issues.push(`url is not a valid URL: ${options.url}`);
  }
  if (protocol !== null && protocol !== "ws:" && protocol !== "wss:") {
    issues.push(`url must use ws: or wss:, got ${protocol}`);
  }

  if (options.subscriptions.length === 0) {
    issues.push("subscriptions must not be empty");
  }
  const keys = new Set<string>();
  for (const { channel, symbol } of options.subscriptions) {
    const key = channelKey(channel, symbol);
    if (keys.has(key)) {
      issues.push(`duplicate subscription ${key}`);
    }
    keys.add(key);
  }

  for (const [channel, channelOptions] of Object.entries(options.channels ?? {})) {
    if (channelOptions.recovery === "snapshot" && !options.fetchSnapshot) {
      issues.push(`channel ${channel} recovers by snapshot but no fetchSnapshot was given`);
    }
  }

  for (const key of [
    "subscribeTimeoutMs",
    "heartbeatTimeoutMs",
    "sustainedStreamingMs",
    "dedupeTtlMs",
  ] as const) {
    if (!(config[key] > 0)) {
      issues.push(`${key} must be a positive number`);
    }
  }
  if (!Number.isInteger(config.dedupeMaxEntries) || config.dedupeMaxEntries < 1) {
    issues.push("dedupeMaxEntries must be a positive integer");
  }

  return issues;
};

/**
 * Creates a stream manager in DISCONNECTED.
 *
 * Transient failures (socket errors, closes, heartbeat and subscribe timeouts,
 * error frames, sequence gaps on resubscribe channels) lead to RECONNECTING and
 * never end the event sequence. An InvalidSymbol error frame while subscribing
 * closes the manager; getTerminalError() then returns it.
 *
 * @example
 * ```typescript
 * const manager = createStreamManager({
 *   url: "wss://stream.exchange.test/ws",
 *   subscriptions: [
 *     { channel: "trades", symbol: "BTC-USD" },
 *     { channel: "book", symbol: "BTC-USD" },
 *   ],
 *   channels: {
 *     trades: { dedupeKey: (trade) => tradeIdOf(trade) },
 *     book: { recovery: "snapshot" },
 *   },
 *   socketFactory: createWsSocketFactory(),
 *   fetchSnapshot,
 *   limiter,
 *   logger,
 * });
 *
 * manager.onStateChange((state) => logger.info("Stream state", { state }));
 * manager.open();
 *
 * for await (const event of manager) {
 *   switch (event.type) {
 *     case "DATA":
 *       applyDelta(event.payload);
 *       break;
 *     case "SNAPSHOT":
 *       replaceBook(event.payload);
 *       break;
 *     case "RESYNC_REQUIRED":
 *     case "BUFFER_OVERFLOW":
 *       markStale(event.channel);
 *       break;
 *   }
 * }
 * ```
 */
export const createStreamManager = (options: StreamManagerOptions): StreamManager => {
  const {
    url,
    socketFactory,
    channels = {},
    codec = createJsonFrameCodec(),
    limiter,
    subscribeScope = STREAM_SUBSCRIBE_SCOPE,
    fetchSnapshot,
    logger,
  } = options;
  const config: StreamManagerConfig = { ...DEFAULT_STREAM_MANAGER_CONFIG, ...options.config };

  const issues = validateOptions(options, config);
  if (issues.length > 0) {
    throw new ConfigError("Invalid stream manager options", issues);
  }

  const subscriptions: readonly Subscription[] = options.subscriptions.map((s) => ({ ...s }));

  let state: ConnectionState = "DISCONNECTED";
  let generation = 0; // Bumped on every teardown; events from older sockets are dropped
  let socket: StreamSocket | null = null;
  let terminalError: ErrorRecord | null = null;

  let reconnectTimer: NodeJS.Timeout | null = null;
  let subscribeTimer: NodeJS.Timeout | null = null;
  let sustainedTimer: NodeJS.Timeout | null = null;
  let subscribeAbort: AbortController | null = null;
  let snapshotAbort = new AbortController();

  const pendingAcks = new Map<string, Subscription>();
  const resyncs = new Map<string, Resync>();

  const stateChangeHandlers = new Set<
    (state: ConnectionState, previous: ConnectionState) => void
  >();
  const errorHandlers = new Set<(error: ErrorRecord) => void>();

  const metrics = {
    framesReceived: 0,
    eventsDelivered: 0,
    duplicatesDropped: 0,
    gapsDetected: 0,
    malformedFrames: 0,
    reconnects: 0,
  };

  const backoff = createBackoff(config.reconnect);
  const tracker = createSequenceTracker();
  const snapshotQueue = new PQueue({ concurrency: 1 });
  const dedupe = new LRUCache<string, true>({
    max: config.dedupeMaxEntries,
    ttl: config.dedupeTtlMs,
  });

  const buffer = createEventBuffer({
    capacity: config.bufferCapacity,
    onOverflow: (channel, dropped) => {
      // Once per overflow episode; the event carries the running count
      if (dropped === 1) {
        logger?.warn("Stream buffer full, dropping oldest events", { url, channel });
      }
    },
  });

  const watchdog = createIdleWatchdog({
    timeoutMs: config.heartbeatTimeoutMs,
    onIdle: (idleMs) => {
      fail(
        classifyFailure({
          timeoutOccurred: true,
          message: `No message received for ${idleMs}ms`,
        }),
      );
    },
  });

  const transition = (event: ConnectionEvent): boolean => {
    const result = transitionConnection(state, event);
    if (!result.ok) {
      logger?.debug("Ignored connection event", { url, event, error: result.error });
      return false;
    }

    const previous = state;
    state = result.state;
    logger?.info("Stream state changed", { url, from: result.from, to: result.to });

    for (const handler of stateChangeHandlers) {
      handler(state, previous);
    }
    return true;
  };

  const emitError = (error: ErrorRecord): void => {
    for (const handler of errorHandlers) {
      handler(error);
    }
  };

  const clearTimer = (timer: NodeJS.Timeout | null): null => {
    if (timer) {
      clearTimeout(timer);
    }
    return null;
  };

  /**
   * Drops the current connection: later events from its socket, limiter
   * acquisitions and snapshot fetches are ignored.
   */
  const teardown = (): void => {
    generation++;

    reconnectTimer = clearTimer(reconnectTimer);
    subscribeTimer = clearTimer(subscribeTimer);
    sustainedTimer = clearTimer(sustainedTimer);
    watchdog.stop();

    subscribeAbort?.abort();
    subscribeAbort = null;
    snapshotAbort.abort();
    snapshotAbort = new AbortController();
    snapshotQueue.clear();

    pendingAcks.clear();
    resyncs.clear();

    const closing = socket;
    socket = null;
    closing?.close(1000);
  };

  const scheduleReconnect = (reason: string): void => {
    teardown();
    if (!transition("FAILURE")) return;

    const delayMs = backoff.nextDelayMs();
    metrics.reconnects++;
    logger?.info("Reconnecting stream", { url, reason, attempt: backoff.getAttempt(), delayMs });

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      if (transition("BACKOFF_ELAPSED")) {
        connect();
      }
    }, delayMs);
  };

  /**
   * Reports a recoverable failure and reconnects.
   */
  const fail = (error: ErrorRecord): void => {
    if (state === "CLOSED") return;

    logger?.warn("Stream connection failed", {
      url,
      state,
      kind: error.kind,
      message: error.message,
    });
    emitError(error);
    scheduleReconnect(error.message);
  };

  /**
   * Closes the manager on an unrecoverable error. Events already buffered are
   * still delivered.
   */
  const terminate = (error: ErrorRecord): void => {
    if (state === "CLOSED") return;

    terminalError = error;
    logger?.error("Stream closed on unrecoverable error", undefined, {
      url,
      kind: error.kind,
      message: error.message,
      symbol: error.symbol,
    });
    emitError(error);
    teardown();
    transition("FATAL");
    buffer.close();
  };

  const send = (text: string): void => {
    socket?.send(text);
  };

  /**
   * Acks are awaited from the last subscribe frame on, so a large set paced by
   * the limiter is not timed out while it is still being sent.
   */
  const armSubscribeTimeout = (): void => {
    if (state !== "SUBSCRIBING" || pendingAcks.size === 0) return;

    subscribeTimer = setTimeout(() => {
      subscribeTimer = null;
      const unacked = [...pendingAcks.keys()].join(", ");
      const timeoutMs = config.subscribeTimeoutMs;
      fail(
        classifyFailure({
          timeoutOccurred: true,
          message: `Subscriptions not acknowledged within ${timeoutMs}ms: ${unacked}`,
        }),
      );
    }, config.subscribeTimeoutMs);
  };

  const sendSubscriptions = async (current: number): Promise<void> => {
    const controller = new AbortController();
    subscribeAbort = controller;

    try {
      for (const subscription of subscriptions) {
        if (limiter) {
          await limiter.acquire(subscribeScope, 1, { signal: controller.signal });
        }
        if (current !== generation) return;
        send(codec.encodeSubscribe(subscription));
      }
      if (current === generation) {
        armSubscribeTimeout();
      }
    } catch (error) {
      if (current !== generation) return;
      if (error instanceof LimiterClosedError) {
        logger?.info("Rate limiter closed, cancelling stream", { url });
        cancel();
        return;
      }
      fail(classifyThrown(error));
    }
  };

  const enterSubscribing = (current: number): void => {
    if (!transition("SOCKET_OPENED")) return;

    // Sequences from a previous session mean nothing on this one
    tracker.reset();
    for (const subscription of subscriptions) {
      pendingAcks.set(channelKey(subscription.channel, subscription.symbol), subscription);
    }

    void sendSubscriptions(current);
  };

  const enterStreaming = (): void => {
    subscribeTimer = clearTimer(subscribeTimer);
    if (!transition("SUBSCRIBED")) return;

    watchdog.start();
    sustainedTimer = setTimeout(() => {
      sustainedTimer = null;
      if (backoff.getAttempt() > 0) {
        logger?.debug("Stream stable, resetting reconnect backoff", { url });
      }
      backoff.reset();
    }, config.sustainedStreamingMs);
  };

  const handleAck = (frame: Extract<InboundFrame, { type: "ack" }>): void => {
    if (state !== "SUBSCRIBING") return;

    if (frame.symbol === undefined) {
      // A channel-level ack covers every symbol on that channel
      for (const [key, subscription] of pendingAcks) {
        if (subscription.channel === frame.channel) {
          pendingAcks.delete(key);
        }
      }
    } else {
      pendingAcks.delete(channelKey(frame.channel, frame.symbol));
    }

    if (pendingAcks.size === 0) {
      enterStreaming();
    }
  };

  const handleErrorFrame = (frame: Extract<InboundFrame, { type: "error" }>): void => {
    const error = classifyFailure({
      exchangePayload:
        frame.code === undefined ? frame.message : { code: frame.code, message: frame.message },
      symbol: frame.symbol,
    });

    if (state === "SUBSCRIBING" && error.kind === "InvalidSymbol") {
      terminate(error);
      return;
    }
    fail(error);
  };

  const deliver = (event: StreamEvent): void => {
    metrics.eventsDelivered++;
    buffer.push(event);
  };

  const completeResync = (key: string, current: number, snapshot: Snapshot): void => {
    const resync = resyncs.get(key);
    if (current !== generation || !resync) return;
    resyncs.delete(key);

    deliver({
      type: "SNAPSHOT",
      channel: resync.channel,
      symbol: resync.symbol,
      sequence: snapshot.sequence,
      payload: snapshot.payload,
    });

    if (snapshot.sequence === undefined) {
      tracker.delete(key);
    } else {
      tracker.set(key, snapshot.sequence);
    }

    logger?.info("Snapshot resync complete", {
      url,
      channel: resync.channel,
      symbol: resync.symbol,
      sequence: snapshot.sequence,
      replayed: resync.buffered.length,
    });

    for (const event of resync.buffered) {
      handleData(event);
    }
  };

  const startSnapshotResync = (key: string, event: DataEvent): void => {
    if (!fetchSnapshot) return;

    const current = generation;
    const { signal } = snapshotAbort;
    const target = { channel: event.channel, symbol: event.symbol };
    resyncs.set(key, { ...target, buffered: [event] });

    void snapshotQueue
      .add(async () => {
        if (signal.aborted) return;

        const result = await fetchSnapshot(target, signal);
        if (current !== generation) return;

        if (result.ok) {
          completeResync(key, current, result.value);
          return;
        }

        logger?.warn("Snapshot fetch failed, resubscribing", {
          url,
          channel: target.channel,
          symbol: target.symbol,
          kind: result.error.kind,
        });
        fail(result.error);
      })
      .catch((error: unknown) => {
        if (signal.aborted || current !== generation) return;
        fail(classifyThrown(error, { symbol: target.symbol }));
      });
  };

  const handleGap = (
    key: string,
    event: DataEvent,
    expectedSequence: number,
    receivedSequence: number,
  ): void => {
    metrics.gapsDetected++;
    const recovery = channels[event.channel]?.recovery ?? "resubscribe";

    deliver({
      type: "RESYNC_REQUIRED",
      channel: event.channel,
      symbol: event.symbol,
      expectedSequence,
      receivedSequence,
    });
    logger?.warn("Sequence gap detected", {
      url,
      channel: event.channel,
      symbol: event.symbol,
      expectedSequence,
      receivedSequence,
      recovery,
    });

    if (recovery === "snapshot") {
      startSnapshotResync(key, event);
    } else {
      scheduleReconnect(`Sequence gap on ${key}`);
    }
  };

  /**
   * Applies duplicate filtering and gap detection, then delivers.
   */
  const handleData = (event: DataEvent): void => {
    const key = channelKey(event.channel, event.symbol);

    if (event.sequence !== undefined) {
      const resync = resyncs.get(key);
      if (resync) {
        if (resync.buffered.length >= config.bufferCapacity) {
          // Too far behind to replay; start over with a fresh session
          fail(
            classifyFailure({
              message: `Snapshot resync on ${key} exceeded ${config.bufferCapacity} held deltas`,
              symbol: event.symbol,
            }),
          );
          return;
        }
        resync.buffered.push(event);
        return;
      }

      const check = tracker.check(key, event.sequence);
      if (check.status === "duplicate") {
        metrics.duplicatesDropped++;
        return;
      }
      if (check.status === "gap") {
        handleGap(key, event, check.expected, check.received);
        return;
      }
    } else {
      const id = channels[event.channel]?.dedupeKey?.(event.payload);
      if (id !== undefined) {
        const dedupeId = `${key}|${id}`;
        if (dedupe.has(dedupeId)) {
          metrics.duplicatesDropped++;
          return;
        }
        dedupe.set(dedupeId, true);
      }
    }

    deliver(event);
  };

  const reportMalformed = (description: string): void => {
    metrics.malformedFrames++;
    const error = classifyFailure({ malformed: true, message: `Malformed frame: ${description}` });
    logger?.warn("Stream frame did not match the expected wire format", {
      url,
      message: error.message,
    });
    emitError(error);
  };

  const handleMessage = (text: string): void => {
    const receivedAt = Date.now();
    metrics.framesReceived++;
    watchdog.recordActivity();

    const decoded = codec.decode(text);
    if (!decoded.ok) {
      reportMalformed(decoded.error);
      return;
    }

    const frame = decoded.value;
    switch (frame.type) {
      case "ping": {
        const pong = codec.encodePong(frame);
        if (pong !== null) {
          send(pong);
        }
        return;
      }
      case "ack":
        handleAck(frame);
        return;
      case "error":
        handleErrorFrame(frame);
        return;
      case "data":
        if (state !== "SUBSCRIBING" && state !== "STREAMING") return;
        handleData({
          type: "DATA",
          channel: frame.channel,
          symbol: frame.symbol,
          sequence: frame.sequence,
          payload: frame.payload,
          receivedAt,
        });
        return;
    }
  };

  const connect = (): void => {
    const current = generation;
    const live = (): boolean => current === generation && state !== "CLOSED";

    try {
      socket = socketFactory(url, {
        onOpen: () => {
          if (live()) enterSubscribing(current);
        },
        onMessage: (text) => {
          if (live()) handleMessage(text);
        },
        onActivity: () => {
          if (live()) watchdog.recordActivity();
        },
        onClose: (code, reason) => {
          if (live()) fail(classifyFailure({ wsCloseCode: code, message: reason || undefined }));
        },
        onError: (error) => {
          if (live()) fail(classifyThrown(error));
        },
      });
    } catch (error) {
      fail(classifyThrown(error));
    }
  };

  const open = (): void => {
    if (state !== "DISCONNECTED") return;
    transition("OPEN");
    connect();
  };

  const cancel = (): void => {
    if (state === "CLOSED") return;

    teardown();
    transition("CANCEL");
    buffer.clear();
    buffer.close();
    logger?.info("Stream cancelled", { url });
  };

  const events = (): AsyncIterableIterator<StreamEvent> => {
    const iterator: AsyncIterableIterator<StreamEvent> = {
      next: () => buffer.next(),
      return: () => {
        cancel();
        return Promise.resolve(DONE);
      },
      [Symbol.asyncIterator]: () => iterator,
    };
    return iterator;
  };

  const onStateChange = (
    handler: (state: ConnectionState, previous: ConnectionState) => void,
  ): (() => void) => {
    stateChangeHandlers.add(handler);
    return () => {
      stateChangeHandlers.delete(handler);
    };
  };

  const onError = (handler: (error: ErrorRecord) => void): (() => void) => {
    errorHandlers.add(handler);
    return () => {
      errorHandlers.delete(handler);
    };
  };

  return {
    open,
    events,
    [Symbol.asyncIterator]: events,
    cancel,
    getState: () => state,
    getSubscriptions: () => subscriptions,
    getTerminalError: () => terminalError,
    getMetrics: () => ({ ...metrics, eventsDropped: buffer.getDroppedCount() }),
    onStateChange,
    onError,
  };
};
