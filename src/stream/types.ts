/**
 * Shared types for stream managers and the events they deliver.
 */

/**
 * Rate-limit scope charged for each outbound subscribe message when the
 * client's configuration declares a bucket for it.
 */
export const STREAM_SUBSCRIBE_SCOPE = "ws:subscribe";

export interface Subscription {
  channel: string;
  symbol: string;
}

/**
 * How a channel recovers from a sequence gap.
 * - resubscribe: reconnect and resubscribe (stateless channels such as trades)
 * - snapshot: fetch a REST snapshot and replay buffered deltas (order books)
 */
export type RecoveryMode = "resubscribe" | "snapshot";

export interface ChannelOptions {
  recovery?: RecoveryMode;
  /**
   * Identity of a message on a channel without sequence numbers (e.g. a trade
   * id). Repeats within the de-duplication window are dropped.
   */
  dedupeKey?: (payload: unknown) => string | undefined;
}

export interface DataEvent {
  type: "DATA";
  channel: string;
  symbol?: string;
  sequence?: number;
  payload: unknown;
  /** Epoch ms at which the frame was read from the socket */
  receivedAt: number;
}

export interface SnapshotEvent {
  type: "SNAPSHOT";
  channel: string;
  symbol?: string;
  /** Sequence the snapshot is current as of, when the exchange reports one */
  sequence?: number;
  payload: unknown;
}

export interface ResyncRequiredEvent {
  type: "RESYNC_REQUIRED";
  channel: string;
  symbol?: string;
  expectedSequence: number;
  receivedSequence: number;
}

export interface BufferOverflowEvent {
  type: "BUFFER_OVERFLOW";
  channel: string;
  /** Payload events dropped for this channel since the consumer last saw this signal */
  dropped: number;
}

export type StreamEvent = DataEvent | SnapshotEvent | ResyncRequiredEvent | BufferOverflowEvent;

/**
 * Events that carry exchange payloads; these count against the buffer's
 * capacity and are the ones dropped on overflow.
 */
export type StreamPayloadEvent = DataEvent | SnapshotEvent;

/**
 * Signals are never dropped by the event buffer, only coalesced.
 */
export type StreamSignal = ResyncRequiredEvent | BufferOverflowEvent;
