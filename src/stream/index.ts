export {
  CONNECTION_TRANSITIONS,
  isTerminalConnectionState,
  transitionConnection,
  type ConnectionEvent,
  type ConnectionState,
  type TransitionResult,
} from "./connection-state";

export { createEventBuffer, type EventBuffer, type EventBufferConfig } from "./event-buffer";

export {
  createJsonFrameCodec,
  type FrameCodec,
  type InboundFrame,
  type PingFrame,
} from "./frame-codec";

export { createIdleWatchdog, type IdleWatchdog, type IdleWatchdogConfig } from "./idle-watchdog";

export {
  channelKey,
  createSequenceTracker,
  type SequenceCheck,
  type SequenceTracker,
} from "./sequence-tracker";

export {
  createRestSnapshotFetcher,
  type RestSnapshotFetcherConfig,
  type Snapshot,
  type SnapshotFetcher,
  type SnapshotTarget,
} from "./snapshot";

export {
  createWsSocketFactory,
  type SocketFactory,
  type SocketHandlers,
  type StreamSocket,
  type WsSocketFactoryOptions,
} from "./socket";

export {
  createStreamManager,
  DEFAULT_STREAM_MANAGER_CONFIG,
  type StreamManager,
  type StreamManagerConfig,
  type StreamManagerMetrics,
  type StreamManagerOptions,
} from "./stream-manager";

export {
  STREAM_SUBSCRIBE_SCOPE,
  type BufferOverflowEvent,
  type ChannelOptions,
  type DataEvent,
  type RecoveryMode,
  type ResyncRequiredEvent,
  type SnapshotEvent,
  type StreamEvent,
  type StreamPayloadEvent,
  type StreamSignal,
  type Subscription,
} from "./types";
