/**
 * Connection state machine for stream managers.
 *
 * DISCONNECTED -> CONNECTING -> SUBSCRIBING -> STREAMING
 *                     ^              |            |
 *                     |              v            v
 *                     +------- RECONNECTING <-----+
 *
 * Any state moves to CLOSED on cancel (or an unrecoverable error); CLOSED is
 * terminal.
 */

export type ConnectionState =
  | "DISCONNECTED"
  | "CONNECTING"
  | "SUBSCRIBING"
  | "STREAMING"
  | "RECONNECTING"
  | "CLOSED";

export type ConnectionEvent =
  | "OPEN"
  | "SOCKET_OPENED"
  | "SUBSCRIBED"
  | "FAILURE"
  | "BACKOFF_ELAPSED"
  | "FATAL"
  | "CANCEL";

/**
 * Result type for state machine transitions.
 */
export type TransitionResult<T> =
  | { ok: true; state: T; from: string; to: string }
  | { ok: false; error: string };

/**
 * Valid transitions from each state, keyed by the event that drives them.
 */
export const CONNECTION_TRANSITIONS: Record<
  ConnectionState,
  Partial<Record<ConnectionEvent, ConnectionState>>
> = {
  DISCONNECTED: { OPEN: "CONNECTING", FATAL: "CLOSED", CANCEL: "CLOSED" },
  CONNECTING: {
    SOCKET_OPENED: "SUBSCRIBING",
    FAILURE: "RECONNECTING",
    FATAL: "CLOSED",
    CANCEL: "CLOSED",
  },
  SUBSCRIBING: {
    SUBSCRIBED: "STREAMING",
    FAILURE: "RECONNECTING",
    FATAL: "CLOSED",
    CANCEL: "CLOSED",
  },
  STREAMING: { FAILURE: "RECONNECTING", FATAL: "CLOSED", CANCEL: "CLOSED" },
  RECONNECTING: { BACKOFF_ELAPSED: "CONNECTING", FATAL: "CLOSED", CANCEL: "CLOSED" },
  CLOSED: {}, // Terminal state
};

export const isTerminalConnectionState = (state: ConnectionState): boolean =>
  state === "CLOSED";

/**
 * Applies an event to a connection state.
 *
 * @returns The next state, or an error when the event is not valid in `state`
 */
export const transitionConnection = (
  state: ConnectionState,
  event: ConnectionEvent,
): TransitionResult<ConnectionState> => {
  if (isTerminalConnectionState(state)) {
    return { ok: false, error: `Cannot transition from terminal state: ${state}` };
  }

  const next = CONNECTION_TRANSITIONS[state][event];
  if (next === undefined) {
    return { ok: false, error: `Invalid transition: ${state} --${event}-->` };
  }

  return { ok: true, state: next, from: state, to: next };
};
