/**
 * Socket abstraction used by stream managers, with a `ws` implementation.
 */

import WebSocket from "ws";

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  /** WS-level ping or pong received */
  onActivity(): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface StreamSocket {
  send(text: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Opens a socket to `url`. Handlers fire until the socket closes; callers
 * ignore events from sockets they have replaced.
 */
export type SocketFactory = (url: string, handlers: SocketHandlers) => StreamSocket;

export interface WsSocketFactoryOptions {
  protocols?: string[];
  headers?: Record<string, string>;
  /** Send a WS-level ping this often while open (0 disables) */
  pingIntervalMs?: number;
}

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
};

/**
 * Creates a SocketFactory backed by the `ws` package.
 *
 * @example
 * ```typescript
 * const socketFactory = createWsSocketFactory({ pingIntervalMs: 15_000 });
 * const manager = createStreamManager({ url, subscriptions, socketFactory, config });
 * ```
 */
export const createWsSocketFactory = (options: WsSocketFactoryOptions = {}): SocketFactory => {
  const { protocols, headers, pingIntervalMs = 0 } = options;

  return (url, handlers) => {
    const ws = new WebSocket(url, protocols, { headers });
    let pingTimer: NodeJS.Timeout | null = null;

    const stopPing = (): void => {
      if (pingTimer) {
        clearInterval(pingTimer);
        pingTimer = null;
      }
    };

    ws.on("open", () => {
      if (pingIntervalMs > 0) {
        pingTimer = setInterval(() => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.ping();
          }
        }, pingIntervalMs);
      }
      handlers.onOpen();
    });
    ws.on("message", (data: WebSocket.RawData) => {
      handlers.onMessage(rawDataToString(data));
    });
    ws.on("ping", () => handlers.onActivity());
    ws.on("pong", () => handlers.onActivity());
    ws.on("close", (code: number, reason: Buffer) => {
      stopPing();
      handlers.onClose(code, reason.toString("utf-8"));
    });
    ws.on("error", (error: Error) => {
      handlers.onError(error);
    });

    return {
      send: (text) => {
        ws.send(text);
      },
      close: (code = 1000, reason = "") => {
        stopPing();
        // Listeners stay attached: closing while CONNECTING emits an error
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
          ws.close(code, reason);
        }
      },
    };
  };
};
