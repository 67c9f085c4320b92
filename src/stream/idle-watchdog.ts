/**
 * Idle watchdog for a streaming connection.
 *
 * Any inbound traffic (data, control frames, WS-level pings and pongs) counts
 * as activity. When nothing arrives for `timeoutMs` the watchdog stops itself
 * and calls `onIdle`.
 */

export interface IdleWatchdogConfig {
  timeoutMs: number;
  /** Called once per expiry with the observed idle time */
  onIdle: (idleMs: number) => void;
}

export interface IdleWatchdog {
  /** Starts (or restarts) the countdown from now */
  start(): void;
  stop(): void;
  recordActivity(): void;
  isRunning(): boolean;
  /** Time since the last activity, or null when stopped */
  getIdleMs(): number | null;
}

/**
 * Creates an idle watchdog.
 *
 * Activity only updates a timestamp; the single timer re-arms itself for the
 * remaining time when it fires early.
 *
 * @example
 * ```typescript
 * const watchdog = createIdleWatchdog({
 *   timeoutMs: 30_000,
 *   onIdle: (idleMs) => {
 *     logger.warn("Stream idle, reconnecting", { idleMs });
 *     reconnect();
 *   },
 * });
 *
 * socket.onMessage(() => watchdog.recordActivity());
 * watchdog.start();
 * ```
 */
export const createIdleWatchdog = (config: IdleWatchdogConfig): IdleWatchdog => {
  const { timeoutMs, onIdle } = config;

  let timer: NodeJS.Timeout | null = null;
  let lastActivity = 0;

  const check = (): void => {
    timer = null;
    const idleMs = Date.now() - lastActivity;

    if (idleMs >= timeoutMs) {
      onIdle(idleMs);
      return;
    }

    timer = setTimeout(check, timeoutMs - idleMs);
  };

  const stop = (): void => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const start = (): void => {
    stop();
    lastActivity = Date.now();
    timer = setTimeout(check, timeoutMs);
  };

  const recordActivity = (): void => {
    lastActivity = Date.now();
  };

  const isRunning = (): boolean => timer !== null;

  const getIdleMs = (): number | null => (timer ? Date.now() - lastActivity : null);

  return {
    start,
    stop,
    recordActivity,
    isRunning,
    getIdleMs,
  };
};
