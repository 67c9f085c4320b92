/**
 * Per-channel sequence tracking for gap and duplicate detection.
 *
 * Keys are `channel:symbol`, or `channel` when frames carry no symbol. A key
 * with no recorded sequence accepts whatever arrives first.
 */

export type SequenceCheck =
  | { status: "accept" }
  | { status: "duplicate"; last: number }
  | { status: "gap"; expected: number; received: number };

export interface SequenceTracker {
  /**
   * Checks `sequence` against the last one seen for `key` and advances the
   * high-water mark on accept and on gap.
   */
  check(key: string, sequence: number): SequenceCheck;
  /** Last sequence seen for `key`, if any */
  get(key: string): number | undefined;
  /** Sets the high-water mark, e.g. to the sequence a snapshot is current as of */
  set(key: string, sequence: number): void;
  /** Forgets `key`; its next sequence is accepted as-is */
  delete(key: string): void;
  /** Forgets every key (called on each reconnect) */
  reset(): void;
  size(): number;
}

export const channelKey = (channel: string, symbol?: string): string =>
  symbol === undefined ? channel : `${channel}:${symbol}`;

export const createSequenceTracker = (): SequenceTracker => {
  const lastSeen = new Map<string, number>();

  const check = (key: string, sequence: number): SequenceCheck => {
    const last = lastSeen.get(key);

    if (last === undefined || sequence === last + 1) {
      lastSeen.set(key, sequence);
      return { status: "accept" };
    }

    if (sequence <= last) {
      return { status: "duplicate", last };
    }

    // Jump ahead so frames up to `sequence` count as duplicates until resync
    lastSeen.set(key, sequence);
    return { status: "gap", expected: last + 1, received: sequence };
  };

  return {
    check,
    get: (key) => lastSeen.get(key),
    set: (key, sequence) => {
      lastSeen.set(key, sequence);
    },
    delete: (key) => {
      lastSeen.delete(key);
    },
    reset: () => {
      lastSeen.clear();
    },
    size: () => lastSeen.size,
  };
};
