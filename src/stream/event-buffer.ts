/**
 * Bounded, pull-based event buffer between a socket and its consumer.
 *
 * Holds at most `capacity` payload events (DATA and SNAPSHOT). When one
 * arrives at capacity the oldest queued data event is dropped, or the oldest
 * snapshot when only snapshots are queued, and a BUFFER_OVERFLOW signal for its
 * channel is put at the front of the queue; further drops on that channel
 * increase the signal's count until the consumer pulls it.
 *
 * A snapshot supersedes the queued snapshot of the same channel and symbol,
 * together with the deltas queued after it. Signals are never dropped, but
 * RESYNC_REQUIRED signals of one key with no payload between them are merged,
 * so the queue stays within `capacity` plus a few signals per key.
 */

import { ConfigError } from "@/lib/errors";

import { channelKey } from "./sequence-tracker";
import type { ResyncRequiredEvent, StreamEvent, StreamPayloadEvent } from "./types";

export interface EventBufferConfig {
  capacity: number;
  /** Called on every drop with the channel's coalesced count */
  onOverflow?: (channel: string, dropped: number) => void;
}

export interface EventBuffer {
  /** Queues an event, or hands it straight to a waiting consumer. Ignored once closed. */
  push(event: StreamEvent): void;
  /** Next event; resolves `done` once the buffer is closed and drained */
  next(): Promise<IteratorResult<StreamEvent, undefined>>;
  /** Refuses further events; queued events are still delivered */
  close(): void;
  /** Drops every queued event */
  clear(): void;
  size(): number;
  /** Payload events queued, the count held to `capacity` */
  payloadSize(): number;
  /** Total payload events dropped on overflow since creation */
  getDroppedCount(): number;
  isClosed(): boolean;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

const isPayload = (event: StreamEvent): event is StreamPayloadEvent =>
  event.type === "DATA" || event.type === "SNAPSHOT";

/** Channel and symbol an event belongs to; overflow signals are per channel only */
const keyOf = (event: StreamEvent): string | null =>
  event.type === "BUFFER_OVERFLOW" ? null : channelKey(event.channel, event.symbol);

export const createEventBuffer = (config: EventBufferConfig): EventBuffer => {
  const { capacity, onOverflow } = config;

  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new ConfigError(`Event buffer capacity must be a positive integer, got ${capacity}`);
  }

  const queue: StreamEvent[] = [];
  const waiters: Array<(result: IteratorResult<StreamEvent, undefined>) => void> = [];
  let payloadCount = 0;
  let droppedCount = 0;
  let closed = false;

  /**
   * Merges each run of RESYNC_REQUIRED signals for `key` that has no payload
   * of that key between them into its first signal.
   */
  const mergeResyncs = (key: string): void => {
    let open: { index: number; event: ResyncRequiredEvent } | null = null;

    for (let i = 0; i < queue.length; i++) {
      const event = queue[i];
      if (!event || keyOf(event) !== key) continue;

      if (event.type !== "RESYNC_REQUIRED") {
        open = null;
        continue;
      }
      if (!open) {
        open = { index: i, event };
        continue;
      }

      const merged: ResyncRequiredEvent = { ...open.event, receivedSequence: event.receivedSequence };
      queue[open.index] = merged;
      open = { index: open.index, event: merged };
      queue.splice(i, 1);
      i--;
    }
  };

  /**
   * Bumps the channel's pending overflow signal, or queues a new one ahead of
   * everything else.
   */
  const recordDrop = (channel: string): number => {
    for (const [i, queued] of queue.entries()) {
      if (queued.type === "BUFFER_OVERFLOW" && queued.channel === channel) {
        const dropped = queued.dropped + 1;
        queue[i] = { ...queued, dropped };
        return dropped;
      }
    }
    queue.unshift({ type: "BUFFER_OVERFLOW", channel, dropped: 1 });
    return 1;
  };

  const dropOldestPayload = (): void => {
    let index = queue.findIndex((queued) => queued.type === "DATA");
    if (index === -1) {
      index = queue.findIndex((queued) => queued.type === "SNAPSHOT");
    }
    const oldest = queue[index];
    if (index === -1 || !oldest || !isPayload(oldest)) return;
    queue.splice(index, 1);

    payloadCount--;
    droppedCount++;
    const dropped = recordDrop(oldest.channel);
    onOverflow?.(oldest.channel, dropped);
    mergeResyncs(channelKey(oldest.channel, oldest.symbol));
  };

  /** Removes the queued snapshot for `key` and the deltas queued after it */
  const supersedeSnapshot = (key: string): void => {
    let start = -1;
    for (let i = queue.length - 1; i >= 0; i--) {
      const queued = queue[i];
      if (queued?.type === "SNAPSHOT" && keyOf(queued) === key) {
        start = i;
        break;
      }
    }
    if (start === -1) return;

    for (let i = queue.length - 1; i >= start; i--) {
      const queued = queue[i];
      if (queued && isPayload(queued) && keyOf(queued) === key) {
        queue.splice(i, 1);
        payloadCount--;
      }
    }
    mergeResyncs(key);
  };

  const enqueue = (event: StreamEvent): void => {
    const key = keyOf(event);

    if (event.type === "SNAPSHOT" && key !== null) {
      supersedeSnapshot(key);
    }

    if (isPayload(event)) {
      if (payloadCount >= capacity) {
        dropOldestPayload();
      }
      payloadCount++;
    }
    queue.push(event);

    if (event.type === "RESYNC_REQUIRED" && key !== null) {
      mergeResyncs(key);
    }
  };

  const push = (event: StreamEvent): void => {
    if (closed) return;

    // Waiters only exist while the queue is empty
    const waiter = waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
      return;
    }

    enqueue(event);
  };

  const next = (): Promise<IteratorResult<StreamEvent, undefined>> => {
    const event = queue.shift();
    if (event) {
      if (isPayload(event)) {
        payloadCount--;
      }
      return Promise.resolve({ done: false, value: event });
    }

    if (closed) {
      return Promise.resolve(DONE);
    }

    return new Promise((resolve) => {
      waiters.push(resolve);
    });
  };

  const close = (): void => {
    if (closed) return;
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter(DONE);
    }
  };

  const clear = (): void => {
    queue.length = 0;
    payloadCount = 0;
  };

  return {
    push,
    next,
    close,
    clear,
    size: () => queue.length,
    payloadSize: () => payloadCount,
    getDroppedCount: () => droppedCount,
    isClosed: () => closed,
  };
};
