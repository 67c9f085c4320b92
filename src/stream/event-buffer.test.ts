import { describe, expect, it, vi } from "vitest";

import { ConfigError } from "@/lib/errors";

import { createEventBuffer } from "./event-buffer";
import type { DataEvent, ResyncRequiredEvent, SnapshotEvent } from "./types";

const data = (channel: string, payload: unknown): DataEvent => ({
  type: "DATA",
  channel,
  payload,
  receivedAt: 0,
});

const delta = (symbol: string, sequence: number): DataEvent => ({
  type: "DATA",
  channel: "book",
  symbol,
  sequence,
  payload: { sequence },
  receivedAt: 0,
});

const snapshot = (symbol: string, sequence: number): SnapshotEvent => ({
  type: "SNAPSHOT",
  channel: "book",
  symbol,
  sequence,
  payload: { bids: [], asks: [] },
});

const resync = (
  expectedSequence: number,
  receivedSequence: number,
  symbol?: string,
): ResyncRequiredEvent => ({
  type: "RESYNC_REQUIRED",
  channel: "book",
  symbol,
  expectedSequence,
  receivedSequence,
});

describe("createEventBuffer", () => {
  it("should reject a non-positive capacity", () => {
    expect(() => createEventBuffer({ capacity: 0 })).toThrow(ConfigError);
    expect(() => createEventBuffer({ capacity: 1.5 })).toThrow(
      "Event buffer capacity must be a positive integer, got 1.5",
    );
  });

  it("should deliver events in push order", async () => {
    const buffer = createEventBuffer({ capacity: 10 });
    buffer.push(data("trades", 1));
    buffer.push(data("trades", 2));

    expect(await buffer.next()).toEqual({ done: false, value: data("trades", 1) });
    expect(await buffer.next()).toEqual({ done: false, value: data("trades", 2) });
    expect(buffer.size()).toBe(0);
  });

  it("should hand events straight to a waiting consumer", async () => {
    const buffer = createEventBuffer({ capacity: 10 });
    const pending = buffer.next();

    buffer.push(data("trades", 1));

    expect(await pending).toEqual({ done: false, value: data("trades", 1) });
    expect(buffer.size()).toBe(0);
  });

  describe("overflow", () => {
    it("should drop the oldest data event and queue one coalesced signal", async () => {
      const onOverflow = vi.fn();
      const buffer = createEventBuffer({ capacity: 2, onOverflow });

      for (const n of [1, 2, 3, 4]) {
        buffer.push(data("trades", n));
      }

      expect(onOverflow.mock.calls).toEqual([
        ["trades", 1],
        ["trades", 2],
      ]);
      expect(buffer.getDroppedCount()).toBe(2);
      expect(await buffer.next()).toEqual({
        done: false,
        value: { type: "BUFFER_OVERFLOW", channel: "trades", dropped: 2 },
      });
      expect(await buffer.next()).toEqual({ done: false, value: data("trades", 3) });
      expect(await buffer.next()).toEqual({ done: false, value: data("trades", 4) });
    });

    it("should keep one signal per channel", async () => {
      const buffer = createEventBuffer({ capacity: 1 });

      buffer.push(data("trades", 1));
      buffer.push(data("book", 2));
      buffer.push(data("book", 3));

      expect(await buffer.next()).toEqual({
        done: false,
        value: { type: "BUFFER_OVERFLOW", channel: "book", dropped: 1 },
      });
      expect(await buffer.next()).toEqual({
        done: false,
        value: { type: "BUFFER_OVERFLOW", channel: "trades", dropped: 1 },
      });
      expect(await buffer.next()).toEqual({ done: false, value: data("book", 3) });
    });

    it("should never drop signals", async () => {
      const buffer = createEventBuffer({ capacity: 1 });
      const resync = {
        type: "RESYNC_REQUIRED",
        channel: "book",
        expectedSequence: 101,
        receivedSequence: 105,
      } as const;

      buffer.push(resync);
      buffer.push(data("book", 1));
      buffer.push(data("book", 2));

      expect(buffer.size()).toBe(3);
      expect((await buffer.next()).value).toEqual({
        type: "BUFFER_OVERFLOW",
        channel: "book",
        dropped: 1,
      });
      expect((await buffer.next()).value).toEqual(resync);
      expect((await buffer.next()).value).toEqual(data("book", 2));
    });

    it("should start a new signal once the previous one was pulled", async () => {
      const buffer = createEventBuffer({ capacity: 1 });
      buffer.push(data("trades", 1));
      buffer.push(data("trades", 2));
      await buffer.next();

      buffer.push(data("trades", 3));

      expect((await buffer.next()).value).toEqual({
        type: "BUFFER_OVERFLOW",
        channel: "trades",
        dropped: 1,
      });
      expect((await buffer.next()).value).toEqual(data("trades", 3));
    });
  });

  describe("snapshots", () => {
    it("should count snapshots against capacity", async () => {
      const buffer = createEventBuffer({ capacity: 2 });

      for (let i = 0; i < 100; i++) {
        buffer.push(snapshot(`SYM${i}`, i));
      }

      expect(buffer.payloadSize()).toBe(2);
      expect(buffer.size()).toBe(3);
      expect(buffer.getDroppedCount()).toBe(98);
      expect((await buffer.next()).value).toEqual({
        type: "BUFFER_OVERFLOW",
        channel: "book",
        dropped: 98,
      });
      expect((await buffer.next()).value).toEqual(snapshot("SYM98", 98));
      expect((await buffer.next()).value).toEqual(snapshot("SYM99", 99));
    });

    it("should keep only the newest snapshot of a book", async () => {
      const buffer = createEventBuffer({ capacity: 2 });

      for (let i = 1; i <= 100; i++) {
        buffer.push(snapshot("BTC-USD", i));
      }

      expect(buffer.size()).toBe(1);
      expect(buffer.getDroppedCount()).toBe(0);
      expect((await buffer.next()).value).toEqual(snapshot("BTC-USD", 100));
    });

    it("should drop data before snapshots on overflow", async () => {
      const buffer = createEventBuffer({ capacity: 2 });

      buffer.push(snapshot("BTC-USD", 10));
      buffer.push(delta("ETH-USD", 5));
      buffer.push(delta("ETH-USD", 6));

      expect((await buffer.next()).value).toEqual({
        type: "BUFFER_OVERFLOW",
        channel: "book",
        dropped: 1,
      });
      expect((await buffer.next()).value).toEqual(snapshot("BTC-USD", 10));
      expect((await buffer.next()).value).toEqual(delta("ETH-USD", 6));
    });

    it("should drop superseded deltas and merge their resync signals", async () => {
      const buffer = createEventBuffer({ capacity: 10 });
      const trade = data("trades", 1);

      buffer.push(resync(1, 5, "BTC-USD"));
      buffer.push(snapshot("BTC-USD", 10));
      buffer.push(delta("BTC-USD", 11));
      buffer.push(trade);
      buffer.push(resync(12, 15, "BTC-USD"));
      buffer.push(snapshot("BTC-USD", 20));

      expect(buffer.size()).toBe(3);
      expect(buffer.payloadSize()).toBe(2);
      expect((await buffer.next()).value).toEqual(resync(1, 15, "BTC-USD"));
      expect((await buffer.next()).value).toEqual(trade);
      expect((await buffer.next()).value).toEqual(snapshot("BTC-USD", 20));
    });
  });

  describe("resync signals", () => {
    it("should merge resyncs once the data between them is dropped", async () => {
      const buffer = createEventBuffer({ capacity: 1 });

      buffer.push(resync(1, 3));
      buffer.push(data("book", 1));
      buffer.push(resync(4, 6));
      expect(buffer.size()).toBe(3);

      buffer.push(data("book", 2));

      expect(buffer.size()).toBe(3);
      expect((await buffer.next()).value).toEqual({
        type: "BUFFER_OVERFLOW",
        channel: "book",
        dropped: 1,
      });
      expect((await buffer.next()).value).toEqual(resync(1, 6));
      expect((await buffer.next()).value).toEqual(data("book", 2));
    });

    it("should keep resyncs apart when data lies between them", async () => {
      const buffer = createEventBuffer({ capacity: 10 });

      buffer.push(resync(1, 3));
      buffer.push(data("book", 1));
      buffer.push(resync(4, 6));

      expect(buffer.size()).toBe(3);
      expect((await buffer.next()).value).toEqual(resync(1, 3));
    });
  });

  describe("close", () => {
    it("should resolve waiting consumers as done", async () => {
      const buffer = createEventBuffer({ capacity: 10 });
      const pending = buffer.next();

      buffer.close();

      expect(await pending).toEqual({ done: true, value: undefined });
      expect(buffer.isClosed()).toBe(true);
    });

    it("should drain queued events before reporting done", async () => {
      const buffer = createEventBuffer({ capacity: 10 });
      buffer.push(data("trades", 1));

      buffer.close();
      buffer.push(data("trades", 2));

      expect(await buffer.next()).toEqual({ done: false, value: data("trades", 1) });
      expect(await buffer.next()).toEqual({ done: true, value: undefined });
    });

    it("should report done at once after clear and close", async () => {
      const buffer = createEventBuffer({ capacity: 10 });
      buffer.push(data("trades", 1));

      buffer.clear();
      buffer.close();

      expect(buffer.size()).toBe(0);
      expect(await buffer.next()).toEqual({ done: true, value: undefined });
    });
  });
});
