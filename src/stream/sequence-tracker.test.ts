import { describe, expect, it } from "vitest";

import { channelKey, createSequenceTracker } from "./sequence-tracker";

describe("channelKey", () => {
  it("should combine channel and symbol", () => {
    expect(channelKey("book", "BTC-USD")).toBe("book:BTC-USD");
    expect(channelKey("heartbeat")).toBe("heartbeat");
  });
});

describe("createSequenceTracker", () => {
  it("should accept the first sequence on a key", () => {
    const tracker = createSequenceTracker();

    expect(tracker.check("book:BTC-USD", 100)).toEqual({ status: "accept" });
    expect(tracker.get("book:BTC-USD")).toBe(100);
  });

  it("should accept consecutive sequences", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);

    expect(tracker.check("book:BTC-USD", 101)).toEqual({ status: "accept" });
    expect(tracker.check("book:BTC-USD", 102)).toEqual({ status: "accept" });
    expect(tracker.get("book:BTC-USD")).toBe(102);
  });

  it("should report repeats and older sequences as duplicates", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);

    expect(tracker.check("book:BTC-USD", 100)).toEqual({ status: "duplicate", last: 100 });
    expect(tracker.check("book:BTC-USD", 42)).toEqual({ status: "duplicate", last: 100 });
  });

  it("should report a gap once and treat everything up to it as duplicate", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);

    expect(tracker.check("book:BTC-USD", 105)).toEqual({
      status: "gap",
      expected: 101,
      received: 105,
    });
    expect(tracker.check("book:BTC-USD", 103).status).toBe("duplicate");
    expect(tracker.check("book:BTC-USD", 105).status).toBe("duplicate");
    expect(tracker.check("book:BTC-USD", 106).status).toBe("accept");
  });

  it("should track keys independently", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);
    tracker.check("book:ETH-USD", 7);

    expect(tracker.check("book:ETH-USD", 8)).toEqual({ status: "accept" });
    expect(tracker.check("book:BTC-USD", 101)).toEqual({ status: "accept" });
    expect(tracker.size()).toBe(2);
  });

  it("should forget everything on reset", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);

    tracker.reset();

    expect(tracker.size()).toBe(0);
    expect(tracker.check("book:BTC-USD", 5)).toEqual({ status: "accept" });
  });

  it("should resume from an explicit high-water mark", () => {
    const tracker = createSequenceTracker();
    tracker.check("book:BTC-USD", 100);

    tracker.set("book:BTC-USD", 200);
    expect(tracker.check("book:BTC-USD", 150).status).toBe("duplicate");
    expect(tracker.check("book:BTC-USD", 201).status).toBe("accept");

    tracker.delete("book:BTC-USD");
    expect(tracker.check("book:BTC-USD", 3).status).toBe("accept");
  });
});
