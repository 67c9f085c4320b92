import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_BACKOFF_CONFIG,
  calculateBackoffMs,
  createBackoff,
  nominalBackoffMs,
} from "./backoff";

describe("calculateBackoffMs", () => {
  beforeEach(() => {
    // Math.random() = 0.5 is the midpoint of the symmetric jitter range
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should calculate exponential backoff", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 60000,
      multiplier: 2,
      jitterFactor: 0, // No jitter for predictable test
    };

    expect(calculateBackoffMs(0, config)).toBe(1000); // 1000 * 2^0
    expect(calculateBackoffMs(1, config)).toBe(2000); // 1000 * 2^1
    expect(calculateBackoffMs(2, config)).toBe(4000); // 1000 * 2^2
    expect(calculateBackoffMs(3, config)).toBe(8000); // 1000 * 2^3
  });

  it("should cap at maxDelay", () => {
    const config = {
      initialDelayMs: 1000,
      maxDelayMs: 5000,
      multiplier: 2,
      jitterFactor: 0,
    };

    expect(calculateBackoffMs(2, config)).toBe(4000);
    expect(calculateBackoffMs(3, config)).toBe(5000); // Capped
    expect(calculateBackoffMs(10, config)).toBe(5000); // Still capped
  });

  it("should spread jitter symmetrically around the nominal delay", () => {
    vi.mocked(Math.random).mockReturnValue(0);
    expect(calculateBackoffMs(0)).toBe(800); // 1000 - 20%

    vi.mocked(Math.random).mockReturnValue(0.75);
    expect(calculateBackoffMs(0)).toBe(1100); // 1000 + 10%

    vi.mocked(Math.random).mockReturnValue(0.5);
    expect(calculateBackoffMs(0)).toBe(1000);
  });

  it("should jitter the capped delay", () => {
    vi.mocked(Math.random).mockReturnValue(0);
    expect(calculateBackoffMs(10)).toBe(24000); // 30000 - 20%
  });
});

describe("nominalBackoffMs", () => {
  it("should follow 1s, 2s, 4s, 8s, 16s and cap at 30s", () => {
    const delays = Array.from({ length: 7 }, (_, attempt) =>
      nominalBackoffMs(attempt, DEFAULT_BACKOFF_CONFIG),
    );

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
  });
});

describe("createBackoff", () => {
  beforeEach(() => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should grow with consecutive failures", () => {
    const backoff = createBackoff();

    const delays = Array.from({ length: 6 }, () => backoff.nextDelayMs());

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000]);
    expect(backoff.getAttempt()).toBe(6);
  });

  it("should start over after reset", () => {
    const backoff = createBackoff({ ...DEFAULT_BACKOFF_CONFIG, initialDelayMs: 500 });
    backoff.nextDelayMs();
    backoff.nextDelayMs();

    backoff.reset();

    expect(backoff.getAttempt()).toBe(0);
    expect(backoff.nextDelayMs()).toBe(500);
  });

  it("should keep jittered delays within ±jitterFactor of nominal", () => {
    vi.restoreAllMocks();
    const backoff = createBackoff();

    for (let attempt = 0; attempt < 8; attempt++) {
      const nominal = nominalBackoffMs(attempt);
      const delay = backoff.nextDelayMs();
      expect(delay).toBeGreaterThanOrEqual(Math.floor(nominal * 0.8));
      expect(delay).toBeLessThanOrEqual(nominal * 1.2);
    }
  });
});
