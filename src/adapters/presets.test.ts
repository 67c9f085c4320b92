import { describe, expect, it } from "vitest";

import { parseClientConfig } from "@/lib/config";

import { getBinanceEndpointWeight } from "./binance";
import { RATE_LIMIT_PRESETS, getRateLimitPreset } from "./presets";

describe("rate limit presets", () => {
  it.each(Object.entries(RATE_LIMIT_PRESETS))("should be valid configuration for %s", (_, p) => {
    expect(() => parseClientConfig({ rateLimits: p })).not.toThrow();
  });

  it("should return the Binance weight budget", () => {
    expect(getRateLimitPreset("binance").global).toEqual({ rate: 1200, period: 60 });
  });

  it("should limit stream subscriptions separately", () => {
    expect(getRateLimitPreset("binance").endpoints?.["ws:subscribe"]).toEqual({
      rate: 5,
      period: 1,
    });
  });
});

describe("getBinanceEndpointWeight", () => {
  it("should return exact weights", () => {
    expect(getBinanceEndpointWeight("/api/v3/depth")).toBe(5);
    expect(getBinanceEndpointWeight("/api/v3/exchangeInfo")).toBe(20);
  });

  it("should match by path prefix", () => {
    expect(getBinanceEndpointWeight("/api/v3/ticker/price")).toBe(1);
    expect(getBinanceEndpointWeight("/fapi/v1/depth?limit=100")).toBe(5);
  });

  it("should default to 1 for unknown endpoints", () => {
    expect(getBinanceEndpointWeight("/api/v3/avgPrice")).toBe(1);
  });
});
