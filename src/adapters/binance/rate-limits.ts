/**
 * Binance API rate limit presets and endpoint weights.
 *
 * @see https://binance-docs.github.io/apidocs/futures/en/#limits
 *
 * - 1200 weight per minute (IP-based)
 * - Market data: 1-20 weight per request
 * - WebSocket: 5 incoming messages/second per connection
 */

import type { RateLimitsInput } from "@/lib/config";
import { STREAM_SUBSCRIBE_SCOPE } from "@/stream/types";

export const BINANCE_RATE_LIMITS = {
  global: { rate: 1200, period: 60 },
  endpoints: {
    [STREAM_SUBSCRIBE_SCOPE]: { rate: 5, period: 1 },
  },
  retryAfterScope: "global",
} satisfies RateLimitsInput;

/**
 * Request weights for Binance market-data endpoints. Pass the weight as the
 * request `cost`; other exchanges charge 1 per request.
 */
export const BINANCE_ENDPOINT_WEIGHTS: Record<string, number> = {
  "/api/v3/exchangeInfo": 20,
  "/api/v3/ticker": 1,
  "/api/v3/depth": 5,
  "/api/v3/klines": 1,
  "/fapi/v1/exchangeInfo": 1,
  "/fapi/v1/ticker": 1,
  "/fapi/v1/depth": 5,
  "/fapi/v1/klines": 1,
};

/**
 * Gets the weight for a Binance endpoint.
 * Returns 1 for unknown endpoints.
 */
export const getBinanceEndpointWeight = (endpoint: string): number => {
  // Try exact match first
  const exactWeight = BINANCE_ENDPOINT_WEIGHTS[endpoint];
  if (exactWeight !== undefined) {
    return exactWeight;
  }

  // Longest prefix wins, so /api/v3/ticker/price matches /api/v3/ticker
  let bestMatch: { pattern: string; weight: number } | null = null;
  for (const [pattern, weight] of Object.entries(BINANCE_ENDPOINT_WEIGHTS)) {
    if (endpoint.startsWith(pattern) && pattern.length > (bestMatch?.pattern.length ?? 0)) {
      bestMatch = { pattern, weight };
    }
  }

  return bestMatch?.weight ?? 1;
};
