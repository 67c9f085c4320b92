/**
 * Bybit API rate limit presets.
 *
 * @see https://bybit-exchange.github.io/docs/v5/rate-limit
 *
 * - Public: 120 requests per 5 seconds per IP
 * - WebSocket: subscription requests share the connection's message budget
 */

import type { RateLimitsInput } from "@/lib/config";
import { STREAM_SUBSCRIBE_SCOPE } from "@/stream/types";

export const BYBIT_RATE_LIMITS = {
  global: { rate: 120, period: 5 },
  endpoints: {
    [STREAM_SUBSCRIBE_SCOPE]: { rate: 100, period: 1 },
  },
  retryAfterScope: "endpoint",
} satisfies RateLimitsInput;
