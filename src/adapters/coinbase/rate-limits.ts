/**
 * Coinbase Advanced Trade API rate limit presets.
 *
 * @see https://docs.cdp.coinbase.com/advanced-trade/docs/rest-api-rate-limits
 *
 * - REST: 10 requests/second per IP (public)
 * - WebSocket: 750 messages/second per IP
 */

import type { RateLimitsInput } from "@/lib/config";
import { STREAM_SUBSCRIBE_SCOPE } from "@/stream/types";

export const COINBASE_RATE_LIMITS = {
  global: { rate: 10, period: 1 },
  endpoints: {
    [STREAM_SUBSCRIBE_SCOPE]: { rate: 750, period: 1 },
  },
  retryAfterScope: "endpoint",
} satisfies RateLimitsInput;
