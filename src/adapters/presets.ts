import type { RateLimitsInput } from "@/lib/config";

import { BINANCE_RATE_LIMITS } from "./binance";
import { BYBIT_RATE_LIMITS } from "./bybit";
import { COINBASE_RATE_LIMITS } from "./coinbase";

export type Exchange = "binance" | "bybit" | "coinbase";

export const RATE_LIMIT_PRESETS: Record<Exchange, RateLimitsInput> = {
  binance: BINANCE_RATE_LIMITS,
  bybit: BYBIT_RATE_LIMITS,
  coinbase: COINBASE_RATE_LIMITS,
};

/**
 * Returns the rate-limit section for an exchange, to be used as
 * `rateLimits` in the client configuration.
 */
export const getRateLimitPreset = (exchange: Exchange): RateLimitsInput =>
  RATE_LIMIT_PRESETS[exchange];
