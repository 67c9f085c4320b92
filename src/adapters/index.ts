/**
 * Exchange rate-limit presets.
 */

export {
  BINANCE_ENDPOINT_WEIGHTS,
  BINANCE_RATE_LIMITS,
  getBinanceEndpointWeight,
} from "./binance";
export { BYBIT_RATE_LIMITS } from "./bybit";
export { COINBASE_RATE_LIMITS } from "./coinbase";
export { RATE_LIMIT_PRESETS, getRateLimitPreset, type Exchange } from "./presets";
