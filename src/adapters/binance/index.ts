export {
  BINANCE_ENDPOINT_WEIGHTS,
  BINANCE_RATE_LIMITS,
  getBinanceEndpointWeight,
} from "./rate-limits";
