export { BYBIT_RATE_LIMITS } from "./rate-limits";
