export { COINBASE_RATE_LIMITS } from "./rate-limits";
