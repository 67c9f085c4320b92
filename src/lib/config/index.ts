export { parseClientConfig, toRateLimiterConfig } from "./client-config";
export { getRuntimeConfig, type RuntimeConfig } from "./runtime";
export {
  clientConfigSchema,
  rateLimitRuleSchema,
  rateLimitsSchema,
  reconnectSchema,
  retryAfterScopeSchema,
  retrySchema,
  type ClientConfig,
  type ClientConfigInput,
  type RateLimitRuleInput,
  type RateLimitsConfig,
  type RateLimitsInput,
  type ReconnectConfig,
  type RetryConfig,
} from "./schema";
