import * as v from "valibot";

import { ConfigError } from "../errors/errors";
import type { RateLimitRule, RateLimiterConfig } from "../rate-limiter/rate-limiter";

import { type ClientConfig, type RateLimitsConfig, clientConfigSchema } from "./schema";

/**
 * Validates client configuration and fills in defaults.
 *
 * @throws ConfigError listing every invalid or unknown key
 *
 * @example
 * ```typescript
 * const config = parseClientConfig({
 *   rateLimits: { global: { rate: 1200, period: 60 } },
 *   reconnect: { maxDelay: 60 },
 * });
 * config.retry.maxAttempts; // 3
 * ```
 */
export const parseClientConfig = (input: unknown = {}): ClientConfig => {
  const result = v.safeParse(clientConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(
      "Invalid client configuration",
      result.issues.map((issue) => `${v.getDotPath(issue) ?? "(root)"}: ${issue.message}`),
    );
  }
  return result.output;
};

const toRule = (rule: RateLimitsConfig["global"]): RateLimitRule => ({
  rate: rule.rate,
  periodSeconds: rule.period,
  ...(rule.capacity !== undefined && { capacity: rule.capacity }),
});

/**
 * Maps the `rateLimits` section onto the rate limiter's rules.
 */
export const toRateLimiterConfig = (
  rateLimits: RateLimitsConfig,
): Omit<RateLimiterConfig, "logger"> => ({
  global: toRule(rateLimits.global),
  endpoints: Object.fromEntries(
    Object.entries(rateLimits.endpoints).map(([scope, rule]) => [scope, toRule(rule)]),
  ),
  retryAfterScope: rateLimits.retryAfterScope,
});
