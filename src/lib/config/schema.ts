import * as v from "valibot";

const positiveNumberSchema = v.pipe(
  v.number(),
  v.finite(),
  v.check((value) => value > 0, "must be a positive number"),
);

const fractionSchema = v.pipe(
  v.number(),
  v.minValue(0, "must be between 0 and 1"),
  v.maxValue(1, "must be between 0 and 1"),
);

const positiveIntegerSchema = v.pipe(
  v.number(),
  v.integer("must be an integer"),
  v.minValue(1, "must be at least 1"),
);

/** `rate` requests (or weight) per `period` seconds */
export const rateLimitRuleSchema = v.strictObject({
  rate: positiveNumberSchema,
  period: positiveNumberSchema,
  capacity: v.optional(v.pipe(v.number(), v.minValue(1, "must be at least 1"))),
});

export const retryAfterScopeSchema = v.picklist(["endpoint", "global", "both"]);

export const rateLimitsSchema = v.strictObject({
  global: v.optional(rateLimitRuleSchema, { rate: 5, period: 1 }),
  endpoints: v.optional(v.record(v.string(), rateLimitRuleSchema), {}),
  retryAfterScope: v.optional(retryAfterScopeSchema, "endpoint"),
});

export const retrySchema = v.pipe(
  v.strictObject({
    maxAttempts: v.optional(positiveIntegerSchema, 3),
    baseDelay: v.optional(positiveNumberSchema, 1),
    maxDelay: v.optional(positiveNumberSchema, 30),
    jitterFraction: v.optional(fractionSchema, 0.2),
  }),
  v.check((retry) => retry.baseDelay <= retry.maxDelay, "baseDelay must not exceed maxDelay"),
);

export const reconnectSchema = v.pipe(
  v.strictObject({
    minDelay: v.optional(positiveNumberSchema, 1),
    maxDelay: v.optional(positiveNumberSchema, 30),
    jitterFraction: v.optional(fractionSchema, 0.2),
    sustainedStreamingSeconds: v.optional(positiveNumberSchema, 60),
  }),
  v.check(
    (reconnect) => reconnect.minDelay <= reconnect.maxDelay,
    "minDelay must not exceed maxDelay",
  ),
);

/**
 * Client configuration. Durations are in seconds; every key is optional and
 * unknown keys are rejected.
 */
export const clientConfigSchema = v.strictObject({
  rateLimits: v.optional(rateLimitsSchema, {}),
  retry: v.optional(retrySchema, {}),
  requestTimeoutSeconds: v.optional(positiveNumberSchema, 10),
  reconnect: v.optional(reconnectSchema, {}),
  subscribeTimeoutSeconds: v.optional(positiveNumberSchema, 10),
  heartbeatTimeoutSeconds: v.optional(positiveNumberSchema, 30),
  streamBufferCapacity: v.optional(positiveIntegerSchema, 1000),
});

export type RateLimitRuleInput = v.InferInput<typeof rateLimitRuleSchema>;
export type RateLimitsInput = v.InferInput<typeof rateLimitsSchema>;
export type RateLimitsConfig = v.InferOutput<typeof rateLimitsSchema>;
export type RetryConfig = v.InferOutput<typeof retrySchema>;
export type ReconnectConfig = v.InferOutput<typeof reconnectSchema>;
export type ClientConfigInput = v.InferInput<typeof clientConfigSchema>;
export type ClientConfig = v.InferOutput<typeof clientConfigSchema>;
