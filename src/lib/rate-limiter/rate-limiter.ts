/**
 * Hierarchical rate limiter: one global bucket plus optional per-endpoint
 * buckets, shared by every REST call and stream manager of a client.
 *
 * An acquisition of cost `c` against endpoint `E` is granted only when both the
 * global bucket and E's bucket hold `c` tokens, and is then deducted from both
 * in the same tick. Waiters are served first-come-first-served per bucket: a
 * waiter that cannot be granted holds the buckets it is short on, so later
 * waiters on those buckets queue behind it while waiters for other endpoints
 * keep flowing through the global bucket.
 */

import { ConfigError, LimiterClosedError, abortReason } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { type TokenBucket, type TokenBucketState, createTokenBucket } from "./token-bucket";

export const GLOBAL_SCOPE = "global";

export interface RateLimitRule {
  /** Requests (or weight) granted per period */
  rate: number;
  periodSeconds: number;
  /** Burst capacity (default: rate) */
  capacity?: number;
}

/**
 * Which buckets a Retry-After is applied to.
 * - endpoint: the endpoint bucket the 429 was attributed to (global if none)
 * - global: the global bucket only
 * - both: endpoint and global
 */
export type RetryAfterScope = "endpoint" | "global" | "both";

export interface RateLimiterConfig {
  global: RateLimitRule;
  endpoints?: Record<string, RateLimitRule>;
  retryAfterScope?: RetryAfterScope;
  logger?: Logger;
}

export interface AcquireOptions {
  /** Aborting removes the waiter; tokens already deducted are not refunded */
  signal?: AbortSignal;
}

export interface AcquireGrant {
  scope: string;
  cost: number;
  /** Time spent waiting for tokens (ms) */
  waitedMs: number;
}

export interface BucketSnapshot extends TokenBucketState {
  scope: string;
  /** Number of waiters currently queued on this bucket */
  waiters: number;
}

export interface RateLimiter {
  /** Waits until `cost` tokens are available on the scope chain, then deducts them */
  acquire: (scope: string, cost?: number, options?: AcquireOptions) => Promise<AcquireGrant>;
  /** Applies a Retry-After floor to the bucket(s) the scope maps to */
  throttle: (scope: string, retryAfterSeconds: number) => void;
  /** Returns true if an endpoint bucket is configured for the scope */
  hasEndpoint: (scope: string) => boolean;
  /** Snapshot of the bucket for a scope (global when omitted or unknown) */
  getBucketState: (scope?: string) => BucketSnapshot;
  getPendingCount: () => number;
  /** Rejects all waiters and refuses further acquisitions */
  close: () => void;
}

interface Waiter {
  scope: string;
  cost: number;
  buckets: TokenBucket[];
  enqueuedAt: number;
  resolve: (grant: AcquireGrant) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

const validateRule = (scope: string, rule: RateLimitRule): string[] => {
  const issues: string[] = [];
  if (!(rule.rate > 0) || !Number.isFinite(rule.rate)) {
    issues.push(`${scope}.rate must be a positive number`);
  }
  if (!(rule.periodSeconds > 0) || !Number.isFinite(rule.periodSeconds)) {
    issues.push(`${scope}.periodSeconds must be a positive number`);
  }
  if (rule.capacity !== undefined && !(rule.capacity >= 1)) {
    issues.push(`${scope}.capacity must be at least 1`);
  }
  return issues;
};

/**
 * Creates a hierarchical rate limiter.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({
 *   global: { rate: 1200, periodSeconds: 60 },
 *   endpoints: {
 *     depth: { rate: 50, periodSeconds: 10 },
 *   },
 * });
 *
 * await limiter.acquire("depth", 5); // charged to "depth" and to the global bucket
 * await limiter.acquire("ticker"); // no endpoint bucket: charged to global only
 *
 * // After a 429 with Retry-After: 30
 * limiter.throttle("depth", 30);
 * ```
 */
export const createRateLimiter = (config: RateLimiterConfig): RateLimiter => {
  const { global, endpoints = {}, retryAfterScope = "endpoint", logger } = config;

  const issues = [
    ...validateRule(GLOBAL_SCOPE, global),
    ...Object.entries(endpoints).flatMap(([scope, rule]) =>
      scope === GLOBAL_SCOPE
        ? [`"${GLOBAL_SCOPE}" is reserved and cannot name an endpoint`]
        : validateRule(scope, rule),
    ),
  ];
  if (issues.length > 0) {
    throw new ConfigError("Invalid rate limit configuration", issues);
  }

  const globalBucket = createTokenBucket(global);
  const endpointBuckets = new Map<string, TokenBucket>(
    Object.entries(endpoints).map(([scope, rule]) => [scope, createTokenBucket(rule)]),
  );

  const pending: Waiter[] = [];
  let timer: NodeJS.Timeout | null = null;
  let closed = false;

  const chainFor = (scope: string): TokenBucket[] => {
    const endpointBucket = endpointBuckets.get(scope);
    return endpointBucket ? [endpointBucket, globalBucket] : [globalBucket];
  };

  const removeWaiter = (waiter: Waiter): void => {
    const index = pending.indexOf(waiter);
    if (index !== -1) {
      pending.splice(index, 1);
    }
    waiter.detach();
  };

  const schedule = (delayMs: number): void => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
    if (!Number.isFinite(delayMs) || pending.length === 0) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      dispatch();
    }, delayMs);
  };

  /**
   * Grants every waiter that can be granted right now, in arrival order, and
   * schedules the next wake-up for the earliest waiter that is short on tokens.
   */
  const dispatch = (): void => {
    const held = new Set<TokenBucket>();
    let nextWakeMs = Number.POSITIVE_INFINITY;

    for (const waiter of [...pending]) {
      if (waiter.buckets.some((bucket) => held.has(bucket))) {
        continue;
      }

      const waits = waiter.buckets.map((bucket) => bucket.getWaitTimeMs(waiter.cost));

      if (waits.every((waitMs) => waitMs === 0)) {
        for (const bucket of waiter.buckets) {
          bucket.tryConsume(waiter.cost);
        }
        removeWaiter(waiter);
        waiter.resolve({
          scope: waiter.scope,
          cost: waiter.cost,
          waitedMs: Date.now() - waiter.enqueuedAt,
        });
        continue;
      }

      waiter.buckets.forEach((bucket, i) => {
        if ((waits[i] ?? 0) > 0) {
          held.add(bucket);
        }
      });
      nextWakeMs = Math.min(nextWakeMs, Math.max(...waits));
    }

    schedule(nextWakeMs);
  };

  const acquire = (
    scope: string,
    cost = 1,
    options: AcquireOptions = {},
  ): Promise<AcquireGrant> => {
    const { signal } = options;

    if (closed) {
      return Promise.reject(new LimiterClosedError());
    }

    if (!(cost > 0) || !Number.isFinite(cost)) {
      return Promise.reject(new ConfigError(`Invalid cost ${cost} for scope "${scope}"`));
    }

    const buckets = chainFor(scope);
    const tooSmall = buckets.find((bucket) => bucket.capacity < cost);
    if (tooSmall) {
      return Promise.reject(
        new ConfigError(
          `Cost ${cost} exceeds bucket capacity ${tooSmall.capacity} for scope "${scope}"`,
        ),
      );
    }

    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<AcquireGrant>((resolve, reject) => {
      const onAbort = (): void => {
        removeWaiter(waiter);
        logger?.debug("Rate limit wait aborted", { scope, cost });
        reject(signal ? abortReason(signal) : new LimiterClosedError());
        // Buckets this waiter held are free again
        dispatch();
      };

      const waiter: Waiter = {
        scope,
        cost,
        buckets,
        enqueuedAt: Date.now(),
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      pending.push(waiter);
      dispatch();

      if (pending.includes(waiter)) {
        logger?.debug("Rate limit wait", {
          scope,
          cost,
          waitTimeMs: Math.max(...buckets.map((bucket) => bucket.getWaitTimeMs(cost))),
          queued: pending.length,
        });
      }
    });
  };

  const throttle = (scope: string, retryAfterSeconds: number): void => {
    const endpointBucket = endpointBuckets.get(scope);
    const targets: TokenBucket[] =
      retryAfterScope === "global" || !endpointBucket
        ? [globalBucket]
        : retryAfterScope === "both"
          ? [endpointBucket, globalBucket]
          : [endpointBucket];

    const seconds = Math.max(0, retryAfterSeconds);
    const deadline = Date.now() + seconds * 1000;
    for (const bucket of targets) {
      bucket.blockUntil(deadline);
    }

    logger?.warn("Rate limit throttled by Retry-After", {
      scope,
      retryAfterSeconds: seconds,
      buckets: targets.map((bucket) => (bucket === globalBucket ? GLOBAL_SCOPE : scope)),
    });

    dispatch();
  };

  const hasEndpoint = (scope: string): boolean => endpointBuckets.has(scope);

  const getBucketState = (scope: string = GLOBAL_SCOPE): BucketSnapshot => {
    const endpointBucket = endpointBuckets.get(scope);
    const bucket = endpointBucket ?? globalBucket;
    return {
      ...bucket.getState(),
      scope: endpointBucket ? scope : GLOBAL_SCOPE,
      waiters: pending.filter((waiter) => waiter.buckets.includes(bucket)).length,
    };
  };

  const getPendingCount = (): number => pending.length;

  const close = (): void => {
    if (closed) return;
    closed = true;
    schedule(Number.POSITIVE_INFINITY);

    for (const waiter of pending.splice(0)) {
      waiter.detach();
      waiter.reject(new LimiterClosedError());
    }
  };

  return {
    acquire,
    throttle,
    hasEndpoint,
    getBucketState,
    getPendingCount,
    close,
  };
};
