import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import { env } from "./env";

/**
 * Rate limiting:
 * - Upstash Redis sliding window when configured.
 * - In-memory fixed window otherwise (single instance).
 */
export type RateLimitResult = { allowed: boolean; remaining: number };

export type RateLimiter = (key: string) => Promise<RateLimitResult>;

const WINDOW_MS = 60_000;

export function createRateLimiter(limit: number = env.RATE_LIMIT_PER_MINUTE): RateLimiter {
  const limiter =
    env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN
      ? new Ratelimit({
          redis: new Redis({ url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN }),
          limiter: Ratelimit.slidingWindow(limit, "1 m"),
          prefix: "claimwatch:ratelimit"
        })
      : null;

  if (limiter) {
    return async (key) => {
      const r = await limiter.limit(key);
      return { allowed: r.success, remaining: r.remaining };
    };
  }

  const hits = new Map<string, { count: number; resetAt: number }>();

  return async (key) => {
    const now = Date.now();
    const cur = hits.get(key);

    if (!cur || now > cur.resetAt) {
      hits.set(key, { count: 1, resetAt: now + WINDOW_MS });
      return { allowed: true, remaining: limit - 1 };
    }

    if (cur.count >= limit) return { allowed: false, remaining: 0 };

    cur.count += 1;
    return { allowed: true, remaining: limit - cur.count };
  };
}
