// In-memory sliding window rate limiter, one store per limiter

export interface RateLimitOptions {
  limit: number;
  windowMs: number;
  now?: () => number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  retryAfterMs: number;
}

export interface RateLimiter {
  check(key: string): RateLimitResult;
  reset(): void;
}

// Stale keys are swept at most this often
const SWEEP_INTERVAL_MS = 60_000;

export function createRateLimiter({ limit, windowMs, now = Date.now }: RateLimitOptions): RateLimiter {
  const hits = new Map<string, number[]>();
  let lastSweep = now();

  function sweep(current: number) {
    if (current - lastSweep < SWEEP_INTERVAL_MS) return;
    lastSweep = current;

    const cutoff = current - windowMs;
    for (const [key, timestamps] of hits) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) hits.delete(key);
      else hits.set(key, live);
    }
  }

  return {
    check(key) {
      const current = now();
      sweep(current);

      const cutoff = current - windowMs;
      const timestamps = (hits.get(key) ?? []).filter((t) => t > cutoff);

      if (timestamps.length >= limit) {
        hits.set(key, timestamps);
        return {
          allowed: false,
          remaining: 0,
          limit,
          retryAfterMs: Math.max(0, timestamps[0] + windowMs - current),
        };
      }

      timestamps.push(current);
      hits.set(key, timestamps);
      return { allowed: true, remaining: limit - timestamps.length, limit, retryAfterMs: 0 };
    },
    reset() {
      hits.clear();
    },
  };
}
