import { describe, it, expect } from 'vitest';
import { createRateLimiter } from './rate-limit';

function clock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('createRateLimiter', () => {
  it('allows requests up to the limit', () => {
    const time = clock();
    const limiter = createRateLimiter({ limit: 3, windowMs: 60_000, now: time.now });

    expect(limiter.check('1.2.3.4').remaining).toBe(2);
    expect(limiter.check('1.2.3.4').remaining).toBe(1);
    expect(limiter.check('1.2.3.4').remaining).toBe(0);

    const blocked = limiter.check('1.2.3.4');
    expect(blocked).toEqual({ allowed: false, remaining: 0, limit: 3, retryAfterMs: 60_000 });
  });

  it('keeps keys apart', () => {
    const limiter = createRateLimiter({ limit: 1, windowMs: 60_000, now: clock().now });

    expect(limiter.check('a').allowed).toBe(true);
    expect(limiter.check('b').allowed).toBe(true);
    expect(limiter.check('a').allowed).toBe(false);
  });

  it('slides the window', () => {
    const time = clock();
    const limiter = createRateLimiter({ limit: 2, windowMs: 10_000, now: time.now });

    limiter.check('ip');
    time.advance(4_000);
    limiter.check('ip');

    time.advance(2_000);
    expect(limiter.check('ip')).toMatchObject({ allowed: false, retryAfterMs: 4_000 });

    time.advance(4_000);
    expect(limiter.check('ip')).toMatchObject({ allowed: true, remaining: 0 });
  });

  it('forgets everything on reset', () => {
    const limiter = createRateLimiter({ limit: 1, windowMs: 60_000, now: clock().now });

    limiter.check('ip');
    limiter.reset();
    expect(limiter.check('ip').allowed).toBe(true);
  });
});
