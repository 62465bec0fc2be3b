import { NextRequest, NextResponse } from 'next/server';
import { createRateLimiter, type RateLimiter } from '@/lib/rate-limit';

export type RateLimitTier = 'scoring' | 'api';

// Requests per minute; resume scoring parses documents, so it gets the lower limit
export const RATE_LIMITERS: Record<RateLimitTier, RateLimiter> = {
  scoring: createRateLimiter({ limit: 10, windowMs: 60_000 }),
  api: createRateLimiter({ limit: 30, windowMs: 60_000 }),
};

export function tierFor(pathname: string): RateLimitTier | null {
  if (!pathname.startsWith('/api/')) return null;
  // NextAuth needs unrestricted access for its redirects and callbacks
  if (pathname.startsWith('/api/auth/')) return null;
  return pathname.startsWith('/api/ats/') ? 'scoring' : 'api';
}

function getClientIP(request: NextRequest): string {
  return (
    request.headers.get('x-forwarded-for')?.split(',')[0]?.trim() ||
    request.headers.get('x-real-ip') ||
    'anonymous'
  );
}

function addSecurityHeaders(response: NextResponse): NextResponse {
  response.headers.set('X-Frame-Options', 'DENY');
  response.headers.set('X-Content-Type-Options', 'nosniff');
  response.headers.set('Referrer-Policy', 'strict-origin-when-cross-origin');
  response.headers.set('Permissions-Policy', 'camera=(), microphone=(), geolocation=()');

  if (process.env.NODE_ENV === 'production') {
    response.headers.set('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
  }

  return response;
}

export function middleware(request: NextRequest) {
  const tier = tierFor(request.nextUrl.pathname);
  if (!tier) {
    return addSecurityHeaders(NextResponse.next());
  }

  const result = RATE_LIMITERS[tier].check(`${getClientIP(request)}:${tier}`);

  if (!result.allowed) {
    const rejected = NextResponse.json(
      { error: 'Too many requests. Please try again later.' },
      { status: 429 },
    );
    rejected.headers.set('Retry-After', String(Math.ceil(result.retryAfterMs / 1000)));
    rejected.headers.set('X-RateLimit-Limit', String(result.limit));
    rejected.headers.set('X-RateLimit-Remaining', '0');
    return addSecurityHeaders(rejected);
  }

  const response = NextResponse.next();
  response.headers.set('X-RateLimit-Limit', String(result.limit));
  response.headers.set('X-RateLimit-Remaining', String(result.remaining));
  return addSecurityHeaders(response);
}

export const config = {
  matcher: ['/api/:path*'],
};
