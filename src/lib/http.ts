import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { logError } from '@/lib/debug';
import { RESUME_ERROR_STATUS, isResumeError } from '@/lib/resume/errors';

/**
 * A failure a service can report straight back to the client.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Not authenticated') {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Unauthorized') {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class BadGatewayError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(502, message, { cause });
  }
}

export function jsonError(message: string, status: number): NextResponse {
  return NextResponse.json({ error: message }, { status });
}

/**
 * Maps anything thrown inside a route handler to a JSON error response.
 * Unexpected errors are logged and reported with the generic fallback message.
 */
export function handleRouteError(error: unknown, context: string, fallbackMessage: string): NextResponse {
  if (error instanceof z.ZodError) {
    return jsonError(error.issues[0]?.message ?? 'Invalid request', 400);
  }

  if (error instanceof HttpError) {
    return jsonError(error.message, error.status);
  }

  if (isResumeError(error)) {
    return jsonError(error.message, RESUME_ERROR_STATUS[error.kind]);
  }

  logError(`Error ${context}:`, error);
  return jsonError(fallbackMessage, 500);
}

/**
 * Reads a JSON body, treating a missing or malformed one as an empty object
 * so the route's schema reports what is missing.
 */
export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return {};
  }
}

/**
 * True when the client announces a body larger than `limit` bytes. A missing or
 * malformed Content-Length says nothing, so it never counts as too large.
 */
export function declaresBodyOver(headers: Headers, limit: number): boolean {
  const declared = Number(headers.get('content-length') ?? '');
  return Number.isFinite(declared) && declared > limit;
}

// Blank query values count as absent
export function searchParamsOf(request: NextRequest): Record<string, string> {
  const params: Record<string, string> = {};
  request.nextUrl.searchParams.forEach((value, key) => {
    if (value.trim()) params[key] = value;
  });
  return params;
}
