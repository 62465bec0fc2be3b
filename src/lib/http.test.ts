import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';
import { z } from 'zod';
import { ConflictError, HttpError, declaresBodyOver, handleRouteError, readJson, searchParamsOf } from './http';
import { ExtractionFailureError, UnsupportedFormatError } from '@/lib/resume/errors';

describe('handleRouteError', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the first validation issue as a bad request', async () => {
    const schema = z.object({ title: z.string({ required_error: 'Missing required field: title' }) });
    const result = schema.safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    const response = handleRouteError(result.error, 'testing', 'Failed');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Missing required field: title' });
  });

  it('passes service errors through with their status', async () => {
    const response = handleRouteError(new ConflictError('Already there'), 'testing', 'Failed');
    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ error: 'Already there' });
  });

  it('maps resume errors by kind', async () => {
    const unsupported = handleRouteError(new UnsupportedFormatError('xlsx'), 'testing', 'Failed');
    expect(unsupported.status).toBe(415);
    expect(await unsupported.json()).toEqual({ error: 'Unsupported document format: xlsx' });

    const unreadable = handleRouteError(new ExtractionFailureError('pdf', new Error('eof')), 'testing', 'Failed');
    expect(unreadable.status).toBe(422);
  });

  it('logs unexpected errors and hides their message', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const boom = new Error('connection reset');

    const response = handleRouteError(boom, 'loading things', 'Failed to load things');

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Failed to load things' });
    expect(consoleError).toHaveBeenCalledWith('Error loading things:', boom);
  });

  it('keeps the status on HttpError', () => {
    expect(new HttpError(418, 'teapot').status).toBe(418);
  });
});

describe('readJson', () => {
  it('treats a malformed body as empty', async () => {
    const request = new Request('http://localhost/api/x', { method: 'POST', body: '{not json' });
    expect(await readJson(request)).toEqual({});
  });

  it('returns the parsed body', async () => {
    const request = new Request('http://localhost/api/x', { method: 'POST', body: '{"a":1}' });
    expect(await readJson(request)).toEqual({ a: 1 });
  });
});

describe('declaresBodyOver', () => {
  it('compares the declared length with the limit', () => {
    expect(declaresBodyOver(new Headers({ 'content-length': '1025' }), 1024)).toBe(true);
    expect(declaresBodyOver(new Headers({ 'content-length': '1024' }), 1024)).toBe(false);
  });

  it('ignores a missing or malformed header', () => {
    expect(declaresBodyOver(new Headers(), 1024)).toBe(false);
    expect(declaresBodyOver(new Headers({ 'content-length': 'lots' }), 1024)).toBe(false);
  });
});

describe('searchParamsOf', () => {
  it('drops blank values', () => {
    const request = new NextRequest('http://localhost/api/admin/applications?status=pending&opportunityType=');
    expect(searchParamsOf(request)).toEqual({ status: 'pending' });
  });
});
