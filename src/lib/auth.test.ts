import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { oauthClients, refreshAccessToken, setCredentials } = vi.hoisted(() => {
  const clients: unknown[][] = [];
  return { oauthClients: clients, refreshAccessToken: vi.fn(), setCredentials: vi.fn() };
});

vi.mock('googleapis', () => ({
  google: {
    auth: {
      OAuth2: class {
        setCredentials = setCredentials;
        refreshAccessToken = refreshAccessToken;

        constructor(...args: unknown[]) {
          oauthClients.push(args);
        }
      },
    },
  },
}));

vi.mock('@/lib/db/repositories/users', () => ({
  findUserByEmail: vi.fn(),
  upsertUserOnSignIn: vi.fn(),
}));

import { findUserByEmail, upsertUserOnSignIn } from '@/lib/db/repositories/users';
import { authOptions, withFreshAccessToken } from './auth';
import { makeUser } from '@/test/fixtures';

describe('authOptions callbacks', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates listed admins as admins', async () => {
    const signIn = authOptions.callbacks?.signIn;
    if (!signIn) throw new Error('signIn callback missing');
    vi.mocked(upsertUserOnSignIn).mockResolvedValue(makeUser({ userType: 'admin' }));

    const allowed = await signIn({
      user: { id: 'g-1', email: 'Admin@example.com', name: 'Head TPO', image: null },
      account: null,
    });

    expect(allowed).toBe(true);
    expect(upsertUserOnSignIn).toHaveBeenCalledWith({
      email: 'Admin@example.com',
      name: 'Head TPO',
      image: undefined,
      userType: 'admin',
    });
  });

  it('creates everyone else as a student', async () => {
    const signIn = authOptions.callbacks?.signIn;
    if (!signIn) throw new Error('signIn callback missing');
    vi.mocked(upsertUserOnSignIn).mockResolvedValue(makeUser());

    await signIn({ user: { id: 'g-2', email: 'student@example.com' }, account: null });

    expect(upsertUserOnSignIn).toHaveBeenCalledWith(expect.objectContaining({ userType: 'student' }));
  });

  it('refuses accounts without an email', async () => {
    const signIn = authOptions.callbacks?.signIn;
    if (!signIn) throw new Error('signIn callback missing');

    expect(await signIn({ user: { id: 'g-3' }, account: null })).toBe(false);
    expect(upsertUserOnSignIn).not.toHaveBeenCalled();
  });

  it('puts the Google token and role on the JWT', async () => {
    const jwt = authOptions.callbacks?.jwt;
    if (!jwt) throw new Error('jwt callback missing');
    vi.mocked(findUserByEmail).mockResolvedValue(makeUser({ id: 'u-1', userType: 'student' }));

    const token = await jwt({
      token: { email: 'student@example.com' },
      user: { id: 'g-2', email: 'student@example.com' },
      account: { provider: 'google', type: 'oauth', providerAccountId: 'g-2', access_token: 'test-token' },
    });

    expect(token).toMatchObject({ accessToken: 'test-token', userId: 'u-1', userType: 'student' });
  });

  it('keeps the refresh token and expiry from the Google account', async () => {
    const jwt = authOptions.callbacks?.jwt;
    if (!jwt) throw new Error('jwt callback missing');

    const token = await jwt({
      token: { email: 'student@example.com', userId: 'u-1' },
      user: { id: 'g-2', email: 'student@example.com' },
      account: {
        provider: 'google',
        type: 'oauth',
        providerAccountId: 'g-2',
        access_token: 'test-token',
        refresh_token: 'test-refresh',
        expires_at: 1_700_003_600,
      },
    });

    expect(token).toMatchObject({
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      accessTokenExpires: 1_700_003_600_000,
    });
  });
});

describe('withFreshAccessToken', () => {
  const NOW = 1_700_000_000_000;

  beforeEach(() => {
    vi.clearAllMocks();
    oauthClients.length = 0;
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('leaves a live token alone', async () => {
    const token = { accessToken: 'test-token', refreshToken: 'test-refresh', accessTokenExpires: NOW + 30 * 60 * 1000 };

    expect(await withFreshAccessToken(token)).toBe(token);
    expect(refreshAccessToken).not.toHaveBeenCalled();
  });

  it('renews an expired token with the refresh token', async () => {
    refreshAccessToken.mockResolvedValue({
      credentials: { access_token: 'test-token-2', expiry_date: NOW + 3_600_000, refresh_token: null },
    });

    const token = await withFreshAccessToken({
      email: 'student@example.com',
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      accessTokenExpires: NOW - 1000,
    });

    expect(oauthClients).toEqual([['test-client-id', 'test-secret']]);
    expect(setCredentials).toHaveBeenCalledWith({ refresh_token: 'test-refresh' });
    expect(token).toEqual({
      email: 'student@example.com',
      accessToken: 'test-token-2',
      refreshToken: 'test-refresh',
      accessTokenExpires: NOW + 3_600_000,
      error: undefined,
    });
  });

  it('refreshes inside the last minute of a token', async () => {
    refreshAccessToken.mockResolvedValue({ credentials: { access_token: 'test-token-2', expiry_date: NOW + 3_600_000 } });

    const token = await withFreshAccessToken({
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      accessTokenExpires: NOW + 30 * 1000,
    });

    expect(token.accessToken).toBe('test-token-2');
  });

  it('drops the access token when Google refuses the refresh', async () => {
    refreshAccessToken.mockRejectedValue(new Error('invalid_grant'));

    const token = await withFreshAccessToken({
      accessToken: 'test-token',
      refreshToken: 'test-refresh',
      accessTokenExpires: NOW - 1000,
    });

    expect(token.accessToken).toBeUndefined();
    expect(token.error).toBe('RefreshAccessTokenError');
  });

  it('drops an expired token that has no refresh token', async () => {
    const token = await withFreshAccessToken({ accessToken: 'test-token', accessTokenExpires: NOW - 1000 });

    expect(token).toEqual({ accessToken: undefined, accessTokenExpires: NOW - 1000, error: 'RefreshAccessTokenError' });
    expect(refreshAccessToken).not.toHaveBeenCalled();
  });

  it('runs on every jwt call after sign-in', async () => {
    const jwt = authOptions.callbacks?.jwt;
    if (!jwt) throw new Error('jwt callback missing');
    refreshAccessToken.mockRejectedValue(new Error('invalid_grant'));

    const token = await jwt({
      token: {
        email: 'student@example.com',
        userId: 'u-1',
        accessToken: 'test-token',
        refreshToken: 'test-refresh',
        accessTokenExpires: NOW - 1000,
      },
      user: { id: 'g-2', email: 'student@example.com' },
      account: null,
    });

    expect(token).toMatchObject({ userId: 'u-1', error: 'RefreshAccessTokenError' });
    expect(token.accessToken).toBeUndefined();
  });
});
