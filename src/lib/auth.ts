import type { NextAuthOptions } from 'next-auth';
import type { JWT } from 'next-auth/jwt';
import GoogleProvider from 'next-auth/providers/google';
import { getConfig, isAdminEmail } from '@/lib/config';
import { findUserByEmail, upsertUserOnSignIn } from '@/lib/db/repositories/users';
import { logWarning } from '@/lib/debug';
import { refreshGoogleAccessToken } from '@/lib/google/oauth';

// drive.readonly lets the server fetch the resume a student linked from Drive
const GOOGLE_SCOPES = [
  'openid',
  'email',
  'profile',
  'https://www.googleapis.com/auth/drive.readonly',
].join(' ');

// Refresh a minute early so a Drive call never starts with a token about to lapse
const REFRESH_MARGIN_MS = 60 * 1000;

/**
 * Keeps the Google access token usable for the whole session. When it cannot be
 * renewed the token is dropped and `error` is set, so Drive routes ask the user
 * to sign in again instead of calling Google with a dead token.
 */
export async function withFreshAccessToken(token: JWT): Promise<JWT> {
  const expiresAt = token.accessTokenExpires;
  if (!expiresAt || Date.now() < expiresAt - REFRESH_MARGIN_MS) {
    return token;
  }

  if (!token.refreshToken) {
    return { ...token, accessToken: undefined, error: 'RefreshAccessTokenError' };
  }

  try {
    const fresh = await refreshGoogleAccessToken(token.refreshToken);
    return {
      ...token,
      accessToken: fresh.accessToken,
      accessTokenExpires: fresh.expiresAt,
      refreshToken: fresh.refreshToken,
      error: undefined,
    };
  } catch (error) {
    logWarning(`Google token refresh failed for ${token.email ?? 'unknown user'}:`, error);
    return { ...token, accessToken: undefined, error: 'RefreshAccessTokenError' };
  }
}

const { GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET, NEXTAUTH_SECRET } = getConfig();

export const authOptions: NextAuthOptions = {
  providers: [
    GoogleProvider({
      clientId: GOOGLE_CLIENT_ID,
      clientSecret: GOOGLE_CLIENT_SECRET,
      authorization: {
        params: {
          scope: GOOGLE_SCOPES,
          // offline + consent makes Google hand out a refresh token on every sign-in
          access_type: 'offline',
          prompt: 'consent',
        },
      },
    }),
  ],
  secret: NEXTAUTH_SECRET,
  session: { strategy: 'jwt', maxAge: 2 * 60 * 60 },
  callbacks: {
    async signIn({ user }) {
      if (!user.email) return false;

      await upsertUserOnSignIn({
        email: user.email,
        name: user.name ?? '',
        image: user.image ?? undefined,
        userType: isAdminEmail(user.email) ? 'admin' : 'student',
      });
      return true;
    },
    async jwt({ token, account }) {
      let next = token;

      if (account?.access_token) {
        next = {
          ...next,
          accessToken: account.access_token,
          refreshToken: account.refresh_token ?? next.refreshToken,
          accessTokenExpires: account.expires_at ? account.expires_at * 1000 : undefined,
          error: undefined,
        };
      } else {
        next = await withFreshAccessToken(next);
      }

      if (next.email && !next.userId) {
        const record = await findUserByEmail(next.email);
        if (record) {
          next = { ...next, userId: record.id, userType: record.userType };
        }
      }
      return next;
    },
    async session({ session, token }) {
      session.accessToken = token.accessToken;
      session.error = token.error;
      session.user = {
        ...session.user,
        id: token.userId,
        userType: token.userType,
      };
      return session;
    },
  },
};
