import type { NextResponse } from 'next/server';
import { getServerSession } from 'next-auth';
import { authOptions } from '@/lib/auth';
import type { UserType } from '@/lib/db/models/user';
import { findUserByEmail, type UserRecord } from '@/lib/db/repositories/users';
import { jsonError } from '@/lib/http';

export type AuthResult =
  | { ok: true; user: UserRecord; accessToken?: string }
  | { ok: false; response: NextResponse };

/**
 * Resolves the signed-in user's document, or a 401 response to return as-is.
 */
export async function requireUser(): Promise<AuthResult> {
  const session = await getServerSession(authOptions);
  const email = session?.user?.email;

  if (!email) {
    return { ok: false, response: jsonError('Not authenticated', 401) };
  }

  const user = await findUserByEmail(email);
  if (!user) {
    return { ok: false, response: jsonError('Not authenticated', 401) };
  }

  return { ok: true, user, accessToken: session?.accessToken };
}

export async function requireRole(role: UserType, message = 'Unauthorized'): Promise<AuthResult> {
  const auth = await requireUser();
  if (!auth.ok) return auth;

  if (auth.user.userType !== role) {
    return { ok: false, response: jsonError(message, 403) };
  }
  return auth;
}
