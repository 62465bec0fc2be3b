import { NextResponse } from 'next/server';
import { handleRouteError } from '@/lib/http';
import { toProfile } from '@/lib/placement/profile';
import { requireUser } from '@/lib/session';

export async function GET() {
  try {
    const auth = await requireUser();
    if (!auth.ok) {
      return NextResponse.json({ authenticated: false }, { status: 401 });
    }

    return NextResponse.json({ authenticated: true, user: toProfile(auth.user) });
  } catch (error) {
    return handleRouteError(error, 'checking auth status', 'Failed to check authentication');
  }
}
