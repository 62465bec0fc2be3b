import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, readJson } from '@/lib/http';
import { profileUpdateSchema, toProfile, updateProfile } from '@/lib/placement/profile';
import { requireUser } from '@/lib/session';

export async function GET() {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    return NextResponse.json(toProfile(auth.user));
  } catch (error) {
    return handleRouteError(error, 'fetching user profile', 'Failed to fetch profile');
  }
}

export async function PUT(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const input = profileUpdateSchema.parse(await readJson(request));
    const profile = await updateProfile(auth.user, input);

    return NextResponse.json({ message: 'Profile updated successfully', user: profile });
  } catch (error) {
    return handleRouteError(error, 'updating user profile', 'Failed to update profile');
  }
}
