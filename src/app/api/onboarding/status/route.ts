import { NextResponse } from 'next/server';
import { handleRouteError } from '@/lib/http';
import { requireUser } from '@/lib/session';

export async function GET() {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    return NextResponse.json({ onboardingCompleted: auth.user.onboardingCompleted });
  } catch (error) {
    return handleRouteError(error, 'checking onboarding status', 'Failed to check onboarding status');
  }
}
