import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, readJson } from '@/lib/http';
import { applicationInputSchema, listOwnApplications, submitApplication } from '@/lib/placement/applications';
import { requireRole } from '@/lib/session';

export async function POST(request: NextRequest) {
  try {
    const auth = await requireRole('student', 'Only students can apply');
    if (!auth.ok) return auth.response;

    const input = applicationInputSchema.parse(await readJson(request));
    const application = await submitApplication(auth.user, input);

    return NextResponse.json(
      { message: 'Application submitted successfully', application },
      { status: 201 },
    );
  } catch (error) {
    return handleRouteError(error, 'submitting application', 'Failed to submit application');
  }
}

export async function GET() {
  try {
    const auth = await requireRole('student');
    if (!auth.ok) return auth.response;

    return NextResponse.json(await listOwnApplications(auth.user.id));
  } catch (error) {
    return handleRouteError(error, 'fetching student applications', 'Failed to fetch applications');
  }
}
