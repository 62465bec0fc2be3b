import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, searchParamsOf } from '@/lib/http';
import { applicationFilterSchema, listAllApplications } from '@/lib/placement/applications';
import { requireRole } from '@/lib/session';

export async function GET(request: NextRequest) {
  try {
    const auth = await requireRole('admin');
    if (!auth.ok) return auth.response;

    const filter = applicationFilterSchema.parse(searchParamsOf(request));
    return NextResponse.json(await listAllApplications(filter));
  } catch (error) {
    return handleRouteError(error, 'fetching applications', 'Failed to fetch applications');
  }
}
