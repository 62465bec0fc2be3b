import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, readJson } from '@/lib/http';
import { helpReportSchema, submitHelpReport } from '@/lib/placement/help';
import { requireUser } from '@/lib/session';

export async function POST(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const input = helpReportSchema.parse(await readJson(request));
    const { id } = await submitHelpReport(auth.user, input);

    return NextResponse.json({ message: 'Report submitted successfully', id }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, 'submitting help report', 'Failed to submit report');
  }
}
