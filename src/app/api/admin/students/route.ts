import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, searchParamsOf } from '@/lib/http';
import { listStudentDirectory, studentFilterSchema } from '@/lib/placement/students';
import { requireRole } from '@/lib/session';

export async function GET(request: NextRequest) {
  try {
    const auth = await requireRole('admin');
    if (!auth.ok) return auth.response;

    const filter = studentFilterSchema.parse(searchParamsOf(request));
    const students = await listStudentDirectory(filter);

    return NextResponse.json({ students, total: students.length });
  } catch (error) {
    return handleRouteError(error, 'fetching students', 'Failed to fetch students');
  }
}
