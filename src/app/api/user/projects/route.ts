import { NextRequest, NextResponse } from 'next/server';
import { handleRouteError, readJson } from '@/lib/http';
import { addOwnProject, listOwnProjects, personalProjectSchema } from '@/lib/placement/personal-projects';
import { requireUser } from '@/lib/session';

export async function GET() {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const projects = await listOwnProjects(auth.user.id);
    return NextResponse.json({ projects });
  } catch (error) {
    return handleRouteError(error, 'listing personal projects', 'Failed to fetch projects');
  }
}

export async function POST(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const input = personalProjectSchema.parse(await readJson(request));
    const project = await addOwnProject(auth.user.id, input);

    return NextResponse.json({ message: 'Project created successfully', project }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, 'creating personal project', 'Failed to create project');
  }
}
