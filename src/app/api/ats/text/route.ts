import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { handleRouteError, readJson } from '@/lib/http';
import { analyzeText } from '@/lib/resume/analyze';
import { requireUser } from '@/lib/session';

const requestSchema = z.object({
  text: z.string({ required_error: 'No text provided' }).refine((text) => text.trim().length > 0, 'No text provided'),
});

export async function POST(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const { text } = requestSchema.parse(await readJson(request));

    const result = analyzeText(text);
    if (!result.ok) throw result.error;

    return NextResponse.json({ parsedData: result.sections, atsScore: result.report });
  } catch (error) {
    return handleRouteError(error, 'scoring pasted text', 'Failed to analyze resume text');
  }
}
