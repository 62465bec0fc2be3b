import { NextResponse } from 'next/server';
import { extractText } from '@/lib/document/parser';
import { downloadDriveFile, isDriveLink } from '@/lib/google/drive';
import { BadRequestError, handleRouteError, jsonError } from '@/lib/http';
import { analyzeText } from '@/lib/resume/analyze';
import { requireUser } from '@/lib/session';

export async function POST() {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const { resumeUrl } = auth.user;
    if (!resumeUrl) {
      throw new BadRequestError('No resume URL saved in your profile');
    }
    if (!isDriveLink(resumeUrl)) {
      throw new BadRequestError('Invalid resume URL. Must be a Google Drive or Docs link');
    }

    if (!auth.accessToken) {
      return jsonError('Google access token missing. Please sign in again.', 401);
    }

    const document = await downloadDriveFile(auth.accessToken, resumeUrl);
    const text = await extractText(document.data, document.format);

    if (!text.trim()) {
      throw new BadRequestError('Could not extract text from the saved resume');
    }

    const result = analyzeText(text);
    if (!result.ok) throw result.error;

    return NextResponse.json({ parsedData: result.sections, atsScore: result.report });
  } catch (error) {
    return handleRouteError(error, 'scoring saved resume', 'Failed to analyze saved resume');
  }
}
