import { NextRequest, NextResponse } from 'next/server';
import { getConfig } from '@/lib/config';
import { detectFormat } from '@/lib/document/parser';
import { BadRequestError, declaresBodyOver, handleRouteError } from '@/lib/http';
import { analyzeResume } from '@/lib/resume/analyze';
import { UnsupportedFormatError } from '@/lib/resume/errors';
import { requireUser } from '@/lib/session';

// Room for the multipart boundaries and part headers around the file
const MULTIPART_OVERHEAD_BYTES = 16 * 1024;

function tooLarge(maxBytes: number): BadRequestError {
  return new BadRequestError(`File size must be less than ${Math.round(maxBytes / (1024 * 1024))}MB`);
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? fileName : fileName.slice(dot + 1).toLowerCase();
}

export async function POST(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const maxBytes = getConfig().MAX_UPLOAD_BYTES;
    if (declaresBodyOver(request.headers, maxBytes + MULTIPART_OVERHEAD_BYTES)) {
      throw tooLarge(maxBytes);
    }

    const formData = await request.formData();
    const file = formData.get('file');

    if (!file || typeof file === 'string') {
      throw new BadRequestError('No file provided');
    }

    const format = detectFormat(file.name);
    if (!format) {
      throw new UnsupportedFormatError(extensionOf(file.name));
    }

    if (file.size > maxBytes) {
      throw tooLarge(maxBytes);
    }

    const buffer = Buffer.from(await file.arrayBuffer());
    const result = await analyzeResume(buffer, format);
    if (!result.ok) throw result.error;

    return NextResponse.json({
      success: true,
      filename: file.name,
      parsedData: result.sections,
      atsScore: result.report,
    });
  } catch (error) {
    return handleRouteError(error, 'scoring uploaded resume', 'Failed to analyze resume');
  }
}
