import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import { ExtractionFailureError, UnsupportedFormatError } from '@/lib/resume/errors';
import type { DocumentFormat } from '@/lib/resume/types';

const MIME_TYPES: Record<DocumentFormat, string> = {
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  plaintext: 'text/plain',
};

const EXTENSIONS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'plaintext',
};

export function isDocumentFormat(value: string): value is DocumentFormat {
  return value === 'pdf' || value === 'docx' || value === 'plaintext';
}

export function mimeTypeFor(format: DocumentFormat): string {
  return MIME_TYPES[format];
}

/**
 * Works out the document format from a file name, falling back to the MIME type.
 * Returns null for anything other than PDF, DOCX or plain text.
 */
export function detectFormat(fileName: string, mimeType?: string): DocumentFormat | null {
  const lowerName = fileName.toLowerCase();
  for (const [extension, format] of Object.entries(EXTENSIONS)) {
    if (lowerName.endsWith(extension)) return format;
  }

  if (mimeType) {
    const bareType = mimeType.split(';')[0].trim().toLowerCase();
    for (const [format, type] of Object.entries(MIME_TYPES)) {
      if (type === bareType && isDocumentFormat(format)) return format;
    }
  }

  return null;
}

export async function parsePDF(buffer: Buffer): Promise<string> {
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.pages.map((page) => `${page.text}\n`).join('');
  } finally {
    await parser.destroy();
  }
}

export async function parseDOCX(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  // mammoth terminates every paragraph with a blank line
  const paragraphs = result.value.split('\n\n');
  if (paragraphs[paragraphs.length - 1] === '') paragraphs.pop();
  return paragraphs.map((paragraph) => `${paragraph}\n`).join('');
}

export function parsePlainText(buffer: Buffer): string {
  // invalid UTF-8 sequences become U+FFFD instead of throwing
  return buffer.toString('utf-8');
}

export async function extractText(buffer: Buffer, format: string): Promise<string> {
  if (!isDocumentFormat(format)) {
    throw new UnsupportedFormatError(format);
  }

  if (format === 'plaintext') {
    return parsePlainText(buffer);
  }

  try {
    return format === 'pdf' ? await parsePDF(buffer) : await parseDOCX(buffer);
  } catch (error) {
    throw new ExtractionFailureError(format, error);
  }
}
