import { google } from 'googleapis';
import { detectFormat, mimeTypeFor } from '@/lib/document/parser';
import { logWarning } from '@/lib/debug';
import { BadGatewayError, BadRequestError, UnauthorizedError } from '@/lib/http';
import type { RawDocument } from '@/lib/resume/types';

const DRIVE_LINK_PREFIXES = ['https://drive.google.com/', 'https://docs.google.com/'];

const GOOGLE_DOC_MIME_TYPE = 'application/vnd.google-apps.document';

export interface DriveDocument extends RawDocument {
  fileName: string;
}

export function isDriveLink(link: string | null | undefined): boolean {
  if (!link) return false;
  return DRIVE_LINK_PREFIXES.some((prefix) => link.startsWith(prefix));
}

/**
 * Pulls the file id out of the usual share formats:
 * .../file/d/<id>/view, .../document/d/<id>/edit, ...?id=<id>
 */
export function extractDriveFileId(link: string): string | null {
  const pathMatch = link.match(/\/d\/([^/?#]+)/);
  if (pathMatch) return pathMatch[1];

  const queryMatch = link.match(/[?&]id=([^&#]+)/);
  return queryMatch ? queryMatch[1] : null;
}

// googleapis reports HTTP failures as GaxiosError with the status on `status` or `code`
function isRejectedToken(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('status' in error && error.status === 401) return true;
  return 'code' in error && (error.code === 401 || error.code === '401');
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  throw new Error('Unexpected Drive response body');
}

/**
 * Downloads a file the signed-in user can read. Google Docs are exported as DOCX;
 * anything that is neither PDF nor DOCX is handed on as plain text.
 */
export async function downloadDriveFile(accessToken: string, link: string): Promise<DriveDocument> {
  const fileId = extractDriveFileId(link);
  if (!fileId) {
    throw new BadRequestError('Could not find a file id in the Drive link');
  }

  const auth = new google.auth.OAuth2();
  auth.setCredentials({ access_token: accessToken });

  const drive = google.drive({ version: 'v3', auth });

  try {
    const metadata = await drive.files.get({
      fileId,
      fields: 'id, name, mimeType',
      supportsAllDrives: true,
    });

    const fileName = metadata.data.name ?? 'resume';
    const mimeType = metadata.data.mimeType ?? '';

    if (mimeType === GOOGLE_DOC_MIME_TYPE) {
      const exported = await drive.files.export(
        { fileId, mimeType: mimeTypeFor('docx') },
        { responseType: 'arraybuffer' },
      );
      return { data: toBuffer(exported.data), fileName: `${fileName}.docx`, format: 'docx' };
    }

    const fileResponse = await drive.files.get(
      { fileId, alt: 'media', supportsAllDrives: true },
      { responseType: 'arraybuffer' },
    );

    return {
      data: toBuffer(fileResponse.data),
      fileName,
      format: detectFormat(fileName, mimeType) ?? 'plaintext',
    };
  } catch (error) {
    if (isRejectedToken(error)) {
      throw new UnauthorizedError('Google access expired. Please sign in again.');
    }
    logWarning(`Drive download failed for file ${fileId}:`, error);
    throw new BadGatewayError('Failed to download resume from Drive', error);
  }
}
