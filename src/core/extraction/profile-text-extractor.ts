/**
 * Profile Text Extraction
 *
 * Turns an uploaded profile (resume, notes) into plain text. Plain-text
 * uploads are decoded as strict UTF-8; PDFs go through pdf-parse. The format
 * is chosen from the content type first, then the file extension.
 */

import { UnsupportedUploadFormatError, UploadDecodeError } from '../errors';

export interface ProfileUpload {
  bytes: Uint8Array;
  contentType?: string | null;
  filename?: string | null;
}

export type PdfTextReader = (bytes: Uint8Array) => Promise<string>;

type UploadFormat = 'text' | 'pdf';

const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown'];

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot).toLowerCase();
}

export function detectUploadFormat(upload: ProfileUpload): UploadFormat | null {
  const contentType = (upload.contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
  const extension = extensionOf(upload.filename ?? '');

  if (contentType === 'application/pdf' || extension === '.pdf') return 'pdf';
  if (contentType.startsWith('text/') || TEXT_EXTENSIONS.includes(extension)) return 'text';
  return null;
}

/**
 * Reads PDF text with pdf-parse, loaded on first use so text-only
 * deployments never pay for it.
 */
export const readPdfText: PdfTextReader = async (bytes) => {
  const { default: pdfParse } = await import('pdf-parse/lib/pdf-parse.js');
  const result = await pdfParse(Buffer.from(bytes));
  return result.text;
};

export class ProfileTextExtractor {
  constructor(private readonly pdfReader: PdfTextReader = readPdfText) {}

  /**
   * @throws {UnsupportedUploadFormatError} For anything but text and PDF
   * @throws {UploadDecodeError} When the bytes cannot be read in the detected format
   */
  async extract(upload: ProfileUpload): Promise<string> {
    const format = detectUploadFormat(upload);

    if (format === 'text') {
      try {
        return new TextDecoder('utf-8', { fatal: true }).decode(upload.bytes);
      } catch {
        throw new UploadDecodeError('file is not valid UTF-8');
      }
    }

    if (format === 'pdf') {
      try {
        return await this.pdfReader(upload.bytes);
      } catch (err) {
        throw new UploadDecodeError(err instanceof Error ? err.message : 'unreadable PDF');
      }
    }

    throw new UnsupportedUploadFormatError(upload.contentType || upload.filename || '');
  }
}
