/**
 * Unit Tests: Profile Text Extraction
 */

import { describe, it, expect } from 'vitest';
import { detectUploadFormat, ProfileTextExtractor } from '../../../src/core/extraction';
import { UnsupportedUploadFormatError, UploadDecodeError } from '../../../src/core/errors';

const encoder = new TextEncoder();

describe('detectUploadFormat', () => {
  it('should prefer the content type and fall back to the extension', () => {
    expect(detectUploadFormat({ bytes: new Uint8Array(), contentType: 'application/pdf' })).toBe('pdf');
    expect(detectUploadFormat({ bytes: new Uint8Array(), contentType: 'text/markdown; charset=utf-8' })).toBe('text');
    expect(detectUploadFormat({ bytes: new Uint8Array(), filename: 'resume.PDF' })).toBe('pdf');
    expect(detectUploadFormat({ bytes: new Uint8Array(), filename: 'notes.md' })).toBe('text');
    expect(detectUploadFormat({ bytes: new Uint8Array(), contentType: 'image/png', filename: 'me.png' })).toBeNull();
  });
});

describe('ProfileTextExtractor', () => {
  const extractor = new ProfileTextExtractor(async (bytes) => `pdf text (${bytes.byteLength} bytes)`);

  it('should decode UTF-8 text uploads', async () => {
    const text = await extractor.extract({ bytes: encoder.encode('Senior engineer – Berlin'), contentType: 'text/plain' });

    expect(text).toBe('Senior engineer – Berlin');
  });

  it('should hand PDFs to the PDF reader', async () => {
    const text = await extractor.extract({ bytes: new Uint8Array(12), filename: 'cv.pdf' });

    expect(text).toBe('pdf text (12 bytes)');
  });

  it('should reject invalid UTF-8', async () => {
    const upload = { bytes: new Uint8Array([0xff, 0xfe, 0x41]), contentType: 'text/plain' };

    await expect(extractor.extract(upload)).rejects.toThrow(UploadDecodeError);
    await expect(extractor.extract(upload)).rejects.toThrow(
      'Could not read the uploaded file (file is not valid UTF-8). Save it as UTF-8 text or PDF and retry.'
    );
  });

  it('should wrap PDF reader failures', async () => {
    const failing = new ProfileTextExtractor(async () => {
      throw new Error('bad xref table');
    });

    await expect(failing.extract({ bytes: new Uint8Array(4), contentType: 'application/pdf' })).rejects.toThrow(
      'Could not read the uploaded file (bad xref table). Save it as UTF-8 text or PDF and retry.'
    );
  });

  it('should reject unsupported formats', async () => {
    const upload = { bytes: new Uint8Array(4), contentType: 'image/png' };

    await expect(extractor.extract(upload)).rejects.toThrow(UnsupportedUploadFormatError);
    await expect(extractor.extract(upload)).rejects.toThrow(
      "Unsupported file type 'image/png'. Upload a .txt, .md or .pdf file."
    );
  });
});
