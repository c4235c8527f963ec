/**
 * API Tests: Profile Upload
 *
 * Multipart uploads of text and PDF profiles. PDF parsing is replaced by
 * the context's stub reader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { z } from 'zod';
import { createTestContext, createTestApp, cleanupTestDatabase, type TestContext } from '../setup';
import { createSessionWithTurns, jsonRequest, readData, readError } from '../helpers';

const uploadSchema = z.object({ status: z.literal('ok'), characters: z.number() });

function upload(sessionId: string | null, file: File | null): RequestInit {
  const form = new FormData();
  if (sessionId !== null) form.append('session_id', sessionId);
  if (file) form.append('file', file);
  return { method: 'POST', body: form };
}

describe('POST /api/upload_profile', () => {
  let ctx: TestContext;
  let app: Hono;
  let sessionId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    app = createTestApp(ctx);
    sessionId = (await createSessionWithTurns(ctx.store)).id;
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  it('should store a text profile and audit the upload', async () => {
    // Arrange
    const file = new File(['Senior engineer, 8 years Go'], 'resume.txt', { type: 'text/plain' });

    // Act
    const res = await app.request('/api/upload_profile', upload(sessionId, file));

    // Assert
    expect(res.status).toBe(200);
    expect(await readData(res, uploadSchema)).toEqual({ status: 'ok', characters: 27 });
    expect((await ctx.store.require(sessionId)).profileText).toBe('Senior engineer, 8 years Go');
    expect(ctx.audit.ofType('profile_upload')).toEqual([
      { type: 'profile_upload', sessionId, filename: 'resume.txt', bytes: 27 },
    ]);
  });

  it('should include the profile in later prompts', async () => {
    const file = new File(['Led the payments team'], 'notes.md', { type: '' });
    await app.request('/api/upload_profile', upload(sessionId, file));

    await app.request('/api/question', jsonRequest('POST', { sessionId, question: 'Tell me about yourself' }));

    expect(ctx.model.requests[0]?.system).toContain('Led the payments team');
  });

  it('should extract PDF uploads through the PDF reader', async () => {
    const file = new File([new Uint8Array([1, 2, 3])], 'cv.pdf', { type: 'application/pdf' });

    const res = await app.request('/api/upload_profile', upload(sessionId, file));

    expect(await readData(res, uploadSchema)).toEqual({ status: 'ok', characters: 18 });
    expect((await ctx.store.require(sessionId)).profileText).toBe('pdf text (3 bytes)');
  });

  it('should reject unsupported formats with 415', async () => {
    const file = new File(['x'], 'photo.png', { type: 'image/png' });

    const res = await app.request('/api/upload_profile', upload(sessionId, file));

    expect(res.status).toBe(415);
    const error = await readError(res);
    expect(error.code).toBe('UNSUPPORTED_UPLOAD_FORMAT');
    expect(error.message).toBe("Unsupported file type 'image/png'. Upload a .txt, .md or .pdf file.");
  });

  it('should reject text that is not UTF-8', async () => {
    const file = new File([new Uint8Array([0xff, 0xfe, 0xfd])], 'notes.txt', { type: 'text/plain' });

    const res = await app.request('/api/upload_profile', upload(sessionId, file));

    expect(res.status).toBe(400);
    expect((await readError(res)).code).toBe('UPLOAD_DECODE_FAILED');
    expect((await ctx.store.require(sessionId)).profileText).toBeNull();
  });

  it('should reject a file with only whitespace', async () => {
    const file = new File(['  \n '], 'empty.txt', { type: 'text/plain' });

    const res = await app.request('/api/upload_profile', upload(sessionId, file));

    expect(res.status).toBe(400);
    expect(await readError(res)).toEqual({ code: 'EMPTY_UPLOAD', message: 'Uploaded file appears empty.' });
  });

  it('should require both form fields', async () => {
    const file = new File(['text'], 'a.txt', { type: 'text/plain' });

    const noSession = await app.request('/api/upload_profile', upload(null, file));
    const noFile = await app.request('/api/upload_profile', upload(sessionId, null));

    expect(await readError(noSession)).toEqual({ code: 'BAD_REQUEST', message: 'session_id is required' });
    expect(await readError(noFile)).toEqual({ code: 'BAD_REQUEST', message: 'file is required' });
  });

  it('should return 404 for an unknown session', async () => {
    const file = new File(['text'], 'a.txt', { type: 'text/plain' });

    const res = await app.request('/api/upload_profile', upload('missing', file));

    expect(res.status).toBe(404);
  });
});
