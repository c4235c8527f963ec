/**
 * Profile Upload Route
 *
 * POST /upload_profile takes multipart form data with `session_id` and
 * `file` (plain text, markdown or PDF). The extracted text is stored on the
 * session and injected into later system prompts.
 */

import { Hono } from 'hono';
import type { SessionStore } from '../../core/session';
import type { ProfileTextExtractor } from '../../core/extraction';
import type { AuditSink } from '../../core/audit';
import { success, badRequest, error } from '../utils/response';
import { ErrorCodes } from '../middleware/error-handler';

export interface ProfileRouteDeps {
  store: SessionStore;
  extractor: ProfileTextExtractor;
  audit: AuditSink;
}

export function profileRoutes({ store, extractor, audit }: ProfileRouteDeps): Hono {
  const router = new Hono();

  router.post('/upload_profile', async (c) => {
    const form = await c.req.parseBody();
    const sessionId = form['session_id'];
    const file = form['file'];

    if (typeof sessionId !== 'string' || !sessionId.trim()) {
      return badRequest(c, 'session_id is required');
    }
    if (!(file instanceof File)) {
      return badRequest(c, 'file is required');
    }

    await store.require(sessionId);

    const bytes = new Uint8Array(await file.arrayBuffer());
    const text = await extractor.extract({
      bytes,
      contentType: file.type.toLowerCase(),
      filename: file.name.toLowerCase(),
    });

    if (!text.trim()) {
      return error(c, ErrorCodes.EMPTY_UPLOAD, 'Uploaded file appears empty.', 400);
    }

    await store.setProfile(sessionId, text);
    void audit.record({
      type: 'profile_upload',
      sessionId,
      filename: file.name,
      bytes: bytes.byteLength,
    });

    return success(c, { status: 'ok', characters: text.length });
  });

  return router;
}
