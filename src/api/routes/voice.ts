/**
 * Voice API Routes
 *
 * POST /voice/token issues a short-lived (60s) Deepgram project key so the
 * browser can open its own speech-to-text WebSocket. The server key never
 * leaves the backend.
 *
 * Returns 503 when DEEPGRAM_API_KEY is not configured.
 */

import { Hono } from 'hono';
import type { VoiceTokenIssuer } from '../../core/voice';
import { success, serviceUnavailable } from '../utils/response';

export interface VoiceRouteDeps {
  voice: VoiceTokenIssuer | null;
}

export function voiceRoutes({ voice }: VoiceRouteDeps): Hono {
  const router = new Hono();

  router.post('/voice/token', async (c) => {
    if (!voice) {
      return serviceUnavailable(c, 'Voice input is not configured. Set DEEPGRAM_API_KEY to enable.');
    }

    return success(c, await voice.issue());
  });

  return router;
}
