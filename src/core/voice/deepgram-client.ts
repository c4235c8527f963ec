/**
 * Deepgram Voice Tokens
 *
 * The Deepgram API key stays server-side. Clients ask `POST /api/voice/token`
 * for a short-lived project key and open their own streaming connection to
 * Deepgram with it; transcript text then comes back through
 * `POST /api/session/:id/transcript`.
 */

import { createClient, type DeepgramClient } from '@deepgram/sdk';

// =============================================================================
// Deepgram Transcription Configuration
// =============================================================================

/**
 * Streaming parameters handed to clients alongside the token, so they can
 * build the listen URL.
 */
export const DEEPGRAM_CONFIG = {
  model: 'nova-2',
  language: 'en',
  smart_format: true,
  punctuate: true,
  interim_results: true,
} as const;

/** Lifetime of issued keys. */
export const VOICE_TOKEN_TTL_SECONDS = 60;

// =============================================================================
// Token Issuing
// =============================================================================

export interface VoiceToken {
  token: string;
  expiresAt: string;
  config: typeof DEEPGRAM_CONFIG;
}

export interface VoiceTokenIssuer {
  issue(): Promise<VoiceToken>;
}

export class VoiceTokenError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'VoiceTokenError';
  }
}

export function createDeepgramClient(apiKey: string): DeepgramClient {
  return createClient(apiKey);
}

/**
 * Issues 60-second `usage:write` keys on the first project the server key
 * belongs to.
 */
export class DeepgramTokenIssuer implements VoiceTokenIssuer {
  private readonly client: DeepgramClient;

  constructor(
    apiKey: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.client = createDeepgramClient(apiKey);
  }

  async issue(): Promise<VoiceToken> {
    const { result: projects, error: projectsError } = await this.client.manage.getProjects();
    const project = projects?.projects[0];
    if (projectsError || !project) {
      throw new VoiceTokenError('Failed to retrieve Deepgram project information', projectsError);
    }

    const { result: keyResult, error: keyError } = await this.client.manage.createProjectKey(
      project.project_id,
      {
        comment: 'Temporary voice input token',
        scopes: ['usage:write'],
        time_to_live_in_seconds: VOICE_TOKEN_TTL_SECONDS,
      }
    );
    if (keyError || !keyResult?.key) {
      throw new VoiceTokenError('Failed to create temporary voice token', keyError);
    }

    return {
      token: keyResult.key,
      expiresAt: new Date(this.now().getTime() + VOICE_TOKEN_TTL_SECONDS * 1000).toISOString(),
      config: DEEPGRAM_CONFIG,
    };
  }
}
