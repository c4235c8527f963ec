export {
  DEEPGRAM_CONFIG,
  VOICE_TOKEN_TTL_SECONDS,
  DeepgramTokenIssuer,
  VoiceTokenError,
  createDeepgramClient,
  type VoiceToken,
  type VoiceTokenIssuer,
} from './deepgram-client';
