export {
  normalizeReadingMode,
  applyReadingMode,
  stripMarkup,
  normalizeForSpeech,
} from './text.js';
export {
  parseTranscript,
  extractAssistantText,
  readLatestAssistantMessage,
  findLatestTranscript,
} from './transcript.js';
export type { TranscriptOptions } from './transcript.js';
export { providerRequest } from './http.js';
export type { FetchLike } from './http.js';
export {
  createProvider,
  OpenAIProvider,
  ElevenLabsProvider,
  OPENAI_SPEECH_URL,
  ELEVENLABS_API_URL,
  ELEVENLABS_VOICES_URL,
} from './provider.js';
export type { SpeechProvider, VoiceInfo } from './provider.js';
export { LocalEngineProvider } from './engine.js';
export { playAudio, playerCandidates, selectPlayer } from './player.js';
export type { PlayerCommand, PlayOptions } from './player.js';
export { speak, prepareSpeech } from './speak.js';
export type { SpeakOutcome, SpeakOptions, SpeakDependencies } from './speak.js';
