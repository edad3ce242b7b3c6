/**
 * persona-hooks
 *
 * Hook companion for AI coding assistants: applies a persona at session
 * start, reads the assistant's replies aloud and raises desktop alerts.
 * Works with Claude Code, Codex and Cursor hook payloads.
 */

// Hooks
export {
  detect,
  detectOrThrow,
  readHookInput,
  initializeSession,
  buildPersonaContext,
  createHookSpeaker,
  runHook,
  runNotify,
} from './hooks/index.js';
export type {
  DetectResult,
  SessionStartResult,
  SpeechRequest,
  HookSpeaker,
  HookDependencies,
  DispatchAction,
  DispatchResult,
} from './hooks/index.js';

// Config
export {
  loadVoiceConfig,
  loadConfigFromPath,
  validateVoiceConfig,
  maskSecrets,
  generateExampleConfig,
  expandEnv,
  resolve,
  VOICE_DEFAULTS,
} from './config/index.js';

// State
export { SessionCoordinator, getStateDir, fingerprint } from './state/index.js';

// Persona
export {
  PersonaStore,
  loadPersonaConfig,
  savePersonaConfig,
  validatePersonaConfig,
  toPersonaVoice,
} from './persona/index.js';

// Voice
export {
  speak,
  prepareSpeech,
  createProvider,
  readLatestAssistantMessage,
  findLatestTranscript,
  normalizeReadingMode,
  applyReadingMode,
  stripMarkup,
} from './voice/index.js';
export type { SpeechProvider, SpeakOutcome } from './voice/index.js';

// Notify
export { sendNotification, urgencyFor } from './notify/index.js';

// Errors
export {
  PersonaHooksError,
  DetectionError,
  ConfigError,
  MissingCredentialError,
  NoAssistantMessageError,
  ProviderError,
  PersonaError,
} from './shared/errors.js';

// Types
export type {
  HookSource,
  Platform,
  NormalizedEvent,
  ClaudeCodeEvent,
  CodexEvent,
  CursorEvent,
  ClaudeCodePayload,
  CodexPayload,
  CursorPayload,
  CliVoiceFlags,
  PersonaVoice,
  EffectiveVoiceParameters,
  VoiceConfigFile,
  ProviderSettings,
  PersonaConfig,
  StateWriteResult,
  SweepResult,
} from './shared/types.js';
