export { detect, detectOrThrow, CODEX_TURN_COMPLETE } from './detect.js';
export type { DetectResult } from './detect.js';
export { readHookInput, readStream, looksLikeJsonObject } from './input.js';
export type { InputStream } from './input.js';
export { initializeSession, buildPersonaContext } from './session-start.js';
export type {
  SessionStartContext,
  SessionStartDependencies,
  SessionStartResult,
} from './session-start.js';
export { createHookSpeaker } from './speech.js';
export type { SpeechRequest, HookSpeaker, HookSpeechOutcome, HookSpeakerOptions } from './speech.js';
export { runHook, runNotify } from './dispatch.js';
export type { HookDependencies, DispatchAction, DispatchResult } from './dispatch.js';
