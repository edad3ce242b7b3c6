/**
 * Hook Dispatch
 *
 * Entry points for the `hook` and `notify` commands. Each takes the raw
 * payload, detects its protocol and routes the event to collaborators
 * (persona store, speech, desktop notifications).
 *
 * Neither entry point throws. A hook must never surface a crash to its
 * host, so every failure is logged and recorded in the result. A payload
 * that can't be detected falls back to the legacy initialization: session
 * start with no session id in the process working directory.
 */

import { Logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type {
  ClaudeCodeEvent,
  CodexEvent,
  CursorEvent,
  HookContextOutput,
  NormalizedEvent,
  Urgency,
} from '../shared/types.js';
import type { PersonaStore } from '../persona/store.js';
import type { SessionCoordinator } from '../state/manager.js';
import { urgencyFor, DEFAULT_TITLE } from '../notify/desktop.js';
import { detect } from './detect.js';
import { buildPersonaContext, initializeSession, type SessionStartResult } from './session-start.js';
import type { HookSpeaker, HookSpeechOutcome } from './speech.js';

export interface HookDependencies {
  coordinator: SessionCoordinator;
  personas: PersonaStore;
  speak: HookSpeaker;
  notify: (title: string, message: string, urgency: Urgency) => Promise<void>;
  /** Working directory for events that carry none */
  cwd: string;
  /** Home directory for global persona descriptors */
  home?: string;
  /** Hook stdout (context injection for Claude Code) */
  write?: (output: string) => void;
  /** `notify --no-voice` turns speech off (default on) */
  voice?: boolean;
  /** `notify --no-desktop` turns desktop notifications off (default on) */
  desktop?: boolean;
}

export type DispatchAction =
  | { type: 'legacy-initialization'; result: SessionStartResult }
  | { type: 'session-initialization'; result: SessionStartResult }
  | { type: 'speak'; outcome: HookSpeechOutcome }
  | { type: 'notify'; title: string; urgency: Urgency }
  | { type: 'ignored' };

export interface DispatchResult {
  event: NormalizedEvent | null;
  actions: DispatchAction[];
  errors: string[];
}

// ---------------------------------------------------------------------------
// Shared steps
// ---------------------------------------------------------------------------

function workingDirectory(event: NormalizedEvent, deps: HookDependencies): string {
  return event.workingDirectory || deps.cwd;
}

function startSession(
  event: NormalizedEvent,
  deps: HookDependencies,
  result: DispatchResult
): SessionStartResult {
  const started = initializeSession(
    {
      sessionId: event.sessionId,
      workingDirectory: workingDirectory(event, deps),
      platform: event.source,
    },
    deps
  );
  result.actions.push({ type: 'session-initialization', result: started });
  return started;
}

function legacyInitialization(deps: HookDependencies, result: DispatchResult): void {
  const started = initializeSession(
    { sessionId: '', workingDirectory: deps.cwd, platform: 'claude-code' },
    deps
  );
  result.actions.push({ type: 'legacy-initialization', result: started });
}

function acceptsContext(eventType: string): eventType is 'SessionStart' | 'UserPromptSubmit' {
  return eventType === 'SessionStart' || eventType === 'UserPromptSubmit';
}

/** Emit persona context on stdout for Claude Code session/prompt events. */
function emitContext(
  started: SessionStartResult,
  eventType: string,
  deps: HookDependencies
): void {
  if (!deps.write || !acceptsContext(eventType)) return;
  const output: HookContextOutput | null = buildPersonaContext(started, eventType);
  if (output) deps.write(JSON.stringify(output));
}

async function trySpeak(
  event: NormalizedEvent,
  deps: HookDependencies,
  result: DispatchResult,
  source: { text?: string; transcriptPath?: string }
): Promise<void> {
  if (deps.voice === false) {
    Logger.debug('speech disabled');
    return;
  }
  try {
    const outcome = await deps.speak({
      sessionId: event.sessionId,
      workingDirectory: workingDirectory(event, deps),
      platform: event.source,
      ...source,
    });
    result.actions.push({ type: 'speak', outcome });
  } catch (err: unknown) {
    const message = `speech failed: ${errorMessage(err)}`;
    Logger.warn(message);
    result.errors.push(message);
  }
}

async function tryNotify(
  title: string,
  message: string,
  urgency: Urgency,
  deps: HookDependencies,
  result: DispatchResult
): Promise<void> {
  if (deps.desktop === false) {
    Logger.debug('desktop notifications disabled');
    return;
  }
  try {
    await deps.notify(title, message, urgency);
    result.actions.push({ type: 'notify', title, urgency });
  } catch (err: unknown) {
    const text = `notification failed: ${errorMessage(err)}`;
    Logger.warn(text);
    result.errors.push(text);
  }
}

function detectOrFallback(raw: string, deps: HookDependencies, result: DispatchResult): NormalizedEvent | null {
  const detected = detect(raw);
  if (detected.ok) {
    Logger.debug(`detected ${detected.event.source} event ${detected.event.eventType}`);
    result.event = detected.event;
    return detected.event;
  }
  Logger.debug(`${detected.error.kind}: ${detected.error.message}; using legacy initialization`);
  legacyInitialization(deps, result);
  return null;
}

// ---------------------------------------------------------------------------
// hook command
// ---------------------------------------------------------------------------

const SESSION_EVENTS = new Set(['SessionStart', 'UserPromptSubmit', 'sessionStart', 'beforeSubmitPrompt']);

/**
 * `hook`: session initialization only. Session and prompt events
 * initialize; everything else is ignored.
 */
export function runHook(raw: string, deps: HookDependencies): DispatchResult {
  const result: DispatchResult = { event: null, actions: [], errors: [] };
  try {
    const event = detectOrFallback(raw, deps, result);
    if (!event) return result;

    if (SESSION_EVENTS.has(event.eventType)) {
      const started = startSession(event, deps, result);
      if (event.source === 'claude-code') emitContext(started, event.eventType, deps);
    } else {
      result.actions.push({ type: 'ignored' });
    }
  } catch (err: unknown) {
    const message = `hook failed: ${errorMessage(err)}`;
    Logger.error(message);
    result.errors.push(message);
  }
  return result;
}

// ---------------------------------------------------------------------------
// notify command
// ---------------------------------------------------------------------------

async function notifyCodex(event: CodexEvent, deps: HookDependencies, result: DispatchResult): Promise<void> {
  const turn = event.payload['turn-id'];
  await tryNotify('Codex', turn ? `Turn ${turn} completed` : 'Turn completed', 'normal', deps, result);
  await trySpeak(event, deps, result, { text: event.assistantResponseText });
}

async function notifyCursor(event: CursorEvent, deps: HookDependencies, result: DispatchResult): Promise<void> {
  switch (event.eventType) {
    case 'sessionStart':
    case 'beforeSubmitPrompt':
      startSession(event, deps, result);
      return;
    case 'afterAgentResponse':
      await trySpeak(event, deps, result, { text: event.assistantResponseText });
      return;
    default:
      result.actions.push({ type: 'ignored' });
  }
}

async function notifyClaudeCode(
  event: ClaudeCodeEvent,
  deps: HookDependencies,
  result: DispatchResult
): Promise<void> {
  const payload = event.payload;
  switch (payload.kind) {
    case 'prompt':
    case 'session':
      if (event.eventType === 'SessionEnd') {
        result.actions.push({ type: 'ignored' });
        return;
      }
      emitContext(startSession(event, deps, result), event.eventType, deps);
      return;
    case 'stop':
      if (event.eventType === 'SubagentStop') {
        result.actions.push({ type: 'ignored' });
        return;
      }
      await trySpeak(event, deps, result, { transcriptPath: payload.transcript_path });
      return;
    case 'notification': {
      const title = payload.title || DEFAULT_TITLE;
      await tryNotify(title, payload.message, urgencyFor(payload.message, payload.notification_type), deps, result);
      await trySpeak(event, deps, result, { text: event.assistantResponseText });
      return;
    }
    case 'other':
      result.actions.push({ type: 'ignored' });
  }
}

/**
 * `notify`: the full reaction to an event (notifications, speech, persona).
 */
export async function runNotify(raw: string, deps: HookDependencies): Promise<DispatchResult> {
  const result: DispatchResult = { event: null, actions: [], errors: [] };
  try {
    const event = detectOrFallback(raw, deps, result);
    if (!event) return result;

    switch (event.source) {
      case 'codex':
        await notifyCodex(event, deps, result);
        break;
      case 'cursor':
        await notifyCursor(event, deps, result);
        break;
      case 'claude-code':
        await notifyClaudeCode(event, deps, result);
        break;
    }
  } catch (err: unknown) {
    const message = `notify failed: ${errorMessage(err)}`;
    Logger.error(message);
    result.errors.push(message);
  }
  return result;
}
