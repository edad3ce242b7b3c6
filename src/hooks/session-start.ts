/**
 * Session Initialization
 *
 * Runs once per session id: claim the session marker, then load the
 * project's persona descriptor and apply that persona. A later invocation
 * for the same session finds the marker and does nothing.
 *
 * An empty session id can't be coordinated, so it initializes every time.
 * Applying a persona is a whole-file copy, so running it twice is harmless.
 */

import { Logger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import { loadPersonaConfig, validatePersonaConfig } from '../persona/config.js';
import type { PersonaStore } from '../persona/store.js';
import type { SessionCoordinator } from '../state/manager.js';
import type { HookContextOutput, PersonaConfig, Platform } from '../shared/types.js';

export interface SessionStartContext {
  sessionId: string;
  workingDirectory: string;
  platform: Platform;
}

export interface SessionStartDependencies {
  coordinator: SessionCoordinator;
  personas: PersonaStore;
  /** Home directory for global persona descriptors */
  home?: string;
}

export type SessionStartResult =
  | { status: 'already-initialized' }
  | { status: 'no-persona' }
  | { status: 'invalid-persona'; reason: string }
  | { status: 'failed'; persona: string; reason: string }
  | { status: 'applied'; persona: string; config: PersonaConfig };

/**
 * Initialize a session at most once. Never throws: every failure is
 * logged and reported in the result.
 */
export function initializeSession(
  ctx: SessionStartContext,
  deps: SessionStartDependencies
): SessionStartResult {
  if (!deps.coordinator.claimInitialization(ctx.sessionId)) {
    Logger.debug(`session ${ctx.sessionId} already initialized`);
    return { status: 'already-initialized' };
  }
  deps.coordinator.sweepInBackground();

  let config: PersonaConfig | null;
  try {
    config = loadPersonaConfig(ctx.workingDirectory, ctx.platform, deps.home);
  } catch (err: unknown) {
    const reason = errorMessage(err);
    Logger.warn(`could not load persona config: ${reason}`);
    return { status: 'invalid-persona', reason };
  }
  if (!config) {
    return { status: 'no-persona' };
  }

  const problem = validatePersonaConfig(config);
  if (problem) {
    Logger.warn(`invalid persona config: ${problem}`);
    return { status: 'invalid-persona', reason: problem };
  }

  try {
    deps.personas.apply(config.name);
  } catch (err: unknown) {
    const reason = errorMessage(err);
    Logger.warn(`could not apply persona '${config.name}': ${reason}`);
    return { status: 'failed', persona: config.name, reason };
  }

  Logger.debug(`applied persona '${config.name}' for session ${ctx.sessionId || '(unknown)'}`);
  return { status: 'applied', persona: config.name, config };
}

/**
 * Hook stdout for an applied persona with custom instructions; null when
 * there is nothing to inject.
 */
export function buildPersonaContext(
  result: SessionStartResult,
  hookEventName: 'SessionStart' | 'UserPromptSubmit'
): HookContextOutput | null {
  if (result.status !== 'applied') return null;
  const instructions = result.config.custom_instructions?.trim();
  if (!instructions) return null;

  return {
    continue: true,
    hookSpecificOutput: {
      hookEventName,
      additionalContext: `[persona: ${result.persona}]\n${instructions}`,
    },
  };
}
