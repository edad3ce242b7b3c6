/**
 * Speech for hook events.
 *
 * Hooks take no voice flags, so parameters come from the persona
 * descriptor and the provider-settings file of the event's working
 * directory, over built-in defaults.
 */

import { loadVoiceConfig } from '../config/loader.js';
import { resolve } from '../config/resolve.js';
import { loadPersonaConfig, toPersonaVoice } from '../persona/config.js';
import { NoAssistantMessageError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { Platform } from '../shared/types.js';
import type { SessionCoordinator } from '../state/manager.js';
import { prepareSpeech, speak, type SpeakDependencies, type SpeakOutcome } from '../voice/speak.js';
import { readLatestAssistantMessage } from '../voice/transcript.js';

export interface SpeechRequest {
  sessionId: string;
  workingDirectory: string;
  platform: Platform;
  /** Text to speak; ignored when transcriptPath is set */
  text?: string;
  /** Read the latest assistant message from this transcript instead */
  transcriptPath?: string;
}

export type HookSpeechOutcome = SpeakOutcome | 'no-message';

export type HookSpeaker = (request: SpeechRequest) => Promise<HookSpeechOutcome>;

export interface HookSpeakerOptions extends Omit<SpeakDependencies, 'coordinator'> {
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the speaker used by hook dispatch.
 * Configuration and provider errors propagate; dispatch logs them.
 */
export function createHookSpeaker(
  coordinator: SessionCoordinator,
  options: HookSpeakerOptions = {}
): HookSpeaker {
  const { home, env, ...speakDeps } = options;

  return async (request) => {
    const persona = loadPersonaConfig(request.workingDirectory, request.platform, home);
    const file = loadVoiceConfig({ workingDirectory: request.workingDirectory, home, env });
    const params = resolve({}, toPersonaVoice(persona), file?.config, env);

    let text: string;
    if (request.transcriptPath) {
      try {
        text = readLatestAssistantMessage(request.transcriptPath, {
          mode: params.readingMode,
          maxChars: params.maxChars,
        });
      } catch (err: unknown) {
        if (err instanceof NoAssistantMessageError) {
          Logger.debug(`nothing to speak: ${err.message}`);
          return 'no-message';
        }
        throw err;
      }
    } else {
      text = prepareSpeech(request.text ?? '', params);
    }

    return speak(text, params, { sessionId: request.sessionId }, { ...speakDeps, coordinator });
  };
}
