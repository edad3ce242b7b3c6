/**
 * Speech pipeline: normalize → dedup check → synthesize → play → record.
 */

import { writeFileSync } from 'fs';
import { ProviderError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { EffectiveVoiceParameters } from '../shared/types.js';
import type { SessionCoordinator } from '../state/manager.js';
import type { FetchLike } from './http.js';
import { playAudio } from './player.js';
import { createProvider, type SpeechProvider } from './provider.js';
import { applyReadingMode, normalizeForSpeech, stripMarkup } from './text.js';

export type SpeakOutcome = 'spoken' | 'written' | 'empty' | 'duplicate';

export interface SpeakOptions {
  /** Enables dedup against the session's last utterance */
  sessionId?: string;
  /** Write audio here instead of playing it */
  output?: string;
  /** Write audio to stdout instead of playing it */
  toStdout?: boolean;
}

export interface SpeakDependencies {
  coordinator?: SessionCoordinator;
  fetchImpl?: FetchLike;
  createProvider?: (params: EffectiveVoiceParameters) => SpeechProvider;
  play?: (audio: Buffer, extension: string) => Promise<void>;
  stdout?: { write(chunk: Uint8Array): unknown };
}

/** Strip markup, then cut to the reading mode. */
export function prepareSpeech(text: string, params: EffectiveVoiceParameters): string {
  return applyReadingMode(stripMarkup(text), params.readingMode, params.maxChars);
}

/**
 * Speak `text` once per session.
 *
 * Returns what happened; provider and playback failures propagate so the
 * caller decides whether they matter. The dedup record is only written
 * after audio was produced.
 */
export async function speak(
  text: string,
  params: EffectiveVoiceParameters,
  options: SpeakOptions = {},
  deps: SpeakDependencies = {}
): Promise<SpeakOutcome> {
  const normalized = normalizeForSpeech(text);
  if (normalized === '') {
    Logger.debug('nothing to speak');
    return 'empty';
  }

  const sessionId = options.sessionId ?? '';
  const { coordinator } = deps;
  if (coordinator && coordinator.isDuplicate(sessionId, normalized)) {
    Logger.debug(`skipping duplicate utterance for session ${sessionId}`);
    return 'duplicate';
  }

  const provider = deps.createProvider
    ? deps.createProvider(params)
    : createProvider(params, deps.fetchImpl);
  if (provider.isAvailable && !(await provider.isAvailable())) {
    throw new ProviderError(provider.name, 'network', 'engine is not running');
  }
  const audio = await provider.synthesize(normalized, params);

  let outcome: SpeakOutcome;
  if (options.output) {
    writeFileSync(options.output, audio);
    Logger.info(`audio written to ${options.output}`);
    outcome = 'written';
  } else if (options.toStdout) {
    (deps.stdout ?? process.stdout).write(audio);
    outcome = 'written';
  } else {
    await (deps.play ?? playAudio)(audio, provider.fileExtension);
    outcome = 'spoken';
  }

  if (coordinator && sessionId !== '') {
    coordinator.record(sessionId, normalized);
    coordinator.sweepInBackground();
  }
  return outcome;
}
