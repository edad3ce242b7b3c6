/**
 * Voice Parameter Resolution
 *
 * Builds the EffectiveVoiceParameters for one synthesis call. Precedence is
 * applied per field, highest first:
 *
 *   1. CLI flag          (only when not at its "unset" sentinel)
 *   2. Persona voice     (.claude/persona.json → voice)
 *   3. Provider settings (config file → providers[<resolved provider>])
 *   4. File defaults     (config file → defaults, volume/speed only)
 *   5. Built-in defaults
 *
 * A field missing at one layer falls through on its own; its siblings are
 * unaffected. The result is frozen and depends only on the arguments.
 */

import { MissingCredentialError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { normalizeReadingMode } from '../voice/text.js';
import type {
  CliVoiceFlags,
  EffectiveVoiceParameters,
  PersonaVoice,
  ProviderSettings,
  VoiceConfigFile,
} from '../shared/types.js';

// ---------------------------------------------------------------------------
// Built-in defaults
// ---------------------------------------------------------------------------

export const ENGINE_VOICEVOX = 'voicevox';
export const ENGINE_AIVISSPEECH = 'aivisspeech';

export const VOICE_DEFAULTS = {
  provider: ENGINE_AIVISSPEECH,
  voicevoxSpeaker: 3,
  aivisSpeechSpeaker: 1512153248,
  volume: 1.0,
  speed: 1.0,
  readingMode: 'short',
  maxChars: 0,
  voice: '',
  model: 'tts-1',
  format: 'mp3',
  stability: 0.5,
  similarityBoost: 0.5,
  style: 0,
  useSpeakerBoost: true,
  region: 'us-east-1',
  pollyEngine: 'neural',
  sampleRate: '22050',
  host: '127.0.0.1',
} as const;

/** Default HTTP port of each local engine. */
export const ENGINE_PORTS: Readonly<Record<string, number>> = {
  [ENGINE_VOICEVOX]: 50021,
  [ENGINE_AIVISSPEECH]: 10101,
};

/** Cloud providers that cannot synthesize without a key. */
export const API_KEY_ENV: Readonly<Record<string, string>> = {
  openai: 'OPENAI_API_KEY',
  elevenlabs: 'ELEVENLABS_API_KEY',
};

// ---------------------------------------------------------------------------
// Sentinel handling
// ---------------------------------------------------------------------------

// CLI flags carry documented "unset" values; a flag equal to its sentinel is
// indistinguishable from an absent one.
const CLI_SENTINEL = { speaker: 0, volume: 1.0, speed: 1.0 } as const;

function str(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

function positive(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

function notSentinel(value: number | undefined, sentinel: number): number | undefined {
  return value !== undefined && value !== sentinel ? value : undefined;
}

/** First defined value wins. */
function pick<T>(fallback: T, ...layers: (T | undefined)[]): T {
  for (const value of layers) {
    if (value !== undefined) return value;
  }
  return fallback;
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Resolve effective voice parameters from every configuration layer.
 *
 * Engine isolation: a speaker id from any layer lands only in the slot of
 * the selected engine (aivisspeech, or voicevox for everything else). The
 * other slot keeps its built-in default.
 *
 * @throws MissingCredentialError when openai/elevenlabs ends up without a key
 */
export function resolve(
  cli: CliVoiceFlags = {},
  persona?: PersonaVoice | null,
  file?: VoiceConfigFile | null,
  env: NodeJS.ProcessEnv = process.env
): EffectiveVoiceParameters {
  const provider = pick<string>(
    VOICE_DEFAULTS.provider,
    str(cli.provider),
    str(persona?.provider),
    str(file?.default_provider)
  );

  const settings: ProviderSettings = file?.providers?.[provider] ?? {};

  // Speaker: only ever written into the selected engine's slot.
  const selectedSpeaker = pick<number | undefined>(
    undefined,
    notSentinel(cli.speaker, CLI_SENTINEL.speaker),
    positive(persona?.speaker),
    positive(settings.speaker)
  );
  const isAivis = provider === ENGINE_AIVISSPEECH;
  const voicevoxSpeaker =
    !isAivis && selectedSpeaker !== undefined ? selectedSpeaker : VOICE_DEFAULTS.voicevoxSpeaker;
  const aivisSpeechSpeaker =
    isAivis && selectedSpeaker !== undefined ? selectedSpeaker : VOICE_DEFAULTS.aivisSpeechSpeaker;

  const volume = pick<number>(
    VOICE_DEFAULTS.volume,
    notSentinel(cli.volume, CLI_SENTINEL.volume),
    positive(persona?.volume),
    positive(settings.volume),
    positive(file?.defaults?.volume)
  );
  const speed = pick<number>(
    VOICE_DEFAULTS.speed,
    notSentinel(cli.speed, CLI_SENTINEL.speed),
    positive(persona?.speed),
    positive(settings.speed),
    positive(file?.defaults?.speed)
  );

  const envVar = API_KEY_ENV[provider];
  const apiKey = pick<string>(
    '',
    str(cli.apiKey),
    str(settings.api_key),
    envVar ? str(env[envVar]) : undefined
  );
  if (envVar && apiKey === '') {
    throw new MissingCredentialError(provider, `providers.${provider}.api_key`, envVar);
  }

  const params: EffectiveVoiceParameters = {
    provider,
    speaker: isAivis ? aivisSpeechSpeaker : voicevoxSpeaker,
    voicevoxSpeaker,
    aivisSpeechSpeaker,
    volume,
    speed,
    readingMode: normalizeReadingMode(str(cli.mode) ?? VOICE_DEFAULTS.readingMode),
    maxChars: pick<number>(VOICE_DEFAULTS.maxChars, positive(cli.chars)),
    apiKey,
    voice: pick<string>(VOICE_DEFAULTS.voice, str(cli.voice), str(settings.voice)),
    model: pick<string>(VOICE_DEFAULTS.model, str(cli.model), str(settings.model)),
    format: pick<string>(VOICE_DEFAULTS.format, str(cli.format), str(settings.format)),
    stability: pick<number>(VOICE_DEFAULTS.stability, cli.stability, positive(settings.stability)),
    similarityBoost: pick<number>(
      VOICE_DEFAULTS.similarityBoost,
      cli.similarityBoost,
      positive(settings.similarity_boost)
    ),
    style: pick<number>(VOICE_DEFAULTS.style, cli.style, positive(settings.style)),
    useSpeakerBoost: pick<boolean>(
      VOICE_DEFAULTS.useSpeakerBoost,
      cli.useSpeakerBoost,
      settings.use_speaker_boost
    ),
    region: pick<string>(VOICE_DEFAULTS.region, str(cli.region), str(settings.region)),
    pollyEngine: pick<string>(VOICE_DEFAULTS.pollyEngine, str(cli.pollyEngine), str(settings.engine)),
    sampleRate: pick<string>(VOICE_DEFAULTS.sampleRate, str(cli.sampleRate), str(settings.sample_rate)),
    host: pick<string>(VOICE_DEFAULTS.host, str(settings.host)),
    port: pick<number>(ENGINE_PORTS[provider] ?? 0, positive(settings.port)),
  };

  Logger.debug(
    `resolved voice: provider=${params.provider} speaker=${params.speaker} volume=${params.volume} speed=${params.speed}`
  );

  return Object.freeze(params);
}
