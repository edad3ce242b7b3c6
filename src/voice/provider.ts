/**
 * Speech Synthesis Providers
 *
 * Every backend sits behind one interface: text + resolved parameters in,
 * audio bytes out. Failures surface as ProviderError with a failure class
 * (auth, quota, network, unsupported, backend). Nothing here retries.
 *
 * `fetch` is injected so tests never touch the network.
 */

import { z } from 'zod';
import { ProviderError } from '../shared/errors.js';
import type { EffectiveVoiceParameters } from '../shared/types.js';
import { ENGINE_AIVISSPEECH, ENGINE_VOICEVOX } from '../config/resolve.js';
import { LocalEngineProvider } from './engine.js';
import { providerRequest, type FetchLike } from './http.js';

export interface VoiceInfo {
  /** What goes into --voice (cloud) or --speaker (local engines) */
  id: string;
  name: string;
  language?: string;
  description?: string;
}

export interface SpeechProvider {
  readonly name: string;
  /** Extension for the audio this provider returns (no dot) */
  readonly fileExtension: string;
  /** Cheap reachability probe, for backends that run locally */
  isAvailable?(): Promise<boolean>;
  listVoices(params: EffectiveVoiceParameters): Promise<VoiceInfo[]>;
  synthesize(text: string, params: EffectiveVoiceParameters): Promise<Buffer>;
}

// ---------------------------------------------------------------------------
// Cloud providers
// ---------------------------------------------------------------------------

export const OPENAI_SPEECH_URL = 'https://api.openai.com/v1/audio/speech';
export const OPENAI_DEFAULT_VOICE = 'alloy';

/** The speech endpoint has no voice listing; these are its documented voices. */
const OPENAI_VOICES: readonly VoiceInfo[] = [
  { id: 'alloy', name: 'Alloy', language: 'en', description: 'Balanced, clear voice' },
  { id: 'echo', name: 'Echo', language: 'en', description: 'Deep, resonant voice' },
  { id: 'fable', name: 'Fable', language: 'en', description: 'Expressive, storytelling voice' },
  { id: 'onyx', name: 'Onyx', language: 'en', description: 'Strong, authoritative voice' },
  { id: 'nova', name: 'Nova', language: 'en', description: 'Bright, energetic voice' },
  { id: 'shimmer', name: 'Shimmer', language: 'en', description: 'Warm, friendly voice' },
];

export class OpenAIProvider implements SpeechProvider {
  readonly name = 'openai';

  constructor(
    private readonly format: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  get fileExtension(): string {
    return this.format;
  }

  async listVoices(): Promise<VoiceInfo[]> {
    return [...OPENAI_VOICES];
  }

  async synthesize(text: string, params: EffectiveVoiceParameters): Promise<Buffer> {
    const response = await providerRequest(this.name, this.fetchImpl, OPENAI_SPEECH_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${params.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: params.model,
        input: text,
        voice: params.voice || OPENAI_DEFAULT_VOICE,
        response_format: params.format,
        speed: params.speed,
      }),
    });
    return Buffer.from(await response.arrayBuffer());
  }
}

export const ELEVENLABS_API_URL = 'https://api.elevenlabs.io/v1/text-to-speech';
export const ELEVENLABS_DEFAULT_VOICE = '21m00Tcm4TlvDq8ikWAM';
export const ELEVENLABS_DEFAULT_MODEL = 'eleven_multilingual_v2';
export const ELEVENLABS_VOICES_URL = 'https://api.elevenlabs.io/v1/voices';

const elevenLabsVoices = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      description: z.string().nullish(),
      labels: z.record(z.string()).nullish(),
    })
  ),
});

export class ElevenLabsProvider implements SpeechProvider {
  readonly name = 'elevenlabs';
  readonly fileExtension = 'mp3';

  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async listVoices(params: EffectiveVoiceParameters): Promise<VoiceInfo[]> {
    const response = await providerRequest(this.name, this.fetchImpl, ELEVENLABS_VOICES_URL, {
      method: 'GET',
      headers: { 'xi-api-key': params.apiKey },
    });
    const parsed = elevenLabsVoices.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, 'backend', 'unexpected voices response');
    }
    return parsed.data.voices.map((voice) => ({
      id: voice.voice_id,
      name: voice.name,
      language: voice.labels?.['language'] ?? voice.labels?.['accent'],
      description: voice.description ?? undefined,
    }));
  }

  async synthesize(text: string, params: EffectiveVoiceParameters): Promise<Buffer> {
    const voice = params.voice || ELEVENLABS_DEFAULT_VOICE;
    // 'tts-1' is the generic default and means nothing to ElevenLabs.
    const model = params.model && params.model !== 'tts-1' ? params.model : ELEVENLABS_DEFAULT_MODEL;

    const response = await providerRequest(
      this.name,
      this.fetchImpl,
      `${ELEVENLABS_API_URL}/${encodeURIComponent(voice)}`,
      {
        method: 'POST',
        headers: {
          'xi-api-key': params.apiKey,
          'Content-Type': 'application/json',
          Accept: 'audio/mpeg',
        },
        body: JSON.stringify({
          text,
          model_id: model,
          voice_settings: {
            stability: params.stability,
            similarity_boost: params.similarityBoost,
            style: params.style,
            use_speaker_boost: params.useSpeakerBoost,
          },
        }),
      }
    );
    return Buffer.from(await response.arrayBuffer());
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build the provider selected by the resolved parameters.
 *
 * polly and gcp resolve and validate like any other provider, but this
 * build ships no client for them.
 */
export function createProvider(
  params: EffectiveVoiceParameters,
  fetchImpl: FetchLike = fetch
): SpeechProvider {
  switch (params.provider) {
    case ENGINE_VOICEVOX:
    case ENGINE_AIVISSPEECH:
      return new LocalEngineProvider(
        params.provider,
        `http://${params.host}:${params.port}`,
        fetchImpl
      );
    case 'openai':
      return new OpenAIProvider(params.format, fetchImpl);
    case 'elevenlabs':
      return new ElevenLabsProvider(fetchImpl);
    case 'polly':
    case 'gcp':
      throw new ProviderError(
        params.provider,
        'unsupported',
        'synthesis is not available in this build; use openai, elevenlabs, voicevox or aivisspeech'
      );
    default:
      throw new ProviderError(params.provider, 'unsupported', 'unknown provider');
  }
}
