/**
 * Local voice engines (VOICEVOX, AivisSpeech).
 *
 * Both speak the same two-step HTTP API:
 *   POST /audio_query?speaker=N&text=...   → synthesis query (JSON)
 *   POST /synthesis?speaker=N  (query body) → WAV bytes
 *
 * GET /speakers lists characters; each style of a character is one
 * speaker id.
 */

import { z } from 'zod';
import { ProviderError } from '../shared/errors.js';
import type { EffectiveVoiceParameters } from '../shared/types.js';
import { providerRequest, type FetchLike } from './http.js';
import type { SpeechProvider, VoiceInfo } from './provider.js';

const speakers = z.array(
  z.object({
    name: z.string(),
    styles: z.array(z.object({ name: z.string(), id: z.number().int() })),
  })
);

export class LocalEngineProvider implements SpeechProvider {
  readonly fileExtension = 'wav';

  constructor(
    readonly name: string,
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /** True when the engine answers GET /version. */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/version`, {
        method: 'GET',
        signal: AbortSignal.timeout(2000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async listVoices(): Promise<VoiceInfo[]> {
    const response = await providerRequest(this.name, this.fetchImpl, `${this.baseUrl}/speakers`, {
      method: 'GET',
    });
    const parsed = speakers.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, 'backend', 'unexpected /speakers response');
    }
    return parsed.data.flatMap((speaker) =>
      speaker.styles.map((style) => ({ id: String(style.id), name: `${speaker.name} (${style.name})` }))
    );
  }

  async synthesize(text: string, params: EffectiveVoiceParameters): Promise<Buffer> {
    const speaker = String(params.speaker);

    const queryUrl = `${this.baseUrl}/audio_query?${new URLSearchParams({ speaker, text }).toString()}`;
    const queryResponse = await providerRequest(this.name, this.fetchImpl, queryUrl, {
      method: 'POST',
    });

    const query: unknown = await queryResponse.json();
    if (typeof query !== 'object' || query === null || Array.isArray(query)) {
      throw new ProviderError(this.name, 'backend', 'audio_query returned a non-object');
    }

    const synthesisUrl = `${this.baseUrl}/synthesis?${new URLSearchParams({ speaker }).toString()}`;
    const synthesisResponse = await providerRequest(this.name, this.fetchImpl, synthesisUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'audio/wav' },
      body: JSON.stringify({
        ...query,
        volumeScale: params.volume,
        speedScale: params.speed,
      }),
    });

    return Buffer.from(await synthesisResponse.arrayBuffer());
  }
}
