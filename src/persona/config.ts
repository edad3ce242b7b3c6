/**
 * Persona Descriptor
 *
 * A project picks its persona in `.claude/persona.json`:
 *
 *   {
 *     "name": "mentor",
 *     "voice": { "provider": "voicevox", "speaker": 3 }
 *   }
 *
 * Lookup for a platform (first found wins):
 *   1. .claude/<platform>/persona.json   (codex and cursor only)
 *   2. .claude/persona.json
 *   3. ~/.claude | ~/.codex | ~/.cursor /persona.json
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { loadJsoncFile } from '../config/loader.js';
import { ConfigError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { PersonaConfig, PersonaVoice, Platform } from '../shared/types.js';

export const PERSONA_FILE_NAME = 'persona.json';

/** Engines a persona voice block may name. */
export const PERSONA_VOICE_PROVIDERS = ['voicevox', 'aivisspeech'];

const GLOBAL_DIRS: Record<Platform, string> = {
  'claude-code': '.claude',
  codex: '.codex',
  cursor: '.cursor',
};

const personaConfigSchema = z.object({
  name: z.string().default(''),
  voice: z
    .object({
      provider: z.string(),
      speaker: z.number().int(),
      volume: z.number(),
      speed: z.number(),
      engine: z.string(),
      speaker_id: z.number().int(),
    })
    .partial()
    .optional(),
  override_global: z.boolean().optional(),
  custom_instructions: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Candidate descriptor paths for a platform, in lookup order. */
export function getPersonaConfigPaths(
  projectPath: string,
  platform: Platform = 'claude-code',
  home: string = homedir()
): string[] {
  const paths: string[] = [];
  if (platform !== 'claude-code') {
    paths.push(join(projectPath, '.claude', platform, PERSONA_FILE_NAME));
  }
  paths.push(join(projectPath, '.claude', PERSONA_FILE_NAME));
  paths.push(join(home, GLOBAL_DIRS[platform], PERSONA_FILE_NAME));
  return paths;
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

/** Parse one descriptor file. Returns null if it doesn't exist. */
export function loadPersonaConfigFile(path: string): PersonaConfig | null {
  const raw = loadJsoncFile(path);
  if (raw === null) return null;

  const parsed = personaConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `invalid ${path}: ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Load the descriptor that applies to `projectPath` on `platform`, or null
 * if none of the candidate files exist.
 */
export function loadPersonaConfig(
  projectPath: string,
  platform: Platform = 'claude-code',
  home?: string
): PersonaConfig | null {
  for (const path of getPersonaConfigPaths(projectPath, platform, home)) {
    const config = loadPersonaConfigFile(path);
    if (config) {
      Logger.debug(`loaded persona config ${path} (persona: ${config.name})`);
      return config;
    }
  }
  Logger.debug(`no persona config for ${platform} in ${projectPath}`);
  return null;
}

/** Write the project descriptor (`.claude/persona.json`). */
export function savePersonaConfig(projectPath: string, config: PersonaConfig): string {
  const dir = join(projectPath, '.claude');
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const path = join(dir, PERSONA_FILE_NAME);
  writeFileSync(path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return path;
}

/** Descriptor written by `persona init`. */
export function defaultPersonaConfig(): PersonaConfig {
  return { name: 'default', override_global: false };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Returns the first problem found, or null when the descriptor is usable. */
export function validatePersonaConfig(config: PersonaConfig): string | null {
  if (config.name.trim() === '') {
    return 'persona name cannot be empty';
  }
  if (config.voice) {
    const provider = config.voice.provider || config.voice.engine || '';
    if (provider === '') {
      return 'voice provider cannot be empty when voice is configured';
    }
    if (!PERSONA_VOICE_PROVIDERS.includes(provider)) {
      return `unsupported voice provider: ${provider}`;
    }
  }
  return null;
}

/**
 * The resolver's persona layer. Legacy `engine`/`speaker_id` fill in for
 * `provider`/`speaker` when the newer fields are absent.
 */
export function toPersonaVoice(config: PersonaConfig | null | undefined): PersonaVoice | null {
  const voice = config?.voice;
  if (!voice) return null;
  return {
    provider: voice.provider || voice.engine,
    speaker: voice.speaker || voice.speaker_id,
    volume: voice.volume,
    speed: voice.speed,
  };
}
