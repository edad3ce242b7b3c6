/**
 * Provider-Settings Loader
 *
 * Loads the voice provider-settings file. Two scopes, first found wins:
 *   Project: <cwd>/.claude/config.json   (shared with the team via git)
 *   User:    ~/.claude/config.json       (your personal keys and voices)
 *
 * The two files are never merged. A project file that exists replaces the
 * user file wholesale.
 *
 * Files are JSONC so users can annotate them:
 *
 *   // .claude/config.json
 *   {
 *     "default_provider": "voicevox",
 *     "providers": {
 *       "openai": { "api_key": "${OPENAI_API_KEY}", "voice": "nova" }
 *     }
 *   }
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as jsonc from 'jsonc-parser';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { ProviderSettings, VoiceConfigFile } from '../shared/types.js';

export const CONFIG_FILE_NAME = 'config.json';

export const SUPPORTED_PROVIDERS = [
  'openai',
  'elevenlabs',
  'polly',
  'gcp',
  'voicevox',
  'aivisspeech',
] as const;

export const POLLY_REGIONS = [
  'us-east-1',
  'us-west-2',
  'eu-west-1',
  'ap-northeast-1',
  'ap-southeast-1',
];

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const providerSettingsSchema = z
  .object({
    api_key: z.string(),
    voice: z.string(),
    model: z.string(),
    format: z.string(),
    speed: z.number(),
    host: z.string(),
    port: z.number().int(),
    speaker: z.number().int(),
    stability: z.number(),
    similarity_boost: z.number(),
    style: z.number(),
    use_speaker_boost: z.boolean(),
    region: z.string(),
    engine: z.string(),
    sample_rate: z.string(),
    volume: z.number(),
  })
  .partial();

export const voiceConfigFileSchema = z
  .object({
    default_provider: z.string(),
    providers: z.record(providerSettingsSchema),
    defaults: z.object({ volume: z.number(), speed: z.number() }).partial(),
  })
  .partial();

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Candidate provider-settings paths, in lookup order.
 */
export function getConfigPaths(
  workingDirectory?: string,
  home: string = homedir()
): { project: string; user: string } {
  return {
    project: join(workingDirectory ?? process.cwd(), '.claude', CONFIG_FILE_NAME),
    user: join(home, '.claude', CONFIG_FILE_NAME),
  };
}

/**
 * Reject explicit paths that climb out of their directory or name some
 * other file.
 */
export function validateConfigPath(path: string): void {
  const segments = path.split(/[\\/]+/);
  if (segments.includes('..')) {
    throw new ConfigError(`config path must not contain '..': ${path}`);
  }
  if (!path.endsWith(CONFIG_FILE_NAME)) {
    throw new ConfigError(`config path must point to a ${CONFIG_FILE_NAME} file: ${path}`);
  }
}

// ---------------------------------------------------------------------------
// Environment expansion
// ---------------------------------------------------------------------------

/** Expand `${VAR}` references. Unset variables become ''. */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '');
}

function expandSettings(settings: ProviderSettings, env: NodeJS.ProcessEnv): ProviderSettings {
  const result: ProviderSettings = { ...settings };
  for (const key of ['api_key', 'voice', 'model', 'format', 'host', 'region', 'engine', 'sample_rate'] as const) {
    const value = result[key];
    if (value !== undefined) result[key] = expandEnv(value, env);
  }
  return result;
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

/**
 * Load and parse a JSONC document. Returns null if the file doesn't exist;
 * throws ConfigError if it exists but isn't usable.
 */
export function loadJsoncFile(path: string): unknown {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError(`failed to read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  const errors: jsonc.ParseError[] = [];
  const result: unknown = jsonc.parse(content, errors, {
    allowTrailingComma: true,
    allowEmptyContent: true,
  });

  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(
      `failed to parse ${path}: ${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }

  return result ?? {};
}

/** Warn when a file that may hold API keys is readable by group or others. */
export function checkFilePermissions(path: string): boolean {
  if (process.platform === 'win32') return true;
  try {
    const mode = statSync(path).mode;
    if ((mode & 0o077) !== 0) {
      Logger.warn(
        `${path} is accessible by other users (mode ${(mode & 0o777).toString(8)}); consider chmod 600`
      );
      return false;
    }
  } catch (err: unknown) {
    Logger.debug(`could not stat ${path}: ${errorMessage(err)}`);
  }
  return true;
}

/**
 * Load one provider-settings file: parse, validate shape, expand env vars.
 * Returns null if the file doesn't exist.
 */
export function loadConfigFromPath(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): VoiceConfigFile | null {
  validateConfigPath(path);
  const raw = loadJsoncFile(path);
  if (raw === null) return null;

  const parsed = voiceConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `invalid ${path}: ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
      { cause: parsed.error }
    );
  }

  checkFilePermissions(path);

  const file: VoiceConfigFile = { ...parsed.data };
  if (file.default_provider !== undefined) {
    file.default_provider = expandEnv(file.default_provider, env);
  }
  if (file.providers) {
    const providers: Record<string, ProviderSettings> = {};
    for (const [name, settings] of Object.entries(file.providers)) {
      providers[name] = expandSettings(settings, env);
    }
    file.providers = providers;
  }
  return file;
}

export interface LoadVoiceConfigOptions {
  /** Project root for the project-scoped file */
  workingDirectory?: string;
  /** Explicit file, replaces the project/user lookup */
  path?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedVoiceConfig {
  config: VoiceConfigFile;
  path: string;
}

/**
 * Find and load the provider-settings file.
 *
 * Lookup order: explicit path, then project, then user. The first file
 * that exists is the only one read.
 */
export function loadVoiceConfig(options: LoadVoiceConfigOptions = {}): LoadedVoiceConfig | null {
  const env = options.env ?? process.env;

  if (options.path) {
    const config = loadConfigFromPath(options.path, env);
    if (!config) throw new ConfigError(`config file not found: ${options.path}`);
    return { config, path: options.path };
  }

  const paths = getConfigPaths(options.workingDirectory, options.home);
  for (const path of [paths.project, paths.user]) {
    const config = loadConfigFromPath(path, env);
    if (config) {
      Logger.debug(`loaded provider settings from ${path}`);
      return { config, path };
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function checkRange(
  problems: string[],
  label: string,
  value: number | undefined,
  min: number,
  max: number
): void {
  if (value !== undefined && (value < min || value > max)) {
    problems.push(`${label} must be between ${min} and ${max} (got ${value})`);
  }
}

/**
 * Validate a provider-settings document. Returns every problem found;
 * an empty list means the file is usable.
 */
export function validateVoiceConfig(config: VoiceConfigFile): string[] {
  const problems: string[] = [];

  for (const [name, settings] of Object.entries(config.providers ?? {})) {
    const at = `providers.${name}`;

    if ((name === 'openai' || name === 'elevenlabs') && !settings.api_key) {
      problems.push(`${at}.api_key is required`);
    }
    if (name === 'elevenlabs') {
      checkRange(problems, `${at}.stability`, settings.stability, 0, 1);
      checkRange(problems, `${at}.similarity_boost`, settings.similarity_boost, 0, 1);
    }
    if (name === 'polly' && settings.region && !POLLY_REGIONS.includes(settings.region)) {
      problems.push(`${at}.region must be one of ${POLLY_REGIONS.join(', ')} (got ${settings.region})`);
    }
    checkRange(problems, `${at}.port`, settings.port, 1, 65535);
    checkRange(problems, `${at}.speed`, settings.speed, 0.25, 4);
    checkRange(problems, `${at}.volume`, settings.volume, 0, 2);
  }

  if (config.defaults) {
    checkRange(problems, 'defaults.speed', config.defaults.speed, 0.25, 4);
    checkRange(problems, 'defaults.volume', config.defaults.volume, 0, 2);
  }

  return problems;
}

// ---------------------------------------------------------------------------
// Display helpers
// ---------------------------------------------------------------------------

/** Copy of the config with API keys replaced by `[set, N chars]`. */
export function maskSecrets(config: VoiceConfigFile): VoiceConfigFile {
  if (!config.providers) return { ...config };

  const providers: Record<string, ProviderSettings> = {};
  for (const [name, settings] of Object.entries(config.providers)) {
    providers[name] = settings.api_key
      ? { ...settings, api_key: `[set, ${settings.api_key.length} chars]` }
      : { ...settings };
  }
  return { ...config, providers };
}

/** Example file written by `voice config init`. */
export function generateExampleConfig(): string {
  return `{
  // Provider used when neither the CLI nor the persona picks one
  "default_provider": "voicevox",

  "providers": {
    "voicevox": {
      "host": "127.0.0.1",
      "port": 50021,
      "speaker": 3
    },
    "aivisspeech": {
      "host": "127.0.0.1",
      "port": 10101,
      "speaker": 888753760
    },
    "openai": {
      // Keys may reference environment variables
      "api_key": "\${OPENAI_API_KEY}",
      "model": "tts-1",
      "voice": "alloy",
      "format": "mp3",
      "speed": 1.0
    },
    "elevenlabs": {
      "api_key": "\${ELEVENLABS_API_KEY}",
      "voice": "21m00Tcm4TlvDq8ikWAM",
      "model": "eleven_multilingual_v2",
      "stability": 0.5,
      "similarity_boost": 0.5
    }
  },

  "defaults": {
    "volume": 1.0,
    "speed": 1.0
  }
}
`;
}
