/**
 * Command tree
 *
 *   hook                       session initialization (no flags)
 *   notify [payload]           notifications, speech and persona for any event
 *                              (--no-voice, --no-desktop)
 *   voice [flags]              synthesize text from stdin or the transcript
 *   voice --list-voices        voices of the resolved provider
 *   voice config show|validate|init
 *   persona list|current|show|create|apply|set|init
 *
 * Hook commands always exit 0. `voice` exits 1 when its parameters can't
 * be resolved (for example a missing API key).
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { Command, InvalidArgumentError } from 'commander';
import {
  generateExampleConfig,
  getConfigPaths,
  loadVoiceConfig,
  maskSecrets,
  validateVoiceConfig,
} from './config/loader.js';
import { resolve } from './config/resolve.js';
import { detect } from './hooks/detect.js';
import { runHook, runNotify, type HookDependencies } from './hooks/dispatch.js';
import { readHookInput, readStream, type InputStream } from './hooks/input.js';
import { createHookSpeaker } from './hooks/speech.js';
import { sendNotification } from './notify/desktop.js';
import {
  defaultPersonaConfig,
  loadPersonaConfig,
  loadPersonaConfigFile,
  PERSONA_FILE_NAME,
  savePersonaConfig,
  toPersonaVoice,
} from './persona/config.js';
import { PersonaStore } from './persona/store.js';
import { NoAssistantMessageError, PersonaError, errorMessage } from './shared/errors.js';
import { Logger } from './shared/logger.js';
import type { CliVoiceFlags, EffectiveVoiceParameters, NormalizedEvent } from './shared/types.js';
import { SessionCoordinator } from './state/manager.js';
import type { FetchLike } from './voice/http.js';
import { createProvider } from './voice/provider.js';
import { prepareSpeech, speak } from './voice/speak.js';
import { findLatestTranscript, readLatestAssistantMessage } from './voice/transcript.js';

export const VERSION = '0.4.0';

export interface ProgramIO {
  stdin: InputStream;
  out: (line: string) => void;
  cwd: string;
  home: string;
  /** HTTP client for the speech providers */
  fetchImpl?: FetchLike;
}

const defaultIO: ProgramIO = {
  stdin: process.stdin,
  out: (line) => process.stdout.write(line + '\n'),
  cwd: process.cwd(),
  home: homedir(),
};

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/** Options of the `voice` command as commander hands them over. */
export interface VoiceCommandOptions {
  transcript?: boolean;
  plain?: boolean;
  listVoices?: boolean;
  uuid?: boolean;
  mode?: string;
  chars?: number;
  provider?: string;
  engine?: string;
  speaker?: number;
  volume?: number;
  speed?: number;
  apiKey?: string;
  voice?: string;
  model?: string;
  format?: string;
  stability?: number;
  similarityBoost?: number;
  style?: number;
  useSpeakerBoost?: boolean;
  region?: string;
  pollyEngine?: string;
  sampleRate?: string;
  /** A path, or false for --no-config */
  config?: string | false;
  output?: string;
  stdout?: boolean;
  session?: string;
}

/** Map command options onto resolver flags. `--engine` is a legacy alias of `--provider`. */
export function toCliVoiceFlags(options: VoiceCommandOptions): CliVoiceFlags {
  return {
    provider: options.provider || options.engine,
    speaker: options.speaker,
    volume: options.volume,
    speed: options.speed,
    apiKey: options.apiKey,
    voice: options.voice,
    model: options.model,
    format: options.format,
    mode: options.mode,
    chars: options.chars,
    stability: options.stability,
    similarityBoost: options.similarityBoost,
    style: options.style,
    useSpeakerBoost: options.useSpeakerBoost,
    region: options.region,
    pollyEngine: options.pollyEngine,
    sampleRate: options.sampleRate,
  };
}

// ---------------------------------------------------------------------------
// Hook commands
// ---------------------------------------------------------------------------

interface NotifyCommandOptions {
  voice: boolean;
  desktop: boolean;
}

function hookDependencies(io: ProgramIO, switches?: NotifyCommandOptions): HookDependencies {
  const coordinator = new SessionCoordinator();
  return {
    coordinator,
    personas: new PersonaStore(join(io.home, '.claude')),
    speak: createHookSpeaker(coordinator, { home: io.home, fetchImpl: io.fetchImpl }),
    notify: (title, message, urgency) => sendNotification(title, message, urgency),
    cwd: io.cwd,
    home: io.home,
    write: io.out,
    voice: switches?.voice,
    desktop: switches?.desktop,
  };
}

// ---------------------------------------------------------------------------
// voice
// ---------------------------------------------------------------------------

interface SpeechSource {
  text: string;
  sessionId: string;
}

/** Text to speak for a hook event read from stdin, or null if it has none. */
function eventText(
  event: NormalizedEvent,
  options: VoiceCommandOptions,
  params: EffectiveVoiceParameters
): string | null {
  if (event.source === 'claude-code' && event.payload.kind === 'stop') {
    if (!event.payload.transcript_path) return null;
    try {
      return readLatestAssistantMessage(event.payload.transcript_path, {
        mode: params.readingMode,
        maxChars: params.maxChars,
        uuidMode: options.uuid,
      });
    } catch (err: unknown) {
      if (err instanceof NoAssistantMessageError) return null;
      throw err;
    }
  }
  return event.assistantResponseText ? prepareSpeech(event.assistantResponseText, params) : null;
}

async function runVoice(options: VoiceCommandOptions, io: ProgramIO): Promise<void> {
  const persona = loadPersonaConfig(io.cwd, 'claude-code', io.home);
  const file =
    options.config === false
      ? null
      : loadVoiceConfig({ workingDirectory: io.cwd, home: io.home, path: options.config });
  const params = resolve(toCliVoiceFlags(options), toPersonaVoice(persona), file?.config);

  if (options.listVoices) {
    await listVoices(params, io);
    return;
  }

  let source: SpeechSource | null;
  if (options.transcript) {
    const path = findLatestTranscript(join(io.home, '.claude', 'projects'));
    if (!path) {
      Logger.warn('no transcript found under ~/.claude/projects');
      return;
    }
    try {
      const text = readLatestAssistantMessage(path, {
        mode: params.readingMode,
        maxChars: params.maxChars,
        uuidMode: options.uuid,
      });
      source = { text, sessionId: options.session ?? '' };
    } catch (err: unknown) {
      if (!(err instanceof NoAssistantMessageError)) throw err;
      Logger.debug(`${path}: ${err.message}`);
      source = null;
    }
  } else {
    const raw = await readStream(io.stdin);
    const detected = options.plain ? null : detect(raw);
    if (detected && detected.ok) {
      const text = eventText(detected.event, options, params);
      source = text === null ? null : { text, sessionId: detected.event.sessionId };
    } else {
      source = { text: prepareSpeech(raw, params), sessionId: options.session ?? '' };
    }
  }

  if (!source) {
    Logger.debug('no text to speak');
    return;
  }

  const outcome = await speak(
    source.text,
    params,
    { sessionId: source.sessionId, output: options.output, toStdout: options.stdout },
    { coordinator: new SessionCoordinator(), fetchImpl: io.fetchImpl }
  );
  Logger.debug(`voice: ${outcome}`);
}

async function listVoices(params: EffectiveVoiceParameters, io: ProgramIO): Promise<void> {
  const voices = await createProvider(params, io.fetchImpl).listVoices(params);
  if (voices.length === 0) {
    io.out('No voices available');
    return;
  }
  io.out(`Available voices for provider '${params.provider}':`);
  for (const voice of voices) {
    const language = voice.language ? ` (${voice.language})` : '';
    const description = voice.description ? ` - ${voice.description}` : '';
    io.out(`  - ${voice.id}: ${voice.name}${language}${description}`);
  }
}

function addVoiceConfigCommands(voice: Command, io: ProgramIO): void {
  const config = voice.command('config').description('Manage the voice provider-settings file');

  config
    .command('show')
    .description('Show the active configuration (secrets masked)')
    .action(() => {
      const loaded = loadVoiceConfig({ workingDirectory: io.cwd, home: io.home });
      if (!loaded) {
        io.out('No configuration file found.');
        return;
      }
      io.out(`# ${loaded.path}`);
      io.out(JSON.stringify(maskSecrets(loaded.config), null, 2));
    });

  config
    .command('validate')
    .description('Validate the active configuration file')
    .action(() => {
      const loaded = loadVoiceConfig({ workingDirectory: io.cwd, home: io.home });
      if (!loaded) {
        io.out('No configuration file found.');
        return;
      }
      const problems = validateVoiceConfig(loaded.config);
      if (problems.length === 0) {
        io.out(`${loaded.path}: valid`);
        return;
      }
      for (const problem of problems) io.out(`${loaded.path}: ${problem}`);
      process.exitCode = 1;
    });

  config
    .command('init')
    .description('Write an example configuration file')
    .option('--global', 'Create ~/.claude/config.json instead of the project file')
    .action((options: { global?: boolean }) => {
      const paths = getConfigPaths(io.cwd, io.home);
      const path = options.global ? paths.user : paths.project;
      if (existsSync(path)) {
        io.out(`${path} already exists`);
        process.exitCode = 1;
        return;
      }
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, generateExampleConfig(), { encoding: 'utf-8', mode: 0o600 });
      io.out(`Created ${path}`);
    });
}

function addVoiceCommand(program: Command, io: ProgramIO): void {
  const voice = program
    .command('voice')
    .description('Synthesize speech from stdin (hook JSON or plain text) or the latest transcript')
    .option('--transcript', 'Read the latest Claude Code transcript instead of stdin')
    .option('--plain', 'Treat stdin as plain text instead of a hook event')
    .option('--uuid', 'Collect every text block of the latest assistant message')
    .option('--list-voices', 'List the voices of the selected provider and exit')
    .option('--mode <mode>', 'Reading mode: short (first line) or full')
    .option('--chars <n>', "Character limit for 'full' mode (0 = unlimited)", parseInteger)
    .option('--provider <name>', 'openai, elevenlabs, polly, gcp, voicevox, aivisspeech')
    .option('--engine <name>', 'Legacy alias of --provider')
    .option('--speaker <id>', 'Speaker id for the local engine (0 = unset)', parseInteger)
    .option('--volume <scale>', 'Volume scale 0.0-2.0 (1.0 = unset)', parseNumber)
    .option('--speed <scale>', 'Speech speed 0.25-4.0 (1.0 = unset)', parseNumber)
    .option('--api-key <key>', 'API key for cloud providers')
    .option('--voice <id>', 'Voice id (e.g. alloy for OpenAI)')
    .option('--model <name>', 'Model (e.g. tts-1, tts-1-hd)')
    .option('--format <fmt>', 'Audio format: mp3, wav, ogg, flac, aac')
    .option('--stability <n>', 'ElevenLabs stability 0.0-1.0', parseNumber)
    .option('--similarity-boost <n>', 'ElevenLabs similarity boost 0.0-1.0', parseNumber)
    .option('--style <n>', 'ElevenLabs style 0.0-1.0', parseNumber)
    .option('--use-speaker-boost', 'ElevenLabs speaker boost on')
    .option('--no-use-speaker-boost', 'ElevenLabs speaker boost off')
    .option('--region <region>', 'AWS region for Polly')
    .option('--polly-engine <engine>', 'Polly engine: neural, standard, long-form, generative')
    .option('--sample-rate <hz>', 'Audio sample rate: 8000, 16000, 22050, 24000')
    .option('--config <path>', 'Use this config.json instead of the project/user lookup')
    .option('--no-config', 'Ignore all configuration files')
    .option('--output <file>', 'Write audio to a file instead of playing it')
    .option('--stdout', 'Write audio to stdout instead of playing it')
    .option('--session <id>', 'Session id for de-duplication of plain text')
    .action(async (options: VoiceCommandOptions) => {
      try {
        await runVoice(options, io);
      } catch (err: unknown) {
        Logger.error(errorMessage(err));
        process.exitCode = 1;
      }
    });

  addVoiceConfigCommands(voice, io);
}

// ---------------------------------------------------------------------------
// persona
// ---------------------------------------------------------------------------

function addPersonaCommand(program: Command, io: ProgramIO): void {
  const store = new PersonaStore(join(io.home, '.claude'));
  const persona = program.command('persona').description('Manage personas');

  persona
    .command('list')
    .description('List available personas')
    .action(() => {
      const current = store.current();
      const names = store.list();
      if (names.length === 0) {
        io.out(`No personas found in ${store.personasDir}`);
        return;
      }
      for (const name of names) io.out(`${name === current ? '*' : ' '} ${name}`);
    });

  persona
    .command('current')
    .description('Show the active persona')
    .action(() => io.out(store.current()));

  persona
    .command('show <name>')
    .description('Print a persona profile')
    .action((name: string) => io.out(store.read(name)));

  persona
    .command('create <name>')
    .description('Create a persona from the template')
    .action((name: string) => io.out(`Created ${store.create(name)}`));

  persona
    .command('apply <name>')
    .description('Copy a persona into the active instructions file now')
    .action((name: string) => {
      store.apply(name);
      io.out(`Applied persona '${name}'`);
    });

  persona
    .command('set <name>')
    .description("Set this project's persona in .claude/persona.json")
    .action((name: string) => {
      if (!store.exists(name)) {
        throw new PersonaError(`persona '${name}' does not exist`);
      }
      const existing = loadPersonaConfigFile(join(io.cwd, '.claude', PERSONA_FILE_NAME));
      const path = savePersonaConfig(io.cwd, { ...(existing ?? defaultPersonaConfig()), name });
      io.out(`Project persona set to '${name}' (${path})`);
    });

  persona
    .command('init')
    .description('Create .claude/persona.json in this project')
    .action(() => {
      const path = join(io.cwd, '.claude', PERSONA_FILE_NAME);
      if (existsSync(path)) {
        io.out(`${path} already exists`);
        return;
      }
      io.out(`Created ${savePersonaConfig(io.cwd, defaultPersonaConfig())}`);
    });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  program
    .name('persona-hooks')
    .description('Persona, voice and notification hooks for AI coding assistants')
    .version(VERSION)
    .option('-v, --verbose', 'Enable debug logging')
    .hook('preAction', (thisCommand) => {
      Logger.setVerbose(thisCommand.opts<{ verbose?: boolean }>().verbose === true);
    });

  program
    .command('hook')
    .description('Session hook: apply the project persona once per session')
    .action(async () => {
      const raw = await readHookInput([], io.stdin);
      runHook(raw, hookDependencies(io));
    });

  program
    .command('notify [payload]')
    .description('Event hook: notifications, speech and persona for any supported assistant')
    .option('--no-voice', 'Do not speak')
    .option('--no-desktop', 'Do not show desktop notifications')
    .action(async (payload: string | undefined, options: NotifyCommandOptions) => {
      const raw = await readHookInput(payload === undefined ? [] : [payload], io.stdin);
      await runNotify(raw, hookDependencies(io, options));
    });

  addVoiceCommand(program, io);
  addPersonaCommand(program, io);

  return program;
}
