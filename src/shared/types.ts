/**
 * Shared types for persona-hooks
 *
 * These types define the contract between the assistant hosts and this CLI.
 * A host sends one JSON payload per invocation (stdin or a single argument);
 * detection turns it into a NormalizedEvent that every other module consumes.
 */

// ---------------------------------------------------------------------------
// Hook sources
// ---------------------------------------------------------------------------

/** Closed set of assistant products whose hook protocols we understand. */
export type HookSource = 'claude-code' | 'codex' | 'cursor';

/** Platform key used for persona lookup. Mirrors HookSource. */
export type Platform = HookSource;

// ---------------------------------------------------------------------------
// Source-specific payloads (wire field names preserved)
// ---------------------------------------------------------------------------

/** Envelope fields every Claude Code hook carries. */
export interface ClaudeCodeEnvelope {
  session_id: string;
  transcript_path: string;
  cwd: string;
  hook_event_name: string;
}

/**
 * Claude Code payload, narrowed by event name.
 * `kind: 'other'` covers event names we don't know yet.
 */
export type ClaudeCodePayload =
  | (ClaudeCodeEnvelope & { kind: 'prompt'; prompt: string })
  | (ClaudeCodeEnvelope & { kind: 'stop'; stop_hook_active: boolean })
  | (ClaudeCodeEnvelope & {
      kind: 'notification';
      message: string;
      notification_type?: string;
      title?: string;
    })
  | (ClaudeCodeEnvelope & { kind: 'session' })
  | (ClaudeCodeEnvelope & { kind: 'other' });

/** Codex `agent-turn-complete` notification. */
export interface CodexPayload {
  type: 'agent-turn-complete';
  'thread-id': string;
  'turn-id': string;
  cwd: string;
  'input-messages': string[];
  'last-assistant-message': string;
}

/** Cursor hook payload. Event-specific fields are optional. */
export interface CursorPayload {
  conversation_id: string;
  generation_id: string;
  model: string;
  hook_event_name: string;
  cursor_version: string;
  workspace_roots: string[];
  user_email: string;
  prompt?: string;
  text?: string;
  transcript_path?: string;
}

// ---------------------------------------------------------------------------
// Normalized event
// ---------------------------------------------------------------------------

interface EventEnvelope {
  /** May be empty: "unknown session, no coordination possible". */
  sessionId: string;
  /** Best-effort working directory. */
  workingDirectory: string;
  /** Source-specific event name, never empty after detection. */
  eventType: string;
  userInputs: readonly string[];
  /** Empty when the text has to come from the transcript instead. */
  assistantResponseText: string;
}

export interface ClaudeCodeEvent extends EventEnvelope {
  source: 'claude-code';
  payload: ClaudeCodePayload;
}

export interface CodexEvent extends EventEnvelope {
  source: 'codex';
  payload: CodexPayload;
}

export interface CursorEvent extends EventEnvelope {
  source: 'cursor';
  payload: CursorPayload;
}

/** Canonical output of detection. `source` always matches `payload`'s shape. */
export type NormalizedEvent = ClaudeCodeEvent | CodexEvent | CursorEvent;

// ---------------------------------------------------------------------------
// Hook output
// ---------------------------------------------------------------------------

/**
 * JSON a Claude Code hook may print on stdout. `additionalContext` is
 * injected into the model's context for SessionStart and UserPromptSubmit.
 */
export interface HookContextOutput {
  continue: boolean;
  hookSpecificOutput?: {
    hookEventName: 'SessionStart' | 'UserPromptSubmit';
    additionalContext: string;
  };
}

// ---------------------------------------------------------------------------
// Voice configuration
// ---------------------------------------------------------------------------

export type ReadingMode = 'short' | 'full';

/** Per-provider block of the provider-settings file. */
export interface ProviderSettings {
  api_key?: string;
  voice?: string;
  model?: string;
  format?: string;
  speed?: number;
  host?: string;
  port?: number;
  speaker?: number;
  stability?: number;
  similarity_boost?: number;
  style?: number;
  use_speaker_boost?: boolean;
  region?: string;
  engine?: string;
  sample_rate?: string;
  volume?: number;
}

/** Provider-settings file (`.claude/config.json`). */
export interface VoiceConfigFile {
  default_provider?: string;
  providers?: Record<string, ProviderSettings>;
  defaults?: {
    volume?: number;
    speed?: number;
  };
}

/**
 * Voice flags as given on the command line.
 * Absent, `''`, speaker `0`, volume `1.0` and speed `1.0` all mean "unset".
 */
export interface CliVoiceFlags {
  provider?: string;
  speaker?: number;
  volume?: number;
  speed?: number;
  apiKey?: string;
  voice?: string;
  model?: string;
  format?: string;
  mode?: string;
  chars?: number;
  stability?: number;
  similarityBoost?: number;
  style?: number;
  useSpeakerBoost?: boolean;
  region?: string;
  pollyEngine?: string;
  sampleRate?: string;
}

/** Voice layer contributed by a persona descriptor. */
export interface PersonaVoice {
  provider?: string;
  speaker?: number;
  volume?: number;
  speed?: number;
}

/** Fully resolved parameters for one synthesis call. Frozen once built. */
export interface EffectiveVoiceParameters {
  readonly provider: string;
  /** Speaker id of the selected engine's slot. */
  readonly speaker: number;
  readonly voicevoxSpeaker: number;
  readonly aivisSpeechSpeaker: number;
  readonly volume: number;
  readonly speed: number;
  readonly readingMode: ReadingMode;
  readonly maxChars: number;
  readonly apiKey: string;
  readonly voice: string;
  readonly model: string;
  readonly format: string;
  readonly stability: number;
  readonly similarityBoost: number;
  readonly style: number;
  readonly useSpeakerBoost: boolean;
  readonly region: string;
  readonly pollyEngine: string;
  readonly sampleRate: string;
  readonly host: string;
  readonly port: number;
}

// ---------------------------------------------------------------------------
// Persona types
// ---------------------------------------------------------------------------

/** Voice block inside persona.json (current and legacy field names). */
export interface PersonaVoiceConfig {
  provider?: string;
  speaker?: number;
  volume?: number;
  speed?: number;
  /** Legacy alias of provider */
  engine?: string;
  /** Legacy alias of speaker */
  speaker_id?: number;
}

/** Per-project persona descriptor (`.claude/persona.json`). */
export interface PersonaConfig {
  name: string;
  voice?: PersonaVoiceConfig;
  override_global?: boolean;
  custom_instructions?: string;
}

// ---------------------------------------------------------------------------
// State Management Types
// ---------------------------------------------------------------------------

/** Result of writing a state file. */
export interface StateWriteResult {
  /** Whether the write succeeded */
  success: boolean;
  /** Path the file was written to */
  path: string;
  /** Error message if write failed */
  error?: string;
}

/** Outcome of one eviction sweep. */
export interface SweepResult {
  markersRemoved: number;
  recordsRemoved: number;
  errors: number;
}

// ---------------------------------------------------------------------------
// Process collaborators
// ---------------------------------------------------------------------------

/** Runs an external command. Injected so tests never spawn processes. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

export type Urgency = 'low' | 'normal' | 'high' | 'critical';
