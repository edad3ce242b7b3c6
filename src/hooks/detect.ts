/**
 * Hook Protocol Detection
 *
 * Classifies one raw hook payload and decodes it into a NormalizedEvent.
 * Pure function of the input bytes: no I/O, no state.
 *
 * Fingerprints, checked in this order:
 *   1. `type: "agent-turn-complete"`               → codex
 *   2. `hook_event_name` + `conversation_id`       → cursor
 *   3. `hook_event_name`                           → claude-code
 *
 * Anything else is `unrecognized_format`. Bytes that aren't JSON fail with
 * `malformed_payload` before fingerprinting.
 */

import { z } from 'zod';
import { DetectionError, errorMessage } from '../shared/errors.js';
import type {
  ClaudeCodeEnvelope,
  ClaudeCodeEvent,
  ClaudeCodePayload,
  CodexEvent,
  CursorEvent,
  NormalizedEvent,
} from '../shared/types.js';

export const CODEX_TURN_COMPLETE = 'agent-turn-complete';

export type DetectResult =
  | { ok: true; event: NormalizedEvent }
  | { ok: false; error: DetectionError };

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

// JSON null and a missing key both decode to the zero value.
const text = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

const textList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

const claudeCodeWire = z.object({
  session_id: text,
  transcript_path: text,
  cwd: text,
  hook_event_name: text,
  prompt: text,
  stop_hook_active: z
    .boolean()
    .nullish()
    .transform((v) => v ?? false),
  message: text,
  notification_type: z.string().optional(),
  title: z.string().optional(),
});

const codexWire = z.object({
  type: z.literal(CODEX_TURN_COMPLETE),
  'thread-id': text,
  // Some Codex builds emit the turn id as a number.
  'turn-id': z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? '' : String(v))),
  cwd: text,
  'input-messages': textList,
  'last-assistant-message': text,
});

const cursorWire = z.object({
  conversation_id: text,
  generation_id: text,
  model: text,
  hook_event_name: text,
  cursor_version: text,
  workspace_roots: textList,
  user_email: text,
  prompt: z.string().optional(),
  text: z.string().optional(),
  transcript_path: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Detect and decode a hook payload.
 * Never throws; failures come back as `{ ok: false, error }`.
 */
export function detect(input: string | Uint8Array): DetectResult {
  const raw = typeof input === 'string' ? input : new TextDecoder().decode(input);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    return fail('malformed_payload', `failed to parse JSON: ${errorMessage(err)}`, err);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return fail('unrecognized_format', 'hook payload is not a JSON object');
  }

  const event = classify(parsed);
  if (event instanceof DetectionError) {
    return { ok: false, error: event };
  }
  if (event.eventType === '') {
    return fail('malformed_payload', `${event.source} payload has an empty event name`);
  }
  return { ok: true, event };
}

/** Throwing variant of detect(). */
export function detectOrThrow(input: string | Uint8Array): NormalizedEvent {
  const result = detect(input);
  if (!result.ok) throw result.error;
  return result.event;
}

function classify(obj: object): NormalizedEvent | DetectionError {
  if ('type' in obj && obj.type === CODEX_TURN_COMPLETE) {
    return decodeCodex(obj);
  }
  if ('hook_event_name' in obj) {
    return 'conversation_id' in obj ? decodeCursor(obj) : decodeClaudeCode(obj);
  }
  return new DetectionError('unrecognized_format', 'unknown hook event format');
}

// ---------------------------------------------------------------------------
// Protocol decoders
// ---------------------------------------------------------------------------

function decodeCodex(obj: object): CodexEvent | DetectionError {
  const parsed = codexWire.safeParse(obj);
  if (!parsed.success) return schemaError('Codex', parsed.error);
  const wire = parsed.data;

  return {
    source: 'codex',
    sessionId: wire['thread-id'],
    workingDirectory: wire.cwd,
    eventType: wire.type,
    userInputs: wire['input-messages'],
    assistantResponseText: wire['last-assistant-message'],
    payload: wire,
  };
}

function decodeCursor(obj: object): CursorEvent | DetectionError {
  const parsed = cursorWire.safeParse(obj);
  if (!parsed.success) return schemaError('Cursor', parsed.error);
  const wire = parsed.data;
  const eventType = wire.hook_event_name;

  const userInputs: string[] = [];
  let assistantResponseText = '';
  if (eventType === 'beforeSubmitPrompt') {
    userInputs.push(wire.prompt ?? '');
  } else if (eventType === 'afterAgentResponse') {
    assistantResponseText = wire.text ?? '';
  }

  return {
    source: 'cursor',
    sessionId: wire.conversation_id,
    workingDirectory: wire.workspace_roots[0] ?? '',
    eventType,
    userInputs,
    assistantResponseText,
    payload: wire,
  };
}

function decodeClaudeCode(obj: object): ClaudeCodeEvent | DetectionError {
  const parsed = claudeCodeWire.safeParse(obj);
  if (!parsed.success) return schemaError('Claude Code', parsed.error);
  const wire = parsed.data;

  const envelope: ClaudeCodeEnvelope = {
    session_id: wire.session_id,
    transcript_path: wire.transcript_path,
    cwd: wire.cwd,
    hook_event_name: wire.hook_event_name,
  };

  let payload: ClaudeCodePayload;
  let userInputs: string[] = [];
  let assistantResponseText = '';

  switch (wire.hook_event_name) {
    case 'UserPromptSubmit':
      payload = { ...envelope, kind: 'prompt', prompt: wire.prompt };
      userInputs = [wire.prompt];
      break;
    case 'Stop':
    case 'SubagentStop':
      // Response text lives in the transcript, not the payload.
      payload = { ...envelope, kind: 'stop', stop_hook_active: wire.stop_hook_active };
      break;
    case 'Notification':
      payload = {
        ...envelope,
        kind: 'notification',
        message: wire.message,
        notification_type: wire.notification_type,
        title: wire.title,
      };
      assistantResponseText = wire.message;
      break;
    case 'SessionStart':
    case 'SessionEnd':
      payload = { ...envelope, kind: 'session' };
      break;
    default:
      payload = { ...envelope, kind: 'other' };
  }

  return {
    source: 'claude-code',
    sessionId: wire.session_id,
    workingDirectory: wire.cwd,
    eventType: wire.hook_event_name,
    userInputs,
    assistantResponseText,
    payload,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fail(
  kind: 'unrecognized_format' | 'malformed_payload',
  message: string,
  cause?: unknown
): DetectResult {
  return { ok: false, error: new DetectionError(kind, message, { cause }) };
}

function schemaError(protocol: string, error: z.ZodError): DetectionError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return new DetectionError(
    'malformed_payload',
    `failed to decode ${protocol} event${where}: ${issue?.message ?? 'invalid payload'}`,
    { cause: error }
  );
}
