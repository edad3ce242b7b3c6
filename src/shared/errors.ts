/**
 * Error types
 *
 * One base class with a `kind` discriminant so callers can branch on the
 * failure without string matching. Hook entry points catch everything;
 * these classes exist so the log line says what actually went wrong.
 */

export type ErrorKind =
  | 'unrecognized_format'
  | 'malformed_payload'
  | 'config_error'
  | 'missing_credential'
  | 'no_assistant_message'
  | 'provider_error'
  | 'persona_error';

export class PersonaHooksError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export class DetectionError extends PersonaHooksError {
  constructor(
    kind: 'unrecognized_format' | 'malformed_payload',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(kind, message, options);
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigError extends PersonaHooksError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config_error', message, options);
  }
}

/** A cloud provider was selected but no layer supplied its key. */
export class MissingCredentialError extends PersonaHooksError {
  constructor(
    readonly provider: string,
    readonly field: string,
    readonly envVar: string
  ) {
    super(
      'missing_credential',
      `${provider} requires an API key: set ${field}, pass --api-key, or export ${envVar}`
    );
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** The latest assistant turn carried no text (e.g. tool-only). Callers skip. */
export class NoAssistantMessageError extends PersonaHooksError {
  constructor(message = 'no assistant message with text content') {
    super('no_assistant_message', message);
  }
}

export type ProviderFailure = 'auth' | 'quota' | 'network' | 'unsupported' | 'backend';

export class ProviderError extends PersonaHooksError {
  constructor(
    readonly provider: string,
    readonly failure: ProviderFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('provider_error', `${provider}: ${message}`, options);
  }
}

export class PersonaError extends PersonaHooksError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persona_error', message, options);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Normalize any thrown value into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system errors carry a string `code` (ENOENT, EEXIST, ...). */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
