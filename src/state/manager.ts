/**
 * Session State Coordinator
 *
 * File-backed coordination between hook invocations that share nothing but
 * the filesystem. Two kinds of per-session files:
 *
 *   - marker  → sessions/.session_<id>   "initialization already ran"
 *   - record  → voice/<id>.lastread      fingerprint of the last spoken text
 *
 * Both live under one per-user state directory:
 *   $PERSONA_HOOKS_STATE_DIR, or ~/.config/persona-hooks/state
 *
 * Files are only ever created whole or replaced by rename, so a reader never
 * sees a half-written file. Stale files are swept by mtime after 24 hours;
 * a marker created a moment ago is never old enough to be swept.
 *
 * All operations are synchronous: hooks are short-lived subprocesses.
 */

import { createHash } from 'crypto';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { errorCode, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { normalizeForSpeech } from '../voice/text.js';
import type { StateWriteResult, SweepResult } from '../shared/types.js';

export const STATE_DIR_ENV = 'PERSONA_HOOKS_STATE_DIR';

/** Markers and records older than this are evicted. */
export const RETENTION_MS = 24 * 60 * 60 * 1000;

const MARKER_DIR = 'sessions';
const RECORD_DIR = 'voice';
const MARKER_PREFIX = '.session_';
const RECORD_SUFFIX = '.lastread';
const TEMP_SUFFIX = '.tmp';

function isRecordFile(name: string): boolean {
  if (name.endsWith(RECORD_SUFFIX)) return true;
  // <id>.lastread.<pid>.tmp left by a process killed mid-write
  return name.endsWith(TEMP_SUFFIX) && name.includes(`${RECORD_SUFFIX}.`);
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Get the per-user state directory.
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV];
  if (override) return override;
  return join(homedir(), '.config', 'persona-hooks', 'state');
}

function percentEncode(ch: string): string {
  return Array.from(Buffer.from(ch, 'utf-8'), (byte) =>
    `%${byte.toString(16).toUpperCase().padStart(2, '0')}`
  ).join('');
}

/**
 * Make a session id safe to embed in a file name.
 * Anything outside [A-Za-z0-9._-] (including '%') is percent-encoded as
 * UTF-8, and the dots of a dot-only id are encoded too, so distinct ids
 * always map to distinct names.
 */
export function sanitizeSessionId(sessionId: string): string {
  if (/^\.+$/.test(sessionId)) return sessionId.replace(/\./g, '%2E');
  return sessionId.replace(/[^A-Za-z0-9._-]/gu, percentEncode);
}

/** sha256 hex of the speech-normalized text. */
export function fingerprint(text: string): string {
  return createHash('sha256').update(normalizeForSpeech(text)).digest('hex');
}

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

// ---------------------------------------------------------------------------
// SessionCoordinator
// ---------------------------------------------------------------------------

/**
 * Usage:
 *   const state = new SessionCoordinator();
 *   if (state.claimInitialization(sessionId)) applyPersona();
 *   if (!state.isDuplicate(sessionId, text)) { speak(text); state.record(sessionId, text); }
 */
export class SessionCoordinator {
  constructor(
    private readonly stateDir: string = getStateDir(),
    private readonly retentionMs: number = RETENTION_MS
  ) {}

  /** Path of the session marker (useful for debugging). */
  markerPath(sessionId: string): string {
    return join(this.stateDir, MARKER_DIR, `${MARKER_PREFIX}${sanitizeSessionId(sessionId)}`);
  }

  /** Path of the dedup record (useful for debugging). */
  recordPath(sessionId: string): string {
    return join(this.stateDir, RECORD_DIR, `${sanitizeSessionId(sessionId)}${RECORD_SUFFIX}`);
  }

  // -------------------------------------------------------------------------
  // Session-start idempotency
  // -------------------------------------------------------------------------

  /**
   * True iff no marker exists for this session.
   * An empty session id can't be coordinated, so it always initializes.
   */
  shouldInitialize(sessionId: string): boolean {
    if (sessionId === '') return true;
    return !existsSync(this.markerPath(sessionId));
  }

  /**
   * Create the marker. Best-effort: failures come back in the result and
   * are logged, never thrown. An existing marker counts as success.
   */
  recordInitialized(sessionId: string): StateWriteResult {
    if (sessionId === '') {
      return { success: false, path: '', error: 'empty session id' };
    }
    const path = this.markerPath(sessionId);
    try {
      ensureDir(join(this.stateDir, MARKER_DIR));
      writeFileSync(path, new Date().toISOString(), { encoding: 'utf-8', flag: 'wx' });
      return { success: true, path };
    } catch (err: unknown) {
      if (errorCode(err) === 'EEXIST') return { success: true, path };
      const message = errorMessage(err);
      Logger.warn(`could not create session marker ${path}: ${message}`);
      return { success: false, path, error: message };
    }
  }

  /**
   * Atomic test-and-set: create the marker exclusively and report whether
   * this call created it. When two invocations race on a new session, only
   * one gets true.
   *
   * If the marker can't be written for any reason other than "exists",
   * initialization proceeds anyway (the guarded side effects are idempotent).
   */
  claimInitialization(sessionId: string): boolean {
    if (sessionId === '') return true;
    const path = this.markerPath(sessionId);
    try {
      ensureDir(join(this.stateDir, MARKER_DIR));
      writeFileSync(path, new Date().toISOString(), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (err: unknown) {
      if (errorCode(err) === 'EEXIST') return false;
      Logger.warn(`could not create session marker ${path}: ${errorMessage(err)}`);
      return true;
    }
  }

  // -------------------------------------------------------------------------
  // Speech de-duplication
  // -------------------------------------------------------------------------

  /**
   * True iff the fingerprint of `text` equals the last recorded one for
   * this session. Sessions without an id never deduplicate.
   */
  isDuplicate(sessionId: string, text: string): boolean {
    if (sessionId === '') return false;
    const path = this.recordPath(sessionId);
    try {
      if (!existsSync(path)) return false;
      return readFileSync(path, 'utf-8').trim() === fingerprint(text);
    } catch (err: unknown) {
      Logger.debug(`could not read dedup record ${path}: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Remember `text` as the last utterance, replacing any previous one.
   * Written to a temp file and renamed over the record.
   */
  record(sessionId: string, text: string): StateWriteResult {
    if (sessionId === '') {
      return { success: false, path: '', error: 'empty session id' };
    }
    const path = this.recordPath(sessionId);
    const tmp = `${path}.${process.pid}${TEMP_SUFFIX}`;
    try {
      ensureDir(join(this.stateDir, RECORD_DIR));
      writeFileSync(tmp, fingerprint(text), 'utf-8');
      renameSync(tmp, path);
      return { success: true, path };
    } catch (err: unknown) {
      const message = errorMessage(err);
      Logger.warn(`could not write dedup record ${path}: ${message}`);
      return { success: false, path, error: message };
    }
  }

  // -------------------------------------------------------------------------
  // Eviction
  // -------------------------------------------------------------------------

  /**
   * Delete markers and records (and orphaned record temp files) whose
   * mtime is older than the retention window. Each file is handled on its own; one failure doesn't stop the
   * rest.
   */
  sweep(now: number = Date.now()): SweepResult {
    const result: SweepResult = { markersRemoved: 0, recordsRemoved: 0, errors: 0 };
    result.markersRemoved = this.sweepDir(
      join(this.stateDir, MARKER_DIR),
      (name) => name.startsWith(MARKER_PREFIX),
      now,
      result
    );
    result.recordsRemoved = this.sweepDir(
      join(this.stateDir, RECORD_DIR),
      isRecordFile,
      now,
      result
    );
    return result;
  }

  /**
   * Schedule a sweep without holding the process open. If the process
   * exits first, the next invocation sweeps instead.
   */
  sweepInBackground(): void {
    const timer = setTimeout(() => {
      const { markersRemoved, recordsRemoved, errors } = this.sweep();
      if (markersRemoved + recordsRemoved + errors > 0) {
        Logger.debug(
          `swept ${markersRemoved} markers, ${recordsRemoved} records (${errors} errors)`
        );
      }
    }, 0);
    timer.unref();
  }

  private sweepDir(
    dir: string,
    matches: (name: string) => boolean,
    now: number,
    result: SweepResult
  ): number {
    let names: string[];
    try {
      if (!existsSync(dir)) return 0;
      names = readdirSync(dir);
    } catch (err: unknown) {
      Logger.debug(`could not list ${dir}: ${errorMessage(err)}`);
      result.errors++;
      return 0;
    }

    let removed = 0;
    for (const name of names) {
      if (!matches(name)) continue;
      const path = join(dir, name);
      try {
        if (now - statSync(path).mtimeMs > this.retentionMs) {
          unlinkSync(path);
          removed++;
        }
      } catch (err: unknown) {
        // Another invocation may have swept it already.
        if (errorCode(err) !== 'ENOENT') {
          Logger.debug(`could not evict ${path}: ${errorMessage(err)}`);
          result.errors++;
        }
      }
    }
    return removed;
  }
}
