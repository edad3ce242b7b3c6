/**
 * Transcript Reader
 *
 * Claude Code writes each session as JSONL. We only care about the newest
 * assistant-authored record and its text content.
 */

import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { NoAssistantMessageError, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { applyReadingMode, stripMarkup } from './text.js';
import type { ReadingMode } from '../shared/types.js';

export interface TranscriptOptions {
  mode?: ReadingMode;
  /** Code-point cap for `full` mode, 0 = unlimited */
  maxChars?: number;
  /** Collect every text item of the latest assistant uuid */
  uuidMode?: boolean;
}

const transcriptLine = z.object({
  type: z.string(),
  uuid: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z
        .union([
          z.array(z.object({ type: z.string(), text: z.string().nullish() }).passthrough()),
          z.string(),
        ])
        .optional(),
    })
    .optional(),
});

type TranscriptLine = z.infer<typeof transcriptLine>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Parse transcript content into records, newest first. Bad lines are skipped. */
export function parseTranscript(content: string): TranscriptLine[] {
  const records: TranscriptLine[] = [];
  for (const line of content.split('\n')) {
    if (line.trim() === '') continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = transcriptLine.safeParse(json);
    if (parsed.success) records.push(parsed.data);
  }
  return records.reverse();
}

function isAssistant(record: TranscriptLine): boolean {
  return record.type === 'assistant' && record.message?.role === 'assistant';
}

function textItems(record: TranscriptLine): string[] {
  const content = record.message?.content;
  if (content === undefined) return [];
  if (typeof content === 'string') return content !== '' ? [content] : [];
  return content
    .flatMap((item) => (item.type === 'text' && item.text ? [item.text] : []));
}

/**
 * Extract the raw text of the latest assistant message.
 *
 * Simple mode: the first text item of the newest assistant record.
 * UUID mode: every text item sharing the newest assistant uuid, joined
 * with spaces in transcript order.
 *
 * @throws NoAssistantMessageError when that record carries no text
 */
export function extractAssistantText(content: string, uuidMode = false): string {
  const records = parseTranscript(content);
  const latest = records.find(isAssistant);
  if (!latest) throw new NoAssistantMessageError();

  if (!uuidMode || !latest.uuid) {
    const first = textItems(latest)[0];
    if (first === undefined) {
      throw new NoAssistantMessageError('latest assistant message has no text content');
    }
    return first;
  }

  const texts = records
    .filter((record) => record.uuid === latest.uuid && isAssistant(record))
    .flatMap(textItems)
    .reverse();
  if (texts.length === 0) {
    throw new NoAssistantMessageError('latest assistant message has no text content');
  }
  return texts.join(' ');
}

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

/**
 * Read the latest assistant message from a transcript file, strip its
 * markup and apply the reading mode.
 */
export function readLatestAssistantMessage(
  transcriptPath: string,
  options: TranscriptOptions = {}
): string {
  const content = readFileSync(transcriptPath, 'utf-8');
  const text = extractAssistantText(content, options.uuidMode ?? false);
  Logger.debug(`found assistant message (${text.length} chars) in ${transcriptPath}`);
  return applyReadingMode(stripMarkup(text), options.mode ?? 'short', options.maxChars ?? 0);
}

/** Newest `*.jsonl` under `root` (recursively) by mtime, or null. */
export function findLatestTranscript(
  root: string = join(homedir(), '.claude', 'projects')
): string | null {
  if (!existsSync(root)) return null;

  let latest: { path: string; mtime: number } | null = null;
  const stack = [root];
  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err: unknown) {
      Logger.debug(`skipping ${dir}: ${errorMessage(err)}`);
      continue;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        stack.push(path);
      } else if (entry.isFile() && entry.name.endsWith('.jsonl')) {
        try {
          const mtime = statSync(path).mtimeMs;
          if (!latest || mtime > latest.mtime) latest = { path, mtime };
        } catch (err: unknown) {
          Logger.debug(`skipping ${path}: ${errorMessage(err)}`);
        }
      }
    }
  }
  return latest?.path ?? null;
}
