/**
 * Speech Text Processing
 *
 * Turns assistant output into something worth reading aloud: markup goes,
 * then the reading mode decides how much of it is spoken.
 *
 * The same normalization feeds both synthesis and the dedup fingerprint,
 * so "already spoken" means "would sound the same".
 */

import type { ReadingMode } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Reading modes
// ---------------------------------------------------------------------------

/**
 * Map a reading-mode name (including legacy aliases) onto a canonical mode.
 *
 *   short, first_line                                → short
 *   full, full_text, line_limit, after_first, char_limit → full
 *
 * Unknown names fall back to short.
 */
export function normalizeReadingMode(mode: string): ReadingMode {
  switch (mode.trim().toLowerCase()) {
    case 'full':
    case 'full_text':
    case 'line_limit':
    case 'after_first':
    case 'char_limit':
      return 'full';
    default:
      return 'short';
  }
}

/**
 * Cut text down to what the reading mode speaks.
 * `short` keeps the first non-empty line; `full` flattens newlines into
 * spaces and, when maxChars > 0, keeps that many code points.
 */
export function applyReadingMode(text: string, mode: ReadingMode, maxChars = 0): string {
  if (mode === 'short') {
    const first = text.split('\n').find((line) => line.trim() !== '');
    return first?.trim() ?? '';
  }

  const flattened = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .join(' ');

  if (maxChars > 0) {
    const chars = Array.from(flattened);
    if (chars.length > maxChars) return chars.slice(0, maxChars).join('');
  }
  return flattened;
}

// ---------------------------------------------------------------------------
// Markup stripping
// ---------------------------------------------------------------------------

/**
 * Remove markdown and markup that would be read out literally.
 * Link and inline-code content is kept; the syntax around it goes.
 */
export function stripMarkup(text: string): string {
  let stripped = text.replace(/\r\n/g, '\n');

  // Fenced code blocks (```...```)
  stripped = stripped.replace(/```[\s\S]*?```/g, '');

  // Inline code: keep the content
  stripped = stripped.replace(/`([^`]+)`/g, '$1');

  // Images, then links: keep the label
  stripped = stripped.replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1');
  stripped = stripped.replace(/\[([^\]]+)\]\([^)]*\)/g, '$1');

  // Bare URLs
  stripped = stripped.replace(/https?:\/\/\S+/g, '');

  // XML/HTML tags
  stripped = stripped.replace(/<\/?[A-Za-z][^>]*>/g, '');

  // Line-leading markers: headings, quotes, list bullets, numbered lists
  stripped = stripped.replace(/^[ \t]*#{1,6}[ \t]+/gm, '');
  stripped = stripped.replace(/^[ \t]*>[ \t]?/gm, '');
  stripped = stripped.replace(/^[ \t]*[-*+][ \t]+/gm, '');
  stripped = stripped.replace(/^[ \t]*\d+\.[ \t]+/gm, '');

  // Horizontal rules
  stripped = stripped.replace(/^[ \t]*([-*_])([ \t]*\1){2,}[ \t]*$/gm, '');

  // Emphasis: **bold**, __bold__, *em*, _em_, ~~strike~~
  stripped = stripped.replace(/(\*\*|__)(.+?)\1/g, '$2');
  stripped = stripped.replace(/(^|[^\w*])\*([^*\n]+)\*/g, '$1$2');
  stripped = stripped.replace(/(^|[^\w])_([^_\n]+)_/g, '$1$2');
  stripped = stripped.replace(/~~(.+?)~~/g, '$1');

  // Collapse runs of blank lines
  stripped = stripped.replace(/\n{3,}/g, '\n\n');

  return stripped;
}

/** Normalization shared by synthesis and dedup: strip markup, then trim. */
export function normalizeForSpeech(text: string): string {
  return stripMarkup(text).trim();
}
