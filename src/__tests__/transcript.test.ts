import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, utimesSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  parseTranscript,
  extractAssistantText,
  readLatestAssistantMessage,
  findLatestTranscript,
} from '../voice/transcript.js';
import { NoAssistantMessageError } from '../shared/errors.js';

function user(text: string): string {
  return JSON.stringify({ type: 'user', message: { role: 'user', content: text } });
}

function assistant(uuid: string, content: unknown[]): string {
  return JSON.stringify({ type: 'assistant', uuid, message: { role: 'assistant', content } });
}

function textItem(text: string): { type: 'text'; text: string } {
  return { type: 'text', text };
}

describe('parseTranscript', () => {
  it('should return records newest first and skip bad lines', () => {
    const content = [user('hi'), 'not json', '{"no_type":true}', assistant('a1', [textItem('Hello')])].join('\n');
    const records = parseTranscript(content);

    expect(records.map((r) => r.type)).toEqual(['assistant', 'user']);
  });
});

describe('extractAssistantText', () => {
  it('should return the first text item of the latest assistant record', () => {
    const content = [
      assistant('a1', [textItem('Old reply')]),
      user('next'),
      assistant('a2', [textItem('New reply'), textItem('Second part')]),
    ].join('\n');

    expect(extractAssistantText(content)).toBe('New reply');
  });

  it('should fail when the latest assistant record has no text', () => {
    const content = [
      assistant('a1', [textItem('Earlier text')]),
      assistant('a2', [{ type: 'tool_use', id: 'tool-1', name: 'Bash', input: {} }]),
    ].join('\n');

    expect(() => extractAssistantText(content)).toThrow(NoAssistantMessageError);
  });

  it('should treat a null text item as no text rather than skipping the record', () => {
    const content = [
      assistant('a1', [textItem('Earlier text')]),
      assistant('a2', [{ type: 'text', text: null }]),
    ].join('\n');

    expect(() => extractAssistantText(content)).toThrow(NoAssistantMessageError);
  });

  it('should fail when there is no assistant record', () => {
    expect(() => extractAssistantText(user('hello'))).toThrow(NoAssistantMessageError);
  });

  it('should collect every text item of the latest uuid in uuid mode', () => {
    const content = [
      assistant('a1', [textItem('Old')]),
      assistant('a2', [textItem('Part one.')]),
      assistant('a2', [{ type: 'tool_use', id: 'tool-1', name: 'Read', input: {} }]),
      assistant('a2', [textItem('Part two.')]),
    ].join('\n');

    expect(extractAssistantText(content, true)).toBe('Part one. Part two.');
  });

  it('should accept string content', () => {
    const line = JSON.stringify({
      type: 'assistant',
      message: { role: 'assistant', content: 'Plain string reply' },
    });
    expect(extractAssistantText(line)).toBe('Plain string reply');
  });
});

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

describe('transcript files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'persona-hooks-transcript-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read, strip and cut the latest message', () => {
    const path = join(tempDir, 'session.jsonl');
    writeFileSync(path, assistant('a1', [textItem('## Done\nAll **tests** pass.\nDetails follow.')]) + '\n');

    expect(readLatestAssistantMessage(path)).toBe('Done');
    expect(readLatestAssistantMessage(path, { mode: 'full' })).toBe('Done All tests pass. Details follow.');
    expect(readLatestAssistantMessage(path, { mode: 'full', maxChars: 4 })).toBe('Done');
  });

  it('should find the newest transcript recursively', () => {
    const older = join(tempDir, 'proj-a', 'one.jsonl');
    const newer = join(tempDir, 'proj-b', 'nested', 'two.jsonl');
    mkdirSync(join(tempDir, 'proj-a'));
    mkdirSync(join(tempDir, 'proj-b', 'nested'), { recursive: true });
    writeFileSync(older, '');
    writeFileSync(newer, '');
    writeFileSync(join(tempDir, 'proj-b', 'notes.txt'), '');
    const past = new Date(Date.now() - 60_000);
    utimesSync(older, past, past);

    expect(findLatestTranscript(tempDir)).toBe(newer);
  });

  it('should return null when nothing is found', () => {
    expect(findLatestTranscript(tempDir)).toBeNull();
    expect(findLatestTranscript(join(tempDir, 'missing'))).toBeNull();
  });
});
