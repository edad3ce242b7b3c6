/**
 * Persona Store
 *
 * Personas are markdown profiles in `~/.claude/personas/<name>.md`.
 * Applying one copies it over the assistant's active instructions file
 * (`~/.claude/CLAUDE.md`).
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { PersonaError, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

export const PERSONA_HEADER = '# Persona:';

/** Profile written by `persona create`. */
export function personaTemplate(name: string): string {
  return `${PERSONA_HEADER} ${name}

## Tone
Speaks in a clear, neutral tone.

## Approach
- Solves problems logically
- Values efficiency

## Values
- Cares about code quality
- Understands why tests matter

## Expertise
- General programming knowledge

## Conversation style
- Clear, concise explanations
- Adds detail when it is asked for
`;
}

export class PersonaStore {
  constructor(private readonly rootDir: string = join(homedir(), '.claude')) {}

  get personasDir(): string {
    return join(this.rootDir, 'personas');
  }

  /** The assistant's active instructions file. */
  get activeFile(): string {
    return join(this.rootDir, 'CLAUDE.md');
  }

  /** Path of a persona profile. Rejects names that would escape the store. */
  path(name: string): string {
    if (name === '' || /[\\/]/.test(name) || name.includes('..')) {
      throw new PersonaError(`invalid persona name: '${name}'`);
    }
    return join(this.personasDir, `${name}.md`);
  }

  /** Persona names, sorted. Empty if the store doesn't exist yet. */
  list(): string[] {
    if (!existsSync(this.personasDir)) return [];
    try {
      return readdirSync(this.personasDir, { withFileTypes: true })
        .filter((entry) => entry.isFile() && entry.name.endsWith('.md'))
        .map((entry) => entry.name.slice(0, -'.md'.length))
        .sort((a, b) => a.localeCompare(b));
    } catch (err: unknown) {
      throw new PersonaError(`failed to read personas directory: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  exists(name: string): boolean {
    return existsSync(this.path(name));
  }

  read(name: string): string {
    if (!this.exists(name)) {
      throw new PersonaError(`persona '${name}' does not exist`);
    }
    return readFileSync(this.path(name), 'utf-8');
  }

  /** Create a profile from the template. Returns its path. */
  create(name: string): string {
    if (this.exists(name)) {
      throw new PersonaError(`persona '${name}' already exists`);
    }
    mkdirSync(this.personasDir, { recursive: true });
    const path = this.path(name);
    writeFileSync(path, personaTemplate(name), 'utf-8');
    Logger.debug(`created persona ${name} at ${path}`);
    return path;
  }

  /** Copy a profile over the active instructions file. */
  apply(name: string): void {
    const content = this.read(name);
    try {
      mkdirSync(this.rootDir, { recursive: true });
      writeFileSync(this.activeFile, content, 'utf-8');
    } catch (err: unknown) {
      throw new PersonaError(`failed to write ${this.activeFile}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    Logger.debug(`applied persona ${name}`);
  }

  /**
   * Name of the active persona from its `# Persona:` header.
   * 'none' when there is no active file, 'unknown' when it has no header.
   */
  current(): string {
    if (!existsSync(this.activeFile)) return 'none';
    const content = readFileSync(this.activeFile, 'utf-8');
    for (const line of content.split('\n')) {
      if (line.startsWith(PERSONA_HEADER)) {
        const name = line.slice(PERSONA_HEADER.length).trim();
        if (name !== '') return name;
      }
    }
    return 'unknown';
  }
}
