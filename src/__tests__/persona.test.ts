import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { PersonaStore, personaTemplate } from '../persona/store.js';
import {
  getPersonaConfigPaths,
  loadPersonaConfig,
  savePersonaConfig,
  defaultPersonaConfig,
  validatePersonaConfig,
  toPersonaVoice,
} from '../persona/config.js';
import { PersonaError, ConfigError } from '../shared/errors.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'persona-hooks-persona-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// PersonaStore
// ---------------------------------------------------------------------------

describe('PersonaStore', () => {
  it('should list nothing before any persona exists', () => {
    expect(new PersonaStore(tempDir).list()).toEqual([]);
  });

  it('should create personas from the template and list them sorted', () => {
    const store = new PersonaStore(tempDir);
    store.create('mentor');
    store.create('critic');

    expect(store.list()).toEqual(['critic', 'mentor']);
    expect(store.read('mentor')).toBe(personaTemplate('mentor'));
  });

  it('should refuse to overwrite an existing persona', () => {
    const store = new PersonaStore(tempDir);
    store.create('mentor');

    expect(() => store.create('mentor')).toThrow("persona 'mentor' already exists");
  });

  it('should reject names that escape the store', () => {
    const store = new PersonaStore(tempDir);

    expect(() => store.path('../evil')).toThrow(PersonaError);
    expect(() => store.path('a/b')).toThrow(PersonaError);
    expect(() => store.path('')).toThrow(PersonaError);
  });

  it('should copy a persona into the active file on apply', () => {
    const store = new PersonaStore(tempDir);
    mkdirSync(store.personasDir, { recursive: true });
    writeFileSync(join(store.personasDir, 'pirate.md'), '# Persona: pirate\nArr.\n');

    store.apply('pirate');

    expect(readFileSync(join(tempDir, 'CLAUDE.md'), 'utf-8')).toBe('# Persona: pirate\nArr.\n');
    expect(store.current()).toBe('pirate');
  });

  it('should fail to apply a missing persona', () => {
    expect(() => new PersonaStore(tempDir).apply('ghost')).toThrow("persona 'ghost' does not exist");
  });

  it('should report none or unknown for the current persona', () => {
    const store = new PersonaStore(tempDir);
    expect(store.current()).toBe('none');

    writeFileSync(store.activeFile, 'Just some instructions\n');
    expect(store.current()).toBe('unknown');
  });
});

// ---------------------------------------------------------------------------
// Persona descriptor
// ---------------------------------------------------------------------------

describe('getPersonaConfigPaths', () => {
  it('should check only project and home for Claude Code', () => {
    expect(getPersonaConfigPaths('/p', 'claude-code', '/h')).toEqual([
      join('/p', '.claude', 'persona.json'),
      join('/h', '.claude', 'persona.json'),
    ]);
  });

  it('should check the platform directory first for Codex', () => {
    expect(getPersonaConfigPaths('/p', 'codex', '/h')).toEqual([
      join('/p', '.claude', 'codex', 'persona.json'),
      join('/p', '.claude', 'persona.json'),
      join('/h', '.codex', 'persona.json'),
    ]);
  });
});

describe('loadPersonaConfig', () => {
  let project: string;
  let home: string;

  beforeEach(() => {
    project = join(tempDir, 'project');
    home = join(tempDir, 'home');
    mkdirSync(join(project, '.claude', 'cursor'), { recursive: true });
    mkdirSync(join(home, '.cursor'), { recursive: true });
  });

  it('should return null when no descriptor exists', () => {
    expect(loadPersonaConfig(project, 'cursor', home)).toBeNull();
  });

  it('should prefer the platform-specific descriptor', () => {
    writeFileSync(join(project, '.claude', 'persona.json'), '{"name":"shared"}');
    writeFileSync(join(project, '.claude', 'cursor', 'persona.json'), '{"name":"cursor-only"}');

    expect(loadPersonaConfig(project, 'cursor', home)?.name).toBe('cursor-only');
  });

  it('should fall back to the global descriptor', () => {
    writeFileSync(join(home, '.cursor', 'persona.json'), '{"name":"global"}');

    expect(loadPersonaConfig(project, 'cursor', home)?.name).toBe('global');
  });

  it('should round-trip through savePersonaConfig', () => {
    const config = { name: 'mentor', voice: { provider: 'voicevox', speaker: 3 } };
    const path = savePersonaConfig(project, config);

    expect(path).toBe(join(project, '.claude', 'persona.json'));
    expect(loadPersonaConfig(project, 'claude-code', home)).toEqual(config);
  });

  it('should throw ConfigError for a wrongly typed descriptor', () => {
    writeFileSync(join(project, '.claude', 'persona.json'), '{"name": 42}');

    expect(() => loadPersonaConfig(project, 'claude-code', home)).toThrow(ConfigError);
  });
});

describe('validatePersonaConfig', () => {
  it('should accept the default descriptor', () => {
    expect(validatePersonaConfig(defaultPersonaConfig())).toBeNull();
  });

  it('should reject an empty name', () => {
    expect(validatePersonaConfig({ name: '  ' })).toBe('persona name cannot be empty');
  });

  it('should reject a voice block without a provider', () => {
    expect(validatePersonaConfig({ name: 'x', voice: { speaker: 3 } })).toBe(
      'voice provider cannot be empty when voice is configured'
    );
  });

  it('should reject cloud providers in the persona voice', () => {
    expect(validatePersonaConfig({ name: 'x', voice: { provider: 'openai' } })).toBe(
      'unsupported voice provider: openai'
    );
  });

  it('should accept the legacy engine field', () => {
    expect(validatePersonaConfig({ name: 'x', voice: { engine: 'aivisspeech' } })).toBeNull();
  });
});

describe('toPersonaVoice', () => {
  it('should return null without a voice block', () => {
    expect(toPersonaVoice({ name: 'x' })).toBeNull();
    expect(toPersonaVoice(null)).toBeNull();
  });

  it('should fill provider and speaker from legacy fields', () => {
    expect(toPersonaVoice({ name: 'x', voice: { engine: 'voicevox', speaker_id: 8, speed: 1.2 } })).toEqual({
      provider: 'voicevox',
      speaker: 8,
      volume: undefined,
      speed: 1.2,
    });
  });

  it('should prefer the current fields', () => {
    const voice = toPersonaVoice({
      name: 'x',
      voice: { provider: 'aivisspeech', engine: 'voicevox', speaker: 5, speaker_id: 8 },
    });
    expect(voice?.provider).toBe('aivisspeech');
    expect(voice?.speaker).toBe(5);
  });
});
