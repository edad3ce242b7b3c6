import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as jsonc from 'jsonc-parser';
import {
  loadJsoncFile,
  loadConfigFromPath,
  loadVoiceConfig,
  validateConfigPath,
  validateVoiceConfig,
  expandEnv,
  maskSecrets,
  generateExampleConfig,
  getConfigPaths,
  voiceConfigFileSchema,
} from '../config/loader.js';
import { ConfigError } from '../shared/errors.js';

// ---------------------------------------------------------------------------
// expandEnv
// ---------------------------------------------------------------------------

describe('expandEnv', () => {
  it('should substitute ${VAR} references', () => {
    expect(expandEnv('key-${TOKEN}', { TOKEN: 'test-secret' })).toBe('key-test-secret');
  });

  it('should replace unset variables with an empty string', () => {
    expect(expandEnv('${MISSING}', {})).toBe('');
  });

  it('should leave plain strings alone', () => {
    expect(expandEnv('$HOME and text', { HOME: '/root' })).toBe('$HOME and text');
  });
});

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

describe('getConfigPaths', () => {
  it('should return project and user paths', () => {
    const paths = getConfigPaths('/my/project', '/home/me');

    expect(paths.project).toBe(join('/my/project', '.claude', 'config.json'));
    expect(paths.user).toBe(join('/home/me', '.claude', 'config.json'));
  });
});

describe('validateConfigPath', () => {
  it('should accept a config.json path', () => {
    expect(() => validateConfigPath('/etc/app/config.json')).not.toThrow();
  });

  it('should reject parent-directory segments', () => {
    expect(() => validateConfigPath('/etc/../config.json')).toThrow(ConfigError);
  });

  it('should reject other file names', () => {
    expect(() => validateConfigPath('/etc/passwd')).toThrow(ConfigError);
  });
});

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe('loadJsoncFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'persona-hooks-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should parse comments and trailing commas', () => {
    const path = join(tempDir, 'config.json');
    writeFileSync(path, '{\n  // comment\n  "default_provider": "openai",\n}\n');

    expect(loadJsoncFile(path)).toEqual({ default_provider: 'openai' });
  });

  it('should return null for a missing file', () => {
    expect(loadJsoncFile(join(tempDir, 'nope.json'))).toBeNull();
  });

  it('should treat an empty file as an empty object', () => {
    const path = join(tempDir, 'config.json');
    writeFileSync(path, '');

    expect(loadJsoncFile(path)).toEqual({});
  });

  it('should throw ConfigError on broken syntax', () => {
    const path = join(tempDir, 'config.json');
    writeFileSync(path, '{ "default_provider": ');

    expect(() => loadJsoncFile(path)).toThrow(ConfigError);
  });
});

describe('loadVoiceConfig', () => {
  let tempDir: string;
  let project: string;
  let home: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'persona-hooks-config-'));
    project = join(tempDir, 'project');
    home = join(tempDir, 'home');
    mkdirSync(join(project, '.claude'), { recursive: true });
    mkdirSync(join(home, '.claude'), { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function write(dir: string, content: object): string {
    const path = join(dir, '.claude', 'config.json');
    writeFileSync(path, JSON.stringify(content), { mode: 0o600 });
    return path;
  }

  it('should return null when neither file exists', () => {
    expect(loadVoiceConfig({ workingDirectory: project, home, env: {} })).toBeNull();
  });

  it('should fall back to the user file', () => {
    const path = write(home, { default_provider: 'voicevox' });

    expect(loadVoiceConfig({ workingDirectory: project, home, env: {} })).toEqual({
      config: { default_provider: 'voicevox' },
      path,
    });
  });

  it('should use the project file without merging the user file', () => {
    write(home, { default_provider: 'voicevox', defaults: { volume: 0.5 } });
    const path = write(project, { default_provider: 'openai' });

    const loaded = loadVoiceConfig({ workingDirectory: project, home, env: {} });

    expect(loaded?.path).toBe(path);
    expect(loaded?.config).toEqual({ default_provider: 'openai' });
  });

  it('should expand environment variables in provider settings', () => {
    write(project, { providers: { openai: { api_key: '${OPENAI_API_KEY}', voice: 'nova' } } });

    const loaded = loadVoiceConfig({
      workingDirectory: project,
      home,
      env: { OPENAI_API_KEY: 'test-secret' },
    });

    expect(loaded?.config.providers?.openai).toEqual({ api_key: 'test-secret', voice: 'nova' });
  });

  it('should reject a wrongly typed field with its path', () => {
    write(project, { providers: { voicevox: { port: 'high' } } });

    expect(() => loadVoiceConfig({ workingDirectory: project, home, env: {} })).toThrow(
      /providers\.voicevox\.port/
    );
  });

  it('should load an explicit path', () => {
    const explicit = join(tempDir, 'config.json');
    writeFileSync(explicit, JSON.stringify({ default_provider: 'aivisspeech' }), { mode: 0o600 });

    const loaded = loadVoiceConfig({ path: explicit, workingDirectory: project, home, env: {} });

    expect(loaded?.config.default_provider).toBe('aivisspeech');
  });

  it('should fail when an explicit path does not exist', () => {
    expect(() => loadConfigFromPath(join(tempDir, 'config.json'), {})).not.toThrow();
    expect(() =>
      loadVoiceConfig({ path: join(tempDir, 'config.json'), home, env: {} })
    ).toThrow('config file not found');
  });
});

// ---------------------------------------------------------------------------
// Validation and display
// ---------------------------------------------------------------------------

describe('validateVoiceConfig', () => {
  it('should accept a complete config', () => {
    expect(
      validateVoiceConfig({
        default_provider: 'voicevox',
        providers: { voicevox: { port: 50021, speaker: 3 }, openai: { api_key: 'test-secret' } },
      })
    ).toEqual([]);
  });

  it('should list every problem', () => {
    const problems = validateVoiceConfig({
      providers: {
        openai: {},
        elevenlabs: { api_key: 'test-secret', stability: 1.5 },
        polly: { region: 'mars-1' },
        voicevox: { port: 70000 },
      },
      defaults: { speed: 9 },
    });

    expect(problems).toEqual([
      'providers.openai.api_key is required',
      'providers.elevenlabs.stability must be between 0 and 1 (got 1.5)',
      'providers.polly.region must be one of us-east-1, us-west-2, eu-west-1, ap-northeast-1, ap-southeast-1 (got mars-1)',
      'providers.voicevox.port must be between 1 and 65535 (got 70000)',
      'defaults.speed must be between 0.25 and 4 (got 9)',
    ]);
  });
});

describe('maskSecrets', () => {
  it('should replace API keys with their length', () => {
    const masked = maskSecrets({ providers: { openai: { api_key: 'test-secret', voice: 'nova' } } });

    expect(masked.providers?.openai).toEqual({ api_key: '[set, 11 chars]', voice: 'nova' });
  });

  it('should not modify the input', () => {
    const config = { providers: { openai: { api_key: 'test-secret' } } };
    maskSecrets(config);
    expect(config.providers.openai.api_key).toBe('test-secret');
  });
});

describe('generateExampleConfig', () => {
  it('should produce a valid JSONC document', () => {
    const errors: jsonc.ParseError[] = [];
    const parsed: unknown = jsonc.parse(generateExampleConfig(), errors);

    expect(errors).toEqual([]);
    const result = voiceConfigFileSchema.safeParse(parsed);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.default_provider).toBe('voicevox');
    expect(result.data.providers?.openai?.api_key).toBe('${OPENAI_API_KEY}');
  });
});
