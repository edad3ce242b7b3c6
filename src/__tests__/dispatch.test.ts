import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { join } from 'path';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { runHook, runNotify, type HookDependencies } from '../hooks/dispatch.js';
import type { HookSpeaker } from '../hooks/speech.js';
import { PersonaStore } from '../persona/store.js';
import { SessionCoordinator } from '../state/manager.js';
import type { Urgency } from '../shared/types.js';

type Notifier = (title: string, message: string, urgency: Urgency) => Promise<void>;

let tempDir: string;
let project: string;
let deps: HookDependencies;
let speak: Mock<HookSpeaker>;
let notify: Mock<Notifier>;
let written: string[];

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'persona-hooks-dispatch-'));
  project = join(tempDir, 'project');
  const home = join(tempDir, 'home');
  mkdirSync(join(project, '.claude'), { recursive: true });
  mkdirSync(join(home, '.claude', 'personas'), { recursive: true });
  writeFileSync(join(home, '.claude', 'personas', 'mentor.md'), '# Persona: mentor\n');
  writeFileSync(
    join(project, '.claude', 'persona.json'),
    JSON.stringify({ name: 'mentor', custom_instructions: 'Be kind.' })
  );

  speak = vi.fn<HookSpeaker>().mockResolvedValue('spoken');
  notify = vi.fn<Notifier>().mockResolvedValue(undefined);
  written = [];
  deps = {
    coordinator: new SessionCoordinator(join(tempDir, 'state')),
    personas: new PersonaStore(join(home, '.claude')),
    speak,
    notify,
    cwd: project,
    home,
    write: (output) => written.push(output),
  };
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function claude(event: string, extra: object = {}): string {
  return JSON.stringify({
    session_id: 's1',
    transcript_path: '/t/session.jsonl',
    cwd: project,
    hook_event_name: event,
    ...extra,
  });
}

// ---------------------------------------------------------------------------
// hook
// ---------------------------------------------------------------------------

describe('runHook', () => {
  it('should initialize once and inject persona context', () => {
    const first = runHook(claude('SessionStart'), deps);
    const second = runHook(claude('UserPromptSubmit', { prompt: 'fix bug' }), deps);

    expect(first.actions).toEqual([
      {
        type: 'session-initialization',
        result: {
          status: 'applied',
          persona: 'mentor',
          config: { name: 'mentor', custom_instructions: 'Be kind.' },
        },
      },
    ]);
    expect(second.actions).toEqual([
      { type: 'session-initialization', result: { status: 'already-initialized' } },
    ]);
    expect(written).toHaveLength(1);
    expect(JSON.parse(written[0] ?? '')).toEqual({
      continue: true,
      hookSpecificOutput: { hookEventName: 'SessionStart', additionalContext: '[persona: mentor]\nBe kind.' },
    });
  });

  it('should ignore events other than session and prompt', () => {
    const result = runHook(claude('Stop'), deps);

    expect(result.actions).toEqual([{ type: 'ignored' }]);
    expect(speak).not.toHaveBeenCalled();
  });

  it('should fall back to legacy initialization on malformed input', () => {
    const result = runHook('{"session_id":"s1","hook_', deps);

    expect(result.event).toBeNull();
    expect(result.errors).toEqual([]);
    expect(result.actions).toEqual([
      {
        type: 'legacy-initialization',
        result: {
          status: 'applied',
          persona: 'mentor',
          config: { name: 'mentor', custom_instructions: 'Be kind.' },
        },
      },
    ]);
  });

  it('should not print context for Cursor sessions', () => {
    const result = runHook(
      JSON.stringify({ conversation_id: 'c1', hook_event_name: 'sessionStart', workspace_roots: [project] }),
      deps
    );

    expect(result.actions[0]?.type).toBe('session-initialization');
    expect(written).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// notify
// ---------------------------------------------------------------------------

describe('runNotify', () => {
  it('should notify and speak for a Codex turn', async () => {
    const payload = JSON.stringify({
      type: 'agent-turn-complete',
      'thread-id': 't1',
      'turn-id': '3',
      cwd: project,
      'last-assistant-message': 'Done.',
    });

    const result = await runNotify(payload, deps);

    expect(notify).toHaveBeenCalledWith('Codex', 'Turn 3 completed', 'normal');
    expect(speak).toHaveBeenCalledWith({
      sessionId: 't1',
      workingDirectory: project,
      platform: 'codex',
      text: 'Done.',
    });
    expect(result.actions).toEqual([
      { type: 'notify', title: 'Codex', urgency: 'normal' },
      { type: 'speak', outcome: 'spoken' },
    ]);
  });

  it('should speak from the transcript on Stop', async () => {
    await runNotify(claude('Stop'), deps);

    expect(speak).toHaveBeenCalledWith({
      sessionId: 's1',
      workingDirectory: project,
      platform: 'claude-code',
      transcriptPath: '/t/session.jsonl',
    });
  });

  it('should ignore SubagentStop and SessionEnd', async () => {
    const stop = await runNotify(claude('SubagentStop'), deps);
    const end = await runNotify(claude('SessionEnd'), deps);

    expect(stop.actions).toEqual([{ type: 'ignored' }]);
    expect(end.actions).toEqual([{ type: 'ignored' }]);
    expect(speak).not.toHaveBeenCalled();
  });

  it('should raise a critical notification for permission prompts', async () => {
    await runNotify(
      claude('Notification', { message: 'Claude needs your permission to use Bash' }),
      deps
    );

    expect(notify).toHaveBeenCalledWith('Claude Code', 'Claude needs your permission to use Bash', 'critical');
    expect(speak).toHaveBeenCalledWith(
      expect.objectContaining({ text: 'Claude needs your permission to use Bash' })
    );
  });

  it('should use the notification title when given', async () => {
    await runNotify(claude('Notification', { message: 'Waiting', title: 'Build' }), deps);

    expect(notify).toHaveBeenCalledWith('Build', 'Waiting', 'normal');
  });

  it('should speak Cursor responses and initialize Cursor sessions', async () => {
    const response = await runNotify(
      JSON.stringify({ conversation_id: 'c1', hook_event_name: 'afterAgentResponse', text: 'All set.' }),
      deps
    );
    const prompt = await runNotify(
      JSON.stringify({
        conversation_id: 'c1',
        hook_event_name: 'beforeSubmitPrompt',
        workspace_roots: [project],
        prompt: 'next',
      }),
      deps
    );

    expect(response.actions).toEqual([{ type: 'speak', outcome: 'spoken' }]);
    expect(speak).toHaveBeenCalledWith({
      sessionId: 'c1',
      workingDirectory: project,
      platform: 'cursor',
      text: 'All set.',
    });
    expect(prompt.actions[0]?.type).toBe('session-initialization');
  });

  it('should record collaborator failures without throwing', async () => {
    notify.mockRejectedValue(new Error('notify-send: not found'));
    speak.mockRejectedValue(new Error('voicevox: engine is not running'));

    const result = await runNotify(claude('Notification', { message: 'Idle' }), deps);

    expect(result.errors).toEqual([
      'notification failed: notify-send: not found',
      'speech failed: voicevox: engine is not running',
    ]);
    expect(result.actions).toEqual([]);
  });

  it('should skip speech when voice is switched off', async () => {
    const result = await runNotify(claude('Notification', { message: 'Build finished' }), { ...deps, voice: false });

    expect(speak).not.toHaveBeenCalled();
    expect(notify).toHaveBeenCalledWith('Claude Code', 'Build finished', 'normal');
    expect(result.actions).toEqual([{ type: 'notify', title: 'Claude Code', urgency: 'normal' }]);
  });

  it('should skip the desktop notification when desktop is switched off', async () => {
    const result = await runNotify(
      JSON.stringify({ type: 'agent-turn-complete', 'thread-id': 't1', 'last-assistant-message': 'Done.' }),
      { ...deps, desktop: false }
    );

    expect(notify).not.toHaveBeenCalled();
    expect(result.actions).toEqual([{ type: 'speak', outcome: 'spoken' }]);
  });

  it('should fall back to legacy initialization on unknown payloads', async () => {
    const result = await runNotify('{"foo":"bar"}', deps);

    expect(result.actions[0]?.type).toBe('legacy-initialization');
    expect(notify).not.toHaveBeenCalled();
  });
});
