/**
 * Audio playback through whatever player the platform has.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { commandExists, runCommand } from '../shared/process.js';
import type { CommandRunner } from '../shared/types.js';

export interface PlayerCommand {
  command: string;
  args: string[];
}

export interface PlayOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  /** PATH lookup, injectable for tests */
  exists?: (command: string) => boolean;
}

/** Candidate players for a platform, in preference order. */
export function playerCandidates(platform: NodeJS.Platform, file: string): PlayerCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'afplay', args: [file] }];
    case 'win32':
      return [
        {
          command: 'powershell',
          args: [
            '-NoProfile',
            '-Command',
            `(New-Object Media.SoundPlayer '${file.replace(/'/g, "''")}').PlaySync()`,
          ],
        },
      ];
    default:
      return [
        { command: 'aplay', args: ['-q', file] },
        { command: 'paplay', args: [file] },
        { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', file] },
      ];
  }
}

/** First candidate whose binary is on PATH, or null. */
export function selectPlayer(
  platform: NodeJS.Platform,
  file: string,
  exists: (command: string) => boolean = commandExists
): PlayerCommand | null {
  return playerCandidates(platform, file).find((c) => exists(c.command)) ?? null;
}

/**
 * Write audio to a temp file, play it, and remove the file.
 * @throws Error when no player is available or playback fails
 */
export async function playAudio(
  audio: Buffer,
  extension: string,
  options: PlayOptions = {}
): Promise<void> {
  const dir = mkdtempSync(join(tmpdir(), 'persona-hooks-audio-'));
  const file = join(dir, `speech.${extension}`);
  try {
    writeFileSync(file, audio);
    const player = selectPlayer(options.platform ?? process.platform, file, options.exists);
    if (!player) {
      throw new Error('no audio player found (tried afplay, aplay, paplay, ffplay)');
    }
    await (options.runner ?? runCommand)(player.command, player.args);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
