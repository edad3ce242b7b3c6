/**
 * External command helpers used by the audio player and desktop notifier.
 */

import { execFile } from 'child_process';
import { accessSync, constants } from 'fs';
import { delimiter, join } from 'path';
import type { CommandRunner } from './types.js';

/** Run a command to completion; rejects on spawn failure or non-zero exit. */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { windowsHide: true }, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });

/** True when `command` is an executable somewhere on PATH. */
export function commandExists(command: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const dirs = (env.PATH ?? '').split(delimiter).filter((d) => d !== '');
  const exts = process.platform === 'win32' ? ['', '.exe', '.cmd', '.bat'] : [''];
  for (const dir of dirs) {
    for (const ext of exts) {
      try {
        accessSync(join(dir, command + ext), constants.X_OK);
        return true;
      } catch {
        continue;
      }
    }
  }
  return false;
}
