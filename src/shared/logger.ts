/**
 * Logger
 *
 * Everything goes to stderr: hook hosts may parse our stdout.
 * Debug output needs --verbose or PERSONA_HOOKS_DEBUG.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const DEBUG_ENV = 'PERSONA_HOOKS_DEBUG';

function envDebugEnabled(): boolean {
  const value = (process.env[DEBUG_ENV] ?? '').trim().toLowerCase();
  return value !== '' && value !== '0' && value !== 'false';
}

export class Logger {
  private static _verbose = false;

  static setVerbose(v: boolean): void {
    Logger._verbose = v;
  }

  static isVerbose(): boolean {
    return Logger._verbose || envDebugEnabled();
  }

  static debug(...args: unknown[]): void {
    if (Logger.isVerbose()) Logger.write('debug', args);
  }

  static info(...args: unknown[]): void {
    Logger.write('info', args);
  }

  static warn(...args: unknown[]): void {
    Logger.write('warn', args);
  }

  static error(...args: unknown[]): void {
    Logger.write('error', args);
  }

  private static write(level: LogLevel, args: unknown[]): void {
    console.error(`[persona-hooks] ${level}:`, ...args);
  }
}
