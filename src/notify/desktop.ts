/**
 * Desktop notifications via the platform's own tool:
 *   darwin → osascript, linux → notify-send, win32 → PowerShell toast.
 */

import { runCommand } from '../shared/process.js';
import type { CommandRunner, Urgency } from '../shared/types.js';

export const DEFAULT_TITLE = 'Claude Code';

export interface NotifyOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
}

/**
 * Urgency for a notification message:
 *   permission → critical, idle → low, error → high, otherwise normal.
 */
export function urgencyFor(message: string, notificationType?: string): Urgency {
  const haystack = `${notificationType ?? ''} ${message}`.toLowerCase();
  if (haystack.includes('permission')) return 'critical';
  if (haystack.includes('idle') || haystack.includes('waiting for your input')) return 'low';
  if (haystack.includes('error')) return 'high';
  return 'normal';
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function powerShellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** The command that raises a notification on `platform`, or null if unsupported. */
export function notificationCommand(
  platform: NodeJS.Platform,
  title: string,
  message: string,
  urgency: Urgency
): { command: string; args: string[] } | null {
  switch (platform) {
    case 'darwin':
      return {
        command: 'osascript',
        args: ['-e', `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`],
      };
    case 'linux':
      // notify-send only knows low|normal|critical.
      return {
        command: 'notify-send',
        args: ['-u', urgency === 'high' ? 'critical' : urgency, title, message],
      };
    case 'win32':
      return {
        command: 'powershell',
        args: [
          '-NoProfile',
          '-Command',
          [
            '[Windows.UI.Notifications.ToastNotificationManager, Windows.UI.Notifications, ContentType = WindowsRuntime] | Out-Null',
            '$xml = [Windows.UI.Notifications.ToastNotificationManager]::GetTemplateContent([Windows.UI.Notifications.ToastTemplateType]::ToastText02)',
            `$xml.GetElementsByTagName('text')[0].AppendChild($xml.CreateTextNode(${powerShellString(title)})) | Out-Null`,
            `$xml.GetElementsByTagName('text')[1].AppendChild($xml.CreateTextNode(${powerShellString(message)})) | Out-Null`,
            `[Windows.UI.Notifications.ToastNotificationManager]::CreateToastNotifier(${powerShellString(title)}).Show([Windows.UI.Notifications.ToastNotification]::new($xml))`,
          ].join('; '),
        ],
      };
    default:
      return null;
  }
}

/**
 * Raise a desktop notification.
 * @throws Error when the platform is unsupported or the tool fails
 */
export async function sendNotification(
  title: string,
  message: string,
  urgency: Urgency = 'normal',
  options: NotifyOptions = {}
): Promise<void> {
  const platform = options.platform ?? process.platform;
  const cmd = notificationCommand(platform, title, message, urgency);
  if (!cmd) {
    throw new Error(`desktop notifications are not supported on ${platform}`);
  }
  await (options.runner ?? runCommand)(cmd.command, cmd.args);
}
