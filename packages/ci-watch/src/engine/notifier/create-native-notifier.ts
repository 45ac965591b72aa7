import { execFile } from 'node:child_process';
import process from 'node:process';
import { promisify } from 'node:util';
import { match } from 'ts-pattern';
import type { StatusChangeEvent } from '../../types.ts';
import { formatPRKey } from '../github-client/build-pull-request-url.ts';
import { escapeAppleScriptString, escapeXMLString } from './escape-notification-text.ts';
import type { Notifier, RunCommand } from './types.ts';

const execFileAsync = promisify(execFile);

export interface NativeCommand {
  command: string;
  args: string[];
}

export interface NativeNotifierConfig {
  platform?: NodeJS.Platform;
  runCommand?: RunCommand;
}

export function createNativeNotifier(config?: NativeNotifierConfig): Notifier {
  const platform = config?.platform ?? process.platform;
  const runCommand = config?.runCommand ?? defaultRunCommand;

  return {
    name: 'native',

    async notify(event): Promise<void> {
      const nativeCommand = buildNativeCommand(platform, event);
      if (nativeCommand === null) {
        return;
      }

      try {
        await runCommand(nativeCommand.command, nativeCommand.args);
      } catch (error) {
        // Tool not installed
        if (isCommandNotFound(error)) {
          return;
        }
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`${nativeCommand.command} failed: ${detail}`, { cause: error });
      }
    },
  };
}

export function buildNativeCommand(
  platform: NodeJS.Platform,
  event: StatusChangeEvent,
): NativeCommand | null {
  const title = `PR Status Change: ${formatPRKey(event)}`;
  const transition = `${event.previousState} → ${event.currentState}`;
  const message = event.title === '' ? transition : `${event.title}\n${transition}`;

  return match<NodeJS.Platform, NativeCommand | null>(platform)
    .with('darwin', () => ({
      command: 'osascript',
      args: [
        '-e',
        `display notification "${escapeAppleScriptString(message)}" with title "${escapeAppleScriptString(title)}"`,
      ],
    }))
    .with('linux', () => ({ command: 'notify-send', args: [title, message] }))
    .with('win32', () => ({
      command: 'powershell',
      args: ['-NoProfile', '-Command', buildToastScript(title, message)],
    }))
    .otherwise(() => null);
}

function buildToastScript(title: string, message: string): string {
  const xml = [
    '<toast><visual><binding template="ToastText02">',
    `<text id="1">${escapeXMLString(title)}</text>`,
    `<text id="2">${escapeXMLString(message)}</text>`,
    '</binding></visual></toast>',
  ].join('');

  return [
    '$xml = [Windows.Data.Xml.Dom.XmlDocument, Windows.Data.Xml.Dom.XmlDocument, ContentType = WindowsRuntime]::new()',
    `$xml.LoadXml('${xml}')`,
    "[Windows.UI.Notifications.ToastNotificationManager, Windows.UI.Notifications, ContentType = WindowsRuntime]::CreateToastNotifier('ci-watch').Show([Windows.UI.Notifications.ToastNotification]::new($xml))",
  ].join('; ');
}

async function defaultRunCommand(command: string, args: readonly string[]): Promise<void> {
  await execFileAsync(command, args);
}

function isCommandNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
