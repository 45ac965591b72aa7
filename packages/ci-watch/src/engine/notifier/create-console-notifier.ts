import process from 'node:process';
import type { StatusChangeEvent } from '../../types.ts';
import { buildPullRequestURL, formatPRKey } from '../github-client/build-pull-request-url.ts';
import { formatTimestamp } from './format-timestamp.ts';
import type { Notifier, WriteOutput } from './types.ts';

export interface ConsoleNotifierConfig {
  write?: WriteOutput;
}

export function createConsoleNotifier(config?: ConsoleNotifierConfig): Notifier {
  const write = config?.write ?? ((text: string): void => void process.stdout.write(text));

  return {
    name: 'console',

    async notify(event): Promise<void> {
      write(formatConsoleNotification(event));
    },
  };
}

export function formatConsoleNotification(event: StatusChangeEvent): string {
  const lines = ['', '🔔 Status Change Detected!', `   PR: ${formatPRKey(event)}`];
  if (event.title !== '') {
    lines.push(`   Title: ${event.title}`);
  }
  lines.push(
    `   Status: ${event.previousState} → ${event.currentState}`,
    `   Link: ${buildPullRequestURL(event)}`,
    `   Time: ${formatTimestamp(event.timestamp)}`,
    '',
    '',
  );
  return lines.join('\n');
}
