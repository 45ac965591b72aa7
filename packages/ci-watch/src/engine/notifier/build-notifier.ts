import { createConsoleNotifier } from './create-console-notifier.ts';
import { createFanOutNotifier } from './create-fan-out-notifier.ts';
import { createNativeNotifier } from './create-native-notifier.ts';
import { createWebhookNotifier } from './create-webhook-notifier.ts';
import type { FetchFunction, Notifier, RunCommand, WriteOutput } from './types.ts';

export interface BuildNotifierOptions {
  webhookURL: string;
  nativeNotifications: boolean;
  write?: WriteOutput;
  fetch?: FetchFunction;
  platform?: NodeJS.Platform;
  runCommand?: RunCommand;
}

// Sink order: console, webhook, native.
export function buildNotifier(options: BuildNotifierOptions): Notifier {
  const sinks: Notifier[] = [createConsoleNotifier({ write: options.write })];

  if (options.webhookURL !== '') {
    sinks.push(createWebhookNotifier({ url: options.webhookURL, fetch: options.fetch }));
  }

  if (options.nativeNotifications) {
    sinks.push(
      createNativeNotifier({ platform: options.platform, runCommand: options.runCommand }),
    );
  }

  return createFanOutNotifier(sinks);
}
