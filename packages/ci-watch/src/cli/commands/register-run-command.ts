import type { Command } from 'commander';
import {
  NOTIFICATION_FILTERS,
  parseNotificationFilter,
} from '../../engine/filter-policy/normalize-notification-filter.ts';
import { buildNotifier } from '../../engine/notifier/build-notifier.ts';
import { createWatcher } from '../../engine/watcher/create-watcher.ts';
import type { NotificationFilter } from '../../types.ts';
import { CLI_NAME } from '../constants.ts';
import type { CLIContext, RunCommandOptions } from '../types.ts';

export function registerRunCommand(program: Command, context: CLIContext): void {
  const { deps } = context;

  program
    .command('run')
    .description('Start the watcher loop; stop it with Ctrl+C')
    .option('--on <filter>', `notify on: ${NOTIFICATION_FILTERS.join(', ')}`)
    .option('--native', 'also show native desktop notifications')
    .action(async (options: RunCommandOptions) => {
      const notificationFilter = parseFilterOption(options.on);
      const store = await context.loadStore();
      const statusClient = context.createStatusClient(store.getSettings());
      const settings = store.getSettings();

      const watcher = createWatcher({
        store,
        statusClient,
        notifier: buildNotifier({
          webhookURL: settings.webhookURL,
          nativeNotifications: settings.nativeNotifications || options.native === true,
          write: deps.stdout,
          fetch: deps.fetch,
          platform: deps.platform,
          runCommand: deps.runCommand,
        }),
        logger: context.getLogger(),
        notificationFilter,
        now: deps.now,
      });

      const controller = new AbortController();
      const unsubscribe = deps.onShutdownSignal(() => controller.abort());

      try {
        deps.stdout(
          `Starting watcher with ${settings.pollIntervalSeconds} second poll interval...\n`,
        );
        const result = await watcher.run(controller.signal);
        if (result.outcome === 'idle') {
          deps.stdout(`No PRs being watched. Add some with '${CLI_NAME} watch <PR_URL>'.\n`);
        } else {
          deps.stdout('\nWatcher stopped.\n');
        }
      } finally {
        unsubscribe();
      }
    });
}

function parseFilterOption(value: string | undefined): NotificationFilter | undefined {
  if (value === undefined) {
    return undefined;
  }

  const filter = parseNotificationFilter(value);
  if (filter === null) {
    throw new Error(
      `Invalid --on value: '${value}'. Must be one of: ${NOTIFICATION_FILTERS.join(', ')}`,
    );
  }
  return filter;
}
