import type { Command } from 'commander';
import { runBroadcast } from '../../engine/broadcast/run-broadcast.ts';
import type { BroadcastDelivery } from '../../engine/broadcast/types.ts';
import { buildNotifier } from '../../engine/notifier/build-notifier.ts';
import type { BroadcastCommandOptions, CLIContext } from '../types.ts';

export function registerBroadcastCommand(program: Command, context: CLIContext): void {
  const { deps } = context;

  program
    .command('broadcast')
    .description('Send the current status of every watched pull request to the console and webhook')
    .option('--filter <filter>', 'statuses to include: all, changed, failing', 'all')
    .option('--webhook <url>', 'override the webhook URL for this broadcast')
    .option('--dry-run', 'print statuses without calling the webhook')
    .action(async (options: BroadcastCommandOptions) => {
      const store = await context.loadStore();
      if (store.getWatchedPRs().length === 0) {
        deps.stdout('No PRs being watched.\n');
        return;
      }

      const statusClient = context.createStatusClient(store.getSettings());
      const dryRun = options.dryRun === true;
      const delivery: BroadcastDelivery = dryRun
        ? { kind: 'dry-run', write: deps.stdout }
        : {
            kind: 'notify',
            notifier: buildNotifier({
              webhookURL: options.webhook || store.getSettings().webhookURL,
              nativeNotifications: false,
              write: deps.stdout,
              fetch: deps.fetch,
            }),
          };

      const summary = await runBroadcast(
        { store, statusClient, logger: context.getLogger(), delivery, now: deps.now },
        options.filter,
      );

      if (summary.dryRun) {
        deps.stdout('Dry-run complete (no webhook calls made).\n');
      } else if (summary.delivered === 0) {
        deps.stdout('No notifications sent (filter may have excluded all PRs).\n');
      }
    });
}
