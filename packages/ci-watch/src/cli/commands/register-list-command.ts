import type { Command } from 'commander';
import { buildWatchListEntries, formatWatchListTable } from '../format-watch-list.ts';
import type { CLIContext, ListCommandOptions } from '../types.ts';

export function registerListCommand(program: Command, context: CLIContext): void {
  const { stdout } = context.deps;

  program
    .command('list')
    .description('List watched pull requests')
    .option('--json', 'output watched pull requests as JSON')
    .action(async (options: ListCommandOptions) => {
      const store = await context.loadStore();
      const prs = store.getWatchedPRs();

      if (options.json === true) {
        stdout(`${JSON.stringify(buildWatchListEntries(prs), null, 2)}\n`);
        return;
      }

      if (prs.length === 0) {
        stdout('No PRs being watched.\n');
        return;
      }

      stdout(formatWatchListTable(prs));
    });
}
