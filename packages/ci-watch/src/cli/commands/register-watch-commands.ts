import type { Command } from 'commander';
import { formatPRKey, isSamePR } from '../../engine/github-client/build-pull-request-url.ts';
import { parsePullRequestURL } from '../parse-pull-request-url.ts';
import type { CLIContext } from '../types.ts';

export function registerWatchCommands(program: Command, context: CLIContext): void {
  const { stdout } = context.deps;

  program
    .command('watch <url>')
    .description('Add a pull request to the watch list')
    .action(async (url: string) => {
      const key = parsePullRequestURL(url);
      const store = await context.loadStore();
      const statusClient = context.createStatusClient(store.getSettings());

      if (store.getWatchedPRs().some((pr) => isSamePR(pr, key))) {
        stdout(`PR ${formatPRKey(key)} is already being watched.\n`);
        return;
      }

      const head = await statusClient.fetchHead(key.owner, key.repo, key.number);
      store.add({ ...key, title: head.title });
      await store.persist();

      stdout(`Now watching: ${formatPRKey(key)} - ${head.title}\n`);
    });

  program
    .command('unwatch <url>')
    .description('Remove a pull request from the watch list')
    .action(async (url: string) => {
      const key = parsePullRequestURL(url);
      const store = await context.loadStore();

      if (!store.remove(key)) {
        stdout(`PR ${formatPRKey(key)} is not being watched.\n`);
        return;
      }

      await store.persist();
      stdout(`Stopped watching: ${formatPRKey(key)}\n`);
    });
}
