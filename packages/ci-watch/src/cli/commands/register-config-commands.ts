import type { Command } from 'commander';
import { SETTING_KEYS, applySetting, unsetSetting } from '../../engine/config/apply-setting.ts';
import { resolveToken } from '../../engine/config/resolve-token.ts';
import type { CLIContext } from '../types.ts';

export function registerConfigCommands(program: Command, context: CLIContext): void {
  const { deps } = context;

  const config = program.command('config').description('Manage configuration');

  config
    .command('show')
    .description('Show the current configuration')
    .action(async () => {
      const store = await context.loadStore();
      const settings = store.getSettings();
      const { source } = resolveToken(settings, deps.env);

      deps.stdout(
        [
          `Config file: ${context.getRuntimeOptions().configPath}`,
          '',
          `poll_interval_seconds: ${settings.pollIntervalSeconds}`,
          `webhook_url: ${settings.webhookURL}`,
          `notification_filter: ${settings.notificationFilter}`,
          `native_notifications: ${settings.nativeNotifications}`,
          `github_token: ${source}`,
          '',
          `Watched PRs: ${store.getWatchedPRs().length}`,
          '',
        ].join('\n'),
      );
    });

  config
    .command('set <key> <value>')
    .description(`Set a configuration value (${SETTING_KEYS.join(', ')})`)
    .action(async (key: string, value: string) => {
      const store = await context.loadStore();
      store.updateSettings(applySetting(store.getSettings(), key, value));
      await store.persist();

      const shown = key.trim() === 'github_token' ? '********' : value.trim();
      deps.stdout(`Set ${key.trim()} = ${shown}\n`);
    });

  config
    .command('unset <key>')
    .description('Reset a configuration value to its default')
    .action(async (key: string) => {
      const store = await context.loadStore();
      store.updateSettings(unsetSetting(store.getSettings(), key));
      await store.persist();

      deps.stdout(`Unset ${key.trim()}\n`);
    });
}
