import { Command } from 'commander';
import { VERSION } from '../version.ts';
import { registerBroadcastCommand } from './commands/register-broadcast-command.ts';
import { registerCompletionCommand } from './commands/register-completion-command.ts';
import { registerConfigCommands } from './commands/register-config-commands.ts';
import { registerListCommand } from './commands/register-list-command.ts';
import { registerRunCommand } from './commands/register-run-command.ts';
import { registerWatchCommands } from './commands/register-watch-commands.ts';
import { CLI_NAME } from './constants.ts';
import { createCLIContext } from './create-cli-context.ts';
import type { CLIDependencies } from './types.ts';

export function createProgram(deps: CLIDependencies): Command {
  const context = createCLIContext(deps);
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Watch GitHub pull requests and get notified when their CI status changes')
    .version(VERSION, '-v, --version')
    .exitOverride()
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });

  registerWatchCommands(program, context);
  registerListCommand(program, context);
  registerRunCommand(program, context);
  registerBroadcastCommand(program, context);
  registerConfigCommands(program, context);

  program
    .command('version')
    .description('Print version information')
    .action(() => {
      deps.stdout(`${CLI_NAME} version ${VERSION}\n`);
    });

  registerCompletionCommand(program, context);

  return program;
}
