import { Argument, type Command } from 'commander';
import {
  COMPLETION_SHELLS,
  buildCompletionScript,
  buildCompletionTree,
  isCompletionShell,
} from '../build-completion-script.ts';
import { CLI_NAME } from '../constants.ts';
import type { CLIContext } from '../types.ts';

export function registerCompletionCommand(program: Command, context: CLIContext): void {
  program
    .command('completion')
    .description('Generate a shell completion script')
    .addArgument(new Argument('<shell>', 'target shell').choices(COMPLETION_SHELLS))
    .addHelpText(
      'after',
      [
        '',
        'To load completions:',
        `  bash:       source <(${CLI_NAME} completion bash)`,
        `  zsh:        ${CLI_NAME} completion zsh > "\${fpath[1]}/_${CLI_NAME}"`,
        `  fish:       ${CLI_NAME} completion fish | source`,
        `  powershell: ${CLI_NAME} completion powershell | Out-String | Invoke-Expression`,
      ].join('\n'),
    )
    .action((shell: string) => {
      if (!isCompletionShell(shell)) {
        throw new Error(`Unsupported shell: '${shell}'`);
      }
      context.deps.stdout(buildCompletionScript(shell, buildCompletionTree(program)));
    });
}
