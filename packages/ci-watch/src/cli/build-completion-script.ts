import type { Command } from 'commander';
import { match } from 'ts-pattern';

export const COMPLETION_SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;

export type CompletionShell = (typeof COMPLETION_SHELLS)[number];

export interface CompletionCommand {
  name: string;
  description: string;
  // subcommand names followed by long option flags
  words: string[];
}

export interface CompletionTree {
  name: string;
  commands: CompletionCommand[];
}

export function isCompletionShell(value: string): value is CompletionShell {
  return COMPLETION_SHELLS.some((shell) => shell === value);
}

export function buildCompletionTree(program: Command): CompletionTree {
  return {
    name: program.name(),
    commands: program.commands.map((command) => ({
      name: command.name(),
      description: command.description(),
      words: [
        ...command.commands.map((subcommand) => subcommand.name()),
        ...command.options.flatMap((option) => (option.long === undefined ? [] : [option.long])),
      ],
    })),
  };
}

export function buildCompletionScript(shell: CompletionShell, tree: CompletionTree): string {
  return match(shell)
    .with('bash', () => buildBashScript(tree))
    .with('zsh', () => buildZshScript(tree))
    .with('fish', () => buildFishScript(tree))
    .with('powershell', () => buildPowerShellScript(tree))
    .exhaustive();
}

// ---------------------------------------------------------------------------
// Shells
// ---------------------------------------------------------------------------

function buildBashScript(tree: CompletionTree): string {
  const fn = toFunctionName(tree.name);
  const cases = tree.commands
    .filter((command) => command.words.length > 0)
    .map((command) => `      ${command.name}) words="${command.words.join(' ')}" ;;`);

  return lines([
    `# bash completion for ${tree.name}`,
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  local words=""',
    '  if [ "$COMP_CWORD" -eq 1 ]; then',
    `    words="${commandNames(tree).join(' ')}"`,
    '  else',
    '    case "${COMP_WORDS[1]}" in',
    ...cases,
    '    esac',
    '  fi',
    '  COMPREPLY=($(compgen -W "$words" -- "$cur"))',
    '}',
    `complete -F ${fn} ${tree.name}`,
  ]);
}

function buildZshScript(tree: CompletionTree): string {
  const fn = toFunctionName(tree.name);
  const cases = tree.commands
    .filter((command) => command.words.length > 0)
    .map((command) => `      ${command.name}) candidates=(${command.words.join(' ')}) ;;`);

  return lines([
    `#compdef ${tree.name}`,
    `${fn}() {`,
    '  local -a candidates',
    '  if (( CURRENT == 2 )); then',
    `    candidates=(${commandNames(tree).join(' ')})`,
    '  else',
    '    case "${words[2]}" in',
    ...cases,
    '    esac',
    '  fi',
    '  compadd -- $candidates',
    '}',
    `if [ "$funcstack[1]" = "${fn}" ]; then`,
    `  ${fn} "$@"`,
    'else',
    `  compdef ${fn} ${tree.name}`,
    'fi',
  ]);
}

function buildFishScript(tree: CompletionTree): string {
  const entries = tree.commands.flatMap((command) => [
    `complete -c ${tree.name} -n '__fish_use_subcommand' -a '${command.name}' -d '${escapeFishString(command.description)}'`,
    ...command.words.map((word) =>
      word.startsWith('--')
        ? `complete -c ${tree.name} -n '__fish_seen_subcommand_from ${command.name}' -l '${word.slice(2)}'`
        : `complete -c ${tree.name} -n '__fish_seen_subcommand_from ${command.name}' -a '${word}'`,
    ),
  ]);

  return lines([`# fish completion for ${tree.name}`, `complete -c ${tree.name} -f`, ...entries]);
}

function buildPowerShellScript(tree: CompletionTree): string {
  const cases = tree.commands
    .filter((command) => command.words.length > 0)
    .map((command) => `      '${command.name}' { $candidates = @(${quoteAll(command.words)}) }`);

  return lines([
    `# powershell completion for ${tree.name}`,
    `Register-ArgumentCompleter -Native -CommandName '${tree.name}' -ScriptBlock {`,
    '  param($wordToComplete, $commandAst, $cursorPosition)',
    '  $elements = @($commandAst.CommandElements | ForEach-Object { $_.ToString() })',
    '  $candidates = @()',
    "  if ($elements.Count -lt 2 -or ($elements.Count -eq 2 -and $wordToComplete -ne '')) {",
    `    $candidates = @(${quoteAll(commandNames(tree))})`,
    '  } else {',
    '    switch ($elements[1]) {',
    ...cases,
    '    }',
    '  }',
    '  $candidates | Where-Object { $_ -like "$wordToComplete*" } | ForEach-Object {',
    "    [System.Management.Automation.CompletionResult]::new($_, $_, 'ParameterValue', $_)",
    '  }',
    '}',
  ]);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function commandNames(tree: CompletionTree): string[] {
  return tree.commands.map((command) => command.name);
}

function toFunctionName(name: string): string {
  return `_${name.replace(/[^A-Za-z0-9]/g, '_')}`;
}

function escapeFishString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function quoteAll(words: string[]): string {
  return words.map((word) => `'${word}'`).join(', ');
}

function lines(parts: string[]): string {
  return `${parts.join('\n')}\n`;
}
