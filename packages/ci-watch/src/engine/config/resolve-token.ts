import type { WatchSettings } from '../../types.ts';
import type { Environment, ResolvedToken } from './types.ts';

export function resolveToken(settings: WatchSettings, env: Environment): ResolvedToken {
  if (settings.githubToken !== '') {
    return { token: settings.githubToken, source: 'config file' };
  }

  const fromEnv = env.GITHUB_TOKEN?.trim() ?? '';
  if (fromEnv !== '') {
    return { token: fromEnv, source: 'environment variable' };
  }

  return { token: '', source: 'not set' };
}

export function requireToken(settings: WatchSettings, env: Environment, cliName: string): string {
  const { token } = resolveToken(settings, env);
  if (token === '') {
    throw new Error(
      `missing GITHUB_TOKEN; set it as an environment variable or configure it with '${cliName} config set github_token <token>'`,
    );
  }
  return token;
}
