import { join } from 'node:path';
import { LOG_LEVELS, type LogLevel, isLogLevel } from '../create-logger.ts';
import type { Environment, RuntimeOptions } from './types.ts';

const CONFIG_DIRNAME = '.ci-watch';
const CONFIG_FILENAME = 'config.json';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function resolveRuntimeOptions(env: Environment, homeDir: string): RuntimeOptions {
  return {
    configPath: readEnv(env, 'CI_WATCH_CONFIG') ?? join(homeDir, CONFIG_DIRNAME, CONFIG_FILENAME),
    logLevel: resolveLogLevel(readEnv(env, 'CI_WATCH_LOG_LEVEL')),
    apiBaseURL: readEnv(env, 'GITHUB_API_URL'),
  };
}

function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) {
    return DEFAULT_LOG_LEVEL;
  }

  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(
      `Invalid CI_WATCH_LOG_LEVEL: '${value}'. Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }
  return normalized;
}

function readEnv(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}
