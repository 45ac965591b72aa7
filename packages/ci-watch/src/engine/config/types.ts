import type { LogLevel } from '../create-logger.ts';

export type Environment = Record<string, string | undefined>;

export interface RuntimeOptions {
  configPath: string;
  logLevel: LogLevel;
  apiBaseURL: string | undefined; // undefined means public GitHub
}

export type TokenSource = 'config file' | 'environment variable' | 'not set';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}
