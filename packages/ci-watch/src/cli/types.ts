import type { Environment, RuntimeOptions } from '../engine/config/types.ts';
import type { LogWriter, Logger } from '../engine/create-logger.ts';
import type { GitHubClientConfig } from '../engine/github-client/types.ts';
import type { FetchFunction, RunCommand, WriteOutput } from '../engine/notifier/types.ts';
import type { StatusClient } from '../engine/status-client/types.ts';
import type { WatchStore } from '../engine/watch-store/types.ts';
import type { WatchSettings } from '../types.ts';

export type ShutdownListener = () => void;

export interface CLIDependencies {
  env: Environment;
  homeDir: string;
  platform: NodeJS.Platform;
  stdout: WriteOutput;
  stderr: WriteOutput;
  createStatusClient: (config: GitHubClientConfig) => StatusClient;
  // Subscribes to SIGINT/SIGTERM; returns the unsubscribe function.
  onShutdownSignal: (listener: ShutdownListener) => () => void;
  fetch?: FetchFunction;
  runCommand?: RunCommand;
  logWriter?: LogWriter;
  now?: () => Date;
}

export interface CLIContext {
  deps: CLIDependencies;
  getRuntimeOptions: () => RuntimeOptions;
  getLogger: () => Logger;
  loadStore: () => Promise<WatchStore>;
  // Throws when no token is configured.
  createStatusClient: (settings: WatchSettings) => StatusClient;
}

export interface ListCommandOptions {
  json?: boolean;
}

export interface RunCommandOptions {
  on?: string;
  native?: boolean;
}

export interface BroadcastCommandOptions {
  filter: string;
  webhook?: string;
  dryRun?: boolean;
}
