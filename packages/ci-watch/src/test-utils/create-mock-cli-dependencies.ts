import { vol } from 'memfs';
import { type Mock, vi } from 'vitest';
import type { CLIDependencies, ShutdownListener } from '../cli/types.ts';
import type { Environment } from '../engine/config/types.ts';
import type { LogWriter } from '../engine/create-logger.ts';
import type { GitHubClientConfig } from '../engine/github-client/types.ts';
import type { FetchFunction } from '../engine/notifier/types.ts';
import type { StatusClient } from '../engine/status-client/types.ts';
import { type MockStatusClientResult, createMockStatusClient } from './create-mock-status-client.ts';

export const TEST_HOME_DIR = '/home/tester';
export const TEST_CONFIG_PATH = '/home/tester/.ci-watch/config.json';

export interface MockCLIDependenciesResult {
  deps: CLIDependencies;
  stdout: () => string;
  stderr: () => string;
  statusClient: StatusClient;
  pullRequests: MockStatusClientResult['pullRequests'];
  createStatusClient: Mock<(config: GitHubClientConfig) => StatusClient>;
  fetchMock: Mock<FetchFunction>;
  logWriter: Mock<LogWriter>;
  shutdownListeners: ShutdownListener[];
  unsubscribe: Mock<() => void>;
}

export function createMockCLIDependencies(env: Environment = {}): MockCLIDependenciesResult {
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const { statusClient, pullRequests } = createMockStatusClient();
  const createStatusClient = vi
    .fn<(config: GitHubClientConfig) => StatusClient>()
    .mockReturnValue(statusClient);
  const fetchMock = vi.fn<FetchFunction>().mockResolvedValue(new Response(null, { status: 200 }));
  const logWriter = vi.fn<LogWriter>();
  const shutdownListeners: ShutdownListener[] = [];
  const unsubscribe = vi.fn<() => void>();

  const deps: CLIDependencies = {
    env,
    homeDir: TEST_HOME_DIR,
    platform: 'linux',
    stdout: (text) => {
      stdoutChunks.push(text);
    },
    stderr: (text) => {
      stderrChunks.push(text);
    },
    createStatusClient,
    onShutdownSignal: (listener) => {
      shutdownListeners.push(listener);
      return unsubscribe;
    },
    fetch: fetchMock,
    logWriter,
    now: () => new Date('2026-02-03T04:05:06.000Z'),
  };

  return {
    deps,
    stdout: () => stdoutChunks.join(''),
    stderr: () => stderrChunks.join(''),
    statusClient,
    pullRequests,
    createStatusClient,
    fetchMock,
    logWriter,
    shutdownListeners,
    unsubscribe,
  };
}

export function seedWatchFile(file: Record<string, unknown>): void {
  vol.fromJSON({ [TEST_CONFIG_PATH]: JSON.stringify(file) });
}

export function readSavedWatchFile(): unknown {
  const raw = vol.toJSON()[TEST_CONFIG_PATH];
  if (typeof raw !== 'string') {
    throw new Error(`no watch file at ${TEST_CONFIG_PATH}`);
  }
  return JSON.parse(raw);
}
