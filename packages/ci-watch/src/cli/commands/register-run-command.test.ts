import { expect, test, vi } from 'vitest';
import {
  createMockCLIDependencies,
  readSavedWatchFile,
  seedWatchFile,
} from '../../test-utils/create-mock-cli-dependencies.ts';
import { createProgram } from '../create-program.ts';

function setupTest(env: Record<string, string> = { GITHUB_TOKEN: 'test-token' }) {
  const mocks = createMockCLIDependencies(env);
  const program = createProgram(mocks.deps);
  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });
  return { ...mocks, run };
}

function seedWatchedPR(state: string, extra: Record<string, unknown> = {}): void {
  seedWatchFile({
    ...extra,
    watched_prs: [
      {
        owner: 'acme',
        repo: 'widgets',
        number: 42,
        last_known_sha: 'abc000',
        last_known_state: state,
        title: 'Add widgets',
      },
    ],
  });
}

test('it exits with a hint when nothing is watched', async () => {
  const { run, stdout, unsubscribe } = setupTest();

  await run('run');

  expect(stdout()).toBe(
    [
      'Starting watcher with 20 second poll interval...',
      "No PRs being watched. Add some with 'ci-watch watch <PR_URL>'.",
      '',
    ].join('\n'),
  );
  expect(unsubscribe).toHaveBeenCalledTimes(1);
});

test('it stops after the current cycle when a shutdown signal arrives', async () => {
  const { run, stdout, pullRequests, statusClient, shutdownListeners, unsubscribe } = setupTest();
  seedWatchedPR('success', { poll_interval_seconds: 30 });
  pullRequests.set(42, { sha: 'abc123', title: 'Add widgets', state: 'success' });
  vi.mocked(statusClient.fetchHead).mockImplementationOnce(async () => {
    for (const listener of shutdownListeners) {
      listener();
    }
    return { sha: 'abc123', title: 'Add widgets' };
  });

  await run('run');

  expect(stdout()).toBe(
    ['Starting watcher with 30 second poll interval...', '', 'Watcher stopped.', ''].join('\n'),
  );
  expect(unsubscribe).toHaveBeenCalledTimes(1);
  expect(readSavedWatchFile()).toMatchObject({
    watched_prs: [
      {
        last_known_sha: 'abc123',
        last_known_state: 'success',
        last_checked: '2026-02-03T04:05:06.000Z',
      },
    ],
  });
});

test('it notifies on a status change during the cycle', async () => {
  const { run, stdout, pullRequests, statusClient, shutdownListeners } = setupTest();
  seedWatchedPR('pending');
  pullRequests.set(42, { sha: 'abc123', title: 'Add widgets', state: 'failure' });
  vi.mocked(statusClient.fetchHead).mockImplementationOnce(async () => {
    for (const listener of shutdownListeners) {
      listener();
    }
    return { sha: 'abc123', title: 'Add widgets' };
  });

  await run('run');

  expect(stdout()).toContain('   Status: pending → failure\n');
  expect(stdout().endsWith('\nWatcher stopped.\n')).toBe(true);
});

test('it applies the --on filter for this run without saving it', async () => {
  const { run, stdout, pullRequests, statusClient, shutdownListeners } = setupTest();
  seedWatchedPR('pending');
  pullRequests.set(42, { sha: 'abc123', title: 'Add widgets', state: 'failure' });
  vi.mocked(statusClient.fetchHead).mockImplementationOnce(async () => {
    for (const listener of shutdownListeners) {
      listener();
    }
    return { sha: 'abc123', title: 'Add widgets' };
  });

  await run('run', '--on', 'success');

  expect(stdout()).toBe(
    ['Starting watcher with 20 second poll interval...', '', 'Watcher stopped.', ''].join('\n'),
  );
  expect(readSavedWatchFile()).toMatchObject({ notification_filter: 'change' });
});

test('it rejects an unknown --on value before loading anything', async () => {
  const { run, createStatusClient, unsubscribe } = setupTest();

  await expect(run('run', '--on', 'always')).rejects.toThrow(
    "Invalid --on value: 'always'. Must be one of: change, fail, success",
  );
  expect(createStatusClient).not.toHaveBeenCalled();
  expect(unsubscribe).not.toHaveBeenCalled();
});

test('it fails when no token is configured', async () => {
  const { run } = setupTest({});
  seedWatchedPR('pending');

  await expect(run('run')).rejects.toThrow('missing GITHUB_TOKEN');
});
