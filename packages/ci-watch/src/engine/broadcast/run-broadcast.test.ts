import { expect, test, vi } from 'vitest';
import { buildWatchedPR } from '../../test-utils/build-watched-pr.ts';
import { createMockLogger } from '../../test-utils/create-mock-logger.ts';
import { createMockNotifier } from '../../test-utils/create-mock-notifier.ts';
import { createMockStatusClient } from '../../test-utils/create-mock-status-client.ts';
import type { WatchedPR } from '../../types.ts';
import { DEFAULT_SETTINGS } from '../config/build-resolved-settings.ts';
import { createWatchStore } from '../watch-store/create-watch-store.ts';
import { WatchStorePersistError } from '../watch-store/errors.ts';
import { runBroadcast } from './run-broadcast.ts';
import type { BroadcastDelivery } from './types.ts';

const NOW = new Date('2026-07-08T09:10:11.000Z');

function setupTest(watchedPRs: WatchedPR[], dryRun = false) {
  const store = createWatchStore({
    path: '/state/config.json',
    initialState: { settings: DEFAULT_SETTINGS, watchedPRs },
    now: () => NOW,
  });
  const persist = vi.spyOn(store, 'persist').mockResolvedValue(undefined);
  const { statusClient, pullRequests } = createMockStatusClient();
  const { notifier, events } = createMockNotifier();
  const { logger, messages } = createMockLogger();
  const write = vi.fn<(text: string) => void>();
  const delivery: BroadcastDelivery = dryRun
    ? { kind: 'dry-run', write }
    : { kind: 'notify', notifier };
  const config = { store, statusClient, logger, delivery, now: () => NOW };

  return { store, persist, statusClient, pullRequests, notifier, events, messages, write, config };
}

test('it delivers only failing pull requests and records all three states', async () => {
  const { store, pullRequests, events, persist, config } = setupTest([
    buildWatchedPR({ number: 1, lastKnownState: 'pending' }),
    buildWatchedPR({ number: 2, lastKnownState: 'pending' }),
    buildWatchedPR({ number: 3, lastKnownState: 'pending' }),
  ]);
  pullRequests.set(1, { sha: 'sha-1', state: 'success' });
  pullRequests.set(2, { sha: 'sha-2', state: 'failure' });
  pullRequests.set(3, { sha: 'sha-3', state: 'error' });

  const summary = await runBroadcast(config, 'failing');

  expect(summary).toStrictEqual({ included: 2, delivered: 2, failed: 0, errors: 0, dryRun: false });
  expect(events.map((event) => event.number)).toStrictEqual([2, 3]);
  expect(store.getWatchedPRs().map((pr) => pr.lastKnownState)).toStrictEqual([
    'success',
    'failure',
    'error',
  ]);
  expect(persist).toHaveBeenCalledTimes(1);
});

test('it includes every pull request under the all filter, first observations included', async () => {
  const { pullRequests, events, config } = setupTest([
    buildWatchedPR({ number: 1 }),
    buildWatchedPR({ number: 2, lastKnownState: 'success' }),
  ]);
  pullRequests.set(1, { sha: 'sha-1', state: 'pending' });
  pullRequests.set(2, { sha: 'sha-2', state: 'success' });

  const summary = await runBroadcast(config, '');

  expect(summary.included).toBe(2);
  expect(events.map((event) => [event.previousState, event.currentState])).toStrictEqual([
    ['', 'pending'],
    ['success', 'success'],
  ]);
});

test('it includes only changed pull requests under the changed filter', async () => {
  const { pullRequests, events, config } = setupTest([
    buildWatchedPR({ number: 1 }),
    buildWatchedPR({ number: 2, lastKnownState: 'success' }),
    buildWatchedPR({ number: 3, lastKnownState: 'pending' }),
  ]);
  pullRequests.set(1, { sha: 'sha-1', state: 'failure' });
  pullRequests.set(2, { sha: 'sha-2', state: 'success' });
  pullRequests.set(3, { sha: 'sha-3', state: 'success' });

  await runBroadcast(config, 'changed');

  expect(events.map((event) => event.number)).toStrictEqual([3]);
});

test('it rejects an invalid filter before fetching anything', async () => {
  const { statusClient, persist, config } = setupTest([buildWatchedPR({ number: 1 })]);

  await expect(runBroadcast(config, 'broken')).rejects.toThrow('Invalid broadcast filter');
  expect(statusClient.fetchHead).not.toHaveBeenCalled();
  expect(persist).not.toHaveBeenCalled();
});

test('it writes a preview line per included pull request in dry-run mode', async () => {
  const { store, pullRequests, notifier, write, config } = setupTest(
    [
      buildWatchedPR({ number: 1, lastKnownState: 'pending' }),
      buildWatchedPR({ number: 2, lastKnownState: 'success' }),
    ],
    true,
  );
  pullRequests.set(1, { sha: 'sha-1', state: 'failure' });
  pullRequests.set(2, { sha: 'sha-2', state: 'success' });

  const summary = await runBroadcast(config, 'all');

  expect(summary).toStrictEqual({ included: 2, delivered: 2, failed: 0, errors: 0, dryRun: true });
  expect(write.mock.calls).toStrictEqual([
    ['DRY RUN: acme/widgets#1 status=failure (prev=pending)\n'],
    ['DRY RUN: acme/widgets#2 status=success (prev=success)\n'],
  ]);
  expect(notifier.notify).not.toHaveBeenCalled();
  expect(store.getWatchedPRs()[0]?.lastKnownState).toBe('failure');
});

test('it counts fetch errors and leaves those pull requests untouched', async () => {
  const failing = buildWatchedPR({ number: 1, lastKnownState: 'pending' });
  const { store, pullRequests, messages, config } = setupTest([
    failing,
    buildWatchedPR({ number: 2 }),
  ]);
  pullRequests.set(1, new Error('Not Found'));
  pullRequests.set(2, { sha: 'sha-2', state: 'success' });

  const summary = await runBroadcast(config, 'all');

  expect(summary).toStrictEqual({ included: 1, delivered: 1, failed: 0, errors: 1, dryRun: false });
  expect(store.getWatchedPRs()[0]).toStrictEqual(failing);
  expect(messages.find((message) => message.level === 'warn')).toStrictEqual({
    level: 'warn',
    message: 'Failed to fetch pull request',
    data: { pr: 'acme/widgets#1', stage: 'fetchHead', error: 'Not Found' },
  });
});

test('it counts delivery failures and still records state', async () => {
  const { store, pullRequests, notifier, config } = setupTest([
    buildWatchedPR({ number: 1, lastKnownState: 'pending' }),
  ]);
  pullRequests.set(1, { sha: 'sha-1', state: 'failure' });
  vi.mocked(notifier.notify).mockRejectedValue(new Error('webhook returned non-2xx status: 502'));

  const summary = await runBroadcast(config, 'all');

  expect(summary).toStrictEqual({ included: 1, delivered: 0, failed: 1, errors: 0, dryRun: false });
  expect(store.getWatchedPRs()[0]?.lastKnownState).toBe('failure');
});

test('it refreshes titles and uses them in the event', async () => {
  const { store, pullRequests, events, config } = setupTest([
    buildWatchedPR({ number: 1, title: 'Old' }),
  ]);
  pullRequests.set(1, { sha: 'sha-1', title: 'New', state: 'success' });

  await runBroadcast(config, 'all');

  expect(store.getWatchedPRs()[0]?.title).toBe('New');
  expect(events[0]?.title).toBe('New');
  expect(events[0]?.timestamp).toStrictEqual(NOW);
});

test('it surfaces a persist failure to the caller', async () => {
  const { persist, pullRequests, config } = setupTest([buildWatchedPR({ number: 1 })]);
  pullRequests.set(1, { sha: 'sha-1', state: 'success' });
  persist.mockRejectedValue(new WatchStorePersistError('/state/config.json', new Error('EROFS')));

  await expect(runBroadcast(config, 'all')).rejects.toThrow(
    'Failed to save watch file /state/config.json: EROFS',
  );
});
