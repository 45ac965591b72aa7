import { vol } from 'memfs';
import { expect, test } from 'vitest';
import { loadWatchStore } from './load-watch-store.ts';

const PATH = '/home/tester/.ci-watch/config.json';

function setupTest(document?: unknown): void {
  if (document !== undefined) {
    vol.fromJSON({
      [PATH]: typeof document === 'string' ? document : JSON.stringify(document),
    });
  }
}

test('it returns defaults when the file does not exist', async () => {
  setupTest();

  const store = await loadWatchStore({ path: PATH });

  expect(store.getWatchedPRs()).toStrictEqual([]);
  expect(store.getSettings()).toStrictEqual({
    pollIntervalSeconds: 20,
    webhookURL: '',
    githubToken: '',
    notificationFilter: 'change',
    nativeNotifications: false,
  });
});

test('it reads settings and watched pull requests', async () => {
  setupTest({
    poll_interval_seconds: 30,
    webhook_url: 'https://hooks.example.com/ci',
    github_token: 'test-token',
    notification_filter: 'fail',
    native_notifications: true,
    watched_prs: [
      {
        owner: 'acme',
        repo: 'widgets',
        number: 42,
        last_known_sha: 'abc123',
        last_known_state: 'Pending',
        last_checked: '2026-01-01T00:00:00.000Z',
        title: 'Add widgets',
      },
    ],
  });

  const store = await loadWatchStore({ path: PATH });

  expect(store.getSettings()).toStrictEqual({
    pollIntervalSeconds: 30,
    webhookURL: 'https://hooks.example.com/ci',
    githubToken: 'test-token',
    notificationFilter: 'fail',
    nativeNotifications: true,
  });
  expect(store.getWatchedPRs()).toStrictEqual([
    {
      owner: 'acme',
      repo: 'widgets',
      number: 42,
      lastKnownSHA: 'abc123',
      lastKnownState: 'pending',
      lastCheckedAt: '2026-01-01T00:00:00.000Z',
      title: 'Add widgets',
    },
  ]);
});

test('it reads the zero timestamp and missing fields as never checked', async () => {
  setupTest({
    watched_prs: [
      { owner: 'acme', repo: 'widgets', number: 1, last_checked: '0001-01-01T00:00:00Z' },
      { owner: 'acme', repo: 'widgets', number: 2 },
    ],
  });

  const store = await loadWatchStore({ path: PATH });

  expect(store.getWatchedPRs()).toStrictEqual([
    {
      owner: 'acme',
      repo: 'widgets',
      number: 1,
      lastKnownSHA: '',
      lastKnownState: '',
      lastCheckedAt: null,
      title: '',
    },
    {
      owner: 'acme',
      repo: 'widgets',
      number: 2,
      lastKnownSHA: '',
      lastKnownState: '',
      lastCheckedAt: null,
      title: '',
    },
  ]);
});

test('it treats a zero poll interval as the default', async () => {
  setupTest({ poll_interval_seconds: 0 });

  const store = await loadWatchStore({ path: PATH });

  expect(store.getSettings().pollIntervalSeconds).toBe(20);
});

test('it keeps the first occurrence of a duplicated pull request', async () => {
  setupTest({
    watched_prs: [
      { owner: 'acme', repo: 'widgets', number: 1, title: 'first' },
      { owner: 'acme', repo: 'widgets', number: 2, title: 'other' },
      { owner: 'acme', repo: 'widgets', number: 1, title: 'second' },
    ],
  });

  const store = await loadWatchStore({ path: PATH });

  expect(store.getWatchedPRs().map((pr) => pr.title)).toStrictEqual(['first', 'other']);
});

test('it accepts a null watch list', async () => {
  setupTest({ watched_prs: null });

  const store = await loadWatchStore({ path: PATH });

  expect(store.getWatchedPRs()).toStrictEqual([]);
});

test('it rejects a file that is not valid JSON', async () => {
  setupTest('{not json');

  await expect(loadWatchStore({ path: PATH })).rejects.toThrow(
    `Failed to parse watch file ${PATH}`,
  );
});

test('it rejects a document that fails validation, naming the field', async () => {
  setupTest({ watched_prs: [{ owner: 'acme', repo: 'widgets', number: 'seven' }] });

  await expect(loadWatchStore({ path: PATH })).rejects.toThrow(
    `Invalid watch file ${PATH}: watched_prs.0.number`,
  );
});

test('it rejects a poll interval longer than a timer can wait', async () => {
  setupTest({ poll_interval_seconds: 2_592_000 });

  await expect(loadWatchStore({ path: PATH })).rejects.toThrow(
    `Invalid watch file ${PATH}: poll_interval_seconds`,
  );
});

test('it round-trips through persist', async () => {
  setupTest({
    notification_filter: 'success',
    watched_prs: [{ owner: 'acme', repo: 'widgets', number: 5, last_known_state: 'failure' }],
  });
  const store = await loadWatchStore({
    path: PATH,
    now: () => new Date('2026-03-04T05:06:07.000Z'),
  });
  store.updateObserved({ owner: 'acme', repo: 'widgets', number: 5 }, { sha: 'def', state: 'success' });

  await store.persist();
  const reloaded = await loadWatchStore({ path: PATH });

  expect(reloaded.getSettings().notificationFilter).toBe('success');
  expect(reloaded.getWatchedPRs()).toStrictEqual([
    {
      owner: 'acme',
      repo: 'widgets',
      number: 5,
      lastKnownSHA: 'def',
      lastKnownState: 'success',
      lastCheckedAt: '2026-03-04T05:06:07.000Z',
      title: '',
    },
  ]);
});
