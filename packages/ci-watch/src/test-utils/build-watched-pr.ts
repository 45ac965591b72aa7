import type { WatchedPR } from '../types.ts';

export function buildWatchedPR(overrides?: Partial<WatchedPR>): WatchedPR {
  return {
    owner: 'acme',
    repo: 'widgets',
    number: 1,
    lastKnownSHA: '',
    lastKnownState: '',
    lastCheckedAt: null,
    title: '',
    ...overrides,
  };
}
