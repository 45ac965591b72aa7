import { vi } from 'vitest';
import type { GitHubClient } from '../engine/github-client/types.ts';

export function createMockGitHubClient(): GitHubClient {
  return {
    pulls: {
      get: vi.fn().mockResolvedValue({
        data: { title: '', head: { sha: '' } },
      }),
    },
    repos: {
      getCombinedStatusForRef: vi
        .fn()
        .mockResolvedValue({ data: { state: 'pending' } }),
    },
  };
}
