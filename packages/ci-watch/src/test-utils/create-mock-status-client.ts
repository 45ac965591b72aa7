import { vi } from 'vitest';
import type { PullRequestHead, StatusClient } from '../engine/status-client/types.ts';

export interface MockPullRequest {
  sha: string;
  title?: string;
  state: string;
}

export interface MockStatusClientResult {
  statusClient: StatusClient;
  // keyed by pull request number; a number with no entry rejects
  pullRequests: Map<number, MockPullRequest | Error>;
}

export function createMockStatusClient(): MockStatusClientResult {
  const pullRequests = new Map<number, MockPullRequest | Error>();

  function lookup(number: number): MockPullRequest {
    const entry = pullRequests.get(number);
    if (entry === undefined) {
      throw new Error(`no mock response for pull request ${number}`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }

  const statusClient: StatusClient = {
    fetchHead: vi
      .fn<StatusClient['fetchHead']>()
      .mockImplementation(async (_owner, _repo, number): Promise<PullRequestHead> => {
        const entry = lookup(number);
        return { sha: entry.sha, title: entry.title ?? '' };
      }),
    fetchAggregateStatus: vi
      .fn<StatusClient['fetchAggregateStatus']>()
      .mockImplementation(async (_owner, _repo, sha): Promise<string> => {
        for (const entry of pullRequests.values()) {
          if (!(entry instanceof Error) && entry.sha === sha) {
            return entry.state;
          }
        }
        throw new Error(`no mock status for ${sha}`);
      }),
  };

  return { statusClient, pullRequests };
}
