import type { GitHubClient } from '../github-client/types.ts';
import type { StatusClientOperation } from './errors.ts';
import {
  describeCommitTarget,
  describePRTarget,
  isNotFoundError,
  NotFoundError,
  TransportError,
} from './errors.ts';
import type { PullRequestHead, StatusClient } from './types.ts';

export function createStatusClient(gitHubClient: GitHubClient): StatusClient {
  return {
    async fetchHead(owner: string, repo: string, number: number): Promise<PullRequestHead> {
      const target = describePRTarget({ owner, repo, number });
      try {
        const { data } = await gitHubClient.pulls.get({ owner, repo, pull_number: number });
        return { sha: data.head.sha, title: data.title };
      } catch (error) {
        throw toStatusClientError('fetchHead', target, error);
      }
    },

    async fetchAggregateStatus(owner: string, repo: string, sha: string): Promise<string> {
      const target = describeCommitTarget(owner, repo, sha);
      try {
        const { data } = await gitHubClient.repos.getCombinedStatusForRef({
          owner,
          repo,
          ref: sha,
        });
        return data.state;
      } catch (error) {
        throw toStatusClientError('fetchAggregateStatus', target, error);
      }
    },
  };
}

function toStatusClientError(
  operation: StatusClientOperation,
  target: string,
  error: unknown,
): NotFoundError | TransportError {
  if (isNotFoundError(error)) {
    return new NotFoundError(operation, target, error);
  }
  return new TransportError(operation, target, error);
}
