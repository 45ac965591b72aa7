import { Octokit } from '@octokit/rest';
import { VERSION } from '../../version.ts';
import type {
  GitHubClient,
  GitHubClientConfig,
  PullsGetParams,
  PullsGetResult,
  ReposGetCombinedStatusParams,
  ReposGetCombinedStatusResult,
} from './types.ts';

export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

const DEFAULT_BASE_URL = 'https://api.github.com';

export function createGitHubClient(config: GitHubClientConfig): GitHubClient {
  const timeoutMS = config.requestTimeoutMS ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const octokit = new Octokit({
    auth: config.token,
    baseUrl: config.baseURL ?? DEFAULT_BASE_URL,
    userAgent: config.userAgent ?? `ci-watch/${VERSION}`,
  });

  // Every call gets its own deadline so one unresponsive request cannot stall a cycle.
  function withTimeout<Params extends Record<string, unknown>>(params: Params): Params {
    return { ...params, request: { signal: AbortSignal.timeout(timeoutMS) } };
  }

  return {
    pulls: {
      async get(params: PullsGetParams): Promise<PullsGetResult> {
        const response = await octokit.pulls.get(withTimeout(params));
        return {
          data: { title: response.data.title, head: { sha: response.data.head.sha } },
        };
      },
    },

    repos: {
      async getCombinedStatusForRef(
        params: ReposGetCombinedStatusParams,
      ): Promise<ReposGetCombinedStatusResult> {
        const response = await octokit.repos.getCombinedStatusForRef(withTimeout(params));
        return {
          data: { state: response.data.state ?? '' },
        };
      },
    },
  };
}
