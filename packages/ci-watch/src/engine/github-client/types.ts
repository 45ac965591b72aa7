// Narrow interface over @octokit/rest's Octokit client. Only the methods and
// response shapes the status client reads are declared here, so mocks satisfy
// this interface without casts.
//
// Param interfaces include `[key: string]: unknown` so they satisfy Octokit's
// `RequestParameters` index signature without casts at the call site.

// ---------------------------------------------------------------------------
// Pulls
// ---------------------------------------------------------------------------

export interface PullsGetParams {
  [key: string]: unknown;
  owner: string;
  repo: string;
  pull_number: number;
}

export interface PullData {
  title: string;
  head: { sha: string };
}

export interface PullsGetResult {
  data: PullData;
}

// ---------------------------------------------------------------------------
// Repos
// ---------------------------------------------------------------------------

export interface ReposGetCombinedStatusParams {
  [key: string]: unknown;
  owner: string;
  repo: string;
  ref: string;
}

export interface CombinedStatusData {
  state: string;
}

export interface ReposGetCombinedStatusResult {
  data: CombinedStatusData;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface GitHubClientConfig {
  token: string;
  baseURL?: string; // GitHub Enterprise API root; defaults to https://api.github.com
  requestTimeoutMS?: number;
  userAgent?: string;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface GitHubClient {
  pulls: {
    get: (params: PullsGetParams) => Promise<PullsGetResult>;
  };
  repos: {
    getCombinedStatusForRef: (
      params: ReposGetCombinedStatusParams,
    ) => Promise<ReposGetCombinedStatusResult>;
  };
}
