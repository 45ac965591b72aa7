export interface PullRequestHead {
  sha: string;
  title: string;
}

/**
 * Read-only view of a pull request's head and CI status.
 *
 * Both calls reject with `NotFoundError` or `TransportError`. An empty aggregate state is a
 * valid answer (no statuses reported yet) and resolves to `''`.
 */
export interface StatusClient {
  fetchHead: (owner: string, repo: string, number: number) => Promise<PullRequestHead>;
  fetchAggregateStatus: (owner: string, repo: string, sha: string) => Promise<string>;
}
