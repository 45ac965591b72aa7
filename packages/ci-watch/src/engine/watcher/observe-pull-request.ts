import type { CIState, WatchedPR } from '../../types.ts';
import { parseCIState } from '../ci-state/parse-ci-state.ts';
import type { StatusClientOperation } from '../status-client/errors.ts';
import type { StatusClient } from '../status-client/types.ts';
import type { WatchStore } from '../watch-store/types.ts';

export type Observation =
  | { ok: true; sha: string; title: string; state: CIState }
  | { ok: false; stage: StatusClientOperation; error: unknown };

export async function observePullRequest(
  statusClient: StatusClient,
  pr: WatchedPR,
): Promise<Observation> {
  let head: Awaited<ReturnType<StatusClient['fetchHead']>>;
  try {
    head = await statusClient.fetchHead(pr.owner, pr.repo, pr.number);
  } catch (error) {
    return { ok: false, stage: 'fetchHead', error };
  }

  let rawState: string;
  try {
    rawState = await statusClient.fetchAggregateStatus(pr.owner, pr.repo, head.sha);
  } catch (error) {
    return { ok: false, stage: 'fetchAggregateStatus', error };
  }

  return { ok: true, sha: head.sha, title: head.title, state: parseCIState(rawState) };
}

/** Caches a non-empty fetched title that differs from the stored one; returns the title to display. */
export function refreshTitle(store: WatchStore, pr: WatchedPR, fetchedTitle: string): string {
  if (fetchedTitle !== '' && fetchedTitle !== pr.title) {
    store.updateTitle(pr, fetchedTitle);
    return fetchedTitle;
  }
  return pr.title;
}
