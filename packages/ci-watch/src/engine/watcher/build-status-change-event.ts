import type { StatusChangeEvent, WatchedPR } from '../../types.ts';

export interface StatusChangeDetails {
  title: string;
  currentState: string;
  sha: string;
  timestamp: Date;
}

export function buildStatusChangeEvent(
  pr: WatchedPR,
  details: StatusChangeDetails,
): StatusChangeEvent {
  return {
    owner: pr.owner,
    repo: pr.repo,
    number: pr.number,
    title: details.title,
    previousState: pr.lastKnownState,
    currentState: details.currentState,
    sha: details.sha,
    timestamp: details.timestamp,
  };
}
