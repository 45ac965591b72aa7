import type { WatchedPR } from '../../types.ts';
import type { WatchFile, WatchedPRRecord } from './schemas.ts';
import type { WatchState } from './types.ts';

export function serializeWatchState(state: WatchState): WatchFile {
  const { settings } = state;

  return {
    poll_interval_seconds: settings.pollIntervalSeconds,
    webhook_url: settings.webhookURL,
    github_token: settings.githubToken,
    notification_filter: settings.notificationFilter,
    native_notifications: settings.nativeNotifications,
    watched_prs: state.watchedPRs.map(toRecord),
  };
}

function toRecord(pr: WatchedPR): WatchedPRRecord {
  return {
    owner: pr.owner,
    repo: pr.repo,
    number: pr.number,
    last_known_sha: pr.lastKnownSHA,
    last_known_state: pr.lastKnownState,
    last_checked: pr.lastCheckedAt,
    title: pr.title,
  };
}
