import type { WatchSettings } from '../../types.ts';
import { normalizeNotificationFilter } from '../filter-policy/normalize-notification-filter.ts';
import type { WatchFile } from '../watch-store/schemas.ts';

// Longest delay a Node timer can hold (2^31 - 1 ms), in whole seconds.
export const MAX_POLL_INTERVAL_SECONDS = 2_147_483;

export const DEFAULT_SETTINGS: WatchSettings = {
  pollIntervalSeconds: 20,
  webhookURL: '',
  githubToken: '',
  notificationFilter: 'change',
  nativeNotifications: false,
};

export function buildResolvedSettings(file: WatchFile): WatchSettings {
  return {
    // 0 is how older files spelled "unset"
    pollIntervalSeconds: file.poll_interval_seconds || DEFAULT_SETTINGS.pollIntervalSeconds,
    webhookURL: file.webhook_url?.trim() ?? DEFAULT_SETTINGS.webhookURL,
    githubToken: file.github_token?.trim() ?? DEFAULT_SETTINGS.githubToken,
    notificationFilter: normalizeNotificationFilter(
      file.notification_filter ?? DEFAULT_SETTINGS.notificationFilter,
    ),
    nativeNotifications: file.native_notifications ?? DEFAULT_SETTINGS.nativeNotifications,
  };
}
