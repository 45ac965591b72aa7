export type {
  BroadcastFilter,
  BroadcastSummary,
  CIState,
  CycleSummary,
  KnownCIState,
  NotificationFilter,
  PRKey,
  StatusChangeEvent,
  WatchSettings,
  WatchedPR,
  WatcherRunResult,
} from './types.ts';

// Watch store
export { createWatchStore } from './engine/watch-store/create-watch-store.ts';
export { loadWatchStore } from './engine/watch-store/load-watch-store.ts';
export type { LoadWatchStoreOptions } from './engine/watch-store/load-watch-store.ts';
export { WatchStorePersistError } from './engine/watch-store/errors.ts';
export type { WatchState, WatchStore, WatchStoreConfig } from './engine/watch-store/types.ts';

// Status checks
export { createStatusClient } from './engine/status-client/create-status-client.ts';
export { NotFoundError, TransportError } from './engine/status-client/errors.ts';
export type { PullRequestHead, StatusClient } from './engine/status-client/types.ts';
export { createGitHubClient } from './engine/github-client/create-github-client.ts';
export type { GitHubClient, GitHubClientConfig } from './engine/github-client/types.ts';
export { formatCIState, parseCIState } from './engine/ci-state/parse-ci-state.ts';
export { shouldNotify } from './engine/filter-policy/should-notify.ts';

// Watcher and broadcast
export { createWatcher } from './engine/watcher/create-watcher.ts';
export type { Watcher, WatcherConfig } from './engine/watcher/types.ts';
export { runBroadcast } from './engine/broadcast/run-broadcast.ts';
export type { BroadcastConfig, BroadcastDelivery } from './engine/broadcast/types.ts';

// Notifiers
export { buildNotifier } from './engine/notifier/build-notifier.ts';
export type { BuildNotifierOptions } from './engine/notifier/build-notifier.ts';
export { createConsoleNotifier } from './engine/notifier/create-console-notifier.ts';
export { createWebhookNotifier } from './engine/notifier/create-webhook-notifier.ts';
export { createNativeNotifier } from './engine/notifier/create-native-notifier.ts';
export { createFanOutNotifier } from './engine/notifier/create-fan-out-notifier.ts';
export { NotificationDeliveryError } from './engine/notifier/errors.ts';
export type { Notifier, WebhookPayload } from './engine/notifier/types.ts';

// Configuration and logging
export { DEFAULT_SETTINGS } from './engine/config/build-resolved-settings.ts';
export { applySetting, unsetSetting } from './engine/config/apply-setting.ts';
export { resolveRuntimeOptions } from './engine/config/resolve-runtime-options.ts';
export { resolveToken } from './engine/config/resolve-token.ts';
export { createLogger } from './engine/create-logger.ts';
export type { LogLevel, Logger } from './engine/create-logger.ts';

// CLI
export { createProgram } from './cli/create-program.ts';
export type { CLIDependencies } from './cli/types.ts';
export { VERSION } from './version.ts';
