// ---------------------------------------------------------------------------
// Watched pull requests
// ---------------------------------------------------------------------------

export interface PRKey {
  owner: string;
  repo: string;
  number: number;
}

export interface WatchedPR extends PRKey {
  lastKnownSHA: string; // empty until the first successful check
  lastKnownState: string; // normalized state; empty means never checked
  lastCheckedAt: string | null; // ISO 8601; null means never checked
  title: string; // cached display title, refreshed on every successful fetch
}

// ---------------------------------------------------------------------------
// CI state
// ---------------------------------------------------------------------------

export type KnownCIState = 'pending' | 'success' | 'failure' | 'error';

export type CIState =
  | { kind: 'unknown' }
  | { kind: 'known'; value: KnownCIState }
  | { kind: 'unrecognized'; raw: string }; // upstream value outside the known set, already normalized

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export type NotificationFilter = 'change' | 'fail' | 'success';

export type BroadcastFilter = 'all' | 'changed' | 'failing';

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface WatchSettings {
  pollIntervalSeconds: number;
  webhookURL: string; // empty disables the webhook sink
  githubToken: string; // empty falls back to GITHUB_TOKEN
  notificationFilter: NotificationFilter;
  nativeNotifications: boolean;
}

// ---------------------------------------------------------------------------
// Notifications
// ---------------------------------------------------------------------------

export interface StatusChangeEvent {
  owner: string;
  repo: string;
  number: number;
  title: string;
  previousState: string;
  currentState: string;
  sha: string;
  timestamp: Date;
}

// ---------------------------------------------------------------------------
// Run results
// ---------------------------------------------------------------------------

export interface CycleSummary {
  checked: number;
  failed: number; // entities whose fetch failed this cycle
  notified: number; // events handed to the notifier, whatever the delivery outcome
  persisted: boolean;
}

export type WatcherRunResult =
  | { outcome: 'idle' } // nothing to watch
  | { outcome: 'cancelled'; cycles: number };

export interface BroadcastSummary {
  included: number;
  delivered: number;
  failed: number; // delivery failures
  errors: number; // fetch failures
  dryRun: boolean;
}
