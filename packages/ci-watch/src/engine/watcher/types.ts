import type { CycleSummary, WatcherRunResult } from '../../types.ts';
import type { Logger } from '../create-logger.ts';
import type { Notifier } from '../notifier/types.ts';
import type { StatusClient } from '../status-client/types.ts';
import type { WatchStore } from '../watch-store/types.ts';

export interface CheckContext {
  store: WatchStore;
  statusClient: StatusClient;
  notifier: Notifier;
  logger: Logger;
  notificationFilter: string;
  now: () => Date;
}

export type CheckResult = { outcome: 'failed' } | { outcome: 'checked'; notified: boolean };

export interface WatcherConfig {
  store: WatchStore;
  statusClient: StatusClient;
  notifier: Notifier;
  logger: Logger;
  notificationFilter?: string; // overrides the stored filter for this watcher only
  now?: () => Date;
}

export interface Watcher {
  run: (signal: AbortSignal) => Promise<WatcherRunResult>;
  runCycle: () => Promise<CycleSummary>;
}
