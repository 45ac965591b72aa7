import type { Logger } from '../create-logger.ts';
import type { Notifier, WriteOutput } from '../notifier/types.ts';
import type { StatusClient } from '../status-client/types.ts';
import type { WatchStore } from '../watch-store/types.ts';

export type BroadcastDelivery =
  | { kind: 'notify'; notifier: Notifier }
  | { kind: 'dry-run'; write: WriteOutput };

export interface BroadcastConfig {
  store: WatchStore;
  statusClient: StatusClient;
  logger: Logger;
  delivery: BroadcastDelivery;
  now?: () => Date;
}
