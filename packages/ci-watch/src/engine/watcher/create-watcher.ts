import type { CycleSummary, WatcherRunResult } from '../../types.ts';
import { describeError } from '../create-logger.ts';
import { checkPullRequest } from './check-pull-request.ts';
import type { CheckContext, Watcher, WatcherConfig } from './types.ts';

const MILLISECONDS_PER_SECOND = 1000;
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function createWatcher(config: WatcherConfig): Watcher {
  const { store, logger } = config;
  const now = config.now ?? ((): Date => new Date());

  async function runCycle(): Promise<CycleSummary> {
    const context: CheckContext = {
      store,
      statusClient: config.statusClient,
      notifier: config.notifier,
      logger,
      notificationFilter: config.notificationFilter ?? store.getSettings().notificationFilter,
      now,
    };
    const summary: CycleSummary = { checked: 0, failed: 0, notified: 0, persisted: false };

    // Snapshot: entities are checked one at a time in insertion order.
    for (const pr of [...store.getWatchedPRs()]) {
      const result = await checkPullRequest(context, pr);
      if (result.outcome === 'failed') {
        summary.failed += 1;
        continue;
      }
      summary.checked += 1;
      if (result.notified) {
        summary.notified += 1;
      }
    }

    try {
      await store.persist();
      summary.persisted = true;
    } catch (error) {
      logger.warn('Failed to save watch state, continuing with in-memory state', {
        error: describeError(error),
      });
    }

    logger.debug('Cycle complete', { ...summary });
    return summary;
  }

  return {
    runCycle,

    async run(signal: AbortSignal): Promise<WatcherRunResult> {
      if (store.getWatchedPRs().length === 0) {
        logger.info('No pull requests to watch');
        return { outcome: 'idle' };
      }

      logger.info('Watcher started', {
        pullRequests: store.getWatchedPRs().length,
        pollIntervalSeconds: store.getSettings().pollIntervalSeconds,
      });

      let cycles = 0;
      for (;;) {
        const cycleStartedAt = Date.now();
        await runCycle();
        cycles += 1;

        const intervalMS = store.getSettings().pollIntervalSeconds * MILLISECONDS_PER_SECOND;
        const delay = Math.max(0, cycleStartedAt + intervalMS - Date.now());
        const resumed = await waitForNextCycle(delay, signal);
        if (!resumed) {
          logger.info('Watcher stopped', { cycles });
          return { outcome: 'cancelled', cycles };
        }
      }
    },
  };
}

/** Resolves `true` once `delay` elapses, or `false` as soon as the signal aborts. */
export function waitForNextCycle(delay: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    // Node fires longer timers after 1 ms.
    const timer = setTimeout(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      },
      Math.min(delay, MAX_TIMER_DELAY_MS),
    );

    function onAbort(): void {
      clearTimeout(timer);
      resolve(false);
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
