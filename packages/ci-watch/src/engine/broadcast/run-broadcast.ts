import type { BroadcastSummary, StatusChangeEvent } from '../../types.ts';
import { formatCIState, parseCIState } from '../ci-state/parse-ci-state.ts';
import { describeError } from '../create-logger.ts';
import { formatPRKey } from '../github-client/build-pull-request-url.ts';
import { buildStatusChangeEvent } from '../watcher/build-status-change-event.ts';
import { observePullRequest, refreshTitle } from '../watcher/observe-pull-request.ts';
import { parseBroadcastFilter } from './parse-broadcast-filter.ts';
import { shouldInclude } from './should-include.ts';
import type { BroadcastConfig, BroadcastDelivery } from './types.ts';

/**
 * Fetches the current status of every watched pull request once and reports the
 * ones the filter includes. Observed state is recorded for every pull request that
 * could be fetched; the store is persisted once at the end and a failure to do so
 * is thrown to the caller.
 */
export async function runBroadcast(
  config: BroadcastConfig,
  filterInput: string,
): Promise<BroadcastSummary> {
  const filter = parseBroadcastFilter(filterInput);
  const { store, logger, delivery } = config;
  const now = config.now ?? ((): Date => new Date());
  const summary: BroadcastSummary = {
    included: 0,
    delivered: 0,
    failed: 0,
    errors: 0,
    dryRun: delivery.kind === 'dry-run',
  };

  for (const pr of [...store.getWatchedPRs()]) {
    const observation = await observePullRequest(config.statusClient, pr);
    if (!observation.ok) {
      logger.warn('Failed to fetch pull request', {
        pr: formatPRKey(pr),
        stage: observation.stage,
        error: describeError(observation.error),
      });
      summary.errors += 1;
      continue;
    }

    const title = refreshTitle(store, pr, observation.title);
    const currentState = formatCIState(observation.state);

    if (shouldInclude(filter, parseCIState(pr.lastKnownState), observation.state)) {
      summary.included += 1;
      const event = buildStatusChangeEvent(pr, {
        title,
        currentState,
        sha: observation.sha,
        timestamp: now(),
      });

      if (await deliver(delivery, event, config)) {
        summary.delivered += 1;
      } else {
        summary.failed += 1;
      }
    }

    store.updateObserved(pr, { sha: observation.sha, state: currentState });
  }

  await store.persist();
  return summary;
}

async function deliver(
  delivery: BroadcastDelivery,
  event: StatusChangeEvent,
  config: BroadcastConfig,
): Promise<boolean> {
  if (delivery.kind === 'dry-run') {
    delivery.write(
      `DRY RUN: ${formatPRKey(event)} status=${event.currentState} (prev=${event.previousState})\n`,
    );
    return true;
  }

  try {
    await delivery.notifier.notify(event);
    return true;
  } catch (error) {
    config.logger.warn('Failed to deliver notification', {
      pr: formatPRKey(event),
      error: describeError(error),
    });
    return false;
  }
}
