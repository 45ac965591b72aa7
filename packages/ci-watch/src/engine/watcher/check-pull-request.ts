import type { WatchedPR } from '../../types.ts';
import { formatCIState, parseCIState } from '../ci-state/parse-ci-state.ts';
import { describeError } from '../create-logger.ts';
import { shouldNotify } from '../filter-policy/should-notify.ts';
import { formatPRKey } from '../github-client/build-pull-request-url.ts';
import { buildStatusChangeEvent } from './build-status-change-event.ts';
import { observePullRequest, refreshTitle } from './observe-pull-request.ts';
import type { CheckContext, CheckResult } from './types.ts';

/**
 * Runs one check of a watched pull request: fetch head and status, refresh the
 * cached title, notify when the filter policy says so, then record what was seen.
 *
 * A failed fetch leaves the stored state untouched. A failed delivery is logged
 * and does not stop the new state from being recorded.
 */
export async function checkPullRequest(context: CheckContext, pr: WatchedPR): Promise<CheckResult> {
  const { store, logger } = context;
  const observation = await observePullRequest(context.statusClient, pr);

  if (!observation.ok) {
    logger.warn('Failed to check pull request', {
      pr: formatPRKey(pr),
      stage: observation.stage,
      error: describeError(observation.error),
    });
    return { outcome: 'failed' };
  }

  const title = refreshTitle(store, pr, observation.title);
  const currentState = formatCIState(observation.state);
  const notify = shouldNotify(
    parseCIState(pr.lastKnownState),
    observation.state,
    context.notificationFilter,
  );

  if (notify) {
    const event = buildStatusChangeEvent(pr, {
      title,
      currentState,
      sha: observation.sha,
      timestamp: context.now(),
    });

    try {
      await context.notifier.notify(event);
    } catch (error) {
      logger.warn('Failed to deliver notification', {
        pr: formatPRKey(pr),
        error: describeError(error),
      });
    }
  }

  store.updateObserved(pr, { sha: observation.sha, state: currentState });
  logger.debug('Checked pull request', { pr: formatPRKey(pr), state: currentState });

  return { outcome: 'checked', notified: notify };
}
