import { match } from 'ts-pattern';
import type { CIState } from '../../types.ts';
import { isFailingCIState, isSameCIState, isSuccessfulCIState } from '../ci-state/parse-ci-state.ts';
import { normalizeNotificationFilter } from './normalize-notification-filter.ts';

/**
 * Decides whether a transition between two consecutive observations deserves a notification.
 *
 * The first observation of a pull request only establishes a baseline and never notifies.
 * Unrecognized filter modes behave like `change`.
 */
export function shouldNotify(previous: CIState, current: CIState, mode: string): boolean {
  if (previous.kind === 'unknown') {
    return false;
  }

  if (isSameCIState(previous, current)) {
    return false;
  }

  return match(normalizeNotificationFilter(mode))
    .with('fail', () => isFailingCIState(current))
    .with('success', () => isSuccessfulCIState(current))
    .with('change', () => true)
    .exhaustive();
}
