import { match } from 'ts-pattern';
import type { BroadcastFilter, CIState } from '../../types.ts';
import { isFailingCIState, isSameCIState } from '../ci-state/parse-ci-state.ts';

export function shouldInclude(filter: BroadcastFilter, previous: CIState, current: CIState): boolean {
  return match(filter)
    .with('all', () => true)
    .with('changed', () => previous.kind !== 'unknown' && !isSameCIState(previous, current))
    .with('failing', () => isFailingCIState(current))
    .exhaustive();
}
