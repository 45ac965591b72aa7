import { match } from 'ts-pattern';
import type { CIState, KnownCIState } from '../../types.ts';

const KNOWN_CI_STATES: ReadonlySet<string> = new Set<KnownCIState>([
  'pending',
  'success',
  'failure',
  'error',
]);

export function normalizeStateString(raw: string): string {
  return raw.trim().toLowerCase();
}

export function parseCIState(raw: string): CIState {
  const normalized = normalizeStateString(raw);
  if (normalized === '') {
    return { kind: 'unknown' };
  }
  if (isKnownCIState(normalized)) {
    return { kind: 'known', value: normalized };
  }
  return { kind: 'unrecognized', raw: normalized };
}

export function formatCIState(state: CIState): string {
  return match(state)
    .with({ kind: 'unknown' }, () => '')
    .with({ kind: 'known' }, (s) => s.value)
    .with({ kind: 'unrecognized' }, (s) => s.raw)
    .exhaustive();
}

// An unrecognized value compares by its normalized text, so it never equals a known state.
export function isSameCIState(left: CIState, right: CIState): boolean {
  return formatCIState(left) === formatCIState(right);
}

export function isFailingCIState(state: CIState): boolean {
  return state.kind === 'known' && (state.value === 'failure' || state.value === 'error');
}

export function isSuccessfulCIState(state: CIState): boolean {
  return state.kind === 'known' && state.value === 'success';
}

function isKnownCIState(value: string): value is KnownCIState {
  return KNOWN_CI_STATES.has(value);
}
