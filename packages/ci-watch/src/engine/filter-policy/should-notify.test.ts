import { describe, expect, test } from 'vitest';
import { parseCIState } from '../ci-state/parse-ci-state.ts';
import { shouldNotify } from './should-notify.ts';

const STATES = ['pending', 'success', 'failure', 'error'] as const;

function decide(previous: string, current: string, mode: string): boolean {
  return shouldNotify(parseCIState(previous), parseCIState(current), mode);
}

function transitions(): [string, string][] {
  const pairs: [string, string][] = [];
  for (const previous of STATES) {
    for (const current of STATES) {
      if (previous !== current) {
        pairs.push([previous, current]);
      }
    }
  }
  return pairs;
}

// ---------------------------------------------------------------------------
// Baseline and unchanged states
// ---------------------------------------------------------------------------

test('it never notifies on the first observation, whatever the mode', () => {
  for (const mode of ['change', 'fail', 'success']) {
    for (const current of STATES) {
      expect(decide('', current, mode)).toBe(false);
    }
  }
});

test('it never notifies when the state is unchanged', () => {
  for (const state of STATES) {
    expect(decide(state, state, 'change')).toBe(false);
  }
});

test('it compares states after normalization', () => {
  expect(decide('SUCCESS', ' success', 'change')).toBe(false);
});

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

describe('change mode', () => {
  test('it notifies on every transition', () => {
    for (const [previous, current] of transitions()) {
      expect(decide(previous, current, 'change')).toBe(true);
    }
  });

  test('it notifies when the new state is unrecognized', () => {
    expect(decide('pending', 'neutral', 'change')).toBe(true);
  });
});

describe('fail mode', () => {
  test('it notifies only for transitions landing on failure or error', () => {
    for (const [previous, current] of transitions()) {
      expect(decide(previous, current, 'fail')).toBe(current === 'failure' || current === 'error');
    }
  });
});

describe('success mode', () => {
  test('it notifies only for transitions landing on success', () => {
    for (const [previous, current] of transitions()) {
      expect(decide(previous, current, 'success')).toBe(current === 'success');
    }
  });
});

test('it treats an unrecognized mode as change', () => {
  expect(decide('success', 'pending', 'sometimes')).toBe(true);
  expect(decide('pending', 'success', ' FAIL ')).toBe(false);
});
