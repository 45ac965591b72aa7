import type { StatusChangeEvent } from '../types.ts';

export function buildStatusChangeEvent(overrides?: Partial<StatusChangeEvent>): StatusChangeEvent {
  return {
    owner: 'acme',
    repo: 'widgets',
    number: 42,
    title: 'Add widgets',
    previousState: 'pending',
    currentState: 'failure',
    sha: 'abc123',
    timestamp: new Date('2026-01-02T03:04:05.678Z'),
    ...overrides,
  };
}
