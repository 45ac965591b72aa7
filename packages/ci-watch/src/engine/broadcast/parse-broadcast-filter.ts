import type { BroadcastFilter } from '../../types.ts';

export const BROADCAST_FILTERS: readonly BroadcastFilter[] = ['all', 'changed', 'failing'];

export function parseBroadcastFilter(value: string): BroadcastFilter {
  const normalized = value.trim().toLowerCase();
  if (normalized === '') {
    return 'all';
  }

  const filter = BROADCAST_FILTERS.find((candidate) => candidate === normalized);
  if (filter === undefined) {
    throw new Error(
      `Invalid broadcast filter: '${value}'. Must be one of: ${BROADCAST_FILTERS.join(', ')}`,
    );
  }
  return filter;
}
