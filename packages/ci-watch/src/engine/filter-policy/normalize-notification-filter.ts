import type { NotificationFilter } from '../../types.ts';

export const NOTIFICATION_FILTERS: readonly NotificationFilter[] = ['change', 'fail', 'success'];

export const DEFAULT_NOTIFICATION_FILTER: NotificationFilter = 'change';

export function isValidNotificationFilter(value: string): boolean {
  return parseNotificationFilter(value) !== null;
}

export function parseNotificationFilter(value: string): NotificationFilter | null {
  const normalized = value.trim().toLowerCase();
  return NOTIFICATION_FILTERS.find((filter) => filter === normalized) ?? null;
}

export function normalizeNotificationFilter(value: string): NotificationFilter {
  return parseNotificationFilter(value) ?? DEFAULT_NOTIFICATION_FILTER;
}
