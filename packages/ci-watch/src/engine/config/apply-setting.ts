import { match } from 'ts-pattern';
import { z } from 'zod';
import type { WatchSettings } from '../../types.ts';
import {
  NOTIFICATION_FILTERS,
  parseNotificationFilter,
} from '../filter-policy/normalize-notification-filter.ts';
import { DEFAULT_SETTINGS, MAX_POLL_INTERVAL_SECONDS } from './build-resolved-settings.ts';

export const SETTING_KEYS = [
  'poll_interval_seconds',
  'webhook_url',
  'github_token',
  'notification_filter',
  'native_notifications',
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

const webhookURLSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value));

export function parseSettingKey(key: string): SettingKey {
  const settingKey = SETTING_KEYS.find((candidate) => candidate === key.trim());
  if (settingKey === undefined) {
    throw new Error(`Unknown config key: '${key}'. Must be one of: ${SETTING_KEYS.join(', ')}`);
  }
  return settingKey;
}

export function applySetting(settings: WatchSettings, key: string, value: string): WatchSettings {
  const trimmed = value.trim();

  return match(parseSettingKey(key))
    .with('poll_interval_seconds', () => ({
      ...settings,
      pollIntervalSeconds: parsePollInterval(trimmed),
    }))
    .with('webhook_url', () => ({ ...settings, webhookURL: parseWebhookURL(trimmed) }))
    .with('github_token', () => ({ ...settings, githubToken: trimmed }))
    .with('notification_filter', () => ({
      ...settings,
      notificationFilter: parseFilterSetting(trimmed),
    }))
    .with('native_notifications', () => ({
      ...settings,
      nativeNotifications: parseBooleanSetting(trimmed),
    }))
    .exhaustive();
}

export function unsetSetting(settings: WatchSettings, key: string): WatchSettings {
  return match(parseSettingKey(key))
    .with('poll_interval_seconds', () => ({
      ...settings,
      pollIntervalSeconds: DEFAULT_SETTINGS.pollIntervalSeconds,
    }))
    .with('webhook_url', () => ({ ...settings, webhookURL: DEFAULT_SETTINGS.webhookURL }))
    .with('github_token', () => ({ ...settings, githubToken: DEFAULT_SETTINGS.githubToken }))
    .with('notification_filter', () => ({
      ...settings,
      notificationFilter: DEFAULT_SETTINGS.notificationFilter,
    }))
    .with('native_notifications', () => ({
      ...settings,
      nativeNotifications: DEFAULT_SETTINGS.nativeNotifications,
    }))
    .exhaustive();
}

function parsePollInterval(value: string): number {
  const seconds = Number(value);
  if (!(/^\d+$/.test(value) && seconds > 0 && seconds <= MAX_POLL_INTERVAL_SECONDS)) {
    throw new Error(
      `Invalid poll_interval_seconds: '${value}'. Must be a positive integer no greater than ${MAX_POLL_INTERVAL_SECONDS}`,
    );
  }
  return seconds;
}

function parseWebhookURL(value: string): string {
  if (value !== '' && !webhookURLSchema.safeParse(value).success) {
    throw new Error(`Invalid webhook_url: '${value}'. Must be an http or https URL`);
  }
  return value;
}

function parseFilterSetting(value: string): WatchSettings['notificationFilter'] {
  const filter = parseNotificationFilter(value);
  if (filter === null) {
    throw new Error(
      `Invalid notification_filter: '${value}'. Must be one of: ${NOTIFICATION_FILTERS.join(', ')}`,
    );
  }
  return filter;
}

function parseBooleanSetting(value: string): boolean {
  return match(value.toLowerCase())
    .with('true', () => true)
    .with('false', () => false)
    .otherwise(() => {
      throw new Error(`Invalid native_notifications: '${value}'. Must be true or false`);
    });
}
