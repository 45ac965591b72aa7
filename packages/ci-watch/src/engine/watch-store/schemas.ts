import { z } from 'zod';
import { MAX_POLL_INTERVAL_SECONDS } from '../config/build-resolved-settings.ts';

export const watchedPRRecordSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  number: z.number().int().positive(),
  last_known_sha: z.string().optional(),
  last_known_state: z.string().optional(),
  last_checked: z.string().nullable().optional(),
  title: z.string().optional(),
});

export const watchFileSchema = z.object({
  poll_interval_seconds: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_POLL_INTERVAL_SECONDS)
    .optional(),
  webhook_url: z.string().optional(),
  github_token: z.string().optional(),
  notification_filter: z.string().optional(),
  native_notifications: z.boolean().optional(),
  watched_prs: z.array(watchedPRRecordSchema).nullable().optional(),
});

export type WatchedPRRecord = z.infer<typeof watchedPRRecordSchema>;

export type WatchFile = z.infer<typeof watchFileSchema>;
