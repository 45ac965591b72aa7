import { readFile } from 'node:fs/promises';
import type { WatchedPR } from '../../types.ts';
import { buildResolvedSettings } from '../config/build-resolved-settings.ts';
import { normalizeStateString } from '../ci-state/parse-ci-state.ts';
import { isSamePR } from '../github-client/build-pull-request-url.ts';
import { createWatchStore } from './create-watch-store.ts';
import { type WatchFile, type WatchedPRRecord, watchFileSchema } from './schemas.ts';
import type { WatchState, WatchStore } from './types.ts';

// Timestamp written for "never checked" by earlier versions of the file format.
const ZERO_TIMESTAMP_PREFIX = '0001-01-01T00:00:00';

export interface LoadWatchStoreOptions {
  path: string;
  now?: () => Date;
}

export async function loadWatchStore(options: LoadWatchStoreOptions): Promise<WatchStore> {
  const file = await readWatchFile(options.path);
  return createWatchStore({
    path: options.path,
    initialState: buildWatchState(file),
    now: options.now,
  });
}

export function buildWatchState(file: WatchFile): WatchState {
  const watchedPRs: WatchedPR[] = [];

  for (const record of file.watched_prs ?? []) {
    const pr = toWatchedPR(record);
    if (!watchedPRs.some((existing) => isSamePR(existing, pr))) {
      watchedPRs.push(pr);
    }
  }

  return { settings: buildResolvedSettings(file), watchedPRs };
}

async function readWatchFile(path: string): Promise<WatchFile> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse watch file ${path}: ${detail}`, { cause: error });
  }

  const result = watchFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid watch file ${path}: ${issues}`);
  }

  return result.data;
}

function toWatchedPR(record: WatchedPRRecord): WatchedPR {
  return {
    owner: record.owner,
    repo: record.repo,
    number: record.number,
    lastKnownSHA: record.last_known_sha ?? '',
    lastKnownState: normalizeStateString(record.last_known_state ?? ''),
    lastCheckedAt: normalizeTimestamp(record.last_checked),
    title: record.title ?? '',
  };
}

function normalizeTimestamp(value: string | null | undefined): string | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  return value.startsWith(ZERO_TIMESTAMP_PREFIX) ? null : value;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
