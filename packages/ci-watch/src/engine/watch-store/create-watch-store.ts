import { chmod, mkdir, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createStore } from 'zustand/vanilla';
import type { PRKey, WatchSettings, WatchedPR } from '../../types.ts';
import { isSamePR } from '../github-client/build-pull-request-url.ts';
import { WatchStorePersistError } from './errors.ts';
import { serializeWatchState } from './serialize-watch-state.ts';
import type { WatchState, WatchStore, WatchStoreConfig } from './types.ts';

const FILE_MODE = 0o600;
const DIRECTORY_MODE = 0o700;

export function createWatchStore(config: WatchStoreConfig): WatchStore {
  const store = createStore<WatchState>(() => config.initialState);
  const now = config.now ?? ((): Date => new Date());
  const tempPath = `${config.path}.tmp`;

  function updatePR(key: PRKey, update: (pr: WatchedPR) => WatchedPR): void {
    store.setState((state) => ({
      watchedPRs: state.watchedPRs.map((pr) => (isSamePR(pr, key) ? update(pr) : pr)),
    }));
  }

  return {
    getWatchedPRs(): readonly WatchedPR[] {
      return store.getState().watchedPRs;
    },

    getSettings(): WatchSettings {
      return store.getState().settings;
    },

    add(pr): boolean {
      if (store.getState().watchedPRs.some((existing) => isSamePR(existing, pr))) {
        return false;
      }

      const watched: WatchedPR = {
        owner: pr.owner,
        repo: pr.repo,
        number: pr.number,
        lastKnownSHA: '',
        lastKnownState: '',
        lastCheckedAt: null,
        title: pr.title ?? '',
      };
      store.setState((state) => ({ watchedPRs: [...state.watchedPRs, watched] }));
      return true;
    },

    remove(key): boolean {
      const { watchedPRs } = store.getState();
      const remaining = watchedPRs.filter((pr) => !isSamePR(pr, key));
      if (remaining.length === watchedPRs.length) {
        return false;
      }

      store.setState({ watchedPRs: remaining });
      return true;
    },

    updateObserved(key, observed): void {
      const checkedAt = now().toISOString();
      updatePR(key, (pr) => ({
        ...pr,
        lastKnownSHA: observed.sha,
        lastKnownState: observed.state,
        lastCheckedAt: checkedAt,
      }));
    },

    updateTitle(key, title): void {
      updatePR(key, (pr) => ({ ...pr, title }));
    },

    updateSettings(settings): void {
      store.setState((state) => ({ settings: { ...state.settings, ...settings } }));
    },

    async persist(): Promise<void> {
      const json = `${JSON.stringify(serializeWatchState(store.getState()), null, 2)}\n`;

      try {
        await mkdir(dirname(config.path), { recursive: true, mode: DIRECTORY_MODE });
        await writeFile(tempPath, json, { encoding: 'utf-8', mode: FILE_MODE });
        // writeFile only applies the mode when it creates the file
        await chmod(tempPath, FILE_MODE);
        await rename(tempPath, config.path);
      } catch (error) {
        throw new WatchStorePersistError(config.path, error);
      }
    },
  };
}
