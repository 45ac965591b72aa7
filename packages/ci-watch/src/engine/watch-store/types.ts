import type { PRKey, WatchSettings, WatchedPR } from '../../types.ts';

export interface WatchState {
  settings: WatchSettings;
  watchedPRs: WatchedPR[]; // insertion order is the check order
}

export interface ObservedStatus {
  sha: string;
  state: string;
}

export interface NewWatchedPR extends PRKey {
  title?: string;
}

export interface WatchStore {
  getWatchedPRs: () => readonly WatchedPR[];
  getSettings: () => WatchSettings;
  add: (pr: NewWatchedPR) => boolean;
  remove: (key: PRKey) => boolean;
  updateObserved: (key: PRKey, observed: ObservedStatus) => void;
  updateTitle: (key: PRKey, title: string) => void;
  updateSettings: (settings: Partial<WatchSettings>) => void;
  persist: () => Promise<void>;
}

export interface WatchStoreConfig {
  path: string;
  initialState: WatchState;
  now?: () => Date;
}
