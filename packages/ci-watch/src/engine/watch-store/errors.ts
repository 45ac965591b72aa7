export class WatchStorePersistError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save watch file ${path}: ${detail}`, { cause });
    this.name = 'WatchStorePersistError';
    this.path = path;
  }
}
