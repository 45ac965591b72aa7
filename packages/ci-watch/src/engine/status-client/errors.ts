import type { PRKey } from '../../types.ts';
import { formatPRKey } from '../github-client/build-pull-request-url.ts';

export type StatusClientOperation = 'fetchHead' | 'fetchAggregateStatus';

/**
 * The pull request or commit does not exist, or the token cannot see it.
 */
export class NotFoundError extends Error {
  readonly operation: StatusClientOperation;

  constructor(operation: StatusClientOperation, target: string, cause?: unknown) {
    super(`${target} was not found`, { cause });
    this.name = 'NotFoundError';
    this.operation = operation;
  }
}

/**
 * Any other failure talking to the API: network errors, timeouts, auth and server errors.
 */
export class TransportError extends Error {
  readonly operation: StatusClientOperation;
  readonly status: number | null;

  constructor(operation: StatusClientOperation, target: string, cause: unknown) {
    const status = readStatus(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `Request for ${target} failed${status === null ? '' : ` with status ${status}`}: ${detail}`,
      { cause },
    );
    this.name = 'TransportError';
    this.operation = operation;
    this.status = status;
  }
}

export function describePRTarget(key: PRKey): string {
  return `pull request ${formatPRKey(key)}`;
}

export function describeCommitTarget(owner: string, repo: string, sha: string): string {
  return `status of ${owner}/${repo}@${sha}`;
}

const STATUS_NOT_FOUND = 404;

export function isNotFoundError(error: unknown): boolean {
  return readStatus(error) === STATUS_NOT_FOUND;
}

function readStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : null;
  }
  return null;
}
