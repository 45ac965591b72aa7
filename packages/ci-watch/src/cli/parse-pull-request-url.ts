import type { PRKey } from '../types.ts';

const PULL_REQUEST_URL_PATTERN = /(?:https?:\/\/)?github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)/;

export function parsePullRequestURL(url: string): PRKey {
  const [, owner, repo, number] = PULL_REQUEST_URL_PATTERN.exec(url.trim()) ?? [];
  if (owner === undefined || repo === undefined || number === undefined) {
    throw new Error(
      `Invalid pull request URL: '${url}'. Expected https://github.com/{owner}/{repo}/pull/{number}`,
    );
  }

  const parsed = Number.parseInt(number, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid pull request number: '${number}'`);
  }

  return { owner, repo, number: parsed };
}
