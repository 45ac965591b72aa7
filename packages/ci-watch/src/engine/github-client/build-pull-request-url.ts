import type { PRKey } from '../../types.ts';

export function buildPullRequestURL(key: PRKey): string {
  return `https://github.com/${key.owner}/${key.repo}/pull/${key.number}`;
}

export function formatPRKey(key: PRKey): string {
  return `${key.owner}/${key.repo}#${key.number}`;
}

export function isSamePR(left: PRKey, right: PRKey): boolean {
  return left.owner === right.owner && left.repo === right.repo && left.number === right.number;
}
