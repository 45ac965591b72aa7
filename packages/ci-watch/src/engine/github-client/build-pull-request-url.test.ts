import { expect, test } from 'vitest';
import { buildPullRequestURL, formatPRKey, isSamePR } from './build-pull-request-url.ts';

test('it builds the canonical web address of a pull request', () => {
  expect(buildPullRequestURL({ owner: 'acme', repo: 'widgets', number: 42 })).toBe(
    'https://github.com/acme/widgets/pull/42',
  );
});

test('it formats a pull request key as owner/repo#number', () => {
  expect(formatPRKey({ owner: 'acme', repo: 'widgets', number: 42 })).toBe('acme/widgets#42');
});

test('it compares pull request keys field by field', () => {
  const key = { owner: 'acme', repo: 'widgets', number: 42 };

  expect(isSamePR(key, { ...key })).toBe(true);
  expect(isSamePR(key, { ...key, number: 43 })).toBe(false);
  expect(isSamePR(key, { ...key, repo: 'gadgets' })).toBe(false);
  expect(isSamePR(key, { ...key, owner: 'other' })).toBe(false);
});
