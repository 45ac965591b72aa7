import { expect, test } from 'vitest';
import { resolveRuntimeOptions } from './resolve-runtime-options.ts';

test('it defaults the config path under the home directory', () => {
  const options = resolveRuntimeOptions({}, '/home/tester');

  expect(options).toStrictEqual({
    configPath: '/home/tester/.ci-watch/config.json',
    logLevel: 'info',
    apiBaseURL: undefined,
  });
});

test('it reads overrides from the environment', () => {
  const options = resolveRuntimeOptions(
    {
      CI_WATCH_CONFIG: '/tmp/watch.json',
      CI_WATCH_LOG_LEVEL: 'DEBUG',
      GITHUB_API_URL: 'https://github.example.com/api/v3',
    },
    '/home/tester',
  );

  expect(options).toStrictEqual({
    configPath: '/tmp/watch.json',
    logLevel: 'debug',
    apiBaseURL: 'https://github.example.com/api/v3',
  });
});

test('it ignores blank environment values', () => {
  const options = resolveRuntimeOptions(
    { CI_WATCH_CONFIG: '  ', CI_WATCH_LOG_LEVEL: '', GITHUB_API_URL: '' },
    '/home/tester',
  );

  expect(options.configPath).toBe('/home/tester/.ci-watch/config.json');
  expect(options.logLevel).toBe('info');
  expect(options.apiBaseURL).toBeUndefined();
});

test('it throws on an invalid log level', () => {
  expect(() => resolveRuntimeOptions({ CI_WATCH_LOG_LEVEL: 'verbose' }, '/home/tester')).toThrow(
    "Invalid CI_WATCH_LOG_LEVEL: 'verbose'. Must be one of: debug, info, warn, error",
  );
});
