#!/usr/bin/env -S node --import tsx
import { homedir } from 'node:os';
import process from 'node:process';
import { CommanderError } from 'commander';
import { createProgram } from './cli/create-program.ts';
import { describeError } from './engine/create-logger.ts';
import { createGitHubClient } from './engine/github-client/create-github-client.ts';
import { createStatusClient } from './engine/status-client/create-status-client.ts';

const program = createProgram({
  env: process.env,
  homeDir: homedir(),
  platform: process.platform,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  createStatusClient: (config) => createStatusClient(createGitHubClient(config)),
  onShutdownSignal(listener) {
    process.once('SIGINT', listener);
    process.once('SIGTERM', listener);
    return () => {
      process.off('SIGINT', listener);
      process.off('SIGTERM', listener);
    };
  },
});

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // commander has already printed its own message
    process.exitCode = error.exitCode;
  } else {
    process.stderr.write(`error: ${describeError(error)}\n`);
    process.exitCode = 1;
  }
}
