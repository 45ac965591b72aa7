import { resolveRuntimeOptions } from '../engine/config/resolve-runtime-options.ts';
import { requireToken } from '../engine/config/resolve-token.ts';
import type { RuntimeOptions } from '../engine/config/types.ts';
import { type Logger, createLogger } from '../engine/create-logger.ts';
import type { StatusClient } from '../engine/status-client/types.ts';
import { loadWatchStore } from '../engine/watch-store/load-watch-store.ts';
import type { WatchStore } from '../engine/watch-store/types.ts';
import { CLI_NAME } from './constants.ts';
import type { CLIContext, CLIDependencies } from './types.ts';

export function createCLIContext(deps: CLIDependencies): CLIContext {
  let runtimeOptions: RuntimeOptions | null = null;
  let logger: Logger | null = null;

  function getRuntimeOptions(): RuntimeOptions {
    if (runtimeOptions === null) {
      runtimeOptions = resolveRuntimeOptions(deps.env, deps.homeDir);
    }
    return runtimeOptions;
  }

  function getLogger(): Logger {
    if (logger === null) {
      logger = createLogger({ logLevel: getRuntimeOptions().logLevel, writer: deps.logWriter });
    }
    return logger;
  }

  return {
    deps,
    getRuntimeOptions,
    getLogger,

    loadStore(): Promise<WatchStore> {
      return loadWatchStore({ path: getRuntimeOptions().configPath, now: deps.now });
    },

    createStatusClient(settings): StatusClient {
      const token = requireToken(settings, deps.env, CLI_NAME);
      return deps.createStatusClient({ token, baseURL: getRuntimeOptions().apiBaseURL });
    },
  };
}
