import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export type LogWriter = (entry: LogEntry) => void;

export type LogData = Record<string, unknown>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

interface LoggerConfig {
  logLevel: LogLevel;
  writer?: LogWriter;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(config: LoggerConfig): Logger {
  const threshold = LOG_LEVEL_PRIORITY[config.logLevel];
  const writer = config.writer ?? defaultWriter;

  function log(level: LogLevel, message: string, data?: LogData): void {
    if (LOG_LEVEL_PRIORITY[level] >= threshold) {
      writer(buildEntry(level, message, data));
    }
  }

  return {
    debug(message: string, data?: LogData): void {
      log('debug', message, data);
    },

    info(message: string, data?: LogData): void {
      log('info', message, data);
    },

    warn(message: string, data?: LogData): void {
      log('warn', message, data);
    },

    error(message: string, data?: LogData): void {
      log('error', message, data);
    },
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function buildEntry(level: LogLevel, message: string, data?: LogData): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  };
}

function defaultWriter(entry: LogEntry): void {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
