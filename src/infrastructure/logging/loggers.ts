import path from 'path';
import pino, { type Logger } from 'pino';
import type { LogLevel } from '../../config.js';
import { FormattedStream, type TextSink } from './LineFormatter.js';
import { RotatingFileStream } from './RotatingFileStream.js';

export interface LoggingOptions {
  appName: string;
  logsDir: string;
  level: LogLevel;
  maxBytes: number;
  backupCount: number;
  /** Mirror the general log to the console */
  console: boolean;
  /** Where the console mirror goes. Defaults to stdout */
  consoleSink?: TextSink;
}

export const LOG_FILES = {
  app: 'app.log',
  error: 'error.log',
  api: 'api.log',
} as const;

/**
 * The three process-wide loggers, owned by whoever created them
 */
export interface Loggers {
  /** General log: app.log plus the console mirror */
  app: Logger;
  /** Errors only, with the call site: error.log */
  error: Logger;
  /** One line per handled request: api.log */
  api: Logger;
  logsDir: string;
  /** Release the log files. Later writes reopen them */
  close(): void;
}

const THIS_FILE = __filename;

/**
 * `file:line` of the first stack frame outside pino and this module
 */
export function captureCallSite(): string | undefined {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 30;
  const stack = new Error().stack ?? '';
  Error.stackTraceLimit = previousLimit;

  for (const frame of stack.split('\n').slice(1)) {
    const match = /\(?([^\s()]+):(\d+):\d+\)?$/.exec(frame.trim());
    if (!match) continue;

    const file = match[1];
    if (
      file === THIS_FILE ||
      file.startsWith('node:') ||
      file.includes(`${path.sep}node_modules${path.sep}`)
    ) {
      continue;
    }
    return `${path.basename(file)}:${match[2]}`;
  }
  return undefined;
}

const streamLevel = (level: LogLevel): pino.Level => (level === 'silent' ? 'fatal' : level);

/**
 * Create the general, error and API loggers writing to rotating files in `logsDir`
 */
export function createLoggers(options: LoggingOptions): Loggers {
  const rotation = { maxBytes: options.maxBytes, backupCount: options.backupCount };
  const appFile = new RotatingFileStream(path.join(options.logsDir, LOG_FILES.app), rotation);
  const errorFile = new RotatingFileStream(path.join(options.logsDir, LOG_FILES.error), rotation);
  const apiFile = new RotatingFileStream(path.join(options.logsDir, LOG_FILES.api), rotation);

  const appStreams: pino.StreamEntry[] = [
    { level: streamLevel(options.level), stream: new FormattedStream(appFile) },
  ];
  if (options.console) {
    appStreams.push({
      level: 'info',
      stream: new FormattedStream(options.consoleSink ?? process.stdout),
    });
  }

  const app = pino({ name: options.appName, level: options.level }, pino.multistream(appStreams));

  const error = pino(
    {
      name: `${options.appName}.error`,
      level: options.level === 'silent' || options.level === 'fatal' ? options.level : 'error',
      mixin: () => ({ caller: captureCallSite() }),
    },
    new FormattedStream(errorFile, { withCaller: true })
  );

  const api = pino({ name: `${options.appName}.api`, level: options.level }, new FormattedStream(apiFile));

  return {
    app,
    error,
    api,
    logsDir: options.logsDir,
    close() {
      appFile.close();
      errorFile.close();
      apiFile.close();
    },
  };
}

/**
 * General logger, or a child of it shown as `<app>.<name>`
 */
export function getLogger(loggers: Loggers, name?: string): Logger {
  return name ? loggers.app.child({ module: name }) : loggers.app;
}

/**
 * Record an error and its stack in the error log
 */
export function logException(loggers: Loggers, error: unknown): void {
  const err = error instanceof Error ? error : new Error(String(error));
  loggers.error.error({ err }, `Exception occurred: ${err.message}`);
}

/**
 * e.g. `GET /api/chat - 200 - 145.50ms`
 */
export function logApiRequest(
  loggers: Loggers,
  method: string,
  endpoint: string,
  statusCode: number,
  responseTimeMs: number
): void {
  loggers.api.info(`${method} ${endpoint} - ${statusCode} - ${responseTimeMs.toFixed(2)}ms`);
}

export function logStartup(loggers: Loggers, appName: string): void {
  const rule = '='.repeat(60);
  loggers.app.info(rule);
  loggers.app.info(`${appName} starting`);
  loggers.app.info(`Timestamp: ${new Date().toISOString()}`);
  loggers.app.info(`Logs directory: ${loggers.logsDir}`);
  loggers.app.info(rule);
}
