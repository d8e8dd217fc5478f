/**
 * Run logger using Pino
 *
 * Every record goes to two sinks:
 * - an append-mode JSON file that accumulates across runs
 * - the console (pretty single-line in development, JSON otherwise)
 *
 * Lifecycle: `createSorterLogger()` is called once at process start and the
 * resulting logger is injected into every component. `close()` flushes and
 * ends the file sink and must be called once the run finishes.
 *
 * Usage:
 * ```typescript
 * const { logger, close } = createSorterLogger({ level: 'info', logFilePath: 'file_sorter.log' });
 * const enumeratorLogger = createChildLogger(logger, { service: 'FileEnumerator' });
 * enumeratorLogger.info({ count: 3 }, 'Found 3 files');
 * close();
 * ```
 */

import pino from 'pino';
import pretty from 'pino-pretty';
import type { DestinationStream, Level, Logger } from 'pino';

export interface SorterLoggerOptions {
  level: Level;
  /** Append-mode log file; parent directories are created on demand */
  logFilePath: string;
  /** Pretty-print console lines (default: true) */
  pretty?: boolean;
  /** Console sink override (default: stdout) */
  consoleStream?: DestinationStream;
}

export interface SorterLogger {
  logger: Logger;
  /** Flush and release the file sink */
  close: () => void;
}

export function createSorterLogger(options: SorterLoggerOptions): SorterLogger {
  const { level, logFilePath } = options;

  const fileDestination = pino.destination({
    dest: logFilePath,
    append: true,
    mkdir: true,
    sync: true,
  });

  const consoleStream =
    options.consoleStream ??
    (options.pretty === false
      ? pino.destination({ dest: 1, sync: true })
      : pretty({
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          singleLine: true,
          messageFormat: '[{service}] {msg}',
          sync: true,
        }));

  const logger = pino(
    {
      level,
      base: { service: 'file-sorter' },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.multistream([
      { level, stream: fileDestination },
      { level, stream: consoleStream },
    ])
  );

  let closed = false;
  const close = (): void => {
    if (closed) return;
    closed = true;
    fileDestination.flushSync();
    fileDestination.end();
  };

  return { logger, close };
}

/**
 * Create a child logger scoped to one component
 *
 * @example
 * const copierLogger = createChildLogger(logger, { service: 'FileCopier' });
 */
export function createChildLogger(parent: Logger, context: Record<string, unknown>): Logger {
  return parent.child(context);
}

/**
 * Logger that drops everything; default for components built without one
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
