#!/usr/bin/env -S npx tsx
/**
 * file-sorter entry point
 *
 * Sorts the files of a source tree into per-extension folders:
 *   file-sorter <source_folder> <output_folder> [--max-concurrent <n>] [--verbose]
 */

import path from 'path';
import { env, usePrettyLogs } from '@/config/environment';
import { createProgram, exitCodeFor, parseCliOptionsOrExit, resolveLogLevel } from '@/cli/program';
import { SortingPipeline } from '@/domains/sorting';
import { createChildLogger, createSorterLogger } from '@/shared/utils/logger';

async function main(): Promise<number> {
  const program = createProgram({
    maxConcurrent: env.SORTER_MAX_CONCURRENT,
    logFile: env.LOG_FILE_PATH,
  });

  const options = parseCliOptionsOrExit(program, process.argv.slice(2));

  const { logger, close } = createSorterLogger({
    level: resolveLogLevel(options.verbose, env.LOG_LEVEL),
    logFilePath: options.logFile,
    pretty: usePrettyLogs,
  });
  const log = createChildLogger(logger, { service: 'cli' });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    log.warn('Interrupt received, finishing in-flight copies');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const sourceRoot = path.resolve(options.sourceFolder);
    const outputRoot = path.resolve(options.outputFolder);

    log.info('Starting file sorter');
    log.info({ sourceRoot }, `Source folder: ${sourceRoot}`);
    log.info({ outputRoot }, `Output folder: ${outputRoot}`);
    log.info({ maxConcurrent: options.maxConcurrent }, `Max concurrent copies: ${options.maxConcurrent}`);

    const pipeline = new SortingPipeline({ logger });
    const result = await pipeline.sort({
      sourceRoot,
      outputRoot,
      maxConcurrent: options.maxConcurrent,
      signal: controller.signal,
    });

    log.info('Done');
    return exitCodeFor(result, options.strict);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Fatal error:', error);
    process.exitCode = 1;
  });
