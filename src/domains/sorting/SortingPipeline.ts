/**
 * SortingPipeline
 *
 * One sorting run: validate source → enumerate → bounded copies → summary.
 *
 * The run never throws. Invalid sources and unexpected faults come back
 * as SortRunResult variants after being logged.
 *
 * @module domains/sorting/SortingPipeline
 */

import fs from 'fs/promises';
import type { Logger } from 'pino';
import { ErrorCode, ERROR_MESSAGES } from '@/constants/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { getErrorMessage } from '@/shared/utils/errors';
import type { SortRunOptions, SortRunResult } from '@/types/sorter.types';
import { FileEnumerator } from './FileEnumerator';
import { FileCopier } from './FileCopier';
import { CopyScheduler } from './CopyScheduler';
import { logRunSummary, summarizeRun } from './RunReporter';

/**
 * Dependencies for SortingPipeline (DI support for testing)
 */
export interface SortingPipelineDependencies {
  logger: Logger;
  enumerator?: FileEnumerator;
  copier?: FileCopier;
  scheduler?: CopyScheduler;
  /** Creates the output root */
  ensureDirectory?: (dir: string) => Promise<void>;
}

export class SortingPipeline {
  private readonly log: Logger;
  private readonly enumerator: FileEnumerator;
  private readonly scheduler: CopyScheduler;
  private readonly ensureDirectory: (dir: string) => Promise<void>;

  constructor(deps: SortingPipelineDependencies) {
    this.log = createChildLogger(deps.logger, { service: 'SortingPipeline' });
    this.enumerator =
      deps.enumerator ??
      new FileEnumerator({ logger: createChildLogger(deps.logger, { service: 'FileEnumerator' }) });

    const copier =
      deps.copier ?? new FileCopier({ logger: createChildLogger(deps.logger, { service: 'FileCopier' }) });
    this.scheduler =
      deps.scheduler ??
      new CopyScheduler({
        copy: (source, outputRoot) => copier.copy(source, outputRoot),
        logger: createChildLogger(deps.logger, { service: 'CopyScheduler' }),
      });

    this.ensureDirectory =
      deps.ensureDirectory ??
      (async (dir) => {
        await fs.mkdir(dir, { recursive: true });
      });
  }

  async sort(options: SortRunOptions): Promise<SortRunResult> {
    const { sourceRoot, outputRoot, maxConcurrent, signal } = options;

    try {
      const validation = await this.enumerator.validateSourceRoot(sourceRoot);
      if (!validation.valid) {
        this.log.error({ sourceRoot, code: validation.code }, validation.message);
        return { status: 'invalid-source', code: validation.code, message: validation.message };
      }

      await this.ensureDirectory(outputRoot);

      const files = await this.enumerator.enumerate(sourceRoot);
      if (files.length === 0) {
        this.log.warn({ sourceRoot }, 'No files found to process');
        return {
          status: 'completed',
          summary: { totalFiles: 0, succeeded: 0, failed: 0, extensions: [], failures: [] },
        };
      }

      const outcomes = await this.scheduler.run(files, outputRoot, maxConcurrent, { signal });
      const summary = summarizeRun(files, outcomes);
      logRunSummary(summary, this.log);

      return { status: 'completed', summary };
    } catch (error) {
      const message = getErrorMessage(error);
      this.log.fatal(
        { sourceRoot, outputRoot, code: ErrorCode.RUN_CRASHED, error: message },
        `${ERROR_MESSAGES[ErrorCode.RUN_CRASHED]}: ${message}`
      );
      return { status: 'crashed', error: message };
    }
  }
}
