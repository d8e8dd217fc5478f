/**
 * CopyScheduler
 *
 * Runs one copy per file with at most `maxConcurrent` copies in flight.
 *
 * Guarantees:
 * - Exactly one outcome per input file (completion order, not input order)
 * - A failing or throwing copy never aborts its siblings
 * - After `signal` aborts, files that have not started are recorded as cancelled
 *
 * @module domains/sorting/CopyScheduler
 */

import type { Logger } from 'pino';
import { CANCELLED_REASON } from '@/constants/sorter.constants';
import { createSilentLogger } from '@/shared/utils/logger';
import { getErrorMessage } from '@/shared/utils/errors';
import { Semaphore } from '@/shared/utils/semaphore';
import type { CopyOutcome, FileEntry } from '@/types/sorter.types';
import { classifyExtension } from './ExtensionClassifier';

export type CopyFn = (source: FileEntry, outputRoot: string) => Promise<CopyOutcome>;

export interface CopySchedulerDependencies {
  copy: CopyFn;
  logger?: Logger;
}

export interface ScheduleOptions {
  signal?: AbortSignal;
}

export class CopyScheduler {
  private readonly log: Logger;
  private readonly copy: CopyFn;

  constructor(deps: CopySchedulerDependencies) {
    this.copy = deps.copy;
    this.log = deps.logger ?? createSilentLogger();
  }

  /**
   * @throws RangeError when maxConcurrent is not a positive integer
   */
  async run(
    files: readonly FileEntry[],
    outputRoot: string,
    maxConcurrent: number,
    options: ScheduleOptions = {}
  ): Promise<CopyOutcome[]> {
    const semaphore = new Semaphore(maxConcurrent);
    const { signal } = options;
    const outcomes: CopyOutcome[] = [];
    let cancelled = 0;

    this.log.debug({ fileCount: files.length, maxConcurrent }, 'Scheduling copies');

    await Promise.all(
      files.map((file) =>
        semaphore.run(async () => {
          if (signal?.aborted) {
            cancelled++;
            outcomes.push(this.cancelledOutcome(file));
            return;
          }
          outcomes.push(await this.safeCopy(file, outputRoot));
        })
      )
    );

    if (cancelled > 0) {
      this.log.warn({ cancelled }, `Cancelled ${cancelled} copies before they started`);
    }

    return outcomes;
  }

  private async safeCopy(file: FileEntry, outputRoot: string): Promise<CopyOutcome> {
    try {
      return await this.copy(file, outputRoot);
    } catch (error) {
      const reason = getErrorMessage(error);
      this.log.error({ source: file, reason }, `Unexpected fault while copying ${file}: ${reason}`);
      return { status: 'failed', source: file, extension: classifyExtension(file), reason };
    }
  }

  private cancelledOutcome(file: FileEntry): CopyOutcome {
    return { status: 'failed', source: file, extension: classifyExtension(file), reason: CANCELLED_REASON };
  }
}
