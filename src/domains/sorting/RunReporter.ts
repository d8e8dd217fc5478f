/**
 * RunReporter
 *
 * Aggregates copy outcomes into a RunSummary and logs it.
 *
 * @module domains/sorting/RunReporter
 */

import type { Logger } from 'pino';
import type { CopyFailed, CopyOutcome, FileEntry, RunSummary } from '@/types/sorter.types';
import { classifyExtension } from './ExtensionClassifier';

/**
 * Build the summary of a run. Tolerates outcomes in any completion order.
 */
export function summarizeRun(files: readonly FileEntry[], outcomes: readonly CopyOutcome[]): RunSummary {
  const extensions = new Set(files.map(classifyExtension));
  const failures = outcomes
    .filter((outcome): outcome is CopyFailed => outcome.status === 'failed')
    .map(({ source, reason }) => ({ source, reason }));

  return {
    totalFiles: files.length,
    succeeded: outcomes.length - failures.length,
    failed: failures.length,
    extensions: [...extensions].sort(),
    failures,
  };
}

export function logRunSummary(summary: RunSummary, log: Logger): void {
  log.info(
    { total: summary.totalFiles, succeeded: summary.succeeded, failed: summary.failed },
    `Processing complete. Succeeded: ${summary.succeeded}, failed: ${summary.failed}`
  );
  log.info({ count: summary.extensions.length }, `Extension folders: ${summary.extensions.length}`);
  log.info({ extensions: summary.extensions }, `Extensions: ${summary.extensions.join(', ')}`);
}
