/**
 * Sorter Types
 *
 * Data model of one sorting run: discovered files, per-file copy outcomes
 * and the aggregate summary.
 *
 * @module types/sorter
 */

import type { ErrorCode } from '@/constants/errors';

/** Path of a regular file discovered under the source root */
export type FileEntry = string;

/**
 * Lower-cased file suffix without the leading dot,
 * or `no_extension` for names without one
 */
export type ExtensionKey = string;

export interface CopySucceeded {
  status: 'succeeded';
  source: FileEntry;
  /** Final path written under the output root */
  destination: string;
  extension: ExtensionKey;
}

export interface CopyFailed {
  status: 'failed';
  source: FileEntry;
  extension: ExtensionKey;
  reason: string;
}

export type CopyOutcome = CopySucceeded | CopyFailed;

export interface CopyFailureRecord {
  source: FileEntry;
  reason: string;
}

/**
 * Aggregate of one run. Created fresh per invocation, logged, then discarded.
 */
export interface RunSummary {
  totalFiles: number;
  succeeded: number;
  failed: number;
  /** Distinct extension keys of every enumerated file, sorted */
  extensions: ExtensionKey[];
  failures: CopyFailureRecord[];
}

export type SourceValidationResult =
  | { valid: true }
  | {
      valid: false;
      code: Extract<ErrorCode, 'SOURCE_NOT_FOUND' | 'SOURCE_NOT_DIRECTORY' | 'SOURCE_UNREADABLE'>;
      message: string;
    };

export interface SortRunOptions {
  sourceRoot: string;
  outputRoot: string;
  maxConcurrent: number;
  /** Aborting stops copies that have not started yet */
  signal?: AbortSignal;
}

export type SortRunResult =
  | { status: 'completed'; summary: RunSummary }
  | { status: 'invalid-source'; code: ErrorCode; message: string }
  | { status: 'crashed'; error: string };
