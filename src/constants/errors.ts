/**
 * Error Constants
 *
 * Centralized error codes and messages for the sorting pipeline.
 *
 * @module constants/errors
 */

export const ErrorCode = {
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  SOURCE_NOT_DIRECTORY: 'SOURCE_NOT_DIRECTORY',
  SOURCE_UNREADABLE: 'SOURCE_UNREADABLE',
  DIRECTORY_READ_FAILED: 'DIRECTORY_READ_FAILED',
  COPY_FAILED: 'COPY_FAILED',
  NAME_RESOLUTION_EXHAUSTED: 'NAME_RESOLUTION_EXHAUSTED',
  RUN_CRASHED: 'RUN_CRASHED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.SOURCE_NOT_FOUND]: 'Source folder does not exist',
  [ErrorCode.SOURCE_NOT_DIRECTORY]: 'Source path is not a directory',
  [ErrorCode.SOURCE_UNREADABLE]: 'Source folder cannot be inspected',
  [ErrorCode.DIRECTORY_READ_FAILED]: 'Failed to read directory',
  [ErrorCode.COPY_FAILED]: 'Failed to copy file',
  [ErrorCode.NAME_RESOLUTION_EXHAUSTED]: 'Could not claim a free destination name',
  [ErrorCode.RUN_CRASHED]: 'Critical error while processing files',
};

