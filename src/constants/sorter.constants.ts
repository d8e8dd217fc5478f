/**
 * Sorter Constants
 *
 * Tunables shared by the enumeration, copy and scheduling stages.
 *
 * @module constants/sorter
 */

/** Extension key for files whose base name carries no suffix */
export const NO_EXTENSION_KEY = 'no_extension';

/** Chunk size for streamed copies (8 KiB) */
export const COPY_CHUNK_SIZE = 8 * 1024;

/** Default bound on concurrent copy operations */
export const DEFAULT_MAX_CONCURRENT = 10;

/**
 * Attempts at exclusive destination creation before a copy gives up.
 * Each attempt re-resolves the target name after losing an EEXIST race.
 */
export const MAX_EXCLUSIVE_CREATE_ATTEMPTS = 10;

/** Default append-mode log file */
export const DEFAULT_LOG_FILE = 'file_sorter.log';

/** Reason recorded for files skipped after cancellation */
export const CANCELLED_REASON = 'Cancelled';
