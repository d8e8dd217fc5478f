/**
 * ExtensionClassifier
 *
 * Derives the extension key that names a file's target folder.
 *
 * Naming rules:
 * - The suffix is the text after the last `.` of the base name, lower-cased
 * - A leading `.` alone is not a suffix: `.bashrc` has none
 * - A trailing `.` is not a suffix: `notes.` has none
 * - Names without a suffix map to `no_extension`
 *
 * @module domains/sorting/ExtensionClassifier
 */

import path from 'path';
import { NO_EXTENSION_KEY } from '@/constants/sorter.constants';
import type { ExtensionKey, FileEntry } from '@/types/sorter.types';

export interface FileNameParts {
  /** Base name without its suffix */
  stem: string;
  /** Suffix including the dot, in its original case; '' when absent */
  suffix: string;
}

/**
 * Split a base name into stem and suffix
 *
 * @example
 * splitFileName('archive.tar.gz'); // { stem: 'archive.tar', suffix: '.gz' }
 * splitFileName('.bashrc');        // { stem: '.bashrc', suffix: '' }
 */
export function splitFileName(name: string): FileNameParts {
  const lastDot = name.lastIndexOf('.');

  if (lastDot <= 0 || lastDot === name.length - 1) {
    return { stem: name, suffix: '' };
  }

  return {
    stem: name.slice(0, lastDot),
    suffix: name.slice(lastDot),
  };
}

export function classifyExtension(entry: FileEntry): ExtensionKey {
  const { suffix } = splitFileName(path.basename(entry));
  return suffix ? suffix.slice(1).toLowerCase() : NO_EXTENSION_KEY;
}

/**
 * Destination file name for an entry: the original base name with its
 * suffix normalized to the extension key (`b.TXT` -> `b.txt`)
 */
export function normalizedFileName(entry: FileEntry): string {
  const { stem, suffix } = splitFileName(path.basename(entry));
  return suffix ? `${stem}${suffix.toLowerCase()}` : stem;
}
