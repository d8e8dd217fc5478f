/**
 * FileEnumerator
 *
 * Recursively lists the regular files under a source root.
 *
 * Traversal rules:
 * - Depth-first, entries sorted by name (stable order across runs)
 * - Directories are recursed; symlinks to directories are not followed
 * - Symlinks to regular files are included under their link path
 * - Dangling symlinks, sockets, FIFOs and devices are skipped
 * - An unreadable directory is logged and skipped; its siblings still load
 *
 * Enumeration never throws: an invalid root yields an empty list.
 *
 * @module domains/sorting/FileEnumerator
 */

import fs from 'fs/promises';
import path from 'path';
import type { Dirent, Stats } from 'fs';
import type { Logger } from 'pino';
import { ErrorCode, ERROR_MESSAGES } from '@/constants/errors';
import { createSilentLogger } from '@/shared/utils/logger';
import { getErrorMessage, hasErrorCode } from '@/shared/utils/errors';
import type { FileEntry, SourceValidationResult } from '@/types/sorter.types';

/**
 * Filesystem subset used by the enumerator
 */
export interface EnumeratorFileSystem {
  /** Follows symlinks */
  stat(target: string): Promise<Stats>;
  readDirectory(dir: string): Promise<Dirent[]>;
}

const nodeFileSystem: EnumeratorFileSystem = {
  stat: (target) => fs.stat(target),
  readDirectory: (dir) => fs.readdir(dir, { withFileTypes: true }),
};

export interface FileEnumeratorDependencies {
  logger?: Logger;
  fileSystem?: EnumeratorFileSystem;
}

export class FileEnumerator {
  private readonly log: Logger;
  private readonly fileSystem: EnumeratorFileSystem;

  constructor(deps?: FileEnumeratorDependencies) {
    this.log = deps?.logger ?? createSilentLogger();
    this.fileSystem = deps?.fileSystem ?? nodeFileSystem;
  }

  /**
   * Check that the root exists and is a directory
   */
  async validateSourceRoot(root: string): Promise<SourceValidationResult> {
    let stats: Stats;
    try {
      stats = await this.fileSystem.stat(root);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        return {
          valid: false,
          code: ErrorCode.SOURCE_NOT_FOUND,
          message: `${ERROR_MESSAGES[ErrorCode.SOURCE_NOT_FOUND]}: ${root}`,
        };
      }
      return {
        valid: false,
        code: ErrorCode.SOURCE_UNREADABLE,
        message: `${ERROR_MESSAGES[ErrorCode.SOURCE_UNREADABLE]}: ${root} (${getErrorMessage(error)})`,
      };
    }

    if (!stats.isDirectory()) {
      return {
        valid: false,
        code: ErrorCode.SOURCE_NOT_DIRECTORY,
        message: `${ERROR_MESSAGES[ErrorCode.SOURCE_NOT_DIRECTORY]}: ${root}`,
      };
    }

    return { valid: true };
  }

  /**
   * List every regular file under `root`
   *
   * @returns Discovered files, or an empty list when the root is invalid
   */
  async enumerate(root: string): Promise<FileEntry[]> {
    const validation = await this.validateSourceRoot(root);
    if (!validation.valid) {
      this.log.error({ root, code: validation.code }, validation.message);
      return [];
    }

    const files: FileEntry[] = [];
    await this.walk(root, files);

    this.log.info({ root, count: files.length }, `Found ${files.length} files in ${root}`);
    return files;
  }

  private async walk(dir: string, files: FileEntry[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await this.fileSystem.readDirectory(dir);
    } catch (error) {
      this.log.error(
        { dir, code: ErrorCode.DIRECTORY_READ_FAILED, error: getErrorMessage(error) },
        `${ERROR_MESSAGES[ErrorCode.DIRECTORY_READ_FAILED]}: ${dir}`
      );
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await this.walk(entryPath, files);
      } else if (entry.isFile() || (entry.isSymbolicLink() && (await this.isLinkToFile(entryPath)))) {
        files.push(entryPath);
        this.log.debug({ file: entryPath }, `Found file: ${entryPath}`);
      }
    }
  }

  private async isLinkToFile(linkPath: string): Promise<boolean> {
    try {
      const stats = await this.fileSystem.stat(linkPath);
      return stats.isFile();
    } catch (error) {
      this.log.debug({ link: linkPath, error: getErrorMessage(error) }, 'Skipping dangling symlink');
      return false;
    }
  }
}
