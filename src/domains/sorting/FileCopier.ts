/**
 * FileCopier
 *
 * Copies one source file into `<outputRoot>/<extension key>/`.
 *
 * Steps:
 * 1. Classify the source by extension
 * 2. Ensure the extension folder exists (idempotent, safe under races)
 * 3. Resolve a collision-free destination name
 * 4. Stream the bytes in 8 KiB chunks into an exclusively created file
 * 5. On EEXIST (another copy claimed the name first) resolve again
 *
 * Every fault is returned as a failed outcome; nothing is thrown.
 * A destination left half-written by a mid-stream failure is not removed.
 *
 * @module domains/sorting/FileCopier
 */

import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import { ErrorCode, ERROR_MESSAGES } from '@/constants/errors';
import { COPY_CHUNK_SIZE, MAX_EXCLUSIVE_CREATE_ATTEMPTS } from '@/constants/sorter.constants';
import { createSilentLogger } from '@/shared/utils/logger';
import { getErrorMessage, hasErrorCode } from '@/shared/utils/errors';
import type { CopyOutcome, FileEntry } from '@/types/sorter.types';
import { classifyExtension, normalizedFileName } from './ExtensionClassifier';
import { pathExists, resolveTargetPath } from './CollisionSafeNamer';

/**
 * Filesystem subset used by the copier
 */
export interface CopierFileSystem {
  /** Create a directory and its parents; must not fail if it already exists */
  mkdir(dir: string): Promise<void>;
  exists(target: string): Promise<boolean>;
  /** Resolves once the source is open, so unreadable sources fail before any write */
  openRead(source: string): Promise<Readable>;
  /** Must fail with EEXIST when the target already exists */
  openWrite(target: string): Writable;
}

export const nodeCopierFileSystem: CopierFileSystem = {
  mkdir: async (dir) => {
    await fs.mkdir(dir, { recursive: true });
  },
  exists: pathExists,
  openRead: async (source) => {
    const handle = await fs.open(source, 'r');
    return handle.createReadStream({ highWaterMark: COPY_CHUNK_SIZE });
  },
  openWrite: (target) => createWriteStream(target, { flags: 'wx' }),
};

export interface FileCopierDependencies {
  logger?: Logger;
  fileSystem?: CopierFileSystem;
}

export class FileCopier {
  private readonly log: Logger;
  private readonly fileSystem: CopierFileSystem;

  constructor(deps?: FileCopierDependencies) {
    this.log = deps?.logger ?? createSilentLogger();
    this.fileSystem = deps?.fileSystem ?? nodeCopierFileSystem;
  }

  async copy(source: FileEntry, outputRoot: string): Promise<CopyOutcome> {
    const extension = classifyExtension(source);

    try {
      const targetDir = path.join(outputRoot, extension);
      await this.fileSystem.mkdir(targetDir);

      const desiredName = normalizedFileName(source);

      for (let attempt = 1; attempt <= MAX_EXCLUSIVE_CREATE_ATTEMPTS; attempt++) {
        const destination = await resolveTargetPath(targetDir, desiredName, this.fileSystem.exists);

        try {
          await this.stream(source, destination);
        } catch (error) {
          if (hasErrorCode(error, 'EEXIST')) {
            this.log.debug({ source, destination, attempt }, 'Destination claimed concurrently, resolving again');
            continue;
          }
          throw error;
        }

        this.log.debug({ source, destination }, `File copied: ${source} -> ${destination}`);
        return { status: 'succeeded', source, destination, extension };
      }

      return this.fail(source, extension, ERROR_MESSAGES[ErrorCode.NAME_RESOLUTION_EXHAUSTED]);
    } catch (error) {
      return this.fail(source, extension, getErrorMessage(error));
    }
  }

  private async stream(source: string, destination: string): Promise<void> {
    const reader = await this.fileSystem.openRead(source);
    try {
      const writer = this.fileSystem.openWrite(destination);
      await pipeline(reader, writer);
    } finally {
      // Hold the slot until the source handle is really released
      if (!reader.closed) {
        const closed = new Promise<void>((resolve) => reader.once('close', () => resolve()));
        // pipeline never took ownership when the writer failed to open
        if (!reader.destroyed) reader.destroy();
        await closed;
      }
    }
  }

  private fail(source: FileEntry, extension: string, reason: string): CopyOutcome {
    this.log.error(
      { source, code: ErrorCode.COPY_FAILED, reason },
      `${ERROR_MESSAGES[ErrorCode.COPY_FAILED]} ${source}: ${reason}`
    );
    return { status: 'failed', source, extension, reason };
  }
}
