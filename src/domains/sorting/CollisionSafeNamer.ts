/**
 * CollisionSafeNamer
 *
 * Picks a destination path that is not taken yet by appending an
 * increasing counter: `report.pdf`, `report_1.pdf`, `report_2.pdf`, ...
 *
 * The existence check is injected so the decision itself holds no I/O.
 * Checking and creating are separate steps; callers that need the name to
 * stay free must create the file exclusively and re-resolve on EEXIST.
 *
 * @module domains/sorting/CollisionSafeNamer
 */

import fs from 'fs/promises';
import path from 'path';
import { hasErrorCode } from '@/shared/utils/errors';
import { splitFileName } from './ExtensionClassifier';

export type ExistsPredicate = (candidatePath: string) => Promise<boolean>;

/**
 * Resolve the first free path for `desiredName` inside `targetDir`
 *
 * @example
 * // With report.pdf and report_1.pdf already present
 * await resolveTargetPath('/out/pdf', 'report.pdf', pathExists); // '/out/pdf/report_2.pdf'
 */
export async function resolveTargetPath(
  targetDir: string,
  desiredName: string,
  exists: ExistsPredicate
): Promise<string> {
  let candidate = path.join(targetDir, desiredName);
  if (!(await exists(candidate))) {
    return candidate;
  }

  const { stem, suffix } = splitFileName(desiredName);
  let counter = 1;
  candidate = path.join(targetDir, `${stem}_${counter}${suffix}`);

  while (await exists(candidate)) {
    counter++;
    candidate = path.join(targetDir, `${stem}_${counter}${suffix}`);
  }

  return candidate;
}

/**
 * Filesystem existence check
 *
 * Only ENOENT means "free"; any other failure (EACCES, ENOTDIR, ...) propagates.
 */
export async function pathExists(candidatePath: string): Promise<boolean> {
  try {
    await fs.lstat(candidatePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
