/**
 * Sorting Domain Module
 *
 * Usage:
 * ```typescript
 * import { SortingPipeline } from '@/domains/sorting';
 *
 * const pipeline = new SortingPipeline({ logger });
 * const result = await pipeline.sort({ sourceRoot, outputRoot, maxConcurrent: 10 });
 * ```
 *
 * @module domains/sorting
 */

export { classifyExtension, normalizedFileName, splitFileName, type FileNameParts } from './ExtensionClassifier';
export { resolveTargetPath, pathExists, type ExistsPredicate } from './CollisionSafeNamer';
export {
  FileEnumerator,
  type EnumeratorFileSystem,
  type FileEnumeratorDependencies,
} from './FileEnumerator';
export {
  FileCopier,
  nodeCopierFileSystem,
  type CopierFileSystem,
  type FileCopierDependencies,
} from './FileCopier';
export {
  CopyScheduler,
  type CopyFn,
  type CopySchedulerDependencies,
  type ScheduleOptions,
} from './CopyScheduler';
export { summarizeRun, logRunSummary } from './RunReporter';
export { SortingPipeline, type SortingPipelineDependencies } from './SortingPipeline';
