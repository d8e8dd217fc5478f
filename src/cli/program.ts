/**
 * Command-line surface
 *
 * Builds the commander program and turns parsed arguments into validated
 * options. Process concerns (signals, exit codes) live in the entry point.
 *
 * @module cli/program
 */

import { Command } from 'commander';
import type { Level } from 'pino';
import { cliOptionsSchema, type CliOptions } from '@/schemas/cli.schemas';
import type { SortRunResult } from '@/types/sorter.types';

export interface ProgramDefaults {
  maxConcurrent: number;
  logFile: string;
}

export type CliParseResult =
  | { success: true; options: CliOptions }
  | { success: false; error: string };

export function createProgram(defaults: ProgramDefaults): Command {
  return new Command()
    .name('file-sorter')
    .description('Copy every file of a folder tree into per-extension subfolders')
    .argument('<source_folder>', 'folder whose files are sorted')
    .argument('<output_folder>', 'folder that receives the sorted copies (created if absent)')
    .option('--max-concurrent <n>', 'maximum number of concurrent copy operations', String(defaults.maxConcurrent))
    .option('-v, --verbose', 'log every discovered and copied file', false)
    .option('--log-file <path>', 'append-mode log file', defaults.logFile)
    .option('--strict', 'exit with status 1 when the source is invalid or any copy fails', false)
    .addHelpText(
      'after',
      `
Examples:
  $ file-sorter /source/folder /output/folder
  $ file-sorter ~/Downloads ~/Sorted --max-concurrent 20
  $ file-sorter . ./sorted_files --verbose`
    );
}

/**
 * Parse argv (user arguments only, without `node script`) into options
 */
export function parseCliOptions(program: Command, argv: readonly string[]): CliParseResult {
  program.parse([...argv], { from: 'user' });

  const [sourceFolder, outputFolder] = program.processedArgs;
  const parsed = cliOptionsSchema.safeParse({
    ...program.opts(),
    sourceFolder,
    outputFolder,
  });

  if (!parsed.success) {
    return { success: false, error: parsed.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { success: true, options: parsed.data };
}

/**
 * Parsed options, or a usage error (exit 2) through commander
 */
export function parseCliOptionsOrExit(program: Command, argv: readonly string[]): CliOptions {
  const parsed = parseCliOptions(program, argv);
  if (!parsed.success) {
    return program.error(`error: ${parsed.error}`, { exitCode: 2, code: 'file-sorter.invalidOption' });
  }
  return parsed.options;
}

/**
 * Log level for a run: LOG_LEVEL wins, then --verbose
 */
export function resolveLogLevel(verbose: boolean, override?: Level): Level {
  return override ?? (verbose ? 'debug' : 'info');
}

/**
 * Exit status for a finished run. Best effort (always 0) unless strict.
 */
export function exitCodeFor(result: SortRunResult, strict: boolean): number {
  if (!strict) {
    return 0;
  }
  if (result.status !== 'completed') {
    return 1;
  }
  return result.summary.failed > 0 ? 1 : 0;
}
