/**
 * CLI Program Unit Tests
 *
 * @module __tests__/unit/cli/program
 */

import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram, exitCodeFor, parseCliOptions, parseCliOptionsOrExit, resolveLogLevel } from '@/cli/program';
import type { SortRunResult } from '@/types/sorter.types';

function testProgram() {
  return createProgram({ maxConcurrent: 10, logFile: 'file_sorter.log' })
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('CLI program', () => {
  describe('parseCliOptions', () => {
    it('applies defaults', () => {
      expect(parseCliOptions(testProgram(), ['/data/in', '/data/out'])).toEqual({
        success: true,
        options: {
          sourceFolder: '/data/in',
          outputFolder: '/data/out',
          maxConcurrent: 10,
          verbose: false,
          logFile: 'file_sorter.log',
          strict: false,
        },
      });
    });

    it('reads every flag', () => {
      const result = parseCliOptions(testProgram(), [
        'in',
        'out',
        '--max-concurrent',
        '20',
        '-v',
        '--log-file',
        'logs/run.log',
        '--strict',
      ]);

      expect(result).toEqual({
        success: true,
        options: {
          sourceFolder: 'in',
          outputFolder: 'out',
          maxConcurrent: 20,
          verbose: true,
          logFile: 'logs/run.log',
          strict: true,
        },
      });
    });

    it.each([
      ['0', '--max-concurrent must be greater than 0'],
      ['1.5', '--max-concurrent must be an integer'],
      ['many', '--max-concurrent must be a number'],
    ])('rejects --max-concurrent %s', (value, message) => {
      expect(parseCliOptions(testProgram(), ['in', 'out', '--max-concurrent', value])).toEqual({
        success: false,
        error: message,
      });
    });

    it('requires both folders', () => {
      expect(() => parseCliOptions(testProgram(), ['in'])).toThrow(
        "error: missing required argument 'output_folder'"
      );
    });
  });

  describe('parseCliOptionsOrExit', () => {
    it('returns the options of a valid command line', () => {
      expect(parseCliOptionsOrExit(testProgram(), ['in', 'out', '--max-concurrent', '3'])).toEqual({
        sourceFolder: 'in',
        outputFolder: 'out',
        maxConcurrent: 3,
        verbose: false,
        logFile: 'file_sorter.log',
        strict: false,
      });
    });

    it('exits 2 with the validation message on an invalid value', () => {
      let thrown: unknown;
      try {
        parseCliOptionsOrExit(testProgram(), ['in', 'out', '--max-concurrent', '0']);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(CommanderError);
      expect(thrown).toMatchObject({
        exitCode: 2,
        code: 'file-sorter.invalidOption',
        message: 'error: --max-concurrent must be greater than 0',
      });
    });
  });

  describe('resolveLogLevel', () => {
    it('uses info by default and debug when verbose', () => {
      expect(resolveLogLevel(false)).toBe('info');
      expect(resolveLogLevel(true)).toBe('debug');
    });

    it('prefers an explicit level', () => {
      expect(resolveLogLevel(true, 'warn')).toBe('warn');
    });
  });

  describe('exitCodeFor', () => {
    const completed = (failed: number): SortRunResult => ({
      status: 'completed',
      summary: { totalFiles: 2, succeeded: 2 - failed, failed, extensions: ['txt'], failures: [] },
    });
    const invalid: SortRunResult = {
      status: 'invalid-source',
      code: 'SOURCE_NOT_FOUND',
      message: 'Source folder does not exist: /missing',
    };

    it('always exits 0 in best-effort mode', () => {
      expect(exitCodeFor(completed(1), false)).toBe(0);
      expect(exitCodeFor(invalid, false)).toBe(0);
      expect(exitCodeFor({ status: 'crashed', error: 'boom' }, false)).toBe(0);
    });

    it('exits 1 on any failure in strict mode', () => {
      expect(exitCodeFor(completed(0), true)).toBe(0);
      expect(exitCodeFor(completed(1), true)).toBe(1);
      expect(exitCodeFor(invalid, true)).toBe(1);
      expect(exitCodeFor({ status: 'crashed', error: 'boom' }, true)).toBe(1);
    });
  });
});
