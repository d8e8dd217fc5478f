/**
 * FileEnumerator Unit Tests
 *
 * Uses real temporary directories; read faults are injected through the
 * enumerator's filesystem port.
 *
 * @module __tests__/unit/domains/sorting/FileEnumerator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { FileEnumerator, type EnumeratorFileSystem } from '@/domains/sorting/FileEnumerator';
import { createTestLogger } from '../../../helpers/mockPinoFactory';
import { createTempDir, removeTempDir, writeFixture } from '../../../helpers/tempDir';

describe('FileEnumerator', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('enumerate', () => {
    it('lists nested files depth-first in name order', async () => {
      await writeFixture(root, 'src/sub/deeper/c', 'c');
      await writeFixture(root, 'src/sub/b.md', 'b');
      await writeFixture(root, 'src/a.txt', 'a');
      const source = path.join(root, 'src');

      const files = await new FileEnumerator().enumerate(source);

      expect(files).toEqual([
        path.join(source, 'a.txt'),
        path.join(source, 'sub', 'b.md'),
        path.join(source, 'sub', 'deeper', 'c'),
      ]);
    });

    it('logs each file at debug and the total at info', async () => {
      await writeFixture(root, 'src/one.txt', '1');
      await writeFixture(root, 'src/two.txt', '2');
      const source = path.join(root, 'src');
      const { testLogger, getLogsByLevel } = createTestLogger();

      await new FileEnumerator({ logger: testLogger }).enumerate(source);

      expect(getLogsByLevel('debug').map((log) => log.msg)).toEqual([
        `Found file: ${path.join(source, 'one.txt')}`,
        `Found file: ${path.join(source, 'two.txt')}`,
      ]);
      expect(getLogsByLevel('info')).toHaveLength(1);
      expect(getLogsByLevel('info')[0]).toMatchObject({ msg: `Found 2 files in ${source}`, count: 2 });
    });

    it('returns an empty list for an empty directory', async () => {
      await expect(new FileEnumerator().enumerate(root)).resolves.toEqual([]);
    });

    it('returns an empty list and logs an error when the root is missing', async () => {
      const missing = path.join(root, 'missing');
      const { testLogger, getLogsByLevel } = createTestLogger();

      const files = await new FileEnumerator({ logger: testLogger }).enumerate(missing);

      expect(files).toEqual([]);
      expect(getLogsByLevel('error')).toHaveLength(1);
      expect(getLogsByLevel('error')[0]).toMatchObject({
        msg: `Source folder does not exist: ${missing}`,
        code: 'SOURCE_NOT_FOUND',
      });
    });

    it('returns an empty list when the root is a file', async () => {
      const file = await writeFixture(root, 'plain.txt', 'x');
      const { testLogger, getLogsByLevel } = createTestLogger();

      const files = await new FileEnumerator({ logger: testLogger }).enumerate(file);

      expect(files).toEqual([]);
      expect(getLogsByLevel('error')[0].msg).toBe(`Source path is not a directory: ${file}`);
    });

    it('includes symlinks to files and skips directory and dangling links', async () => {
      const source = path.join(root, 'src');
      const realFile = await writeFixture(root, 'src/real.txt', 'real');
      await writeFixture(root, 'elsewhere/hidden.txt', 'hidden');
      await fs.symlink(realFile, path.join(source, 'link.txt'));
      await fs.symlink(path.join(root, 'elsewhere'), path.join(source, 'dirlink'));
      await fs.symlink(path.join(root, 'nowhere.txt'), path.join(source, 'dangling'));

      const files = await new FileEnumerator().enumerate(source);

      expect(files).toEqual([path.join(source, 'link.txt'), path.join(source, 'real.txt')]);
    });

    it('skips an unreadable directory and keeps walking its siblings', async () => {
      await writeFixture(root, 'src/a.txt', 'a');
      await writeFixture(root, 'src/bad/x.txt', 'x');
      await writeFixture(root, 'src/good/y.txt', 'y');
      const source = path.join(root, 'src');
      const badDir = path.join(source, 'bad');

      const fileSystem: EnumeratorFileSystem = {
        stat: (target) => fs.stat(target),
        readDirectory: async (dir) => {
          if (dir === badDir) {
            throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
          }
          return fs.readdir(dir, { withFileTypes: true });
        },
      };
      const { testLogger, getLogsByLevel } = createTestLogger();

      const files = await new FileEnumerator({ logger: testLogger, fileSystem }).enumerate(source);

      expect(files).toEqual([path.join(source, 'a.txt'), path.join(source, 'good', 'y.txt')]);
      expect(getLogsByLevel('error')).toHaveLength(1);
      expect(getLogsByLevel('error')[0]).toMatchObject({
        msg: `Failed to read directory: ${badDir}`,
        dir: badDir,
        error: 'EACCES: permission denied',
      });
    });
  });

  describe('validateSourceRoot', () => {
    it('accepts a directory', async () => {
      await expect(new FileEnumerator().validateSourceRoot(root)).resolves.toEqual({ valid: true });
    });

    it('reports a missing root', async () => {
      const missing = path.join(root, 'missing');

      await expect(new FileEnumerator().validateSourceRoot(missing)).resolves.toEqual({
        valid: false,
        code: 'SOURCE_NOT_FOUND',
        message: `Source folder does not exist: ${missing}`,
      });
    });

    it('reports a root that cannot be inspected', async () => {
      const fileSystem: EnumeratorFileSystem = {
        stat: async () => {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        },
        readDirectory: async () => [],
      };

      await expect(new FileEnumerator({ fileSystem }).validateSourceRoot('/locked')).resolves.toEqual({
        valid: false,
        code: 'SOURCE_UNREADABLE',
        message: 'Source folder cannot be inspected: /locked (EACCES: permission denied)',
      });
    });
  });
});
