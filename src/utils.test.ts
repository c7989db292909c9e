import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fsPromise from 'fs/promises';
import * as os from 'os';
import path from 'path';
import { Utils } from './utils';

vi.mock('@actions/core');

describe('Utils', () => {
  describe('createReleaseTag', () => {
    it('formats local time with second precision', () => {
      expect(Utils.createReleaseTag(new Date(2024, 0, 5, 7, 8, 9))).toBe('wheels-20240105-070809');
      expect(Utils.createReleaseTag(new Date(2025, 11, 31, 23, 59, 58))).toBe('wheels-20251231-235958');
    });
  });

  describe('formatSize', () => {
    it('uses 1024-based units with fixed decimals', () => {
      expect(Utils.formatSize(1.5 * 1024 ** 3, 'GB', 2)).toBe('1.50 GB');
      expect(Utils.formatSize(50 * 1024 * 1024, 'MB', 1)).toBe('50.0 MB');
      expect(Utils.formatSize(0, 'GB', 2)).toBe('0.00 GB');
    });
  });

  describe('file system helpers', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fsPromise.mkdtemp(path.join(os.tmpdir(), 'organize-utils-'));
    });

    afterEach(async () => {
      await fsPromise.rm(directory, { recursive: true, force: true });
    });

    it('tells files and directories apart', async () => {
      const filePath = path.join(directory, 'a.whl');
      await fsPromise.writeFile(filePath, 'wheel');

      expect(await Utils.checkPathExists(filePath)).toBe(true);
      expect(await Utils.isDirectory(filePath)).toBe(false);
      expect(await Utils.isDirectory(directory)).toBe(true);
      expect(await Utils.checkPathExists(path.join(directory, 'missing'))).toBe(false);
      expect(await Utils.isDirectory(path.join(directory, 'missing'))).toBe(false);
    });

    it('appends key/value lines', async () => {
      const outputPath = path.join(directory, 'output');

      await Utils.appendOutput(outputPath, 'first', 'one');
      await Utils.appendOutput(outputPath, 'second', 'two');

      expect(await fsPromise.readFile(outputPath, 'utf8')).toBe('first=one\nsecond=two\n');
    });

    it('lists files only, skipping directories that match the pattern', async () => {
      await fsPromise.mkdir(path.join(directory, 'nested.whl'));
      await fsPromise.writeFile(path.join(directory, 'b.whl'), '');
      await fsPromise.writeFile(path.join(directory, 'a.whl'), '');

      expect(await Utils.listFiles('*.whl', directory)).toEqual([
        path.join(directory, 'a.whl'),
        path.join(directory, 'b.whl')
      ]);
    });

    it('returns no entries for a directory that cannot be listed', async () => {
      expect(await Utils.listDirectoryEntries(path.join(directory, 'missing'))).toEqual([]);
    });

    it('reports paths relative to a root with forward slashes', () => {
      expect(Utils.relativeTo(directory, path.join(directory, 'dist', 'a.whl'))).toBe('dist/a.whl');
    });
  });
});
