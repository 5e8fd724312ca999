/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  fileExists,
  fileExistsSync,
  globFilesSync,
  isDirectorySync,
  isPathInside,
  readFile,
  readFileSync,
} from '../../../src/utils/file-system.js';
import { createTestRoot, removeTestRoot, writeAt } from '../../helpers/fixture.js';

describe('file system utilities', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTestRoot('fs');
  });

  afterEach(() => {
    removeTestRoot(testDir);
  });

  describe('reading', () => {
    it('should read files sync and async', async () => {
      const file = writeAt(testDir, 'a.txt', 'content');

      expect(readFileSync(file)).toBe('content');
      expect(await readFile(file)).toBe('content');
    });
  });

  describe('existence checks', () => {
    it('should distinguish files from directories', async () => {
      const file = writeAt(testDir, 'dir/a.txt');

      expect(fileExistsSync(file)).toBe(true);
      expect(fileExistsSync(join(testDir, 'dir'))).toBe(false);
      expect(isDirectorySync(join(testDir, 'dir'))).toBe(true);
      expect(isDirectorySync(file)).toBe(false);
      expect(await fileExists(file)).toBe(true);
    });

    it('should report missing paths', async () => {
      expect(fileExistsSync(join(testDir, 'missing'))).toBe(false);
      expect(isDirectorySync(join(testDir, 'missing'))).toBe(false);
      expect(await fileExists(join(testDir, 'missing'))).toBe(false);
    });
  });

  describe('globFilesSync', () => {
    it('should return sorted absolute matches', () => {
      writeAt(testDir, 'b.overlay.yaml');
      writeAt(testDir, 'a.overlay.yaml');
      writeAt(testDir, 'sub/c.overlay.yaml');

      expect(globFilesSync('*.overlay.yaml', { cwd: testDir })).toEqual([
        join(testDir, 'a.overlay.yaml'),
        join(testDir, 'b.overlay.yaml'),
      ]);
    });

    it('should honour ignore patterns and relative output', () => {
      writeAt(testDir, 'keep/a.yaml');
      writeAt(testDir, 'config/b.yaml');

      expect(globFilesSync(['*/*.yaml'], { cwd: testDir, ignore: ['config/**'], absolute: false })).toEqual([
        'keep/a.yaml',
      ]);
    });
  });

  describe('isPathInside', () => {
    it('should accept the parent and its descendants', () => {
      expect(isPathInside('/root/vendor', '/root/vendor')).toBe(true);
      expect(isPathInside('/root/vendor', '/root/vendor/overlay/a.yaml')).toBe(true);
    });

    it('should accept children whose names start with two dots', () => {
      expect(isPathInside('/root/vendor/config', '/root/vendor/config/..shared.xml')).toBe(true);
      expect(isPathInside('/root/vendor', '/root/vendor/..hidden/a.yaml')).toBe(true);
    });

    it('should reject siblings and traversal', () => {
      expect(isPathInside('/root/vendor', '/root/vendor2/a.yaml')).toBe(false);
      expect(isPathInside('/root/vendor', '/root/vendor/../system/a.yaml')).toBe(false);
      expect(isPathInside('/root/vendor', '/etc/passwd')).toBe(false);
      expect(isPathInside('/root/vendor/config', '/root/vendor')).toBe(false);
    });
  });
});
