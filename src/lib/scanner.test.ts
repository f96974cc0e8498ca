import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { assertScanRoot, isImageFile, scanImages } from './scanner';

// chmod has no effect as root, so unreadable folders fail at readdir instead
const { lockedDirs } = vi.hoisted(() => ({ lockedDirs: new Set<string>() }));

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readdir: (...args: Parameters<typeof actual.readdir>) =>
      lockedDirs.has(String(args[0]))
        ? Promise.reject(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }))
        : actual.readdir(...args),
  };
});

function touch(path: string): void {
  writeFileSync(path, 'x');
}

describe('scanner', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'culler-scan-'));
    mkdirSync(join(root, 'sub'));
    touch(join(root, 'a.png'));
    touch(join(root, 'sub', 'b.jpg'));
    touch(join(root, 'sub', 'ignore.txt'));
  });

  afterEach(() => {
    lockedDirs.clear();
    rmSync(root, { recursive: true, force: true });
  });

  describe('isImageFile', () => {
    it('should match the supported extensions in any case', () => {
      expect(isImageFile('shot.PNG')).toBe(true);
      expect(isImageFile('shot.Jpeg')).toBe(true);
      expect(isImageFile('shot.webp')).toBe(true);
      expect(isImageFile('shot.bmp')).toBe(true);
    });

    it('should reject other files', () => {
      expect(isImageFile('notes.txt')).toBe(false);
      expect(isImageFile('clip.gif')).toBe(false);
      expect(isImageFile('png')).toBe(false);
    });
  });

  describe('flat scan', () => {
    it('should list only direct children', async () => {
      const records = await scanImages(root, { recursive: false });

      expect(records).toEqual([
        { filename: 'a.png', relativePath: '', fullPath: join(root, 'a.png') },
      ]);
    });

    it('should skip directories that look like images', async () => {
      mkdirSync(join(root, 'folder.png'));

      const records = await scanImages(root);

      expect(records.map((r) => r.filename)).toEqual(['a.png']);
    });
  });

  describe('recursive scan', () => {
    it('should find images in subdirectories with their relative path', async () => {
      const records = await scanImages(root, { recursive: true });

      expect(records).toEqual([
        { filename: 'a.png', relativePath: '', fullPath: join(root, 'a.png') },
        { filename: 'b.jpg', relativePath: 'sub', fullPath: join(root, 'sub', 'b.jpg') },
      ]);
    });

    it('should record nested relative paths', async () => {
      mkdirSync(join(root, 'sub', 'deep'));
      touch(join(root, 'sub', 'deep', 'c.webp'));

      const records = await scanImages(root, { recursive: true });

      expect(records[2]).toEqual({
        filename: 'c.webp',
        relativePath: join('sub', 'deep'),
        fullPath: join(root, 'sub', 'deep', 'c.webp'),
      });
    });

    it('should sort by full path in code-unit order', async () => {
      touch(join(root, 'Z.PNG'));
      mkdirSync(join(root, 'b'));
      touch(join(root, 'b', 'x.png'));

      const records = await scanImages(root, { recursive: true });

      expect(records.map((r) => r.fullPath)).toEqual([
        join(root, 'Z.PNG'),
        join(root, 'a.png'),
        join(root, 'b', 'x.png'),
        join(root, 'sub', 'b.jpg'),
      ]);
    });

    it('should be deterministic across scans', async () => {
      touch(join(root, 'sub', 'a.bmp'));
      const first = await scanImages(root, { recursive: true });
      const second = await scanImages(root, { recursive: true });

      expect(second).toEqual(first);
    });

    it('should not follow symlinked directories', async () => {
      symlinkSync(root, join(root, 'sub', 'loop'), 'dir');

      const records = await scanImages(root, { recursive: true });

      expect(records).toHaveLength(2);
    });

    it('should include symlinked image files', async () => {
      symlinkSync(join(root, 'a.png'), join(root, 'sub', 'alias.png'));

      const records = await scanImages(root, { recursive: true });

      expect(records.map((r) => r.filename)).toEqual(['a.png', 'alias.png', 'b.jpg']);
    });

    it('should skip excluded directory names', async () => {
      mkdirSync(join(root, '_REJECTS'));
      touch(join(root, '_REJECTS', 'old.png'));

      const records = await scanImages(root, { recursive: true, excludeDirs: ['_REJECTS'] });

      expect(records.map((r) => r.filename)).toEqual(['a.png', 'b.jpg']);
    });
  });

  describe('unreadable subdirectories', () => {
    it('should warn and keep scanning the siblings', async () => {
      const locked = join(root, 'locked');
      mkdirSync(locked);
      touch(join(locked, 'hidden.png'));
      mkdirSync(join(root, 'z'));
      touch(join(root, 'z', 'c.png'));
      lockedDirs.add(locked);

      const records = await scanImages(root, { recursive: true });

      expect(records.map((r) => r.filename)).toEqual(['a.png', 'b.jpg', 'c.png']);
      expect(console.warn).toHaveBeenCalledWith(`[Scanner] Permission denied: ${locked}`);
      expect(console.error).not.toHaveBeenCalled();
    });
  });

  describe('unreadable roots', () => {
    it('should return an empty list and log when the root is missing', async () => {
      const missing = join(root, 'nope');

      const records = await scanImages(missing, { recursive: true });

      expect(records).toEqual([]);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should reject a missing root in assertScanRoot', async () => {
      await expect(assertScanRoot(join(root, 'nope'))).rejects.toMatchObject({
        type: 'SCAN_DIRECTORY',
      });
    });

    it('should reject a file as scan root', async () => {
      await expect(assertScanRoot(join(root, 'a.png'))).rejects.toThrow(
        `Cannot scan ${join(root, 'a.png')}: not a directory`
      );
    });

    it('should accept a directory', async () => {
      await expect(assertScanRoot(root)).resolves.toBeUndefined();
    });
  });
});
