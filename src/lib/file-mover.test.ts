import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { destinationDirFor, moveRecord, resolveFreePath } from './file-mover';
import type { ImageRecord } from '../types/image';

describe('file mover', () => {
  let dir: string;
  let source: string;
  let dest: string;

  function record(filename: string, relativePath = ''): ImageRecord {
    const fullPath = join(source, relativePath, filename);
    mkdirSync(join(source, relativePath), { recursive: true });
    writeFileSync(fullPath, `new ${filename}`);
    return { filename, relativePath, fullPath };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'culler-move-'));
    source = join(dir, 'source');
    dest = join(dir, 'dest');
    mkdirSync(source);
    mkdirSync(dest);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveFreePath', () => {
    it('should keep the name when it is free', async () => {
      expect(await resolveFreePath(dest, 'a.png')).toBe(join(dest, 'a.png'));
    });

    it('should count up until a name is free', async () => {
      writeFileSync(join(dest, 'a.png'), 'old');
      writeFileSync(join(dest, 'a_1.png'), 'old');

      expect(await resolveFreePath(dest, 'a.png')).toBe(join(dest, 'a_2.png'));
    });

    it('should suffix only the last extension', async () => {
      writeFileSync(join(dest, 'shot.final.jpg'), 'old');

      expect(await resolveFreePath(dest, 'shot.final.jpg')).toBe(join(dest, 'shot.final_1.jpg'));
    });
  });

  describe('moveRecord', () => {
    it('should move a root file into the destination', async () => {
      const image = record('a.png');

      const moved = await moveRecord(image, dest);

      expect(moved).toBe(join(dest, 'a.png'));
      expect(existsSync(image.fullPath)).toBe(false);
      expect(readFileSync(moved, 'utf8')).toBe('new a.png');
    });

    it('should not overwrite an existing file', async () => {
      writeFileSync(join(dest, 'a.png'), 'original');
      const image = record('a.png');

      const moved = await moveRecord(image, dest);

      expect(moved).toBe(join(dest, 'a_1.png'));
      expect(readFileSync(join(dest, 'a.png'), 'utf8')).toBe('original');
      expect(readFileSync(moved, 'utf8')).toBe('new a.png');
    });

    it('should move to a_2 when a and a_1 are taken', async () => {
      writeFileSync(join(dest, 'a.png'), 'first');
      writeFileSync(join(dest, 'a_1.png'), 'second');

      const moved = await moveRecord(record('a.png'), dest);

      expect(moved).toBe(join(dest, 'a_2.png'));
      expect(readFileSync(join(dest, 'a_1.png'), 'utf8')).toBe('second');
    });

    it('should recreate the relative directory under the destination', async () => {
      const image = record('b.jpg', 'sub');

      const moved = await moveRecord(image, dest);

      expect(moved).toBe(join(dest, 'sub', 'b.jpg'));
      expect(readFileSync(moved, 'utf8')).toBe('new b.jpg');
    });

    it('should fail with a MoveError when the source is gone', async () => {
      const image = record('c.png');
      rmSync(image.fullPath);

      await expect(moveRecord(image, dest)).rejects.toMatchObject({
        type: 'MOVE',
        source: image.fullPath,
        destination: join(dest, 'c.png'),
      });
    });

    it('should fail with a MoveError when the destination is a file', async () => {
      const blocker = join(dir, 'blocker');
      writeFileSync(blocker, 'not a folder');

      await expect(moveRecord(record('d.png'), blocker)).rejects.toMatchObject({ type: 'MOVE' });
      expect(existsSync(join(source, 'd.png'))).toBe(true);
    });
  });

  describe('destinationDirFor', () => {
    it('should use the root for top-level files', () => {
      expect(destinationDirFor({ filename: 'a.png', relativePath: '', fullPath: '/s/a.png' }, '/k')).toBe('/k');
    });

    it('should append the relative path', () => {
      expect(
        destinationDirFor({ filename: 'a.png', relativePath: 'x/y', fullPath: '/s/x/y/a.png' }, '/k')
      ).toBe(join('/k', 'x/y'));
    });
  });
});
