/**
 * Image scanner
 *
 * Lists the images under a source folder, either its direct children or the
 * whole tree. Each record remembers the directory it was found in relative to
 * the root, so moves can mirror the original structure.
 */

import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, relative } from 'node:path';
import { APP_CONFIG } from '../config/app.config';
import { ScanDirectoryError, ScanPermissionError, errorCode, toErrorMessage } from './errors';
import type { ImageRecord, ScanOptions } from '../types/image';

/** Case-insensitive check against the supported extensions */
export function isImageFile(filename: string): boolean {
  const name = filename.toLowerCase();
  return APP_CONFIG.IMAGE_EXTENSIONS.some((ext) => name.endsWith(ext));
}

/** Code-unit order, independent of locale */
export function compareRecords(a: ImageRecord, b: ImageRecord): number {
  if (a.fullPath < b.fullPath) return -1;
  if (a.fullPath > b.fullPath) return 1;
  return 0;
}

async function isFileEntry(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await stat(fullPath)).isFile();
  } catch {
    // Dangling link
    return false;
  }
}

/**
 * Throws ScanDirectoryError unless `root` is a readable directory.
 */
export async function assertScanRoot(root: string): Promise<void> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new ScanDirectoryError(root, 'not a directory');
    }
    await readdir(root);
  } catch (error) {
    if (error instanceof ScanDirectoryError) throw error;
    throw new ScanDirectoryError(root, error);
  }
}

async function readEntries(dir: string, root: string): Promise<Dirent[] | null> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (dir === root) {
      throw new ScanDirectoryError(root, error);
    }
    const code = errorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      console.warn(`[Scanner] ${new ScanPermissionError(dir, error).message}`);
    } else {
      console.warn(`[Scanner] Skipping ${dir}: ${toErrorMessage(error)}`);
    }
    return null;
  }
}

async function collect(
  root: string,
  dir: string,
  options: ScanOptions,
  excluded: ReadonlySet<string>,
  results: ImageRecord[]
): Promise<void> {
  const entries = await readEntries(dir, root);
  if (!entries) return;

  const relativePath = relative(root, dir);
  const subdirs: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    // Dirents come from lstat, so symlinked directories never show up here
    if (entry.isDirectory()) {
      if (options.recursive && !excluded.has(entry.name)) {
        subdirs.push(fullPath);
      }
      continue;
    }

    if (isImageFile(entry.name) && (await isFileEntry(entry, fullPath))) {
      results.push({ filename: entry.name, relativePath, fullPath });
    }
  }

  for (const subdir of subdirs) {
    await collect(root, subdir, options, excluded, results);
  }
}

/**
 * Scan `root` for images, sorted by full path.
 *
 * Never rejects: an unreadable root is logged and yields an empty list,
 * unreadable subdirectories are logged and skipped.
 */
export async function scanImages(
  root: string,
  options: ScanOptions = { recursive: false }
): Promise<ImageRecord[]> {
  const results: ImageRecord[] = [];
  const excluded = new Set(options.excludeDirs ?? []);

  try {
    await collect(root, root, options, excluded, results);
  } catch (error) {
    console.error(`[Scanner] ${toErrorMessage(error)}`);
    return [];
  }

  return results.sort(compareRecords);
}
