/**
 * Moves scanned images into a destination folder.
 *
 * The record's relative directory is recreated under the destination, and an
 * existing file is never overwritten: `name.ext` becomes `name_1.ext`,
 * `name_2.ext` and so on until a free name is found.
 */

import { access, constants, copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { MoveError, errorCode } from './errors';
import type { ImageRecord } from '../types/image';

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/** First path in `dir` for `filename` that does not exist yet */
export async function resolveFreePath(dir: string, filename: string): Promise<string> {
  const ext = extname(filename);
  const base = filename.slice(0, filename.length - ext.length);

  let candidate = join(dir, filename);
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = join(dir, `${base}_${counter}${ext}`);
  }
  return candidate;
}

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    // rename cannot cross filesystems
    if (errorCode(error) !== 'EXDEV') throw error;
    await copyFile(source, destination, constants.COPYFILE_EXCL);
    await unlink(source);
  }
}

/** Directory a record lands in under `destinationRoot` */
export function destinationDirFor(record: ImageRecord, destinationRoot: string): string {
  return record.relativePath ? join(destinationRoot, record.relativePath) : destinationRoot;
}

/**
 * Move a record under `destinationRoot`, keeping its relative directory.
 *
 * @returns the path the file was moved to
 * @throws MoveError if the directory cannot be created or the file cannot be moved
 */
export async function moveRecord(record: ImageRecord, destinationRoot: string): Promise<string> {
  const targetDir = destinationDirFor(record, destinationRoot);
  let destination = join(targetDir, record.filename);

  try {
    await mkdir(targetDir, { recursive: true });
    destination = await resolveFreePath(targetDir, record.filename);
    await moveFile(record.fullPath, destination);
  } catch (error) {
    throw new MoveError(record.fullPath, destination, error);
  }

  return destination;
}
