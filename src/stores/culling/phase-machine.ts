/**
 * Culling phase state machine
 *
 * The phase is derived from the scanned records and the current index rather
 * than tracked separately, so the two can never disagree.
 */

import { join } from 'node:path';
import type { ImageRecord } from '../../types/image';

export type CullingPhase =
  | 'idle'      // No images loaded
  | 'browsing'  // Showing records[currentIndex]
  | 'finished'; // Every record has been moved

interface PhaseInput {
  records: readonly ImageRecord[];
  currentIndex: number;
}

export function computePhase({ records, currentIndex }: PhaseInput): CullingPhase {
  if (records.length === 0) return 'idle';
  if (currentIndex >= records.length) return 'finished';
  return 'browsing';
}

/** Path shown to the user, relative to the source folder */
export function displayPath(record: ImageRecord): string {
  return record.relativePath ? join(record.relativePath, record.filename) : record.filename;
}

/** Status line for the record at `index`, e.g. `Image 2 of 10: sub/b.jpg` */
export function formatStatus(record: ImageRecord, index: number, total: number): string {
  return `Image ${index + 1} of ${total}: ${displayPath(record)}`;
}
