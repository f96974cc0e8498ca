/** One scanned image file */
export interface ImageRecord {
  filename: string;
  /** Directory relative to the scan root, empty for files directly in it */
  relativePath: string;
  fullPath: string;
}

export interface ScanOptions {
  recursive: boolean;
  /** Directory names never descended into (recursive mode only) */
  excludeDirs?: readonly string[];
}

export interface Viewport {
  width: number;
  height: number;
}
