/**
 * Error types raised and recovered across the culler core.
 *
 * Every error carries a `type` so callers can branch without instanceof
 * chains, the same way structured backend errors are handled elsewhere.
 */

export type CullerErrorType =
  | 'CONFIG_INVALID'
  | 'CONFIG_IO'
  | 'SCAN_DIRECTORY'
  | 'SCAN_PERMISSION'
  | 'IMAGE_DECODE'
  | 'IMAGE_NOT_FOUND'
  | 'MOVE'
  | 'UNKNOWN_ACTION';

export class CullerError extends Error {
  readonly type: CullerErrorType;

  constructor(type: CullerErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.type = type;
  }
}

/** Settings document failed schema validation */
export class ConfigInvalidError extends CullerError {
  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', `Invalid config schema: ${reason}`, options);
  }
}

/** Settings file could not be read or written */
export class ConfigIOError extends CullerError {
  constructor(readonly path: string, cause: unknown) {
    super('CONFIG_IO', `Settings file ${path}: ${toErrorMessage(cause)}`, { cause });
  }
}

/** Scan root missing or unreadable */
export class ScanDirectoryError extends CullerError {
  constructor(readonly path: string, cause?: unknown) {
    super('SCAN_DIRECTORY', `Cannot scan ${path}: ${toErrorMessage(cause)}`, { cause });
  }
}

/** Subdirectory unreadable during a recursive walk */
export class ScanPermissionError extends CullerError {
  constructor(readonly path: string, cause?: unknown) {
    super('SCAN_PERMISSION', `Permission denied: ${path}`, { cause });
  }
}

export class ImageDecodeError extends CullerError {
  constructor(readonly path: string, cause?: unknown) {
    super('IMAGE_DECODE', `Cannot decode image ${path}: ${toErrorMessage(cause)}`, { cause });
  }
}

export class ImageNotFoundError extends CullerError {
  constructor(readonly path: string) {
    super('IMAGE_NOT_FOUND', `Image not found: ${path}`);
  }
}

export class MoveError extends CullerError {
  constructor(readonly source: string, readonly destination: string, cause: unknown) {
    super('MOVE', toErrorMessage(cause), { cause });
  }
}

/** Settings reference an action outside the fixed set */
export class UnknownActionNameError extends CullerError {
  constructor(readonly actionName: string) {
    super('UNKNOWN_ACTION', `Unknown action '${actionName}'`);
  }
}

export function isCullerError(error: unknown, type?: CullerErrorType): error is CullerError {
  return error instanceof CullerError && (type === undefined || error.type === type);
}

/** Message of anything thrown */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}

/** Node's errno code, when the value carries one */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
