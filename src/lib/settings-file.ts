/**
 * Settings file persistence
 *
 * Reads, migrates and writes the JSON settings document synchronously. The
 * file on disk is only ever replaced by a document that passed validation,
 * and a file that fails to load is copied aside before defaults take over.
 */

import { copyFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parseSettings } from './schemas/settings';
import {
  ConfigIOError,
  ConfigInvalidError,
  errorCode,
  toErrorMessage,
  type CullerError,
} from './errors';
import { createDefaultSettings, type LegacySettings, type Settings } from '../types/settings';

export interface SettingsLoadResult {
  settings: Settings;
  /** True when a legacy file was upgraded during this load */
  migrated: boolean;
  /** Recovered problem, if the defaults or an unsaved migration were used */
  error: CullerError | null;
}

/** Suffix of the copy kept when a settings file cannot be used */
export const INVALID_COPY_SUFFIX = '.invalid';

/** Upgrade a folders-only file, filling mappings and options with defaults */
export function migrateSettings(legacy: LegacySettings): Settings {
  return { ...createDefaultSettings(), ...legacy };
}

function preserveInvalidFile(filePath: string): void {
  try {
    copyFileSync(filePath, filePath + INVALID_COPY_SUFFIX);
  } catch (error) {
    console.warn('[Settings] Could not keep a copy of the invalid file:', toErrorMessage(error));
  }
}

function fallBack(filePath: string, error: CullerError): SettingsLoadResult {
  console.error(`[Settings] ${error.message}. Using defaults.`);
  if (error.type === 'CONFIG_INVALID') {
    preserveInvalidFile(filePath);
  }
  return { settings: createDefaultSettings(), migrated: false, error };
}

/**
 * Write a validated document. The JSON goes to a temporary file first and is
 * renamed over the target, so readers never see a partial file.
 *
 * @throws ConfigInvalidError if the document does not validate
 * @throws ConfigIOError if the file cannot be written
 */
export function writeSettingsFile(filePath: string, doc: unknown): Settings {
  const parsed = parseSettings(doc);
  if (!parsed.success) {
    throw new ConfigInvalidError(parsed.reason);
  }
  const settings = parsed.version === 1 ? migrateSettings(parsed.data) : parsed.data;

  const tempPath = `${filePath}.tmp`;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tempPath, JSON.stringify(settings, null, 2) + '\n', 'utf8');
    renameSync(tempPath, filePath);
  } catch (error) {
    throw new ConfigIOError(filePath, error);
  }
  return settings;
}

/**
 * Load the settings file. Never throws: a missing file yields the defaults,
 * an unreadable or invalid one yields the defaults plus the error.
 */
export function loadSettingsFile(filePath: string): SettingsLoadResult {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { settings: createDefaultSettings(), migrated: false, error: null };
    }
    return fallBack(filePath, new ConfigIOError(filePath, error));
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (error) {
    return fallBack(
      filePath,
      new ConfigInvalidError(`not valid JSON (${toErrorMessage(error)})`, { cause: error })
    );
  }

  const parsed = parseSettings(doc);
  if (!parsed.success) {
    return fallBack(filePath, new ConfigInvalidError(parsed.reason));
  }

  if (parsed.version === 2) {
    return { settings: parsed.data, migrated: false, error: null };
  }

  console.log('[Settings] Migrating config from v1 to v2 format...');
  const settings = migrateSettings(parsed.data);
  try {
    writeSettingsFile(filePath, settings);
    return { settings, migrated: true, error: null };
  } catch (error) {
    const ioError = error instanceof ConfigIOError ? error : new ConfigIOError(filePath, error);
    console.error('[Settings] Failed to save migrated settings:', ioError.message);
    return { settings, migrated: true, error: ioError };
  }
}
