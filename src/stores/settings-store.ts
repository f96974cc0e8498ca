import { createStore } from 'zustand/vanilla';
import { APP_CONFIG } from '../config/app.config';
import { getPath, setPath } from '../lib/dotted-path';
import { loadSettingsFile, writeSettingsFile } from '../lib/settings-file';
import { validateSettings } from '../lib/schemas/settings';
import { toErrorMessage } from '../lib/errors';
import { createDefaultSettings, type Settings, type ValidationResult } from '../types/settings';
import type { NoticeStore } from './notice-store';

interface SettingsState {
  settings: Settings;
  filePath: string;
  /** Reason the last load or save did not go through */
  lastError: string | null;
}

interface SettingsActions {
  load: () => Settings;
  validate: (doc: unknown) => ValidationResult;
  save: (doc: unknown) => boolean;
  get: <T>(path: string, fallback: T) => T;
  set: (path: string, value: unknown) => boolean;

  // Entry points used by the shell
  applySettings: (doc: unknown) => boolean;
  setSourceDir: (dir: string) => boolean;
  setKeepDir: (dir: string) => boolean;
  resetToDefaults: () => boolean;
}

export type SettingsStore = ReturnType<typeof createSettingsStore>;

export interface SettingsStoreOptions {
  filePath?: string;
  notices?: NoticeStore;
}

/**
 * Settings store backed by the JSON settings file
 *
 * The in-memory document only changes through `save`, so what subscribers
 * see always matches what is on disk. Every mutation is written through
 * immediately.
 */
export function createSettingsStore({
  filePath = APP_CONFIG.SETTINGS_FILE,
  notices,
}: SettingsStoreOptions = {}) {
  return createStore<SettingsState & SettingsActions>()((set, get) => ({
    settings: createDefaultSettings(),
    filePath,
    lastError: null,

    load: () => {
      const result = loadSettingsFile(get().filePath);
      set({ settings: result.settings, lastError: result.error?.message ?? null });

      if (result.error && !result.migrated) {
        notices?.getState().showWarning('Settings Error', 'Could not load settings. Using defaults.');
      }
      return result.settings;
    },

    validate: (doc) => validateSettings(doc),

    save: (doc) => {
      try {
        const settings = writeSettingsFile(get().filePath, doc);
        set({ settings, lastError: null });
        return true;
      } catch (error) {
        const reason = toErrorMessage(error);
        console.error('[Settings] Cannot save settings:', reason);
        set({ lastError: reason });
        return false;
      }
    },

    get: (path, fallback) => getPath(get().settings, path, fallback),

    set: (path, value) => get().save(setPath(get().settings, path, value)),

    applySettings: (doc) => {
      const { ok, reason } = validateSettings(doc);
      if (!ok) {
        notices?.getState().showError('Invalid Settings', reason);
        return false;
      }
      if (!get().save(doc)) {
        notices?.getState().showError('Save Failed', 'Could not save settings.');
        return false;
      }
      return true;
    },

    setSourceDir: (dir) => get().set('src', dir),

    setKeepDir: (dir) => get().set('keep', dir),

    resetToDefaults: () => {
      const { src, keep } = get().settings;
      return get().applySettings({ ...createDefaultSettings(), src, keep });
    },
  }));
}
