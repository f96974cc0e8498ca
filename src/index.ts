export { createCullerApp } from './app';
export type { CullerApp, CullerAppOptions } from './app';

export { APP_CONFIG } from './config/app.config';

export { createNoticeStore } from './stores/notice-store';
export type { NoticeStore, NoticeData } from './stores/notice-store';
export { createSettingsStore } from './stores/settings-store';
export type { SettingsStore, SettingsStoreOptions } from './stores/settings-store';
export * from './stores/culling';

export { ActionRouter, describeBindings, resolveAction, wheelDirection } from './lib/action-router';
export type { ActionTarget, GestureMappings } from './lib/action-router';
export { scanImages, assertScanRoot, isImageFile } from './lib/scanner';
export { moveRecord, resolveFreePath } from './lib/file-mover';
export { loadSettingsFile, writeSettingsFile, migrateSettings } from './lib/settings-file';
export type { SettingsLoadResult } from './lib/settings-file';
export {
  validateSettings,
  parseSettings,
  checkSettingsWarnings,
  formatActionLabel,
  parseActionLabel,
} from './lib/schemas/settings';
export * from './lib/errors';

export * from './types/settings';
export type * from './types/image';
export type * from './types/collaborators';
