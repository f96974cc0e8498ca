/**
 * Culler composition root
 *
 * Owns one settings store, one notice store, one session and one router for
 * a shell. Whenever the settings document changes, gestures are rebound and
 * the instruction line is refreshed in the same step.
 */

import { statSync } from 'node:fs';
import { ActionRouter, describeBindings } from './lib/action-router';
import { toErrorMessage } from './lib/errors';
import { createNoticeStore } from './stores/notice-store';
import { createSettingsStore } from './stores/settings-store';
import { createSessionStore } from './stores/culling';
import type { Settings } from './types/settings';
import type { GestureSurface, ImageDecoder, SessionView } from './types/collaborators';

export interface CullerAppOptions {
  surface: GestureSurface;
  view: SessionView;
  decoder: ImageDecoder;
  settingsFile?: string;
  refreshDelayMs?: number;
  onFinished?: () => void;
}

export type CullerApp = ReturnType<typeof createCullerApp>;

function isDirectory(path: string): boolean {
  if (path === '') return false;
  try {
    return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch (error) {
    console.warn(`[App] Cannot check folder ${path}:`, toErrorMessage(error));
    return false;
  }
}

export function createCullerApp({
  surface,
  view,
  decoder,
  settingsFile,
  refreshDelayMs,
  onFinished,
}: CullerAppOptions) {
  const notices = createNoticeStore();
  const settings = createSettingsStore({ filePath: settingsFile, notices });
  const session = createSessionStore({ decoder, view, notices, refreshDelayMs, onFinished });
  const router = new ActionRouter(surface, session.getState());

  const applyDerived = (current: Settings) => {
    router.bindAll(current);
    view.showInstructions(describeBindings(current));
  };

  const unsubscribe = settings.subscribe((state, prev) => {
    if (state.settings !== prev.settings) {
      applyDerived(state.settings);
    }
  });

  return {
    notices,
    settings,
    session,
    router,

    /** Load the settings file and bind gestures from it */
    init: (): Settings => settings.getState().load(),

    /** Both folders chosen and still on disk, so a session can start */
    isReady: (): boolean => {
      const { src, keep } = settings.getState().settings;
      return isDirectory(src) && isDirectory(keep);
    },

    selectSourceDir: (dir: string): boolean => settings.getState().setSourceDir(dir),

    selectKeepDir: (dir: string): boolean => settings.getState().setKeepDir(dir),

    startSession: (): Promise<boolean> => {
      const { src, keep } = settings.getState().settings;
      return session.getState().start({
        sourceDir: src,
        keepDir: keep,
        recursive: settings.getState().get('options.recursive_loading', false),
      });
    },

    dispose: (): void => {
      unsubscribe();
      router.unbindAll();
    },
  };
}
