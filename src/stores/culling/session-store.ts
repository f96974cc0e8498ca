import { createStore } from 'zustand/vanilla';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { APP_CONFIG } from '../../config/app.config';
import { assertScanRoot, scanImages } from '../../lib/scanner';
import { moveRecord } from '../../lib/file-mover';
import { isCullerError, toErrorMessage } from '../../lib/errors';
import type { ActionTarget } from '../../lib/action-router';
import type { ImageRecord } from '../../types/image';
import type { ImageDecoder, SessionView } from '../../types/collaborators';
import type { NoticeStore } from '../notice-store';
import { computePhase, displayPath, formatStatus, type CullingPhase } from './phase-machine';

// Below this the shell has not been laid out yet and decoding at full size is used
const MIN_FIT_SIZE = 10;

export interface StartOptions {
  sourceDir: string;
  keepDir: string;
  recursive: boolean;
}

export interface SessionDependencies {
  decoder: ImageDecoder;
  view: SessionView;
  notices?: NoticeStore;
  refreshDelayMs?: number;
  rejectDirName?: string;
  onFinished?: () => void;
}

interface SessionState {
  phase: CullingPhase;
  records: ImageRecord[];
  currentIndex: number;
  sourceDir: string | null;
  keepDir: string | null;
  rejectDir: string | null;
  /** True while an action is running; gestures arriving meanwhile are dropped */
  isProcessing: boolean;
}

interface SessionActions extends ActionTarget {
  start: (options: StartOptions) => Promise<boolean>;
  reset: () => void;
  currentRecord: () => ImageRecord | null;
}

export type SessionStore = ReturnType<typeof createSessionStore>;

const initialState: SessionState = {
  phase: 'idle',
  records: [],
  currentIndex: 0,
  sourceDir: null,
  keepDir: null,
  rejectDir: null,
  isProcessing: false,
};

/**
 * Culling session: scan once, then walk the records one gesture at a time.
 *
 * keep/reject move the current file and advance only when the move worked;
 * next/previous/skip only move the index. Reaching the end of the list
 * finishes the session, after which every action is ignored.
 */
export function createSessionStore({
  decoder,
  view,
  notices,
  refreshDelayMs = APP_CONFIG.REFRESH_DELAY_MS,
  rejectDirName = APP_CONFIG.REJECT_DIR_NAME,
  onFinished,
}: SessionDependencies) {
  return createStore<SessionState & SessionActions>()((set, get) => {
    const setIndex = (currentIndex: number) => {
      set((state) => ({
        currentIndex,
        phase: computePhase({ records: state.records, currentIndex }),
      }));
    };

    const finish = () => {
      console.log('[Session] All images sorted');
      view.showStatus('Finished.');
      view.showFinished();
      notices?.getState().showSuccess('Done', 'All images have been sorted!');
      onFinished?.();
    };

    const showCurrent = async (): Promise<void> => {
      const { records, currentIndex, phase } = get();
      if (phase === 'finished') {
        finish();
        return;
      }
      const record = records[currentIndex];
      if (!record) return;

      const status = formatStatus(record, currentIndex, records.length);
      view.showStatus(status);

      const viewport = view.getViewport();
      const fit =
        viewport && viewport.width > MIN_FIT_SIZE && viewport.height > MIN_FIT_SIZE
          ? viewport
          : undefined;

      try {
        const image = await decoder.decode(record.fullPath, fit);
        view.renderImage(image, record, status);
      } catch (error) {
        if (isCullerError(error, 'IMAGE_NOT_FOUND')) {
          // Gone from disk since the scan; nothing to move
          console.warn(`[Session] ${displayPath(record)} disappeared, skipping`);
          notices?.getState().showWarning('Missing Image', `${displayPath(record)} no longer exists.`);
          setIndex(currentIndex + 1);
          await showCurrent();
          return;
        }
        console.error(`[Session] Error loading image ${displayPath(record)}:`, toErrorMessage(error));
        const { rejectDir } = get();
        if (rejectDir) await moveCurrent(rejectDir);
      }
    };

    const moveCurrent = async (destination: string): Promise<void> => {
      const { records, currentIndex } = get();
      const record = records[currentIndex];
      if (!record) return;

      try {
        const target = await moveRecord(record, destination);
        console.log(`[Session] Moved ${displayPath(record)} to ${target}`);
      } catch (error) {
        console.error('[Session] Move failed:', toErrorMessage(error));
        notices?.getState().showError('File Error', `Could not move file:\n${toErrorMessage(error)}`);
        return;
      }

      setIndex(currentIndex + 1);
      if (refreshDelayMs > 0) {
        await sleep(refreshDelayMs);
      }
      await showCurrent();
    };

    const step = async (delta: 1 | -1): Promise<void> => {
      const { records, currentIndex } = get();
      const index = currentIndex + delta;
      if (index < 0 || index > records.length - 1) return;
      setIndex(index);
      await showCurrent();
    };

    /** Run an action while browsing, one at a time */
    const exclusive = async (action: () => Promise<void>): Promise<void> => {
      const { phase, isProcessing } = get();
      if (phase !== 'browsing' || isProcessing) return;

      set({ isProcessing: true });
      try {
        await action();
      } finally {
        set({ isProcessing: false });
      }
    };

    return {
      ...initialState,

      start: async ({ sourceDir, keepDir, recursive }) => {
        const { phase, isProcessing } = get();
        if (phase === 'browsing' || isProcessing) return false;

        if (!sourceDir || !keepDir) {
          notices?.getState().showError('Not Ready', 'Select a source folder and a keep destination first.');
          return false;
        }

        set({ isProcessing: true });
        try {
          try {
            await assertScanRoot(sourceDir);
          } catch (error) {
            console.error('[Session]', toErrorMessage(error));
            notices?.getState().showError('Error', 'Source folder not found. Did you move it?');
            return false;
          }

          const rejectDir = join(sourceDir, rejectDirName);
          try {
            await mkdir(rejectDir, { recursive: true });
          } catch (error) {
            console.error('[Session] Cannot create reject folder:', toErrorMessage(error));
            notices?.getState().showError('File Error', `Could not create ${rejectDir}:\n${toErrorMessage(error)}`);
            return false;
          }

          const records = await scanImages(sourceDir, { recursive, excludeDirs: [rejectDirName] });
          if (records.length === 0) {
            set({ records: [], currentIndex: 0, phase: 'idle' });
            notices?.getState().showWarning('No Images', 'No image files found in source folder.');
            return false;
          }

          console.log(`[Session] Loaded ${records.length} images from ${sourceDir}`);
          set({
            records,
            currentIndex: 0,
            phase: computePhase({ records, currentIndex: 0 }),
            sourceDir,
            keepDir,
            rejectDir,
          });
          await showCurrent();
          return true;
        } finally {
          set({ isProcessing: false });
        }
      },

      keep: () =>
        exclusive(async () => {
          const { keepDir } = get();
          if (keepDir) await moveCurrent(keepDir);
        }),

      reject: () =>
        exclusive(async () => {
          const { rejectDir } = get();
          if (rejectDir) await moveCurrent(rejectDir);
        }),

      next: () => exclusive(() => step(1)),

      previous: () => exclusive(() => step(-1)),

      // TODO: record skipped images separately from plain navigation
      skip: () => exclusive(() => step(1)),

      reset: () => set({ ...initialState }),

      currentRecord: () => {
        const { records, currentIndex } = get();
        return records[currentIndex] ?? null;
      },
    };
  });
}
