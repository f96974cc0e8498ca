import { createStore } from 'zustand/vanilla';

/** User-facing message the shell shows as a dialog or toast */
export interface NoticeData {
  id: string;
  type: 'success' | 'error' | 'warning' | 'info';
  title: string;
  message?: string;
}

interface NoticeState {
  notices: NoticeData[];
}

interface NoticeActions {
  addNotice: (notice: Omit<NoticeData, 'id'>) => string;
  dismissNotice: (id: string) => void;
  clearNotices: () => void;
  showSuccess: (title: string, message?: string) => string;
  showError: (title: string, message?: string) => string;
  showWarning: (title: string, message?: string) => string;
  showInfo: (title: string, message?: string) => string;
}

export type NoticeStore = ReturnType<typeof createNoticeStore>;

export function createNoticeStore() {
  let noticeId = 0;

  return createStore<NoticeState & NoticeActions>()((set, get) => ({
    notices: [],

    addNotice: (notice) => {
      const id = `notice-${++noticeId}`;
      set((state) => ({
        notices: [...state.notices, { ...notice, id }],
      }));
      return id;
    },

    dismissNotice: (id) => {
      set((state) => ({
        notices: state.notices.filter((n) => n.id !== id),
      }));
    },

    clearNotices: () => {
      set({ notices: [] });
    },

    // Convenience helpers
    showSuccess: (title, message) => get().addNotice({ type: 'success', title, message }),
    showError: (title, message) => get().addNotice({ type: 'error', title, message }),
    showWarning: (title, message) => get().addNotice({ type: 'warning', title, message }),
    showInfo: (title, message) => get().addNotice({ type: 'info', title, message }),
  }));
}
