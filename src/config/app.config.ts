/**
 * Application constants.
 *
 * Paths and timings that deployments may want to change are read from the
 * environment, everything else is fixed.
 */

const parseDelay = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

export const APP_CONFIG = {
  SETTINGS_FILE: process.env.CULLER_SETTINGS_FILE || 'culler_settings.json',
  REJECT_DIR_NAME: '_REJECTS',
  IMAGE_EXTENSIONS: ['.png', '.jpg', '.jpeg', '.bmp', '.webp'],
  // Gives the shell a chance to repaint between a move and the next image
  REFRESH_DELAY_MS: parseDelay(process.env.CULLER_REFRESH_DELAY_MS, 10),
} as const;
