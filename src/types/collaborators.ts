/**
 * Capabilities the core needs from the hosting GUI shell and image library.
 * Nothing in this package implements them; the shell does.
 */

import type { ImageRecord, Viewport } from './image';

/**
 * Low-level input signals a surface can deliver.
 *
 * Some platforms report the wheel as one signal with a signed delta, others
 * as two discrete up/down signals. Surfaces deliver whichever they have.
 */
export type InputSignal = 'primary' | 'secondary' | 'wheel' | 'wheel-up' | 'wheel-down';

export interface InputEvent {
  signal: InputSignal;
  /** Wheel delta for the combined `wheel` signal, positive means up */
  delta?: number;
}

export type InputHandler = (event: InputEvent) => void;

export interface GestureSurface {
  bind: (signal: InputSignal, handler: InputHandler) => void;
  unbind: (signal: InputSignal) => void;
}

/** Decoded bitmap handed back to the shell untouched */
export interface DecodedImage {
  width: number;
  height: number;
  data: unknown;
}

export interface ImageDecoder {
  /**
   * Decode a file, downscaled to fit `fit` with its aspect ratio kept.
   * Rejects with ImageNotFoundError or ImageDecodeError.
   */
  decode: (path: string, fit?: Viewport) => Promise<DecodedImage>;
}

export interface SessionView {
  /** Current display area, or null before the shell has laid out */
  getViewport: () => Viewport | null;
  renderImage: (image: DecodedImage, record: ImageRecord, status: string) => void;
  showStatus: (text: string) => void;
  /** Line describing what each gesture does */
  showInstructions: (text: string) => void;
  showFinished: () => void;
}
