/**
 * Types for the persisted culler settings document.
 *
 * Key names match the JSON file on disk, which is why they are snake_case.
 */

export const ACTIONS = ['keep', 'reject', 'next', 'previous', 'skip', 'disabled'] as const;

/** Named operation a gesture can trigger */
export type Action = typeof ACTIONS[number];

/** Actions that do something when triggered */
export type ActiveAction = Exclude<Action, 'disabled'>;

export type ButtonGesture = 'left_click' | 'right_click';
export type WheelGesture = 'wheel_up' | 'wheel_down';
export type Gesture = ButtonGesture | WheelGesture;

export interface ButtonMappings {
  left_click: Action;
  right_click: Action;
}

export interface WheelMappings {
  wheel_up: Action;
  wheel_down: Action;
}

export interface SettingsOptions {
  recursive_loading: boolean;
}

/** Current (v2) settings document */
export interface Settings {
  src: string;
  keep: string;
  button_mappings: ButtonMappings;
  wheel_mappings: WheelMappings;
  options: SettingsOptions;
}

/** First-generation settings file: folders only */
export interface LegacySettings {
  src: string;
  keep: string;
}

export interface ValidationResult {
  ok: boolean;
  /** Human-readable reason, empty when ok */
  reason: string;
}

/** Fresh copy of the default settings */
export function createDefaultSettings(): Settings {
  return {
    src: '',
    keep: '',
    button_mappings: {
      left_click: 'keep',
      right_click: 'reject',
    },
    wheel_mappings: {
      wheel_up: 'previous',
      wheel_down: 'next',
    },
    options: {
      recursive_loading: false,
    },
  };
}
