/**
 * Zod schemas for the culler settings file
 *
 * The file on disk may be hand-edited or half-written, so it is validated on
 * every load and again before every save. Validation failures are reported as
 * one specific sentence naming the offending key.
 */

import { z } from 'zod';
import { readPath } from '../dotted-path';
import {
  ACTIONS,
  type Action,
  type LegacySettings,
  type Settings,
  type ValidationResult,
} from '../../types/settings';

export const actionSchema = z.enum(ACTIONS);

// Extra keys pass through after the known ones so a saved file loads back unchanged
export const settingsSchema = z
  .object({
    src: z.string(),
    keep: z.string(),
    button_mappings: z
      .object({
        left_click: actionSchema,
        right_click: actionSchema,
      })
      .passthrough(),
    wheel_mappings: z
      .object({
        wheel_up: actionSchema,
        wheel_down: actionSchema,
      })
      .passthrough(),
    options: z
      .object({
        recursive_loading: z.boolean(),
      })
      .passthrough(),
  })
  .passthrough() satisfies z.ZodType<Settings>;

/** Folders-only file written before gesture mappings existed */
export const legacySettingsSchema = z
  .object({
    src: z.string(),
    keep: z.string(),
  })
  .passthrough() satisfies z.ZodType<LegacySettings>;

export type ParsedSettings =
  | { success: true; version: 1; data: LegacySettings }
  | { success: true; version: 2; data: Settings }
  | { success: false; reason: string };

const GROUP_LABELS: Record<string, string> = {
  button_mappings: 'button mapping',
  wheel_mappings: 'wheel mapping',
  options: 'option',
};

function isMissing(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function describeIssue(issue: z.ZodIssue, input: unknown): string {
  const segments = issue.path.map(String);
  if (segments.length === 0) return 'Config must be an object';

  const [group, name] = segments;
  if (segments.length === 1) {
    if (isMissing(issue)) return `Missing required key: ${group}`;
    return group === 'src' || group === 'keep'
      ? `${group} must be a string`
      : `${group} must be an object`;
  }

  if (isMissing(issue)) return `Missing ${GROUP_LABELS[group] ?? group}: ${name}`;
  if (group === 'options') return `${name} must be a boolean`;

  return `Invalid action '${formatValue(readPath(input, `${group}.${name}`))}' for ${name}`;
}

function firstReason(error: z.ZodError, input: unknown): string {
  // Absent top-level keys are reported before anything nested
  const issue =
    error.issues.find((i) => i.path.length === 1 && isMissing(i)) ?? error.issues[0];
  return issue ? describeIssue(issue, input) : 'Invalid config';
}

function isLegacyShape(doc: unknown): boolean {
  return (
    typeof doc === 'object' &&
    doc !== null &&
    'src' in doc &&
    'keep' in doc &&
    !('button_mappings' in doc)
  );
}

/**
 * Parse a settings document of either generation.
 * Known keys come back in schema order, followed by any extra keys.
 */
export function parseSettings(doc: unknown): ParsedSettings {
  if (isLegacyShape(doc)) {
    const legacy = legacySettingsSchema.safeParse(doc);
    return legacy.success
      ? { success: true, version: 1, data: legacy.data }
      : { success: false, reason: firstReason(legacy.error, doc) };
  }

  const result = settingsSchema.safeParse(doc);
  return result.success
    ? { success: true, version: 2, data: result.data }
    : { success: false, reason: firstReason(result.error, doc) };
}

/**
 * Validate a settings document.
 * A folders-only legacy file counts as valid so it can be migrated.
 */
export function validateSettings(doc: unknown): ValidationResult {
  const parsed = parseSettings(doc);
  return parsed.success ? { ok: true, reason: '' } : { ok: false, reason: parsed.reason };
}

export function isAction(name: unknown): name is Action {
  return actionSchema.safeParse(name).success;
}

/** Dropdown label for an action, e.g. `Keep` */
export function formatActionLabel(action: Action): string {
  return action.charAt(0).toUpperCase() + action.slice(1);
}

/** Inverse of formatActionLabel; null for anything that is not an action */
export function parseActionLabel(label: string): Action | null {
  const name = label.trim().toLowerCase();
  return isAction(name) ? name : null;
}

/**
 * Non-blocking problems with an otherwise valid configuration,
 * shown to the user before saving.
 */
export function checkSettingsWarnings(settings: Settings): string[] {
  const warnings: string[] = [];
  const mapped: Action[] = [
    settings.button_mappings.left_click,
    settings.button_mappings.right_click,
    settings.wheel_mappings.wheel_up,
    settings.wheel_mappings.wheel_down,
  ];

  if (!mapped.includes('keep') && !mapped.includes('reject')) {
    warnings.push(
      "No buttons or wheel actions mapped to Keep or Reject. You won't be able to sort images!"
    );
  }

  return warnings;
}
