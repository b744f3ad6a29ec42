/**
 * User Settings
 *
 * Shortcuts, per-column font sizes, display options and UI language, stored
 * in `~/.tmx-aligner/settings.json`. Bundled default shortcuts are overlaid
 * with the user's; a legacy shortcuts-only `shortcuts.json` is migrated on
 * load. Settings values are immutable: the setters return a new object.
 */

import fs from 'fs';
import os from 'os';
import { join } from 'pathe';
import { z } from 'zod';
import i18n, { SUPPORTED_LANGUAGES, type UiLanguage } from '@/i18n';
import { ENV } from '@/config';
import { logger } from '@/services/utils/logger';
import { describeCause } from '@/services/utils/errors';
import { type Column } from '@/types/alignment';
import { ACTION_NAMES, type AppSettings, type DisplaySettings, type ShortcutMap } from '@/types/settings';
import defaultShortcutsData from './defaultShortcuts.json';

export { ACTION_NAMES };

export const DEFAULT_FONT_SIZE = 14;
export const MIN_FONT_SIZE = 8;
export const MAX_FONT_SIZE = 48;

const SETTINGS_DIR_NAME = '.tmx-aligner';
const SETTINGS_FILE = 'settings.json';
const LEGACY_SHORTCUTS_FILE = 'shortcuts.json';

const DEFAULT_DISPLAY: DisplaySettings = {
  wordWrap: true,
  columnRatio: 0.5,
};

// ============================================
// Schemas
// ============================================

const shortcutsSchema = z.record(z.string(), z.string());

const settingsFileSchema = z.object({
  shortcuts: shortcutsSchema.optional(),
  fontSizes: z
    .object({
      source: z.number().finite().optional(),
      target: z.number().finite().optional(),
    })
    .optional(),
  display: z
    .object({
      wordWrap: z.boolean().optional(),
      columnRatio: z.number().gt(0).lt(1).optional(),
    })
    .optional(),
  language: z.enum(SUPPORTED_LANGUAGES).optional(),
});

type SettingsFile = z.infer<typeof settingsFileSchema>;

const DEFAULT_SHORTCUTS: ShortcutMap = shortcutsSchema.parse(defaultShortcutsData);

// ============================================
// Construction
// ============================================

export const clampFontSize = (size: number): number =>
  Math.max(MIN_FONT_SIZE, Math.min(MAX_FONT_SIZE, Math.round(size)));

export function createDefaultSettings(): AppSettings {
  return {
    shortcuts: { ...DEFAULT_SHORTCUTS },
    fontSizes: { source: DEFAULT_FONT_SIZE, target: DEFAULT_FONT_SIZE },
    display: { ...DEFAULT_DISPLAY },
    language: 'en-US',
  };
}

function mergeWithDefaults(user: SettingsFile): AppSettings {
  const defaults = createDefaultSettings();
  return {
    shortcuts: { ...defaults.shortcuts, ...user.shortcuts },
    fontSizes: {
      source: clampFontSize(user.fontSizes?.source ?? DEFAULT_FONT_SIZE),
      target: clampFontSize(user.fontSizes?.target ?? DEFAULT_FONT_SIZE),
    },
    display: { ...defaults.display, ...user.display },
    language: user.language ?? defaults.language,
  };
}

// ============================================
// Storage
// ============================================

export interface SettingsPaths {
  dir: string;
  settingsFile: string;
  legacyShortcutsFile: string;
}

/**
 * Locations of the settings files. `TMX_ALIGNER_SETTINGS_DIR` replaces the
 * home directory default.
 */
export function getSettingsPaths(dir?: string): SettingsPaths {
  const base = dir ?? ENV.SETTINGS_DIR ?? join(os.homedir(), SETTINGS_DIR_NAME);
  return {
    dir: base,
    settingsFile: join(base, SETTINGS_FILE),
    legacyShortcutsFile: join(base, LEGACY_SHORTCUTS_FILE),
  };
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

async function readJson(path: string): Promise<unknown | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  return JSON.parse(raw);
}

async function readSettingsFile(paths: SettingsPaths): Promise<unknown> {
  const current = await readJson(paths.settingsFile);
  if (current !== undefined) return current;

  const legacy = await readJson(paths.legacyShortcutsFile);
  if (legacy !== undefined) {
    logger.info(`[Settings] Migrating legacy shortcuts from ${paths.legacyShortcutsFile}`);
    return { shortcuts: legacy };
  }
  return {};
}

/**
 * Load settings, falling back to defaults when the file is missing, unreadable
 * or invalid.
 */
export async function loadSettings(paths: SettingsPaths = getSettingsPaths()): Promise<AppSettings> {
  let data: unknown;
  try {
    data = await readSettingsFile(paths);
  } catch (error) {
    logger.warn(`[Settings] Could not read settings from ${paths.dir}, using defaults`, {
      detail: describeCause(error),
    });
    return createDefaultSettings();
  }

  const parsed = settingsFileSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn('[Settings] Invalid settings file, using defaults', parsed.error.issues);
    return createDefaultSettings();
  }

  return mergeWithDefaults(parsed.data);
}

export async function saveSettings(
  settings: AppSettings,
  paths: SettingsPaths = getSettingsPaths()
): Promise<void> {
  await fs.promises.mkdir(paths.dir, { recursive: true });
  await fs.promises.writeFile(paths.settingsFile, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  logger.debug(`[Settings] Saved to ${paths.settingsFile}`);
}

// ============================================
// Accessors
// ============================================

/** Key sequence bound to `action`, or `''` when none. */
export const getShortcut = (settings: AppSettings, action: string): string =>
  settings.shortcuts[action] ?? '';

export const setShortcuts = (settings: AppSettings, mapping: ShortcutMap): AppSettings => ({
  ...settings,
  shortcuts: { ...settings.shortcuts, ...mapping },
});

export const setFontSize = (settings: AppSettings, column: Column, size: number): AppSettings => ({
  ...settings,
  fontSizes: { ...settings.fontSizes, [column]: clampFontSize(size) },
});

export const setDisplay = <K extends keyof DisplaySettings>(
  settings: AppSettings,
  key: K,
  value: DisplaySettings[K]
): AppSettings => ({
  ...settings,
  display: { ...settings.display, [key]: value },
});

export const setLanguage = (settings: AppSettings, language: UiLanguage): AppSettings => ({
  ...settings,
  language,
});

/**
 * Switch the translation language used for error messages and labels.
 */
export async function applyLanguage(settings: AppSettings): Promise<void> {
  if (i18n.language === settings.language) return;
  await i18n.changeLanguage(settings.language);
}
