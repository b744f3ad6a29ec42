import { type Column } from './alignment';
import { type UiLanguage } from '@/i18n';

export const ACTION_NAMES = [
  'file_open',
  'file_save',
  'file_save_as',
  'file_quit',
  'edit_undo',
  'edit_redo',
  'edit_find',
  'op_split',
  'op_merge',
  'op_move_up',
  'op_move_down',
  'op_edit_cell',
  'op_delete_empty_row',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

/** Action name → key sequence, e.g. `"Ctrl+Shift+S"`. */
export type ShortcutMap = Record<string, string>;

export interface DisplaySettings {
  wordWrap: boolean;
  /** Share of the width given to the source column, in (0, 1). */
  columnRatio: number;
}

export interface AppSettings {
  shortcuts: ShortcutMap;
  fontSizes: Record<Column, number>;
  display: DisplaySettings;
  language: UiLanguage;
}
