/**
 * tmx-aligner
 *
 * Headless core of a bilingual TMX alignment editor: TMX 1.4b codec, the
 * alignment document, reversible edit operations with undo history, atomic
 * persistence and the workspace store a presentation layer binds to.
 */

export * from './services/tmx';
export * from './services/alignment';
export { CommandStack } from './services/history/commandStack';
export {
  BACKUP_SUFFIX,
  DocumentStorage,
  documentStorage,
  nodeFileSystem,
  type FileSystemAdapter,
  type SaveOptions,
} from './services/persistence/documentStorage';
export {
  countMatches,
  createSearchRegex,
  findNext,
  replaceAll,
  replaceInText,
  replaceMatch,
  type FindOptions,
  type SearchCursor,
  type SearchMatch,
  type SearchOptions,
  type SearchScope,
} from './services/search/findReplace';
export {
  createWorkspaceStore,
  selectDocumentState,
  selectRedoText,
  selectSelection,
  selectUndoText,
  workspaceStore,
  type WorkspaceDependencies,
  type WorkspaceStatus,
  type WorkspaceStore,
} from './store/workspaceStore';
export { createLogStore, type LogStore } from './store/logStore';
export {
  DEFAULT_FONT_SIZE,
  MAX_FONT_SIZE,
  MIN_FONT_SIZE,
  applyLanguage,
  createDefaultSettings,
  getSettingsPaths,
  getShortcut,
  loadSettings,
  saveSettings,
  setDisplay,
  setFontSize,
  setLanguage,
  setShortcuts,
  type SettingsPaths,
} from './config/settings';
export { APP_NAME, APP_VERSION } from './config';
export {
  AppError,
  HistoryError,
  OperationError,
  ParseError,
  PersistenceError,
  getReadableErrorMessage,
  isAppError,
  isOperationError,
  type AppErrorCode,
  type ErrorContext,
} from './services/utils/errors';
export { LogLevel, Logger, logger, type LogEntry } from './services/utils/logger';
export { default as i18n, SUPPORTED_LANGUAGES, type UiLanguage } from './i18n';
export * from './types/alignment';
export type * from './types/history';
export { ACTION_NAMES, type ActionName, type AppSettings, type DisplaySettings } from './types/settings';
