/**
 * Workspace Store - Zustand store for the open alignment document
 *
 * Owns the document, its command history and the selection, and exposes every
 * editing action. Document and history are mutable objects; subscribers watch
 * `revision` and the derived fields, which are refreshed after each action.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import i18n from '@/i18n';
import {
  type Column,
  type LanguagePair,
  type MoveDirection,
  type RowContent,
  type RowId,
} from '@/types/alignment';
import { type Command, type CommandLabel } from '@/types/history';
import { type AlignmentDocument, createDocument } from '@/services/alignment/document';
import * as operations from '@/services/alignment/operations';
import { type EditSession, beginEdit } from '@/services/alignment/editSession';
import { CommandStack } from '@/services/history/commandStack';
import {
  type DocumentStorage,
  type SaveOptions,
  documentStorage,
} from '@/services/persistence/documentStorage';
import {
  type FindOptions,
  type SearchMatch,
  type SearchOptions,
  findNext,
  replaceAll,
  replaceMatch,
} from '@/services/search/findReplace';
import {
  OperationError,
  getReadableErrorMessage,
  isAppError,
  ParseError,
  PersistenceError,
} from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

// ============================================
// State Types
// ============================================

export type WorkspaceStatus = 'idle' | 'loading' | 'saving';

interface WorkspaceState {
  document: AlignmentDocument | null;
  history: CommandStack | null;
  /** Incremented whenever the document or history changes. */
  revision: number;

  // Derived from document / history
  rowCount: number;
  dirty: boolean;
  canUndo: boolean;
  canRedo: boolean;
  undoLabel: CommandLabel | null;
  redoLabel: CommandLabel | null;
  languages: LanguagePair | null;
  originPath: string | null;

  // Selection
  currentRowId: RowId | null;
  currentColumn: Column;
  lastMatch: SearchMatch | null;

  status: WorkspaceStatus;
  /** Localized message of the last failed action. */
  error: string | null;
}

interface WorkspaceActions {
  newDocument: (languages: LanguagePair, rows?: RowContent[]) => void;
  openFile: (path: string) => Promise<void>;
  save: (options?: SaveOptions) => Promise<void>;
  saveAs: (path: string, options?: SaveOptions) => Promise<void>;
  close: () => void;

  select: (rowId: RowId | null, column?: Column) => void;

  split: (rowId: RowId, column: Column, offset: number) => Command;
  merge: (rowId: RowId, column: Column) => Command;
  move: (rowId: RowId, direction: MoveDirection) => Command;
  beginEdit: (rowId: RowId, column: Column) => EditSession;
  commitEdit: (session: EditSession, text: string) => Command | null;
  deleteEmptyRow: (rowId: RowId) => Command;

  findNext: (query: string, options?: Omit<FindOptions, 'from'>) => SearchMatch | null;
  replaceCurrent: (query: string, replacement: string, options?: SearchOptions) => Command | null;
  replaceAll: (query: string, replacement: string, options?: SearchOptions) => Command | null;

  undo: () => Command;
  redo: () => Command;

  clearError: () => void;
}

export type WorkspaceStore = WorkspaceState & WorkspaceActions;

export interface WorkspaceDependencies {
  storage?: DocumentStorage;
}

// ============================================
// Initial State
// ============================================

const initialState: WorkspaceState = {
  document: null,
  history: null,
  revision: 0,
  rowCount: 0,
  dirty: false,
  canUndo: false,
  canRedo: false,
  undoLabel: null,
  redoLabel: null,
  languages: null,
  originPath: null,
  currentRowId: null,
  currentColumn: 'source',
  lastMatch: null,
  status: 'idle',
  error: null,
};

type SelectionState = Pick<WorkspaceState, 'currentRowId' | 'currentColumn' | 'lastMatch'>;

type SelectionUpdate = (
  command: Command,
  document: AlignmentDocument
) => Partial<Omit<SelectionState, 'lastMatch'>>;

const deriveState = (document: AlignmentDocument, history: CommandStack) => ({
  rowCount: document.rowCount,
  dirty: document.dirty,
  canUndo: history.canUndo,
  canRedo: history.canRedo,
  undoLabel: history.undoLabel,
  redoLabel: history.redoLabel,
  languages: document.languages,
  originPath: document.originPath,
});

// ============================================
// Store
// ============================================

export const createWorkspaceStore = (deps: WorkspaceDependencies = {}) => {
  const storage = deps.storage ?? documentStorage;

  return createStore<WorkspaceStore>()(
    subscribeWithSelector((set, get) => {
      /** Record the failure for display, log it and rethrow. */
      const fail = (action: string, error: unknown): never => {
        const message = getReadableErrorMessage(error);
        if (isAppError(error) && !(error instanceof ParseError) && !(error instanceof PersistenceError)) {
          logger.warn(`[Workspace] ${action} rejected: ${message}`);
        } else {
          logger.error(`[Workspace] ${action} failed: ${message}`, error);
        }
        set({ error: message });
        throw error;
      };

      const requireIdleDocument = () => {
        const { document, history, status } = get();
        if (status !== 'idle') {
          throw new OperationError('DOCUMENT_BUSY');
        }
        if (!document || !history) {
          throw new OperationError('NO_DOCUMENT');
        }
        return { document, history };
      };

      const load = (document: AlignmentDocument, currentRowId: RowId | null) => {
        const history = new CommandStack(document);
        set((state) => ({
          ...initialState,
          ...deriveState(document, history),
          document,
          history,
          revision: state.revision + 1,
          currentRowId,
        }));
      };

      const refresh = (selection: Partial<SelectionState> = {}) => {
        const { document, history } = get();
        if (!document || !history) return;
        set((state) => ({
          ...deriveState(document, history),
          lastMatch: null,
          ...selection,
          revision: state.revision + 1,
          error: null,
        }));
      };

      /** Run an edit, record its command and refresh derived state. */
      const edit = <T extends Command | null>(
        action: string,
        run: (document: AlignmentDocument) => T,
        selectionFor: SelectionUpdate = () => ({})
      ): T => {
        try {
          const { document, history } = requireIdleDocument();
          const command = run(document);
          if (command) {
            history.apply(command);
            refresh(selectionFor(command, document));
          }
          return command;
        } catch (error) {
          return fail(action, error);
        }
      };

      // After undo/redo the selected row may be gone
      const keepSelectionIfPresent = (document: AlignmentDocument) => {
        const { currentRowId } = get();
        return currentRowId !== null && document.hasRow(currentRowId) ? currentRowId : null;
      };

      return {
        ...initialState,

        // File actions
        newDocument: (languages, rows = []) => {
          try {
            if (get().status !== 'idle') {
              throw new OperationError('DOCUMENT_BUSY');
            }
            const document = createDocument({ languages, rows });
            load(document, document.rowCount > 0 ? document.rowAt(0).id : null);
            logger.info(`[Workspace] New document (${languages.source} → ${languages.target})`);
          } catch (error) {
            fail('New document', error);
          }
        },

        openFile: async (path) => {
          if (get().status !== 'idle') {
            return fail('Open', new OperationError('DOCUMENT_BUSY'));
          }
          try {
            set({ status: 'loading', error: null });
            const document = await storage.open(path);
            load(document, document.rowCount > 0 ? document.rowAt(0).id : null);
          } catch (error) {
            set({ status: 'idle' });
            fail('Open', error);
          }
        },

        save: async (options) => {
          let path: string;
          try {
            const { document } = requireIdleDocument();
            if (!document.originPath) {
              throw new OperationError('NO_FILE_PATH');
            }
            path = document.originPath;
          } catch (error) {
            return fail('Save', error);
          }
          await get().saveAs(path, options);
        },

        saveAs: async (path, options) => {
          try {
            const { document, history } = requireIdleDocument();
            set({ status: 'saving', error: null });
            try {
              await storage.save(document, path, options);
              history.markClean();
            } finally {
              set({ status: 'idle' });
            }
            // Saving leaves the search position where it was
            refresh({ lastMatch: get().lastMatch });
          } catch (error) {
            fail('Save', error);
          }
        },

        close: () => {
          try {
            if (get().status === 'saving') {
              throw new OperationError('DOCUMENT_BUSY');
            }
            set((state) => ({ ...initialState, revision: state.revision + 1 }));
          } catch (error) {
            fail('Close', error);
          }
        },

        select: (rowId, column) => {
          const { document, currentColumn } = get();
          if (rowId !== null && !document?.hasRow(rowId)) return;
          set({ currentRowId: rowId, currentColumn: column ?? currentColumn, lastMatch: null });
        },

        // Edit actions
        split: (rowId, column, offset) =>
          edit(
            'Split',
            (document) => operations.split(document, rowId, column, offset),
            (command) => ({
              currentRowId: command.forward.kind === 'split' ? command.forward.newRowId : rowId,
              currentColumn: column,
            })
          ),

        merge: (rowId, column) =>
          edit('Merge', (document) => operations.merge(document, rowId, column), () => ({
            currentRowId: rowId,
            currentColumn: column,
          })),

        move: (rowId, direction) =>
          edit('Move', (document) => operations.move(document, rowId, direction), () => ({
            currentRowId: rowId,
          })),

        beginEdit: (rowId, column) => {
          try {
            const { document } = requireIdleDocument();
            const session = beginEdit(document, rowId, column);
            set({ currentRowId: rowId, currentColumn: column });
            return session;
          } catch (error) {
            return fail('Edit', error);
          }
        },

        commitEdit: (session, text) =>
          edit('Edit', (document) => {
            if (!session.belongsTo(document)) {
              throw new OperationError('STALE_EDIT_SESSION', { rowId: session.rowId, column: session.column });
            }
            return session.commit(text);
          }),

        deleteEmptyRow: (rowId) => {
          let index = -1;
          return edit(
            'Delete empty row',
            (document) => {
              index = document.indexOf(rowId);
              return operations.deleteEmptyRow(document, rowId);
            },
            // The row that took its place, or the new last row
            (_command, document) => {
              const next = Math.min(index, document.rowCount - 1);
              return { currentRowId: next >= 0 ? document.rowAt(next).id : null };
            }
          );
        },

        // Find & replace
        findNext: (query, options = {}) => {
          try {
            const { document } = requireIdleDocument();
            const { lastMatch, currentRowId, currentColumn } = get();
            const from = lastMatch
              ? { rowId: lastMatch.rowId, column: lastMatch.column, offset: options.backward ? lastMatch.start : lastMatch.end }
              : currentRowId !== null
                ? { rowId: currentRowId, column: currentColumn, offset: 0 }
                : undefined;

            const match = findNext(document, query, { ...options, from });
            if (match) {
              set({ lastMatch: match, currentRowId: match.rowId, currentColumn: match.column });
            } else {
              set({ lastMatch: null });
            }
            return match;
          } catch (error) {
            return fail('Find', error);
          }
        },

        replaceCurrent: (query, replacement, options = {}) => {
          const match = get().lastMatch;
          if (!match) {
            get().findNext(query, options);
            return null;
          }

          const before = get().document?.textOf(match.rowId, match.column) ?? '';
          const command = edit('Replace', (document) => replaceMatch(document, match, query, replacement, options));

          // Continue after the inserted text
          const after = get().document?.textOf(match.rowId, match.column) ?? '';
          set({
            lastMatch: { ...match, end: match.end + (after.length - before.length) },
          });
          get().findNext(query, options);
          return command;
        },

        replaceAll: (query, replacement, options = {}) =>
          edit('Replace all', (document) => replaceAll(document, query, replacement, options)),

        // History
        undo: () => {
          try {
            const { document, history } = requireIdleDocument();
            const command = history.undo();
            refresh({ currentRowId: keepSelectionIfPresent(document) });
            return command;
          } catch (error) {
            return fail('Undo', error);
          }
        },

        redo: () => {
          try {
            const { document, history } = requireIdleDocument();
            const command = history.redo();
            refresh({ currentRowId: keepSelectionIfPresent(document) });
            return command;
          } catch (error) {
            return fail('Redo', error);
          }
        },

        clearError: () => set({ error: null }),
      };
    })
  );
};

export const workspaceStore = createWorkspaceStore();

// ============================================
// Selector helpers
// ============================================

/** Select only document-level state */
export const selectDocumentState = (state: WorkspaceStore) => ({
  rowCount: state.rowCount,
  dirty: state.dirty,
  languages: state.languages,
  originPath: state.originPath,
});

/** Select only selection state */
export const selectSelection = (state: WorkspaceStore) => ({
  currentRowId: state.currentRowId,
  currentColumn: state.currentColumn,
});

/** Menu text for the undo entry, e.g. "Undo Split" */
export const selectUndoText = (state: WorkspaceStore): string | null =>
  state.undoLabel
    ? i18n.t('undo', { ns: 'history', action: i18n.t(state.undoLabel, { ns: 'history' }) })
    : null;

export const selectRedoText = (state: WorkspaceStore): string | null =>
  state.redoLabel
    ? i18n.t('redo', { ns: 'history', action: i18n.t(state.redoLabel, { ns: 'history' }) })
    : null;
