/**
 * Error classes for the alignment core.
 *
 * Every error carries a machine-readable `code` and the context needed to act
 * on it (row id, offset, path). Messages are localized through i18next at the
 * moment the error is raised.
 */

import i18n from '@/i18n';
import { type Column, type MoveDirection, type RowId } from '@/types/alignment';

export type ParseErrorCode =
  | 'MALFORMED_XML'
  | 'NOT_TMX'
  | 'MISSING_HEADER'
  | 'MISSING_BODY'
  | 'INSUFFICIENT_LANGUAGES'
  | 'UNSUPPORTED_ENCODING';

export type OperationErrorCode =
  | 'INVALID_SPLIT_POINT'
  | 'NO_ROW_BELOW'
  | 'AT_BOUNDARY'
  | 'NOT_FOUND'
  | 'ROW_NOT_EMPTY'
  | 'STALE_EDIT_SESSION'
  | 'INVALID_SEARCH_PATTERN'
  | 'DOCUMENT_BUSY'
  | 'NO_DOCUMENT'
  | 'NO_FILE_PATH';

export type HistoryErrorCode = 'NOTHING_TO_UNDO' | 'NOTHING_TO_REDO';

export type PersistenceErrorCode =
  | 'BACKUP_FAILED'
  | 'WRITE_FAILED'
  | 'RENAME_FAILED'
  | 'READ_FAILED'
  | 'ABORTED';

export type AppErrorCode = ParseErrorCode | OperationErrorCode | HistoryErrorCode | PersistenceErrorCode;

export interface ErrorContext {
  rowId?: RowId;
  index?: number;
  offset?: number;
  column?: Column;
  direction?: MoveDirection;
  path?: string;
  line?: number;
  col?: number;
  count?: number;
  /** Underlying message (XML parser, file system) */
  detail?: string;
}

/**
 * Base class of every error the core raises on purpose.
 */
export class AppError<C extends AppErrorCode = AppErrorCode> extends Error {
  code: C;
  context: ErrorContext;

  constructor(code: C, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(translateError(code, context), options);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
  }
}

/** The input could not be read as a TMX document. Fatal to the load. */
export class ParseError extends AppError<ParseErrorCode> {
  constructor(code: ParseErrorCode, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(code, context, options);
    this.name = 'ParseError';
  }
}

/** An edit was rejected before touching the document. */
export class OperationError extends AppError<OperationErrorCode> {
  constructor(code: OperationErrorCode, context: ErrorContext = {}) {
    super(code, context);
    this.name = 'OperationError';
  }
}

/** Undo or redo requested with nothing on that side of the cursor. */
export class HistoryError extends AppError<HistoryErrorCode> {
  constructor(code: HistoryErrorCode) {
    super(code);
    this.name = 'HistoryError';
  }
}

/** Reading or writing a file failed. The file on disk is left as it was. */
export class PersistenceError extends AppError<PersistenceErrorCode> {
  constructor(code: PersistenceErrorCode, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(code, context, options);
    this.name = 'PersistenceError';
  }
}

function translateError(code: AppErrorCode, context: ErrorContext): string {
  // Index lookups use the "_index" message variant
  const variant = context.rowId === undefined && context.index !== undefined ? 'index' : undefined;
  return i18n.t(code, { ns: 'errors', ...context, context: variant });
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const isOperationError = (error: unknown, code?: OperationErrorCode): error is OperationError =>
  error instanceof OperationError && (code === undefined || error.code === code);

/**
 * Extracts a human-readable error message from any thrown value.
 * Core errors are re-translated so a language switch after the throw is honored.
 */
export function getReadableErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return translateError(error.code, error.context);
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Message of an unknown caught value, for the `detail` context field. */
export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
