import { describe, it, expect, afterEach } from 'vitest';
import {
  HistoryError,
  OperationError,
  ParseError,
  PersistenceError,
  getReadableErrorMessage,
  isAppError,
  isOperationError,
} from '../errors';
import i18n from '@/i18n';

describe('errors', () => {
  afterEach(async () => {
    await i18n.changeLanguage('en-US');
  });

  it('builds messages from the error context', () => {
    expect(new OperationError('NO_ROW_BELOW', { rowId: 3 }).message).toBe(
      'Row 3 is the last row; there is no row below to merge with.'
    );
    expect(new OperationError('INVALID_SPLIT_POINT', { rowId: 1, offset: 0 }).message).toBe(
      'Cannot split row 1 at offset 0: the split point must fall strictly inside the text.'
    );
    expect(new OperationError('AT_BOUNDARY', { rowId: 0, direction: 'up' }).message).toBe(
      'Row 0 cannot move up: it is already at the edge.'
    );
    expect(new ParseError('MALFORMED_XML', { line: 2, col: 5, detail: 'Unexpected close tag' }).message).toBe(
      'The file is not well-formed XML (line 2, column 5): Unexpected close tag'
    );
  });

  it('uses the positional message for index lookups', () => {
    expect(new OperationError('NOT_FOUND', { index: 7 }).message).toBe('There is no row at position 7.');
    expect(new OperationError('NOT_FOUND', { rowId: 7 }).message).toBe('Row 7 no longer exists.');
  });

  it('names each family and keeps the cause', () => {
    const cause = new Error('EACCES');
    const error = new PersistenceError('WRITE_FAILED', { path: '/x.tmx', detail: 'EACCES' }, { cause });

    expect(error.name).toBe('PersistenceError');
    expect(error.cause).toBe(cause);
    expect(new HistoryError('NOTHING_TO_REDO').name).toBe('HistoryError');
  });

  it('narrows by family and code', () => {
    const error = new OperationError('ROW_NOT_EMPTY', { rowId: 2 });
    expect(isAppError(error)).toBe(true);
    expect(isOperationError(error)).toBe(true);
    expect(isOperationError(error, 'ROW_NOT_EMPTY')).toBe(true);
    expect(isOperationError(error, 'NOT_FOUND')).toBe(false);
    expect(isAppError(new Error('plain'))).toBe(false);
  });

  it('re-translates messages in the current language', async () => {
    const error = new OperationError('NO_ROW_BELOW', { rowId: 4 });
    await i18n.changeLanguage('ja-JP');
    expect(getReadableErrorMessage(error)).toBe('行 4 は最後の行です。結合する下の行がありません。');
  });

  it('describes foreign values', () => {
    expect(getReadableErrorMessage(new Error('boom'))).toBe('boom');
    expect(getReadableErrorMessage('text')).toBe('text');
  });
});
