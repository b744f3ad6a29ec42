/**
 * Edit Operations
 *
 * Structural and text edits over an AlignmentDocument. Every public operation
 * validates its preconditions first, so a rejected call leaves the document
 * untouched, then applies an exact primitive and returns the Command holding
 * the forward primitive and its inverse.
 */

import {
  type AlignmentRow,
  type Column,
  type MoveDirection,
  type RowId,
  otherColumn,
  oppositeDirection,
} from '@/types/alignment';
import {
  type Command,
  type EditOperation,
  type MergeOperation,
  type MoveOperation,
  type SplitOperation,
} from '@/types/history';
import { type AlignmentDocument, createRow, getMutator } from './document';
import { OperationError } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

// ============================================
// Helpers
// ============================================

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number) => code >= 0xdc00 && code <= 0xdfff;

/**
 * True when `offset` would cut a surrogate pair in half.
 */
export function isInsideSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) return false;
  return isHighSurrogate(text.charCodeAt(offset - 1)) && isLowSurrogate(text.charCodeAt(offset));
}

const withColumn = (column: Column, text: string, other: string) =>
  column === 'source' ? { source: text, target: other } : { source: other, target: text };

// ============================================
// Primitive application
// ============================================

/**
 * Apply one primitive operation and return the operation that reverses it.
 * Validation happens before the first mutation; a failing batch member rolls
 * back the members already applied.
 */
export function applyOperation(doc: AlignmentDocument, op: EditOperation): EditOperation {
  const mutator = getMutator(doc);

  switch (op.kind) {
    case 'split': {
      const index = doc.indexOf(op.rowId);
      const row = doc.rowAt(index);
      const text = row[op.column];
      if (op.offset < 0 || op.skip < 0 || op.offset + op.skip > text.length) {
        throw new OperationError('INVALID_SPLIT_POINT', {
          rowId: op.rowId,
          column: op.column,
          offset: op.offset,
        });
      }
      if (doc.hasRow(op.newRowId)) {
        throw new Error(`Row id ${op.newRowId} is already in use`);
      }

      const before = text.slice(0, op.offset);
      const separator = text.slice(op.offset, op.offset + op.skip);
      const after = text.slice(op.offset + op.skip);

      mutator.setText(op.rowId, op.column, before);
      mutator.insertRow(index + 1, createRow(op.newRowId, withColumn(op.column, after, op.otherText)));
      mutator.markDirty();

      return { kind: 'merge', rowId: op.rowId, column: op.column, separator };
    }

    case 'merge': {
      const index = doc.indexOf(op.rowId);
      if (index >= doc.rowCount - 1) {
        throw new OperationError('NO_ROW_BELOW', { rowId: op.rowId });
      }
      const row = doc.rowAt(index);
      const below = doc.rowAt(index + 1);
      const left = row[op.column];

      mutator.setText(op.rowId, op.column, left + op.separator + below[op.column]);
      mutator.removeRow(index + 1);
      mutator.markDirty();

      return {
        kind: 'split',
        rowId: op.rowId,
        column: op.column,
        offset: left.length,
        skip: op.separator.length,
        newRowId: below.id,
        otherText: below[otherColumn(op.column)],
      };
    }

    case 'move': {
      const index = doc.indexOf(op.rowId);
      const neighbor = op.direction === 'up' ? index - 1 : index + 1;
      if (neighbor < 0 || neighbor >= doc.rowCount) {
        throw new OperationError('AT_BOUNDARY', { rowId: op.rowId, direction: op.direction });
      }

      mutator.swapRows(index, neighbor);
      mutator.markDirty();

      return { kind: 'move', rowId: op.rowId, direction: oppositeDirection(op.direction) };
    }

    case 'setText': {
      const previous = doc.textOf(op.rowId, op.column);

      mutator.setText(op.rowId, op.column, op.text);
      mutator.markDirty();

      return { kind: 'setText', rowId: op.rowId, column: op.column, text: previous };
    }

    case 'insertRow': {
      if (!Number.isInteger(op.index) || op.index < 0 || op.index > doc.rowCount) {
        throw new OperationError('NOT_FOUND', { index: op.index });
      }
      if (doc.hasRow(op.row.id)) {
        throw new Error(`Row id ${op.row.id} is already in use`);
      }

      mutator.insertRow(op.index, createRow(op.row.id, op.row));
      mutator.markDirty();

      return { kind: 'deleteRow', rowId: op.row.id };
    }

    case 'deleteRow': {
      const index = doc.indexOf(op.rowId);

      const row = mutator.removeRow(index);
      mutator.markDirty();

      return { kind: 'insertRow', index, row };
    }

    case 'batch': {
      const inverses: EditOperation[] = [];
      try {
        for (const member of op.operations) {
          inverses.push(applyOperation(doc, member));
        }
      } catch (error) {
        for (const inverse of inverses.reverse()) {
          applyOperation(doc, inverse);
        }
        throw error;
      }
      return { kind: 'batch', operations: inverses.reverse() };
    }
  }
}

// ============================================
// Public operations
// ============================================

/**
 * Split a cell at `offset`: the text before it stays, the rest moves into a
 * new row inserted directly below with an empty other column.
 */
export function split(doc: AlignmentDocument, rowId: RowId, column: Column, offset: number): Command {
  const text = doc.textOf(rowId, column);
  if (
    !Number.isInteger(offset) ||
    offset <= 0 ||
    offset >= text.length ||
    isInsideSurrogatePair(text, offset)
  ) {
    throw new OperationError('INVALID_SPLIT_POINT', { rowId, column, offset });
  }

  const forward: SplitOperation = {
    kind: 'split',
    rowId,
    column,
    offset,
    skip: 0,
    newRowId: getMutator(doc).allocateId(),
    otherText: '',
  };
  const inverse = applyOperation(doc, forward);
  logger.debug(`[Operations] Split row ${rowId} (${column}) at ${offset} into row ${forward.newRowId}`);

  return { label: 'split', forward, inverse, affectedRowIds: [rowId, forward.newRowId] };
}

/**
 * Separator placed between two merged cells: one space when both sides have
 * text and neither already has whitespace at the join.
 */
export function joinSeparator(left: string, right: string): string {
  if (!left || !right) return '';
  return /\s$/.test(left) || /^\s/.test(right) ? '' : ' ';
}

/**
 * Append the same column of the row below to this cell and remove the row
 * below. The texts are joined by `joinSeparator`.
 */
export function merge(doc: AlignmentDocument, rowId: RowId, column: Column): Command {
  const index = doc.indexOf(rowId);
  if (index >= doc.rowCount - 1) {
    throw new OperationError('NO_ROW_BELOW', { rowId });
  }
  const below = doc.rowAt(index + 1);

  const forward: MergeOperation = {
    kind: 'merge',
    rowId,
    column,
    separator: joinSeparator(doc.textOf(rowId, column), below[column]),
  };
  const inverse = applyOperation(doc, forward);
  logger.debug(`[Operations] Merged row ${below.id} into row ${rowId} (${column})`);

  return { label: 'merge', forward, inverse, affectedRowIds: [rowId, below.id] };
}

/**
 * Swap a whole row (both columns) with its neighbour.
 */
export function move(doc: AlignmentDocument, rowId: RowId, direction: MoveDirection): Command {
  const index = doc.indexOf(rowId);
  const neighborIndex = direction === 'up' ? index - 1 : index + 1;
  if (neighborIndex < 0 || neighborIndex >= doc.rowCount) {
    throw new OperationError('AT_BOUNDARY', { rowId, direction });
  }
  const neighbor = doc.rowAt(neighborIndex);

  const forward: MoveOperation = { kind: 'move', rowId, direction };
  const inverse = applyOperation(doc, forward);
  logger.debug(`[Operations] Moved row ${rowId} ${direction}`);

  return {
    label: direction === 'up' ? 'moveUp' : 'moveDown',
    forward,
    inverse,
    affectedRowIds: [rowId, neighbor.id],
  };
}

export const isEmptyRow = (row: AlignmentRow): boolean =>
  row.source.trim() === '' && row.target.trim() === '';

/**
 * Remove a row whose source and target are both blank.
 */
export function deleteEmptyRow(doc: AlignmentDocument, rowId: RowId): Command {
  const row = doc.findRow(rowId);
  if (!isEmptyRow(row)) {
    throw new OperationError('ROW_NOT_EMPTY', { rowId });
  }

  const forward: EditOperation = { kind: 'deleteRow', rowId };
  const inverse = applyOperation(doc, forward);
  logger.debug(`[Operations] Deleted empty row ${rowId}`);

  return { label: 'deleteEmptyRow', forward, inverse, affectedRowIds: [rowId] };
}
