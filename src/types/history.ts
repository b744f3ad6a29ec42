import { type AlignmentRow, type Column, type MoveDirection, type RowId } from '@/types/alignment';

/**
 * Cut `rowId`'s column at `offset`. The text after it moves to a new row
 * `newRowId` inserted below, whose other column gets `otherText`. The `skip`
 * characters at the cut belong to neither side (the separator a merge added).
 */
export interface SplitOperation {
  kind: 'split';
  rowId: RowId;
  column: Column;
  offset: number;
  skip: number;
  newRowId: RowId;
  otherText: string;
}

/**
 * Append `separator` and the next row's column text to `rowId`, removing the
 * next row.
 */
export interface MergeOperation {
  kind: 'merge';
  rowId: RowId;
  column: Column;
  separator: string;
}

export interface MoveOperation {
  kind: 'move';
  rowId: RowId;
  direction: MoveDirection;
}

export interface SetTextOperation {
  kind: 'setText';
  rowId: RowId;
  column: Column;
  text: string;
}

export interface InsertRowOperation {
  kind: 'insertRow';
  index: number;
  row: AlignmentRow;
}

export interface DeleteRowOperation {
  kind: 'deleteRow';
  rowId: RowId;
}

export interface BatchOperation {
  kind: 'batch';
  operations: EditOperation[];
}

export type EditOperation =
  | SplitOperation
  | MergeOperation
  | MoveOperation
  | SetTextOperation
  | InsertRowOperation
  | DeleteRowOperation
  | BatchOperation;

export type CommandLabel =
  | 'split'
  | 'merge'
  | 'moveUp'
  | 'moveDown'
  | 'editText'
  | 'deleteEmptyRow'
  | 'replace'
  | 'replaceAll';

export interface Command {
  label: CommandLabel;
  forward: EditOperation;
  inverse: EditOperation;
  affectedRowIds: RowId[];
}
