/** Session-scoped row identifier. Never reused within a document. */
export type RowId = number;

export type Column = 'source' | 'target';

export type MoveDirection = 'up' | 'down';

export interface AlignmentRow {
  readonly id: RowId;
  readonly source: string;
  readonly target: string;
}

/** Row content before an id has been assigned. */
export interface RowContent {
  source: string;
  target: string;
}

export interface LanguagePair {
  source: string;
  target: string;
}

export const otherColumn = (column: Column): Column => (column === 'source' ? 'target' : 'source');

export const oppositeDirection = (direction: MoveDirection): MoveDirection =>
  direction === 'up' ? 'down' : 'up';
