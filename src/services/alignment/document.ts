/**
 * Alignment Document
 *
 * Ordered collection of aligned source/target rows plus the language pair,
 * origin path and dirty flag. The public class only exposes reads; the
 * mutation surface is the module-internal `DocumentMutator`, reachable through
 * `getMutator()` and used by edit operations and persistence alone.
 */

import {
  type AlignmentRow,
  type Column,
  type LanguagePair,
  type RowContent,
  type RowId,
} from '@/types/alignment';
import { OperationError } from '@/services/utils/errors';
import { createRowIdAllocator, type RowIdAllocator } from '@/services/utils/id';

/** Column delimiter of tabular copy/paste; never allowed inside cell text. */
export const CELL_DELIMITER = '\t';

/**
 * Replace the cell delimiter with a single space so cell text can be joined
 * into tabular form and split back without ambiguity.
 */
export const sanitizeCellText = (text: string): string =>
  text.includes(CELL_DELIMITER) ? text.split(CELL_DELIMITER).join(' ') : text;

export const createRow = (id: RowId, content: RowContent): AlignmentRow =>
  Object.freeze({
    id,
    source: sanitizeCellText(content.source),
    target: sanitizeCellText(content.target),
  });

export interface DocumentState {
  rows: AlignmentRow[];
  byId: Map<RowId, AlignmentRow>;
  // Lazily rebuilt after inserts/removals; swaps patch it in place
  positions: Map<RowId, number> | null;
  ids: RowIdAllocator;
  languages: LanguagePair;
  originPath: string | null;
  dirty: boolean;
}

const states = new WeakMap<AlignmentDocument, DocumentState>();

function stateOf(doc: AlignmentDocument): DocumentState {
  const state = states.get(doc);
  if (!state) {
    throw new Error('AlignmentDocument was not created through createDocument()');
  }
  return state;
}

function positionsOf(state: DocumentState): Map<RowId, number> {
  if (!state.positions) {
    const positions = new Map<RowId, number>();
    state.rows.forEach((row, index) => positions.set(row.id, index));
    state.positions = positions;
  }
  return state.positions;
}

export class AlignmentDocument {
  private constructor(state: DocumentState) {
    states.set(this, state);
  }

  /** @internal */
  static fromState(state: DocumentState): AlignmentDocument {
    return new AlignmentDocument(state);
  }

  get rowCount(): number {
    return stateOf(this).rows.length;
  }

  get sourceLang(): string {
    return stateOf(this).languages.source;
  }

  get targetLang(): string {
    return stateOf(this).languages.target;
  }

  get languages(): LanguagePair {
    return { ...stateOf(this).languages };
  }

  get originPath(): string | null {
    return stateOf(this).originPath;
  }

  get dirty(): boolean {
    return stateOf(this).dirty;
  }

  languageOf(column: Column): string {
    return column === 'source' ? this.sourceLang : this.targetLang;
  }

  rowAt(index: number): AlignmentRow {
    const row = Number.isInteger(index) ? stateOf(this).rows[index] : undefined;
    if (!row) {
      throw new OperationError('NOT_FOUND', { index });
    }
    return row;
  }

  hasRow(id: RowId): boolean {
    return stateOf(this).byId.has(id);
  }

  findRow(id: RowId): AlignmentRow {
    const row = stateOf(this).byId.get(id);
    if (!row) {
      throw new OperationError('NOT_FOUND', { rowId: id });
    }
    return row;
  }

  indexOf(id: RowId): number {
    const state = stateOf(this);
    const index = positionsOf(state).get(id);
    if (index === undefined) {
      throw new OperationError('NOT_FOUND', { rowId: id });
    }
    return index;
  }

  textOf(id: RowId, column: Column): string {
    return this.findRow(id)[column];
  }

  /** Shallow copy of the rows in canonical order. */
  rows(): AlignmentRow[] {
    return stateOf(this).rows.slice();
  }

  /** Rows in [start, end), for windowed rendering. */
  slice(start: number, end?: number): AlignmentRow[] {
    return stateOf(this).rows.slice(start, end);
  }
}

/**
 * Mutation entry points. Edit operations are the only callers that change
 * rows; anything else would desynchronize the command history.
 */
export class DocumentMutator {
  constructor(private state: DocumentState) {}

  allocateId(): RowId {
    return this.state.ids.next();
  }

  insertRow(index: number, row: AlignmentRow): void {
    if (this.state.byId.has(row.id)) {
      throw new Error(`Duplicate row id ${row.id}`);
    }
    this.state.rows.splice(index, 0, row);
    this.state.byId.set(row.id, row);
    this.state.positions = null;
  }

  removeRow(index: number): AlignmentRow {
    const [row] = this.state.rows.splice(index, 1);
    if (!row) {
      throw new OperationError('NOT_FOUND', { index });
    }
    this.state.byId.delete(row.id);
    this.state.positions = null;
    return row;
  }

  swapRows(a: number, b: number): void {
    const rows = this.state.rows;
    const first = rows[a];
    const second = rows[b];
    if (!first || !second) {
      throw new OperationError('NOT_FOUND', { index: first ? b : a });
    }
    rows[a] = second;
    rows[b] = first;
    if (this.state.positions) {
      this.state.positions.set(second.id, a);
      this.state.positions.set(first.id, b);
    }
  }

  setText(id: RowId, column: Column, text: string): AlignmentRow {
    const current = this.state.byId.get(id);
    if (!current) {
      throw new OperationError('NOT_FOUND', { rowId: id });
    }
    const next = createRow(id, { ...current, [column]: text });
    const index = positionsOf(this.state).get(id);
    if (index === undefined) {
      throw new OperationError('NOT_FOUND', { rowId: id });
    }
    this.state.rows[index] = next;
    this.state.byId.set(id, next);
    return next;
  }

  markDirty(): void {
    this.state.dirty = true;
  }

  setDirty(dirty: boolean): void {
    this.state.dirty = dirty;
  }

  /** Called once the document has been persisted to `path`. */
  markSaved(path: string): void {
    this.state.originPath = path;
    this.state.dirty = false;
  }
}

export function getMutator(doc: AlignmentDocument): DocumentMutator {
  return new DocumentMutator(stateOf(doc));
}

export interface CreateDocumentOptions {
  rows?: RowContent[];
  languages: LanguagePair;
  originPath?: string | null;
}

/**
 * Build a document, assigning ids 0, 1, 2, … in row order.
 */
export function createDocument(options: CreateDocumentOptions): AlignmentDocument {
  const ids = createRowIdAllocator();
  const rows = (options.rows || []).map((content) => createRow(ids.next(), content));
  return AlignmentDocument.fromState({
    rows,
    byId: new Map(rows.map((row) => [row.id, row])),
    positions: null,
    ids,
    languages: { source: options.languages.source, target: options.languages.target },
    originPath: options.originPath ?? null,
    dirty: false,
  });
}

export const createEmptyDocument = (languages: LanguagePair): AlignmentDocument =>
  createDocument({ languages });
