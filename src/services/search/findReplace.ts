/**
 * Find & Replace
 *
 * Searches cell text in row order (source before target within a row), with
 * plain or regex patterns, case and whole-word options and a column filter.
 * Replacements go through the edit primitives so they are undoable.
 */

import { type Column, type RowId } from '@/types/alignment';
import { type Command, type EditOperation, type SetTextOperation } from '@/types/history';
import { type AlignmentDocument, sanitizeCellText } from '@/services/alignment/document';
import { applyOperation } from '@/services/alignment/operations';
import { OperationError, describeCause } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

// ============================================
// Types
// ============================================

export type SearchScope = Column | 'both';

export interface SearchOptions {
  /** Treat the query as a regular expression (replacement supports $1, $2 …) */
  isRegex?: boolean;
  caseSensitive?: boolean;
  /** Whole word matching (only in non-regex mode) */
  wholeWord?: boolean;
  scope?: SearchScope;
}

export interface FindOptions extends SearchOptions {
  backward?: boolean;
  /** Continue from the other end when the document end is reached. Default true. */
  wrap?: boolean;
  /** Cell and character offset the search starts from. */
  from?: SearchCursor;
}

export interface SearchCursor {
  rowId: RowId;
  column: Column;
  offset: number;
}

export interface SearchMatch {
  rowId: RowId;
  column: Column;
  start: number;
  end: number;
  text: string;
}

interface CellMatch {
  start: number;
  end: number;
}

// ============================================
// Pattern handling
// ============================================

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile the query once for reuse across every cell.
 */
export function createSearchRegex(query: string, options: SearchOptions = {}): RegExp {
  const flags = options.caseSensitive ? 'g' : 'gi';

  if (options.isRegex) {
    try {
      return new RegExp(query, flags);
    } catch (error) {
      throw new OperationError('INVALID_SEARCH_PATTERN', { detail: describeCause(error) });
    }
  }

  let escaped = escapeRegExp(query);
  if (options.wholeWord) {
    escaped = `\\b${escaped}\\b`;
  }
  return new RegExp(escaped, flags);
}

/** In plain mode `$` in the replacement is literal. */
const replacementPattern = (replacement: string, options: SearchOptions) =>
  options.isRegex ? replacement : replacement.replace(/\$/g, '$$$$');

// Empty matches (e.g. /x*/ between characters) are never reported
function matchesIn(text: string, regex: RegExp): CellMatch[] {
  const found: CellMatch[] = [];
  for (const match of text.matchAll(regex)) {
    const start = match.index ?? 0;
    if (match[0].length > 0) {
      found.push({ start, end: start + match[0].length });
    }
  }
  return found;
}

/**
 * Expand the replacement for the match starting at `start`, evaluating
 * anchors, lookarounds and `$\``/`$'` against the whole cell text.
 */
function expandAt(text: string, regex: RegExp, start: number, pattern: string): string | null {
  const sticky = new RegExp(regex.source, regex.flags.replace('g', '') + 'y');
  sticky.lastIndex = start;
  const match = sticky.exec(text);
  if (!match) return null;

  sticky.lastIndex = start;
  const replaced = text.replace(sticky, pattern);
  const tail = text.length - start - match[0].length;
  return replaced.slice(start, replaced.length - tail);
}

function replaceMatches(text: string, regex: RegExp, matches: CellMatch[], pattern: string): string {
  let result = '';
  let last = 0;
  for (const match of matches) {
    result += text.slice(last, match.start) + (expandAt(text, regex, match.start, pattern) ?? '');
    last = match.end;
  }
  return result + text.slice(last);
}

/**
 * Replace the single occurrence at [start, end). Returns null when the text
 * no longer matches there.
 */
export function replaceInText(
  text: string,
  start: number,
  end: number,
  query: string,
  replacement: string,
  options: SearchOptions = {}
): string | null {
  const regex = createSearchRegex(query, options);
  const match = matchesIn(text, regex).find((m) => m.start === start && m.end === end);
  if (!match) return null;
  return replaceMatches(text, regex, [match], replacementPattern(replacement, options));
}

// ============================================
// Find
// ============================================

const columnsFor = (scope: SearchScope = 'both'): Column[] =>
  scope === 'both' ? ['source', 'target'] : [scope];

const COLUMN_SLOT: Record<Column, number> = { source: 0, target: 1 };

/**
 * Find the next (or previous) match from `options.from`. Without a cursor the
 * search starts at the first cell, or the end of the last cell when searching
 * backward.
 */
export function findNext(doc: AlignmentDocument, query: string, options: FindOptions = {}): SearchMatch | null {
  if (!query || doc.rowCount === 0) return null;

  const regex = createSearchRegex(query, options);
  const columns = columnsFor(options.scope);
  const wrap = options.wrap ?? true;
  const backward = options.backward ?? false;
  const total = doc.rowCount * 2;

  const startCell = options.from
    ? doc.indexOf(options.from.rowId) * 2 + COLUMN_SLOT[options.from.column]
    : backward
      ? total - 1
      : 0;
  const startOffset = options.from ? options.from.offset : backward ? Number.POSITIVE_INFINITY : 0;

  const search = (cell: number, accept: (m: CellMatch) => boolean): SearchMatch | null => {
    const row = doc.rowAt(Math.floor(cell / 2));
    const column: Column = cell % 2 === 0 ? 'source' : 'target';
    if (!columns.includes(column)) return null;

    const text = row[column];
    const candidates = matchesIn(text, regex).filter(accept);
    const match = backward ? candidates[candidates.length - 1] : candidates[0];
    if (!match) return null;
    return { rowId: row.id, column, start: match.start, end: match.end, text: text.slice(match.start, match.end) };
  };

  const any = () => true;
  const step = backward ? -1 : 1;

  // Remainder of the starting cell
  const first = search(startCell, (m) => (backward ? m.start < startOffset : m.start >= startOffset));
  if (first) return first;

  for (let cell = startCell + step; cell >= 0 && cell < total; cell += step) {
    const found = search(cell, any);
    if (found) return found;
  }

  if (!wrap) return null;

  for (let cell = backward ? total - 1 : 0; cell !== startCell; cell += step) {
    const found = search(cell, any);
    if (found) return found;
  }

  // The part of the starting cell skipped at the beginning
  return search(startCell, (m) => (backward ? m.start >= startOffset : m.start < startOffset));
}

/**
 * Count occurrences per column, for status display.
 */
export function countMatches(
  doc: AlignmentDocument,
  query: string,
  options: SearchOptions = {}
): Record<Column, number> {
  const counts: Record<Column, number> = { source: 0, target: 0 };
  if (!query) return counts;

  const regex = createSearchRegex(query, options);
  const columns = columnsFor(options.scope);
  for (const row of doc.rows()) {
    for (const column of columns) {
      counts[column] += matchesIn(row[column], regex).length;
    }
  }
  return counts;
}

// ============================================
// Replace
// ============================================

/**
 * Replace one found occurrence. Returns null when the cell changed since the
 * match was found or the replacement leaves the text as it was.
 */
export function replaceMatch(
  doc: AlignmentDocument,
  match: SearchMatch,
  query: string,
  replacement: string,
  options: SearchOptions = {}
): Command | null {
  const current = doc.textOf(match.rowId, match.column);
  const replaced = replaceInText(current, match.start, match.end, query, replacement, options);
  if (replaced === null) return null;

  const text = sanitizeCellText(replaced);
  if (text === current) return null;

  const forward: SetTextOperation = { kind: 'setText', rowId: match.rowId, column: match.column, text };
  const inverse = applyOperation(doc, forward);
  logger.debug(`[Search] Replaced one match in row ${match.rowId} (${match.column})`);

  return { label: 'replace', forward, inverse, affectedRowIds: [match.rowId] };
}

/**
 * Replace every occurrence as a single undoable step. Returns null when
 * nothing matched.
 */
export function replaceAll(
  doc: AlignmentDocument,
  query: string,
  replacement: string,
  options: SearchOptions = {}
): Command | null {
  if (!query) return null;

  const regex = createSearchRegex(query, options);
  const pattern = replacementPattern(replacement, options);
  const columns = columnsFor(options.scope);

  const operations: EditOperation[] = [];
  const affected = new Set<RowId>();
  let totalMatches = 0;

  for (const row of doc.rows()) {
    for (const column of columns) {
      const text = row[column];
      const matches = matchesIn(text, regex);
      if (matches.length === 0) continue;

      const next = sanitizeCellText(replaceMatches(text, regex, matches, pattern));
      totalMatches += matches.length;
      if (next !== text) {
        operations.push({ kind: 'setText', rowId: row.id, column, text: next });
        affected.add(row.id);
      }
    }
  }

  if (operations.length === 0) {
    logger.debug(`[Search] Replace all: no changes (${totalMatches} match(es))`);
    return null;
  }

  const forward: EditOperation = { kind: 'batch', operations };
  const inverse = applyOperation(doc, forward);
  logger.info(`[Search] Replaced ${totalMatches} match(es) in ${affected.size} row(s)`);

  return { label: 'replaceAll', forward, inverse, affectedRowIds: [...affected] };
}
