/**
 * Alignment model and edit operations.
 *
 * The document mutator is not re-exported: rows change only
 * through the operations below.
 */

export {
  AlignmentDocument,
  CELL_DELIMITER,
  createDocument,
  createEmptyDocument,
  sanitizeCellText,
  type CreateDocumentOptions,
} from './document';
export {
  applyOperation,
  deleteEmptyRow,
  isEmptyRow,
  joinSeparator,
  merge,
  move,
  split,
} from './operations';
export { EditSession, beginEdit } from './editSession';
