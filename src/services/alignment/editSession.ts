/**
 * Edit Session
 *
 * Text replacement is gated by an explicit "begin edit" action: the caller
 * receives an EditSession capability and can change the cell only by
 * committing that session, once.
 */

import { v4 as uuidv4 } from 'uuid';
import { type Column, type RowId } from '@/types/alignment';
import { type Command, type SetTextOperation } from '@/types/history';
import { type AlignmentDocument, sanitizeCellText } from './document';
import { applyOperation } from './operations';
import { OperationError } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

type SessionState = 'open' | 'committed' | 'cancelled';

export class EditSession {
  readonly token: string = uuidv4();
  private state: SessionState = 'open';

  constructor(
    private readonly document: AlignmentDocument,
    readonly rowId: RowId,
    readonly column: Column,
    readonly initialText: string
  ) {}

  get isOpen(): boolean {
    return this.state === 'open';
  }

  belongsTo(document: AlignmentDocument): boolean {
    return this.document === document;
  }

  /**
   * Replace the cell text. Returns null when the text is unchanged, in which
   * case nothing is recorded.
   */
  commit(newText: string): Command | null {
    this.assertOpen();

    // Read at commit time: the row may have been edited since the session began
    const previous = this.document.textOf(this.rowId, this.column);
    this.state = 'committed';

    const text = sanitizeCellText(newText);
    if (text === previous) {
      logger.debug(`[EditSession] Row ${this.rowId} (${this.column}) unchanged, nothing recorded`);
      return null;
    }

    const forward: SetTextOperation = {
      kind: 'setText',
      rowId: this.rowId,
      column: this.column,
      text,
    };
    const inverse = applyOperation(this.document, forward);

    return { label: 'editText', forward, inverse, affectedRowIds: [this.rowId] };
  }

  cancel(): void {
    this.assertOpen();
    this.state = 'cancelled';
  }

  private assertOpen() {
    if (this.state !== 'open') {
      throw new OperationError('STALE_EDIT_SESSION', { rowId: this.rowId, column: this.column });
    }
  }
}

/**
 * Enter edit mode on a cell.
 */
export function beginEdit(document: AlignmentDocument, rowId: RowId, column: Column): EditSession {
  const text = document.textOf(rowId, column);
  return new EditSession(document, rowId, column, text);
}
