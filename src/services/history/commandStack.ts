/**
 * Command Stack
 *
 * Linear undo history: an append-only array of commands and a cursor that
 * separates applied commands (before it) from undone ones (at and after it).
 * Recording a new command truncates everything after the cursor.
 */

import { type Command, type CommandLabel } from '@/types/history';
import { type AlignmentDocument, getMutator } from '@/services/alignment/document';
import { applyOperation } from '@/services/alignment/operations';
import { HistoryError } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

export class CommandStack {
  private commands: Command[] = [];
  private cursor = 0;
  // Cursor position matching the file on disk; null once that state is unreachable
  private cleanPosition: number | null = 0;

  constructor(private readonly document: AlignmentDocument) {}

  get size(): number {
    return this.commands.length;
  }

  get position(): number {
    return this.cursor;
  }

  get canUndo(): boolean {
    return this.cursor > 0;
  }

  get canRedo(): boolean {
    return this.cursor < this.commands.length;
  }

  get isClean(): boolean {
    return this.cleanPosition === this.cursor;
  }

  get undoLabel(): CommandLabel | null {
    return this.canUndo ? this.commands[this.cursor - 1].label : null;
  }

  get redoLabel(): CommandLabel | null {
    return this.canRedo ? this.commands[this.cursor].label : null;
  }

  /**
   * Record a command that has already been applied to the document.
   */
  apply(command: Command): void {
    if (this.cursor < this.commands.length) {
      logger.debug(`[History] Discarding ${this.commands.length - this.cursor} redoable command(s)`);
      if (this.cleanPosition !== null && this.cleanPosition > this.cursor) {
        this.cleanPosition = null;
      }
      this.commands.length = this.cursor;
    }
    this.commands.push(command);
    this.cursor++;
  }

  undo(): Command {
    if (!this.canUndo) {
      throw new HistoryError('NOTHING_TO_UNDO');
    }
    const command = this.commands[this.cursor - 1];
    applyOperation(this.document, command.inverse);
    this.cursor--;
    this.syncDirty();
    logger.debug(`[History] Undid ${command.label}`, { position: this.cursor });
    return command;
  }

  redo(): Command {
    if (!this.canRedo) {
      throw new HistoryError('NOTHING_TO_REDO');
    }
    const command = this.commands[this.cursor];
    applyOperation(this.document, command.forward);
    this.cursor++;
    this.syncDirty();
    logger.debug(`[History] Redid ${command.label}`, { position: this.cursor });
    return command;
  }

  /** Remember the current position as the persisted state. */
  markClean(): void {
    this.cleanPosition = this.cursor;
  }

  clear(): void {
    this.commands = [];
    this.cursor = 0;
    this.cleanPosition = this.document.dirty ? null : 0;
  }

  private syncDirty() {
    getMutator(this.document).setDirty(!this.isClean);
  }
}
