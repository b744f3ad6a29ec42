import { describe, it, expect } from 'vitest';
import { createDocument, type AlignmentDocument } from '../document';
import {
  applyOperation,
  deleteEmptyRow,
  isInsideSurrogatePair,
  joinSeparator,
  merge,
  move,
  split,
} from '../operations';
import { type RowContent } from '@/types/alignment';
import { OperationError } from '@/services/utils/errors';
import { thrown } from '@/__tests__/helpers';

const languages = { source: 'en', target: 'fr' };

const docWith = (...rows: [string, string][]) =>
  createDocument({ languages, rows: rows.map(([source, target]): RowContent => ({ source, target })) });

const texts = (doc: AlignmentDocument) => doc.rows().map((row) => [row.source, row.target]);

const expectRejected = (fn: () => unknown, code: string) => {
  const error = thrown(fn);
  expect(error).toBeInstanceOf(OperationError);
  expect(error).toMatchObject({ code });
};

describe('edit operations', () => {
  describe('split', () => {
    it('splits the example sentence and merges it back', () => {
      const doc = docWith(['Hello world.', 'Bonjour le monde.']);

      const command = split(doc, 0, 'source', 5);
      expect(texts(doc)).toEqual([
        ['Hello', 'Bonjour le monde.'],
        [' world.', ''],
      ]);
      expect(command.label).toBe('split');
      expect(command.affectedRowIds).toEqual([0, 1]);

      merge(doc, 0, 'source');
      expect(doc.rows()).toEqual([{ id: 0, source: 'Hello world.', target: 'Bonjour le monde.' }]);
    });

    it('is undone exactly by its inverse at every valid offset', () => {
      const text = 'Two words';
      for (let offset = 1; offset < text.length; offset++) {
        const doc = docWith([text, 'Deux mots'], ['next', 'suivant']);
        const command = split(doc, 0, 'source', offset);
        expect(command.inverse).toEqual({ kind: 'merge', rowId: 0, column: 'source', separator: '' });

        applyOperation(doc, command.inverse);
        expect(doc.rows()).toEqual([
          { id: 0, source: text, target: 'Deux mots' },
          { id: 1, source: 'next', target: 'suivant' },
        ]);
      }
    });

    it('is merged back without an extra space when cut at whitespace', () => {
      for (const offset of [3, 4]) {
        const doc = docWith(['Two words', 'Deux mots']);
        split(doc, 0, 'source', offset);
        merge(doc, 0, 'source');
        expect(doc.rows()).toEqual([{ id: 0, source: 'Two words', target: 'Deux mots' }]);
      }
    });

    it('splits the target column and leaves the source alone', () => {
      const doc = docWith(['Source', 'Cible un. Cible deux.']);
      split(doc, 0, 'target', 10);
      expect(texts(doc)).toEqual([
        ['Source', 'Cible un. '],
        ['', 'Cible deux.'],
      ]);
    });

    it('allocates fresh ids for created rows', () => {
      const doc = docWith(['ab', ''], ['cd', '']);
      const command = split(doc, 1, 'source', 1);
      expect(command.affectedRowIds).toEqual([1, 2]);
      expect(doc.rows().map((row) => row.id)).toEqual([0, 1, 2]);
    });

    it('rejects offsets outside the text', () => {
      const doc = docWith(['abc', 'x']);
      expectRejected(() => split(doc, 0, 'source', 0), 'INVALID_SPLIT_POINT');
      expectRejected(() => split(doc, 0, 'source', 3), 'INVALID_SPLIT_POINT');
      expectRejected(() => split(doc, 0, 'source', 1.5), 'INVALID_SPLIT_POINT');
      expectRejected(() => split(doc, 0, 'target', 1), 'INVALID_SPLIT_POINT');
      expect(texts(doc)).toEqual([['abc', 'x']]);
      expect(doc.dirty).toBe(false);
    });

    it('rejects an offset inside a surrogate pair', () => {
      const doc = docWith(['a😀b', '']);
      expect(isInsideSurrogatePair('a😀b', 2)).toBe(true);
      expectRejected(() => split(doc, 0, 'source', 2), 'INVALID_SPLIT_POINT');
      split(doc, 0, 'source', 3);
      expect(texts(doc)).toEqual([
        ['a😀', ''],
        ['b', ''],
      ]);
    });

    it('rejects unknown rows', () => {
      expectRejected(() => split(docWith(['abc', '']), 9, 'source', 1), 'NOT_FOUND');
    });
  });

  describe('merge', () => {
    it('joins two sentences with a single space and drops the row below', () => {
      const doc = docWith(['Good morning.', 'Bonjour.'], ['How are you?', 'Comment ça va ?'], ['tail', 'fin']);
      const command = merge(doc, 0, 'source');

      expect(texts(doc)).toEqual([
        ['Good morning. How are you?', 'Bonjour.'],
        ['tail', 'fin'],
      ]);
      expect(command.forward).toEqual({ kind: 'merge', rowId: 0, column: 'source', separator: ' ' });
      expect(command.affectedRowIds).toEqual([0, 1]);
    });

    it('adds no space when one side is empty', () => {
      const doc = docWith(['', 'Bonjour.'], ['Hello.', ''], ['Bye.', '']);

      merge(doc, 0, 'source');
      expect(texts(doc)).toEqual([
        ['Hello.', 'Bonjour.'],
        ['Bye.', ''],
      ]);

      merge(doc, 0, 'target');
      expect(texts(doc)).toEqual([['Hello.', 'Bonjour.']]);
    });

    it('adds no second space when the join already has whitespace', () => {
      const doc = docWith(['Hello', 'Bonjour le monde.'], [' world.', '']);
      merge(doc, 0, 'source');
      expect(doc.rows()).toEqual([{ id: 0, source: 'Hello world.', target: 'Bonjour le monde.' }]);
    });

    it('is undone by its inverse, restoring the removed row and its id', () => {
      const doc = docWith(['Hello', 'Bonjour'], ['world', 'monde']);
      const before = doc.rows();
      const command = merge(doc, 0, 'target');

      expect(texts(doc)).toEqual([['Hello', 'Bonjour monde']]);
      expect(command.inverse).toEqual({
        kind: 'split',
        rowId: 0,
        column: 'target',
        offset: 7,
        skip: 1,
        newRowId: 1,
        otherText: 'world',
      });

      applyOperation(doc, command.inverse);
      expect(doc.rows()).toEqual(before);

      applyOperation(doc, command.forward);
      expect(texts(doc)).toEqual([['Hello', 'Bonjour monde']]);
    });

    it('chooses the separator from the text at the join', () => {
      expect(joinSeparator('a', 'b')).toBe(' ');
      expect(joinSeparator('a', '')).toBe('');
      expect(joinSeparator('', 'b')).toBe('');
      expect(joinSeparator('a\n', 'b')).toBe('');
      expect(joinSeparator('a', ' b')).toBe('');
    });

    it('fails on the last row without touching the rows', () => {
      const doc = docWith(['a', 'b'], ['c', 'd']);
      const before = doc.rows();
      expectRejected(() => merge(doc, 1, 'source'), 'NO_ROW_BELOW');
      expect(doc.rows()).toEqual(before);
    });
  });

  describe('move', () => {
    it('swaps the whole row and keeps ids', () => {
      const doc = docWith(['a', '1'], ['b', '2'], ['c', '3']);
      const command = move(doc, 0, 'down');

      expect(doc.rows()).toEqual([
        { id: 1, source: 'b', target: '2' },
        { id: 0, source: 'a', target: '1' },
        { id: 2, source: 'c', target: '3' },
      ]);
      expect(command.label).toBe('moveDown');
      expect(command.affectedRowIds).toEqual([0, 1]);
    });

    it('is reversed by the opposite move', () => {
      const doc = docWith(['a', '1'], ['b', '2']);
      const before = doc.rows();
      move(doc, 1, 'up');
      move(doc, 1, 'down');
      expect(doc.rows()).toEqual(before);
    });

    it('rejects moves past either edge', () => {
      const doc = docWith(['a', '1'], ['b', '2']);
      expectRejected(() => move(doc, 0, 'up'), 'AT_BOUNDARY');
      expectRejected(() => move(doc, 1, 'down'), 'AT_BOUNDARY');
      expect(doc.dirty).toBe(false);
    });
  });

  describe('deleteEmptyRow', () => {
    it('removes a blank row and its inverse puts it back', () => {
      const doc = docWith(['a', '1'], ['  ', ''], ['b', '2']);
      const before = doc.rows();
      const command = deleteEmptyRow(doc, 1);

      expect(texts(doc)).toEqual([
        ['a', '1'],
        ['b', '2'],
      ]);
      applyOperation(doc, command.inverse);
      expect(doc.rows()).toEqual(before);
    });

    it('refuses rows with text', () => {
      const doc = docWith(['', 'still here']);
      expectRejected(() => deleteEmptyRow(doc, 0), 'ROW_NOT_EMPTY');
    });
  });

  describe('applyOperation', () => {
    it('marks the document dirty', () => {
      const doc = docWith(['a', 'b']);
      applyOperation(doc, { kind: 'setText', rowId: 0, column: 'target', text: 'c' });
      expect(doc.dirty).toBe(true);
    });

    it('returns inverses that restore the previous state', () => {
      const doc = docWith(['one two', 'un deux'], ['three', 'trois']);
      const before = doc.rows();

      const inverses = [
        applyOperation(doc, { kind: 'setText', rowId: 1, column: 'source', text: 'THREE' }),
        applyOperation(doc, {
          kind: 'split',
          rowId: 0,
          column: 'source',
          offset: 3,
          skip: 0,
          newRowId: 7,
          otherText: 'x',
        }),
        applyOperation(doc, { kind: 'move', rowId: 7, direction: 'down' }),
      ];
      expect(texts(doc)).toEqual([
        ['one', 'un deux'],
        ['THREE', 'trois'],
        [' two', 'x'],
      ]);

      for (const inverse of inverses.reverse()) {
        applyOperation(doc, inverse);
      }
      expect(doc.rows()).toEqual(before);
    });

    it('rolls back a batch when a member fails', () => {
      const doc = docWith(['a', 'b'], ['c', 'd']);
      const before = doc.rows();

      expectRejected(
        () =>
          applyOperation(doc, {
            kind: 'batch',
            operations: [
              { kind: 'setText', rowId: 0, column: 'source', text: 'changed' },
              { kind: 'move', rowId: 0, direction: 'up' },
            ],
          }),
        'AT_BOUNDARY'
      );
      expect(doc.rows()).toEqual(before);
    });
  });
});
