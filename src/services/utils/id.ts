import { type RowId } from '@/types/alignment';

export interface RowIdAllocator {
  /** Returns a fresh id; ids are never handed out twice. */
  next(): RowId;
}

/**
 * Monotonic counter for row ids, decoupled from array position so that ids
 * survive reordering and removed ids are never reused.
 */
export const createRowIdAllocator = (start: RowId = 0): RowIdAllocator => {
  let counter = start;
  return {
    next: () => counter++,
  };
};
