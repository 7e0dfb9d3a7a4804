/**
 * Sort engine
 *
 * Every order is descending and stable: notes that compare equal keep
 * their input order. Lists of zero or one note are returned as-is.
 */

import type { Note, SortMode, Sorter } from './types.js';
import { timestampPrefix } from './noteId.js';

export const DEFAULT_SORT_MODE: SortMode = 'modified';

export const SORT_MODES: readonly SortMode[] = ['modified', 'created', 'size', 'none'];

type Comparator = (a: Note, b: Note) => number;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function descending(compare: Comparator): Sorter {
  return (notes) => {
    if (notes.length <= 1) {
      return notes;
    }
    // Array.prototype.sort is stable
    return [...notes].sort((a, b) => compare(b, a));
  };
}

export const byModified: Sorter = descending(
  (a, b) => a.modifiedAt.getTime() - b.modifiedAt.getTime()
);

/** Creation order taken from the id's timestamp prefix */
export const byCreated: Sorter = descending(
  (a, b) => compareStrings(timestampPrefix(a.id), timestampPrefix(b.id))
);

export const bySize: Sorter = descending((a, b) => a.sizeBytes - b.sizeBytes);

export const keepOrder: Sorter = (notes) => notes;

const SORTERS: Record<SortMode, Sorter> = {
  modified: byModified,
  created: byCreated,
  size: bySize,
  none: keepOrder,
};

export function sorterFor(mode: SortMode): Sorter {
  return SORTERS[mode];
}

export function isSortMode(value: string): value is SortMode {
  return SORT_MODES.some((mode) => mode === value);
}
