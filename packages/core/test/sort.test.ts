/**
 * Sort engine tests, including property checks with fast-check
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { byModified, byCreated, bySize, keepOrder, sorterFor, isSortMode } from '../src/sort.js';
import type { Note, Sorter } from '../src/types.js';
import { makeNote } from './helpers.js';

// Small key ranges so ties are common
const noteArb = fc.record({
  day: fc.integer({ min: 1, max: 5 }),
  size: fc.integer({ min: 0, max: 5 }),
  minute: fc.integer({ min: 10, max: 14 }),
});

const notesArb = fc.array(noteArb, { minLength: 1, maxLength: 30 }).map((seeds) =>
  seeds.map((seed, i) => ({
    ...makeNote({
      id: `2024010112${seed.minute}`,
      modified: new Date(2024, 0, seed.day),
      size: seed.size,
    }),
    // Unique path records the input position
    path: `/vault/${i}.md`,
  }))
);

const keys: Array<[string, Sorter, (note: Note) => number]> = [
  ['byModified', byModified, (n) => n.modifiedAt.getTime()],
  ['byCreated', byCreated, (n) => Number(n.id)],
  ['bySize', bySize, (n) => n.sizeBytes],
];

const position = (note: Note): number => parseInt(note.path.replace(/\D/g, ''), 10);

describe('sort engine', () => {
  describe.each(keys)('%s', (_name, sorter, key) => {
    it('returns a permutation of its input', () => {
      fc.assert(
        fc.property(notesArb, (notes) => {
          const sorted = sorter(notes);
          expect([...sorted].map(position).sort((a, b) => a - b)).toEqual(notes.map(position));
        })
      );
    });

    it('orders by key descending and keeps input order on ties', () => {
      fc.assert(
        fc.property(notesArb, (notes) => {
          const sorted = sorter(notes);
          for (let i = 1; i < sorted.length; i++) {
            const prev = sorted[i - 1];
            const curr = sorted[i];
            expect(key(prev) >= key(curr)).toBe(true);
            if (key(prev) === key(curr)) {
              expect(position(prev)).toBeLessThan(position(curr));
            }
          }
        })
      );
    });

    it('does not mutate its input', () => {
      const notes = [makeNote({ id: '202401011201', size: 1 }), makeNote({ id: '202401011202', size: 2 })];
      const before = [...notes];
      sorter(notes);
      expect(notes).toEqual(before);
    });

    it('returns a single-note list unchanged', () => {
      const single = [makeNote({ id: '202401011200' })];
      expect(sorter(single)).toBe(single);
    });

    it('is idempotent', () => {
      fc.assert(
        fc.property(notesArb, (notes) => {
          const once = sorter(notes);
          expect(sorter(once)).toEqual(once);
        })
      );
    });
  });

  it('sorts the size scenario largest first', () => {
    const notes = [10, 50, 30, 5, 90].map((size, i) =>
      makeNote({ id: `20240101120${i}`, size })
    );
    expect(bySize(notes).map((n) => n.sizeBytes)).toEqual([90, 50, 30, 10, 5]);
  });

  it('sorts by created using the id timestamp, most recent first', () => {
    const notes = [
      makeNote({ id: '202301010000' }),
      makeNote({ id: '202401010000' }),
      makeNote({ id: '202212312359' }),
    ];
    expect(byCreated(notes).map((n) => n.id)).toEqual([
      '202401010000',
      '202301010000',
      '202212312359',
    ]);
  });

  it('sorts by modified, most recent first', () => {
    const notes = [
      makeNote({ id: '202401010001', modified: new Date(2024, 2, 1) }),
      makeNote({ id: '202401010002', modified: new Date(2024, 5, 1) }),
      makeNote({ id: '202401010003', modified: new Date(2024, 0, 1) }),
    ];
    expect(byModified(notes).map((n) => n.id)).toEqual([
      '202401010002',
      '202401010001',
      '202401010003',
    ]);
  });

  it('keepOrder returns the input untouched', () => {
    const notes = [makeNote({ id: '2' }), makeNote({ id: '1' })];
    expect(keepOrder(notes)).toBe(notes);
  });

  it('maps modes to sorters', () => {
    expect(sorterFor('modified')).toBe(byModified);
    expect(sorterFor('created')).toBe(byCreated);
    expect(sorterFor('size')).toBe(bySize);
    expect(sorterFor('none')).toBe(keepOrder);
    expect(isSortMode('size')).toBe(true);
    expect(isSortMode('title')).toBe(false);
  });
});
