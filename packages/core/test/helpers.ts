/**
 * Shared fixtures for core tests
 */

import type { Note } from '../src/types.js';
import { MemoryNoteStore } from '../src/memoryStore.js';

export interface NoteSeed {
  id: string;
  title?: string;
  modified?: Date;
  size?: number;
  content?: string;
}

export function makeNote(seed: NoteSeed): Note {
  return {
    id: seed.id,
    title: seed.title ?? `Note ${seed.id}`,
    path: `/vault/${seed.id} ${seed.title ?? 'note'}.md`,
    modifiedAt: seed.modified ?? new Date(2024, 0, 1),
    createdAt: new Date(2024, 0, 1),
    sizeBytes: seed.size ?? 100,
  };
}

export function makeStore(seeds: NoteSeed[]): MemoryNoteStore {
  return new MemoryNoteStore(
    seeds.map((seed) => ({ note: makeNote(seed), content: seed.content ?? '' }))
  );
}

/**
 * Ten notes, 202401010001..202401010010, modified on consecutive days so
 * that the default (modified, descending) order is 010 first, 001 last.
 * Notes 2, 5 and 9 mention "foo" in their content.
 */
export function tenNoteStore(): MemoryNoteStore {
  const seeds: NoteSeed[] = [];
  for (let i = 1; i <= 10; i++) {
    const n = String(i).padStart(3, '0');
    seeds.push({
      id: `202401010${n}`,
      title: i % 2 === 0 ? `Even ${i}` : `Odd ${i}`,
      modified: new Date(2024, 0, i),
      size: i * 10,
      content: [2, 5, 9].includes(i) ? `body with foo ${i}` : `plain body ${i}`,
    });
  }
  return makeStore(seeds);
}
