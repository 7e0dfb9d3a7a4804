/**
 * In-memory Note Store
 *
 * Holds notes and their content in maps. Used for embedding the engine
 * where notes already live in memory, and as a stand-in in tests.
 */

import type { Note, NoteMetadata, NoteStore } from './types.js';
import { compileTerm } from './query.js';

export interface MemoryNoteEntry {
  note: Note;
  content?: string;
}

export class MemoryNoteStore implements NoteStore {
  private readonly notes = new Map<string, Note>();
  private readonly contents = new Map<string, string>();

  constructor(entries: readonly MemoryNoteEntry[] = []) {
    for (const entry of entries) {
      this.upsert(entry.note, entry.content);
    }
  }

  upsert(note: Note, content: string = ''): void {
    this.notes.set(note.id, note);
    this.contents.set(note.id, content);
  }

  remove(id: string): boolean {
    this.contents.delete(id);
    return this.notes.delete(id);
  }

  listAll(): readonly Note[] {
    return Array.from(this.notes.values());
  }

  titleMatches(term: string): ReadonlySet<string> {
    const pattern = compileTerm(term);
    const ids = new Set<string>();
    for (const note of this.notes.values()) {
      if (pattern.test(note.title)) ids.add(note.id);
    }
    return ids;
  }

  contentMatches(term: string): ReadonlySet<string> {
    const pattern = compileTerm(term, 'm');
    const ids = new Set<string>();
    for (const [id, content] of this.contents) {
      if (pattern.test(content)) ids.add(id);
    }
    return ids;
  }

  resolvePath(id: string): string | undefined {
    return this.notes.get(id)?.path;
  }

  metadata(id: string): NoteMetadata | undefined {
    const note = this.notes.get(id);
    if (!note) return undefined;
    return {
      modifiedAt: note.modifiedAt,
      createdAt: note.createdAt,
      sizeBytes: note.sizeBytes,
    };
  }

  get(id: string): Note | undefined {
    return this.notes.get(id);
  }

  size(): number {
    return this.notes.size;
  }
}
