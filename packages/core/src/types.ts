/**
 * Core types for the zettelkasten index engine
 */

// ========================================
// Notes (owned by the Note Store)
// ========================================

/** A single note as seen by the index */
export interface Note {
  id: string;          // Stable identifier, e.g. 202401151030
  title: string;
  path: string;        // Absolute path of the note file
  modifiedAt: Date;
  createdAt: Date;
  sizeBytes: number;
}

export type NoteMetadata = Pick<Note, 'modifiedAt' | 'createdAt' | 'sizeBytes'>;

/**
 * Source of truth for the note corpus.
 *
 * All lookups are synchronous: a store backed by slow I/O loads its
 * snapshot up front and answers from memory.
 */
export interface NoteStore {
  /** Full corpus, in store order */
  listAll(): readonly Note[];
  /** Ids of notes whose title matches the term (Focus source) */
  titleMatches(term: string): ReadonlySet<string>;
  /** Ids of notes whose content matches the term as a regexp (Search source) */
  contentMatches(term: string): ReadonlySet<string>;
  resolvePath(id: string): string | undefined;
  metadata(id: string): NoteMetadata | undefined;
  get(id: string): Note | undefined;
  size(): number;
}

// ========================================
// Queries
// ========================================

/** focus = title predicate, search = full-content predicate */
export type QueryKind = 'focus' | 'search';

export interface QueryTerm {
  readonly kind: QueryKind;
  readonly term: string;
}

/** Applied predicates, newest first */
export type QueryStack = readonly QueryTerm[];

// ========================================
// View
// ========================================

export type SortMode = 'modified' | 'created' | 'size' | 'none';

export interface ViewState {
  /** Note ids in render order */
  readonly visibleIds: readonly string[];
  readonly sortMode: SortMode;
  readonly queryStack: QueryStack;
  /** 1-based line of the cursor */
  readonly cursorLine: number;
}

/** Orders a list of notes. Must not mutate its input. */
export type Sorter = (notes: readonly Note[]) => readonly Note[];

/** Maps a note to its display row */
export type Formatter = (note: Note) => string;

export interface DisplayRow {
  line: number;
  id: string;
  title: string;
  path: string;
  text: string;
}
