/**
 * @zk-index/core - query, narrowing and sort engine for a zettelkasten index
 */

export type {
  Note,
  NoteMetadata,
  NoteStore,
  QueryKind,
  QueryTerm,
  QueryStack,
  SortMode,
  ViewState,
  Sorter,
  Formatter,
  DisplayRow,
} from './types.js';

export {
  IndexError,
  NoMatchesError,
  NotNarrowedError,
  InvalidContextError,
  isIndexError,
  type IndexErrorCode,
} from './errors.js';

export {
  DEFAULT_ID_PATTERN,
  DEFAULT_EXTENSION,
  createFileNameMatcher,
  parseNoteFileName,
  timestampPrefix,
  dateFromId,
  type NoteFileName,
  type NoteFileNameOptions,
} from './noteId.js';

export {
  EMPTY_STACK,
  pushTerm,
  resetStack,
  activeKind,
  composeTerms,
  renderBreadcrumb,
} from './queryStack.js';

export { compileTerm, applyQuery, reapplyTerms } from './query.js';

export {
  DEFAULT_SORT_MODE,
  SORT_MODES,
  byModified,
  byCreated,
  bySize,
  keepOrder,
  sorterFor,
  isSortMode,
} from './sort.js';

export {
  DEFAULT_INDEX_FORMAT,
  createFormatter,
  defaultFormatter,
  formatDate,
  renderRows,
} from './format.js';

export { MemoryNoteStore, type MemoryNoteEntry } from './memoryStore.js';

export {
  IndexView,
  type IndexViewOptions,
  type ViewOptions,
  type SortSpec,
  type IndexCommand,
  type CommandResult,
} from './view.js';
