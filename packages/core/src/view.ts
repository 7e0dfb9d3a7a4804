/**
 * View controller - the index view state machine
 *
 *   closed -> open(unnarrowed) <-> open(narrowed) -> closed
 *
 * The controller owns one ViewState at a time. Commands compute a complete
 * new state and commit it in a single assignment, so a command that throws
 * leaves the previous state in place.
 */

import type {
  DisplayRow,
  Formatter,
  Note,
  NoteStore,
  QueryKind,
  QueryTerm,
  SortMode,
  Sorter,
  ViewState,
} from './types.js';
import { IndexError, InvalidContextError, NotNarrowedError } from './errors.js';
import { applyQuery, reapplyTerms } from './query.js';
import {
  EMPTY_STACK,
  activeKind,
  composeTerms,
  pushTerm,
  renderBreadcrumb,
} from './queryStack.js';
import { DEFAULT_SORT_MODE, sorterFor } from './sort.js';
import { defaultFormatter, renderRows } from './format.js';

/** A built-in sort mode, or a custom sorter (reported as sort mode 'none') */
export type SortSpec = SortMode | Sorter;

export interface ViewOptions {
  /** Explicit listing; bypasses the query stack */
  ids?: readonly string[];
  sort?: SortSpec;
}

export interface IndexViewOptions {
  /** Sort used by `open` when none is given */
  defaultSort?: SortMode;
  formatter?: Formatter;
}

export type IndexCommand =
  | { name: 'open'; ids?: readonly string[]; sort?: SortMode }
  | { name: 'refresh'; ids?: readonly string[]; sort?: SortMode }
  | { name: 'focus'; term: string }
  | { name: 'search'; term: string }
  | { name: 'sort'; mode: SortMode }
  | { name: 'query-refresh' }
  | { name: 'cursor'; delta?: number; line?: number }
  | { name: 'close' };

export type CommandResult =
  | { ok: true; state: ViewState | null }
  | { ok: false; error: IndexError };

interface LiveView {
  state: ViewState;
  sorter: Sorter;
  /** Whether visibleIds was a strict subset of the corpus when last derived */
  scoped: boolean;
}

function freezeState(state: ViewState): ViewState {
  return Object.freeze({
    ...state,
    visibleIds: Object.freeze([...state.visibleIds]),
  });
}

function clampLine(line: number, count: number): number {
  if (count === 0) return 1;
  return Math.min(Math.max(1, Math.trunc(line)), count);
}

function resolveSort(sort: SortSpec): { mode: SortMode; sorter: Sorter } {
  if (typeof sort === 'function') {
    return { mode: 'none', sorter: sort };
  }
  return { mode: sort, sorter: sorterFor(sort) };
}

export class IndexView {
  private view: LiveView | null = null;
  private readonly searchHistory: QueryTerm[] = [];
  private readonly defaultSort: SortMode;
  private readonly formatter: Formatter;

  constructor(
    private readonly store: NoteStore,
    options: IndexViewOptions = {}
  ) {
    this.defaultSort = options.defaultSort ?? DEFAULT_SORT_MODE;
    this.formatter = options.formatter ?? defaultFormatter;
  }

  // ========================================
  // Queries
  // ========================================

  isOpen(): boolean {
    return this.view !== null;
  }

  /** Snapshot of the current state, null when closed */
  getState(): ViewState | null {
    return this.view?.state ?? null;
  }

  /** Note ids in render order (empty when closed) */
  getVisibleNotes(): readonly string[] {
    return this.view?.state.visibleIds ?? [];
  }

  /** Breadcrumb of the active query stack, undefined when there is none */
  getBreadcrumb(): string | undefined {
    const stack = this.view?.state.queryStack ?? EMPTY_STACK;
    const kind = activeKind(stack);
    return kind ? renderBreadcrumb(stack, kind) : undefined;
  }

  /** True iff fewer notes are displayed than the store holds */
  isNarrowed(): boolean {
    const view = this.requireView('narrowed');
    return view.state.visibleIds.length < this.store.size();
  }

  /** Applied focus/search terms, oldest first */
  history(): readonly QueryTerm[] {
    return [...this.searchHistory];
  }

  noteAtCursor(): string | null {
    const { visibleIds, cursorLine } = this.requireView('cursor').state;
    return visibleIds[cursorLine - 1] ?? null;
  }

  render(formatter: Formatter = this.formatter): DisplayRow[] {
    return renderRows(this.getVisibleNotes(), this.store, formatter);
  }

  // ========================================
  // Commands
  // ========================================

  /** Open the view, or refresh it when one is already live */
  open(options: ViewOptions = {}): ViewState {
    if (this.view) {
      return this.refresh(options);
    }

    const { mode, sorter } = resolveSort(options.sort ?? this.defaultSort);
    const ids = options.ids ? this.existing(options.ids) : this.allIds();
    const visibleIds = this.sortIds(ids, sorter);

    return this.commit({
      state: {
        visibleIds,
        sortMode: mode,
        queryStack: EMPTY_STACK,
        cursorLine: 1,
      },
      sorter,
      scoped: visibleIds.length < this.store.size(),
    });
  }

  /**
   * Re-derive the visible set.
   *
   * Explicit ids replace the listing and reset the query stack. Without
   * them a scoped view, or one with active query terms, keeps its ids
   * (dropping vanished ones) and any other view picks up the whole
   * current corpus.
   */
  refresh(options: ViewOptions = {}): ViewState {
    const view = this.requireView('refresh');
    const { mode, sorter } = options.sort
      ? resolveSort(options.sort)
      : { mode: view.state.sortMode, sorter: view.sorter };

    let ids: string[];
    let queryStack = view.state.queryStack;
    if (options.ids) {
      ids = this.existing(options.ids);
      queryStack = EMPTY_STACK;
    } else if (view.scoped || queryStack.length > 0) {
      ids = this.existing(view.state.visibleIds);
    } else {
      ids = this.allIds();
    }

    return this.rederive(view, this.sortIds(ids, sorter), { sortMode: mode, queryStack }, sorter);
  }

  focus(term: string): ViewState {
    return this.narrow('focus', term);
  }

  search(term: string): ViewState {
    return this.narrow('search', term);
  }

  /** Re-sort the visible notes and keep `sort` for later refreshes */
  sortBy(sort: SortSpec): ViewState {
    const view = this.requireView('sort');
    const { mode, sorter } = resolveSort(sort);
    const visibleIds = this.sortIds(view.state.visibleIds, sorter);
    return this.rederive(view, visibleIds, { sortMode: mode }, sorter);
  }

  /**
   * Re-apply the composed narrowing to the current corpus, e.g. after
   * notes were edited outside the view.
   */
  refreshLastQuery(): ViewState {
    const view = this.requireView('query-refresh');
    if (view.state.queryStack.length === 0) {
      throw new NotNarrowedError();
    }

    const ids = reapplyTerms(this.store, composeTerms(view.state.queryStack));
    return this.rederive(view, this.sortIds(ids, view.sorter), {}, view.sorter);
  }

  moveCursor(delta: number): ViewState {
    const view = this.requireView('cursor');
    return this.gotoLine(view.state.cursorLine + delta);
  }

  gotoLine(line: number): ViewState {
    const view = this.requireView('cursor');
    return this.commit({
      ...view,
      state: {
        ...view.state,
        cursorLine: clampLine(line, view.state.visibleIds.length),
      },
    });
  }

  close(): void {
    this.requireView('close');
    this.view = null;
  }

  /**
   * Dispatch a command. Index errors are returned, not thrown; anything
   * else propagates.
   */
  onCommand(command: IndexCommand): CommandResult {
    try {
      return { ok: true, state: this.execute(command) };
    } catch (err) {
      if (err instanceof IndexError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  // ========================================
  // Internals
  // ========================================

  private execute(command: IndexCommand): ViewState | null {
    switch (command.name) {
      case 'open':
        return this.open({ ids: command.ids, sort: command.sort });
      case 'refresh':
        return this.refresh({ ids: command.ids, sort: command.sort });
      case 'focus':
        return this.focus(command.term);
      case 'search':
        return this.search(command.term);
      case 'sort':
        return this.sortBy(command.mode);
      case 'query-refresh':
        return this.refreshLastQuery();
      case 'cursor':
        if (command.line !== undefined) {
          return this.gotoLine(command.line);
        }
        return this.moveCursor(command.delta ?? 0);
      case 'close':
        this.close();
        return null;
    }
  }

  private narrow(kind: QueryKind, term: string): ViewState {
    const view = this.requireView(kind);
    const composing =
      view.state.visibleIds.length < this.store.size() || view.state.queryStack.length > 0;
    const scope = composing ? view.state.visibleIds : this.allIds();

    // Throws NoMatchesError before anything is committed
    const matched = applyQuery(this.store, { kind, term }, scope);

    const queryTerm: QueryTerm = { kind, term };
    const queryStack = pushTerm(composing ? view.state.queryStack : EMPTY_STACK, queryTerm);
    this.searchHistory.push(queryTerm);

    return this.rederive(view, this.sortIds(matched, view.sorter), { queryStack }, view.sorter);
  }

  /** Commit a new visible list; the cursor survives only in unnarrowed views */
  private rederive(
    view: LiveView,
    visibleIds: string[],
    changes: Partial<Pick<ViewState, 'sortMode' | 'queryStack'>>,
    sorter: Sorter
  ): ViewState {
    const universe = this.store.size();
    const narrowed = visibleIds.length < universe;
    const cursorLine = narrowed ? 1 : clampLine(view.state.cursorLine, visibleIds.length);

    return this.commit({
      state: {
        ...view.state,
        ...changes,
        visibleIds,
        cursorLine,
      },
      sorter,
      scoped: narrowed,
    });
  }

  private commit(next: LiveView): ViewState {
    const state = freezeState(next.state);
    this.view = { ...next, state };
    return state;
  }

  private requireView(command: string): LiveView {
    if (!this.view) {
      throw new InvalidContextError(command);
    }
    return this.view;
  }

  private allIds(): string[] {
    return this.store.listAll().map((note) => note.id);
  }

  /** Ids the store still knows, first occurrence order */
  private existing(ids: readonly string[]): string[] {
    return Array.from(new Set(ids)).filter((id) => this.store.get(id) !== undefined);
  }

  private sortIds(ids: readonly string[], sorter: Sorter): string[] {
    const notes: Note[] = [];
    for (const id of ids) {
      const note = this.store.get(id);
      if (note) notes.push(note);
    }
    return sorter(notes).map((note) => note.id);
  }
}
