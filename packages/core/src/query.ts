/**
 * Query / narrowing engine
 *
 * Applies focus (title) and search (content) predicates to a scope of note
 * ids. Nothing here touches view state; an empty result throws before the
 * caller can commit anything.
 */

import type { NoteStore, QueryTerm } from './types.js';
import { NoMatchesError } from './errors.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a user term into a case-sensitive regexp.
 * Terms that are not valid regular expressions match literally.
 */
export function compileTerm(term: string, flags: string = ''): RegExp {
  try {
    return new RegExp(term, flags);
  } catch {
    return new RegExp(escapeRegExp(term), flags);
  }
}

function candidates(store: NoteStore, query: QueryTerm): ReadonlySet<string> {
  return query.kind === 'focus'
    ? store.titleMatches(query.term)
    : store.contentMatches(query.term);
}

/**
 * Narrow `scope` by one term. Result keeps scope order.
 *
 * @throws NoMatchesError when nothing in scope matches
 */
export function applyQuery(
  store: NoteStore,
  query: QueryTerm,
  scope: readonly string[]
): string[] {
  const matches = candidates(store, query);
  const matched = scope.filter((id) => matches.has(id));

  if (matched.length === 0) {
    throw new NoMatchesError(query.term);
  }

  return matched;
}

/**
 * Re-apply a composed narrowing (oldest term first) to the whole corpus.
 *
 * @throws NoMatchesError naming the term that emptied the result
 */
export function reapplyTerms(store: NoteStore, terms: readonly QueryTerm[]): string[] {
  let scope = store.listAll().map((note) => note.id);
  for (const term of terms) {
    scope = applyQuery(store, term, scope);
  }
  return scope;
}
