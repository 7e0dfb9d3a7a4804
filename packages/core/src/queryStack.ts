/**
 * Query stack - the log of applied focus/search predicates
 *
 * Stacks are immutable arrays, newest term first. Every operation returns
 * a new stack.
 */

import type { QueryKind, QueryStack, QueryTerm } from './types.js';

const KIND_LABELS: Record<QueryKind, string> = {
  focus: 'Focus',
  search: 'Search',
};

export const EMPTY_STACK: QueryStack = Object.freeze([]);

export function pushTerm(stack: QueryStack, term: QueryTerm): QueryStack {
  return Object.freeze([Object.freeze({ ...term }), ...stack]);
}

export function resetStack(): QueryStack {
  return EMPTY_STACK;
}

/** Kind of the newest term, or null for an empty stack */
export function activeKind(stack: QueryStack): QueryKind | null {
  return stack[0]?.kind ?? null;
}

/** Terms in the order they were applied (oldest first) */
export function composeTerms(stack: QueryStack): QueryTerm[] {
  return [...stack].reverse();
}

/**
 * Render the stack as a breadcrumb, e.g. `[Search: "b" | Focus: "c + a"]`.
 *
 * Terms are grouped by kind, each group keeps stack order, and the group
 * of `active` is placed last.
 */
export function renderBreadcrumb(stack: QueryStack, active: QueryKind): string {
  const groups = new Map<QueryKind, string[]>([
    ['focus', []],
    ['search', []],
  ]);

  for (const { kind, term } of stack) {
    groups.get(kind)?.push(term);
  }

  const order: QueryKind[] = active === 'focus' ? ['search', 'focus'] : ['focus', 'search'];
  const parts: string[] = [];
  for (const kind of order) {
    const terms = groups.get(kind) ?? [];
    if (terms.length === 0) continue;
    parts.push(`${KIND_LABELS[kind]}: "${terms.join(' + ')}"`);
  }

  return `[${parts.join(' | ')}]`;
}
