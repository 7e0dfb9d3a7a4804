import { describe, it, expect } from 'vitest';
import { applyQuery, compileTerm, reapplyTerms } from '../src/query.js';
import { NoMatchesError } from '../src/errors.js';
import { makeStore } from './helpers.js';

const store = makeStore([
  { id: 'a', title: 'Alpha draft', content: 'first line\nmentions Beta' },
  { id: 'b', title: 'Beta', content: 'TODO: write' },
  { id: 'c', title: 'Gamma draft', content: 'todo later' },
]);

describe('compileTerm', () => {
  it('compiles valid regular expressions as-is', () => {
    expect(compileTerm('^Al').test('Alpha')).toBe(true);
    expect(compileTerm('^Al').test('Pal')).toBe(false);
  });

  it('escapes invalid ones', () => {
    const pattern = compileTerm('[draft');
    expect(pattern.test('a [draft] note')).toBe(true);
    expect(pattern.test('draft')).toBe(false);
  });
});

describe('applyQuery', () => {
  it('matches titles for focus, keeping scope order', () => {
    expect(applyQuery(store, { kind: 'focus', term: 'draft' }, ['c', 'b', 'a'])).toEqual(['c', 'a']);
  });

  it('matches content for search', () => {
    expect(applyQuery(store, { kind: 'search', term: 'TODO' }, ['a', 'b', 'c'])).toEqual(['b']);
  });

  it('ignores matches outside the scope', () => {
    expect(applyQuery(store, { kind: 'focus', term: 'draft' }, ['b', 'c'])).toEqual(['c']);
  });

  it('throws NoMatches with the term', () => {
    expect(() => applyQuery(store, { kind: 'focus', term: 'Delta' }, ['a', 'b', 'c'])).toThrow(
      new NoMatchesError('Delta')
    );
  });
});

describe('reapplyTerms', () => {
  it('intersects terms from the full corpus', () => {
    const ids = reapplyTerms(store, [
      { kind: 'focus', term: 'draft' },
      { kind: 'search', term: 'Beta' },
    ]);
    expect(ids).toEqual(['a']);
  });

  it('names the term that emptied the result', () => {
    expect(() =>
      reapplyTerms(store, [
        { kind: 'focus', term: 'Beta' },
        { kind: 'search', term: 'todo' },
      ])
    ).toThrow('No matches for "todo"');
  });
});
