/**
 * Row formatting - a stateless projection of visible ids to display rows
 *
 * Template placeholders:
 *   %i  note id
 *   %t  title
 *   %c  creation date (YYYY-MM-DD)
 *   %m  modification date (YYYY-MM-DD)
 *   %s  size in bytes
 *   %%  literal percent sign
 */

import type { DisplayRow, Formatter, Note, NoteStore } from './types.js';

export const DEFAULT_INDEX_FORMAT = '%t [[%i]]';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date as YYYY-MM-DD */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function createFormatter(template: string = DEFAULT_INDEX_FORMAT): Formatter {
  return (note: Note) =>
    template.replace(/%([itcms%])/g, (_match, code: string) => {
      switch (code) {
        case 'i': return note.id;
        case 't': return note.title;
        case 'c': return formatDate(note.createdAt);
        case 'm': return formatDate(note.modifiedAt);
        case 's': return String(note.sizeBytes);
        default: return '%';
      }
    });
}

export const defaultFormatter: Formatter = createFormatter();

/**
 * Project ids onto numbered rows. Ids the store no longer knows are skipped
 * and do not consume a line number.
 */
export function renderRows(
  ids: readonly string[],
  store: NoteStore,
  formatter: Formatter = defaultFormatter
): DisplayRow[] {
  const rows: DisplayRow[] = [];
  for (const id of ids) {
    const note = store.get(id);
    if (!note) continue;
    rows.push({
      line: rows.length + 1,
      id: note.id,
      title: note.title,
      path: note.path,
      text: formatter(note),
    });
  }
  return rows;
}
