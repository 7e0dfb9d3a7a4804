/**
 * Note id grammar
 *
 * Note files are named "<id> <title>.<ext>". Ids are timestamps by default
 * (YYYYMMDDhhmm), so they sort lexicographically by creation instant.
 */

/** Default id pattern: twelve digits, YYYYMMDDhhmm */
export const DEFAULT_ID_PATTERN = '\\d{12}';

export const DEFAULT_EXTENSION = 'md';

export interface NoteFileName {
  id: string;
  title: string;
}

export interface NoteFileNameOptions {
  idPattern?: string;
  extension?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a matcher for note file names.
 * Throws if `idPattern` is not a valid regular expression.
 */
export function createFileNameMatcher(options: NoteFileNameOptions = {}): RegExp {
  const { idPattern = DEFAULT_ID_PATTERN, extension = DEFAULT_EXTENSION } = options;
  return new RegExp(`^(?<id>${idPattern})(?:\\s+(?<title>.*?))?\\.${escapeRegExp(extension)}$`);
}

/**
 * Split a note file name into id and title.
 * Returns null when the name carries no id.
 */
export function parseNoteFileName(fileName: string, matcher: RegExp): NoteFileName | null {
  const match = matcher.exec(fileName);
  if (!match) return null;

  const id = match.groups?.id;
  if (!id) return null;

  return {
    id,
    title: match.groups?.title?.trim() ?? '',
  };
}

/**
 * Leading digit run of an id, used as its creation key.
 * Ids without one fall back to the whole id.
 */
export function timestampPrefix(id: string): string {
  const digits = /^\d+/.exec(id);
  return digits ? digits[0] : id;
}

/**
 * Creation instant encoded in a timestamp id (local time).
 * Accepts YYYYMMDD with optional hh, mm and ss parts.
 */
export function dateFromId(id: string): Date | null {
  const digits = timestampPrefix(id);
  if (!/^\d+$/.test(digits) || digits.length < 8 || digits.length > 14 || digits.length % 2 !== 0) {
    return null;
  }

  const part = (start: number, end: number): number =>
    digits.length >= end ? parseInt(digits.slice(start, end), 10) : 0;

  const year = part(0, 4);
  const month = part(4, 6);
  const day = part(6, 8);
  const hour = part(8, 10);
  const minute = part(10, 12);
  const second = part(12, 14);

  const date = new Date(year, month - 1, day, hour, minute, second);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hour ||
    date.getMinutes() !== minute
  ) {
    return null;
  }

  return date;
}
