/**
 * Which paths under the notes directory the watcher cares about
 *
 * A path counts when it is a note file (by extension) that is not hidden and
 * sits outside the directories the store scan skips. Editor temp files such
 * as `note.md~`, `#note.md#` or `.note.md.swp` fail the extension or hidden
 * check on their own.
 */

import path from 'path';
import { EXCLUDED_DIRS } from '../vault.js';

/**
 * Use forward slashes; on Windows also lowercase, since paths compare
 * case-insensitively there
 */
export function normalizePath(filePath: string): string {
  const normalized = filePath.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

export function getRelativePath(vaultPath: string, filePath: string): string {
  return normalizePath(path.relative(vaultPath, filePath));
}

function segmentsOf(vaultPath: string, filePath: string): string[] {
  return getRelativePath(vaultPath, filePath).split('/').filter(s => s.length > 0);
}

function isNoteFile(name: string, extension: string): boolean {
  return !name.startsWith('.') && name.toLowerCase().endsWith(`.${extension.toLowerCase()}`);
}

/**
 * Whether a change to this path should trigger a reload
 *
 * @param extension - note extension without the dot
 */
export function shouldWatch(filePath: string, vaultPath: string, extension: string = 'md'): boolean {
  const segments = segmentsOf(vaultPath, filePath);
  const filename = segments.pop();
  if (filename === undefined) return false;

  return !segments.some(segment => EXCLUDED_DIRS.has(segment)) && isNoteFile(filename, extension);
}

/**
 * chokidar `ignored` callback. It is asked about directories too, and an
 * ignored directory is never descended into, so plain directories pass and
 * hidden ones are pruned.
 */
export function createIgnoreFunction(vaultPath: string, extension: string = 'md'): (filePath: string) => boolean {
  const suffix = `.${extension.toLowerCase()}`;

  return (filePath: string): boolean => {
    const segments = segmentsOf(vaultPath, filePath);
    const last = segments[segments.length - 1];
    if (last === undefined) return false; // the vault root

    if (segments.some(segment => EXCLUDED_DIRS.has(segment))) return true;

    if (!last.toLowerCase().endsWith(suffix)) {
      return last.startsWith('.');
    }
    return !shouldWatch(filePath, vaultPath, extension);
  };
}
