/**
 * Vault scanner - finds all note files under the notes directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { serverLog, errorMessage } from '../shared/serverLog.js';

/** Directories to exclude from scanning */
export const EXCLUDED_DIRS = new Set([
  '.zk',
  '.obsidian',
  '.trash',
  '.git',
  'node_modules',
]);

/** File info returned by the scanner */
export interface VaultFile {
  path: string;        // Relative path from vault root
  absolutePath: string; // Full filesystem path
  modified: Date;
  created: Date;
  size: number;
}

/**
 * Recursively scan a directory for files ending in `.<extension>`.
 * Results are sorted by relative path.
 */
export async function scanVault(vaultPath: string, extension: string = 'md'): Promise<VaultFile[]> {
  const files: VaultFile[] = [];
  const suffix = `.${extension}`;

  async function scan(dir: string, relativePath: string = ''): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      serverLog('store', `Could not read directory ${dir}: ${errorMessage(err)}`, 'warn');
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? path.join(relativePath, entry.name) : entry.name;

      if (entry.isDirectory()) {
        if (EXCLUDED_DIRS.has(entry.name)) {
          continue;
        }
        await scan(fullPath, relPath);
      } else if (entry.isFile() && entry.name.endsWith(suffix)) {
        try {
          const stats = await fs.promises.stat(fullPath);
          files.push({
            path: relPath.replace(/\\/g, '/'), // Normalize to forward slashes
            absolutePath: fullPath,
            modified: stats.mtime,
            created: stats.birthtime,
            size: stats.size,
          });
        } catch (err) {
          serverLog('store', `Could not stat ${fullPath}: ${errorMessage(err)}`, 'warn');
        }
      }
    }
  }

  await scan(vaultPath);
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return files;
}
