import * as fs from 'fs';
import * as path from 'path';

const VAULT_MARKERS = ['.zk', '.obsidian'];

/**
 * Find the notes directory by walking up the directory tree.
 * Looks for a .zk or .obsidian folder as marker.
 */
export function findVaultRoot(startPath?: string): string {
  let current = path.resolve(startPath || process.cwd());

  while (true) {
    for (const marker of VAULT_MARKERS) {
      const markerPath = path.join(current, marker);
      if (fs.existsSync(markerPath) && fs.statSync(markerPath).isDirectory()) {
        return current;
      }
    }

    const parent = path.dirname(current);
    if (parent === current) {
      // Reached filesystem root, fall back to start path or cwd
      return startPath || process.cwd();
    }
    current = parent;
  }
}
