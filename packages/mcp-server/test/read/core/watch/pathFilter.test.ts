/**
 * Tests for path filtering
 */

import { describe, it, expect } from 'vitest';
import {
  shouldWatch,
  createIgnoreFunction,
  normalizePath,
  getRelativePath,
} from '../../../../src/core/read/watch/pathFilter.js';
import { EXCLUDED_DIRS } from '../../../../src/core/read/vault.js';

const VAULT = '/vault';
const at = (relative: string): string => `${VAULT}/${relative}`;

describe('normalizePath', () => {
  it('should convert backslashes to forward slashes', () => {
    expect(normalizePath('path\\to\\file.md')).toBe('path/to/file.md');
  });

  it('should handle already-normalized paths', () => {
    expect(normalizePath('path/to/file.md')).toBe('path/to/file.md');
  });
});

describe('getRelativePath', () => {
  it('should strip the vault root', () => {
    expect(getRelativePath(VAULT, at('sub/202401010001 Note.md'))).toBe('sub/202401010001 Note.md');
  });
});

describe('shouldWatch', () => {
  it('should accept note files at any depth', () => {
    expect(shouldWatch(at('202401010001 Note.md'), VAULT)).toBe(true);
    expect(shouldWatch(at('deep/nested/202401010001 Note.md'), VAULT)).toBe(true);
  });

  it('should match the extension case-insensitively', () => {
    expect(shouldWatch(at('NOTE.MD'), VAULT)).toBe(true);
  });

  it('should honour a configured extension', () => {
    expect(shouldWatch(at('202401010001 Note.txt'), VAULT, 'txt')).toBe(true);
    expect(shouldWatch(at('202401010001 Note.md'), VAULT, 'txt')).toBe(false);
  });

  it('should reject other file types', () => {
    expect(shouldWatch(at('image.png'), VAULT)).toBe(false);
    expect(shouldWatch(at('data.json'), VAULT)).toBe(false);
  });

  it('should reject ignored directories', () => {
    expect(shouldWatch(at('.git/objects/note.md'), VAULT)).toBe(false);
    expect(shouldWatch(at('.zk/templates/default.md'), VAULT)).toBe(false);
    expect(shouldWatch(at('.obsidian/workspace.md'), VAULT)).toBe(false);
    expect(shouldWatch(at('node_modules/pkg/readme.md'), VAULT)).toBe(false);
  });

  it('should reject hidden files and editor droppings', () => {
    expect(shouldWatch(at('.hidden.md'), VAULT)).toBe(false);
    expect(shouldWatch(at('.#note.md'), VAULT)).toBe(false);
    expect(shouldWatch(at('#note.md#'), VAULT)).toBe(false);
    expect(shouldWatch(at('202401010001 Note.md~'), VAULT)).toBe(false);
    expect(shouldWatch(at('.202401010001 Note.md.swp'), VAULT)).toBe(false);
  });

  it('should skip the same directories as the store scan', () => {
    for (const dir of EXCLUDED_DIRS) {
      expect(shouldWatch(at(`${dir}/202401010001 Note.md`), VAULT)).toBe(false);
    }
    expect(shouldWatch(at('projects/.trash/202401010001 Note.md'), VAULT)).toBe(false);
  });

  it('should reject the vault root itself', () => {
    expect(shouldWatch(VAULT, VAULT)).toBe(false);
  });
});

describe('createIgnoreFunction', () => {
  const ignored = createIgnoreFunction(VAULT);

  it('should never ignore the vault root', () => {
    expect(ignored(VAULT)).toBe(false);
  });

  it('should let ordinary directories through so chokidar descends', () => {
    expect(ignored(at('projects'))).toBe(false);
    expect(ignored(at('projects/2024'))).toBe(false);
  });

  it('should ignore system and hidden directories', () => {
    expect(ignored(at('.git'))).toBe(true);
    expect(ignored(at('.cache'))).toBe(true);
    expect(ignored(at('.private'))).toBe(true);
  });

  it('should apply note filtering to note files', () => {
    expect(ignored(at('202401010001 Note.md'))).toBe(false);
    expect(ignored(at('.hidden.md'))).toBe(true);
  });
});
