/**
 * VaultNoteStore - the NoteStore backed by a directory of note files
 *
 * Metadata and note bodies live in memory. load() reads the whole vault
 * into fresh maps and swaps both in together, so readers never see a
 * half-built store.
 */

import * as fs from 'fs';
import * as path from 'path';
import matter from 'gray-matter';
import {
  compileTerm,
  createFileNameMatcher,
  dateFromId,
  parseNoteFileName,
  type Note,
  type NoteMetadata,
  type NoteStore,
} from '@zk-index/core';
import { scanVault } from './vault.js';
import { serverLog, errorMessage } from '../shared/serverLog.js';

export interface VaultNoteStoreOptions {
  vaultPath: string;
  extension?: string;
  idPattern?: string;
}

export interface StoreLoadResult {
  notes: number;
  skipped: number;
  duplicates: number;
  durationMs: number;
}

/** Front-matter title, when the note declares one */
function frontMatterTitle(raw: string, file: string): string | undefined {
  if (!raw.startsWith('---')) return undefined;
  try {
    const title: unknown = matter(raw).data.title;
    if (typeof title === 'string' && title.trim() !== '') {
      return title.trim();
    }
  } catch (err) {
    serverLog('store', `Ignoring front matter in ${file}: ${errorMessage(err)}`, 'warn');
  }
  return undefined;
}

export class VaultNoteStore implements NoteStore {
  readonly vaultPath: string;
  private readonly extension: string;
  private readonly matcher: RegExp;
  private notes = new Map<string, Note>();
  private contents = new Map<string, string>();
  private loadQueue: Promise<unknown> = Promise.resolve();
  private lastLoad: Date | null = null;

  constructor(options: VaultNoteStoreOptions) {
    this.vaultPath = path.resolve(options.vaultPath);
    this.extension = options.extension ?? 'md';
    this.matcher = createFileNameMatcher({ idPattern: options.idPattern, extension: this.extension });
  }

  /**
   * Rescan the vault. Loads run one at a time; a load requested while
   * another is running starts after it finishes.
   */
  load(): Promise<StoreLoadResult> {
    const next = this.loadQueue.then(() => this.loadSnapshot(), () => this.loadSnapshot());
    this.loadQueue = next;
    return next;
  }

  private async loadSnapshot(): Promise<StoreLoadResult> {
    const start = Date.now();
    const files = await scanVault(this.vaultPath, this.extension);

    const notes = new Map<string, Note>();
    const contents = new Map<string, string>();
    let skipped = 0;
    let duplicates = 0;

    for (const file of files) {
      const parsed = parseNoteFileName(path.basename(file.path), this.matcher);
      if (!parsed) {
        serverLog('store', `Skipping ${file.path}: file name carries no note id`, 'warn');
        skipped++;
        continue;
      }

      const existing = notes.get(parsed.id);
      if (existing) {
        serverLog('store', `Duplicate id ${parsed.id}: keeping ${existing.path}, ignoring ${file.absolutePath}`, 'warn');
        duplicates++;
        continue;
      }

      let content: string;
      try {
        content = await fs.promises.readFile(file.absolutePath, 'utf-8');
      } catch (err) {
        serverLog('store', `Skipping ${file.path}: ${errorMessage(err)}`, 'warn');
        skipped++;
        continue;
      }

      notes.set(parsed.id, {
        id: parsed.id,
        title: frontMatterTitle(content, file.path) ?? parsed.title,
        path: file.absolutePath,
        modifiedAt: file.modified,
        createdAt: dateFromId(parsed.id) ?? file.created,
        sizeBytes: file.size,
      });
      contents.set(parsed.id, content);
    }

    this.notes = notes;
    this.contents = contents;
    this.lastLoad = new Date();

    const result: StoreLoadResult = {
      notes: notes.size,
      skipped,
      duplicates,
      durationMs: Date.now() - start,
    };
    serverLog('store', `Loaded ${result.notes} notes from ${this.vaultPath} in ${result.durationMs}ms`);
    return result;
  }

  get loadedAt(): Date | null {
    return this.lastLoad;
  }

  listAll(): readonly Note[] {
    return Array.from(this.notes.values());
  }

  titleMatches(term: string): ReadonlySet<string> {
    const pattern = compileTerm(term);
    const ids = new Set<string>();
    for (const note of this.notes.values()) {
      if (pattern.test(note.title)) ids.add(note.id);
    }
    return ids;
  }

  contentMatches(term: string): ReadonlySet<string> {
    // Multiline so ^ and $ anchor at line boundaries
    const pattern = compileTerm(term, 'm');
    const ids = new Set<string>();
    for (const [id, content] of this.contents) {
      if (pattern.test(content)) ids.add(id);
    }
    return ids;
  }

  resolvePath(id: string): string | undefined {
    return this.notes.get(id)?.path;
  }

  metadata(id: string): NoteMetadata | undefined {
    const note = this.notes.get(id);
    if (!note) return undefined;
    return {
      modifiedAt: note.modifiedAt,
      createdAt: note.createdAt,
      sizeBytes: note.sizeBytes,
    };
  }

  get(id: string): Note | undefined {
    return this.notes.get(id);
  }

  size(): number {
    return this.notes.size;
  }

  /** Drop the loaded snapshot */
  close(): void {
    this.notes = new Map();
    this.contents = new Map();
  }
}
