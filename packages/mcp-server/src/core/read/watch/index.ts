/**
 * Vault file watcher
 *
 * Watches the notes directory with chokidar, debounces bursts of events and
 * hands the touched paths to a single reload callback. Reloads never overlap:
 * changes that arrive during a reload trigger one more run afterwards.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import { DebouncedBatch } from './debounce.js';
import { shouldWatch, createIgnoreFunction } from './pathFilter.js';
import { serverLog, errorMessage } from '../../shared/serverLog.js';

export { shouldWatch, createIgnoreFunction, normalizePath, getRelativePath } from './pathFilter.js';
export { DebouncedBatch, type FlushHandler } from './debounce.js';

export type WatcherState = 'idle' | 'starting' | 'ready' | 'reloading' | 'error';

export interface WatcherStatus {
  state: WatcherState;
  pendingEvents: number;
  lastReload: number | null;
  error: string | null;
}

export interface CreateWatcherOptions {
  vaultPath: string;
  extension?: string;
  debounceMs: number;

  /** Called with the paths touched since the last reload */
  onChange: (paths: string[]) => Promise<void>;

  /** Use polling instead of native events (network drives, containers) */
  usePolling?: boolean;
}

export interface VaultWatcher {
  readonly status: WatcherStatus;
  start(): void;
  stop(): Promise<void>;
  /** Deliver pending events now instead of waiting for the debounce */
  flush(): void;
}

export function createVaultWatcher(options: CreateWatcherOptions): VaultWatcher {
  const { vaultPath, extension = 'md', debounceMs, onChange, usePolling = false } = options;

  let state: WatcherState = 'idle';
  let lastReload: number | null = null;
  let error: string | null = null;
  let watcher: FSWatcher | null = null;
  let running = false;
  let queued: string[] = [];

  const run = async (paths: string[]): Promise<void> => {
    if (running) {
      queued.push(...paths);
      return;
    }

    running = true;
    state = 'reloading';
    try {
      await onChange(paths);
      lastReload = Date.now();
      state = 'ready';
      error = null;
    } catch (err) {
      state = 'error';
      error = errorMessage(err);
      serverLog('watcher', `Reload failed: ${error}`, 'error');
    } finally {
      running = false;
    }

    if (queued.length > 0) {
      const next = queued;
      queued = [];
      await run(next);
    }
  };

  const batch = new DebouncedBatch(debounceMs, (paths) => {
    serverLog('watcher', `${paths.length} file(s) changed, reloading`);
    void run(paths);
  });

  const accept = (event: string) => (filePath: string): void => {
    if (shouldWatch(filePath, vaultPath, extension)) {
      batch.push(filePath);
    } else {
      serverLog('watcher', `Ignored ${event} ${filePath}`);
    }
  };

  return {
    get status(): WatcherStatus {
      return {
        state,
        pendingEvents: batch.size + queued.length,
        lastReload,
        error,
      };
    },

    start(): void {
      if (watcher) {
        serverLog('watcher', 'Watcher already started', 'warn');
        return;
      }

      serverLog('watcher', `Watching ${vaultPath} (debounce: ${debounceMs}ms, polling: ${usePolling})`);
      state = 'starting';

      watcher = chokidar.watch(vaultPath, {
        ignored: createIgnoreFunction(vaultPath, extension),
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 300,
          pollInterval: 100,
        },
        usePolling,
      });

      watcher.on('add', accept('add'));
      watcher.on('change', accept('change'));
      watcher.on('unlink', accept('unlink'));

      watcher.on('ready', () => {
        state = 'ready';
        serverLog('watcher', 'File watcher ready');
      });

      watcher.on('error', (err) => {
        state = 'error';
        error = errorMessage(err);
        serverLog('watcher', `Watcher error: ${error}`, 'error');
      });
    },

    async stop(): Promise<void> {
      if (!watcher) {
        return;
      }
      serverLog('watcher', 'Stopping file watcher');
      batch.dispose();
      const current = watcher;
      watcher = null;
      state = 'idle';
      await current.close();
    },

    flush(): void {
      batch.flush();
    },
  };
}
