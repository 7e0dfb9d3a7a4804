#!/usr/bin/env node
/**
 * zk-index MCP server - a navigable index over a zettelkasten notes directory
 *
 * Tools: index_open, index_refresh, index_focus, index_search, index_sort,
 *        index_query_refresh, index_cursor, index_close, index_history,
 *        index_reload, server_log
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { IndexView, createFormatter } from '@zk-index/core';
import { loadConfig } from './core/read/config.js';
import { VaultNoteStore } from './core/read/noteStore.js';
import { createVaultWatcher, type VaultWatcher } from './core/read/watch/index.js';
import { serverLog, errorMessage } from './core/shared/serverLog.js';
import { createServer, reloadNotes, type ServerContext } from './server.js';

// ============================================================================
// Configuration
// ============================================================================

const config = loadConfig();

const store = new VaultNoteStore({
  vaultPath: config.vaultPath,
  extension: config.extension,
  idPattern: config.idPattern,
});

const context: ServerContext = {
  store,
  view: new IndexView(store, {
    defaultSort: config.defaultSort,
    formatter: createFormatter(config.indexFormat),
  }),
};

const server = createServer(context);
let watcher: VaultWatcher | null = null;

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  serverLog('server', `Starting zk-index server`);
  serverLog('server', `Notes directory: ${config.vaultPath} (*.${config.extension}, id ${config.idPattern})`);

  const startTime = Date.now();
  await store.load();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', `MCP server connected in ${Date.now() - startTime}ms`);

  if (config.watch) {
    watcher = createVaultWatcher({
      vaultPath: store.vaultPath,
      extension: config.extension,
      debounceMs: config.debounceMs,
      onChange: async () => {
        await reloadNotes(context);
      },
    });
    watcher.start();
  } else {
    serverLog('watcher', 'File watching disabled (ZK_WATCH=false)');
  }
}

async function shutdown(signal: string): Promise<void> {
  serverLog('server', `Received ${signal}, shutting down`);
  try {
    await watcher?.stop();
    await server.close();
    store.close();
  } catch (err) {
    serverLog('server', `Error during shutdown: ${errorMessage(err)}`, 'error');
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

main().catch((error) => {
  serverLog('server', `Fatal error: ${errorMessage(error)}`, 'error');
  process.exit(1);
});
