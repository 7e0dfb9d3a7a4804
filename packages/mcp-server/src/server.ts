/**
 * MCP server assembly - shared by the stdio entry point and the tests
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IndexView } from '@zk-index/core';
import type { StoreLoadResult, VaultNoteStore } from './core/read/noteStore.js';
import { serverLog } from './core/shared/serverLog.js';
import { registerViewTools } from './tools/read/view.js';
import { registerSystemTools } from './tools/read/system.js';

export const SERVER_NAME = 'zk-index';
export const SERVER_VERSION = '0.1.0';

export interface ServerContext {
  store: VaultNoteStore;
  view: IndexView;
}

/**
 * Reload the store from disk and refresh an open view against the new
 * snapshot.
 */
export async function reloadNotes(context: ServerContext): Promise<StoreLoadResult> {
  const result = await context.store.load();
  if (context.view.isOpen()) {
    const state = context.view.refresh();
    serverLog('view', `Refreshed open view: ${state.visibleIds.length} of ${context.store.size()} notes`);
  }
  return result;
}

export function createServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerViewTools(server, () => context.view, () => context.store);
  registerSystemTools(server, () => context.view, () => context.store, () => reloadNotes(context));

  return server;
}
