/**
 * System tools
 * Tools: index_reload, server_log
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IndexView, NoteStore } from '@zk-index/core';
import type { StoreLoadResult } from '../../core/read/noteStore.js';
import { MAX_LIMIT } from '../../core/read/constants.js';
import { getServerLog, errorMessage } from '../../core/shared/serverLog.js';
import { viewPayload } from './view.js';

/**
 * Register system/utility tools with the MCP server
 */
export function registerSystemTools(
  server: McpServer,
  getView: () => IndexView,
  getStore: () => NoteStore,
  reload: () => Promise<StoreLoadResult>
): void {
  server.tool(
    'index_reload',
    'Rescan the notes directory without restarting the server. An open index view is refreshed afterwards.',
    {},
    async () => {
      try {
        const result = await reload();
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              notes: result.notes,
              skipped: result.skipped,
              duplicates: result.duplicates,
              duration_ms: result.durationMs,
              view: viewPayload(getView(), getStore()),
            }, null, 2),
          }],
        };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ error: `Error reloading notes: ${errorMessage(err)}` }) }],
          isError: true,
        };
      }
    }
  );

  server.tool(
    'server_log',
    'Recent server activity (startup, store loads, watcher events, config warnings), oldest first.',
    {
      since: z.number().optional().describe('Only entries after this epoch-millisecond timestamp'),
      component: z.enum(['server', 'store', 'view', 'watcher', 'config']).optional().describe('Filter by component'),
      limit: z.number().min(1).max(MAX_LIMIT).default(100).describe('Max entries to return'),
    },
    async ({ since, component, limit }) => {
      const log = getServerLog({ since, component, limit });
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            entries: log.entries.map((entry) => ({
              ...entry,
              time: new Date(entry.ts).toISOString(),
            })),
            count: log.entries.length,
            server_uptime_ms: log.server_uptime_ms,
          }, null, 2),
        }],
      };
    }
  );
}
