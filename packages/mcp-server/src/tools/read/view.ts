/**
 * Index view tools
 * Tools: index_open, index_refresh, index_focus, index_search, index_sort,
 *        index_query_refresh, index_cursor, index_close, index_history
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  CommandResult,
  DisplayRow,
  IndexCommand,
  IndexView,
  NoteStore,
  SortMode,
} from '@zk-index/core';
import { MAX_LIMIT } from '../../core/read/constants.js';
import { serverLog } from '../../core/shared/serverLog.js';

/** What every view tool returns */
export interface ViewPayload {
  open: boolean;
  count: number;
  total: number;
  narrowed: boolean;
  sort: SortMode | null;
  breadcrumb: string | null;
  cursor: number | null;
  current: DisplayRow | null;
  rows: DisplayRow[];
  truncated: boolean;
}

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const SortModeSchema = z.enum(['modified', 'created', 'size']);

/**
 * Project the view onto the tool payload. At most `limit` rows are listed;
 * `count` always reports the full visible total.
 */
export function viewPayload(view: IndexView, store: NoteStore, limit: number = MAX_LIMIT): ViewPayload {
  const state = view.getState();
  if (!state) {
    return {
      open: false,
      count: 0,
      total: store.size(),
      narrowed: false,
      sort: null,
      breadcrumb: null,
      cursor: null,
      current: null,
      rows: [],
      truncated: false,
    };
  }

  const rows = view.render();
  const currentId = view.noteAtCursor();

  return {
    open: true,
    count: state.visibleIds.length,
    total: store.size(),
    narrowed: view.isNarrowed(),
    sort: state.sortMode,
    breadcrumb: view.getBreadcrumb() ?? null,
    cursor: state.cursorLine,
    current: rows.find((row) => row.id === currentId) ?? null,
    rows: rows.slice(0, limit),
    truncated: rows.length > limit,
  };
}

function jsonResult(value: unknown, isError: boolean = false): ToolResult {
  const result: ToolResult = {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Register index view tools with the MCP server
 */
export function registerViewTools(
  server: McpServer,
  getView: () => IndexView,
  getStore: () => NoteStore
): void {
  const run = (command: IndexCommand): ToolResult => {
    const result: CommandResult = getView().onCommand(command);
    if (!result.ok) {
      serverLog('view', `${command.name} rejected: ${result.error.message}`);
      return jsonResult({ error: result.error.message, code: result.error.code }, true);
    }
    return jsonResult(viewPayload(getView(), getStore()));
  };

  server.tool(
    'index_open',
    'Open the note index. Lists every note (or only the given ids), sorted newest first. Refreshes the view if it is already open.',
    {
      ids: z.array(z.string()).optional().describe('Explicit note ids to list instead of the whole vault'),
      sort: SortModeSchema.optional().describe('Sort mode (default from ZK_DEFAULT_SORT)'),
    },
    async ({ ids, sort }) => run({ name: 'open', ids, sort })
  );

  server.tool(
    'index_refresh',
    'Re-derive the open index from the current notes. A narrowed view keeps its notes; an unnarrowed view picks up new ones.',
    {
      ids: z.array(z.string()).optional().describe('Replace the listing with these note ids (clears focus/search)'),
      sort: SortModeSchema.optional().describe('Switch sort mode while refreshing'),
    },
    async ({ ids, sort }) => run({ name: 'refresh', ids, sort })
  );

  server.tool(
    'index_focus',
    'Narrow the index to notes whose title matches a case-sensitive regular expression.',
    {
      term: z.string().min(1).describe('Title pattern'),
    },
    async ({ term }) => run({ name: 'focus', term })
  );

  server.tool(
    'index_search',
    'Narrow the index to notes whose content matches a case-sensitive regular expression.',
    {
      term: z.string().min(1).describe('Content pattern'),
    },
    async ({ term }) => run({ name: 'search', term })
  );

  server.tool(
    'index_sort',
    'Re-sort the visible notes, newest/largest first.',
    {
      mode: SortModeSchema.describe('modified, created or size'),
    },
    async ({ mode }) => run({ name: 'sort', mode })
  );

  server.tool(
    'index_query_refresh',
    'Re-run the active focus/search terms against the whole vault, e.g. after notes were edited.',
    {},
    async () => run({ name: 'query-refresh' })
  );

  server.tool(
    'index_cursor',
    'Move the cursor by a number of lines, or jump to a line. Returns the note under the cursor as `current`.',
    {
      delta: z.number().int().optional().describe('Lines to move (negative moves up)'),
      line: z.number().int().min(1).optional().describe('Line to jump to (takes precedence over delta)'),
    },
    async ({ delta, line }) => run({ name: 'cursor', delta, line })
  );

  server.tool(
    'index_close',
    'Close the index view. Focus and search terms are discarded; search history is kept.',
    {},
    async () => run({ name: 'close' })
  );

  server.tool(
    'index_history',
    'List the focus and search terms applied this session, oldest first.',
    {
      limit: z.number().min(1).max(MAX_LIMIT).default(50).describe('Most recent entries to return'),
    },
    async ({ limit }) => {
      const history = getView().history();
      return jsonResult({
        history: history.slice(-limit),
        count: history.length,
      });
    }
  );
}
