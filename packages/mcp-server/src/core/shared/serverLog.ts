/**
 * Activity log of the index server
 *
 * Keeps the last MAX_ENTRIES records of store loads, watcher reloads, config
 * warnings and rejected view commands, and echoes each one to stderr, since
 * stdout is the MCP channel. The `server_log` tool reads it back.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'server' | 'store' | 'view' | 'watcher' | 'config';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const serverStartTs = Date.now();

/** Record a message and echo it to stderr */
export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const prefix = level === 'error' ? '[zk-index] ERROR' : level === 'warn' ? '[zk-index] WARN' : '[zk-index]';
  console.error(`${prefix} [${component}] ${message}`);
}

/**
 * Entries newer than `since`, from one component, newest `limit` of them
 * (100 by default), oldest first
 */
export function getServerLog(options: {
  since?: number;
  component?: string;
  limit?: number;
} = {}): { entries: LogEntry[]; server_uptime_ms: number } {
  const { since, component, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return {
    entries,
    server_uptime_ms: Date.now() - serverStartTs,
  };
}

/** Render an unknown thrown value as a message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
