/**
 * Shared constants for the zk-index MCP server
 */

/** Maximum rows per response to prevent massive payloads */
export const MAX_LIMIT = 200;
