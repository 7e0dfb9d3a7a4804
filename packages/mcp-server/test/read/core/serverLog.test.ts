/**
 * Tests for the server activity log
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { serverLog, getServerLog, errorMessage } from '../../../src/core/shared/serverLog.js';

describe('serverLog', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should echo each entry to stderr with its level and component', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    serverLog('watcher', 'Reloaded 3 notes');
    serverLog('store', 'Skipping a.md: no id', 'warn');
    serverLog('view', 'No matches for "x"', 'error');

    expect(stderr.mock.calls).toEqual([
      ['[zk-index] [watcher] Reloaded 3 notes'],
      ['[zk-index] WARN [store] Skipping a.md: no id'],
      ['[zk-index] ERROR [view] No matches for "x"'],
    ]);
  });

  it('should filter by time and component and keep the newest entries', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const since = Date.now() - 1;

    serverLog('watcher', 'first reload');
    serverLog('config', 'Ignoring ZK_WATCH=maybe', 'warn');
    serverLog('watcher', 'second reload');

    const watcher = getServerLog({ since, component: 'watcher' }).entries;
    expect(watcher.map((entry) => entry.message)).toEqual(['first reload', 'second reload']);

    const newest = getServerLog({ since, limit: 1 }).entries;
    expect(newest.map((entry) => entry.message)).toEqual(['second reload']);
  });

  it('should cap the buffer at 200 entries', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    for (let i = 0; i < 250; i++) {
      serverLog('server', `entry ${i}`);
    }

    const entries = getServerLog({ limit: 1000 }).entries;
    expect(entries).toHaveLength(200);
    expect(entries[entries.length - 1]?.message).toBe('entry 249');
  });
});

describe('errorMessage', () => {
  it('should render errors and other thrown values', () => {
    expect(errorMessage(new Error('disk gone'))).toBe('disk gone');
    expect(errorMessage('plain')).toBe('plain');
  });
});
