import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { ConfigWatcher, type SettleNotification } from '../../src/sync/watcher.js';
import type { AppDescriptor } from '../../src/types/canonical.js';
import { createTestLogger } from '../helpers.js';

const ROOT = join('/', 'home', 'tester');
const CLAUDE = join(ROOT, '.config', 'Claude', 'claude_desktop_config.json');
const CURSOR = join(ROOT, '.cursor', 'mcp.json');

const APPS: AppDescriptor[] = [
  { name: 'Claude', path: CLAUDE, preferredFormat: 'claude' },
  { name: 'Cursor', path: CURSOR, preferredFormat: 'standard' },
];

async function drain(watcher: ConfigWatcher, count: number): Promise<SettleNotification[]> {
  const iterator = watcher.notifications()[Symbol.asyncIterator]();
  const items: SettleNotification[] = [];
  for (let i = 0; i < count; i++) {
    const result = await iterator.next();
    if (result.done) {
      break;
    }
    items.push(result.value);
  }
  return items;
}

describe('ConfigWatcher', () => {
  let watcher: ConfigWatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    watcher = new ConfigWatcher(APPS, { debounceMs: 2000, selfWriteWindowMs: 3000, logger: createTestLogger() });
  });

  afterEach(async () => {
    await watcher.close();
    vi.useRealTimers();
  });

  it('should watch each config file through its parent directory', () => {
    expect(watcher.watchedPaths).toEqual([CLAUDE, CURSOR]);
    expect(watcher.directories).toEqual([join(ROOT, '.config', 'Claude'), join(ROOT, '.cursor')]);
  });

  it('should emit once the file has been quiet for the debounce period', async () => {
    watcher.handleEvent('change', CLAUDE);

    vi.advanceTimersByTime(1999);
    expect(watcher.queuedCount).toBe(0);
    expect(watcher.pendingCount).toBe(1);

    vi.advanceTimersByTime(1);
    expect(watcher.pendingCount).toBe(0);
    expect(await drain(watcher, 1)).toEqual([{ appName: 'Claude', path: CLAUDE }]);
  });

  it('should coalesce a burst of events into one notification', () => {
    watcher.handleEvent('change', CLAUDE);
    vi.advanceTimersByTime(1500);
    watcher.handleEvent('change', CLAUDE);
    vi.advanceTimersByTime(1500);
    watcher.handleEvent('change', CLAUDE);

    vi.advanceTimersByTime(1999);
    expect(watcher.queuedCount).toBe(0);

    vi.advanceTimersByTime(1);
    expect(watcher.queuedCount).toBe(1);
  });

  it('should debounce each file on its own timer', async () => {
    watcher.handleEvent('change', CLAUDE);
    vi.advanceTimersByTime(1000);
    watcher.handleEvent('change', CURSOR);
    expect(watcher.pendingCount).toBe(2);

    vi.advanceTimersByTime(1000);
    expect(watcher.queuedCount).toBe(1);

    vi.advanceTimersByTime(1000);
    expect(await drain(watcher, 2)).toEqual([
      { appName: 'Claude', path: CLAUDE },
      { appName: 'Cursor', path: CURSOR },
    ]);
  });

  it('should ignore unrelated files and event types', () => {
    watcher.handleEvent('change', join(ROOT, '.cursor', 'other.json'));
    watcher.handleEvent('addDir', join(ROOT, '.cursor'));
    watcher.handleEvent('unlinkDir', join(ROOT, '.cursor'));

    expect(watcher.pendingCount).toBe(0);
  });

  it('should treat a delete followed by a create as one change', () => {
    watcher.handleEvent('unlink', CURSOR);
    vi.advanceTimersByTime(10);
    watcher.handleEvent('add', CURSOR);

    vi.advanceTimersByTime(2000);

    expect(watcher.queuedCount).toBe(1);
  });

  it('should match paths that are not normalized', () => {
    watcher.handleEvent('change', join(ROOT, '.cursor', '..', '.cursor', 'mcp.json'));
    expect(watcher.pendingCount).toBe(1);
  });

  it('should ignore events for its own writes inside the window', () => {
    watcher.markSelfWrite(CURSOR);

    vi.advanceTimersByTime(2999);
    watcher.handleEvent('change', CURSOR);
    expect(watcher.pendingCount).toBe(0);

    vi.advanceTimersByTime(1);
    watcher.handleEvent('change', CURSOR);
    expect(watcher.pendingCount).toBe(1);
  });

  it('should only suppress the file that was written', () => {
    watcher.markSelfWrite(CURSOR);

    watcher.handleEvent('change', CLAUDE);

    expect(watcher.pendingCount).toBe(1);
  });

  it('should drop pending and queued work on close', async () => {
    watcher.handleEvent('change', CLAUDE);
    vi.advanceTimersByTime(2000);
    watcher.handleEvent('change', CURSOR);

    await watcher.close();
    vi.advanceTimersByTime(5000);

    expect(watcher.pendingCount).toBe(0);
    expect(watcher.queuedCount).toBe(0);
    expect(await drain(watcher, 1)).toEqual([]);

    watcher.handleEvent('change', CLAUDE);
    expect(watcher.pendingCount).toBe(0);
  });
});
