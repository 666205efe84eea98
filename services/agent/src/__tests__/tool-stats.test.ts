import { describe, it, expect, vi } from 'vitest';
import { ToolStats, type ToolStatsStore } from '../tool-stats.js';

function makeStore(overrides?: Partial<ToolStatsStore>): ToolStatsStore {
  return {
    increment: vi.fn(),
    load: vi.fn().mockReturnValue([]),
    ...overrides,
  };
}

describe('ToolStats', () => {
  it('creates entries lazily and never lists tools that were not called', () => {
    const stats = new ToolStats();
    expect(stats.snapshot()).toEqual([]);

    stats.increment('list_stores');

    expect(stats.snapshot()).toEqual([{ toolName: 'list_stores', callCount: 1 }]);
    expect(stats.get('search_users')).toBe(0);
  });

  it('orders the snapshot by count, then by name', () => {
    const stats = new ToolStats();
    for (const name of ['list_stores', 'search_users', 'check_stock_availability', 'search_users', 'list_stores', 'search_users']) {
      stats.increment(name);
    }

    expect(stats.snapshot()).toEqual([
      { toolName: 'search_users', callCount: 3 },
      { toolName: 'list_stores', callCount: 2 },
      { toolName: 'check_stock_availability', callCount: 1 },
    ]);
  });

  it('writes every increment through to the store', () => {
    const store = makeStore();
    const stats = new ToolStats(store);

    stats.increment('list_stores');
    stats.increment('list_stores');

    expect(store.increment).toHaveBeenCalledTimes(2);
    expect(store.increment).toHaveBeenCalledWith('list_stores');
  });

  it('keeps counting in memory when the store write fails', () => {
    const store = makeStore({
      increment: vi.fn(() => {
        throw new Error('disk I/O error');
      }),
    });
    const stats = new ToolStats(store);

    expect(() => stats.increment('list_stores')).not.toThrow();
    expect(stats.get('list_stores')).toBe(1);
  });

  it('hydrates from the store at start-up', () => {
    const store = makeStore({
      load: vi.fn().mockReturnValue([
        { toolName: 'search_users', callCount: 7 },
        { toolName: 'list_stores', callCount: 2 },
      ]),
    });
    const stats = new ToolStats(store);

    stats.hydrate();
    stats.increment('list_stores');

    expect(stats.snapshot()).toEqual([
      { toolName: 'search_users', callCount: 7 },
      { toolName: 'list_stores', callCount: 3 },
    ]);
  });

  it('starts from zero when the store cannot be read', () => {
    const stats = new ToolStats(
      makeStore({
        load: vi.fn(() => {
          throw new Error('no such table: tool_stats');
        }),
      }),
    );

    expect(() => stats.hydrate()).not.toThrow();
    expect(stats.snapshot()).toEqual([]);
  });
});
