/**
 * Process-wide tool usage counters.
 *
 * Counts live in memory and are written through to a durable store on every
 * increment. The store is best-effort: a failed write is logged and the
 * in-memory count still moves, so the two views can drift until restart.
 */
import { logger } from '@rxdesk/shared';
import type Database from 'better-sqlite3';
import { incrementToolStat, listToolStats } from './db.js';

const log = logger.child({ module: 'tool-stats' });

export interface ToolStatEntry {
  toolName: string;
  callCount: number;
}

export interface ToolStatsStore {
  increment(toolName: string): void;
  load(): ToolStatEntry[];
}

export function createSqliteStatsStore(db: Database.Database): ToolStatsStore {
  return {
    increment: (toolName) => incrementToolStat(toolName, db),
    load: () => listToolStats(db).map((row) => ({ toolName: row.tool_name, callCount: row.call_count })),
  };
}

export class ToolStats {
  private readonly counts = new Map<string, number>();
  private readonly store?: ToolStatsStore;

  constructor(store?: ToolStatsStore) {
    this.store = store;
  }

  /** Seed the in-memory view from the store. Keeps the larger count per tool. */
  hydrate(): void {
    if (!this.store) return;
    try {
      const entries = this.store.load();
      for (const { toolName, callCount } of entries) {
        this.counts.set(toolName, Math.max(callCount, this.counts.get(toolName) ?? 0));
      }
      log.info({ tools: entries.length }, 'tool stats hydrated');
    } catch (err) {
      log.warn({ err }, 'failed to load tool stats, starting from zero');
    }
  }

  /** Never throws. */
  increment(toolName: string): void {
    this.counts.set(toolName, (this.counts.get(toolName) ?? 0) + 1);
    if (!this.store) return;
    try {
      this.store.increment(toolName);
    } catch (err) {
      log.error({ err, tool: toolName }, 'failed to persist tool stat');
    }
  }

  get(toolName: string): number {
    return this.counts.get(toolName) ?? 0;
  }

  /** Highest count first, ties by name */
  snapshot(): ToolStatEntry[] {
    return [...this.counts.entries()]
      .map(([toolName, callCount]) => ({ toolName, callCount }))
      .sort((a, b) => b.callCount - a.callCount || a.toolName.localeCompare(b.toolName));
  }
}
