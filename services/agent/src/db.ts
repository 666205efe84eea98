import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { logger } from '@rxdesk/shared';

const log = logger.child({ module: 'db' });

const SQL_DIR = fileURLToPath(new URL('../sql/', import.meta.url));
const DB_FILE = 'rxdesk.db';

let db: Database.Database | undefined;

function readSql(file: string): string {
  return readFileSync(path.join(SQL_DIR, file), 'utf-8');
}

/**
 * Open (once) the SQLite database under `dataDir` and apply the schema.
 * Later calls return the same handle whatever they pass.
 */
export function getDb(dataDir: string = process.env.DATA_DIR ?? './data'): Database.Database {
  if (db) return db;

  mkdirSync(dataDir, { recursive: true });
  const dbPath = path.join(dataDir, DB_FILE);
  log.info({ path: dbPath }, 'opening SQLite database');

  const handle = new Database(dbPath);
  handle.pragma('journal_mode = DELETE');
  handle.pragma('busy_timeout = 5000');
  handle.pragma('foreign_keys = ON');
  handle.exec(readSql('schema.sql'));

  db = handle;
  return handle;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
    log.info('database closed');
  }
}

/** Load the synthetic catalog when the medications table is empty. Returns true if it ran. */
export function seedDatabase(handle: Database.Database = getDb()): boolean {
  const row = handle.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM medications').get();
  if (row && row.n > 0) {
    log.debug({ medications: row.n }, 'catalog already present, skipping seed');
    return false;
  }
  handle.exec(readSql('seed.sql'));
  log.info('seeded synthetic pharmacy catalog');
  return true;
}

// --- Tool usage statistics ---

export interface ToolStatRow {
  tool_name: string;
  call_count: number;
}

export function incrementToolStat(toolName: string, handle: Database.Database = getDb()): void {
  handle
    .prepare<[string]>(`
      INSERT INTO tool_stats (tool_name, call_count) VALUES (?, 1)
      ON CONFLICT (tool_name) DO UPDATE SET call_count = call_count + 1
    `)
    .run(toolName);
}

export function listToolStats(handle: Database.Database = getDb()): ToolStatRow[] {
  return handle
    .prepare<[], ToolStatRow>('SELECT tool_name, call_count FROM tool_stats ORDER BY call_count DESC, tool_name ASC')
    .all();
}
